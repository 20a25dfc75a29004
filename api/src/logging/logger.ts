/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the pipeline analysis service.
 * Includes domain-specific logging methods for parsing, graph analysis
 * and workflow conversion.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  requestId?: string;
  operation?: string;
  module?: string;
  service?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific log methods
 */
export interface DomainLogMethods {
  withContext(context: LogContext): StructuredLogger;

  // Parser methods
  pipelineParsed(jobCount: number, stageCount: number, duration: number): void;
  parserFailed(parser: string, error: Error): void;

  // Graph methods
  graphBuilt(nodeCount: number, edgeCount: number, duration?: number): void;
  cyclesDetected(cycles: readonly (readonly string[])[]): void;

  // Conversion methods
  conversionCompleted(workflowName: string, jobCount: number, duration: number): void;

  // Performance methods
  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

/**
 * Pino logger extended with domain methods
 */
export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_REDACT_PATHS = [
  'password',
  'token',
  'authorization',
  'apiKey',
  'secret',
  'headers.authorization',
  'headers.cookie',
];

let configOverrides: Partial<LoggerConfig> = {};

/**
 * Resolve logger configuration from the environment at creation time.
 * Values set through configureLogger() win over the environment.
 */
function resolveConfig(): LoggerConfig {
  const env = process.env;
  return {
    level: env.LOG_LEVEL || 'info',
    pretty: env.LOG_PRETTY === 'true' || (env.LOG_PRETTY === undefined && env.NODE_ENV === 'development'),
    redact: DEFAULT_REDACT_PATHS,
    service: env.SERVICE_NAME || 'ci-bridge',
    version: env.SERVICE_VERSION || '1.0.0',
    environment: env.NODE_ENV || 'development',
    ...configOverrides,
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

/**
 * Expands each path to also match one level of nesting
 */
function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(context));
    },

    pipelineParsed(jobCount: number, stageCount: number, duration: number) {
      logger.debug(
        {
          event: 'pipeline_parsed',
          jobCount,
          stageCount,
          durationMs: duration,
        },
        `Parsed pipeline with ${jobCount} jobs across ${stageCount} stages`
      );
    },

    parserFailed(parser: string, error: Error) {
      logger.warn(
        {
          event: 'parser_failed',
          parser,
          err: error,
        },
        `Parser ${parser} failed: ${error.message}`
      );
    },

    graphBuilt(nodeCount: number, edgeCount: number, duration?: number) {
      logger.debug(
        {
          event: 'graph_built',
          nodeCount,
          edgeCount,
          durationMs: duration,
        },
        `Graph built: ${nodeCount} nodes, ${edgeCount} edges`
      );
    },

    cyclesDetected(cycles: readonly (readonly string[])[]) {
      if (cycles.length === 0) {
        return;
      }
      logger.warn(
        {
          event: 'cycles_detected',
          cycleCount: cycles.length,
          cycles: cycles.map(cycle => cycle.join(' -> ')),
        },
        `Detected ${cycles.length} circular dependencies`
      );
    },

    conversionCompleted(workflowName: string, jobCount: number, duration: number) {
      logger.info(
        {
          event: 'conversion_completed',
          workflowName,
          jobCount,
          durationMs: duration,
        },
        `Converted ${jobCount} jobs into workflow "${workflowName}"`
      );
    },

    performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>) {
      logger.debug(
        {
          event: 'performance_metric',
          operation,
          durationMs: duration,
          ...metadata,
        },
        `${operation}: ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, baseContext?: LogContext): StructuredLogger {
  const config = resolveConfig();

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('ci-bridge');
  }
  return rootLogger;
}

/**
 * Apply loaded application config to loggers created from now on.
 * The root logger is rebuilt on next use.
 */
export function configureLogger(overrides: Partial<LoggerConfig>): void {
  configOverrides = { ...configOverrides, ...overrides };
  rootLogger = null;
}

/**
 * Resets the root logger and any configured overrides (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
  configOverrides = {};
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}

/**
 * Runs a synchronous step and records its duration
 */
export function timed<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => T
): T {
  const startTime = Date.now();
  try {
    const result = fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}
