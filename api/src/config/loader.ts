/**
 * Configuration Loader
 * @module config/loader
 *
 * Loads configuration from prioritized sources, deep merges them and
 * validates the result against the application schema.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { AppConfig, AppConfigSchema } from './schema';
import { ConfigurationError } from '../errors/infrastructure';
import { getErrorMessage } from '../errors/base';
import { createModuleLogger } from '../logging/logger';

/**
 * Unvalidated configuration fragment as produced by a source
 */
export type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  name: string;
  priority: number;
  load(): Promise<RawConfig>;
  isAvailable(): boolean;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

function parseBoolean(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value === 'true';
}

function parseList(value: string | undefined): string[] | undefined {
  return value === undefined
    ? undefined
    : value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Maps environment variables onto the configuration structure
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    const env = this.env;

    return this.filterUndefined({
      env: env.NODE_ENV,
      version: env.APP_VERSION,
      server: {
        host: env.HOST,
        port: env.PORT,
        cors: {
          origins: parseList(env.CORS_ORIGINS),
          credentials: parseBoolean(env.CORS_CREDENTIALS),
        },
        bodyLimit: env.BODY_LIMIT,
      },
      logging: {
        level: env.LOG_LEVEL,
        pretty: parseBoolean(env.LOG_PRETTY),
      },
      conversion: {
        defaultWorkflowName: env.DEFAULT_WORKFLOW_NAME,
        defaultRunner: env.DEFAULT_RUNNER,
        containerOptions: env.CONTAINER_OPTIONS,
        defaultTimeoutMinutes: env.DEFAULT_TIMEOUT_MINUTES,
        artifactRetentionDays: env.ARTIFACT_RETENTION_DAYS,
      },
      upload: {
        allowedExtensions: parseList(env.UPLOAD_ALLOWED_EXTENSIONS),
        maxFileSize: env.UPLOAD_MAX_FILE_SIZE,
      },
    });
  }

  /**
   * Drops undefined values and the sections left empty by doing so
   */
  private filterUndefined(obj: RawConfig): RawConfig {
    const result: RawConfig = {};

    for (const [key, value] of Object.entries(obj)) {
      if (value === undefined) {
        continue;
      }
      if (isPlainObject(value)) {
        const filtered = this.filterUndefined(value);
        if (Object.keys(filtered).length > 0) {
          result[key] = filtered;
        }
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<RawConfig> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        this.name,
        `Failed to load configuration file: ${getErrorMessage(error)}`,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigurationError(this.name, 'Configuration file must contain a JSON object');
    }
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Replaces the default sources */
  sources?: ConfigSource[];
  /** Directory holding config.json files (default: ./config) */
  configDir?: string;
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  public readonly errors: z.ZodError;

  constructor(zodError: z.ZodError) {
    const formattedErrors = zodError.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));

    super(`Configuration validation failed:\n${
      formattedErrors.map(e => `  - ${e.path}: ${e.message}`).join('\n')
    }`);

    this.name = 'ConfigValidationError';
    this.errors = zodError;
  }
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[];
  private readonly logger = createModuleLogger('config');

  constructor(options: ConfigLoaderOptions = {}) {
    this.sources = options.sources
      ? [...options.sources]
      : ConfigLoader.defaultSources(options.configDir ?? join(process.cwd(), 'config'));

    this.sources.sort((a, b) => a.priority - b.priority);
  }

  private static defaultSources(configDir: string): ConfigSource[] {
    const nodeEnv = process.env.NODE_ENV ?? 'development';
    return [
      new FileConfigSource(join(configDir, 'config.json'), 5),
      new FileConfigSource(join(configDir, `config.${nodeEnv}.json`), 6),
      new EnvironmentConfigSource(),
    ];
  }

  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    return this;
  }

  getSourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AppConfig> {
    const merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        this.logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }
      const partial = await source.load();
      deepMerge(merged, partial);
      this.logger.debug({ source: source.name }, 'Loaded config from source');
    }

    const config = validateConfig(merged);
    this.logger.debug({ env: config.env }, 'Configuration loaded');
    return config;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Deep merge source into target; arrays and scalars overwrite
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      deepMerge(targetValue, sourceValue);
    } else if (isPlainObject(sourceValue)) {
      target[key] = deepMerge({}, sourceValue);
    } else {
      target[key] = sourceValue;
    }
  }
  return target;
}

/**
 * Validate a raw configuration object, applying defaults
 * @throws ConfigValidationError when the object does not match the schema
 */
export function validateConfig(config: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error);
  }
  return result.data;
}

export async function loadConfig(options?: ConfigLoaderOptions): Promise<AppConfig> {
  return new ConfigLoader(options).load();
}
