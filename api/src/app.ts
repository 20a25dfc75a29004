/**
 * Fastify Application Factory
 * @module app
 */

import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';

import { AppConfig, PartialAppConfig, getConfig, initConfig, isConfigInitialized, validateConfig } from './config';
import { configureLogger, createModuleLogger } from './logging/logger';
import { requestLoggerPlugin } from './logging/request-context';
import errorHandler from './middleware/error-handler';
import { swaggerPlugin } from './plugins';
import routes from './routes';
import { PipelineService } from './services/pipeline-service';

/**
 * Application configuration options
 */
export interface AppOptions {
  /**
   * Configuration to validate and use instead of the loaded one
   */
  config?: PartialAppConfig;

  /**
   * Enable CORS
   * @default true
   */
  cors?: boolean;

  /**
   * Enable Helmet security headers
   * @default true
   */
  helmet?: boolean;

  /**
   * Enable Swagger documentation
   * @default true outside production
   */
  swagger?: boolean;

  swaggerOptions?: {
    routePrefix?: string;
    exposeRoute?: boolean;
  };

  /**
   * Service used by the pipeline routes
   */
  pipelineService?: PipelineService;
}

async function resolveConfig(options: AppOptions): Promise<AppConfig> {
  if (options.config) {
    return validateConfig(options.config);
  }
  return isConfigInitialized() ? getConfig() : initConfig();
}

/**
 * Create and configure Fastify application instance
 */
export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const config = await resolveConfig(opts);
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    version: config.version,
    environment: config.env,
  });

  const logger = createModuleLogger('app-factory');
  const isProduction = config.env === 'production';

  // Request logging goes through the request logger plugin
  const app = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    bodyLimit: config.server.bodyLimit,
  });

  app.decorate('config', config);

  if (opts.cors ?? true) {
    await app.register(cors, {
      origin: config.server.cors.origins.includes('*') ? true : config.server.cors.origins,
      credentials: config.server.cors.credentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
    });
    logger.debug('CORS plugin registered');
  }

  if (opts.helmet ?? true) {
    await app.register(helmet, {
      contentSecurityPolicy: isProduction,
      crossOriginEmbedderPolicy: false,
    });
    logger.debug('Helmet plugin registered');
  }

  await app.register(requestLoggerPlugin);

  // Register error handler (must be before routes)
  await app.register(errorHandler, { exposeDetails: !isProduction });
  logger.debug('Error handler registered');

  // Register Swagger documentation (MUST be before routes)
  if (opts.swagger ?? !isProduction) {
    await app.register(swaggerPlugin, {
      routePrefix: opts.swaggerOptions?.routePrefix ?? '/docs',
      exposeRoute: opts.swaggerOptions?.exposeRoute ?? true,
      version: config.version,
      serverUrl: `http://localhost:${config.server.port}`,
    });
    logger.debug('Swagger documentation registered');
  }

  await app.register(routes, {
    pipelines: opts.pipelineService ? { service: opts.pipelineService } : {},
  });
  logger.debug('Routes registered');

  app.addHook('onClose', async () => {
    logger.info('Application closing...');
  });

  return app;
}

/**
 * Create application for testing (silent logging, no docs)
 */
export async function buildTestApp(opts: Partial<AppOptions> = {}): Promise<FastifyInstance> {
  const config = opts.config ?? {};
  return buildApp({
    ...opts,
    swagger: opts.swagger ?? false,
    config: {
      ...config,
      env: config.env ?? 'test',
      logging: { level: 'silent', ...config.logging },
    },
  });
}

export default buildApp;

// ============================================================================
// Type Declarations
// ============================================================================

declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}
