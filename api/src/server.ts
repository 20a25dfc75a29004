/**
 * Server Entry Point
 * @module server
 */

import { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { initConfig } from './config';
import { createModuleLogger } from './logging/logger';

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string, app: FastifyInstance): Promise<void> {
  const logger = createModuleLogger('server');
  logger.info({ signal }, 'Received shutdown signal');

  try {
    await app.close();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = await initConfig();
  const app = await buildApp();
  const logger = createModuleLogger('server');

  const shutdownHandler = (signal: string) => {
    void gracefulShutdown(signal, app);
  };
  process.on('SIGTERM', () => shutdownHandler('SIGTERM'));
  process.on('SIGINT', () => shutdownHandler('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    shutdownHandler('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    shutdownHandler('unhandledRejection');
  });

  const { host, port } = config.server;
  await app.listen({ host, port });

  logger.info({ host, port }, `Server listening on http://${host}:${port}`);
}

start().catch((error: unknown) => {
  createModuleLogger('server').fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
