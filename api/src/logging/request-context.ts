/**
 * Request Context Logger
 * @module logging/request-context
 *
 * AsyncLocalStorage-based request context so that services can log with the
 * request id without having it passed through every call.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';
import fp from 'fastify-plugin';
import { StructuredLogger, getLogger } from './logger';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Request context stored in AsyncLocalStorage
 */
export interface RequestContext {
  requestId: string;
  /** Request-scoped logger */
  logger: StructuredLogger;
  startTime: number;
  metadata: Record<string, unknown>;
}

export interface RequestLoggerPluginOptions {
  /** Header carrying a caller-supplied request id */
  requestIdHeader?: string;
  /** Paths that are neither logged nor given a context */
  excludePaths?: string[];
  responseLogLevel?: 'trace' | 'debug' | 'info';
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext?: RequestContext;
  }
}

// ============================================================================
// Context Management
// ============================================================================

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

export function createRequestContext(requestId: string = randomUUID()): RequestContext {
  return {
    requestId,
    logger: getLogger().withContext({ requestId }),
    startTime: Date.now(),
    metadata: {},
  };
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Gets the current request logger (falls back to the root logger)
 */
export function getRequestLogger(): StructuredLogger {
  return getRequestContext()?.logger ?? getLogger();
}

export function getRequestId(): string | undefined {
  return getRequestContext()?.requestId;
}

export function addRequestMetadata(metadata: Record<string, unknown>): void {
  const context = getRequestContext();
  if (context) {
    Object.assign(context.metadata, metadata);
  }
}

// ============================================================================
// Fastify Plugin
// ============================================================================

const defaultPluginOptions: Required<RequestLoggerPluginOptions> = {
  requestIdHeader: 'x-request-id',
  excludePaths: ['/api/health', '/api/health/live', '/favicon.ico'],
  responseLogLevel: 'info',
};

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function requestLogger(
  fastify: FastifyInstance,
  opts: RequestLoggerPluginOptions,
  done: (err?: Error) => void
): void {
  const options = { ...defaultPluginOptions, ...opts };

  fastify.addHook('onRequest', (request: FastifyRequest, reply: FastifyReply, next: HookHandlerDoneFunction) => {
    const path = request.url.split('?')[0];
    if (options.excludePaths.includes(path)) {
      next();
      return;
    }

    const context = createRequestContext(headerValue(request, options.requestIdHeader) ?? request.id);
    request.requestContext = context;
    reply.header(options.requestIdHeader, context.requestId);

    runWithContext(context, () => {
      context.logger.debug(
        {
          event: 'http_request_started',
          method: request.method,
          path,
          contentLength: request.headers['content-length'],
        },
        'Request started'
      );
      next();
    });
  });

  fastify.addHook('onResponse', (request: FastifyRequest, reply: FastifyReply, next: HookHandlerDoneFunction) => {
    const context = request.requestContext;
    if (!context) {
      next();
      return;
    }

    const responseLog = {
      event: 'http_request_completed',
      method: request.method,
      path: request.url.split('?')[0],
      statusCode: reply.statusCode,
      durationMs: Date.now() - context.startTime,
      ...context.metadata,
    };

    const level =
      reply.statusCode >= 500 ? 'error' : reply.statusCode >= 400 ? 'warn' : options.responseLogLevel;
    context.logger[level](responseLog, `Request completed: ${reply.statusCode}`);

    next();
  });

  done();
}

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '4.x',
});
