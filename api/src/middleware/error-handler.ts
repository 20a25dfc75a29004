/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Fastify error handler that maps domain, API and framework errors to a
 * single JSON error body and logs them by severity.
 */

import { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { BaseError, isBaseError } from '../errors/base';
import { ParseError } from '../errors/domain';
import { isApiError } from '../errors/api-errors';
import { ErrorCodes } from '../errors/codes';
import { createModuleLogger } from '../logging/logger';

// ============================================================================
// Error Response Types
// ============================================================================

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  code: string;
  requestId: string;
  timestamp: string;
  details?: unknown;
}

// ============================================================================
// Error Formatting
// ============================================================================

function baseErrorDetails(error: BaseError): Record<string, unknown> | undefined {
  if (error instanceof ParseError && error.location) {
    return { ...error.context.details, location: error.location };
  }
  return error.context.details;
}

/**
 * Format error for response
 */
export function formatError(
  error: FastifyError | Error,
  requestId: string,
  exposeDetails: boolean
): ErrorResponse {
  const timestamp = new Date().toISOString();

  if (isBaseError(error)) {
    const details = exposeDetails ? baseErrorDetails(error) : undefined;
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      requestId,
      timestamp: error.timestamp.toISOString(),
      ...(details !== undefined ? { details } : {}),
    };
  }

  if (isApiError(error)) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.code,
      requestId,
      timestamp,
      ...(exposeDetails && error.details !== undefined ? { details: error.details } : {}),
    };
  }

  // Fastify schema validation
  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: ErrorCodes.VALIDATION_ERROR,
      requestId,
      timestamp,
      ...(exposeDetails ? { details: error.validation } : {}),
    };
  }

  // Fastify errors with a status (malformed JSON, body too large)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: error.statusCode === 413 ? ErrorCodes.PAYLOAD_TOO_LARGE : ErrorCodes.BAD_REQUEST,
      requestId,
      timestamp,
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: exposeDetails ? error.message : 'An unexpected error occurred',
    code: ErrorCodes.INTERNAL_ERROR,
    requestId,
    timestamp,
  };
}

/**
 * Get HTTP error name from status code
 */
function getHttpErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
    422: 'Unprocessable Entity',
    500: 'Internal Server Error',
    503: 'Service Unavailable',
  };
  return names[statusCode] ?? 'Error';
}

// ============================================================================
// Error Handler Options
// ============================================================================

export interface ErrorHandlerOptions {
  /** Include error details and messages of unexpected errors in responses */
  exposeDetails?: boolean;
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

async function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): Promise<void> {
  const exposeDetails = options.exposeDetails ?? process.env.NODE_ENV !== 'production';
  const logger = createModuleLogger('error-handler');

  fastify.setErrorHandler(
    async (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const formatted = formatError(error, request.id, exposeDetails);
      const logContext = {
        err: error,
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: formatted.statusCode,
        code: formatted.code,
      };

      if (formatted.statusCode >= 500) {
        logger.error(logContext, 'Server error');
      } else {
        logger.warn(logContext, 'Client error');
      }

      return reply.status(formatted.statusCode).send(formatted);
    }
  );

  fastify.setNotFoundHandler(
    async (request: FastifyRequest, reply: FastifyReply) => {
      logger.warn(
        { method: request.method, url: request.url, requestId: request.id },
        'Route not found'
      );

      const body: ErrorResponse = {
        statusCode: 404,
        error: 'Not Found',
        message: `Route ${request.method} ${request.url} not found`,
        code: ErrorCodes.ROUTE_NOT_FOUND,
        requestId: request.id,
        timestamp: new Date().toISOString(),
      };
      return reply.status(404).send(body);
    }
  );
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
