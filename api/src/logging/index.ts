/**
 * Logging Module
 * @module logging
 *
 * Structured logging and request-scoped log correlation.
 */

export {
  type LogContext,
  type LoggerConfig,
  type DomainLogMethods,
  type StructuredLogger,
  createLogger,
  getLogger,
  resetLogger,
  configureLogger,
  createModuleLogger,
  timed,
} from './logger';

export {
  type RequestContext,
  type RequestLoggerPluginOptions,
  createRequestContext,
  runWithContext,
  getRequestContext,
  getRequestLogger,
  getRequestId,
  addRequestMetadata,
  requestLoggerPlugin,
} from './request-context';
