/**
 * Error Handling Module
 * @module errors
 *
 * @example
 * ```typescript
 * import { YAMLParseError, isBaseError } from './errors';
 *
 * throw new YAMLParseError('Unexpected end of flow sequence', { file: '.gitlab-ci.yml', line: 3, column: 1 });
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

export {
  HttpErrorCodes,
  ParserErrorCodes,
  ConversionErrorCodes,
  ConfigErrorCodes,
  ErrorCodes,
  errorCodeToHttpStatus,
  getHttpStatusForCode,
  isClientError,
  isServerError,
  type ErrorCode,
  type HttpErrorCode,
  type ParserErrorCode,
  type ConversionErrorCode,
  type ConfigErrorCode,
} from './codes';

// ============================================================================
// Base Error
// ============================================================================

export {
  BaseError,
  isBaseError,
  getErrorMessage,
  type ErrorContext,
  type SerializedError,
  type SourceLocation,
} from './base';

// ============================================================================
// Domain Errors
// ============================================================================

export {
  ParseError,
  YAMLParseError,
  InvalidPipelineError,
  FileProcessingError,
  ConversionError,
} from './domain';

export { ConfigurationError } from './infrastructure';

// ============================================================================
// API Errors
// ============================================================================

export {
  ApiError,
  ApiErrorCodes,
  BadRequestError,
  isApiError,
  type ApiErrorCode,
} from './api-errors';
