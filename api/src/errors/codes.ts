/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the pipeline analysis service.
 * Provides typed error codes for consistent error handling across the application.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes (4xx, 5xx mapped)
 */
export const HttpErrorCodes = {
  // 400 Bad Request
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',

  // 404 Not Found
  NOT_FOUND: 'NOT_FOUND',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',

  // 413 Payload Too Large
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // 500 Internal Server Error
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',

  // 503 Service Unavailable
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type HttpErrorCode = typeof HttpErrorCodes[keyof typeof HttpErrorCodes];

/**
 * Parser Error Codes
 */
export const ParserErrorCodes = {
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_YAML: 'INVALID_YAML',
  INVALID_PIPELINE: 'INVALID_PIPELINE',

  // File errors
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
} as const;

export type ParserErrorCode = typeof ParserErrorCodes[keyof typeof ParserErrorCodes];

/**
 * Conversion Error Codes
 */
export const ConversionErrorCodes = {
  CONVERSION_ERROR: 'CONVERSION_ERROR',
  SERIALIZATION_ERROR: 'SERIALIZATION_ERROR',
} as const;

export type ConversionErrorCode = typeof ConversionErrorCodes[keyof typeof ConversionErrorCodes];

/**
 * Configuration Error Codes
 */
export const ConfigErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

/**
 * All error codes combined
 */
export const ErrorCodes = {
  ...HttpErrorCodes,
  ...ParserErrorCodes,
  ...ConversionErrorCodes,
  ...ConfigErrorCodes,
} as const;

export type ErrorCode =
  | HttpErrorCode
  | ParserErrorCode
  | ConversionErrorCode
  | ConfigErrorCode;

// ============================================================================
// Error Code Utilities
// ============================================================================

/**
 * Map error codes to HTTP status codes
 */
export const errorCodeToHttpStatus: Record<string, number> = {
  // 400
  [HttpErrorCodes.BAD_REQUEST]: 400,
  [HttpErrorCodes.VALIDATION_ERROR]: 400,
  [HttpErrorCodes.INVALID_INPUT]: 400,
  [ParserErrorCodes.PARSE_ERROR]: 400,
  [ParserErrorCodes.INVALID_YAML]: 400,
  [ParserErrorCodes.INVALID_PIPELINE]: 400,
  [ParserErrorCodes.UNSUPPORTED_FILE_TYPE]: 400,

  // 404
  [HttpErrorCodes.NOT_FOUND]: 404,
  [HttpErrorCodes.ROUTE_NOT_FOUND]: 404,

  // 413
  [HttpErrorCodes.PAYLOAD_TOO_LARGE]: 413,
  [ParserErrorCodes.FILE_TOO_LARGE]: 413,

  // 422
  [ConversionErrorCodes.CONVERSION_ERROR]: 422,

  // 500
  [HttpErrorCodes.INTERNAL_ERROR]: 500,
  [HttpErrorCodes.UNEXPECTED_ERROR]: 500,
  [ParserErrorCodes.FILE_READ_ERROR]: 500,
  [ConversionErrorCodes.SERIALIZATION_ERROR]: 500,
  [ConfigErrorCodes.CONFIGURATION_ERROR]: 500,

  // 503
  [HttpErrorCodes.SERVICE_UNAVAILABLE]: 503,
};

/**
 * Get HTTP status code for an error code
 */
export function getHttpStatusForCode(code: string): number {
  return errorCodeToHttpStatus[code] ?? 500;
}

/**
 * Check if an error code represents a client error (4xx)
 */
export function isClientError(code: string): boolean {
  const status = getHttpStatusForCode(code);
  return status >= 400 && status < 500;
}

/**
 * Check if an error code represents a server error (5xx)
 */
export function isServerError(code: string): boolean {
  return getHttpStatusForCode(code) >= 500;
}
