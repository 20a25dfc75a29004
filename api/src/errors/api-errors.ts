/**
 * API Error Standardization
 * @module errors/api-errors
 *
 * Request-level errors raised by route handlers before any domain
 * logic runs.
 */

import { ErrorCodes, getHttpStatusForCode } from './codes';

// ============================================================================
// API Error Codes (subset for API layer)
// ============================================================================

export const ApiErrorCodes = {
  BAD_REQUEST: ErrorCodes.BAD_REQUEST,
  NOT_FOUND: ErrorCodes.NOT_FOUND,
  VALIDATION_ERROR: ErrorCodes.VALIDATION_ERROR,
  PAYLOAD_TOO_LARGE: ErrorCodes.PAYLOAD_TOO_LARGE,
  INTERNAL_ERROR: ErrorCodes.INTERNAL_ERROR,
} as const;

export type ApiErrorCode = (typeof ApiErrorCodes)[keyof typeof ApiErrorCodes];

// ============================================================================
// Base API Error
// ============================================================================

/**
 * Base class for all API-level errors.
 */
export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(
    code: ApiErrorCode,
    message: string,
    statusCode?: number,
    details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
    this.code = code;
    this.statusCode = statusCode ?? getHttpStatusForCode(code);
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// Specific API Error Classes
// ============================================================================

/**
 * 400 Bad Request
 */
export class BadRequestError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(ApiErrorCodes.BAD_REQUEST, message, 400, details);
    this.name = 'BadRequestError';
  }
}

/**
 * Type guard for API errors
 */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}
