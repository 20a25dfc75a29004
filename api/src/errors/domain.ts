/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised while parsing pipeline definitions and converting
 * them to workflows.
 */

import { BaseError, ErrorContext, SourceLocation } from './base';
import {
  ErrorCode,
  ParserErrorCodes,
  ConversionErrorCodes,
} from './codes';

// ============================================================================
// Parser Errors
// ============================================================================

/**
 * Base class for parser-related errors
 */
export class ParseError extends BaseError {
  public readonly location: SourceLocation | null;
  public readonly severity: 'error' | 'warning';

  constructor(
    message: string,
    code: ErrorCode = ParserErrorCodes.PARSE_ERROR,
    location: SourceLocation | null = null,
    context: ErrorContext = {}
  ) {
    super(message, code, context);
    this.name = 'ParseError';
    this.location = location;
    this.severity = 'error';
  }

  toJSON() {
    return {
      ...super.toJSON(),
      location: this.location,
      severity: this.severity,
    };
  }
}

/**
 * Malformed YAML document
 */
export class YAMLParseError extends ParseError {
  constructor(
    message: string,
    location: SourceLocation | null = null,
    context: ErrorContext = {}
  ) {
    super(message, ParserErrorCodes.INVALID_YAML, location, context);
    this.name = 'YAMLParseError';
  }
}

/**
 * Well-formed YAML that cannot describe a pipeline
 */
export class InvalidPipelineError extends ParseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ParserErrorCodes.INVALID_PIPELINE, null, context);
    this.name = 'InvalidPipelineError';
  }
}

/**
 * Uploaded file rejected before parsing
 */
export class FileProcessingError extends ParseError {
  public readonly filePath: string;

  constructor(
    message: string,
    filePath: string,
    code: ErrorCode = ParserErrorCodes.FILE_READ_ERROR,
    context: ErrorContext = {}
  ) {
    super(message, code, null, context);
    this.name = 'FileProcessingError';
    this.filePath = filePath;
  }

  static fileTooLarge(filePath: string, size: number, maxSize: number): FileProcessingError {
    return new FileProcessingError(
      `File size ${size} exceeds maximum ${maxSize} bytes`,
      filePath,
      ParserErrorCodes.FILE_TOO_LARGE,
      { details: { size, maxSize } }
    );
  }

  static unsupportedType(filePath: string, allowed: readonly string[]): FileProcessingError {
    return new FileProcessingError(
      `Only ${allowed.join(' and ')} files allowed`,
      filePath,
      ParserErrorCodes.UNSUPPORTED_FILE_TYPE,
      { details: { allowed: [...allowed] } }
    );
  }
}

// ============================================================================
// Conversion Errors
// ============================================================================

export class ConversionError extends BaseError {
  public readonly jobName?: string;

  constructor(
    message: string,
    jobName?: string,
    code: ErrorCode = ConversionErrorCodes.CONVERSION_ERROR,
    context: ErrorContext = {}
  ) {
    super(message, code, context);
    this.name = 'ConversionError';
    this.jobName = jobName;
  }
}
