/**
 * Error Hierarchy Tests
 * @module tests/errors
 */

import { describe, it, expect } from 'vitest';
import {
  BadRequestError,
  ConfigurationError,
  ConversionError,
  FileProcessingError,
  YAMLParseError,
  getErrorMessage,
  getHttpStatusForCode,
  isBaseError,
  isClientError,
  isServerError,
} from '@/errors';

describe('error codes', () => {
  it('should map codes to HTTP statuses', () => {
    expect(getHttpStatusForCode('INVALID_YAML')).toBe(400);
    expect(getHttpStatusForCode('FILE_TOO_LARGE')).toBe(413);
    expect(getHttpStatusForCode('CONVERSION_ERROR')).toBe(422);
    expect(getHttpStatusForCode('SOMETHING_ELSE')).toBe(500);
  });

  it('should classify client and server errors', () => {
    expect(isClientError('UNSUPPORTED_FILE_TYPE')).toBe(true);
    expect(isServerError('SERIALIZATION_ERROR')).toBe(true);
    expect(isClientError('CONFIGURATION_ERROR')).toBe(false);
  });
});

describe('domain errors', () => {
  it('should serialize parse errors with their location', () => {
    const location = { file: '.gitlab-ci.yml', line: 3, column: 7 };
    const error = new YAMLParseError('Invalid YAML format: bad indentation', location);

    expect(error.toJSON()).toEqual({
      name: 'YAMLParseError',
      message: 'Invalid YAML format: bad indentation',
      code: 'INVALID_YAML',
      statusCode: 400,
      timestamp: error.timestamp.toISOString(),
      requestId: undefined,
      details: undefined,
      location,
      severity: 'error',
    });
  });

  it('should build file errors with details', () => {
    const error = FileProcessingError.fileTooLarge('ci.yml', 2048, 1024);

    expect(error.code).toBe('FILE_TOO_LARGE');
    expect(error.message).toBe('File size 2048 exceeds maximum 1024 bytes');
    expect(error.context.details).toEqual({ size: 2048, maxSize: 1024 });
  });

  it('should keep the job name on conversion errors', () => {
    const error = new ConversionError('Job name cannot be converted to a workflow job id', '');

    expect(error.statusCode).toBe(422);
    expect(error.jobName).toBe('');
    expect(error.toString()).toBe(
      'ConversionError [CONVERSION_ERROR]: Job name cannot be converted to a workflow job id'
    );
  });

  it('should keep the underlying cause', () => {
    const root = new Error('unexpected token');
    const error = new YAMLParseError('Invalid YAML format: unexpected token', null, { cause: root });

    expect(error.cause).toBe(root);
  });
});

describe('infrastructure errors', () => {
  it('should report configuration errors as server errors', () => {
    const error = ConfigurationError.notLoaded();

    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.configKey).toBe('config');
  });
});

describe('api errors', () => {
  it('should carry status and details', () => {
    const error = new BadRequestError('No file selected', { field: 'filename' });

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('BAD_REQUEST');
    expect(error.details).toEqual({ field: 'filename' });
    expect(isBaseError(error)).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('should read messages from any thrown value', () => {
    expect(getErrorMessage(new Error('bad'))).toBe('bad');
    expect(getErrorMessage('text')).toBe('text');
    expect(getErrorMessage(42)).toBe('42');
  });
});
