/**
 * Infrastructure Error Classes
 * @module errors/infrastructure
 */

import { BaseError, ErrorContext } from './base';
import { ConfigErrorCodes } from './codes';

/**
 * Invalid or unreadable configuration
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;

  constructor(
    configKey: string,
    message?: string,
    context: ErrorContext = {}
  ) {
    super(
      message ?? `Invalid or missing configuration: ${configKey}`,
      ConfigErrorCodes.CONFIGURATION_ERROR,
      context
    );
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }

  static notLoaded(): ConfigurationError {
    return new ConfigurationError('config', 'Configuration not loaded. Call initConfig() first.');
  }
}
