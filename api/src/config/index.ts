/**
 * Configuration Module
 * @module config
 *
 * Type-safe configuration access backed by a multi-source loader.
 *
 * @example
 * ```typescript
 * await initConfig();
 * const { conversion } = getConfig();
 * ```
 */

import { ConfigLoader, type ConfigLoaderOptions } from './loader';
import type { AppConfig } from './schema';
import { ConfigurationError } from '../errors/infrastructure';

// ============================================================================
// Singleton Configuration
// ============================================================================

let configInstance: AppConfig | null = null;

/**
 * Initialize the configuration system.
 * Repeated calls return the already loaded configuration.
 */
export async function initConfig(options: ConfigLoaderOptions = {}): Promise<AppConfig> {
  if (configInstance) {
    return configInstance;
  }

  configInstance = await new ConfigLoader(options).load();
  return configInstance;
}

/**
 * Get the current configuration
 * @throws ConfigurationError if initConfig() has not completed
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    throw ConfigurationError.notLoaded();
  }
  return configInstance;
}

export function isConfigInitialized(): boolean {
  return configInstance !== null;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// ============================================================================
// Re-exports
// ============================================================================

export {
  ConfigLoader,
  ConfigValidationError,
  EnvironmentConfigSource,
  FileConfigSource,
  deepMerge,
  validateConfig,
  loadConfig,
  type ConfigLoaderOptions,
  type ConfigSource,
  type RawConfig,
} from './loader';

export {
  AppConfigSchema,
  ConversionConfigSchema,
  Environment,
  LoggingConfigSchema,
  ServerConfigSchema,
  UploadConfigSchema,
  type AppConfig,
  type ConversionConfig,
  type LoggingConfig,
  type PartialAppConfig,
  type ServerConfig,
  type UploadConfig,
} from './schema';
