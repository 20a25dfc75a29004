/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating all application configuration.
 * Every section defaults, so an empty source set yields a usable config.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Server Configuration
// ============================================================================

export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(5000),
  cors: z.object({
    /** Allowed origins */
    origins: z.array(z.string()).default(['*']),
    credentials: z.boolean().default(false),
  }).default({}),
  /** Maximum request body size in bytes */
  bodyLimit: z.coerce.number().int().min(1024).default(16 * 1024 * 1024),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  /** Enable pretty printing (development only) */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Conversion Configuration
// ============================================================================

/**
 * Defaults applied when a pipeline leaves a workflow setting open
 */
export const ConversionConfigSchema = z.object({
  defaultWorkflowName: z.string().min(1).default('CI/CD Pipeline'),
  defaultRunner: z.string().min(1).default('ubuntu-latest'),
  /** Options passed to every job container */
  containerOptions: z.string().default('--cpus 1 --memory 2gb'),
  /** Used when a job timeout cannot be read */
  defaultTimeoutMinutes: z.coerce.number().int().min(1).default(360),
  artifactRetentionDays: z.coerce.number().int().min(1).max(90).default(30),
});

export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;

// ============================================================================
// Upload Configuration
// ============================================================================

export const UploadConfigSchema = z.object({
  allowedExtensions: z.array(z.string().startsWith('.')).min(1).default(['.yml', '.yaml']),
  /** Maximum pipeline file size in bytes */
  maxFileSize: z.coerce.number().int().min(1).default(16 * 1024 * 1024),
});

export type UploadConfig = z.infer<typeof UploadConfigSchema>;

// ============================================================================
// Root Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  version: z.string().default('1.0.0'),
  server: ServerConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  conversion: ConversionConfigSchema.default({}),
  upload: UploadConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ============================================================================
// Partial Configuration Types
// ============================================================================

/**
 * Partial configuration as read from a single source, before defaults
 */
export type PartialAppConfig = z.input<typeof AppConfigSchema>;
