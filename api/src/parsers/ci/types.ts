/**
 * GitLab CI Parser Types
 * @module parsers/ci/types
 *
 * Constants, result types and raw-value guards used while reading a
 * .gitlab-ci.yml document.
 */

import type { SourceLocation } from '../../errors/base';
import type { PipelineModel } from '../../types/pipeline';

// ============================================================================
// Constants
// ============================================================================

/**
 * Top-level keys that configure the pipeline rather than declare a job
 */
export const GITLAB_RESERVED_KEYWORDS: readonly string[] = [
  'stages',
  'variables',
  'before_script',
  'after_script',
  'cache',
  'retry',
  'timeout',
  'image',
  'services',
  'default',
  'include',
  'workflow',
];

/**
 * Stages GitLab assumes when `stages:` is omitted
 */
export const GITLAB_DEFAULT_STAGES: readonly string[] = ['build', 'test', 'deploy'];

/**
 * Stages that exist in every pipeline
 */
export const GITLAB_BUILTIN_STAGES: readonly string[] = ['.pre', '.post'];

export const DEFAULT_JOB_STAGE = 'test';
export const DEFAULT_JOB_WHEN = 'on_success';

/**
 * Keys of an `include:` entry, in the order they name the included file
 */
export const INCLUDE_TARGET_KEYS: readonly string[] = [
  'local',
  'file',
  'remote',
  'template',
  'project',
  'component',
];

// ============================================================================
// Options and Results
// ============================================================================

export interface GitLabCIParserOptions {
  /** Reported in error locations */
  readonly filePath?: string;
}

export type ValidationWarningCode = 'UNKNOWN_STAGE' | 'UNKNOWN_JOB_REFERENCE';

export interface ValidationWarning {
  readonly code: ValidationWarningCode;
  readonly message: string;
  readonly job: string;
}

export type ValidationResult =
  | {
      readonly valid: true;
      readonly message: string;
      readonly warnings: ValidationWarning[];
      readonly pipeline: PipelineModel;
    }
  | {
      readonly valid: false;
      readonly error: string;
      readonly location: SourceLocation | null;
    };

// ============================================================================
// Raw Value Guards
// ============================================================================

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * A string, or every element of a list, as strings. Anything else is empty.
 */
export function toStringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter(item => item !== null && item !== undefined).map(item => String(item));
  }
  return [];
}

/**
 * `image:` and `environment:` accept a string or a mapping with `name`
 */
export function toName(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value) && typeof value.name === 'string') {
    return value.name;
  }
  return undefined;
}

export function toText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}
