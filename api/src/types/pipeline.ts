/**
 * Pipeline Model Type Definitions
 * @module types/pipeline
 *
 * Parsed representation of a GitLab CI definition. Produced by the parser,
 * read (never mutated) by the graph builder and the workflow converter.
 */

// ============================================================================
// Scalars
// ============================================================================

/**
 * Scalar value a job-level variable may hold
 */
export type VariableValue = string | number | boolean;

/**
 * Job execution policy (`when:`). Known values are listed; others are kept verbatim.
 */
export type JobWhen = 'on_success' | 'on_failure' | 'always' | 'manual' | 'delayed' | 'never' | (string & {});

// ============================================================================
// Variables and Secrets
// ============================================================================

/**
 * Global CI/CD variable
 */
export interface PipelineVariable {
  readonly name: string;
  readonly value: string;
  readonly protected: boolean;
  readonly masked: boolean;
  /** Whether `$VAR` references inside the value are expanded */
  readonly expand: boolean;
}

/**
 * Sensitive variable flagged protected or masked
 */
export interface PipelineSecret {
  readonly name: string;
  readonly type: 'env' | 'file' | 'docker';
  readonly description: string;
}

// ============================================================================
// Job Configuration
// ============================================================================

export interface ArtifactsConfig {
  readonly paths: readonly string[];
  /** Raw GitLab duration, e.g. `1 week` or `3 days` */
  readonly expireIn?: string;
}

export interface JobRule {
  readonly if?: string;
  readonly when?: string;
}

/**
 * `only`/`except` reduced to the list of refs it names
 */
export interface RefFilter {
  readonly refs: readonly string[];
}

/**
 * Opaque GitLab sections carried through without interpretation
 */
export type RawSection = Readonly<Record<string, unknown>>;

/**
 * A single GitLab CI job
 */
export interface PipelineJob {
  /** Unique job identifier (the top-level YAML key) */
  readonly name: string;
  readonly stage: string;
  readonly image?: string;
  readonly script: readonly string[];
  readonly beforeScript: readonly string[];
  readonly afterScript: readonly string[];
  /** Jobs whose artifacts this job downloads */
  readonly dependencies: readonly string[];
  /** Jobs that must complete before this job starts */
  readonly needs: readonly string[];
  readonly variables: Readonly<Record<string, VariableValue>>;
  readonly artifacts?: ArtifactsConfig;
  readonly cache?: RawSection;
  readonly retry?: RawSection | number;
  readonly timeout?: string;
  readonly only?: RefFilter;
  readonly except?: RefFilter;
  readonly tags: readonly string[];
  readonly allowFailure: boolean;
  readonly when: JobWhen;
  readonly environment?: string;
  readonly rules: readonly JobRule[];
}

// ============================================================================
// Pipeline
// ============================================================================

export interface WorkflowConfig {
  readonly name?: string;
  readonly rules: readonly JobRule[];
}

/**
 * Complete parsed pipeline
 */
export interface PipelineModel {
  /** Stage names in execution order */
  readonly stages: readonly string[];
  readonly jobs: readonly PipelineJob[];
  readonly variables: readonly PipelineVariable[];
  readonly secrets: readonly PipelineSecret[];
  /** Default image (`default.image` or top-level `image`) */
  readonly image?: string;
  readonly beforeScript: readonly string[];
  readonly afterScript: readonly string[];
  readonly cache?: RawSection;
  readonly retry?: RawSection | number;
  readonly timeout?: string;
  readonly workflow?: WorkflowConfig;
  /** Include targets, recorded but never resolved */
  readonly include: readonly string[];
}

// ============================================================================
// Model Queries
// ============================================================================

export interface ExtractedVariable {
  readonly value: string;
  readonly protected: boolean;
  readonly masked: boolean;
  readonly scope: 'global' | 'job';
}

/**
 * Creates an empty pipeline model
 */
export function createEmptyPipeline(): PipelineModel {
  return {
    stages: [],
    jobs: [],
    variables: [],
    secrets: [],
    beforeScript: [],
    afterScript: [],
    include: [],
  };
}

export function getJobsByStage(model: PipelineModel, stage: string): PipelineJob[] {
  return model.jobs.filter(job => job.stage === stage);
}

export function getJobByName(model: PipelineModel, name: string): PipelineJob | undefined {
  return model.jobs.find(job => job.name === name);
}
