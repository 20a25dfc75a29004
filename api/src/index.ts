/**
 * CI Bridge API
 * @module @ci-bridge/api
 *
 * Parses GitLab CI pipelines, analyzes their job dependency graphs and
 * converts them to GitHub Actions workflows.
 *
 * @example
 * ```typescript
 * import { GitLabCIParser, GraphBuilder, GraphAnalyzer } from '@ci-bridge/api';
 *
 * const pipeline = new GitLabCIParser().parse(content);
 * const analyzer = new GraphAnalyzer(new GraphBuilder().build(pipeline));
 * console.log(analyzer.getCriticalPath());
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type {
  // Pipeline model
  PipelineModel,
  PipelineJob,
  PipelineVariable,
  PipelineSecret,
  ExtractedVariable,
  JobWhen,

  // Graph
  JobNode,
  JobEdge,
  JobType,
  EdgeType,
  SerializedGraph,
  JobDependencies,
  Cycle,
  GraphMetrics,

  // GitHub Actions
  GitHubWorkflow,
  WorkflowJob,
  WorkflowStep,
  WorkflowTriggers,

  // HTTP
  HealthCheck,
  LivenessProbe,
  ErrorResponse,
} from './types';

export { createEmptyPipeline, getJobsByStage, getJobByName } from './types';

// ============================================================================
// Parsing
// ============================================================================

export {
  GitLabCIParser,
  parseGitLabCI,
  collectWarnings,
  getJobReferences,
  extractVariables,
  extractSecrets,
  type ValidationResult,
  type ValidationWarning,
} from './parsers';

// ============================================================================
// Graph
// ============================================================================

export {
  DependencyGraph,
  GraphBuilder,
  GraphAnalyzer,
  buildDependencyGraph,
  createGraphBuilder,
  type IDependencyGraph,
  type IGraphBuilder,
} from './graph';

// ============================================================================
// Conversion
// ============================================================================

export {
  GitLabToGitHubConverter,
  serializeWorkflow,
  type ConvertOptions,
} from './converters';

// ============================================================================
// Services
// ============================================================================

export {
  PipelineService,
  createPipelineService,
  type PipelineServiceOptions,
  type AnalyzeResult,
  type ConvertResult,
  type UploadResult,
  type ValidateResult,
} from './services/pipeline-service';

// ============================================================================
// Errors, Config, Logging
// ============================================================================

export * from './errors';

export { initConfig, getConfig, resetConfig, type AppConfig } from './config';

export { createLogger, getLogger, createModuleLogger, type StructuredLogger } from './logging';

// ============================================================================
// Application
// ============================================================================

export { buildApp, buildTestApp, type AppOptions } from './app';
