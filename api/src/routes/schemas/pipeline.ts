/**
 * Pipeline API Schemas
 * @module routes/schemas/pipeline
 *
 * TypeBox schemas for the convert, analyze, upload and validate endpoints.
 */

import { Type, Static } from '@sinclair/typebox';

// ============================================================================
// Request Schemas
// ============================================================================

export const ConvertRequestSchema = Type.Object({
  yaml_content: Type.String({ description: 'GitLab CI YAML content' }),
  workflow_name: Type.Optional(Type.String({ description: 'Overrides the generated workflow name' })),
});

export type ConvertRequest = Static<typeof ConvertRequestSchema>;

export const PipelineContentSchema = Type.Object({
  yaml_content: Type.String({ description: 'GitLab CI YAML content' }),
});

export type PipelineContent = Static<typeof PipelineContentSchema>;

export const UploadRequestSchema = Type.Object({
  filename: Type.String({ description: 'Original file name, must end in .yml or .yaml' }),
  content: Type.String({ description: 'File content' }),
});

export type UploadRequest = Static<typeof UploadRequestSchema>;

// ============================================================================
// Graph Schemas
// ============================================================================

export const GraphNodeSchema = Type.Object({
  id: Type.String(),
  label: Type.String(),
  stage: Type.String(),
  type: Type.Union([Type.Literal('regular'), Type.Literal('manual'), Type.Literal('delayed')]),
  allowFailure: Type.Boolean(),
});

export const GraphEdgeSchema = Type.Object({
  source: Type.String(),
  target: Type.String(),
  type: Type.Union([Type.Literal('needs'), Type.Literal('artifact'), Type.Literal('depends_on')]),
});

export const GraphSchema = Type.Object({
  nodes: Type.Array(GraphNodeSchema),
  edges: Type.Array(GraphEdgeSchema),
  variables: Type.Record(Type.String(), Type.String()),
  secrets: Type.Array(Type.String()),
  stages: Type.Array(Type.String()),
});

export const GraphMetricsSchema = Type.Object({
  total_nodes: Type.Integer(),
  total_edges: Type.Integer(),
  total_stages: Type.Integer(),
  total_variables: Type.Integer(),
  total_secrets: Type.Integer(),
  cycles: Type.Integer(),
  critical_path_length: Type.Integer(),
  avg_job_dependencies: Type.Number(),
});

// ============================================================================
// Pipeline Summary Schemas
// ============================================================================

export const SecretSchema = Type.Object({
  name: Type.String(),
  type: Type.Union([Type.Literal('env'), Type.Literal('file'), Type.Literal('docker')]),
  description: Type.String(),
});

export const JobSummarySchema = Type.Object({
  name: Type.String(),
  stage: Type.String(),
  image: Type.Optional(Type.String()),
  allow_failure: Type.Boolean(),
  when: Type.String(),
  dependencies: Type.Array(Type.String()),
  needs: Type.Array(Type.String()),
});

export const VariableSummarySchema = Type.Object({
  name: Type.String(),
  value: Type.String(),
  protected: Type.Boolean(),
  masked: Type.Boolean(),
});

export const ExtractedVariableSchema = Type.Object({
  value: Type.String(),
  protected: Type.Boolean(),
  masked: Type.Boolean(),
  scope: Type.Union([Type.Literal('global'), Type.Literal('job')]),
});

// ============================================================================
// Response Schemas
// ============================================================================

export const ConvertResponseSchema = Type.Object({
  success: Type.Literal(true),
  github_workflow: Type.String({ description: 'GitHub Actions workflow YAML' }),
  gitlab_config: Type.Object({
    stages: Type.Array(Type.String()),
    jobs: Type.Array(JobSummarySchema),
    variables: Type.Array(VariableSummarySchema),
    secrets: Type.Array(SecretSchema),
  }),
});

export const AnalyzeResponseSchema = Type.Object({
  success: Type.Literal(true),
  graph: GraphSchema,
  metrics: GraphMetricsSchema,
  cycles: Type.Array(Type.Array(Type.String())),
  critical_path: Type.Array(Type.String()),
  job_references: Type.Record(Type.String(), Type.Array(Type.String())),
  variables: Type.Record(Type.String(), ExtractedVariableSchema),
  secrets: Type.Array(SecretSchema),
});

export const UploadResponseSchema = Type.Object({
  success: Type.Literal(true),
  filename: Type.String(),
  gitlab_config: Type.Object({
    stages: Type.Array(Type.String()),
    jobs_count: Type.Integer(),
    variables_count: Type.Integer(),
    secrets_count: Type.Integer(),
  }),
  graph: GraphSchema,
  github_workflow: Type.String(),
  metrics: GraphMetricsSchema,
});

export const ValidationWarningSchema = Type.Object({
  code: Type.Union([Type.Literal('UNKNOWN_STAGE'), Type.Literal('UNKNOWN_JOB_REFERENCE')]),
  message: Type.String(),
  job: Type.String(),
});

export const SourceLocationSchema = Type.Object({
  file: Type.String(),
  line: Type.Integer(),
  column: Type.Integer(),
});

export const ValidateResponseSchema = Type.Union([
  Type.Object({
    success: Type.Literal(true),
    valid: Type.Literal(true),
    message: Type.String(),
    warnings: Type.Array(ValidationWarningSchema),
  }),
  Type.Object({
    success: Type.Literal(true),
    valid: Type.Literal(false),
    error: Type.String(),
    location: Type.Union([SourceLocationSchema, Type.Null()]),
  }),
]);
