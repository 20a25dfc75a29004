/**
 * Pipeline Model Queries
 * @module parsers/ci/pipeline-queries
 *
 * Pure lookups over a parsed pipeline, used by the analysis endpoint.
 */

import type { ExtractedVariable, PipelineModel, PipelineSecret } from '../../types/pipeline';

/**
 * Jobs each job refers to, artifact dependencies first, without repeats
 */
export function getJobReferences(pipeline: PipelineModel): Record<string, string[]> {
  const references: Record<string, string[]> = {};
  for (const job of pipeline.jobs) {
    references[job.name] = [...new Set([...job.dependencies, ...job.needs])];
  }
  return references;
}

/**
 * Global and job-level variables by name. A global definition shadows any
 * job-level one, and the first job to define a name wins among jobs.
 */
export function extractVariables(pipeline: PipelineModel): Record<string, ExtractedVariable> {
  const variables: Record<string, ExtractedVariable> = {};

  for (const variable of pipeline.variables) {
    variables[variable.name] = {
      value: variable.value,
      protected: variable.protected,
      masked: variable.masked,
      scope: 'global',
    };
  }

  for (const job of pipeline.jobs) {
    for (const [name, value] of Object.entries(job.variables)) {
      if (!(name in variables)) {
        variables[name] = { value: String(value), protected: false, masked: false, scope: 'job' };
      }
    }
  }

  return variables;
}

export function extractSecrets(pipeline: PipelineModel): PipelineSecret[] {
  return pipeline.secrets.map(secret => ({ ...secret }));
}
