/**
 * Pipeline Test Factories
 * @module tests/factories/pipeline
 *
 * Factory functions for building pipeline models without going through YAML.
 */

import type { PipelineJob, PipelineModel, PipelineVariable } from '@/types/pipeline';
import { createEmptyPipeline } from '@/types/pipeline';

// ============================================================================
// Job Factories
// ============================================================================

export function createJob(name: string, overrides: Partial<PipelineJob> = {}): PipelineJob {
  return {
    name,
    stage: 'test',
    script: [`echo ${name}`],
    beforeScript: [],
    afterScript: [],
    dependencies: [],
    needs: [],
    variables: {},
    tags: [],
    allowFailure: false,
    when: 'on_success',
    rules: [],
    ...overrides,
  };
}

export function createVariable(
  name: string,
  value: string,
  overrides: Partial<PipelineVariable> = {}
): PipelineVariable {
  return {
    name,
    value,
    protected: false,
    masked: false,
    expand: true,
    ...overrides,
  };
}

// ============================================================================
// Pipeline Factories
// ============================================================================

export function createPipeline(overrides: Partial<PipelineModel> = {}): PipelineModel {
  return {
    ...createEmptyPipeline(),
    ...overrides,
  };
}

/**
 * build -> test -> deploy, one job per stage, ordered by stage only
 */
export function createLinearPipeline(): PipelineModel {
  return createPipeline({
    stages: ['build', 'test', 'deploy'],
    jobs: [
      createJob('build', { stage: 'build' }),
      createJob('test', { stage: 'test' }),
      createJob('deploy', { stage: 'deploy' }),
    ],
  });
}

/**
 * Two jobs needing each other plus a third job needing one of them
 */
export function createCyclicPipeline(): PipelineModel {
  return createPipeline({
    stages: ['build'],
    jobs: [
      createJob('a', { stage: 'build', needs: ['b'] }),
      createJob('b', { stage: 'build', needs: ['a'] }),
      createJob('c', { stage: 'build', needs: ['a'] }),
    ],
  });
}
