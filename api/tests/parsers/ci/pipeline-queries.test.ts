/**
 * Pipeline Query Tests
 * @module tests/parsers/ci/pipeline-queries.test
 */

import { describe, it, expect } from 'vitest';
import { extractSecrets, extractVariables, getJobReferences } from '@/parsers/ci/pipeline-queries';
import { createJob, createPipeline, createVariable } from '../../factories/pipeline.factory';

describe('getJobReferences', () => {
  it('should list dependencies then needs without repeats', () => {
    const references = getJobReferences(createPipeline({
      jobs: [
        createJob('build'),
        createJob('package', { dependencies: ['build', 'assets'], needs: ['assets', 'lint'] }),
      ],
    }));

    expect(references).toEqual({
      build: [],
      package: ['build', 'assets', 'lint'],
    });
  });
});

describe('extractVariables', () => {
  it('should let global variables shadow job variables', () => {
    const variables = extractVariables(createPipeline({
      variables: [createVariable('REGION', 'eu-west-1', { protected: true })],
      jobs: [
        createJob('deploy', { variables: { REGION: 'us-east-1', REPLICAS: 2 } }),
        createJob('smoke', { variables: { REPLICAS: 1 } }),
      ],
    }));

    expect(variables).toEqual({
      REGION: { value: 'eu-west-1', protected: true, masked: false, scope: 'global' },
      REPLICAS: { value: '2', protected: false, masked: false, scope: 'job' },
    });
  });
});

describe('extractSecrets', () => {
  it('should return copies of the pipeline secrets', () => {
    const secret = { name: 'DEPLOY_TOKEN', type: 'env' as const, description: 'Masked variable' };
    const secrets = extractSecrets(createPipeline({ secrets: [secret] }));

    expect(secrets).toEqual([secret]);
    expect(secrets[0]).not.toBe(secret);
  });
});
