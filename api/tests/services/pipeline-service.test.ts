/**
 * Pipeline Service Tests
 * @module tests/services/pipeline-service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { parse } from 'yaml';
import { PipelineService, sanitizeFilename } from '@/services/pipeline-service';
import { BadRequestError } from '@/errors/api-errors';
import { ConversionError, FileProcessingError, YAMLParseError } from '@/errors/domain';
import { CYCLIC_PIPELINE, INVALID_YAML, SAMPLE_PIPELINE } from '../fixtures/pipelines';

const SAMPLE_METRICS = {
  total_nodes: 3,
  total_edges: 2,
  total_stages: 3,
  total_variables: 3,
  total_secrets: 1,
  cycles: 0,
  critical_path_length: 3,
  avg_job_dependencies: 2 / 3,
};

describe('PipelineService', () => {
  let service: PipelineService;

  beforeEach(() => {
    service = new PipelineService();
  });

  // ==========================================================================
  // convert
  // ==========================================================================

  describe('convert', () => {
    it('should summarize the GitLab pipeline', () => {
      const result = service.convert(SAMPLE_PIPELINE);

      expect(result.success).toBe(true);
      expect(result.gitlab_config).toEqual({
        stages: ['build', 'test', 'deploy'],
        jobs: [
          {
            name: 'build',
            stage: 'build',
            image: 'node:18',
            allow_failure: false,
            when: 'on_success',
            dependencies: [],
            needs: [],
          },
          {
            name: 'test',
            stage: 'test',
            allow_failure: false,
            when: 'on_success',
            dependencies: [],
            needs: ['build'],
          },
          {
            name: 'deploy',
            stage: 'deploy',
            allow_failure: false,
            when: 'manual',
            dependencies: [],
            needs: [],
          },
        ],
        variables: [
          { name: 'APP_ENV', value: 'staging', protected: false, masked: false },
          { name: 'DEPLOY_TOKEN', value: 'test-secret', protected: false, masked: true },
        ],
        secrets: [{ name: 'DEPLOY_TOKEN', type: 'env', description: 'Masked variable' }],
      });
    });

    it('should return the workflow as YAML', () => {
      const workflow = parse(service.convert(SAMPLE_PIPELINE).github_workflow);

      expect(workflow.name).toBe('CI/CD Pipeline');
      expect(workflow.env).toEqual({ APP_ENV: 'staging' });
      expect(Object.keys(workflow.jobs)).toEqual(['build', 'test', 'deploy']);
      expect(workflow.jobs.test.needs).toEqual(['build']);
      expect(workflow.jobs.deploy.if).toBe('false');
      expect(workflow.jobs.deploy.env).toEqual({ REPLICAS: '2' });
    });

    it('should apply the workflow name override', () => {
      const workflow = parse(service.convert(SAMPLE_PIPELINE, 'Release').github_workflow);

      expect(workflow.name).toBe('Release');
    });

    it('should apply conversion settings', () => {
      const configured = new PipelineService({ conversion: { defaultRunner: 'self-hosted' } });
      const workflow = parse(configured.convert(SAMPLE_PIPELINE).github_workflow);

      expect(workflow.jobs.test['runs-on']).toBe('self-hosted');
    });

    it('should convert jobs named like object members', () => {
      const result = service.convert('constructor:\n  script: make\ntoString:\n  script: make\ncompile:\n  script: make\n');

      expect(result.gitlab_config.jobs.map(job => job.name)).toEqual(['constructor', 'toString', 'compile']);
      expect(Object.keys(parse(result.github_workflow).jobs)).toEqual(['constructor', 'toString', 'compile']);
    });

    it('should surface parse errors', () => {
      expect(() => service.convert(INVALID_YAML)).toThrow(YAMLParseError);
    });

    it('should surface conversion errors', () => {
      expect(() => service.convert('"":\n  script: echo\n')).toThrow(ConversionError);
    });
  });

  // ==========================================================================
  // analyze
  // ==========================================================================

  describe('analyze', () => {
    it('should return the graph and its analysis', () => {
      const result = service.analyze(SAMPLE_PIPELINE);

      expect(result.graph).toEqual({
        nodes: [
          { id: 'build', label: 'build', stage: 'build', type: 'regular', allowFailure: false },
          { id: 'test', label: 'test', stage: 'test', type: 'regular', allowFailure: false },
          { id: 'deploy', label: 'deploy', stage: 'deploy', type: 'manual', allowFailure: false },
        ],
        edges: [
          { source: 'build', target: 'test', type: 'needs' },
          { source: 'test', target: 'deploy', type: 'depends_on' },
        ],
        variables: { APP_ENV: 'staging', DEPLOY_TOKEN: 'test-secret', REPLICAS: '2' },
        secrets: ['DEPLOY_TOKEN'],
        stages: ['build', 'test', 'deploy'],
      });
      expect(result.metrics).toEqual(SAMPLE_METRICS);
      expect(result.cycles).toEqual([]);
      expect(result.critical_path).toEqual(['build', 'test', 'deploy']);
    });

    it('should include job references, variables and secrets', () => {
      const result = service.analyze(SAMPLE_PIPELINE);

      expect(result.job_references).toEqual({ build: [], test: ['build'], deploy: [] });
      expect(result.variables).toEqual({
        APP_ENV: { value: 'staging', protected: false, masked: false, scope: 'global' },
        DEPLOY_TOKEN: { value: 'test-secret', protected: false, masked: true, scope: 'global' },
        REPLICAS: { value: '2', protected: false, masked: false, scope: 'job' },
      });
      expect(result.secrets).toEqual([
        { name: 'DEPLOY_TOKEN', type: 'env', description: 'Masked variable' },
      ]);
    });

    it('should report cycles without a critical path', () => {
      const result = service.analyze(CYCLIC_PIPELINE);

      expect(result.cycles).toEqual([['a', 'b', 'a']]);
      expect(result.critical_path).toEqual([]);
      expect(result.metrics.cycles).toBe(1);
    });

    it('should analyze an empty pipeline', () => {
      const result = service.analyze('');

      expect(result.graph.nodes).toEqual([]);
      expect(result.metrics.avg_job_dependencies).toBe(0);
      expect(result.critical_path).toEqual([]);
    });
  });

  // ==========================================================================
  // validate
  // ==========================================================================

  describe('validate', () => {
    it('should accept a valid pipeline', () => {
      expect(service.validate(SAMPLE_PIPELINE)).toEqual({
        success: true,
        valid: true,
        message: 'YAML is valid',
        warnings: [],
      });
    });

    it('should report invalid YAML', () => {
      const result = service.validate(INVALID_YAML);

      expect(result.success).toBe(true);
      expect(result.valid).toBe(false);
    });
  });

  // ==========================================================================
  // uploadFile
  // ==========================================================================

  describe('uploadFile', () => {
    it('should analyze and convert the uploaded file', () => {
      const result = service.uploadFile('../ci/my pipeline.yml', SAMPLE_PIPELINE);

      expect(result.filename).toBe('ci_my_pipeline.yml');
      expect(result.gitlab_config).toEqual({
        stages: ['build', 'test', 'deploy'],
        jobs_count: 3,
        variables_count: 2,
        secrets_count: 1,
      });
      expect(result.metrics).toEqual(SAMPLE_METRICS);
      expect(result.graph.edges).toHaveLength(2);
      expect(Object.keys(parse(result.github_workflow).jobs)).toEqual(['build', 'test', 'deploy']);
    });

    it('should accept extensions in any case', () => {
      expect(service.uploadFile('.GITLAB-CI.YML', SAMPLE_PIPELINE).filename).toBe('GITLAB-CI.YML');
    });

    it('should require a filename', () => {
      expect(() => service.uploadFile('  ', SAMPLE_PIPELINE)).toThrow(BadRequestError);
      expect(() => service.uploadFile('', SAMPLE_PIPELINE)).toThrow('No file selected');
    });

    it('should reject other file types', () => {
      let caught: unknown;
      try {
        service.uploadFile('pipeline.txt', SAMPLE_PIPELINE);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FileProcessingError);
      if (caught instanceof FileProcessingError) {
        expect(caught.code).toBe('UNSUPPORTED_FILE_TYPE');
        expect(caught.message).toBe('Only .yml and .yaml files allowed');
        expect(caught.filePath).toBe('pipeline.txt');
      }
    });

    it('should reject files over the size limit', () => {
      const limited = new PipelineService({ upload: { allowedExtensions: ['.yml'], maxFileSize: 10 } });

      let caught: unknown;
      try {
        limited.uploadFile('ci.yml', 'stages: [build]');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FileProcessingError);
      if (caught instanceof FileProcessingError) {
        expect(caught.code).toBe('FILE_TOO_LARGE');
        expect(caught.statusCode).toBe(413);
        expect(caught.message).toBe('File size 15 exceeds maximum 10 bytes');
      }
    });

    it('should report YAML errors against the uploaded filename', () => {
      let caught: unknown;
      try {
        service.uploadFile('broken.yml', INVALID_YAML);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(YAMLParseError);
      if (caught instanceof YAMLParseError) {
        expect(caught.location?.file).toBe('broken.yml');
      }
    });
  });
});

describe('sanitizeFilename', () => {
  it('should reduce a path to safe characters', () => {
    expect(sanitizeFilename('../ci/my pipeline.yml')).toBe('ci_my_pipeline.yml');
    expect(sanitizeFilename('my\\file .yaml')).toBe('my_file_.yaml');
  });

  it('should strip accents and other characters', () => {
    expect(sanitizeFilename('résumé (1).yml')).toBe('resume_1.yml');
  });

  it('should return an empty name when nothing is left', () => {
    expect(sanitizeFilename('...')).toBe('');
  });
});
