/**
 * GitLab to GitHub Converter Tests
 * @module tests/converters/gitlab-to-github
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  GitLabToGitHubConverter,
  convertCondition,
  convertJobCondition,
  convertTriggers,
  sanitizeJobId,
} from '@/converters/gitlab-to-github';
import { ConversionError } from '@/errors/domain';
import {
  createJob,
  createLinearPipeline,
  createPipeline,
  createVariable,
} from '../factories/pipeline.factory';

describe('GitLabToGitHubConverter', () => {
  let converter: GitLabToGitHubConverter;

  beforeEach(() => {
    converter = new GitLabToGitHubConverter();
  });

  describe('workflow', () => {
    it('should use the default name and triggers', () => {
      const workflow = converter.convert(createLinearPipeline());

      expect(workflow.name).toBe('CI/CD Pipeline');
      expect(workflow.on).toEqual({
        push: { branches: ['main', 'develop', '**'] },
        pull_request: { branches: ['main', 'develop'] },
      });
      expect(workflow.env).toBeUndefined();
      expect(Object.keys(workflow.jobs)).toEqual(['build', 'test', 'deploy']);
    });

    it('should prefer an explicit name over the pipeline workflow name', () => {
      const pipeline = createPipeline({ workflow: { name: 'Release', rules: [] } });

      expect(converter.convert(pipeline).name).toBe('Release');
      expect(converter.convert(pipeline, { workflowName: 'Nightly' }).name).toBe('Nightly');
    });

    it('should take the default name from the configuration', () => {
      const configured = new GitLabToGitHubConverter({ defaultWorkflowName: 'Build' });

      expect(configured.convert(createPipeline()).name).toBe('Build');
    });

    it('should keep masked and protected variables out of the workflow env', () => {
      const workflow = converter.convert(createPipeline({
        variables: [
          createVariable('REGION', 'eu-west-1'),
          createVariable('DEPLOY_TOKEN', 'test-secret', { masked: true }),
          createVariable('DB_PASSWORD', 'placeholder', { protected: true }),
        ],
      }));

      expect(workflow.env).toEqual({ REGION: 'eu-west-1' });
    });

    it('should not order jobs by stage', () => {
      const workflow = converter.convert(createPipeline({
        stages: ['build', 'test'],
        jobs: [createJob('unit', { stage: 'test' }), createJob('compile', { stage: 'build' })],
      }));

      expect(Object.keys(workflow.jobs)).toEqual(['unit', 'compile']);
    });
  });

  describe('jobs', () => {
    it('should keep jobs named like object members', () => {
      const workflow = converter.convert(createPipeline({
        stages: ['test'],
        jobs: [createJob('constructor'), createJob('toString'), createJob('__proto__'), createJob('compile')],
      }));

      expect(Object.keys(workflow.jobs)).toEqual(['constructor', 'toString', '__proto__', 'compile']);
      expect(Object.getPrototypeOf(workflow.jobs)).toBe(Object.prototype);
    });

    it('should convert a job with image, setup, scripts and artifacts', () => {
      const workflow = converter.convert(createPipeline({
        stages: ['build'],
        image: 'node:18-alpine',
        beforeScript: ['npm ci'],
        jobs: [
          createJob('build', {
            stage: 'build',
            script: ['npm run build'],
            artifacts: { paths: ['dist/'], expireIn: '1 week' },
          }),
        ],
      }));

      expect(workflow.jobs.build).toEqual({
        name: 'build',
        'runs-on': 'ubuntu-latest',
        steps: [
          { name: 'Checkout repository', uses: 'actions/checkout@v4' },
          { name: 'Setup Node', uses: 'actions/setup-node@v4', with: { 'node-version': '18' } },
          { name: 'Run before_script', run: 'npm ci' },
          { name: 'Run build', run: 'npm run build' },
          {
            name: 'Upload artifacts',
            uses: 'actions/upload-artifact@v4',
            with: { name: 'build-artifacts', path: 'dist/', 'retention-days': 7 },
          },
        ],
        container: { image: 'node:18-alpine', options: '--cpus 1 --memory 2gb' },
      });
    });

    it('should prefer job scripts over pipeline defaults', () => {
      const workflow = converter.convert(createPipeline({
        beforeScript: ['echo global'],
        afterScript: ['echo cleanup'],
        jobs: [
          createJob('unit', {
            script: ['npm test', 'npm run coverage'],
            beforeScript: ['echo job'],
            allowFailure: true,
          }),
        ],
      }));

      expect(workflow.jobs.unit.steps).toEqual([
        { name: 'Checkout repository', uses: 'actions/checkout@v4' },
        { name: 'Run before_script', run: 'echo job' },
        { name: 'Run unit', run: 'npm test\nnpm run coverage', 'continue-on-error': true },
        { name: 'Run after_script', run: 'echo cleanup', 'continue-on-error': true },
      ]);
    });

    it('should pick the setup action and version from the image', () => {
      const workflow = converter.convert(createPipeline({
        jobs: [
          createJob('py', { image: 'python:3.11-slim' }),
          createJob('gopher', { image: 'golang:1.21.5' }),
          createJob('gem', { image: 'ruby' }),
          createJob('dotnet', { image: 'mcr.microsoft.com/dotnet/sdk:8.0' }),
        ],
      }));

      expect(workflow.jobs.py.steps[1]).toEqual({
        name: 'Setup Python',
        uses: 'actions/setup-python@v4',
        with: { 'python-version': '3.11' },
      });
      expect(workflow.jobs.gopher.steps[1]).toEqual({
        name: 'Setup Go',
        uses: 'actions/setup-go@v4',
        with: { 'go-version': '1.21.5' },
      });
      expect(workflow.jobs.gem.steps[1]).toEqual({
        name: 'Setup Ruby',
        uses: 'actions/setup-ruby@v4',
        with: { 'ruby-version': '3.2' },
      });
      expect(workflow.jobs.dotnet.steps.map(step => step.name)).toEqual([
        'Checkout repository',
        'Run dotnet',
      ]);
    });

    it('should choose the runner from tags, then image, then the default', () => {
      const configured = new GitLabToGitHubConverter({ defaultRunner: 'self-hosted' });
      const workflow = configured.convert(createPipeline({
        jobs: [
          createJob('win', { tags: ['gpu', 'Windows'] }),
          createJob('mac', { tags: ['gpu'], image: 'macos-xcode:15' }),
          createJob('other', { tags: ['gpu'] }),
        ],
      }));

      expect(workflow.jobs.win['runs-on']).toBe('windows-latest');
      expect(workflow.jobs.mac['runs-on']).toBe('macos-latest');
      expect(workflow.jobs.other['runs-on']).toBe('self-hosted');
    });

    it('should map needs to job ids, falling back to dependencies', () => {
      const workflow = converter.convert(createPipeline({
        jobs: [
          createJob('build app'),
          createJob('test', { needs: ['build app', 'ghost job', 'build app'] }),
          createJob('deploy', { dependencies: ['test'] }),
          createJob('report', { needs: ['test'], dependencies: ['deploy'] }),
        ],
      }));

      expect(workflow.jobs.build_app.needs).toBeUndefined();
      expect(workflow.jobs.test.needs).toEqual(['build_app', 'ghost_job']);
      expect(workflow.jobs.deploy.needs).toEqual(['test']);
      expect(workflow.jobs.report.needs).toEqual(['test']);
    });

    it('should stringify job variables', () => {
      const workflow = converter.convert(createPipeline({
        jobs: [createJob('deploy', { variables: { REPLICAS: 2, DEBUG: true, TARGET: 'prod' } })],
      }));

      expect(workflow.jobs.deploy.env).toEqual({ REPLICAS: '2', DEBUG: 'true', TARGET: 'prod' });
    });

    it('should convert timeouts to minutes with the pipeline timeout as fallback', () => {
      const workflow = converter.convert(createPipeline({
        timeout: '2h',
        jobs: [
          createJob('long', { timeout: '1h 30m' }),
          createJob('inherits'),
          createJob('unreadable', { timeout: 'soon' }),
        ],
      }));

      expect(workflow.jobs.long['timeout-minutes']).toBe(90);
      expect(workflow.jobs.inherits['timeout-minutes']).toBe(120);
      expect(workflow.jobs.unreadable['timeout-minutes']).toBe(360);
    });

    it('should leave out the timeout when none is set', () => {
      const workflow = converter.convert(createPipeline({ jobs: [createJob('quick')] }));

      expect(workflow.jobs.quick['timeout-minutes']).toBeUndefined();
    });

    it('should give colliding job ids a numeric suffix', () => {
      const workflow = converter.convert(createPipeline({
        jobs: [createJob('a b'), createJob('a_b'), createJob('a.b')],
      }));

      expect(Object.keys(workflow.jobs)).toEqual(['a_b', 'a_b_2', 'a_b_3']);
      expect(workflow.jobs.a_b_2.name).toBe('a_b');
    });

    it('should reject a job name with no usable id', () => {
      expect(() => converter.convert(createPipeline({ jobs: [createJob('')] }))).toThrow(ConversionError);
    });

    it('should produce independent workflows on each call', () => {
      const pipeline = createLinearPipeline();

      const first = converter.convert(pipeline);
      const second = converter.convert(pipeline);

      expect(second).toEqual(first);
      expect(second.jobs).not.toBe(first.jobs);
    });
  });
});

describe('sanitizeJobId', () => {
  it('should replace characters outside letters, digits, dash and underscore', () => {
    expect(sanitizeJobId('deploy: prod/eu')).toBe('deploy__prod_eu');
    expect(sanitizeJobId('unit-tests_1')).toBe('unit-tests_1');
  });

  it('should cap ids at 250 characters', () => {
    expect(sanitizeJobId('x'.repeat(300))).toHaveLength(250);
  });
});

describe('convertTriggers', () => {
  it('should map pipeline sources to events', () => {
    expect(convertTriggers([
      { if: '$CI_PIPELINE_SOURCE == "push"' },
      { if: '$CI_PIPELINE_SOURCE == "schedule"' },
    ])).toEqual({
      push: { branches: ['main', '**'] },
      schedule: [{ cron: '0 0 * * *' }],
    });
  });

  it('should treat merge request events as pull requests', () => {
    expect(convertTriggers([{ if: '$CI_PIPELINE_SOURCE == "merge_request_event"' }])).toEqual({
      pull_request: { branches: ['main'] },
    });
  });

  it('should fall back to push on main and every pull request', () => {
    expect(convertTriggers([{ if: '$CI_COMMIT_TAG', when: 'always' }])).toEqual({
      push: { branches: ['main'] },
      pull_request: {},
    });
  });
});

describe('convertCondition', () => {
  it('should rewrite GitLab variables and quotes', () => {
    expect(convertCondition('$CI_COMMIT_BRANCH == "main"')).toBe("github.ref_name == 'main'");
    expect(convertCondition('$CI_PIPELINE_SOURCE == "merge_request_event"')).toBe(
      "github.event_name == 'pull_request'"
    );
    expect(convertCondition('$CI_MERGE_REQUEST_IID')).toBe('github.event.number');
  });
});

describe('convertJobCondition', () => {
  it('should use the first rule with an expression', () => {
    const job = createJob('deploy', {
      rules: [{ when: 'never' }, { if: '$CI_COMMIT_REF_NAME == "main"' }],
      only: { refs: ['develop'] },
    });

    expect(convertJobCondition(job)).toBe("github.ref_name == 'main'");
  });

  it('should build conditions from only and except refs', () => {
    expect(convertJobCondition(createJob('a', { only: { refs: ['main', 'develop'] } }))).toBe(
      "github.ref_name == 'main' || github.ref_name == 'develop'"
    );
    expect(convertJobCondition(createJob('b', { except: { refs: ['main'] } }))).toBe(
      "!(github.ref_name == 'main')"
    );
  });

  it('should disable manual jobs without other conditions', () => {
    expect(convertJobCondition(createJob('release', { when: 'manual' }))).toBe('false');
    expect(convertJobCondition(createJob('unit'))).toBeUndefined();
  });
});
