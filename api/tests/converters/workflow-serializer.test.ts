/**
 * Workflow Serializer Tests
 * @module tests/converters/workflow-serializer
 */

import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { serializeWorkflow, workflowToDocument } from '@/converters/workflow-serializer';
import type { GitHubWorkflow } from '@/types/github-workflow';

function createWorkflow(overrides: Partial<GitHubWorkflow> = {}): GitHubWorkflow {
  return {
    name: 'CI',
    on: { push: { branches: ['main'] }, pull_request: {} },
    jobs: {
      build: {
        name: 'build',
        'runs-on': 'ubuntu-latest',
        steps: [
          { name: 'Checkout repository', uses: 'actions/checkout@v4' },
          { name: 'Run build', run: 'make' },
        ],
      },
    },
    ...overrides,
  };
}

describe('serializeWorkflow', () => {
  it('should render the workflow file', () => {
    expect(serializeWorkflow(createWorkflow())).toBe(
      [
        'name: CI',
        'on:',
        '  push:',
        '    branches:',
        '      - main',
        '  pull_request: {}',
        'jobs:',
        '  build:',
        '    name: build',
        '    runs-on: ubuntu-latest',
        '    steps:',
        '      - name: Checkout repository',
        '        uses: actions/checkout@v4',
        '      - name: Run build',
        '        run: make',
        '',
      ].join('\n')
    );
  });

  it('should keep multi-line scripts intact', () => {
    const yaml = serializeWorkflow(createWorkflow({
      jobs: {
        test: {
          name: 'test',
          'runs-on': 'ubuntu-latest',
          steps: [{ name: 'Run test', run: 'npm ci\nnpm test' }],
        },
      },
    }));

    expect(parse(yaml).jobs.test.steps[0].run).toBe('npm ci\nnpm test');
  });
});

describe('workflowToDocument', () => {
  it('should order job keys the way workflow files are written', () => {
    const document = workflowToDocument(createWorkflow({
      jobs: {
        deploy: {
          container: { image: 'alpine:3.19', options: '--cpus 1' },
          if: 'false',
          'timeout-minutes': 30,
          env: { TARGET: 'prod' },
          needs: ['build'],
          steps: [{ 'continue-on-error': true, run: 'deploy.sh', name: 'Run deploy' }],
          'runs-on': 'ubuntu-latest',
          name: 'deploy',
        },
      },
    }));

    expect(document.jobs).toEqual({
      deploy: {
        name: 'deploy',
        'runs-on': 'ubuntu-latest',
        steps: [{ name: 'Run deploy', run: 'deploy.sh', 'continue-on-error': true }],
        needs: ['build'],
        env: { TARGET: 'prod' },
        'timeout-minutes': 30,
        if: 'false',
        container: { image: 'alpine:3.19', options: '--cpus 1' },
      },
    });
    const jobs = parse(serializeWorkflow(createWorkflow({ jobs: { deploy: {
      container: { image: 'alpine:3.19' },
      needs: ['build'],
      steps: [],
      'runs-on': 'ubuntu-latest',
      name: 'deploy',
    } } }))).jobs;
    expect(Object.keys(jobs.deploy)).toEqual(['name', 'runs-on', 'needs', 'container']);
  });

  it('should drop empty optional sections', () => {
    const document = workflowToDocument(createWorkflow({
      env: {},
      jobs: {
        lint: {
          name: 'lint',
          'runs-on': 'ubuntu-latest',
          needs: [],
          env: {},
          steps: [{ name: 'Run lint', run: 'eslint .', 'continue-on-error': false }],
        },
      },
    }));

    expect(Object.keys(document)).toEqual(['name', 'on', 'jobs']);
    expect(document.jobs).toEqual({
      lint: {
        name: 'lint',
        'runs-on': 'ubuntu-latest',
        steps: [{ name: 'Run lint', run: 'eslint .' }],
      },
    });
  });

  it('should place workflow env between triggers and jobs', () => {
    const document = workflowToDocument(createWorkflow({ env: { REGION: 'eu-west-1' } }));

    expect(Object.keys(document)).toEqual(['name', 'on', 'env', 'jobs']);
    expect(document.env).toEqual({ REGION: 'eu-west-1' });
  });

  it('should keep empty trigger filters', () => {
    expect(workflowToDocument(createWorkflow()).on).toEqual({
      push: { branches: ['main'] },
      pull_request: {},
    });
  });
});
