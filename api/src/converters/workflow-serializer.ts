/**
 * Workflow Serializer
 * @module converters/workflow-serializer
 *
 * Renders a workflow as GitHub Actions YAML with the conventional key order.
 * Empty optional sections are left out.
 */

import { stringify } from 'yaml';
import { GitHubWorkflow, WorkflowJob, WorkflowStep } from '../types/github-workflow';
import { ConversionError } from '../errors/domain';
import { ConversionErrorCodes } from '../errors/codes';
import { getErrorMessage } from '../errors/base';

type YamlMapping = Record<string, unknown>;

const TRIGGER_KEYS = ['push', 'pull_request', 'schedule'] as const;
const JOB_KEYS = ['name', 'runs-on', 'steps', 'needs', 'env', 'timeout-minutes', 'if', 'container'] as const;
const STEP_KEYS = ['name', 'uses', 'with', 'run', 'env', 'if', 'continue-on-error'] as const;

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === 'object' && Object.keys(value).length === 0;
}

/**
 * Copy the listed keys in order, dropping empty values
 */
function pick(source: object, keys: readonly string[]): YamlMapping {
  const entries = new Map<string, unknown>(Object.entries(source));
  const result: YamlMapping = {};
  for (const key of keys) {
    const value = entries.get(key);
    if (!isEmpty(value)) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Triggers keep empty filters: `pull_request: {}` means every pull request
 */
function triggersToYaml(workflow: GitHubWorkflow): YamlMapping {
  const entries = new Map<string, unknown>(Object.entries(workflow.on));
  const result: YamlMapping = {};
  for (const key of TRIGGER_KEYS) {
    const value = entries.get(key);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function stepToYaml(step: WorkflowStep): YamlMapping {
  return pick(step, STEP_KEYS);
}

function jobToYaml(job: WorkflowJob): YamlMapping {
  return pick({ ...job, steps: job.steps.map(stepToYaml) }, JOB_KEYS);
}

/**
 * Plain object in workflow file layout
 */
export function workflowToDocument(workflow: GitHubWorkflow): YamlMapping {
  const jobs: YamlMapping = Object.fromEntries(
    Object.entries(workflow.jobs).map(([jobId, job]): [string, YamlMapping] => [jobId, jobToYaml(job)])
  );

  const document: YamlMapping = { name: workflow.name, on: triggersToYaml(workflow) };
  if (workflow.env && Object.keys(workflow.env).length > 0) {
    document.env = workflow.env;
  }
  document.jobs = jobs;
  return document;
}

/**
 * Serialize a workflow to YAML
 * @throws ConversionError (SERIALIZATION_ERROR) if the document cannot be rendered
 */
export function serializeWorkflow(workflow: GitHubWorkflow): string {
  try {
    return stringify(workflowToDocument(workflow), { lineWidth: 0 });
  } catch (error) {
    throw new ConversionError(
      `Failed to serialize workflow: ${getErrorMessage(error)}`,
      undefined,
      ConversionErrorCodes.SERIALIZATION_ERROR,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}
