/**
 * GitLab CI to GitHub Actions Converter
 * @module converters/gitlab-to-github
 *
 * Maps a parsed pipeline onto an equivalent GitHub Actions workflow.
 * Each call to convert() produces an independent workflow.
 */

import {
  GitHubWorkflow,
  WorkflowJob,
  WorkflowStep,
  WorkflowTriggers,
} from '../types/github-workflow';
import { JobRule, PipelineJob, PipelineModel, RefFilter } from '../types/pipeline';
import { ConversionConfig, ConversionConfigSchema } from '../config/schema';
import { ConversionError } from '../errors/domain';
import { StructuredLogger, createModuleLogger } from '../logging/logger';
import { parseRetentionDays, parseTimeoutMinutes } from './durations';

// ============================================================================
// Mappings
// ============================================================================

/**
 * GitLab runner tags (and image name fragments) to GitHub hosted runners
 */
export const RUNNER_MAPPING: ReadonlyArray<readonly [string, string]> = [
  ['linux', 'ubuntu-latest'],
  ['linux-docker', 'ubuntu-latest'],
  ['windows', 'windows-latest'],
  ['macos', 'macos-latest'],
  ['docker', 'ubuntu-latest'],
];

interface LanguageSetup {
  readonly language: string;
  readonly defaultVersion: string;
}

/**
 * Image name fragment to setup action, first match wins
 */
export const IMAGE_SETUP_MAPPING: readonly LanguageSetup[] = [
  { language: 'python', defaultVersion: '3.11' },
  { language: 'node', defaultVersion: '18' },
  { language: 'ruby', defaultVersion: '3.2' },
  { language: 'go', defaultVersion: '1.21' },
  { language: 'java', defaultVersion: '17' },
];

const CONDITION_VARIABLES: ReadonlyArray<readonly [string, string]> = [
  ['$CI_COMMIT_BRANCH', 'github.ref_name'],
  ['$CI_COMMIT_REF_NAME', 'github.ref_name'],
  ['$CI_PIPELINE_SOURCE', 'github.event_name'],
  ['$CI_MERGE_REQUEST_IID', 'github.event.number'],
];

const CHECKOUT_ACTION = 'actions/checkout@v4';
const UPLOAD_ARTIFACT_ACTION = 'actions/upload-artifact@v4';
const MAX_JOB_ID_LENGTH = 250;

// ============================================================================
// Options
// ============================================================================

export interface ConvertOptions {
  /** Overrides the pipeline's workflow name */
  readonly workflowName?: string;
}

// ============================================================================
// Converter
// ============================================================================

export class GitLabToGitHubConverter {
  private readonly config: ConversionConfig;
  private readonly logger: StructuredLogger;

  constructor(config: Partial<ConversionConfig> = {}, logger?: StructuredLogger) {
    this.config = ConversionConfigSchema.parse(config);
    this.logger = logger ?? createModuleLogger('converter');
  }

  /**
   * Convert a pipeline into a workflow
   * @throws ConversionError when a job name yields no usable job id
   */
  convert(pipeline: PipelineModel, options: ConvertOptions = {}): GitHubWorkflow {
    const startTime = Date.now();
    const jobIds = assignJobIds(pipeline.jobs);

    const converted = new Map<string, WorkflowJob>();
    for (const job of pipeline.jobs) {
      const jobId = jobIds.get(job.name);
      if (jobId === undefined || converted.has(jobId)) {
        continue;
      }
      converted.set(jobId, this.convertJob(job, pipeline, jobIds));
    }
    // Job ids such as `constructor` or `__proto__` become own keys
    const jobs: Record<string, WorkflowJob> = Object.fromEntries(converted);

    const env = this.convertGlobalVariables(pipeline);
    const workflow: GitHubWorkflow = {
      name: options.workflowName ?? pipeline.workflow?.name ?? this.config.defaultWorkflowName,
      on: convertTriggers(pipeline.workflow?.rules ?? []),
      ...(Object.keys(env).length > 0 ? { env } : {}),
      jobs,
    };

    this.logger.conversionCompleted(workflow.name, Object.keys(jobs).length, Date.now() - startTime);
    return workflow;
  }

  // ============================================================================
  // Workflow Level
  // ============================================================================

  /**
   * Masked and protected variables stay out of the workflow file
   */
  private convertGlobalVariables(pipeline: PipelineModel): Record<string, string> {
    return Object.fromEntries(
      pipeline.variables
        .filter(variable => !variable.masked && !variable.protected)
        .map((variable): [string, string] => [variable.name, variable.value])
    );
  }

  // ============================================================================
  // Job Level
  // ============================================================================

  private convertJob(job: PipelineJob, pipeline: PipelineModel, jobIds: Map<string, string>): WorkflowJob {
    const image = job.image ?? pipeline.image;
    const references = job.needs.length > 0 ? job.needs : job.dependencies;
    const needs = [...new Set(references.map(name => jobIds.get(name) ?? sanitizeJobId(name)))];
    const env = Object.fromEntries(
      Object.entries(job.variables).map(([name, value]) => [name, String(value)])
    );
    const timeout = job.timeout ?? pipeline.timeout;
    const condition = convertJobCondition(job);

    return {
      name: job.name,
      'runs-on': this.determineRunner(job.tags, image),
      steps: this.convertSteps(job, pipeline, image),
      ...(needs.length > 0 ? { needs } : {}),
      ...(Object.keys(env).length > 0 ? { env } : {}),
      ...(timeout !== undefined
        ? { 'timeout-minutes': parseTimeoutMinutes(timeout, this.config.defaultTimeoutMinutes) }
        : {}),
      ...(condition !== undefined ? { if: condition } : {}),
      ...(image !== undefined ? { container: { image, options: this.config.containerOptions } } : {}),
    };
  }

  private determineRunner(tags: readonly string[], image: string | undefined): string {
    for (const tag of tags) {
      const match = RUNNER_MAPPING.find(([key]) => key === tag.toLowerCase());
      if (match) {
        return match[1];
      }
    }

    if (image !== undefined) {
      const imageName = image.toLowerCase();
      const match = RUNNER_MAPPING.find(([key]) => imageName.includes(key));
      if (match) {
        return match[1];
      }
    }

    return this.config.defaultRunner;
  }

  private convertSteps(job: PipelineJob, pipeline: PipelineModel, image: string | undefined): WorkflowStep[] {
    const steps: WorkflowStep[] = [{ name: 'Checkout repository', uses: CHECKOUT_ACTION }];

    const setup = image !== undefined ? languageSetupStep(image) : undefined;
    if (setup) {
      steps.push(setup);
    }

    const beforeScript = job.beforeScript.length > 0 ? job.beforeScript : pipeline.beforeScript;
    if (beforeScript.length > 0) {
      steps.push({ name: 'Run before_script', run: beforeScript.join('\n') });
    }

    if (job.script.length > 0) {
      steps.push({
        name: `Run ${job.name}`,
        run: job.script.join('\n'),
        ...(job.allowFailure ? { 'continue-on-error': true } : {}),
      });
    }

    const afterScript = job.afterScript.length > 0 ? job.afterScript : pipeline.afterScript;
    if (afterScript.length > 0) {
      steps.push({ name: 'Run after_script', run: afterScript.join('\n'), 'continue-on-error': true });
    }

    if (job.artifacts && job.artifacts.paths.length > 0) {
      steps.push({
        name: 'Upload artifacts',
        uses: UPLOAD_ARTIFACT_ACTION,
        with: {
          name: `${job.name}-artifacts`,
          path: job.artifacts.paths.join('\n'),
          'retention-days': parseRetentionDays(job.artifacts.expireIn, this.config.artifactRetentionDays),
        },
      });
    }

    return steps;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Replace characters GitHub rejects in job ids and cap the length
 */
export function sanitizeJobId(jobName: string): string {
  return jobName.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, MAX_JOB_ID_LENGTH);
}

/**
 * Job name to unique job id. Names that sanitize to an id already taken
 * get a numeric suffix.
 */
function assignJobIds(jobs: readonly PipelineJob[]): Map<string, string> {
  const ids = new Map<string, string>();
  const taken = new Set<string>();

  for (const job of jobs) {
    if (ids.has(job.name)) {
      continue;
    }

    const base = sanitizeJobId(job.name);
    if (base.length === 0) {
      throw new ConversionError('Job name cannot be converted to a workflow job id', job.name);
    }

    let id = base;
    for (let suffix = 2; taken.has(id); suffix++) {
      const tail = `_${suffix}`;
      id = base.slice(0, MAX_JOB_ID_LENGTH - tail.length) + tail;
    }

    ids.set(job.name, id);
    taken.add(id);
  }

  return ids;
}

export function convertTriggers(rules: readonly JobRule[]): WorkflowTriggers {
  if (rules.length === 0) {
    return {
      push: { branches: ['main', 'develop', '**'] },
      pull_request: { branches: ['main', 'develop'] },
    };
  }

  let triggers: WorkflowTriggers = {};
  for (const rule of rules) {
    switch (rule.if) {
      case '$CI_PIPELINE_SOURCE == "push"':
        triggers = { ...triggers, push: { branches: ['main', '**'] } };
        break;
      case '$CI_PIPELINE_SOURCE == "pull_request"':
      case '$CI_PIPELINE_SOURCE == "merge_request_event"':
        triggers = { ...triggers, pull_request: { branches: ['main'] } };
        break;
      case '$CI_PIPELINE_SOURCE == "schedule"':
        triggers = { ...triggers, schedule: [{ cron: '0 0 * * *' }] };
        break;
      default:
        break;
    }
  }

  return Object.keys(triggers).length > 0
    ? triggers
    : { push: { branches: ['main'] }, pull_request: {} };
}

/**
 * Rewrite a GitLab `if:` expression with GitHub context names
 */
export function convertCondition(condition: string): string {
  let result = condition;
  for (const [gitlabName, githubName] of CONDITION_VARIABLES) {
    result = result.split(gitlabName).join(githubName);
  }
  return result
    .replace(/merge_request_event|merge_request/g, 'pull_request')
    .replace(/"([^"]*)"/g, "'$1'");
}

function refCondition(filter: RefFilter | undefined): string | undefined {
  if (!filter || filter.refs.length === 0) {
    return undefined;
  }
  return filter.refs.map(ref => `github.ref_name == '${ref}'`).join(' || ');
}

/**
 * First rule with an `if`, else `only`, else `except`, else manual jobs
 * are disabled
 */
export function convertJobCondition(job: PipelineJob): string | undefined {
  const expression = job.rules.find(rule => rule.if !== undefined && rule.if.length > 0)?.if;
  if (expression !== undefined) {
    return convertCondition(expression);
  }

  const only = refCondition(job.only);
  if (only !== undefined) {
    return only;
  }

  const except = refCondition(job.except);
  if (except !== undefined) {
    return `!(${except})`;
  }

  return job.when === 'manual' ? 'false' : undefined;
}

function languageSetupStep(image: string): WorkflowStep | undefined {
  const imageName = image.toLowerCase();
  const setup = IMAGE_SETUP_MAPPING.find(candidate => imageName.includes(candidate.language));
  if (!setup) {
    return undefined;
  }

  const versions = image.match(/\d+\.\d+(?:\.\d+)?/g);
  const version = versions ? versions[versions.length - 1] : setup.defaultVersion;
  const { language } = setup;

  return {
    name: `Setup ${language.charAt(0).toUpperCase()}${language.slice(1)}`,
    uses: `actions/setup-${language}@v4`,
    with: { [`${language}-version`]: version },
  };
}
