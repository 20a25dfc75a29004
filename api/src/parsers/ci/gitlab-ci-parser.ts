/**
 * GitLab CI Parser
 * @module parsers/ci/gitlab-ci-parser
 *
 * Parses GitLab CI/CD configuration files (.gitlab-ci.yml) into a
 * PipelineModel. Includes are recorded, never fetched or merged.
 */

import * as yaml from 'yaml';
import {
  ArtifactsConfig,
  JobRule,
  PipelineJob,
  PipelineModel,
  PipelineSecret,
  PipelineVariable,
  RawSection,
  RefFilter,
  VariableValue,
  WorkflowConfig,
  createEmptyPipeline,
} from '../../types/pipeline';
import { ParseError, YAMLParseError, InvalidPipelineError } from '../../errors/domain';
import { SourceLocation, getErrorMessage } from '../../errors/base';
import { StructuredLogger, createModuleLogger } from '../../logging/logger';
import {
  DEFAULT_JOB_STAGE,
  DEFAULT_JOB_WHEN,
  GITLAB_BUILTIN_STAGES,
  GITLAB_DEFAULT_STAGES,
  GITLAB_RESERVED_KEYWORDS,
  GitLabCIParserOptions,
  INCLUDE_TARGET_KEYS,
  RawRecord,
  ValidationResult,
  ValidationWarning,
  isRecord,
  isScalar,
  toName,
  toStringList,
  toText,
} from './types';

const DEFAULT_FILE_PATH = '.gitlab-ci.yml';

export class GitLabCIParser {
  readonly name = 'gitlab-ci-parser';
  readonly supportedExtensions = ['.yml', '.yaml'] as const;

  private readonly filePath: string;
  private readonly logger: StructuredLogger;

  constructor(options: GitLabCIParserOptions = {}, logger?: StructuredLogger) {
    this.filePath = options.filePath ?? DEFAULT_FILE_PATH;
    this.logger = logger ?? createModuleLogger(this.name);
  }

  /**
   * Parse GitLab CI YAML content.
   * An empty document yields an empty pipeline.
   *
   * @throws YAMLParseError when the content is not valid YAML
   * @throws InvalidPipelineError when the document root is not a mapping
   */
  parse(content: string): PipelineModel {
    const startTime = Date.now();

    let raw: RawRecord | null;
    try {
      raw = this.readDocument(content);
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.parserFailed(this.name, error);
      }
      throw error;
    }

    const pipeline = raw === null ? createEmptyPipeline() : this.buildPipeline(raw);
    this.logger.pipelineParsed(pipeline.jobs.length, pipeline.stages.length, Date.now() - startTime);
    return pipeline;
  }

  /**
   * Validate GitLab CI YAML content without throwing on bad input.
   * Dangling references are reported as warnings, never as errors.
   */
  validate(content: string): ValidationResult {
    let pipeline: PipelineModel;
    try {
      pipeline = this.parse(content);
    } catch (error) {
      if (error instanceof ParseError) {
        return { valid: false, error: error.message, location: error.location };
      }
      throw error;
    }

    return {
      valid: true,
      message: 'YAML is valid',
      warnings: collectWarnings(pipeline),
      pipeline,
    };
  }

  // ============================================================================
  // Document Reading
  // ============================================================================

  private readDocument(content: string): RawRecord | null {
    // Later duplicate keys win; `<<` merge keys are expanded
    const doc = yaml.parseDocument(content, { uniqueKeys: false, merge: true });

    if (doc.errors.length > 0) {
      const [first] = doc.errors;
      const position = first.linePos?.[0];
      const location: SourceLocation | null = position
        ? { file: this.filePath, line: position.line, column: position.col }
        : null;
      throw new YAMLParseError(`Invalid YAML format: ${first.message}`, location, {
        details: { errorCount: doc.errors.length, yamlCode: first.code },
      });
    }

    let raw: unknown;
    try {
      raw = doc.toJS();
    } catch (error) {
      // Alias expansion limits and unresolved aliases surface here
      throw new YAMLParseError(`Invalid YAML format: ${getErrorMessage(error)}`, null, {
        cause: error instanceof Error ? error : undefined,
      });
    }
    if (raw === null || raw === undefined) {
      return null;
    }
    if (!isRecord(raw)) {
      throw new InvalidPipelineError(
        'Pipeline definition must be a mapping of keywords and jobs',
        { details: { file: this.filePath } }
      );
    }
    return raw;
  }

  private buildPipeline(raw: RawRecord): PipelineModel {
    const defaults: RawRecord = isRecord(raw.default) ? raw.default : {};
    const variables = this.extractGlobalVariables(raw.variables);

    return {
      stages: Array.isArray(raw.stages) ? raw.stages.filter(isScalar).map(toText) : [],
      jobs: this.extractJobs(raw),
      variables,
      secrets: this.extractSecrets(raw.variables),
      image: toName(defaults.image) ?? toName(raw.image),
      beforeScript: toStringList(defaults.before_script ?? raw.before_script),
      afterScript: toStringList(defaults.after_script ?? raw.after_script),
      cache: toSection(defaults.cache ?? raw.cache),
      retry: toRetry(defaults.retry ?? raw.retry),
      timeout: toTimeout(defaults.timeout ?? raw.timeout),
      workflow: this.extractWorkflow(raw.workflow),
      include: this.extractIncludes(raw.include),
    };
  }

  // ============================================================================
  // Variables and Secrets
  // ============================================================================

  private extractGlobalVariables(value: unknown): PipelineVariable[] {
    if (!isRecord(value)) {
      return [];
    }

    return Object.entries(value).map(([name, entry]): PipelineVariable => {
      if (isRecord(entry)) {
        return {
          name,
          value: toText(entry.value),
          protected: entry.protected === true,
          masked: entry.masked === true,
          expand: entry.expand !== false,
        };
      }
      return { name, value: toText(entry), protected: false, masked: false, expand: true };
    });
  }

  /**
   * Only the expanded form can flag a variable; plain values are never secrets
   */
  private extractSecrets(value: unknown): PipelineSecret[] {
    if (!isRecord(value)) {
      return [];
    }

    const secrets: PipelineSecret[] = [];
    for (const [name, entry] of Object.entries(value)) {
      if (!isRecord(entry)) {
        continue;
      }
      const masked = entry.masked === true;
      if (masked || entry.protected === true) {
        secrets.push({
          name,
          type: 'env',
          description: masked ? 'Masked variable' : 'Protected variable',
        });
      }
    }
    return secrets;
  }

  // ============================================================================
  // Jobs
  // ============================================================================

  private extractJobs(raw: RawRecord): PipelineJob[] {
    const jobs: PipelineJob[] = [];

    for (const [key, value] of Object.entries(raw)) {
      if (GITLAB_RESERVED_KEYWORDS.includes(key) || key.startsWith('.')) {
        continue;
      }
      if (!isRecord(value)) {
        continue;
      }
      jobs.push(this.extractJob(key, value));
    }

    return jobs;
  }

  private extractJob(name: string, config: RawRecord): PipelineJob {
    return {
      name,
      stage: isScalar(config.stage) ? toText(config.stage) : DEFAULT_JOB_STAGE,
      image: toName(config.image),
      script: toStringList(config.script),
      beforeScript: toStringList(config.before_script),
      afterScript: toStringList(config.after_script),
      dependencies: toStringList(config.dependencies),
      needs: this.extractNeeds(config.needs),
      variables: this.extractJobVariables(config.variables),
      artifacts: this.extractArtifacts(config.artifacts),
      cache: toSection(config.cache),
      retry: toRetry(config.retry),
      timeout: toTimeout(config.timeout),
      only: this.extractRefFilter(config.only),
      except: this.extractRefFilter(config.except),
      tags: toStringList(config.tags),
      allowFailure: config.allow_failure === true || isRecord(config.allow_failure),
      when: typeof config.when === 'string' ? config.when : DEFAULT_JOB_WHEN,
      environment: toName(config.environment),
      rules: this.extractRules(config.rules),
    };
  }

  /**
   * `needs:` entries are job names or `{ job: name, ... }` mappings
   */
  private extractNeeds(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }

    const needs: string[] = [];
    for (const item of value) {
      if (typeof item === 'string') {
        needs.push(item);
      } else if (isRecord(item) && typeof item.job === 'string' && item.job.length > 0) {
        needs.push(item.job);
      }
    }
    return needs;
  }

  private extractJobVariables(value: unknown): Record<string, VariableValue> {
    const variables: Record<string, VariableValue> = {};
    if (!isRecord(value)) {
      return variables;
    }

    for (const [name, entry] of Object.entries(value)) {
      if (isScalar(entry)) {
        variables[name] = entry;
      } else if (isRecord(entry)) {
        variables[name] = isScalar(entry.value) ? entry.value : '';
      } else if (entry === null) {
        variables[name] = '';
      }
    }
    return variables;
  }

  private extractArtifacts(value: unknown): ArtifactsConfig | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    return {
      paths: toStringList(value.paths),
      expireIn: typeof value.expire_in === 'string' ? value.expire_in : undefined,
    };
  }

  /**
   * `only:`/`except:` as a list of refs, or a mapping with `refs` or `branches`
   */
  private extractRefFilter(value: unknown): RefFilter | undefined {
    if (typeof value === 'string' || Array.isArray(value)) {
      return { refs: toStringList(value) };
    }
    if (isRecord(value)) {
      return { refs: toStringList(value.refs ?? value.branches) };
    }
    return undefined;
  }

  private extractRules(value: unknown): JobRule[] {
    if (!Array.isArray(value)) {
      return [];
    }

    return value.filter(isRecord).map(rule => ({
      if: typeof rule.if === 'string' ? rule.if : undefined,
      when: typeof rule.when === 'string' ? rule.when : undefined,
    }));
  }

  // ============================================================================
  // Include and Workflow
  // ============================================================================

  private extractIncludes(value: unknown): string[] {
    const entries = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];

    const includes: string[] = [];
    for (const entry of entries) {
      const target = typeof entry === 'string' ? entry : isRecord(entry) ? includeTarget(entry) : '';
      if (target.length > 0) {
        includes.push(target);
      }
    }
    return includes;
  }

  private extractWorkflow(value: unknown): WorkflowConfig | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    return {
      name: typeof value.name === 'string' ? value.name : undefined,
      rules: this.extractRules(value.rules),
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toSection(value: unknown): RawSection | undefined {
  return isRecord(value) ? value : undefined;
}

function toRetry(value: unknown): RawSection | number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  return toSection(value);
}

function toTimeout(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  return typeof value === 'number' ? String(value) : undefined;
}

function includeTarget(entry: RawRecord): string {
  for (const key of INCLUDE_TARGET_KEYS) {
    const target = entry[key];
    if (typeof target === 'string') {
      return target;
    }
    if (Array.isArray(target)) {
      return toStringList(target).join(', ');
    }
  }
  return '';
}

/**
 * Stage and job references that do not resolve inside the pipeline
 */
export function collectWarnings(pipeline: PipelineModel): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];
  const declaredStages = pipeline.stages.length > 0 ? pipeline.stages : GITLAB_DEFAULT_STAGES;
  const jobNames = new Set(pipeline.jobs.map(job => job.name));

  for (const job of pipeline.jobs) {
    if (!declaredStages.includes(job.stage) && !GITLAB_BUILTIN_STAGES.includes(job.stage)) {
      warnings.push({
        code: 'UNKNOWN_STAGE',
        message: `Job "${job.name}" references unknown stage "${job.stage}"`,
        job: job.name,
      });
    }

    for (const reference of new Set([...job.needs, ...job.dependencies])) {
      if (!jobNames.has(reference)) {
        warnings.push({
          code: 'UNKNOWN_JOB_REFERENCE',
          message: `Job "${job.name}" references unknown job "${reference}"`,
          job: job.name,
        });
      }
    }
  }

  return warnings;
}

/**
 * Parse with a one-off parser
 */
export function parseGitLabCI(content: string, options?: GitLabCIParserOptions): PipelineModel {
  return new GitLabCIParser(options).parse(content);
}
