/**
 * Pipeline Service
 * @module services/pipeline-service
 *
 * Orchestrates parsing, graph analysis and conversion for the HTTP layer.
 * Every call builds its own parser, graph and converter; nothing is carried
 * between requests.
 */

import path from 'node:path';
import { GitLabCIParser, ValidationWarning, extractSecrets, extractVariables, getJobReferences } from '../parsers/ci';
import { GraphAnalyzer, GraphBuilder } from '../graph';
import { GitLabToGitHubConverter, serializeWorkflow } from '../converters';
import { ConversionConfig, UploadConfig } from '../config/schema';
import { FileProcessingError } from '../errors/domain';
import { BadRequestError } from '../errors/api-errors';
import { SourceLocation } from '../errors/base';
import { StructuredLogger, createModuleLogger, timed } from '../logging/logger';
import {
  Cycle,
  ExtractedVariable,
  GraphMetrics,
  PipelineModel,
  PipelineSecret,
  SerializedGraph,
} from '../types';

// ============================================================================
// Response Payloads
// ============================================================================

export interface ConvertedJobSummary {
  name: string;
  stage: string;
  image?: string;
  allow_failure: boolean;
  when: string;
  dependencies: string[];
  needs: string[];
}

export interface ConvertResult {
  success: true;
  github_workflow: string;
  gitlab_config: {
    stages: string[];
    jobs: ConvertedJobSummary[];
    variables: Array<{ name: string; value: string; protected: boolean; masked: boolean }>;
    secrets: PipelineSecret[];
  };
}

export interface AnalyzeResult {
  success: true;
  graph: SerializedGraph;
  metrics: GraphMetrics;
  cycles: Cycle[];
  critical_path: string[];
  job_references: Record<string, string[]>;
  variables: Record<string, ExtractedVariable>;
  secrets: PipelineSecret[];
}

export interface UploadResult {
  success: true;
  filename: string;
  gitlab_config: {
    stages: string[];
    jobs_count: number;
    variables_count: number;
    secrets_count: number;
  };
  graph: SerializedGraph;
  github_workflow: string;
  metrics: GraphMetrics;
}

export type ValidateResult =
  | { success: true; valid: true; message: string; warnings: ValidationWarning[] }
  | { success: true; valid: false; error: string; location: SourceLocation | null };

// ============================================================================
// Service
// ============================================================================

export interface PipelineServiceOptions {
  readonly conversion?: Partial<ConversionConfig>;
  readonly upload?: UploadConfig;
  readonly logger?: StructuredLogger;
}

const DEFAULT_UPLOAD_CONFIG: UploadConfig = {
  allowedExtensions: ['.yml', '.yaml'],
  maxFileSize: 16 * 1024 * 1024,
};

export class PipelineService {
  private readonly conversion: Partial<ConversionConfig>;
  private readonly upload: UploadConfig;
  private readonly logger: StructuredLogger;

  constructor(options: PipelineServiceOptions = {}) {
    this.conversion = options.conversion ?? {};
    this.upload = options.upload ?? DEFAULT_UPLOAD_CONFIG;
    this.logger = options.logger ?? createModuleLogger('pipeline-service');
  }

  /**
   * Convert a GitLab CI definition into GitHub Actions YAML
   * @throws ParseError for unreadable pipelines
   */
  convert(content: string, workflowName?: string): ConvertResult {
    const pipeline = this.parse(content);
    const workflow = this.createConverter().convert(pipeline, { workflowName });

    return {
      success: true,
      github_workflow: serializeWorkflow(workflow),
      gitlab_config: {
        stages: [...pipeline.stages],
        jobs: pipeline.jobs.map(job => ({
          name: job.name,
          stage: job.stage,
          ...(job.image !== undefined ? { image: job.image } : {}),
          allow_failure: job.allowFailure,
          when: job.when,
          dependencies: [...job.dependencies],
          needs: [...job.needs],
        })),
        variables: pipeline.variables.map(variable => ({
          name: variable.name,
          value: variable.value,
          protected: variable.protected,
          masked: variable.masked,
        })),
        secrets: pipeline.secrets.map(secret => ({ ...secret })),
      },
    };
  }

  /**
   * Build the dependency graph and run every analysis over it
   */
  analyze(content: string): AnalyzeResult {
    const pipeline = this.parse(content);
    const { graph, analyzer } = this.buildGraph(pipeline);

    const cycles = timed(this.logger, 'detect_cycles', () => analyzer.detectCircularDependencies());
    this.logger.cyclesDetected(cycles);
    const criticalPath = timed(this.logger, 'critical_path', () => analyzer.getCriticalPath());

    return {
      success: true,
      graph: graph.toJSON(),
      metrics: analyzer.getGraphMetrics({ cycles, criticalPath }),
      cycles,
      critical_path: criticalPath,
      job_references: getJobReferences(pipeline),
      variables: extractVariables(pipeline),
      secrets: extractSecrets(pipeline),
    };
  }

  /**
   * Syntax and reference check. Unreadable YAML is reported, not thrown.
   */
  validate(content: string): ValidateResult {
    const result = new GitLabCIParser({}, this.logger).validate(content);
    if (!result.valid) {
      return { success: true, valid: false, error: result.error, location: result.location };
    }
    return { success: true, valid: true, message: result.message, warnings: result.warnings };
  }

  /**
   * Analyze and convert an uploaded pipeline file
   * @throws BadRequestError when no filename is given
   * @throws FileProcessingError for disallowed extensions or oversize content
   */
  uploadFile(filename: string, content: string): UploadResult {
    if (filename.trim().length === 0) {
      throw new BadRequestError('No file selected');
    }

    const extension = path.extname(filename).toLowerCase();
    if (!this.upload.allowedExtensions.includes(extension)) {
      throw FileProcessingError.unsupportedType(filename, this.upload.allowedExtensions);
    }

    const size = Buffer.byteLength(content, 'utf8');
    if (size > this.upload.maxFileSize) {
      throw FileProcessingError.fileTooLarge(filename, size, this.upload.maxFileSize);
    }

    const pipeline = this.parse(content, filename);
    const workflow = this.createConverter().convert(pipeline);
    const { graph, analyzer } = this.buildGraph(pipeline);

    return {
      success: true,
      filename: sanitizeFilename(filename),
      gitlab_config: {
        stages: [...pipeline.stages],
        jobs_count: pipeline.jobs.length,
        variables_count: pipeline.variables.length,
        secrets_count: pipeline.secrets.length,
      },
      graph: graph.toJSON(),
      github_workflow: serializeWorkflow(workflow),
      metrics: analyzer.getGraphMetrics(),
    };
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private parse(content: string, filePath?: string): PipelineModel {
    return new GitLabCIParser(filePath !== undefined ? { filePath } : {}, this.logger).parse(content);
  }

  private buildGraph(pipeline: PipelineModel) {
    const graph = new GraphBuilder({ logger: this.logger }).build(pipeline);
    return { graph, analyzer: new GraphAnalyzer(graph) };
  }

  private createConverter(): GitLabToGitHubConverter {
    return new GitLabToGitHubConverter(this.conversion, this.logger);
  }
}

/**
 * Reduce a client supplied filename to a safe basename: path separators and
 * whitespace become underscores, other characters outside `[A-Za-z0-9_.-]`
 * are dropped, and leading or trailing dots and underscores are trimmed.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .normalize('NFKD')
    .replace(/[/\\]/g, ' ')
    .trim()
    .split(/\s+/)
    .join('_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

export function createPipelineService(options?: PipelineServiceOptions): PipelineService {
  return new PipelineService(options);
}
