/**
 * Pipeline Routes
 * @module routes/pipelines
 *
 * POST /convert  - GitLab CI YAML to GitHub Actions workflow
 * POST /analyze  - Dependency graph, cycles, critical path and metrics
 * POST /upload   - Analyze and convert an uploaded pipeline file
 * POST /validate - Syntax check with reference warnings
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import {
  AnalyzeResult,
  ConvertResult,
  PipelineService,
  UploadResult,
  ValidateResult,
  createPipelineService,
} from '../services/pipeline-service';
import { ErrorResponseSchema } from '../types';
import { addRequestMetadata } from '../logging/request-context';
import {
  AnalyzeResponseSchema,
  ConvertRequestSchema,
  ConvertResponseSchema,
  PipelineContentSchema,
  UploadRequestSchema,
  UploadResponseSchema,
  ValidateResponseSchema,
  type ConvertRequest,
  type PipelineContent,
  type UploadRequest,
} from './schemas/pipeline';

export interface PipelineRoutesOptions {
  /** Defaults to a service built from the application config */
  service?: PipelineService;
}

const pipelineRoutes: FastifyPluginAsync<PipelineRoutesOptions> = async (
  fastify: FastifyInstance,
  options
): Promise<void> => {
  const service = options.service ?? createPipelineService({
    conversion: fastify.config.conversion,
    upload: fastify.config.upload,
  });

  fastify.post<{ Body: ConvertRequest; Reply: ConvertResult }>(
    '/convert',
    {
      schema: {
        tags: ['Pipelines'],
        body: ConvertRequestSchema,
        response: {
          200: ConvertResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { yaml_content, workflow_name } = request.body;
      const result = service.convert(yaml_content, workflow_name);
      addRequestMetadata({ jobCount: result.gitlab_config.jobs.length });
      return reply.status(200).send(result);
    }
  );

  fastify.post<{ Body: PipelineContent; Reply: AnalyzeResult }>(
    '/analyze',
    {
      schema: {
        tags: ['Pipelines'],
        body: PipelineContentSchema,
        response: {
          200: AnalyzeResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const result = service.analyze(request.body.yaml_content);
      addRequestMetadata({ jobCount: result.metrics.total_nodes, cycleCount: result.metrics.cycles });
      return reply.status(200).send(result);
    }
  );

  fastify.post<{ Body: UploadRequest; Reply: UploadResult }>(
    '/upload',
    {
      schema: {
        tags: ['Pipelines'],
        body: UploadRequestSchema,
        response: {
          200: UploadResponseSchema,
          400: ErrorResponseSchema,
          413: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { filename, content } = request.body;
      const result = service.uploadFile(filename, content);
      addRequestMetadata({ filename: result.filename, jobCount: result.gitlab_config.jobs_count });
      return reply.status(200).send(result);
    }
  );

  fastify.post<{ Body: PipelineContent; Reply: ValidateResult }>(
    '/validate',
    {
      schema: {
        tags: ['Pipelines'],
        body: PipelineContentSchema,
        response: {
          200: ValidateResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      return reply.status(200).send(service.validate(request.body.yaml_content));
    }
  );
};

export default pipelineRoutes;
