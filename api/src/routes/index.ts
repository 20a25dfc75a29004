/**
 * Route Registration
 * @module routes
 *
 * Registers all route plugins under the /api prefix.
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import healthRoutes from './health';
import pipelineRoutes, { PipelineRoutesOptions } from './pipelines';

export interface RoutesOptions {
  pipelines?: PipelineRoutesOptions;
}

const routes: FastifyPluginAsync<RoutesOptions> = async (
  fastify: FastifyInstance,
  options
): Promise<void> => {
  // GET /api/health      - Basic health check
  // GET /api/health/live - Liveness probe
  await fastify.register(healthRoutes, { prefix: '/api' });

  // POST /api/convert, /api/analyze, /api/upload, /api/validate
  await fastify.register(pipelineRoutes, { prefix: '/api', ...options.pipelines });
};

export default routes;
