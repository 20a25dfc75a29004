/**
 * Health Check Routes
 * @module routes/health
 */

import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import {
  HealthCheckSchema,
  LivenessProbeSchema,
  type HealthCheck,
  type LivenessProbe,
} from '../types';

/**
 * Application start time for uptime calculation
 */
const startTime = Date.now();

/**
 * Calculate uptime in seconds
 */
function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  /**
   * Basic health check endpoint
   * GET /health
   */
  fastify.get<{ Reply: HealthCheck }>(
    '/health',
    {
      schema: {
        tags: ['Health'],
        response: {
          200: HealthCheckSchema,
        },
      },
    },
    async (_request, reply) => {
      const health: HealthCheck = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: fastify.config.version,
        uptime: getUptime(),
      };

      return reply.status(200).send(health);
    }
  );

  /**
   * Liveness probe endpoint
   * GET /health/live
   */
  fastify.get<{ Reply: LivenessProbe }>(
    '/health/live',
    {
      schema: {
        tags: ['Health'],
        response: {
          200: LivenessProbeSchema,
        },
      },
    },
    async (_request, reply) => {
      const liveness: LivenessProbe = {
        alive: true,
        timestamp: new Date().toISOString(),
      };

      return reply.status(200).send(liveness);
    }
  );
};

export default healthRoutes;
