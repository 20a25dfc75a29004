/**
 * Swagger/OpenAPI Documentation Plugin
 * @module plugins/swagger
 *
 * Configures OpenAPI 3.1.0 documentation with Swagger UI for the
 * pipeline conversion API.
 */

import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { stringify } from 'yaml';
import { createModuleLogger } from '../logging/logger';

// ============================================================================
// Types
// ============================================================================

export interface SwaggerPluginOptions {
  /**
   * Route prefix for the Swagger UI
   * @default '/docs'
   */
  routePrefix?: string;

  /**
   * Whether to expose the Swagger UI route
   * @default true
   */
  exposeRoute?: boolean;

  title?: string;
  description?: string;
  version?: string;

  /**
   * Base URL advertised in the OpenAPI document
   * @default 'http://localhost:5000'
   */
  serverUrl?: string;
}

const DEFAULT_OPTIONS: Required<SwaggerPluginOptions> = {
  routePrefix: '/docs',
  exposeRoute: true,
  title: 'CI Bridge API',
  description: 'Analyze GitLab CI pipelines and convert them to GitHub Actions workflows',
  version: '1.0.0',
  serverUrl: 'http://localhost:5000',
};

// ============================================================================
// Plugin Implementation
// ============================================================================

/**
 * Registers @fastify/swagger with OpenAPI 3.1.0 configuration and
 * @fastify/swagger-ui for interactive documentation.
 *
 * @example
 * ```typescript
 * await app.register(swaggerPlugin, { routePrefix: '/api-docs' });
 * ```
 */
async function swaggerPlugin(
  fastify: FastifyInstance,
  options: SwaggerPluginOptions
): Promise<void> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = createModuleLogger('swagger-plugin');

  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: opts.title,
        description: opts.description,
        version: opts.version,
        license: {
          name: 'MIT',
          url: 'https://opensource.org/licenses/MIT',
        },
      },
      servers: [
        {
          url: opts.serverUrl,
          description: process.env.NODE_ENV === 'production'
            ? 'Production server'
            : 'Development server',
        },
      ],
      tags: [
        {
          name: 'Health',
          description: 'Health check and liveness endpoints',
        },
        {
          name: 'Pipelines',
          description: 'Pipeline analysis, validation and conversion',
        },
      ],
    },
  });

  if (opts.exposeRoute) {
    await fastify.register(swaggerUi, {
      routePrefix: opts.routePrefix,
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
        displayRequestDuration: true,
        tryItOutEnabled: process.env.NODE_ENV !== 'production',
      },
      staticCSP: true,
    });

    logger.info({ routePrefix: opts.routePrefix }, 'Swagger UI registered');
  }

  fastify.get('/openapi.json', { schema: { hide: true } }, async (_request, reply) => {
    return reply.type('application/json').send(fastify.swagger());
  });

  fastify.get('/openapi.yaml', { schema: { hide: true } }, async (_request, reply) => {
    return reply.type('application/x-yaml').send(stringify(fastify.swagger()));
  });
}

export default fp(swaggerPlugin, {
  name: 'swagger',
  fastify: '4.x',
});
