/**
 * TypeBox Schema Definitions
 * @module types
 */

import { Type, Static } from '@sinclair/typebox';

/**
 * Health Check Response Schema
 */
export const HealthCheckSchema = Type.Object({
  status: Type.Union([
    Type.Literal('healthy'),
    Type.Literal('unhealthy'),
  ]),
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.String(),
  uptime: Type.Number(),
});

export type HealthCheck = Static<typeof HealthCheckSchema>;

/**
 * Liveness Probe Response Schema
 */
export const LivenessProbeSchema = Type.Object({
  alive: Type.Boolean(),
  timestamp: Type.String({ format: 'date-time' }),
});

export type LivenessProbe = Static<typeof LivenessProbeSchema>;

/**
 * Error Response Schema
 */
export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number(),
  error: Type.String(),
  message: Type.String(),
  code: Type.Optional(Type.String()),
  requestId: Type.Optional(Type.String()),
  timestamp: Type.Optional(Type.String()),
  details: Type.Optional(Type.Unknown()),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

// Re-export pipeline model types
export * from './pipeline';

// Re-export graph types (JobNode, JobEdge, GraphMetrics)
export * from './graph';

// Re-export GitHub Actions workflow types
export * from './github-workflow';
