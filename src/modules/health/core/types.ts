import { Type, type Static } from '@sinclair/typebox';

/**
 * Overall health verdict
 */
export const HealthStatusSchema = Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]);

export type HealthStatus = Static<typeof HealthStatusSchema>;

/**
 * Health check response - overall service health
 */
export const HealthResponseSchema = Type.Object({
  status: HealthStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
});

export type HealthResponse = Static<typeof HealthResponseSchema>;

/**
 * Liveness check response - indicates if the process is running
 */
export const LivenessResponseSchema = Type.Object({
  alive: Type.Boolean(),
  timestamp: Type.String({ format: 'date-time' }),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

/**
 * Readiness check response - indicates if the service can accept traffic
 */
export const ReadinessResponseSchema = Type.Object({
  ready: Type.Boolean(),
  timestamp: Type.String({ format: 'date-time' }),
  checks: Type.Record(Type.String(), Type.String(), {
    description: 'Outcome of each dependency check, keyed by check name',
  }),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;

/**
 * External system the service depends on
 */
export const DependencySchema = Type.Object({
  name: Type.String(),
  status: Type.String(),
  version: Type.Optional(Type.String()),
});

export type Dependency = Static<typeof DependencySchema>;

/**
 * Build and runtime information about the service
 */
export const StatusResponseSchema = Type.Object({
  service_name: Type.String(),
  version: Type.String(),
  git_commit: Type.Optional(Type.String()),
  build_time: Type.Optional(Type.String({ format: 'date-time' })),
  start_time: Type.String({ format: 'date-time' }),
  uptime_seconds: Type.Integer({ minimum: 0, description: 'Seconds since the service started' }),
  environment: Type.String(),
  hostname: Type.Optional(Type.String()),
  dependencies: Type.Optional(Type.Array(DependencySchema)),
});

export type StatusResponse = Static<typeof StatusResponseSchema>;

export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

/**
 * Content type of the metrics endpoint (Prometheus text exposition format)
 */
export const METRICS_CONTENT_TYPE = 'text/plain; version=0.0.4';

/**
 * Check outcomes that count as ready. Matching is exact.
 */
export const READY_OUTCOMES: readonly string[] = ['connected', 'available', 'reachable', 'healthy'];

/**
 * Individual dependency check result produced by a HealthChecker
 */
export interface HealthCheckResult {
  name: string;
  status: HealthStatus;
  message?: string | undefined;
  latencyMs?: number | undefined;
  /** Unhealthy critical checks make the service not ready (default: true) */
  critical?: boolean | undefined;
}
