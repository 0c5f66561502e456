/**
 * Health Module - Ports (Interfaces)
 *
 * What the HTTP layer needs from a health reporter, and the provider
 * functions a caller can plug into the default reporter.
 */

import type { HealthReporterError } from './errors.js';
import type {
  HealthCheckResult,
  HealthResponse,
  LivenessResponse,
  ReadinessResponse,
  StatusResponse,
} from './types.js';
import type { Result } from 'neverthrow';

/**
 * Per-call context. The signal aborts when the caller goes away.
 */
export interface ReportContext {
  signal: AbortSignal;
}

/**
 * Answers the five health queries exposed over HTTP.
 */
export interface HealthReporter {
  getHealth(ctx: ReportContext): Promise<Result<HealthResponse, HealthReporterError>>;
  getLiveness(ctx: ReportContext): Promise<Result<LivenessResponse, HealthReporterError>>;
  getReadiness(ctx: ReportContext): Promise<Result<ReadinessResponse, HealthReporterError>>;
  getStatus(ctx: ReportContext): Promise<Result<StatusResponse, HealthReporterError>>;
  /** Metrics in Prometheus text exposition format */
  getMetrics(ctx: ReportContext): Promise<Result<string, HealthReporterError>>;
}

/**
 * Produces readiness check outcomes, keyed by check name
 */
export type CheckProvider = (ctx: ReportContext) => Promise<Record<string, string>>;

/**
 * Produces metrics text. A rejection is reported as the endpoint's error.
 */
export type MetricsProvider = (ctx: ReportContext) => Promise<string>;

/**
 * Health check function type
 */
export type HealthChecker = () => Promise<HealthCheckResult>;

/**
 * Time source, overridable in tests
 */
export type Clock = () => Date;
