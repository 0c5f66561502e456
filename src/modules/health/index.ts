/**
 * Health module exports
 */

// Routes
export {
  makeHealthRoutes,
  HEALTH_ROUTE_PATHS,
  METHOD_NOT_ALLOWED_METHODS,
  type MakeHealthRoutesDeps,
} from './shell/rest/routes.js';

// Reporter
export {
  makeBaseHealthReporter,
  type BaseHealthReporterOptions,
} from './shell/reporter/base-reporter.js';

// Client
export {
  createHealthClient,
  DEFAULT_CLIENT_TIMEOUT_MS,
  type HealthClient,
  type HealthClientOptions,
  type RequestOptions,
  type FetchFn,
} from './shell/client/health-client.js';
export { runProbe, PROBE_TARGETS, type ProbeTarget, type RunProbeDeps } from './shell/client/probe.js';

// Health checker factories
export {
  makeProbeChecker,
  makeCheckProvider,
  type ProbeCheckerOptions,
  type CheckProviderOptions,
} from './shell/checkers/index.js';

// Core logic
export {
  DEFAULT_METRICS,
  isReadyOutcome,
  evaluateReadiness,
  computeUptimeSeconds,
  buildStatusResponse,
  type ServiceInfo,
} from './core/logic.js';

// Errors
export type {
  HealthReporterError,
  HealthClientError,
  HealthClientConfigError,
  ProviderError,
  ReportFailedError,
  InvalidBaseUrlError,
  InvalidTimeoutError,
  NetworkError,
  TimeoutError,
  RequestAbortedError,
  UnexpectedStatusError,
  DecodeError,
} from './core/errors.js';
export {
  createProviderError,
  createReportFailedError,
  getHttpStatusForError,
} from './core/errors.js';

// Ports
export type {
  HealthReporter,
  HealthChecker,
  CheckProvider,
  MetricsProvider,
  ReportContext,
  Clock,
} from './core/ports.js';

// Types
export {
  HealthResponseSchema,
  LivenessResponseSchema,
  ReadinessResponseSchema,
  StatusResponseSchema,
  DependencySchema,
  ErrorResponseSchema,
  METRICS_CONTENT_TYPE,
  READY_OUTCOMES,
} from './core/types.js';
export type {
  HealthStatus,
  HealthResponse,
  LivenessResponse,
  ReadinessResponse,
  StatusResponse,
  Dependency,
  ErrorResponse,
  HealthCheckResult,
} from './core/types.js';
