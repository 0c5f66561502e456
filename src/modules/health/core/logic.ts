import {
  READY_OUTCOMES,
  type Dependency,
  type HealthCheckResult,
  type ReadinessResponse,
  type StatusResponse,
} from './types.js';

/**
 * Placeholder metrics served when no metrics provider is configured.
 */
export const DEFAULT_METRICS = `# HELP http_requests_total Total number of HTTP requests
# TYPE http_requests_total counter
http_requests_total{method="GET",status="200"} 0
# HELP http_request_duration_seconds HTTP request latency
# TYPE http_request_duration_seconds histogram
http_request_duration_seconds_bucket{le="0.005"} 0
http_request_duration_seconds_bucket{le="0.01"} 0
http_request_duration_seconds_bucket{le="0.025"} 0
http_request_duration_seconds_sum 0
http_request_duration_seconds_count 0
`;

export const isReadyOutcome = (outcome: string): boolean => READY_OUTCOMES.includes(outcome);

/**
 * Pure business logic to determine readiness.
 * Ready iff every check outcome is a ready outcome; no checks means ready.
 */
export const evaluateReadiness = (
  checks: Record<string, string>,
  timestamp: string
): ReadinessResponse => {
  const ready = Object.values(checks).every(isReadyOutcome);

  return {
    ready,
    timestamp,
    checks,
  };
};

/**
 * Whole seconds elapsed since start, never negative.
 */
export const computeUptimeSeconds = (startTime: Date, now: Date): number => {
  const elapsedMs = now.getTime() - startTime.getTime();
  return elapsedMs > 0 ? Math.floor(elapsedMs / 1000) : 0;
};

export interface ServiceInfo {
  serviceName: string;
  version: string;
  environment: string;
  startTime: Date;
  gitCommit?: string | undefined;
  buildTime?: Date | undefined;
  hostname?: string | undefined;
  dependencies?: readonly Dependency[] | undefined;
}

/**
 * Assembles the status payload. Unset optional fields are left out entirely.
 */
export const buildStatusResponse = (info: ServiceInfo, now: Date): StatusResponse => {
  const { gitCommit, buildTime, hostname, dependencies = [] } = info;

  return {
    service_name: info.serviceName,
    version: info.version,
    ...(gitCommit !== undefined && gitCommit !== '' && { git_commit: gitCommit }),
    ...(buildTime !== undefined && { build_time: buildTime.toISOString() }),
    start_time: info.startTime.toISOString(),
    uptime_seconds: computeUptimeSeconds(info.startTime, now),
    environment: info.environment,
    ...(hostname !== undefined && hostname !== '' && { hostname }),
    ...(dependencies.length > 0 && {
      dependencies: dependencies.map((dependency) => ({ ...dependency })),
    }),
  };
};

/**
 * Maps settled promises from health checkers to standardized HealthCheckResults.
 * Rejected checkers are unhealthy and critical, named by their position.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result, index) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: `checker-${String(index)}`,
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: true,
    };
  });
};

export interface CheckOutcomeOptions {
  /** Outcome reported for healthy checks (default: 'healthy') */
  healthyOutcome?: string | undefined;
  /** Report unhealthy non-critical checks as healthy (default: false) */
  ignoreNonCritical?: boolean | undefined;
}

/**
 * Converts checker results into readiness check outcomes.
 * - healthy → healthyOutcome
 * - non-critical unhealthy → 'degraded' (or healthyOutcome when ignored)
 * - critical unhealthy → its message, or 'unhealthy'
 *
 * Results sharing a name collapse into one outcome; a not-ready outcome is
 * never replaced by a later ready one.
 */
export const toCheckOutcomes = (
  checks: HealthCheckResult[],
  options: CheckOutcomeOptions = {}
): Record<string, string> => {
  const { healthyOutcome = 'healthy', ignoreNonCritical = false } = options;
  const outcomes: Record<string, string> = {};

  for (const check of checks) {
    let outcome: string;
    if (check.status === 'healthy') {
      outcome = healthyOutcome;
    } else if (check.critical === false) {
      outcome = ignoreNonCritical ? healthyOutcome : 'degraded';
    } else {
      const message = check.message ?? '';
      outcome = message === '' ? 'unhealthy' : `unhealthy: ${message}`;
    }

    const previous = outcomes[check.name];
    if (previous === undefined || isReadyOutcome(previous)) {
      outcomes[check.name] = outcome;
    }
  }

  return outcomes;
};
