/**
 * Default health reporter
 *
 * Answers the five health queries from static service information plus
 * optional caller-supplied providers:
 * - health and liveness are always healthy / alive
 * - readiness runs the check provider, if any
 * - metrics come from the metrics provider, or a zero-valued placeholder
 */

import { ok } from 'neverthrow';

import { buildStatusResponse } from '../../core/logic.js';
import { getMetrics } from '../../core/usecases/get-metrics.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';

import type {
  CheckProvider,
  Clock,
  HealthReporter,
  MetricsProvider,
} from '../../core/ports.js';
import type { Dependency, HealthResponse, LivenessResponse } from '../../core/types.js';

export interface BaseHealthReporterOptions {
  serviceName: string;
  version: string;
  environment: string;
  gitCommit?: string | undefined;
  buildTime?: Date | undefined;
  hostname?: string | undefined;
  dependencies?: readonly Dependency[] | undefined;
  /** Defaults to the moment the reporter is created */
  startTime?: Date | undefined;
  /** Readiness check outcomes; no provider means no checks */
  checkProvider?: CheckProvider | undefined;
  /** Metrics text; no provider means the built-in placeholder */
  metricsProvider?: MetricsProvider | undefined;
  clock?: Clock | undefined;
}

const assertValidDate = (field: string, value: Date | undefined): void => {
  if (value !== undefined && Number.isNaN(value.getTime())) {
    throw new Error(`${field} is not a valid date`);
  }
};

/**
 * Creates the default health reporter.
 * Throws when `buildTime` or `startTime` is an invalid date.
 *
 * @example
 * ```typescript
 * const reporter = makeBaseHealthReporter({
 *   serviceName: 'orders',
 *   version: '1.4.2',
 *   environment: 'production',
 *   checkProvider: makeCheckProvider([dbChecker]),
 * });
 * ```
 */
export const makeBaseHealthReporter = (options: BaseHealthReporterOptions): HealthReporter => {
  const { checkProvider, metricsProvider, clock = () => new Date() } = options;

  const startTime = options.startTime ?? clock();

  assertValidDate('buildTime', options.buildTime);
  assertValidDate('startTime', startTime);

  const info = {
    serviceName: options.serviceName,
    version: options.version,
    environment: options.environment,
    gitCommit: options.gitCommit,
    buildTime: options.buildTime,
    hostname: options.hostname,
    dependencies: [...(options.dependencies ?? [])],
    startTime,
  };

  return {
    async getHealth() {
      const response: HealthResponse = { status: 'healthy', timestamp: clock().toISOString() };
      return ok(response);
    },

    async getLiveness() {
      const response: LivenessResponse = { alive: true, timestamp: clock().toISOString() };
      return ok(response);
    },

    async getReadiness(ctx) {
      return await getReadiness({ checkProvider, clock }, ctx);
    },

    async getStatus() {
      return ok(buildStatusResponse(info, clock()));
    },

    async getMetrics(ctx) {
      return await getMetrics({ metricsProvider }, ctx);
    },
  };
};
