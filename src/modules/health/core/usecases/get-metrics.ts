import { ResultAsync } from 'neverthrow';

import { createProviderError, type HealthReporterError } from '../errors.js';
import { DEFAULT_METRICS } from '../logic.js';

import type { MetricsProvider, ReportContext } from '../ports.js';

export interface GetMetricsDeps {
  metricsProvider?: MetricsProvider | undefined;
}

/**
 * Use case to produce metrics text.
 * Delegates to the metrics provider when configured, otherwise serves the placeholder.
 */
export function getMetrics(
  deps: GetMetricsDeps,
  ctx: ReportContext
): ResultAsync<string, HealthReporterError> {
  const { metricsProvider } = deps;

  if (metricsProvider === undefined) {
    return ResultAsync.fromSafePromise(Promise.resolve(DEFAULT_METRICS));
  }

  return ResultAsync.fromThrowable(metricsProvider, (cause) =>
    createProviderError('metrics', cause)
  )(ctx);
}
