import { ResultAsync } from 'neverthrow';

import { createProviderError, type HealthReporterError } from '../errors.js';
import { evaluateReadiness } from '../logic.js';

import type { CheckProvider, Clock, ReportContext } from '../ports.js';
import type { ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkProvider?: CheckProvider | undefined;
  clock: Clock;
}

/**
 * Use case to determine readiness.
 * Runs the check provider, when one is configured, and evaluates its outcomes.
 */
export function getReadiness(
  deps: GetReadinessDeps,
  ctx: ReportContext
): ResultAsync<ReadinessResponse, HealthReporterError> {
  const { checkProvider, clock } = deps;

  const checks: ResultAsync<Record<string, string>, HealthReporterError> =
    checkProvider === undefined
      ? ResultAsync.fromSafePromise(Promise.resolve({}))
      : ResultAsync.fromThrowable(checkProvider, (cause) =>
          createProviderError('checks', cause)
        )(ctx);

  // Timestamp is taken after the checks have run
  return checks.map((outcomes) => evaluateReadiness({ ...outcomes }, clock().toISOString()));
}
