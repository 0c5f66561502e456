/**
 * Check provider built from health checkers
 *
 * Runs every checker in parallel on each readiness query and turns the
 * results into the check outcomes the readiness endpoint reports.
 */

import { mapCheckResults, toCheckOutcomes, type CheckOutcomeOptions } from '../../core/logic.js';

import type { CheckProvider, HealthChecker } from '../../core/ports.js';

export type CheckProviderOptions = CheckOutcomeOptions;

export const makeCheckProvider = (
  checkers: HealthChecker[],
  options: CheckProviderOptions = {}
): CheckProvider => {
  return async () => {
    const results = await Promise.allSettled(checkers.map((checker) => checker()));
    return toCheckOutcomes(mapCheckResults(results), options);
  };
};
