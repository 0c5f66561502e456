/**
 * Probe health checker
 *
 * Runs an arbitrary connectivity probe (a `SELECT 1`, a cache lookup, an
 * upstream ping) under a timeout. Returns unhealthy if the probe fails or
 * times out.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

/** Default timeout for a probe in milliseconds */
const DEFAULT_TIMEOUT_MS = 3000;

export interface ProbeCheckerOptions {
  /** Name to identify this dependency in readiness checks */
  name: string;
  /** Resolves when the dependency answers; rejects when it does not */
  probe: () => Promise<unknown>;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number | undefined;
  /** Whether the service can run without this dependency (default: true) */
  critical?: boolean | undefined;
}

/**
 * Creates a health checker around a probe function.
 *
 * @example
 * ```typescript
 * const dbChecker = makeProbeChecker({
 *   name: 'database',
 *   probe: () => pool.query('SELECT 1'),
 * });
 * const result = await dbChecker();
 * // { name: 'database', status: 'healthy', latencyMs: 5, critical: true }
 * ```
 */
export const makeProbeChecker = (options: ProbeCheckerOptions): HealthChecker => {
  const { name, probe, timeoutMs = DEFAULT_TIMEOUT_MS, critical = true } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`${name} health check timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });

      await Promise.race([probe(), timeoutPromise]);

      return {
        name,
        status: 'healthy',
        latencyMs: Date.now() - startTime,
        critical,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : `Unknown ${name} error`;

      return {
        name,
        status: 'unhealthy',
        message,
        latencyMs: Date.now() - startTime,
        critical,
      };
    } finally {
      clearTimeout(timer);
    }
  };
};
