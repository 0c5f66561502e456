/**
 * Probe runner
 *
 * One-shot check of a remote instance, for container HEALTHCHECK commands
 * and deploy scripts. Resolves to the process exit code.
 */

import type { HealthClientError } from '../../core/errors.js';
import type { HealthClient, RequestOptions } from './health-client.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export const PROBE_TARGETS = ['health', 'live', 'ready'] as const;

export type ProbeTarget = (typeof PROBE_TARGETS)[number];

export interface RunProbeDeps {
  client: HealthClient;
  logger: Logger;
}

export interface RunProbeInput {
  target: ProbeTarget;
  signal?: AbortSignal | undefined;
}

const checkTarget = async (
  client: HealthClient,
  target: ProbeTarget,
  options: RequestOptions
): Promise<Result<boolean, HealthClientError>> => {
  switch (target) {
    case 'health':
      return (await client.getHealth(options)).map((response) => response.status === 'healthy');
    case 'live':
      return (await client.getLiveness(options)).map((response) => response.alive);
    case 'ready':
      return (await client.getReadiness(options)).map((response) => response.ready);
  }
};

/**
 * Queries the target endpoint.
 * @returns 0 when the service passes, 1 otherwise (including client errors)
 */
export async function runProbe(deps: RunProbeDeps, input: RunProbeInput): Promise<number> {
  const { client, logger } = deps;
  const { target, signal } = input;

  const result = await checkTarget(client, target, { signal });

  if (result.isErr()) {
    logger.error({ target, errorType: result.error.type }, result.error.message);
    return 1;
  }

  if (!result.value) {
    logger.warn({ target }, 'Probe failed');
    return 1;
  }

  logger.info({ target }, 'Probe passed');
  return 0;
}
