/**
 * Probe entry point
 * Checks a running instance and exits 0 when it passes, 1 otherwise.
 *
 * Usage (e.g. Docker HEALTHCHECK):
 *   PROBE_TARGET=ready node dist/src/probe.js
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { createLogger } from './infra/logger/index.js';
import { createHealthClient, runProbe } from './modules/health/index.js';

const ProbeEnvSchema = Type.Object({
  PROBE_URL: Type.String({ minLength: 1 }),
  PROBE_TARGET: Type.Union([Type.Literal('health'), Type.Literal('live'), Type.Literal('ready')]),
  PROBE_TIMEOUT_MS: Type.Integer({ minimum: 1 }),
});

const main = async (): Promise<number> => {
  const logger = createLogger({ name: 'probe', level: 'info', pretty: false });

  const rawEnv = {
    PROBE_URL: process.env['PROBE_URL'] ?? `http://127.0.0.1:${process.env['PORT'] ?? '3000'}`,
    PROBE_TARGET: process.env['PROBE_TARGET'] ?? 'live',
    PROBE_TIMEOUT_MS: Number(process.env['PROBE_TIMEOUT_MS'] ?? '5000'),
  };

  if (!Value.Check(ProbeEnvSchema, rawEnv)) {
    const errors = [...Value.Errors(ProbeEnvSchema, rawEnv)];
    logger.error({ errors: errors.map((e) => `${e.path}: ${e.message}`) }, 'Invalid probe config');
    return 1;
  }

  const clientResult = createHealthClient(rawEnv.PROBE_URL, {
    timeoutMs: rawEnv.PROBE_TIMEOUT_MS,
    logger,
  });
  if (clientResult.isErr()) {
    logger.error({ errorType: clientResult.error.type }, clientResult.error.message);
    return 1;
  }

  return runProbe({ client: clientResult.value, logger }, { target: rawEnv.PROBE_TARGET });
};

process.exitCode = await main();
