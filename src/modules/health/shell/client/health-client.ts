/**
 * Health Client
 *
 * Queries the health endpoints of a remote service and decodes the
 * responses back into typed results. Mirror image of the health routes.
 *
 * IMPORTANT: /health, /health/live and /health/ready answer 503 with a valid
 * body when the service is unhealthy, not alive or not ready. The client
 * decodes those responses as results, not errors: "not ready" is an answer.
 */

import { FormatRegistry, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import {
  createDecodeError,
  createInvalidBaseUrlError,
  createInvalidTimeoutError,
  createNetworkError,
  createRequestAbortedError,
  createTimeoutError,
  createUnexpectedStatusError,
  type HealthClientConfigError,
  type HealthClientError,
  type InvalidBaseUrlError,
  type InvalidTimeoutError,
} from '../../core/errors.js';
import {
  HealthResponseSchema,
  LivenessResponseSchema,
  ReadinessResponseSchema,
  StatusResponseSchema,
  type HealthResponse,
  type LivenessResponse,
  type ReadinessResponse,
  type StatusResponse,
} from '../../core/types.js';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Transport used to execute requests. Defaults to the global fetch.
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HealthClientOptions {
  /** Custom transport */
  fetch?: FetchFn | undefined;
  /** Timeout applied to every call, in whole milliseconds (default: 30000) */
  timeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

export interface RequestOptions {
  /** Aborts the in-flight request */
  signal?: AbortSignal | undefined;
}

export interface HealthClient {
  /** GET /health - 200 and 503 both decode */
  getHealth(options?: RequestOptions): Promise<Result<HealthResponse, HealthClientError>>;
  /** GET /health/live - 200 and 503 both decode */
  getLiveness(options?: RequestOptions): Promise<Result<LivenessResponse, HealthClientError>>;
  /** GET /health/ready - 200 and 503 both decode */
  getReadiness(options?: RequestOptions): Promise<Result<ReadinessResponse, HealthClientError>>;
  /** GET /status - only 200 decodes */
  getStatus(options?: RequestOptions): Promise<Result<StatusResponse, HealthClientError>>;
  /** GET /metrics - raw body text, only on 200 */
  getMetrics(options?: RequestOptions): Promise<Result<string, HealthClientError>>;
}

interface RawResponse {
  statusCode: number;
  body: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_CLIENT_TIMEOUT_MS = 30_000;

/** Largest delay a timer signal accepts */
const MAX_TIMEOUT_MS = 4_294_967_295;

const JSON_ACCEPT = 'application/json';
const TEXT_ACCEPT = 'text/plain';

/** Status codes that carry a decodable probe body */
const PROBE_STATUS_CODES: readonly number[] = [200, 503];
const OK_STATUS_CODES: readonly number[] = [200];

// TypeBox only validates formats that are registered
if (!FormatRegistry.Has('date-time')) {
  FormatRegistry.Set('date-time', (value) => !Number.isNaN(Date.parse(value)));
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses a JSON body and validates it against the response schema.
 */
const decodeJson = <T extends TSchema>(
  schema: T,
  body: string
): Result<Static<T>, HealthClientError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return err(createDecodeError(error instanceof Error ? error.message : 'invalid JSON', error));
  }

  if (!Value.Check(schema, parsed)) {
    const first = Value.Errors(schema, parsed).First();
    const detail =
      first === undefined ? 'unexpected response shape' : `${first.path}: ${first.message}`;
    return err(createDecodeError(detail));
  }

  return ok(parsed);
};

/**
 * Normalizes the base URL, dropping trailing slashes.
 */
const parseBaseUrl = (baseUrl: string): Result<string, InvalidBaseUrlError> => {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (error) {
    return err(createInvalidBaseUrlError(baseUrl, error));
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return err(createInvalidBaseUrlError(baseUrl));
  }

  return ok(url.toString().replace(/\/+$/, ''));
};

const validateTimeout = (timeoutMs: number): Result<number, InvalidTimeoutError> => {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
    return err(createInvalidTimeoutError(timeoutMs));
  }
  return ok(timeoutMs);
};

// ─────────────────────────────────────────────────────────────────────────────
// Client Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a health client for the service at `baseUrl`.
 *
 * @example
 * ```typescript
 * const clientResult = createHealthClient('http://orders:3000', { timeoutMs: 5000 });
 * if (clientResult.isOk()) {
 *   const ready = await clientResult.value.getReadiness();
 * }
 * ```
 */
export const createHealthClient = (
  baseUrl: string,
  options: HealthClientOptions = {}
): Result<HealthClient, HealthClientConfigError> => {
  const { fetch: fetchFn = fetch, logger } = options;

  const parsedBaseUrl = parseBaseUrl(baseUrl);
  if (parsedBaseUrl.isErr()) {
    return err(parsedBaseUrl.error);
  }
  const base = parsedBaseUrl.value;

  const validTimeout = validateTimeout(options.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS);
  if (validTimeout.isErr()) {
    return err(validTimeout.error);
  }
  const timeoutMs = validTimeout.value;

  /**
   * Executes a GET and reads the whole body under one signal.
   * Caller aborts, timeouts and transport failures are told apart.
   */
  const send = async (
    path: string,
    accept: string,
    requestOptions: RequestOptions
  ): Promise<Result<RawResponse, HealthClientError>> => {
    const callerSignal = requestOptions.signal;
    if (callerSignal?.aborted === true) {
      return err(createRequestAbortedError(callerSignal.reason));
    }

    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal =
      callerSignal === undefined ? timeoutSignal : AbortSignal.any([callerSignal, timeoutSignal]);

    try {
      const response = await fetchFn(`${base}${path}`, {
        method: 'GET',
        headers: { Accept: accept },
        signal,
      });
      const body = await response.text();

      logger?.debug({ path, statusCode: response.status }, 'Health client response');

      return ok({ statusCode: response.status, body });
    } catch (error) {
      if (callerSignal?.aborted === true) {
        return err(createRequestAbortedError(callerSignal.reason));
      }
      if (timeoutSignal.aborted) {
        logger?.debug({ path, timeoutMs }, 'Health client request timed out');
        return err(createTimeoutError(timeoutMs));
      }

      logger?.debug({ path, err: error }, 'Health client request failed');
      return err(createNetworkError(error));
    }
  };

  const getJson = async <T extends TSchema>(
    path: string,
    schema: T,
    acceptedStatusCodes: readonly number[],
    requestOptions: RequestOptions
  ): Promise<Result<Static<T>, HealthClientError>> => {
    const response = await send(path, JSON_ACCEPT, requestOptions);
    if (response.isErr()) {
      return err(response.error);
    }

    const { statusCode, body } = response.value;
    if (!acceptedStatusCodes.includes(statusCode)) {
      return err(createUnexpectedStatusError(statusCode, body));
    }

    return decodeJson(schema, body);
  };

  const client: HealthClient = {
    getHealth: (requestOptions = {}) =>
      getJson('/health', HealthResponseSchema, PROBE_STATUS_CODES, requestOptions),

    getLiveness: (requestOptions = {}) =>
      getJson('/health/live', LivenessResponseSchema, PROBE_STATUS_CODES, requestOptions),

    getReadiness: (requestOptions = {}) =>
      getJson('/health/ready', ReadinessResponseSchema, PROBE_STATUS_CODES, requestOptions),

    getStatus: (requestOptions = {}) =>
      getJson('/status', StatusResponseSchema, OK_STATUS_CODES, requestOptions),

    getMetrics: async (requestOptions = {}) => {
      const response = await send('/metrics', TEXT_ACCEPT, requestOptions);
      if (response.isErr()) {
        return err(response.error);
      }

      const { statusCode, body } = response.value;
      if (!OK_STATUS_CODES.includes(statusCode)) {
        return err(createUnexpectedStatusError(statusCode, body));
      }

      return ok(body);
    },
  };

  return ok(client);
};
