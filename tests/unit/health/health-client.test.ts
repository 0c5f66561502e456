import { describe, it, expect } from 'vitest';

import { createHealthClient, type HealthClientOptions } from '@/modules/health/index.js';

import {
  makeFailingFetch,
  makeFakeFetch,
  makeHangingFetch,
  type FakeResponse,
} from '../../fixtures/fakes.js';

import type { HealthClient } from '@/modules/health/index.js';

const BASE_URL = 'http://orders.internal:3000';

const makeClient = (options: HealthClientOptions = {}): HealthClient => {
  const result = createHealthClient(BASE_URL, options);
  if (result.isErr()) {
    throw new Error(result.error.message);
  }
  return result.value;
};

const clientAnswering = (response: FakeResponse) => {
  const fake = makeFakeFetch(response);
  return { client: makeClient({ fetch: fake.fetch }), calls: fake.calls };
};

describe('createHealthClient', () => {
  describe('base URL', () => {
    it('rejects a value that is not a URL', () => {
      const result = createHealthClient('not a url');

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'InvalidBaseUrlError',
        message: 'invalid base URL: not a url',
        baseUrl: 'not a url',
      });
    });

    it('rejects schemes other than http and https', () => {
      const result = createHealthClient('ftp://orders.internal');

      expect(result._unsafeUnwrapErr().type).toBe('InvalidBaseUrlError');
    });

    it('drops trailing slashes before joining paths', async () => {
      const fake = makeFakeFetch({
        status: 200,
        body: '{"status":"healthy","timestamp":"2024-03-01T12:00:00.000Z"}',
      });
      const client = createHealthClient('http://orders.internal:3000/', {
        fetch: fake.fetch,
      })._unsafeUnwrap();

      await client.getHealth();

      expect(fake.calls[0]?.url).toBe('http://orders.internal:3000/health');
    });
  });

  describe('timeout', () => {
    it.each([-1, Number.POSITIVE_INFINITY, Number.NaN, 1.5, 4_294_967_296])(
      'rejects a timeout of %s at construction',
      (timeoutMs) => {
        const fake = makeFakeFetch({ status: 200, body: '{}' });

        const result = createHealthClient(BASE_URL, { fetch: fake.fetch, timeoutMs });

        expect(result._unsafeUnwrapErr()).toEqual({
          type: 'InvalidTimeoutError',
          message: `invalid timeout: ${String(timeoutMs)}ms`,
          timeoutMs,
        });
      }
    );

    it('accepts a zero timeout', () => {
      expect(createHealthClient(BASE_URL, { timeoutMs: 0 }).isOk()).toBe(true);
    });
  });

  describe('probe endpoints', () => {
    it('decodes a healthy answer', async () => {
      const { client, calls } = clientAnswering({
        status: 200,
        body: '{"status":"healthy","timestamp":"2024-03-01T12:00:00.000Z"}',
      });

      const result = await client.getHealth();

      expect(result._unsafeUnwrap()).toEqual({
        status: 'healthy',
        timestamp: '2024-03-01T12:00:00.000Z',
      });
      expect(calls).toEqual([
        { url: 'http://orders.internal:3000/health', accept: 'application/json' },
      ]);
    });

    it('decodes a 503 answer as a result', async () => {
      const { client } = clientAnswering({
        status: 503,
        body: '{"ready":false,"timestamp":"2024-03-01T12:00:00.000Z","checks":{"database":"timeout"}}',
      });

      const result = await client.getReadiness();

      expect(result._unsafeUnwrap()).toEqual({
        ready: false,
        timestamp: '2024-03-01T12:00:00.000Z',
        checks: { database: 'timeout' },
      });
    });

    it('decodes liveness from /health/live', async () => {
      const { client, calls } = clientAnswering({
        status: 200,
        body: '{"alive":true,"timestamp":"2024-03-01T12:00:00.000Z"}',
      });

      const result = await client.getLiveness();

      expect(result._unsafeUnwrap().alive).toBe(true);
      expect(calls[0]?.url).toBe('http://orders.internal:3000/health/live');
    });

    it('rejects other status codes with the body in the message', async () => {
      const { client } = clientAnswering({ status: 500, body: '{"error":"boom"}' });

      const result = await client.getHealth();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'UnexpectedStatusError',
        statusCode: 500,
        body: '{"error":"boom"}',
        message: 'unexpected status code 500: {"error":"boom"}',
      });
    });
  });

  describe('status', () => {
    const statusBody = JSON.stringify({
      service_name: 'orders',
      version: '1.4.2',
      start_time: '2024-03-01T11:00:00.000Z',
      uptime_seconds: 3600,
      environment: 'production',
      hostname: 'orders-1',
    });

    it('decodes the status payload', async () => {
      const { client, calls } = clientAnswering({ status: 200, body: statusBody });

      const result = await client.getStatus();

      expect(result._unsafeUnwrap()).toEqual({
        service_name: 'orders',
        version: '1.4.2',
        start_time: '2024-03-01T11:00:00.000Z',
        uptime_seconds: 3600,
        environment: 'production',
        hostname: 'orders-1',
      });
      expect(calls[0]?.url).toBe('http://orders.internal:3000/status');
    });

    it('does not accept 503 for status', async () => {
      const { client } = clientAnswering({ status: 503, body: statusBody });

      const result = await client.getStatus();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'UnexpectedStatusError',
        statusCode: 503,
      });
    });
  });

  describe('decoding', () => {
    it('fails on a body that is not JSON', async () => {
      const { client } = clientAnswering({ status: 200, body: 'OK' });

      const result = await client.getHealth();

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('DecodeError');
      expect(error.message.startsWith('decoding response: ')).toBe(true);
    });

    it('fails on a body with the wrong shape', async () => {
      const { client } = clientAnswering({
        status: 200,
        body: '{"alive":"yes","timestamp":"2024-03-01T12:00:00.000Z"}',
      });

      const result = await client.getLiveness();

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('DecodeError');
      expect(error.message.startsWith('decoding response: /alive: ')).toBe(true);
    });

    it('fails on a timestamp that is not a date', async () => {
      const { client } = clientAnswering({
        status: 200,
        body: '{"status":"healthy","timestamp":"yesterday"}',
      });

      const result = await client.getHealth();

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('DecodeError');
      expect(error.message.startsWith('decoding response: /timestamp: ')).toBe(true);
    });
  });

  describe('metrics', () => {
    it('returns the raw body and asks for text', async () => {
      const { client, calls } = clientAnswering({
        status: 200,
        body: 'up 1\n',
        contentType: 'text/plain; version=0.0.4',
      });

      const result = await client.getMetrics();

      expect(result._unsafeUnwrap()).toBe('up 1\n');
      expect(calls).toEqual([{ url: 'http://orders.internal:3000/metrics', accept: 'text/plain' }]);
    });

    it('returns an empty body as an empty string', async () => {
      const { client } = clientAnswering({ status: 200, body: '', contentType: 'text/plain' });

      expect((await client.getMetrics())._unsafeUnwrap()).toBe('');
    });

    it('fails on any status other than 200', async () => {
      const { client } = clientAnswering({
        status: 404,
        body: 'Not Found',
        contentType: 'text/plain',
      });

      const result = await client.getMetrics();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'UnexpectedStatusError',
        statusCode: 404,
        message: 'unexpected status code 404: Not Found',
      });
    });
  });

  describe('transport failures', () => {
    it('wraps transport errors as retryable network errors', async () => {
      const fake = makeFailingFetch(new Error('connect ECONNREFUSED 127.0.0.1:3000'));
      const client = makeClient({ fetch: fake.fetch });

      const result = await client.getHealth();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'NetworkError',
        retryable: true,
        message: 'executing request: connect ECONNREFUSED 127.0.0.1:3000',
      });
    });

    it('times out when the server does not answer', async () => {
      const fake = makeHangingFetch();
      const client = makeClient({ fetch: fake.fetch, timeoutMs: 20 });

      const result = await client.getReadiness();

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'TimeoutError',
        timeoutMs: 20,
        retryable: true,
        message: 'request timed out after 20ms',
      });
    });

    it('reports a caller abort separately from a timeout', async () => {
      const fake = makeHangingFetch();
      const client = makeClient({ fetch: fake.fetch });
      const controller = new AbortController();

      const pending = client.getStatus({ signal: controller.signal });
      controller.abort();
      const result = await pending;

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'RequestAbortedError',
        message: 'request aborted by caller',
      });
    });

    it('does not send a request when the signal is already aborted', async () => {
      const fake = makeHangingFetch();
      const client = makeClient({ fetch: fake.fetch });

      const result = await client.getMetrics({ signal: AbortSignal.abort() });

      expect(result._unsafeUnwrapErr().type).toBe('RequestAbortedError');
      expect(fake.calls).toHaveLength(0);
    });
  });
});
