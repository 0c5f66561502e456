import { describe, it, expect } from 'vitest';

import { DEFAULT_METRICS } from '@/modules/health/core/logic.js';
import { makeBaseHealthReporter } from '@/modules/health/shell/reporter/base-reporter.js';

import { makeFixedClock, makeReportContext } from '../../fixtures/builders.js';

import type { Clock } from '@/modules/health/core/ports.js';
import type { Dependency } from '@/modules/health/core/types.js';

describe('makeBaseHealthReporter', () => {
  const baseOptions = {
    serviceName: 'orders',
    version: '1.4.2',
    environment: 'staging',
    startTime: new Date('2024-01-01T00:00:00.000Z'),
    clock: makeFixedClock('2024-01-01T01:00:00.500Z'),
  };

  it('always reports healthy with the current time', async () => {
    const reporter = makeBaseHealthReporter(baseOptions);

    const result = await reporter.getHealth(makeReportContext());

    expect(result._unsafeUnwrap()).toEqual({
      status: 'healthy',
      timestamp: '2024-01-01T01:00:00.500Z',
    });
  });

  it('always reports alive with the current time', async () => {
    const reporter = makeBaseHealthReporter(baseOptions);

    const result = await reporter.getLiveness(makeReportContext());

    expect(result._unsafeUnwrap()).toEqual({
      alive: true,
      timestamp: '2024-01-01T01:00:00.500Z',
    });
  });

  it('is ready with no checks when no check provider is set', async () => {
    const reporter = makeBaseHealthReporter(baseOptions);

    const result = await reporter.getReadiness(makeReportContext());

    expect(result._unsafeUnwrap()).toEqual({
      ready: true,
      timestamp: '2024-01-01T01:00:00.500Z',
      checks: {},
    });
  });

  it('reports readiness from the check provider', async () => {
    const reporter = makeBaseHealthReporter({
      ...baseOptions,
      checkProvider: async () => ({ database: 'connected', cache: 'timeout' }),
    });

    const result = await reporter.getReadiness(makeReportContext());

    expect(result._unsafeUnwrap()).toEqual({
      ready: false,
      timestamp: '2024-01-01T01:00:00.500Z',
      checks: { database: 'connected', cache: 'timeout' },
    });
  });

  it('reports status with uptime in whole seconds', async () => {
    const reporter = makeBaseHealthReporter(baseOptions);

    const result = await reporter.getStatus(makeReportContext());

    expect(result._unsafeUnwrap()).toStrictEqual({
      service_name: 'orders',
      version: '1.4.2',
      start_time: '2024-01-01T00:00:00.000Z',
      uptime_seconds: 3600,
      environment: 'staging',
    });
  });

  it('includes build information and dependencies in status', async () => {
    const reporter = makeBaseHealthReporter({
      ...baseOptions,
      gitCommit: 'abc1234',
      buildTime: new Date('2023-12-31T22:00:00.000Z'),
      hostname: 'orders-1',
      dependencies: [{ name: 'postgres', status: 'connected', version: '16.2' }],
    });

    const status = (await reporter.getStatus(makeReportContext()))._unsafeUnwrap();

    expect(status.git_commit).toBe('abc1234');
    expect(status.build_time).toBe('2023-12-31T22:00:00.000Z');
    expect(status.hostname).toBe('orders-1');
    expect(status.dependencies).toEqual([
      { name: 'postgres', status: 'connected', version: '16.2' },
    ]);
  });

  it('defaults the start time to the moment of creation', async () => {
    let now = new Date('2024-06-01T10:00:00.000Z');
    const clock: Clock = () => now;

    const reporter = makeBaseHealthReporter({
      serviceName: 'orders',
      version: '1.4.2',
      environment: 'staging',
      clock,
    });
    now = new Date('2024-06-01T10:00:42.000Z');

    const status = (await reporter.getStatus(makeReportContext()))._unsafeUnwrap();

    expect(status.start_time).toBe('2024-06-01T10:00:00.000Z');
    expect(status.uptime_seconds).toBe(42);
  });

  it('rejects an invalid build time at creation', () => {
    expect(() =>
      makeBaseHealthReporter({ ...baseOptions, buildTime: new Date('not a date') })
    ).toThrow('buildTime is not a valid date');
  });

  it('rejects an invalid start time at creation', () => {
    expect(() =>
      makeBaseHealthReporter({ ...baseOptions, startTime: new Date('not a date') })
    ).toThrow('startTime is not a valid date');
  });

  it('keeps its own copy of the dependency list', async () => {
    const dependencies: Dependency[] = [{ name: 'postgres', status: 'connected' }];
    const reporter = makeBaseHealthReporter({ ...baseOptions, dependencies });

    dependencies.push({ name: 'redis', status: 'connected' });

    const status = (await reporter.getStatus(makeReportContext()))._unsafeUnwrap();
    expect(status.dependencies).toEqual([{ name: 'postgres', status: 'connected' }]);
  });

  it('serves the placeholder metrics without a provider', async () => {
    const reporter = makeBaseHealthReporter(baseOptions);

    const result = await reporter.getMetrics(makeReportContext());

    expect(result._unsafeUnwrap()).toBe(DEFAULT_METRICS);
  });

  it('serves provider metrics and surfaces provider failures', async () => {
    const working = makeBaseHealthReporter({
      ...baseOptions,
      metricsProvider: async () => 'up 1\n',
    });
    const failing = makeBaseHealthReporter({
      ...baseOptions,
      metricsProvider: async () => {
        throw new Error('scrape failed');
      },
    });

    expect((await working.getMetrics(makeReportContext()))._unsafeUnwrap()).toBe('up 1\n');
    expect((await failing.getMetrics(makeReportContext()))._unsafeUnwrapErr()).toMatchObject({
      type: 'ProviderError',
      provider: 'metrics',
      message: 'scrape failed',
    });
  });

  it('answers concurrent calls consistently', async () => {
    const reporter = makeBaseHealthReporter({
      ...baseOptions,
      checkProvider: async () => ({ database: 'connected' }),
    });

    const results = await Promise.all(
      Array.from({ length: 50 }, () => reporter.getReadiness(makeReportContext()))
    );

    for (const result of results) {
      expect(result._unsafeUnwrap()).toEqual({
        ready: true,
        timestamp: '2024-01-01T01:00:00.500Z',
        checks: { database: 'connected' },
      });
    }
  });
});
