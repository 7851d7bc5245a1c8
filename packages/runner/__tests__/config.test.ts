import { describe, expect, it } from 'vitest';

import { ConfigError, loadRunnerConfig } from '../src';

describe('loadRunnerConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadRunnerConfig({})).toEqual({
      pollIntervalMs: 1000,
      startupTimeoutSec: undefined,
      maxRunningTimeSec: undefined,
      portRangeStart: 8080,
      portRangeEnd: 9090,
      commandFeedIntervalMs: 1000,
      logLevel: 'info',
    });
  });

  it('reads and coerces the DAPP_RUNNER_ variables', () => {
    const config = loadRunnerConfig({
      DAPP_RUNNER_POLL_INTERVAL_MS: '250',
      DAPP_RUNNER_STARTUP_TIMEOUT_SEC: '120',
      DAPP_RUNNER_MAX_RUNNING_TIME_SEC: '',
      DAPP_RUNNER_PORT_RANGE_START: '10000',
      DAPP_RUNNER_PORT_RANGE_END: '10100',
      DAPP_RUNNER_LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      pollIntervalMs: 250,
      startupTimeoutSec: 120,
      maxRunningTimeSec: undefined,
      portRangeStart: 10000,
      portRangeEnd: 10100,
      logLevel: 'debug',
    });
  });

  it('rejects an inverted port range', () => {
    expect(() =>
      loadRunnerConfig({ DAPP_RUNNER_PORT_RANGE_START: '9000', DAPP_RUNNER_PORT_RANGE_END: '8000' }),
    ).toThrow(ConfigError);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadRunnerConfig({ DAPP_RUNNER_LOG_LEVEL: 'verbose' })).toThrow(/logLevel/);
  });
});
