import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const emptyAsUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const intervalMs = (defaultValue: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(defaultValue));

const optionalSeconds = z.preprocess(emptyAsUndefined, z.coerce.number().positive().optional());

const port = (defaultValue: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).default(defaultValue));

const runnerConfigSchema = z
  .object({
    pollIntervalMs: intervalMs(1000),
    startupTimeoutSec: optionalSeconds,
    maxRunningTimeSec: optionalSeconds,
    portRangeStart: port(8080),
    portRangeEnd: port(9090),
    commandFeedIntervalMs: intervalMs(1000),
    logLevel: z.preprocess(emptyAsUndefined, z.enum(LOG_LEVELS).default('info')),
  })
  .refine((config) => config.portRangeStart <= config.portRangeEnd, {
    message: 'DAPP_RUNNER_PORT_RANGE_START must not exceed DAPP_RUNNER_PORT_RANGE_END',
    path: ['portRangeStart'],
  });

export type RunnerConfig = z.infer<typeof runnerConfigSchema>;

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = runnerConfigSchema.safeParse({
    pollIntervalMs: env.DAPP_RUNNER_POLL_INTERVAL_MS,
    startupTimeoutSec: env.DAPP_RUNNER_STARTUP_TIMEOUT_SEC,
    maxRunningTimeSec: env.DAPP_RUNNER_MAX_RUNNING_TIME_SEC,
    portRangeStart: env.DAPP_RUNNER_PORT_RANGE_START,
    portRangeEnd: env.DAPP_RUNNER_PORT_RANGE_END,
    commandFeedIntervalMs: env.DAPP_RUNNER_COMMAND_FEED_INTERVAL_MS,
    logLevel: env.DAPP_RUNNER_LOG_LEVEL,
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid dapp-runner configuration: ${details}`);
  }
  return parsed.data;
}
