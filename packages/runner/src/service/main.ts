import { loadDapp, verifyManifests } from '@dapp-runner/descriptor';

import { TaskSet } from '../lib/taskSet';
import type { ComputeProvider } from '../provider/computeProvider.port';
import type { BlacklistOnFailure } from '../provider/strategy';
import { Runner } from '../runner/runner';
import { connectRunnerStreams, type RunnerSinks } from '../streams';
import { parseCommandMessage } from '../streams/commandMessage';
import { feedFromFile } from '../streams/fileFeed';
import { openFileSink, type FileSink } from '../streams/fileSink';
import { RunnerStreamer } from '../streams/runnerStreamer';
import { loadRunnerConfig, type RunnerConfig } from './config';
import { LoggerService } from './logger.service';
import { RunnerSession, bindProcessSignals, type SessionOutcome, type SignalSource } from './session';

export type RunnerFiles = {
  /** State snapshots, one JSON line each. */
  state?: string;
  /** Command results and proxy addresses. */
  data?: string;
  /** Command messages appended by the operator. */
  commands?: string;
};

export type StartRunnerOptions = {
  /** Raw dapp descriptor tree. */
  descriptor: unknown;
  provider: ComputeProvider;
  /** Read from `env` when absent. */
  config?: RunnerConfig;
  env?: NodeJS.ProcessEnv;
  logger?: LoggerService;
  strategy?: BlacklistOnFailure;
  files?: RunnerFiles;
  sinks?: RunnerSinks;
  signals?: SignalSource;
};

const secondsToMs = (seconds: number | undefined) => (seconds === undefined ? undefined : seconds * 1000);

/**
 * Load and verify the dapp, then run it in a session until it terminates,
 * its running time elapses or a signal asks it to stop.
 */
export async function startRunner(options: StartRunnerOptions): Promise<SessionOutcome> {
  const config = options.config ?? loadRunnerConfig(options.env);
  const logger = options.logger ?? LoggerService.create({ level: config.logLevel });

  const dapp = loadDapp(options.descriptor);
  for (const check of await verifyManifests(dapp)) {
    for (const warning of check.warnings) logger.warn(`Manifest of ${check.payload}: ${warning}`);
  }

  const runner = new Runner({ dapp, provider: options.provider, logger, strategy: options.strategy, config });
  const streamer = new RunnerStreamer(logger);
  const feeds = new TaskSet(logger);
  const files = options.files ?? {};
  const opened: FileSink[] = [];
  const openSink = async (path: string | undefined): Promise<FileSink[]> => {
    if (path === undefined) return [];
    const sink = await openFileSink(path);
    opened.push(sink);
    return [sink];
  };

  try {
    connectRunnerStreams(streamer, runner, {
      state: [...(options.sinks?.state ?? []), ...(await openSink(files.state))],
      data: [...(options.sinks?.data ?? []), ...(await openSink(files.data))],
    });

    const commandsPath = files.commands;
    if (commandsPath !== undefined) {
      void feeds.spawn('command-feed', (signal) =>
        feedFromFile(runner.commandQueue, commandsPath, {
          parse: parseCommandMessage,
          signal,
          logger,
          intervalMs: config.commandFeedIntervalMs,
        }),
      );
    }

    const session = new RunnerSession(
      runner,
      {
        startupTimeoutMs: secondsToMs(config.startupTimeoutSec),
        maxRunningTimeMs: secondsToMs(config.maxRunningTimeSec),
        pollIntervalMs: config.pollIntervalMs,
      },
      logger,
    );
    const unbind = bindProcessSignals(session, options.signals);
    try {
      return await session.run();
    } finally {
      unbind();
    }
  } finally {
    await feeds.cancel();
    await streamer.stop();
    await Promise.all(opened.map((sink) => sink.close()));
  }
}
