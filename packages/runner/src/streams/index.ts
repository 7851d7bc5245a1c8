import type { Runner } from '../runner/runner';
import { RunnerStreamer, type StreamSink } from './runnerStreamer';

export { RunnerStreamer } from './runnerStreamer';
export type { MessageFormat, StreamSink } from './runnerStreamer';
export { openFileSink } from './fileSink';
export type { FileSink } from './fileSink';
export { feedFromFile } from './fileFeed';
export type { FileFeedOptions } from './fileFeed';
export { parseCommandMessage } from './commandMessage';

export type RunnerSinks = {
  state?: StreamSink[];
  data?: StreamSink[];
};

/** Register a runner's state and data queues on the streamer. */
export function connectRunnerStreams(streamer: RunnerStreamer, runner: Runner, sinks: RunnerSinks): void {
  for (const sink of sinks.state ?? []) streamer.registerStream(runner.stateQueue, sink);
  for (const sink of sinks.data ?? []) streamer.registerStream(runner.dataQueue, sink);
}
