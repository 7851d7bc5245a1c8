import { AsyncQueue } from '../lib/asyncQueue';
import { TaskSet } from '../lib/taskSet';
import type { LoggerService } from '../service/logger.service';

/** Anything with a line-oriented `write`; a returned promise is awaited. */
export interface StreamSink {
  write(line: string): unknown;
}

export type MessageFormat<T> = (message: T) => string;

const formatJson = (message: unknown): string => JSON.stringify(message);

/** Copies one source queue into the per-sink queues registered on it. */
class Fanout {
  readonly targets: AsyncQueue<unknown>[] = [];

  constructor(private readonly source: AsyncQueue<unknown>) {}

  async run(signal: AbortSignal): Promise<void> {
    for (;;) {
      const message = await this.source.get(signal);
      for (const target of this.targets) target.put(message);
    }
  }
}

/**
 * Copies every message from a source queue to each sink registered on it,
 * one line per message. A slow sink only delays its own queue.
 */
export class RunnerStreamer {
  private readonly fanouts = new Map<AsyncQueue<unknown>, Fanout>();
  private readonly fanoutTasks: TaskSet;
  private readonly sinkTasks: TaskSet;

  constructor(private readonly logger: LoggerService) {
    this.fanoutTasks = new TaskSet(logger);
    this.sinkTasks = new TaskSet(logger);
  }

  registerStream<T>(source: AsyncQueue<T>, sink: StreamSink, format: MessageFormat<T> = formatJson): void {
    const messages = new AsyncQueue<T>();
    void this.sinkTasks.spawn('stream-sink', async (signal) => {
      for (;;) {
        const message = await messages.get(signal);
        await sink.write(`${format(message)}\n`);
      }
    });
    this.fanoutFor(source).targets.push(messages);
  }

  /** Flush everything queued so far to the sinks, then stop. */
  async stop(): Promise<void> {
    await this.fanoutTasks.cancel();
    await this.sinkTasks.cancel();
    this.fanouts.clear();
    this.logger.debug('Streamer stopped');
  }

  private fanoutFor(source: AsyncQueue<unknown>): Fanout {
    const existing = this.fanouts.get(source);
    if (existing) return existing;
    const fanout = new Fanout(source);
    this.fanouts.set(source, fanout);
    void this.fanoutTasks.spawn('stream-fanout', (signal) => fanout.run(signal));
    return fanout;
  }
}
