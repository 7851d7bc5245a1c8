import { setTimeout as delay } from 'node:timers/promises';

import type { AppState } from '../runner/appState';
import type { LoggerService } from './logger.service';

/** The slice of the Runner a session drives. */
export interface SessionRunner {
  readonly appState: AppState;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export type RunnerSessionOptions = {
  startupTimeoutMs?: number;
  maxRunningTimeMs?: number;
  pollIntervalMs?: number;
};

export const runningTimeElapsed = (
  startedAt: Date | undefined,
  maxRunningTimeMs: number | undefined,
  now: Date = new Date(),
): boolean =>
  startedAt !== undefined &&
  maxRunningTimeMs !== undefined &&
  now.getTime() - startedAt.getTime() > maxRunningTimeMs;

export type SessionOutcome = 'terminated' | 'timeout' | 'shutdown' | 'elapsed';

/**
 * Runs a dapp to completion: start, wait for it to come up within the startup
 * timeout, keep it running until it terminates, its running time elapses or a
 * shutdown is requested, then stop it.
 */
export class RunnerSession {
  private readonly shutdownRequest = new AbortController();
  private readonly abandonRequest = new AbortController();
  private startedAt?: Date;
  private shutdownCalls = 0;

  constructor(
    private readonly runner: SessionRunner,
    private readonly options: RunnerSessionOptions,
    private readonly logger: LoggerService,
  ) {}

  get runningTimeElapsed(): boolean {
    return runningTimeElapsed(this.startedAt, this.options.maxRunningTimeMs);
  }

  /** First call stops gracefully; a second one stops waiting for teardown. */
  shutdown(): void {
    this.shutdownCalls += 1;
    if (this.shutdownCalls === 1) {
      this.logger.info('Shutdown requested, stopping the dapp');
      this.shutdownRequest.abort();
      return;
    }
    this.logger.warn('Shutdown requested again, abandoning teardown');
    this.abandonRequest.abort();
  }

  async run(): Promise<SessionOutcome> {
    this.startedAt = new Date();
    let outcome: SessionOutcome;
    try {
      await this.runner.start();
      outcome = await this.supervise();
    } finally {
      await this.teardown();
    }
    this.logger.info(`Session finished: ${outcome}`);
    return outcome;
  }

  private async supervise(): Promise<SessionOutcome> {
    const { startupTimeoutMs } = this.options;
    while (this.runner.appState !== 'running') {
      if (this.shutdownRequest.signal.aborted) return 'shutdown';
      if (this.runner.appState === 'terminated') return 'terminated';
      if (startupTimeoutMs !== undefined && this.elapsedMs() > startupTimeoutMs) {
        this.logger.error(`Dapp did not start within ${startupTimeoutMs} ms`);
        return 'timeout';
      }
      if (!(await this.tick())) return 'shutdown';
    }
    this.logger.info('Dapp is running');

    for (;;) {
      if (this.shutdownRequest.signal.aborted) return 'shutdown';
      if (this.runner.appState === 'terminated') return 'terminated';
      if (this.runningTimeElapsed) {
        this.logger.info(`Maximum running time of ${this.options.maxRunningTimeMs} ms elapsed`);
        return 'elapsed';
      }
      if (!(await this.tick())) return 'shutdown';
    }
  }

  /** Resolves false when a shutdown arrives before the interval ends. */
  private async tick(): Promise<boolean> {
    try {
      await delay(this.options.pollIntervalMs ?? 1000, undefined, { signal: this.shutdownRequest.signal });
      return true;
    } catch (err) {
      if (this.shutdownRequest.signal.aborted) return false;
      throw err;
    }
  }

  private async teardown(): Promise<void> {
    if (this.abandonRequest.signal.aborted) return;
    const abandoned = new Promise<void>((resolve) => {
      this.abandonRequest.signal.addEventListener('abort', () => resolve(), { once: true });
    });
    const stopped = this.runner.stop().catch((err: unknown) => {
      this.logger.error('Failed to stop the dapp', { error: err instanceof Error ? err.message : String(err) });
    });
    await Promise.race([stopped, abandoned]);
  }

  private elapsedMs(): number {
    return this.startedAt ? Date.now() - this.startedAt.getTime() : 0;
  }
}

export type SignalSource = {
  on(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
  off(event: 'SIGINT' | 'SIGTERM', listener: () => void): unknown;
};

/** Route SIGINT and SIGTERM to the session's shutdown. Returns an unbind function. */
export function bindProcessSignals(session: RunnerSession, target: SignalSource = process): () => void {
  const onSignal = () => session.shutdown();
  target.on('SIGINT', onSignal);
  target.on('SIGTERM', onSignal);
  return () => {
    target.off('SIGINT', onSignal);
    target.off('SIGTERM', onSignal);
  };
}
