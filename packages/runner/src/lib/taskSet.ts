import type { LoggerService } from '../service/logger.service';
import { isAbortError } from './asyncQueue';

export type TaskFn = (signal: AbortSignal) => Promise<void>;

type RunningTask = {
  name: string;
  controller: AbortController;
  done: Promise<void>;
};

/**
 * A set of cancellable background tasks. Failures are logged, never
 * rethrown; an abort raised after cancellation counts as a clean exit.
 */
export class TaskSet {
  private readonly tasks = new Set<RunningTask>();

  constructor(private readonly logger: LoggerService) {}

  get size(): number {
    return this.tasks.size;
  }

  spawn(name: string, fn: TaskFn): Promise<void> {
    const task: RunningTask = { name, controller: new AbortController(), done: Promise.resolve() };
    this.tasks.add(task);
    task.done = this.run(task, fn);
    return task.done;
  }

  /** Wait for every task running now to finish on its own. */
  async wait(): Promise<void> {
    await Promise.all([...this.tasks].map((task) => task.done));
  }

  private async run(task: RunningTask, fn: TaskFn): Promise<void> {
    const { signal } = task.controller;
    try {
      await fn(signal);
    } catch (err) {
      if (signal.aborted && isAbortError(err)) return;
      this.logger.error(`Task ${task.name} failed`, { error: err instanceof Error ? err.message : String(err) });
    } finally {
      this.tasks.delete(task);
    }
  }

  /** Abort every task and wait for all of them to exit. */
  async cancel(): Promise<void> {
    const tasks = [...this.tasks];
    for (const task of tasks) task.controller.abort();
    await Promise.all(tasks.map((task) => task.done));
  }
}
