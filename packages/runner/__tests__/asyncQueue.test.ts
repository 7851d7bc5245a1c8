import { describe, expect, it } from 'vitest';

import { AsyncQueue, isAbortError } from '../src';

describe('AsyncQueue', () => {
  it('hands out items in insertion order', async () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);

    expect(await queue.get()).toBe(1);
    expect(await queue.get()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it('resolves a waiting consumer on put', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.get();
    queue.put('state');

    await expect(pending).resolves.toBe('state');
  });

  it('rejects a waiting consumer when its signal aborts', async () => {
    const queue = new AsyncQueue<string>();
    const controller = new AbortController();
    const pending = queue.get(controller.signal);
    controller.abort();

    const error = await pending.catch((err: unknown) => err);
    expect(isAbortError(error)).toBe(true);

    queue.put('late');
    expect(queue.drain()).toEqual(['late']);
  });

  it('keeps serving queued items after an abort', async () => {
    const queue = new AsyncQueue<number>();
    const controller = new AbortController();
    queue.put(7);
    controller.abort();

    expect(await queue.get(controller.signal)).toBe(7);
    await expect(queue.get(controller.signal)).rejects.toThrow();
  });
});
