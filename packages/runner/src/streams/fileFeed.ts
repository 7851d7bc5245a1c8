import { open } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import { setTimeout as delay } from 'node:timers/promises';

import type { AsyncQueue } from '../lib/asyncQueue';
import type { LoggerService } from '../service/logger.service';

export type FileFeedOptions<T> = {
  parse: (line: string) => T;
  signal: AbortSignal;
  logger: LoggerService;
  /** Delay between reads once the end of the file is reached. */
  intervalMs?: number;
};

const CHUNK_SIZE = 64 * 1024;

/**
 * Tail `path`, enqueueing every complete, non-blank line. Lines that fail to
 * parse are logged and skipped. The file is created when missing. Runs until
 * the signal aborts.
 */
export async function feedFromFile<T>(queue: AsyncQueue<T>, path: string, options: FileFeedOptions<T>): Promise<void> {
  const { parse, signal, logger } = options;
  const intervalMs = options.intervalMs ?? 1000;
  const handle = await open(path, 'a+');
  const buffer = Buffer.alloc(CHUNK_SIZE);
  const decoder = new StringDecoder('utf8');
  let position = 0;
  let pending = '';

  try {
    for (;;) {
      signal.throwIfAborted();
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
      if (bytesRead === 0) {
        await delay(intervalMs, undefined, { signal });
        continue;
      }
      position += bytesRead;
      pending += decoder.write(buffer.subarray(0, bytesRead));
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';

      for (const raw of lines) {
        const line = raw.trim();
        if (!line) continue;
        try {
          queue.put(parse(line));
        } catch (err) {
          logger.warn(`Skipping unreadable line in ${path}`, {
            line,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }
  } finally {
    await handle.close();
  }
}
