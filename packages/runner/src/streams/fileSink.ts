import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';

import type { StreamSink } from './runnerStreamer';

export type FileSink = StreamSink & {
  write(line: string): Promise<void>;
  close(): Promise<void>;
};

/** Opens `path` for writing, truncating whatever it held. */
export async function openFileSink(path: string): Promise<FileSink> {
  const stream = createWriteStream(path, { flags: 'w', encoding: 'utf8' });
  await once(stream, 'open');
  return {
    async write(line: string) {
      if (!stream.write(line)) await once(stream, 'drain');
    },
    async close() {
      stream.end();
      await finished(stream);
    },
  };
}
