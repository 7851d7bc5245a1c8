import { appendFile, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { AsyncQueue, LoggerService, TaskSet, feedFromFile, parseCommandMessage, type RunnerCommand } from '../src';

describe('parseCommandMessage', () => {
  it('canonicalizes argv list commands', () => {
    expect(parseCommandMessage('{"node": "http", "index": 0, "commands": [["/bin/ls", "-la"]]}')).toEqual({
      node: 'http',
      index: 0,
      commands: [{ cmd: 'run', params: { args: ['/bin/ls', '-la'] } }],
    });
  });

  it('accepts verb maps and a missing index', () => {
    expect(parseCommandMessage('{"node": "db", "commands": [{"run": ["/bin/date"]}]}')).toEqual({
      node: 'db',
      commands: [{ cmd: 'run', params: { args: ['/bin/date'] } }],
    });
  });

  it('rejects unknown keys', () => {
    expect(() => parseCommandMessage('{"node": "db", "commands": [], "replica": 1}')).toThrow(
      'Invalid command message: Unexpected keys: `replica`',
    );
  });
});

describe('feedFromFile', () => {
  let dir: string;
  const tasks = new TaskSet(LoggerService.silent());

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dapp-runner-feed-'));
  });

  afterEach(async () => {
    await tasks.cancel();
    await rm(dir, { recursive: true, force: true });
  });

  it('enqueues complete lines as they are appended and skips bad ones', async () => {
    const path = join(dir, 'commands');
    await writeFile(path, '{"node": "db", "commands": [["/bin/ls"]]}\n');
    const queue = new AsyncQueue<RunnerCommand>();
    const logger = LoggerService.silent();
    const warn = vi.spyOn(logger, 'warn');

    void tasks.spawn('feed', (signal) =>
      feedFromFile(queue, path, { parse: parseCommandMessage, signal, logger, intervalMs: 5 }),
    );
    await vi.waitFor(() => expect(queue.size).toBe(1));

    await appendFile(path, 'not json\n{"node": "http", "commands": [["/bin/da');
    await appendFile(path, 'te"]]}\n');
    await vi.waitFor(() => expect(queue.size).toBe(2));

    expect(queue.drain()).toEqual([
      { node: 'db', commands: [{ cmd: 'run', params: { args: ['/bin/ls'] } }] },
      { node: 'http', commands: [{ cmd: 'run', params: { args: ['/bin/date'] } }] },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
