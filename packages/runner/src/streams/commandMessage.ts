import { z } from 'zod';

import { commandListSchema, parseWith } from '@dapp-runner/descriptor';

import type { RunnerCommand } from '../runner/runner';

const commandMessageSchema = z
  .object({
    node: z.string().min(1),
    index: z.number().int().min(0).optional(),
    commands: commandListSchema,
  })
  .strict();

/**
 * Parse one line of the command stream, e.g.
 * `{"node": "http", "index": 0, "commands": [["/bin/ls", "-la"]]}`.
 * Commands take any of the descriptor's command list forms.
 */
export function parseCommandMessage(line: string): RunnerCommand {
  const value: unknown = JSON.parse(line);
  return parseWith('command message', commandMessageSchema, value);
}
