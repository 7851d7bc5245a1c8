import { z } from 'zod';

import { descriptorMapSchema, isPlainObject, isStringList, type DescriptorMap } from './values';

export const CMD_RUN = 'run';

export type CommandDescriptor = {
  cmd: string;
  params: DescriptorMap;
};

export class CommandShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandShapeError';
  }
}

const runCommand = (args: string[]): { cmd: string; params: { args: string[] } } => ({
  cmd: CMD_RUN,
  params: { args },
});

function fromVerbMap(entry: Record<string, unknown>, index: number): { cmd: string; params: unknown } {
  const verbs = Object.keys(entry).filter((key) => entry[key] !== undefined);
  if (verbs.length !== 1) {
    throw new CommandShapeError(
      verbs.length
        ? `Command [${index}] must name exactly one verb, got: ${verbs.join(', ')}`
        : `Command [${index}] is empty`,
    );
  }
  const [cmd] = verbs;
  const params = entry[cmd];
  if (isStringList(params)) return { cmd, params: { args: params } };
  if (params === null) return { cmd, params: {} };
  if (isPlainObject(params)) return { cmd, params };
  throw new CommandShapeError(`Command [${index}] \`${cmd}\` has invalid params`);
}

/**
 * Canonicalize the three accepted command list forms:
 *
 * - a flat argv list: `["/bin/echo", "hi"]` (a single `run`),
 * - a list of argv lists: `[["/bin/echo", "a"], ["run", "/bin/echo", "b"]]`
 *   (a leading `run` verb is dropped from the argv),
 * - a list of single-verb maps: `[{ run: ["/bin/echo"] }, { deploy: { kwargs: {} } }]`.
 */
export function canonicalizeCommands(value: unknown): Array<{ cmd: string; params: unknown }> {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new CommandShapeError('Command list must be a list');
  if (value.length === 0) return [];
  if (isStringList(value)) return [runCommand(value)];

  return value.map((entry: unknown, index) => {
    if (typeof entry === 'string') {
      throw new CommandShapeError(`Command [${index}] mixes a bare argument with command entries`);
    }
    if (isStringList(entry)) return runCommand(entry[0] === CMD_RUN ? entry.slice(1) : entry);
    if (isPlainObject(entry)) return fromVerbMap(entry, index);
    throw new CommandShapeError(`Command [${index}] has an unsupported shape`);
  });
}

export const commandSchema = z
  .object({
    cmd: z.string().min(1),
    params: descriptorMapSchema,
  })
  .strict()
  .superRefine((command, ctx) => {
    if (command.cmd === CMD_RUN && !isStringList(command.params.args)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '`run` requires `args` given as a list of strings',
        path: ['params', 'args'],
      });
    }
  });

export const commandListSchema = z.preprocess((value, ctx) => {
  try {
    return canonicalizeCommands(value);
  } catch (err) {
    if (!(err instanceof CommandShapeError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
    return [];
  }
}, z.array(commandSchema));

/** Serialized (verb map) form, accepted back by the loader. */
export const serializeCommand = (command: CommandDescriptor): DescriptorMap => ({
  [command.cmd]: command.params,
});
