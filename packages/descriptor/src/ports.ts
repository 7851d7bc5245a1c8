import { z } from 'zod';

import { runtimeField } from './gaom/runtime';

const portNumber = z.number().int().min(1).max(65535);

export const portMappingSchema = z
  .object({
    remote_port: portNumber,
    local_port: portNumber.optional(),
    address: runtimeField(z.string().optional()),
  })
  .strict();

export type PortMapping = z.infer<typeof portMappingSchema>;

const PORT_RE = /^\s*(?:(\d+)\s*:\s*)?(\d+)\s*$/;

/**
 * Parse the port shorthand: `"remotePort"` or `"localPort:remotePort"`.
 * Returns `undefined` when the string does not match either form.
 */
export function parsePortMapping(value: string): PortMapping | undefined {
  const match = PORT_RE.exec(value);
  if (!match) return undefined;
  const [, local, remote] = match;
  return local === undefined
    ? { remote_port: Number(remote) }
    : { remote_port: Number(remote), local_port: Number(local) };
}

export const portMappingInputSchema = z.preprocess((value, ctx) => {
  if (typeof value === 'number') return { remote_port: value };
  if (typeof value !== 'string') return value;
  const parsed = parsePortMapping(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid port mapping \`${value}\`, expected "remotePort" or "localPort:remotePort"`,
    });
    return { remote_port: 1 };
  }
  return parsed;
}, portMappingSchema);

export const proxySchema = z
  .object({
    ports: z.array(portMappingInputSchema).min(1),
  })
  .strict();

export type ProxyDescriptor = z.infer<typeof proxySchema>;
