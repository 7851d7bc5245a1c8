import { z } from 'zod';

import { commandListSchema } from './commands';
import { runtimeField } from './gaom/runtime';
import { proxySchema } from './ports';
import { descriptorMapSchema, descriptorValueSchema } from './values';

export const PAYLOAD_RUNTIME_VM = 'vm';
export const PAYLOAD_RUNTIME_VM_MANIFEST = 'vm/manifest';
export const VM_RUNTIMES: readonly string[] = [PAYLOAD_RUNTIME_VM, PAYLOAD_RUNTIME_VM_MANIFEST];

export const PAYLOAD_CAPS_PARAM = 'capabilities';
export const CAPS_VPN = 'vpn';
export const CAPS_MANIFEST_SUPPORT = 'manifest-support';

export const DEFAULT_NETWORK_NAME = 'default';
export const DEFAULT_NETWORK_IP = '192.168.0.0/24';

export const payloadSchema = z
  .object({
    runtime: z.string().min(1),
    params: descriptorMapSchema.default({}),
  })
  .strict();

export const networkNodeSchema = z
  .object({
    ip: z.string().optional(),
    node_id: z.string().optional(),
  })
  .strict();

export const nodeSchema = z
  .object({
    payload: z.string().min(1),
    init: commandListSchema.default([]),
    network: z.string().min(1).optional(),
    ip: z.array(z.string().min(1)).optional(),
    http_proxy: proxySchema.optional(),
    tcp_proxy: proxySchema.optional(),
    depends_on: z.array(z.string().min(1)).default([]),

    state: runtimeField(z.string().optional()),
    network_node: runtimeField(networkNodeSchema.optional()),
    agreement_id: runtimeField(z.string().optional()),
    activity_id: runtimeField(z.string().optional()),
    provider_id: runtimeField(z.string().optional()),
    provider_name: runtimeField(z.string().optional()),
  })
  .strict()
  .superRefine((node, ctx) => {
    if (node.http_proxy && node.tcp_proxy) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a node may declare either `http_proxy` or `tcp_proxy`, not both',
        path: ['tcp_proxy'],
      });
    }
  });

export const networkSchema = z
  .object({
    ip: z.string().min(1).default(DEFAULT_NETWORK_IP),
    owner_ip: z.string().optional(),
    mask: z.string().optional(),
    gateway: z.string().optional(),

    network_id: runtimeField(z.string().optional()),
    state: runtimeField(z.string().optional()),
  })
  .strict();

export const metaSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
  })
  .catchall(descriptorValueSchema);

export const dappSchema = z
  .object({
    payloads: z.record(z.string(), payloadSchema),
    nodes: z.record(z.string(), nodeSchema),
    networks: z.record(z.string(), networkSchema).default({}),
    meta: metaSchema.default({}),
  })
  .strict();

export type PayloadDescriptor = z.infer<typeof payloadSchema>;
export type NodeDescriptor = z.infer<typeof nodeSchema>;
export type NetworkDescriptor = z.infer<typeof networkSchema>;
export type NetworkNode = z.infer<typeof networkNodeSchema>;
export type DappMeta = z.infer<typeof metaSchema>;
export type DappTree = z.infer<typeof dappSchema>;
export type DappInput = z.input<typeof dappSchema>;
