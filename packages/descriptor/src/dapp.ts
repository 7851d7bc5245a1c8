import { serializeCommand } from './commands';
import {
  CAPS_MANIFEST_SUPPORT,
  CAPS_VPN,
  DEFAULT_NETWORK_NAME,
  PAYLOAD_CAPS_PARAM,
  PAYLOAD_RUNTIME_VM_MANIFEST,
  VM_RUNTIMES,
  dappSchema,
  networkSchema,
  type DappMeta,
  type DappTree,
  type NetworkDescriptor,
  type NodeDescriptor,
  type PayloadDescriptor,
} from './dapp.schema';
import { DependencyGraph } from './dependency.graph';
import { Errors, ValidationError } from './errors';
import { interpolateValue } from './gaom/interpolate';
import { lookup } from './gaom/lookup';
import { parseWith } from './validation';
import { isStringList, type DescriptorMap, type DescriptorValue } from './values';

export type SerializedNode = Omit<NodeDescriptor, 'init'> & { init: DescriptorMap[] };

export type SerializedDapp = Omit<DappTree, 'nodes'> & { nodes: Record<string, SerializedNode> };

export class Dapp {
  constructor(
    readonly tree: DappTree,
    readonly graph: DependencyGraph,
  ) {}

  get payloads(): Record<string, PayloadDescriptor> {
    return this.tree.payloads;
  }

  get nodes(): Record<string, NodeDescriptor> {
    return this.tree.nodes;
  }

  get networks(): Record<string, NetworkDescriptor> {
    return this.tree.networks;
  }

  get meta(): DappMeta {
    return this.tree.meta;
  }

  get nodeCount(): number {
    return Object.keys(this.tree.nodes).length;
  }

  node(name: string): NodeDescriptor | undefined {
    return this.tree.nodes[name];
  }

  /** Startup order: every node after all of its dependencies. */
  nodesPrioritized(): string[] {
    return this.graph.prioritized();
  }

  lookup(path: string, isRuntime = false): unknown {
    return lookup(this.tree, path, isRuntime);
  }

  interpolate(value: DescriptorMap, isRuntime?: boolean): DescriptorMap;
  interpolate(value: DescriptorValue, isRuntime?: boolean): DescriptorValue;
  interpolate(value: DescriptorValue, isRuntime = false): DescriptorValue {
    return interpolateValue(value, (path) => this.lookup(path, isRuntime));
  }

  /** Loader-compatible form, runtime fields included. */
  toJSON(): SerializedDapp {
    const tree = structuredClone(this.tree);
    const nodes: Record<string, SerializedNode> = {};
    for (const [name, node] of Object.entries(tree.nodes)) {
      nodes[name] = { ...node, init: node.init.map(serializeCommand) };
    }
    return { ...tree, nodes };
  }
}

function addCapability(payloadName: string, payload: PayloadDescriptor, capability: string): void {
  const current = payload.params[PAYLOAD_CAPS_PARAM];
  if (current === undefined) {
    payload.params[PAYLOAD_CAPS_PARAM] = [capability];
    return;
  }
  if (!isStringList(current)) {
    const path = `payloads.${payloadName}.params.${PAYLOAD_CAPS_PARAM}`;
    throw new ValidationError({
      subject: 'dapp descriptor',
      issues: [`\`${path}\`: Expected a list of strings`],
      unexpectedKeys: [],
      missingKeys: [],
    });
  }
  if (!current.includes(capability)) current.push(capability);
}

function checkReferences(tree: DappTree): void {
  for (const [name, node] of Object.entries(tree.nodes)) {
    if (!Object.hasOwn(tree.payloads, node.payload)) throw Errors.undefinedPayload(name, node.payload);
    if (node.network !== undefined && !Object.hasOwn(tree.networks, node.network)) {
      throw Errors.undefinedNetwork(name, node.network);
    }
  }
}

/**
 * Derive implicit configuration in place: the default network for proxy
 * nodes, `vpn` for networked VM payloads and `manifest-support` for
 * manifest payloads. Safe to apply repeatedly.
 */
export function applyImplicitDefaults(tree: DappTree): DappTree {
  for (const node of Object.values(tree.nodes)) {
    if ((node.http_proxy || node.tcp_proxy) && !node.network) {
      node.network = DEFAULT_NETWORK_NAME;
      if (!Object.hasOwn(tree.networks, DEFAULT_NETWORK_NAME)) {
        tree.networks[DEFAULT_NETWORK_NAME] = networkSchema.parse({});
      }
    }
  }

  for (const node of Object.values(tree.nodes)) {
    const payload = tree.payloads[node.payload];
    if (node.network && payload && VM_RUNTIMES.includes(payload.runtime)) {
      addCapability(node.payload, payload, CAPS_VPN);
    }
  }

  for (const [name, payload] of Object.entries(tree.payloads)) {
    if (payload.runtime === PAYLOAD_RUNTIME_VM_MANIFEST) addCapability(name, payload, CAPS_MANIFEST_SUPPORT);
  }
  return tree;
}

/**
 * Load a dapp descriptor tree. Every failure surfaces here, before anything
 * remote is touched; the caller's input is never mutated.
 */
export function loadDapp(input: unknown): Dapp {
  const tree = parseWith('dapp descriptor', dappSchema, input);
  checkReferences(tree);
  applyImplicitDefaults(tree);
  const graph = DependencyGraph.build(
    Object.fromEntries(Object.entries(tree.nodes).map(([name, node]) => [name, node.depends_on])),
  );
  return new Dapp(tree, graph);
}
