import { setTimeout as delay } from 'node:timers/promises';

import type { CommandDescriptor, Dapp, SerializedDapp } from '@dapp-runner/descriptor';

import { variantOf, type DappInstance, type InstanceState, type InstanceVariant } from '../instance/dappInstance';
import { InstanceGroup } from '../instance/instanceGroup';
import { AsyncQueue } from '../lib/asyncQueue';
import { PortAllocator, type PortProbe } from '../lib/portAllocator';
import { TaskSet } from '../lib/taskSet';
import type { CommandResult, ComputeProvider, NetworkHandle } from '../provider/computeProvider.port';
import type { BlacklistOnFailure } from '../provider/strategy';
import { LocalHttpProxy } from '../proxy/localHttpProxy';
import type { LocalProxy } from '../proxy/localProxy';
import { LocalTcpProxy } from '../proxy/localTcpProxy';
import type { RunnerConfig } from '../service/config';
import type { LoggerService } from '../service/logger.service';
import { computeAppState, type AppState, type DesiredState } from './appState';
import { RunnerError, RunnerErrors } from './runner.error';

export type RunnerStateSnapshot = {
  nodes: Record<string, Record<number, InstanceState>>;
  app: AppState;
  timestamp: string;
};

export type CommandResultsMessage = Record<string, Record<number, CommandResult[]>>;
export type ProxyAddressMessage = Record<string, { local_proxy_address: string }>;
export type RunnerDataMessage = CommandResultsMessage | ProxyAddressMessage;

export type RunnerCommand = {
  node: string;
  /** Replica index; every replica of the node when absent. */
  index?: number;
  commands: CommandDescriptor[];
};

export type RunnerOptions = {
  dapp: Dapp;
  provider: ComputeProvider;
  logger: LoggerService;
  /** Offer-scoring wrapper that learns about failed providers. */
  strategy?: BlacklistOnFailure;
  config?: Partial<Pick<RunnerConfig, 'pollIntervalMs' | 'portRangeStart' | 'portRangeEnd'>>;
  portProbe?: PortProbe;
  /** Interface the local proxies bind to. */
  proxyHost?: string;
};

type ProxyVariant = Exclude<InstanceVariant, { kind: 'plain' }>;

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_PROXY_HOST = '127.0.0.1';

/**
 * Drives a dapp through its lifecycle: networks first, then node instances
 * in dependency order, local proxies once their node runs. State, data and
 * command traffic flows through the three public queues.
 */
export class Runner {
  readonly stateQueue = new AsyncQueue<RunnerStateSnapshot>();
  readonly dataQueue = new AsyncQueue<RunnerDataMessage>();
  readonly commandQueue = new AsyncQueue<RunnerCommand>();

  readonly dapp: Dapp;
  private readonly provider: ComputeProvider;
  private readonly strategy?: BlacklistOnFailure;
  private readonly logger: LoggerService;
  private readonly pollIntervalMs: number;
  private readonly proxyHost: string;

  private desired: DesiredState = 'pending';
  private startupFinished = false;
  private readonly groups = new Map<string, InstanceGroup>();
  private readonly networkHandles = new Map<string, NetworkHandle>();
  private readonly proxies: LocalProxy[] = [];
  private ports?: PortAllocator;
  private lastSnapshot?: string;
  private starting?: Promise<void>;
  private suspending?: Promise<SerializedDapp>;
  private stopping?: Promise<void>;

  private readonly control: TaskSet;
  private readonly router: TaskSet;
  private readonly listeners: TaskSet;
  private readonly teardown: TaskSet;

  constructor(private readonly options: RunnerOptions) {
    this.dapp = options.dapp;
    this.provider = options.provider;
    this.strategy = options.strategy;
    this.logger = options.logger;
    this.pollIntervalMs = options.config?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.proxyHost = options.proxyHost ?? DEFAULT_PROXY_HOST;
    this.control = new TaskSet(this.logger);
    this.router = new TaskSet(this.logger);
    this.listeners = new TaskSet(this.logger);
    this.teardown = new TaskSet(this.logger);
  }

  get desiredState(): DesiredState {
    return this.desired;
  }

  get appState(): AppState {
    const nodes: Record<string, InstanceState[]> = {};
    for (const [name, group] of this.groups) nodes[name] = group.states;
    return computeAppState({
      desired: this.desired,
      startupFinished: this.startupFinished,
      declaredNodes: this.dapp.nodeCount,
      nodes,
    });
  }

  instanceGroup(node: string): InstanceGroup | undefined {
    return this.groups.get(node);
  }

  async start(): Promise<void> {
    if (this.desired !== 'pending') throw new RunnerError(`Runner cannot start from the ${this.desired} state`);
    this.desired = 'running';
    this.emitState();
    this.starting = this.bringUp();
    await this.starting;
  }

  private async bringUp(): Promise<void> {
    const { config, portProbe } = this.options;
    this.ports = new PortAllocator({
      rangeStart: config?.portRangeStart,
      rangeEnd: config?.portRangeEnd,
      probe: portProbe,
    });
    for (const node of Object.values(this.dapp.nodes)) {
      for (const mapping of [...(node.http_proxy?.ports ?? []), ...(node.tcp_proxy?.ports ?? [])]) {
        if (mapping.local_port !== undefined) this.ports.reserve(mapping.local_port);
      }
    }

    await this.startNetworks();
    // stop() or suspend() arrived while the networks were coming up
    if (this.desired !== 'running') return;

    void this.router.spawn('command-router', (signal) => this.routeCommands(signal));
    void this.control.spawn('startup', (signal) => this.startup(signal));
    for (const [name, node] of Object.entries(this.dapp.nodes)) {
      const variant = variantOf(node);
      if (variant.kind === 'plain') continue;
      void this.control.spawn(`proxy:${name}`, (signal) => this.serveProxies(name, variant, signal));
    }
  }

  /**
   * Terminate every instance and release local and remote resources.
   * Idempotent. A suspended runner only drops its local state, leaving the
   * remote activities and networks for a resume.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  /**
   * Detach from the running dapp without terminating remote activities.
   * Returns the descriptor with runtime ids, loadable for a later resume.
   */
  async suspend(): Promise<SerializedDapp> {
    if (this.stopping) throw new RunnerError('Runner is stopping and cannot be suspended');
    this.suspending ??= this.detach();
    return this.suspending;
  }

  private async detach(): Promise<SerializedDapp> {
    this.desired = 'suspended';
    this.emitState();
    await this.settleStart();

    await this.control.cancel();
    await this.closeProxies();
    await Promise.all([...this.groups.values()].map((group) => group.suspend()));
    await this.router.cancel();
    await this.listeners.cancel();
    this.emitState();
    return this.dapp.toJSON();
  }

  private async shutdown(): Promise<void> {
    if (this.suspending) {
      await this.suspending;
      this.logger.info('Runner detached from the suspended dapp');
      return;
    }
    this.desired = 'terminated';
    this.emitState();
    await this.settleStart();

    await this.control.cancel();
    for (const group of this.groups.values()) {
      void this.teardown.spawn(`stop:${group.node}`, () => group.stop());
    }
    await this.closeProxies();
    await this.teardown.wait();
    await this.removeNetworks();

    await this.router.cancel();
    await this.listeners.cancel();
    this.emitState();
    this.logger.info('Runner stopped');
  }

  /** Wait for an in-flight start; its failure was already reported to the caller of start(). */
  private async settleStart(): Promise<void> {
    try {
      await this.starting;
    } catch (err) {
      this.logger.warn('Runner start did not complete', { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async startNetworks(): Promise<void> {
    for (const [name, network] of Object.entries(this.dapp.networks)) {
      if (this.desired !== 'running') return;
      const handle =
        network.network_id !== undefined
          ? await this.provider.attachNetwork(name, network.network_id, network)
          : await this.provider.createNetwork(name, network);
      this.networkHandles.set(name, handle);
      network.network_id = handle.networkId;
      network.ip = handle.ip;
      network.owner_ip = handle.ownerIp ?? network.owner_ip;
      network.mask = handle.mask ?? network.mask;
      network.gateway = handle.gateway ?? network.gateway;
      network.state = handle.state ?? network.state;
      this.logger.info(`Network ${name} ready`, { networkId: handle.networkId, ip: handle.ip });
    }
  }

  private async removeNetworks(): Promise<void> {
    for (const [name, handle] of this.networkHandles) {
      try {
        await this.provider.removeNetwork(handle.networkId);
      } catch (err) {
        this.logger.error(`Failed to remove network ${name}`, { networkId: handle.networkId, error: String(err) });
      }
    }
    this.networkHandles.clear();
  }

  private async startup(signal: AbortSignal): Promise<void> {
    try {
      for (const name of this.dapp.nodesPrioritized()) {
        await this.waitForDependencies(name, signal);
        this.startGroup(name);
      }
    } catch (err) {
      if (err instanceof RunnerError) {
        this.logger.error(`Startup aborted: ${err.message}`, { node: err.node });
        return;
      }
      throw err;
    }
    this.startupFinished = true;
    this.emitState();
  }

  private async waitForDependencies(name: string, signal: AbortSignal): Promise<void> {
    const dependencies = this.dapp.graph.dependenciesOf(name);
    while (!dependencies.every((dep) => this.groups.get(dep)?.hasRunningInstance())) {
      await delay(this.pollIntervalMs, undefined, { signal });
    }
  }

  private startGroup(name: string): void {
    const node = this.dapp.node(name);
    if (!node) throw RunnerErrors.unknownNode(name);

    let network: { name: string; networkId: string } | undefined;
    if (node.network !== undefined) {
      const handle = this.networkHandles.get(node.network);
      if (!handle) throw RunnerErrors.undefinedNetwork(name, node.network);
      network = { name: node.network, networkId: handle.networkId };
    }

    const group = InstanceGroup.create({
      node: name,
      dapp: this.dapp,
      provider: this.provider,
      logger: this.logger,
      network,
    });
    this.groups.set(name, group);
    for (const instance of group.instances) this.listen(instance);
    group.start();
    this.logger.info(`Node ${name} started`, { replicas: group.instances.length });
    this.emitState();
  }

  private listen(instance: DappInstance): void {
    void this.listeners.spawn(`state:${instance.label}`, async (signal) => {
      for (;;) {
        const state = await instance.stateQueue.get(signal);
        this.onInstanceState(instance, state);
      }
    });
    void this.listeners.spawn(`data:${instance.label}`, async (signal) => {
      for (;;) {
        const results = await instance.dataQueue.get(signal);
        this.dataQueue.put({ [instance.node]: { [instance.replica]: results } });
      }
    });
  }

  private onInstanceState(instance: DappInstance, state: InstanceState): void {
    if (state === 'terminated' && this.desired === 'running') {
      const providerId = instance.activity?.providerId;
      if (providerId !== undefined && this.strategy) {
        this.strategy.blacklist(providerId);
        this.logger.warn(`Blacklisting provider ${providerId} after ${instance.label} failed`);
      }
    }
    this.emitState();
  }

  private async routeCommands(signal: AbortSignal): Promise<void> {
    for (;;) {
      const message = await this.commandQueue.get(signal);
      const group = this.groups.get(message.node);
      if (!group) {
        this.logger.warn(`Command for unknown node ${message.node} dropped`);
        continue;
      }
      const targets =
        message.index === undefined
          ? group.instances
          : group.instances.filter((instance) => instance.replica === message.index);
      if (targets.length === 0) {
        this.logger.warn(`Command for unknown replica ${message.node}[${message.index}] dropped`);
        continue;
      }
      for (const instance of targets) instance.commandQueue.put(message.commands);
    }
  }

  private async serveProxies(name: string, variant: ProxyVariant, signal: AbortSignal): Promise<void> {
    const activity = (await this.runningPrimary(name, signal))?.activity;
    const ports = this.ports;
    if (!activity || !ports) return;

    for (const mapping of variant.proxy.ports) {
      const port = mapping.local_port ?? (await ports.next());
      const target = await this.provider.connect(activity.activityId, mapping.remote_port);
      if (signal.aborted) return;
      const proxy =
        variant.kind === 'http_proxy' ? new LocalHttpProxy(target, this.logger) : new LocalTcpProxy(target, this.logger);
      const address = await proxy.listen(port, this.proxyHost);
      this.proxies.push(proxy);
      mapping.local_port = port;
      mapping.address = address;
      this.logger.info(`Local ${variant.kind} for ${name} listening`, { address, remotePort: mapping.remote_port });
      this.dataQueue.put({ [name]: { local_proxy_address: address } });
    }
  }

  private async runningPrimary(name: string, signal: AbortSignal): Promise<DappInstance | undefined> {
    for (;;) {
      const instance = this.groups.get(name)?.instance(0);
      if (instance?.state === 'running') return instance;
      if (instance?.state === 'terminated') {
        this.logger.warn(`Node ${name} terminated before its local proxy could start`);
        return undefined;
      }
      await delay(this.pollIntervalMs, undefined, { signal });
    }
  }

  private async closeProxies(): Promise<void> {
    const proxies = this.proxies.splice(0, this.proxies.length);
    await Promise.all(proxies.map((proxy) => proxy.close()));
  }

  private emitState(): void {
    const nodes: Record<string, Record<number, InstanceState>> = {};
    for (const [name, group] of this.groups) {
      nodes[name] = Object.fromEntries(group.instances.map((instance) => [instance.replica, instance.state]));
    }
    const app = this.appState;
    const key = JSON.stringify({ nodes, app });
    if (key === this.lastSnapshot) return;
    this.lastSnapshot = key;
    this.stateQueue.put({ nodes, app, timestamp: new Date().toISOString() });
  }
}
