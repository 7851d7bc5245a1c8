import type { CommandDescriptor, Dapp, NodeDescriptor, ProxyDescriptor } from '@dapp-runner/descriptor';

import { AsyncQueue, isAbortError } from '../lib/asyncQueue';
import { TaskSet } from '../lib/taskSet';
import type {
  AttachRequest,
  CommandResult,
  ComputeProvider,
  InstanceRequest,
  ProviderActivity,
} from '../provider/computeProvider.port';
import type { LoggerService } from '../service/logger.service';

export type InstanceState = 'pending' | 'starting' | 'running' | 'stopping' | 'terminated';

export type InstanceVariant =
  | { kind: 'plain' }
  | { kind: 'http_proxy'; proxy: ProxyDescriptor }
  | { kind: 'tcp_proxy'; proxy: ProxyDescriptor };

export function variantOf(node: NodeDescriptor): InstanceVariant {
  if (node.http_proxy) return { kind: 'http_proxy', proxy: node.http_proxy };
  if (node.tcp_proxy) return { kind: 'tcp_proxy', proxy: node.tcp_proxy };
  return { kind: 'plain' };
}

export type Commissioning =
  | { kind: 'instantiate'; request: InstanceRequest }
  | { kind: 'attach'; request: AttachRequest };

export type DappInstanceOptions = {
  node: string;
  replica: number;
  dapp: Dapp;
  provider: ComputeProvider;
  logger: LoggerService;
  commissioning: Commissioning;
  init: CommandDescriptor[];
  variant: InstanceVariant;
};

/**
 * One remote instance of a node. Runs init commands, then serves batches
 * from its command queue until cancelled or until the remote side fails.
 * State changes and command results are published on its own queues.
 */
export class DappInstance {
  readonly node: string;
  readonly replica: number;
  readonly variant: InstanceVariant;
  readonly stateQueue = new AsyncQueue<InstanceState>();
  readonly dataQueue = new AsyncQueue<CommandResult[]>();
  readonly commandQueue = new AsyncQueue<CommandDescriptor[]>();

  private currentState: InstanceState = 'pending';
  private activityHandle?: ProviderActivity;
  private readonly halt = new AbortController();
  private readonly tasks: TaskSet;
  private readonly logger: LoggerService;

  constructor(private readonly options: DappInstanceOptions) {
    this.node = options.node;
    this.replica = options.replica;
    this.variant = options.variant;
    this.logger = options.logger.child({ node: options.node, replica: options.replica });
    this.tasks = new TaskSet(this.logger);
    this.stateQueue.put(this.currentState);
  }

  get state(): InstanceState {
    return this.currentState;
  }

  get activity(): ProviderActivity | undefined {
    return this.activityHandle;
  }

  get label(): string {
    return `${this.node}[${this.replica}]`;
  }

  start(): void {
    void this.tasks.spawn(`instance:${this.label}`, (signal) => this.lifecycle(signal));
  }

  /** Cancel local tasks and terminate the remote activity. */
  async stop(): Promise<void> {
    await this.tasks.cancel();
    if (this.currentState === 'terminated') return;
    this.setState('stopping');
    const activity = this.activityHandle;
    if (activity) {
      try {
        await this.options.provider.terminate(activity.activityId);
      } catch (err) {
        this.logger.error('Failed to terminate activity', { activityId: activity.activityId, error: String(err) });
      }
    }
    this.setState('terminated');
  }

  /** Cancel local tasks, leaving the remote activity alive for a later attach. */
  async suspend(): Promise<void> {
    await this.tasks.cancel();
  }

  private async lifecycle(taskSignal: AbortSignal): Promise<void> {
    const signal = AbortSignal.any([taskSignal, this.halt.signal]);
    try {
      await this.run(signal);
    } catch (err) {
      if (signal.aborted && isAbortError(err)) return;
      throw err;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { provider } = this.options;
    const { commissioning } = this.options;
    this.setState('starting');

    let activity: ProviderActivity;
    try {
      activity =
        commissioning.kind === 'attach'
          ? await provider.attach(commissioning.request, signal)
          : await provider.instantiate(commissioning.request, signal);
    } catch (err) {
      if (signal.aborted) return;
      this.fail('instance could not be commissioned', err, false);
      return;
    }
    this.activityHandle = activity;
    this.bindRuntimeFields(activity);
    this.logger.info('Instance commissioned', { activityId: activity.activityId, providerId: activity.providerId });

    void this.tasks.spawn(`watch:${this.label}`, (watchSignal) => this.watchTermination(activity, watchSignal));

    if (commissioning.kind === 'instantiate' && this.options.init.length > 0) {
      if (!(await this.execute(this.options.init, signal))) return;
    }
    this.setState('running');

    for (;;) {
      const commands = await this.commandQueue.get(signal);
      if (!(await this.execute(commands, signal))) return;
    }
  }

  private async watchTermination(activity: ProviderActivity, taskSignal: AbortSignal): Promise<void> {
    const signal = AbortSignal.any([taskSignal, this.halt.signal]);
    try {
      await this.options.provider.waitForTermination(activity.activityId, signal);
    } catch (err) {
      if (signal.aborted) return;
      throw err;
    }
    if (!signal.aborted) this.fail('activity ended on the provider side', undefined, false);
  }

  /** Returns false when the batch failed and the instance is gone. */
  private async execute(commands: CommandDescriptor[], signal: AbortSignal): Promise<boolean> {
    const activity = this.activityHandle;
    if (!activity) return false;
    const { dapp, provider } = this.options;

    let results: CommandResult[];
    try {
      const batch = commands.map((command) => ({ cmd: command.cmd, params: dapp.interpolate(command.params, true) }));
      const handle = await provider.submit(activity.activityId, batch);
      results = await provider.awaitBatch(handle, signal);
    } catch (err) {
      if (signal.aborted) return false;
      this.fail('command batch failed', err, true);
      return false;
    }

    this.dataQueue.put(results);
    const failed = results.find((result) => !result.success);
    if (failed) {
      this.fail(`command \`${failed.command}\` failed`, failed.stderr ?? failed.message, true);
      return false;
    }
    return true;
  }

  private fail(reason: string, cause: unknown, release: boolean): void {
    if (this.currentState === 'terminated') return;
    this.logger.warn(`Instance ${this.label} failed: ${reason}`, {
      error: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
      providerId: this.activityHandle?.providerId,
    });
    this.halt.abort();
    this.setState('terminated');

    const activity = this.activityHandle;
    if (release && activity) {
      void this.tasks.spawn(`release:${this.label}`, async () => {
        await this.options.provider.terminate(activity.activityId);
      });
    }
  }

  private bindRuntimeFields(activity: ProviderActivity) {
    if (this.replica !== 0) return;
    const node = this.options.dapp.node(this.node);
    if (!node) return;
    node.agreement_id = activity.agreementId;
    node.activity_id = activity.activityId;
    node.provider_id = activity.providerId;
    node.provider_name = activity.providerName;
    if (activity.networkNode) {
      node.network_node = { ip: activity.networkNode.ip, node_id: activity.networkNode.nodeId };
    }
  }

  private setState(state: InstanceState) {
    if (this.currentState === state) return;
    this.currentState = state;
    this.stateQueue.put(state);
    if (this.replica === 0) {
      const node = this.options.dapp.node(this.node);
      if (node) node.state = state;
    }
  }
}
