import type { CommandDescriptor, NetworkDescriptor } from '@dapp-runner/descriptor';

import {
  AbortError,
  type AttachRequest,
  type BatchHandle,
  type CommandResult,
  type ComputeProvider,
  type InstanceRequest,
  type NetworkHandle,
  type ProviderActivity,
  type ProxyTarget,
} from '../../src';

type Ending = () => void;

/**
 * In-process marketplace: every call succeeds immediately unless told
 * otherwise or held, and every interaction is recorded for assertions.
 */
export class FakeComputeProvider implements ComputeProvider {
  readonly calls: string[] = [];
  readonly submitted: Array<{ activityId: string; commands: CommandDescriptor[] }> = [];
  readonly terminated: string[] = [];
  readonly removedNetworks: string[] = [];
  readonly failingNodes = new Set<string>();
  readonly targets = new Map<number, ProxyTarget>();
  /** Signal each activity's termination watch was given. */
  readonly watches = new Map<string, AbortSignal>();
  failCommand: (command: CommandDescriptor) => boolean = () => false;

  private sequence = 0;
  private batchSequence = 0;
  private readonly batches = new Map<string, CommandDescriptor[]>();
  private readonly endings = new Map<string, Ending>();
  private readonly held = new Map<string, Promise<void>>();

  /** Keep the call recorded as `call` pending until the returned release runs. */
  hold(call: string): () => void {
    let release: () => void = () => {};
    this.held.set(
      call,
      new Promise<void>((resolve) => {
        release = resolve;
      }),
    );
    return () => {
      this.held.delete(call);
      release();
    };
  }

  async createNetwork(name: string, network: NetworkDescriptor): Promise<NetworkHandle> {
    await this.record(`createNetwork:${name}`);
    return { networkId: `net-${name}`, ip: network.ip, state: 'ready' };
  }

  async attachNetwork(name: string, networkId: string, network: NetworkDescriptor): Promise<NetworkHandle> {
    this.calls.push(`attachNetwork:${name}`);
    return { networkId, ip: network.ip, state: 'ready' };
  }

  async removeNetwork(networkId: string): Promise<void> {
    this.removedNetworks.push(networkId);
  }

  async instantiate(request: InstanceRequest): Promise<ProviderActivity> {
    await this.record(`instantiate:${request.node}[${request.replica}]`);
    if (this.failingNodes.has(request.node)) throw new Error(`no offers for ${request.node}`);
    const n = this.sequence++;
    return {
      agreementId: `agreement-${n}`,
      activityId: `activity-${n}`,
      providerId: `provider-${request.node}-${request.replica}`,
      providerName: `testnet-${n}`,
      networkNode: request.network ? { ip: request.network.ip ?? `192.168.0.${n + 2}`, nodeId: `node-${n}` } : undefined,
    };
  }

  async attach(request: AttachRequest): Promise<ProviderActivity> {
    this.calls.push(`attach:${request.node}[${request.replica}]`);
    return {
      agreementId: request.agreementId,
      activityId: request.activityId,
      providerId: request.providerId ?? 'unknown',
    };
  }

  async submit(activityId: string, commands: CommandDescriptor[]): Promise<BatchHandle> {
    this.submitted.push({ activityId, commands });
    const batchId = `batch-${this.batchSequence++}`;
    this.batches.set(batchId, commands);
    return { batchId, activityId };
  }

  async awaitBatch(batch: BatchHandle): Promise<CommandResult[]> {
    const commands = this.batches.get(batch.batchId) ?? [];
    return commands.map((command, index) => {
      const success = !this.failCommand(command);
      return {
        index,
        command: command.cmd,
        success,
        stdout: success ? 'ok' : null,
        stderr: success ? null : 'exit code 1',
      };
    });
  }

  waitForTermination(activityId: string, signal: AbortSignal): Promise<void> {
    this.watches.set(activityId, signal);
    return new Promise((resolve, reject) => {
      const onAbort = () => reject(new AbortError());
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      this.endings.set(activityId, () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      });
    });
  }

  /** Simulate the provider ending an activity on its own. */
  endActivity(activityId: string): void {
    const end = this.endings.get(activityId);
    this.endings.delete(activityId);
    end?.();
  }

  private async record(call: string): Promise<void> {
    this.calls.push(call);
    await this.held.get(call);
  }

  async terminate(activityId: string): Promise<void> {
    this.terminated.push(activityId);
  }

  async connect(activityId: string, remotePort: number): Promise<ProxyTarget> {
    this.calls.push(`connect:${activityId}:${remotePort}`);
    return this.targets.get(remotePort) ?? { host: '127.0.0.1', port: remotePort };
  }
}
