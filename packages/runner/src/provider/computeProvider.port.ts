import type { CommandDescriptor, NetworkDescriptor, PayloadDescriptor } from '@dapp-runner/descriptor';

export type NetworkHandle = {
  networkId: string;
  ip: string;
  ownerIp?: string;
  mask?: string;
  gateway?: string;
  state?: string;
};

export type NetworkBinding = {
  name: string;
  networkId: string;
  /** Explicit address requested for the replica, if the node lists `ip`. */
  ip?: string;
};

export type InstanceRequest = {
  node: string;
  replica: number;
  payloadName: string;
  payload: PayloadDescriptor;
  network?: NetworkBinding;
};

export type AttachRequest = {
  node: string;
  replica: number;
  agreementId: string;
  activityId: string;
  providerId?: string;
  network?: NetworkBinding;
};

export type ProviderActivity = {
  agreementId: string;
  activityId: string;
  providerId: string;
  providerName?: string;
  networkNode?: { ip: string; nodeId: string };
};

export type BatchHandle = {
  batchId: string;
  activityId: string;
};

export type CommandResult = {
  index: number;
  command: string;
  success: boolean;
  stdout: string | null;
  stderr: string | null;
  message?: string;
};

export type ProxyTarget = {
  host: string;
  port: number;
};

/**
 * Everything the runner needs from the compute marketplace: negotiation,
 * payments and tunnelling stay behind this port.
 */
export interface ComputeProvider {
  createNetwork(name: string, network: NetworkDescriptor): Promise<NetworkHandle>;
  /** Rebind a network created by an earlier (suspended) run. */
  attachNetwork(name: string, networkId: string, network: NetworkDescriptor): Promise<NetworkHandle>;
  removeNetwork(networkId: string): Promise<void>;
  instantiate(request: InstanceRequest, signal: AbortSignal): Promise<ProviderActivity>;
  /** Re-attach to an activity that survived a suspend. */
  attach(request: AttachRequest, signal: AbortSignal): Promise<ProviderActivity>;
  submit(activityId: string, commands: CommandDescriptor[]): Promise<BatchHandle>;
  /** Resolves with one result per command; rejects when the batch fails remotely. */
  awaitBatch(batch: BatchHandle, signal: AbortSignal): Promise<CommandResult[]>;
  /** Resolves once the activity has ended on the provider side. */
  waitForTermination(activityId: string, signal: AbortSignal): Promise<void>;
  terminate(activityId: string): Promise<void>;
  connect(activityId: string, remotePort: number): Promise<ProxyTarget>;
}
