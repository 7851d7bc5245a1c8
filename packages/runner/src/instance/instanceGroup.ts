import type { Dapp } from '@dapp-runner/descriptor';

import type { ComputeProvider, NetworkBinding } from '../provider/computeProvider.port';
import type { LoggerService } from '../service/logger.service';
import { RunnerErrors } from '../runner/runner.error';
import { DappInstance, variantOf, type Commissioning, type InstanceState } from './dappInstance';

export type InstanceGroupOptions = {
  node: string;
  dapp: Dapp;
  provider: ComputeProvider;
  logger: LoggerService;
  /** Network the node is attached to, already created. */
  network?: { name: string; networkId: string };
};

/** All replicas of one node. */
export class InstanceGroup {
  private constructor(
    readonly node: string,
    readonly instances: readonly DappInstance[],
  ) {}

  /**
   * One replica per explicit `ip` entry, otherwise one. Replica 0 re-attaches
   * when the node still carries the ids of a suspended activity.
   */
  static create(options: InstanceGroupOptions): InstanceGroup {
    const { dapp, node: name, provider, logger, network } = options;
    const node = dapp.node(name);
    if (!node) throw RunnerErrors.unknownNode(name);
    const payload = dapp.payloads[node.payload];
    if (!payload) throw RunnerErrors.undefinedPayload(name, node.payload);

    const addresses = node.ip && node.ip.length > 0 ? node.ip : [undefined];
    const instances = addresses.map((ip, replica) => {
      const binding: NetworkBinding | undefined = network ? { ...network, ip } : undefined;
      const { agreement_id: agreementId, activity_id: activityId } = node;
      const commissioning: Commissioning =
        replica === 0 && agreementId !== undefined && activityId !== undefined
          ? {
              kind: 'attach',
              request: {
                node: name,
                replica,
                agreementId,
                activityId,
                providerId: node.provider_id,
                network: binding,
              },
            }
          : {
              kind: 'instantiate',
              request: { node: name, replica, payloadName: node.payload, payload, network: binding },
            };
      return new DappInstance({
        node: name,
        replica,
        dapp,
        provider,
        logger,
        commissioning,
        init: node.init,
        variant: variantOf(node),
      });
    });
    return new InstanceGroup(name, instances);
  }

  get states(): InstanceState[] {
    return this.instances.map((instance) => instance.state);
  }

  instance(replica: number): DappInstance | undefined {
    return this.instances[replica];
  }

  hasRunningInstance(): boolean {
    return this.instances.some((instance) => instance.state === 'running');
  }

  start(): void {
    for (const instance of this.instances) instance.start();
  }

  async stop(): Promise<void> {
    await Promise.all(this.instances.map((instance) => instance.stop()));
  }

  async suspend(): Promise<void> {
    await Promise.all(this.instances.map((instance) => instance.suspend()));
  }
}
