import type { InstanceState } from '../instance/dappInstance';

export type DesiredState = 'pending' | 'running' | 'terminated' | 'suspended';

export type AppState = 'pending' | 'starting' | 'running' | 'stopping' | 'terminated' | 'suspended';

export type AppStateInput = {
  desired: DesiredState;
  startupFinished: boolean;
  declaredNodes: number;
  /** Replica states of every node that has been instantiated so far. */
  nodes: Record<string, readonly InstanceState[]>;
};

/**
 * Application state is derived, never stored:
 * running needs the startup walk finished and every declared node reporting
 * only running replicas; terminated needs every reported replica terminated.
 */
export function computeAppState(input: AppStateInput): AppState {
  const reported = Object.values(input.nodes);
  switch (input.desired) {
    case 'suspended':
      return 'suspended';
    case 'pending':
      return 'pending';
    case 'running': {
      const allRunning = reported.every((replicas) => replicas.every((state) => state === 'running'));
      return input.startupFinished && reported.length === input.declaredNodes && allRunning ? 'running' : 'starting';
    }
    case 'terminated': {
      const allTerminated = reported.every((replicas) => replicas.every((state) => state === 'terminated'));
      return allTerminated ? 'terminated' : 'stopping';
    }
  }
}
