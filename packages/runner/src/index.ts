export { AbortError, AsyncQueue, isAbortError } from './lib/asyncQueue';
export { TaskSet } from './lib/taskSet';
export type { TaskFn } from './lib/taskSet';
export {
  DEFAULT_PORT_RANGE_END,
  DEFAULT_PORT_RANGE_START,
  PortAllocationError,
  PortAllocator,
  listenProbe,
} from './lib/portAllocator';
export type { PortAllocatorOptions, PortProbe } from './lib/portAllocator';

export type {
  AttachRequest,
  BatchHandle,
  CommandResult,
  ComputeProvider,
  InstanceRequest,
  NetworkBinding,
  NetworkHandle,
  ProviderActivity,
  ProxyTarget,
} from './provider/computeProvider.port';
export { BLACKLISTED_SCORE, BlacklistOnFailure } from './provider/strategy';
export type { MarketOffer, OfferScorer } from './provider/strategy';

export { LocalHttpProxy } from './proxy/localHttpProxy';
export { LocalTcpProxy } from './proxy/localTcpProxy';
export type { LocalProxy, ProxyKind } from './proxy/localProxy';

export { DappInstance, variantOf } from './instance/dappInstance';
export type { Commissioning, InstanceState, InstanceVariant } from './instance/dappInstance';
export { InstanceGroup } from './instance/instanceGroup';

export { computeAppState } from './runner/appState';
export type { AppState, AppStateInput, DesiredState } from './runner/appState';
export { Runner } from './runner/runner';
export type {
  CommandResultsMessage,
  ProxyAddressMessage,
  RunnerCommand,
  RunnerDataMessage,
  RunnerOptions,
  RunnerStateSnapshot,
} from './runner/runner';
export { RunnerError, RunnerErrors } from './runner/runner.error';

export * from './streams';

export { ConfigError, LOG_LEVELS, loadRunnerConfig } from './service/config';
export type { LogLevel, RunnerConfig } from './service/config';
export { LoggerService } from './service/logger.service';
export { RunnerSession, bindProcessSignals, runningTimeElapsed } from './service/session';
export type { RunnerSessionOptions, SessionOutcome, SessionRunner, SignalSource } from './service/session';
export { startRunner } from './service/main';
export type { RunnerFiles, StartRunnerOptions } from './service/main';
