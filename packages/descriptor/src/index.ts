export {
  DescriptorError,
  ValidationError,
  DescriptorReferenceError,
  UnmetDependencyError,
  CycleError,
  ManifestError,
  GaomQueryError,
  GaomLookupError,
  GaomRuntimeLookupError,
  Errors,
} from './errors';
export type { DescriptorErrorCode, DescriptorErrorDetails } from './errors';

export { descriptorValueSchema, descriptorMapSchema, isDescriptorMap, isPlainObject, isStringList } from './values';
export type { DescriptorValue, DescriptorMap } from './values';

export { CMD_RUN, canonicalizeCommands, commandSchema, commandListSchema, serializeCommand } from './commands';
export type { CommandDescriptor } from './commands';

export { parsePortMapping, portMappingSchema, proxySchema } from './ports';
export type { PortMapping, ProxyDescriptor } from './ports';

export {
  PAYLOAD_RUNTIME_VM,
  PAYLOAD_RUNTIME_VM_MANIFEST,
  VM_RUNTIMES,
  PAYLOAD_CAPS_PARAM,
  CAPS_VPN,
  CAPS_MANIFEST_SUPPORT,
  DEFAULT_NETWORK_NAME,
  DEFAULT_NETWORK_IP,
  dappSchema,
  nodeSchema,
  networkSchema,
  payloadSchema,
} from './dapp.schema';
export type {
  DappInput,
  DappMeta,
  DappTree,
  NetworkDescriptor,
  NetworkNode,
  NodeDescriptor,
  PayloadDescriptor,
} from './dapp.schema';

export { Dapp, applyImplicitDefaults, loadDapp } from './dapp';
export type { SerializedDapp, SerializedNode } from './dapp';

export { DependencyGraph, GRAPH_ROOT } from './dependency.graph';
export type { GraphEdge, GraphVertex } from './dependency.graph';

export { parseQuery } from './gaom/query';
export type { QueryStep } from './gaom/query';
export { lookup, lookupIn } from './gaom/lookup';
export { interpolate, interpolateMap, interpolateString, interpolateValue } from './gaom/interpolate';
export type { Resolver } from './gaom/interpolate';
export { isRuntimeField, runtimeField } from './gaom/runtime';

export { loadMarketConfig, marketConfigSchema } from './market.config';
export type { MarketConfig } from './market.config';

export { verifyManifest, verifyManifests } from './manifest';
export type { ManifestCheck, PayloadManifest, VerifyManifestsOptions } from './manifest';

export { formatPath, parseWith, toValidationError } from './validation';
