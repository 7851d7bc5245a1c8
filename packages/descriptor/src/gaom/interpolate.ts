import type { DappTree } from '../dapp.schema';
import { isDescriptorMap, type DescriptorMap, type DescriptorValue } from '../values';
import { lookup } from './lookup';

export type Resolver = (path: string) => unknown;

const TOKEN_RE = /\$\{([^}]*)\}/g;

const render = (value: unknown): string => (typeof value === 'string' ? value : JSON.stringify(value));

export const interpolateString = (text: string, resolve: Resolver): string =>
  text.replace(TOKEN_RE, (_token, path: string) => render(resolve(path.trim())));

export function interpolateValue(value: DescriptorValue, resolve: Resolver): DescriptorValue {
  if (typeof value === 'string') return interpolateString(value, resolve);
  if (Array.isArray(value)) return value.map((item) => interpolateValue(item, resolve));
  if (isDescriptorMap(value)) return interpolateMap(value, resolve);
  return value;
}

export function interpolateMap(map: DescriptorMap, resolve: Resolver): DescriptorMap {
  const out: DescriptorMap = {};
  for (const [key, item] of Object.entries(map)) {
    out[interpolateString(key, resolve)] = interpolateValue(item, resolve);
  }
  return out;
}

/** Replace `${path}` tokens in keys and strings of `value` with GAOM lookups on `root`. */
export function interpolate(value: DescriptorMap, root: DappTree, isRuntime?: boolean): DescriptorMap;
export function interpolate(value: DescriptorValue, root: DappTree, isRuntime?: boolean): DescriptorValue;
export function interpolate(value: DescriptorValue, root: DappTree, isRuntime = false): DescriptorValue {
  return interpolateValue(value, (path) => lookup(root, path, isRuntime));
}
