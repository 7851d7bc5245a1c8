import { GaomQueryError } from '../errors';

export type QueryStep = { kind: 'key'; key: string } | { kind: 'index'; index: number };

const COMPONENT_RE = /^(\w+)((?:\[\d+\])*)$/;
const INDEX_RE = /\[(\d+)\]/g;

/**
 * Parse `key(.key|[index])*` into traversal steps. The whole query is
 * checked before any step is returned.
 */
export function parseQuery(query: string): QueryStep[] {
  if (query === '') return [];
  const steps: QueryStep[] = [];
  for (const component of query.split('.')) {
    const match = COMPONENT_RE.exec(component);
    if (!match) throw new GaomQueryError(query);
    const [, key, indexes] = match;
    steps.push({ kind: 'key', key });
    for (const [, index] of indexes.matchAll(INDEX_RE)) {
      steps.push({ kind: 'index', index: Number(index) });
    }
  }
  return steps;
}
