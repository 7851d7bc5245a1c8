import { Errors } from './errors';

/** Synthetic root vertex; points at every node without explicit dependencies. */
export const GRAPH_ROOT: unique symbol = Symbol('root');

export type GraphVertex = string | typeof GRAPH_ROOT;

export type GraphEdge = { from: GraphVertex; to: string };

type VisitMark = 'visiting' | 'done';

/**
 * Dependency DAG over node names. Edges point from a node to each of its
 * dependencies. Built once and never mutated afterwards.
 */
export class DependencyGraph {
  private readonly order: readonly string[];

  private constructor(
    readonly nodes: readonly string[],
    private readonly dependencies: ReadonlyMap<string, readonly string[]>,
  ) {
    this.order = this.sort();
  }

  static build(dependencies: Record<string, readonly string[]>): DependencyGraph {
    const names = Object.keys(dependencies);
    const known = new Set(names);
    const adjacency = new Map<string, readonly string[]>();
    for (const name of names) {
      const deps = [...new Set(dependencies[name])];
      for (const dep of deps) {
        if (!known.has(dep)) throw Errors.unmetDependency(name, dep);
      }
      adjacency.set(name, deps);
    }
    return new DependencyGraph(names, adjacency);
  }

  dependenciesOf(name: string): readonly string[] {
    return this.dependencies.get(name) ?? [];
  }

  edges(): GraphEdge[] {
    const out: GraphEdge[] = [];
    for (const name of this.nodes) {
      const deps = this.dependenciesOf(name);
      if (!deps.length) out.push({ from: GRAPH_ROOT, to: name });
      for (const dep of deps) out.push({ from: name, to: dep });
    }
    return out;
  }

  /** Reverse topological order: every node comes after all of its dependencies. */
  prioritized(): string[] {
    return [...this.order];
  }

  private sort(): string[] {
    const marks = new Map<string, VisitMark>();
    const order: string[] = [];
    const path: string[] = [];

    const visit = (name: string): void => {
      const mark = marks.get(name);
      if (mark === 'done') return;
      if (mark === 'visiting') {
        throw Errors.circularDependency([...path.slice(path.indexOf(name)), name]);
      }
      marks.set(name, 'visiting');
      path.push(name);
      for (const dep of this.dependenciesOf(name)) visit(dep);
      path.pop();
      marks.set(name, 'done');
      order.push(name);
    };

    for (const name of this.nodes) visit(name);
    return order;
  }
}
