import { CycleError, UnknownDependencyError } from '../errors.js';
import { compareIds } from '../work-item/store.js';
import { SATISFYING_STATES, type WorkItem, type WorkItemState } from '../work-item/types.js';

export interface GraphNode {
  id: string;
  dependsOn: readonly string[];
}

type ItemStateView = Pick<WorkItem, 'id' | 'state' | 'retired'>;

const WAITING: ReadonlySet<WorkItemState> = new Set(['pending', 'blocked']);

/**
 * Directed acyclic graph over work item IDs, edges pointing from dependent to dependency.
 *
 * Construction validates the whole graph; a failed `build` leaves nothing usable.
 * Readiness queries read the per-node unsatisfied counts computed by `refresh`.
 */
export class DependencyGraph {
  private readonly deps: Map<string, string[]>;
  private readonly dependents: Map<string, string[]>;
  private unsatisfied = new Map<string, number>();
  private states = new Map<string, WorkItemState>();

  private constructor(deps: Map<string, string[]>) {
    this.deps = deps;
    this.dependents = new Map();
    for (const id of deps.keys()) this.dependents.set(id, []);
    for (const [id, ds] of deps) {
      for (const d of ds) this.dependents.get(d)?.push(id);
    }
    for (const list of this.dependents.values()) list.sort(compareIds);
  }

  static build(nodes: readonly GraphNode[]): DependencyGraph {
    const deps = new Map<string, string[]>();
    for (const n of nodes) deps.set(n.id, [...new Set(n.dependsOn)].sort(compareIds));

    for (const id of [...deps.keys()].sort(compareIds)) {
      for (const d of deps.get(id) ?? []) {
        if (!deps.has(d)) throw new UnknownDependencyError(id, d);
      }
    }

    const cycle = findCycle(deps);
    if (cycle) throw new CycleError(cycle);

    return new DependencyGraph(deps);
  }

  has(id: string): boolean {
    return this.deps.has(id);
  }

  ids(): string[] {
    return [...this.deps.keys()].sort(compareIds);
  }

  dependenciesOf(id: string): readonly string[] {
    return this.deps.get(id) ?? [];
  }

  dependentsOf(id: string): readonly string[] {
    return this.dependents.get(id) ?? [];
  }

  /**
   * Recompute unsatisfied-dependency counts from authoritative item state. O(V+E).
   * Items absent from `items` count as unsatisfied.
   */
  refresh(items: Iterable<ItemStateView>): void {
    const states = new Map<string, WorkItemState>();
    for (const item of items) states.set(item.id, item.state);

    const unsatisfied = new Map<string, number>();
    for (const [id, ds] of this.deps) {
      let n = 0;
      for (const d of ds) {
        const s = states.get(d);
        if (s === undefined || !SATISFYING_STATES.has(s)) n += 1;
      }
      unsatisfied.set(id, n);
    }

    this.states = states;
    this.unsatisfied = unsatisfied;
  }

  /** True iff every dependency is accepted or skipped, as of the last `refresh`. */
  unlocked(id: string): boolean {
    return this.unsatisfied.get(id) === 0;
  }

  /** Waiting items (`pending`/`blocked`) whose dependencies are all satisfied. */
  readySet(items: readonly ItemStateView[]): ItemStateView[] {
    return items
      .filter((i) => !i.retired && WAITING.has(i.state) && this.unlocked(i.id))
      .sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Number of direct dependents still waiting whose only unsatisfied dependency is `id`,
   * i.e. the items that become unlocked once `id` is accepted.
   */
  unlockDegree(id: string): number {
    let degree = 0;
    for (const dependent of this.dependentsOf(id)) {
      const state = this.states.get(dependent);
      if (state === undefined || !WAITING.has(state)) continue;
      if (this.unsatisfied.get(dependent) !== 1) continue;
      const s = this.states.get(id);
      if (s !== undefined && SATISFYING_STATES.has(s)) continue;
      degree += 1;
    }
    return degree;
  }

  /** Kahn's algorithm, dependencies first, ties broken by ascending ID. */
  topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const [id, ds] of this.deps) remaining.set(id, ds.length);

    const queue = [...remaining].filter(([, n]) => n === 0).map(([id]) => id).sort(compareIds);
    const order: string[] = [];

    while (queue.length) {
      const id = queue.shift();
      if (id === undefined) break;
      order.push(id);
      const released: string[] = [];
      for (const dependent of this.dependentsOf(id)) {
        const n = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, n);
        if (n === 0) released.push(dependent);
      }
      if (released.length) {
        queue.push(...released);
        queue.sort(compareIds);
      }
    }

    return order;
  }

  /** Length of the longest dependency chain below each node; 0 for roots. */
  depths(): Map<string, number> {
    const depth = new Map<string, number>();
    for (const id of this.topologicalOrder()) {
      let d = 0;
      for (const dep of this.dependenciesOf(id)) d = Math.max(d, (depth.get(dep) ?? 0) + 1);
      depth.set(id, d);
    }
    return depth;
  }
}

/**
 * Depth-first search in ascending-ID order with an explicit stack; returns the first cycle
 * found, closed on itself.
 */
function findCycle(deps: Map<string, string[]>): string[] | null {
  const color = new Map<string, 'visiting' | 'done'>();

  for (const root of [...deps.keys()].sort(compareIds)) {
    if (color.has(root)) continue;
    const path: string[] = [root];
    const cursor: number[] = [0];
    color.set(root, 'visiting');

    while (path.length) {
      const top = path.length - 1;
      const id = path[top];
      const edges = deps.get(id) ?? [];
      if (cursor[top] >= edges.length) {
        color.set(id, 'done');
        path.pop();
        cursor.pop();
        continue;
      }
      const next = edges[cursor[top]];
      cursor[top] += 1;

      const c = color.get(next);
      if (c === 'visiting') return [...path.slice(path.indexOf(next)), next];
      if (c === undefined) {
        color.set(next, 'visiting');
        path.push(next);
        cursor.push(0);
      }
    }
  }
  return null;
}
