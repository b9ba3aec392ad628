import { DependencyGraph } from './graph/dependency-graph.js';
import { compareIds } from './work-item/store.js';
import { IN_FLIGHT_STATES, RISK_ORDER, type WorkItem } from './work-item/types.js';

export interface SelectOptions {
  /** Restrict selection to a single item (`run <id>`). */
  target?: string;
}

export interface RankedItem {
  item: WorkItem;
  unlockDegree: number;
}

/**
 * Ready, unlocked, non-retired items in dispatch order:
 * unlock degree desc, priority desc, risk asc, then ID.
 */
export function rankReady(items: readonly WorkItem[], graph: DependencyGraph): RankedItem[] {
  return items
    .filter((i) => !i.retired && i.state === 'ready' && graph.unlocked(i.id))
    .map((item) => ({ item, unlockDegree: graph.unlockDegree(item.id) }))
    .sort(compareRanked);
}

/** Deterministic: identical inputs always select the same item. */
export function selectNext(
  items: readonly WorkItem[],
  graph: DependencyGraph,
  opts: SelectOptions = {}
): WorkItem | null {
  const ranked = rankReady(items, graph);
  if (opts.target !== undefined) {
    return ranked.find((r) => r.item.id === opts.target)?.item ?? null;
  }
  return ranked[0]?.item ?? null;
}

function compareRanked(a: RankedItem, b: RankedItem): number {
  if (a.unlockDegree !== b.unlockDegree) return b.unlockDegree - a.unlockDegree;
  if (a.item.priority !== b.item.priority) return b.item.priority - a.item.priority;
  const risk = RISK_ORDER[a.item.risk] - RISK_ORDER[b.item.risk];
  if (risk !== 0) return risk;
  return compareIds(a.item.id, b.item.id);
}

export interface PlannedStep {
  item: WorkItem;
  unlockDegree: number;
  /** Already in flight; finished before anything new is dispatched. */
  resumed: boolean;
}

export interface Plan {
  steps: PlannedStep[];
  /** Items that never become ready in the simulation, e.g. behind a failed dependency. */
  unreachable: WorkItem[];
}

/**
 * Dispatch order assuming every dispatched item is accepted on its first attempt.
 * Read-only: works on copies of `items` and a graph of its own.
 */
export function planOrder(items: readonly WorkItem[]): Plan {
  const active = items.filter((i) => !i.retired);
  const sim = new Map(active.map((i) => [i.id, i]));
  const graph = DependencyGraph.build(active);
  const steps: PlannedStep[] = [];

  const settle = (item: WorkItem) => sim.set(item.id, { ...item, state: 'accepted' });

  for (const item of active) {
    if (!IN_FLIGHT_STATES.has(item.state)) continue;
    steps.push({ item, unlockDegree: 0, resumed: true });
    settle(item);
  }

  for (;;) {
    graph.refresh(sim.values());
    for (const item of sim.values()) {
      if (item.state !== 'pending' && item.state !== 'blocked' && item.state !== 'ready') continue;
      sim.set(item.id, { ...item, state: graph.unlocked(item.id) ? 'ready' : 'blocked' });
    }
    graph.refresh(sim.values());

    const next = selectNext([...sim.values()], graph);
    if (!next) break;
    steps.push({ item: next, unlockDegree: graph.unlockDegree(next.id), resumed: false });
    settle(next);
  }

  const planned = new Set(steps.map((s) => s.item.id));
  const unreachable = active.filter((i) => !planned.has(i.id) && (i.state === 'pending' || i.state === 'blocked' || i.state === 'ready'));
  return { steps, unreachable };
}
