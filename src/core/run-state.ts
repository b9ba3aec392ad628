import { itemBudgets } from './config/loader.js';
import type { ResolvedConfig } from './config/schema.js';
import { DependencyGraph } from './graph/dependency-graph.js';
import { applyEvent, type Transition } from './state-machine.js';
import type { LedgerSink } from './ledger/types.js';
import { snapshot, type RunState, type StateStore } from './state/store.js';
import { WorkItemStore } from './work-item/store.js';
import { newWorkItem, type WorkItem, type WorkItemSpec } from './work-item/types.js';

export interface PreparedState {
  store: WorkItemStore;
  graph: DependencyGraph;
  /** Whether reconciliation or readiness resolution changed any item. */
  changed: boolean;
  discovered: WorkItemSpec[];
  retired: WorkItem[];
  /** Readiness transitions (`resolve`) made on the way. */
  transitions: Transition[];
}

/**
 * Merge freshly scanned specs into persisted state, rebuild the graph and move
 * pending/blocked/ready items to `ready` or `blocked`.
 *
 * New specs start pending; known ones take the latest declaration; vanished ones retire.
 * Validation errors (`CycleError`, `UnknownDependencyError`) propagate.
 */
export function prepareRunState(
  state: RunState | null,
  specs: readonly WorkItemSpec[],
  config: ResolvedConfig,
  now: Date
): PreparedState {
  const store = WorkItemStore.fromRecord(state?.items ?? {});
  const stamp = now.toISOString();
  const seen = new Set<string>();
  let changed = false;
  const discovered: WorkItemSpec[] = [];
  const retired: WorkItem[] = [];
  const transitions: Transition[] = [];

  for (const spec of specs) {
    seen.add(spec.id);
    const existing = store.find(spec.id);
    if (!existing) {
      store.put(newWorkItem(spec, now));
      changed = true;
      discovered.push(spec);
      continue;
    }
    const updated: WorkItem = { ...existing, ...spec, retired: false };
    if (JSON.stringify(updated) !== JSON.stringify(existing)) {
      store.put({ ...updated, updatedAt: stamp });
      changed = true;
    }
  }

  for (const item of store.list()) {
    if (seen.has(item.id)) continue;
    store.put({ ...item, retired: true, updatedAt: stamp });
    changed = true;
    retired.push(item);
  }

  const active = store.list();
  const graph = DependencyGraph.build(active);
  graph.refresh(active);

  for (const item of active) {
    if (item.state !== 'pending' && item.state !== 'blocked' && item.state !== 'ready') continue;
    const t = applyEvent(
      item,
      { type: 'resolve', unlocked: graph.unlocked(item.id) },
      { maxRetries: itemBudgets(config, item).maxRetries, now }
    );
    if (!t.changed) continue;
    store.put(t.item);
    changed = true;
    transitions.push(t);
  }

  graph.refresh(store.list());
  return { store, graph, changed, discovered, retired, transitions };
}

export interface SyncOptions {
  stateStore: StateStore;
  ledger: LedgerSink;
  config: ResolvedConfig;
  now: Date;
}

/** `prepareRunState` against the store; any change is saved, then recorded in the ledger. */
export async function syncRunState(specs: readonly WorkItemSpec[], opts: SyncOptions): Promise<PreparedState> {
  const prepared = prepareRunState(await opts.stateStore.load(), specs, opts.config, opts.now);
  if (!prepared.changed) return prepared;

  await opts.stateStore.save(snapshot(prepared.store.toRecord(), opts.now));
  for (const spec of prepared.discovered) {
    await opts.ledger.append({ type: 'item_discovered', itemId: spec.id, data: { title: spec.title } });
  }
  for (const item of prepared.retired) {
    await opts.ledger.append({ type: 'item_retired', itemId: item.id, data: { state: item.state } });
  }
  for (const t of prepared.transitions) {
    await opts.ledger.append({
      type: 'item_state_changed',
      itemId: t.item.id,
      data: { from: t.from, to: t.to, event: 'resolve', retryCount: t.item.retryCount }
    });
  }
  return prepared;
}
