import { resolve } from 'node:path';

import { itemBudgets, loadConfig, type LoadedConfig } from '../core/config/loader.js';
import type { ResolvedConfig } from '../core/config/schema.js';
import { ConfigError } from '../core/errors.js';
import { LedgerReader } from '../core/ledger/reader.js';
import { LedgerWriter } from '../core/ledger/writer.js';
import type { LedgerSink } from '../core/ledger/types.js';
import { prepareRunState, syncRunState, type PreparedState } from '../core/run-state.js';
import { applyEvent, type ItemEvent } from '../core/state-machine.js';
import { JsonStateStore, snapshot, type StateStore } from '../core/state/store.js';
import type { WorkItem, WorkItemState } from '../core/work-item/types.js';
import { scanChanges } from '../scanner/scanner.js';
import { isChangeqRepo, workspacePaths, type WorkspacePaths } from '../workspace/layout.js';

export type CommandResult = { ok: boolean; details?: unknown };

export interface ProjectContext {
  repoRoot: string;
  paths: WorkspacePaths;
  loaded: LoadedConfig;
  config: ResolvedConfig;
  stateStore: StateStore;
  now: () => Date;
}

export interface ProjectOptions {
  repoRoot?: string;
  env?: Record<string, string | undefined>;
  now?: () => Date;
}

export async function openProject(opts: ProjectOptions = {}): Promise<ProjectContext> {
  const repoRoot = resolve(opts.repoRoot ?? process.cwd());
  if (!(await isChangeqRepo(repoRoot))) {
    throw new ConfigError(`No .changeq/ directory in ${repoRoot}; run \`changeq init\` first`);
  }

  const paths = workspacePaths(repoRoot);
  const loaded = await loadConfig(repoRoot, { env: opts.env });
  return {
    repoRoot,
    paths,
    loaded,
    config: loaded.config,
    stateStore: new JsonStateStore(paths.statePath),
    now: opts.now ?? (() => new Date())
  };
}

export async function scanProject(ctx: ProjectContext) {
  return await scanChanges({ repoRoot: ctx.repoRoot, changesDir: ctx.config.changesDir, exclude: ctx.config.scan.exclude });
}

/** Scan and reconcile in memory; nothing is written. */
export async function viewProject(ctx: ProjectContext): Promise<PreparedState> {
  const specs = await scanProject(ctx);
  return prepareRunState(await ctx.stateStore.load(), specs, ctx.config, ctx.now());
}

/** Scan and reconcile, saving and recording any change. */
export async function syncProject(ctx: ProjectContext, ledger: LedgerSink): Promise<PreparedState> {
  const specs = await scanProject(ctx);
  return await syncRunState(specs, { stateStore: ctx.stateStore, ledger, config: ctx.config, now: ctx.now() });
}

export async function openLedger(ctx: ProjectContext): Promise<LedgerWriter> {
  return await LedgerWriter.open(ctx.paths.ledgerPath, { now: ctx.now });
}

export function ledgerReader(ctx: ProjectContext): LedgerReader {
  return new LedgerReader(ctx.paths.ledgerPath);
}

export type ManualAction = 'accept' | 'reject' | 'retry' | 'skip';

const ACTION_EVENTS: Record<ManualAction, ItemEvent> = {
  accept: { type: 'confirm' },
  reject: { type: 'reject' },
  retry: { type: 'retry' },
  skip: { type: 'skip' }
};

export interface ManualActionResult {
  item: WorkItem;
  from: WorkItemState;
  to: WorkItemState;
  changed: boolean;
}

/**
 * Apply an operator action through the state machine, persist it, then record it.
 * Repeating an action that already took effect changes nothing and records nothing.
 */
export async function applyManualAction(ctx: ProjectContext, id: string, action: ManualAction): Promise<ManualActionResult> {
  const ledger = await openLedger(ctx);
  const { store } = await syncProject(ctx, ledger);
  const item = store.get(id);

  const now = ctx.now();
  const t = applyEvent(item, ACTION_EVENTS[action], { maxRetries: itemBudgets(ctx.config, item).maxRetries, now });
  if (!t.changed) return { item: t.item, from: t.from, to: t.to, changed: false };

  store.put(t.item);
  await ctx.stateStore.save(snapshot(store.toRecord(), now));
  await ledger.append({
    type: 'item_state_changed',
    itemId: id,
    data: { from: t.from, to: t.to, event: ACTION_EVENTS[action].type, retryCount: t.item.retryCount }
  });
  await ledger.append({ type: 'manual_action', itemId: id, data: { action, from: t.from, to: t.to } });
  return { item: t.item, from: t.from, to: t.to, changed: true };
}
