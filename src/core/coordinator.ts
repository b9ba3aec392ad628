import type { Collaborators } from '../collaborators/types.js';
import { notifyEventFor, type Notifier } from '../notify/notifier.js';
import { scanChanges } from '../scanner/scanner.js';
import type { Logger } from '../utils/logger.js';
import { itemBudgets } from './config/loader.js';
import type { ItemBudgets, ResolvedConfig } from './config/schema.js';
import { ChangeqError, DirtyWorkingTreeError, errorMessage, ExecutionTimeout } from './errors.js';
import type { DependencyGraph } from './graph/dependency-graph.js';
import type { LedgerSink } from './ledger/types.js';
import { selectNext } from './scheduler.js';
import { applyEvent, priorFindings, type ItemEvent, type Transition } from './state-machine.js';
import { prepareRunState, syncRunState, type PreparedState } from './run-state.js';
import { snapshot, type StateStore } from './state/store.js';
import { aggregate } from './verification/aggregator.js';
import { resolvePolicy } from './verification/risk-policy.js';
import { collectVotes, type NonResponse } from './verification/voting.js';
import type { WorkItemStore } from './work-item/store.js';
import {
  IN_FLIGHT_STATES,
  TERMINAL_STATES,
  type PipelineStage,
  type RiskPolicy,
  type Vote,
  type WorkItem,
  type WorkItemSpec,
  type WorkItemState
} from './work-item/types.js';

export type ProgressEvent =
  | { type: 'stage_started'; itemId: string; stage: PipelineStage; resumed: boolean }
  | { type: 'transition'; itemId: string; from: WorkItemState; to: WorkItemState; event: ItemEvent['type'] }
  | { type: 'votes_collected'; itemId: string; votes: readonly Vote[]; nonResponses: readonly NonResponse[] };

export type TickResult =
  | { kind: 'idle'; reason: 'no_ready_items' | 'target_not_ready' }
  | { kind: 'advanced'; itemId: string; state: WorkItemState; retryCount: number }
  | { kind: 'cancelled'; itemId: string; reason: string };

export interface TickOptions {
  /** Only dispatch this item (`run <id>`); an interrupted in-flight item is still finished first. */
  target?: string;
  signal?: AbortSignal;
}

export interface RunOptions extends TickOptions {
  /** Keep going until nothing is ready; otherwise stop once the first item settles. */
  all?: boolean;
}

export interface RunSummary {
  ticks: number;
  processed: string[];
  cancelled: boolean;
  states: Partial<Record<WorkItemState, number>>;
}

export interface CoordinatorOptions {
  repoRoot: string;
  config: ResolvedConfig;
  collaborators: Collaborators;
  stateStore: StateStore;
  ledger: LedgerSink;
  notifier?: Notifier;
  logger?: Logger;
  /** Project rules passed to voters. */
  projectRules?: string;
  /** Clock for persisted timestamps. */
  now?: () => Date;
  /** Change discovery; defaults to scanning the configured changes directory. */
  scan?: () => Promise<WorkItemSpec[]>;
  onProgress?: (event: ProgressEvent) => void;
}

type StageOutcome = { kind: 'next' } | { kind: 'settled' } | { kind: 'cancelled'; reason: string };

/**
 * Top-level loop: scan, reconcile with persisted state, resolve readiness, select one item
 * and drive it through compile, execute and verify.
 *
 * Persisted state is re-read at the start of every tick and written after every transition;
 * a failed write (`PersistenceError`) propagates and ends the run.
 */
export class RunCoordinator {
  private readonly now: () => Date;
  private inFlight: AbortController | null = null;

  constructor(private readonly opts: CoordinatorOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  /** Abort the in-flight stage; the item returns to `ready` with its partial work discarded. */
  cancel(reason = 'cancelled'): boolean {
    if (!this.inFlight) return false;
    this.inFlight.abort(reason);
    return true;
  }

  /**
   * Scan, reconcile and resolve readiness without dispatching anything.
   * With `persist`, changes are saved and then recorded in the ledger.
   */
  async prepare(opts: { persist: boolean }): Promise<PreparedState> {
    const specs = await (this.opts.scan ?? (() => this.scanConfigured()))();
    if (!opts.persist) {
      return prepareRunState(await this.opts.stateStore.load(), specs, this.opts.config, this.now());
    }

    const prepared = await syncRunState(specs, {
      stateStore: this.opts.stateStore,
      ledger: this.opts.ledger,
      config: this.opts.config,
      now: this.now()
    });
    for (const t of prepared.transitions) {
      this.opts.onProgress?.({ type: 'transition', itemId: t.item.id, from: t.from, to: t.to, event: 'resolve' });
    }
    return prepared;
  }

  async tick(opts: TickOptions = {}): Promise<TickResult> {
    const { store, graph } = await this.prepare({ persist: true });
    const active = store.list();

    const interrupted = active.find((i) => IN_FLIGHT_STATES.has(i.state));
    const next = interrupted ?? selectNext(active, graph, { target: opts.target });
    if (!next) {
      return { kind: 'idle', reason: opts.target !== undefined ? 'target_not_ready' : 'no_ready_items' };
    }
    const { workingTree } = this.opts.collaborators;
    if (next.state === 'ready' && !(await workingTree.isClean())) throw new DirtyWorkingTreeError(workingTree.root);

    return await this.drive(store, graph, next, opts.signal);
  }

  async run(opts: RunOptions = {}): Promise<RunSummary> {
    await this.opts.ledger.append({ type: 'run_started', data: { target: opts.target ?? null, all: !!opts.all } });

    let target = opts.target;
    let ticks = 0;
    let cancelled = false;
    const processed: string[] = [];

    while (!opts.signal?.aborted) {
      const res = await this.tick({ target, signal: opts.signal });
      ticks += 1;
      if (res.kind === 'idle') break;
      if (!processed.includes(res.itemId)) processed.push(res.itemId);
      if (res.kind === 'cancelled') {
        cancelled = true;
        break;
      }
      if (!opts.all && target === undefined) target = res.itemId;
      if (!opts.all && target === res.itemId && TERMINAL_STATES.has(res.state)) break;
    }

    const final = await this.opts.stateStore.load();
    const states: Partial<Record<WorkItemState, number>> = {};
    for (const item of Object.values(final?.items ?? {})) {
      if (item.retired) continue;
      states[item.state] = (states[item.state] ?? 0) + 1;
    }

    const summary: RunSummary = { ticks, processed, cancelled: cancelled || !!opts.signal?.aborted, states };
    await this.opts.ledger.append({ type: 'run_finished', data: { ...summary } });
    return summary;
  }

  // ── Stage driving ──────────────────────────────────────────────────────────

  private async drive(
    store: WorkItemStore,
    graph: DependencyGraph,
    start: WorkItem,
    external?: AbortSignal
  ): Promise<TickResult> {
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(reasonText(external?.reason));
    if (external?.aborted) controller.abort(reasonText(external.reason));
    external?.addEventListener('abort', onExternalAbort, { once: true });
    this.inFlight = controller;

    const budgets = itemBudgets(this.opts.config, start);
    const policy = resolvePolicy(start.risk, this.opts.config.riskPolicy, start.overrides.verification);
    const deadline = Date.now() + budgets.maxDurationMs;
    const id = start.id;
    let resumed = start.state !== 'ready';

    try {
      if (start.state === 'ready') {
        await this.transition(store, start, { type: 'dispatch', unlocked: graph.unlocked(id) });
      } else {
        this.opts.logger?.info('resuming interrupted item', { itemId: id, state: start.state });
      }

      for (;;) {
        const item = store.get(id);
        let outcome: StageOutcome;
        switch (item.state) {
          case 'compiling':
            outcome = await this.compile(store, item, policy, budgets, deadline, controller.signal, resumed);
            break;
          case 'running':
            outcome = await this.execute(store, item, policy, budgets, deadline, controller.signal, resumed);
            break;
          case 'verifying':
            outcome = await this.verify(store, item, policy, controller.signal, resumed);
            break;
          default:
            outcome = { kind: 'settled' };
        }
        resumed = false;

        if (outcome.kind === 'cancelled') return { kind: 'cancelled', itemId: id, reason: outcome.reason };
        if (outcome.kind === 'settled') break;
      }
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
      this.inFlight = null;
    }

    const done = store.get(id);
    const event = notifyEventFor(done.state);
    if (event) await this.opts.notifier?.notify(event, done);
    return { kind: 'advanced', itemId: id, state: done.state, retryCount: done.retryCount };
  }

  private async compile(
    store: WorkItemStore,
    item: WorkItem,
    policy: RiskPolicy,
    budgets: ItemBudgets,
    deadline: number,
    signal: AbortSignal,
    resumed: boolean
  ): Promise<StageOutcome> {
    const { compiler, workingTree } = this.opts.collaborators;
    await this.stageStarted(item.id, 'compile', resumed);

    let brief: string;
    let baseRef: string;
    try {
      brief = await bounded(signal, deadline - Date.now(), (s) =>
        compiler.compile(
          { item, tasks: item.tasks, priorFindings: priorFindings(item), model: this.opts.config.compiler.model },
          s
        )
      );
      baseRef = await workingTree.head();
    } catch (err) {
      if (signal.aborted) return await this.cancelItem(store, item, policy, reasonText(signal.reason));
      return await this.stageFailed(store, item, policy, 'compile', err);
    }

    if (signal.aborted) return await this.cancelItem(store, item, policy, reasonText(signal.reason));
    await this.transition(store, item, { type: 'compiled', brief, baseRef });
    return { kind: 'next' };
  }

  private async execute(
    store: WorkItemStore,
    item: WorkItem,
    policy: RiskPolicy,
    budgets: ItemBudgets,
    deadline: number,
    signal: AbortSignal,
    resumed: boolean
  ): Promise<StageOutcome> {
    const { executor, workingTree } = this.opts.collaborators;
    const brief = item.stage.brief;
    const baseRef = item.stage.baseRef;
    await this.stageStarted(item.id, 'execute', resumed);

    if (brief === undefined || baseRef === undefined) {
      return await this.stageFailed(store, item, policy, 'execute', new Error('no compiled brief recorded'));
    }

    const started = Date.now();
    let output: Awaited<ReturnType<typeof executor.execute>>;
    try {
      // An interrupted run may have left a partial implementation behind.
      if (resumed) await workingTree.discard(baseRef);
      const remaining = deadline - Date.now();
      output = await bounded(signal, remaining, (s) =>
        executor.execute(
          {
            item,
            brief,
            workingTree,
            baseRef,
            maxTurns: budgets.maxTurns,
            maxDurationMs: Math.max(1, remaining),
            model: budgets.executorModel
          },
          s
        )
      );
    } catch (err) {
      if (signal.aborted) return await this.cancelItem(store, item, policy, reasonText(signal.reason));
      return await this.stageFailed(store, item, policy, 'execute', err);
    }

    if (signal.aborted) return await this.cancelItem(store, item, policy, reasonText(signal.reason));
    await this.transition(store, item, {
      type: 'executed',
      result: { ...output, durationMs: Date.now() - started }
    });
    return { kind: 'next' };
  }

  private async verify(
    store: WorkItemStore,
    item: WorkItem,
    policy: RiskPolicy,
    signal: AbortSignal,
    resumed: boolean
  ): Promise<StageOutcome> {
    const { voters } = this.opts.collaborators;
    const { verification } = this.opts.config;
    const execution = item.stage.execution;
    await this.stageStarted(item.id, 'verify', resumed);

    if (!execution) {
      return await this.stageFailed(store, item, policy, 'verify', new Error('no execution result recorded'));
    }

    let current = item;
    let votes: Vote[];
    let expectedVoters: number;
    const recorded = item.stage.verdicts;
    if (recorded) {
      // Saved before an interruption; asking the voters again could change the outcome.
      ({ votes, expectedVoters } = recorded);
      this.opts.logger?.info('reusing recorded votes', { itemId: item.id, votes: votes.length });
    } else if (policy.kind === 'skip') {
      votes = [];
      expectedVoters = 0;
    } else {
      expectedVoters = voters.length;
      let nonResponses: NonResponse[];
      try {
        ({ votes, nonResponses } = await collectVotes(
          voters,
          {
            item,
            diff: execution.diff,
            brief: item.stage.brief ?? '',
            checks: verification.checks,
            projectRules: this.opts.projectRules
          },
          { timeoutMs: verification.timeoutMs, signal, logger: this.opts.logger }
        ));
      } catch (err) {
        if (signal.aborted) return await this.cancelItem(store, item, policy, reasonText(signal.reason));
        return await this.stageFailed(store, item, policy, 'verify', err);
      }
      if (signal.aborted) return await this.cancelItem(store, item, policy, reasonText(signal.reason));

      current = { ...item, stage: { ...item.stage, verdicts: { votes, expectedVoters } } };
      store.put(current);
      await this.persist(store);
      this.opts.onProgress?.({ type: 'votes_collected', itemId: item.id, votes, nonResponses });
      await this.opts.ledger.append({
        type: 'votes_collected',
        itemId: item.id,
        data: {
          votes: votes.map((v) => ({ voter: v.voter, verdict: v.verdict, findings: v.findings.length })),
          nonResponses
        }
      });
    }
    if (signal.aborted) return await this.cancelItem(store, current, policy, reasonText(signal.reason));

    const result = aggregate(votes, policy, { expectedVoters, humanConfirmed: false });
    const event: ItemEvent = { type: 'verified', disposition: result.disposition, votes, expectedVoters, policy };
    const preview = applyEvent(current, event, this.ctx(current));

    // Side effects are repeatable: a replay from the saved votes reaches the same point.
    if (preview.to === 'ready' || preview.to === 'failed') await this.discard(current);
    if (preview.to === 'accepted') await this.commitAccepted(current);

    const t = await this.transition(store, current, event);
    await this.opts.ledger.append({
      type: 'attempt_recorded',
      itemId: item.id,
      data: { attempt: t.attempt?.attempt ?? null, disposition: result.disposition, reason: result.reason }
    });
    return { kind: 'settled' };
  }

  private async stageFailed(
    store: WorkItemStore,
    item: WorkItem,
    policy: RiskPolicy,
    stage: PipelineStage,
    err: unknown
  ): Promise<StageOutcome> {
    const message = errorMessage(err);
    const code = err instanceof ChangeqError ? err.code : 'error';
    this.opts.logger?.warn('stage failed', { itemId: item.id, stage, code, message });
    await this.opts.ledger.append({ type: 'stage_failed', itemId: item.id, data: { stage, code, message } });

    if (stage !== 'compile') await this.discard(item);
    await this.transition(store, item, { type: 'stage_failed', stage, message, policy });
    return { kind: 'settled' };
  }

  private async cancelItem(store: WorkItemStore, item: WorkItem, policy: RiskPolicy, reason: string): Promise<StageOutcome> {
    this.opts.logger?.info('cancelling in-flight item', { itemId: item.id, state: item.state, reason });
    if (item.state !== 'compiling') await this.discard(item);
    await this.transition(store, item, { type: 'cancel', reason, policy });
    await this.opts.ledger.append({ type: 'item_cancelled', itemId: item.id, data: { from: item.state, reason } });
    return { kind: 'cancelled', reason };
  }

  private async discard(item: WorkItem): Promise<void> {
    const baseRef = item.stage.baseRef;
    if (!baseRef) return;
    try {
      await this.opts.collaborators.workingTree.discard(baseRef);
    } catch (err) {
      this.opts.logger?.error('failed to discard partial implementation', {
        itemId: item.id,
        baseRef,
        error: errorMessage(err)
      });
      throw err;
    }
  }

  private async commitAccepted(item: WorkItem): Promise<void> {
    const ref = await this.opts.collaborators.workingTree.commit(`changeq: ${item.id}: ${item.title}`);
    this.opts.logger?.debug('committed accepted change', { itemId: item.id, ref });
  }

  // ── Bookkeeping ────────────────────────────────────────────────────────────

  private ctx(item: WorkItem) {
    return { maxRetries: itemBudgets(this.opts.config, item).maxRetries, now: this.now() };
  }

  /** Apply, persist, then record. A persistence failure leaves the ledger untouched. */
  private async transition(store: WorkItemStore, item: WorkItem, event: ItemEvent): Promise<Transition> {
    const t = applyEvent(item, event, this.ctx(item));
    if (!t.changed) return t;
    store.put(t.item);
    await this.persist(store);
    await this.recordTransition(t, event.type);
    return t;
  }

  private async recordTransition(t: Transition, event: ItemEvent['type']): Promise<void> {
    this.opts.logger?.debug('transition', { itemId: t.item.id, from: t.from, to: t.to, event });
    this.opts.onProgress?.({ type: 'transition', itemId: t.item.id, from: t.from, to: t.to, event });
    await this.opts.ledger.append({
      type: 'item_state_changed',
      itemId: t.item.id,
      data: { from: t.from, to: t.to, event, retryCount: t.item.retryCount }
    });
  }

  private async stageStarted(itemId: string, stage: PipelineStage, resumed: boolean): Promise<void> {
    this.opts.onProgress?.({ type: 'stage_started', itemId, stage, resumed });
    await this.opts.ledger.append({ type: 'stage_started', itemId, data: { stage, resumed } });
  }

  private async persist(store: WorkItemStore): Promise<void> {
    await this.opts.stateStore.save(snapshot(store.toRecord(), this.now()));
  }

  private async scanConfigured(): Promise<WorkItemSpec[]> {
    const { config, repoRoot } = this.opts;
    return await scanChanges({ repoRoot, changesDir: config.changesDir, exclude: config.scan.exclude });
  }
}

/**
 * Run `fn` with a signal that aborts when `parent` does or when `timeoutMs` elapses.
 * Settles as soon as either happens, even if `fn` ignores its signal.
 */
async function bounded<T>(parent: AbortSignal, timeoutMs: number, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  parent.throwIfAborted();
  const controller = new AbortController();
  let fail: (err: unknown) => void = () => {};
  const guard = new Promise<never>((_, reject) => {
    fail = reject;
  });

  const onAbort = () => {
    controller.abort(parent.reason);
    fail(parent.reason);
  };
  const timer = setTimeout(() => {
    const err = new ExecutionTimeout(Math.max(0, timeoutMs));
    controller.abort(err);
    fail(err);
  }, Math.max(0, timeoutMs));
  parent.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onAbort);
  }
}

function reasonText(reason: unknown): string {
  if (typeof reason === 'string' && reason) return reason;
  if (reason instanceof Error) return reason.message;
  if (typeof reason === 'object' && reason !== null && 'signal' in reason && typeof reason.signal === 'string') {
    return `interrupted by ${reason.signal}`;
  }
  return 'cancelled';
}
