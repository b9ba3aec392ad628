import { describe, expect, it } from 'vitest';

import type { Voter } from '../src/collaborators/types.js';
import type { ResolvedConfig } from '../src/core/config/schema.js';
import { RunCoordinator, type ProgressEvent } from '../src/core/coordinator.js';
import { CycleError, DirtyWorkingTreeError, ExecutionError, PersistenceError } from '../src/core/errors.js';
import type { WorkItem, WorkItemSpec } from '../src/core/work-item/types.js';
import { Notifier } from '../src/notify/notifier.js';
import {
  critical,
  FakeCompiler,
  FakeExecutor,
  FakeVoter,
  FakeWorkingTree,
  implement,
  item,
  MemoryLedger,
  MemoryStateStore,
  spec,
  stepClock,
  testConfig,
  untilAborted,
  vote
} from './fakes.js';

interface HarnessOptions {
  specs: WorkItemSpec[];
  seed?: WorkItem[];
  voters?: Voter[];
  config?: ResolvedConfig;
  executor?: (tree: FakeWorkingTree) => FakeExecutor;
  notifier?: Notifier;
}

function harness(opts: HarnessOptions) {
  const tree = new FakeWorkingTree();
  const compiler = new FakeCompiler();
  const executor = opts.executor?.(tree) ?? new FakeExecutor(tree);
  const stateStore = new MemoryStateStore(opts.seed);
  const ledger = new MemoryLedger();
  const progress: ProgressEvent[] = [];
  let specs = opts.specs;

  const coordinator = new RunCoordinator({
    repoRoot: '/fake/repo',
    config: opts.config ?? testConfig(),
    collaborators: { compiler, executor, voters: opts.voters ?? [], workingTree: tree },
    stateStore,
    ledger,
    notifier: opts.notifier,
    now: stepClock(),
    scan: async () => specs,
    onProgress: (e) => progress.push(e)
  });

  return {
    coordinator,
    tree,
    compiler,
    executor,
    stateStore,
    ledger,
    progress,
    setSpecs: (next: WorkItemSpec[]) => {
      specs = next;
    }
  };
}

const passing = () => [new FakeVoter('v1', 'pass'), new FakeVoter('v2', 'pass')];

describe('RunCoordinator', () => {
  it('runs a low-risk root and then its dependents in id order', async () => {
    const h = harness({
      specs: [spec('C', { dependsOn: ['A'] }), spec('A', { risk: 'low' }), spec('B', { dependsOn: ['A'] })],
      voters: passing()
    });

    const summary = await h.coordinator.run({ all: true });

    expect(summary).toEqual({ ticks: 4, processed: ['A', 'B', 'C'], cancelled: false, states: { accepted: 3 } });
    expect(h.compiler.calls.map((c) => c.item.id)).toEqual(['A', 'B', 'C']);
    expect(h.ledger.transitions('B')).toEqual([
      'pending->blocked',
      'blocked->ready',
      'ready->compiling',
      'compiling->running',
      'running->verifying',
      'verifying->accepted'
    ]);

    const a = await h.stateStore.item('A');
    expect(a.history.map((x) => [x.disposition, x.expectedVoters, x.votes.length])).toEqual([['approved', 0, 0]]);
    const b = await h.stateStore.item('B');
    expect(b.history.map((x) => [x.disposition, x.expectedVoters, x.votes.length])).toEqual([['approved', 2, 2]]);
    expect(b.stage).toEqual({});

    expect(h.tree.commits).toEqual(['changeq: A: Change A', 'changeq: B: Change B', 'changeq: C: Change C']);
    expect(h.executor.calls.map((c) => c.baseRef)).toEqual(['base-0', 'commit-1', 'commit-2']);
    expect(h.tree.changed).toEqual([]);
  });

  it('records run boundaries and the verification outcome in the ledger', async () => {
    const h = harness({ specs: [spec('A')], voters: passing() });
    await h.coordinator.run();

    expect(h.ledger.types()).toEqual([
      'run_started',
      'item_discovered',
      'item_state_changed',
      'item_state_changed',
      'stage_started',
      'item_state_changed',
      'stage_started',
      'item_state_changed',
      'stage_started',
      'votes_collected',
      'item_state_changed',
      'attempt_recorded',
      'run_finished'
    ]);
    const attempt = h.ledger.entries.find((e) => e.type === 'attempt_recorded');
    expect(attempt?.data).toEqual({ attempt: 1, disposition: 'approved', reason: '2/2 passed' });
  });

  it('stops a single run once the item settles and leaves the rest alone', async () => {
    const h = harness({ specs: [spec('A'), spec('B')], voters: passing() });
    const summary = await h.coordinator.run();

    expect(summary.processed).toEqual(['A']);
    expect(summary.states).toEqual({ accepted: 1, ready: 1 });
  });

  it('retries with the rejection findings and fails at the retry limit', async () => {
    const findings = [critical('missing tests')];
    const h = harness({
      specs: [spec('X')],
      voters: [new FakeVoter('v1', 'fail', findings), new FakeVoter('v2', 'fail')],
      config: testConfig({ budgets: { maxRetries: 2, maxDurationSec: 600, maxTurns: 50 } })
    });

    const summary = await h.coordinator.run();

    expect(summary).toEqual({ ticks: 2, processed: ['X'], cancelled: false, states: { failed: 1 } });
    expect(h.compiler.calls.map((c) => c.priorFindings)).toEqual([[], findings]);
    expect(h.tree.discards).toEqual(['base-0', 'base-0']);
    expect(h.tree.changed).toEqual([]);

    const x = await h.stateStore.item('X');
    expect(x.retryCount).toBe(2);
    expect(x.history.map((a) => a.disposition)).toEqual(['rejected', 'rejected']);
    expect(h.ledger.transitions('X').slice(-1)).toEqual(['verifying->failed']);
  });

  it('routes an executor failure through the retry path', async () => {
    const h = harness({
      specs: [spec('E', { risk: 'low' })],
      executor: (tree) =>
        new FakeExecutor(
          tree,
          async () => {
            tree.touch('src/half.ts');
            throw new ExecutionError('turn budget exceeded: used 60 of 50');
          },
          (req) => implement(tree, req)
        )
    });

    const first = await h.coordinator.tick();
    expect(first).toEqual({ kind: 'advanced', itemId: 'E', state: 'ready', retryCount: 1 });
    expect(h.tree.changed).toEqual([]);

    const failed = h.ledger.entries.find((e) => e.type === 'stage_failed');
    expect(failed?.data).toEqual({ stage: 'execute', code: 'execution', message: 'turn budget exceeded: used 60 of 50' });

    const second = await h.coordinator.tick();
    expect(second).toEqual({ kind: 'advanced', itemId: 'E', state: 'accepted', retryCount: 1 });
    const e = await h.stateStore.item('E');
    expect(e.history.map((a) => [a.disposition, a.stage])).toEqual([
      ['rejected', 'execute'],
      ['approved', undefined]
    ]);
  });

  it('escalates a high-risk item to needs_review and notifies', async () => {
    const posted: string[] = [];
    const ledger = new MemoryLedger();
    const notifier = new Notifier({
      webhookUrl: 'http://hooks.test/changeq',
      events: ['change.needs_review'],
      ledger,
      fetch: async (_url, init) => {
        posted.push(String(init?.body));
        return new Response(null, { status: 204 });
      }
    });
    const h = harness({ specs: [spec('H', { risk: 'high', title: 'Rotate keys' })], voters: passing(), notifier });

    const res = await h.coordinator.tick();

    expect(res).toMatchObject({ kind: 'advanced', state: 'needs_review' });
    expect(posted.map((b) => JSON.parse(b))).toEqual([
      { event: 'change.needs_review', changeId: 'H', title: 'Rotate keys', state: 'needs_review', retryCount: 0 }
    ]);
    expect(await h.coordinator.tick()).toEqual({ kind: 'idle', reason: 'no_ready_items' });
  });

  it('discards the partial implementation when cancelled mid-execution', async () => {
    const controller = new AbortController();
    const h = harness({
      specs: [spec('A', { risk: 'low' })],
      executor: (tree) =>
        new FakeExecutor(tree, (_req, signal) => {
          tree.touch('src/partial.ts');
          setTimeout(() => controller.abort('operator stop'), 0);
          return untilAborted(signal);
        })
    });

    const summary = await h.coordinator.run({ all: true, signal: controller.signal });

    expect(summary.cancelled).toBe(true);
    expect(summary.states).toEqual({ ready: 1 });
    expect(h.tree.changed).toEqual([]);
    expect(h.tree.discards).toEqual(['base-0']);

    const a = await h.stateStore.item('A');
    expect([a.state, a.retryCount, a.history.length]).toEqual(['ready', 0, 0]);
    expect(a.stage).toEqual({});
    expect(h.ledger.entries.find((e) => e.type === 'item_cancelled')?.data).toEqual({
      from: 'running',
      reason: 'operator stop'
    });
  });

  it('cancels through the coordinator and records a cancelled attempt from verifying', async () => {
    let coordinator: RunCoordinator | null = null;
    const stalling = new FakeVoter('v1', (_req, signal) => {
      setTimeout(() => coordinator?.cancel('shutdown'), 0);
      return untilAborted(signal);
    });
    const h = harness({ specs: [spec('A')], voters: [stalling] });
    coordinator = h.coordinator;

    expect(await h.coordinator.tick()).toEqual({ kind: 'cancelled', itemId: 'A', reason: 'shutdown' });
    const a = await h.stateStore.item('A');
    expect(a.state).toBe('ready');
    expect(a.history.map((x) => [x.disposition, x.message])).toEqual([['cancelled', 'shutdown']]);
    expect(h.tree.changed).toEqual([]);
    expect(h.coordinator.cancel()).toBe(false);
  });

  it('resumes a running item from its recorded brief without recompiling', async () => {
    const stage = { brief: 'stored brief', baseRef: 'base-0', startedAt: '2026-01-01T00:00:00.000Z' };
    const h = harness({
      specs: [spec('A', { risk: 'low' })],
      seed: [item('A', 'running', { risk: 'low', stage })]
    });
    h.tree.ref = 'base-1';
    h.tree.touch('src/leftover.ts');

    const res = await h.coordinator.tick();

    expect(res).toEqual({ kind: 'advanced', itemId: 'A', state: 'accepted', retryCount: 0 });
    expect(h.compiler.calls).toHaveLength(0);
    expect(h.executor.calls.map((c) => [c.brief, c.baseRef])).toEqual([['stored brief', 'base-0']]);
    expect(h.tree.discards).toEqual(['base-0']);
    expect((await h.stateStore.item('A')).history[0].stage).toBeUndefined();
    expect(h.progress.find((p) => p.type === 'stage_started')).toEqual({
      type: 'stage_started',
      itemId: 'A',
      stage: 'execute',
      resumed: true
    });
  });

  it('finishes an interrupted item before a targeted one', async () => {
    const h = harness({
      specs: [spec('A', { risk: 'low' }), spec('B', { risk: 'low' })],
      seed: [
        item('A', 'verifying', {
          risk: 'low',
          stage: { brief: 'b', baseRef: 'base-0', execution: { success: true, diff: '', filesChanged: [], log: '', turnsUsed: 1, durationMs: 1 } }
        }),
        item('B', 'ready', { risk: 'low' })
      ]
    });

    expect(await h.coordinator.tick({ target: 'B' })).toMatchObject({ itemId: 'A', state: 'accepted' });
    expect(h.executor.calls).toHaveLength(0);
    expect(await h.coordinator.tick({ target: 'B' })).toMatchObject({ itemId: 'B', state: 'accepted' });
  });

  it('asks the voters again when their votes were never saved', async () => {
    let verdict: 'pass' | 'fail' = 'fail';
    const voter = new FakeVoter('v1', async () => vote('v1', verdict));
    const h = harness({ specs: [spec('A')], voters: [voter] });
    // scan, dispatch, compiled and executed succeed; saving the votes does not.
    h.stateStore.failAfter = 4;

    await expect(h.coordinator.tick()).rejects.toBeInstanceOf(PersistenceError);
    expect((await h.stateStore.item('A')).state).toBe('verifying');
    expect(h.tree.discards).toEqual([]);
    expect(h.tree.changed).toEqual(['src/A.ts']);
    expect(h.ledger.types('A')).not.toContain('votes_collected');

    h.stateStore.failAfter = null;
    verdict = 'pass';
    const again = await h.coordinator.tick();

    expect(again).toEqual({ kind: 'advanced', itemId: 'A', state: 'accepted', retryCount: 0 });
    expect(voter.requests).toHaveLength(2);
    expect(h.compiler.calls).toHaveLength(1);
    expect(h.executor.calls).toHaveLength(1);
    expect(h.tree.commits).toEqual(['changeq: A: Change A']);
    expect((await h.stateStore.item('A')).history.map((a) => a.attempt)).toEqual([1]);
  });

  it('replays saved votes instead of asking again when the outcome was not saved', async () => {
    let verdict: 'pass' | 'fail' = 'fail';
    const voter = new FakeVoter('v1', async () => vote('v1', verdict));
    const h = harness({ specs: [spec('A')], voters: [voter] });
    // The votes are saved; the verified transition after the discard is not.
    h.stateStore.failAfter = 5;

    await expect(h.coordinator.tick()).rejects.toBeInstanceOf(PersistenceError);
    const interrupted = await h.stateStore.item('A');
    expect(interrupted.state).toBe('verifying');
    expect(interrupted.stage.verdicts?.votes.map((v) => [v.voter, v.verdict])).toEqual([['v1', 'fail']]);
    expect(h.tree.discards).toEqual(['base-0']);

    h.stateStore.failAfter = null;
    verdict = 'pass';
    const again = await h.coordinator.tick();

    expect(again).toEqual({ kind: 'advanced', itemId: 'A', state: 'ready', retryCount: 1 });
    expect(voter.requests).toHaveLength(1);
    expect(h.tree.discards).toEqual(['base-0', 'base-0']);
    expect(h.tree.commits).toEqual([]);
    const a = await h.stateStore.item('A');
    expect(a.history.map((x) => [x.attempt, x.disposition, x.votes.map((v) => v.verdict)])).toEqual([[1, 'rejected', ['fail']]]);
    expect(a.stage).toEqual({});
  });

  it('refuses to dispatch onto uncommitted changes', async () => {
    const h = harness({ specs: [spec('A', { risk: 'low' })] });
    h.tree.touch('notes.txt');

    await expect(h.coordinator.tick()).rejects.toBeInstanceOf(DirtyWorkingTreeError);
    expect(h.compiler.calls).toHaveLength(0);
    expect(h.tree.changed).toEqual(['notes.txt']);
    expect((await h.stateStore.item('A')).state).toBe('ready');
  });

  it('leaves a change awaiting review uncommitted and will not build on top of it', async () => {
    const h = harness({ specs: [spec('H', { risk: 'high' }), spec('B', { risk: 'low' })], voters: passing() });

    expect(await h.coordinator.tick({ target: 'H' })).toMatchObject({ itemId: 'H', state: 'needs_review' });
    expect(h.tree.commits).toEqual([]);
    expect(h.tree.changed).toEqual(['src/H.ts']);

    await expect(h.coordinator.tick()).rejects.toThrow(/^Working tree \/fake\/repo has uncommitted changes/);
    expect(h.executor.calls.map((c) => c.item.id)).toEqual(['H']);
  });

  it('leaves the ledger untouched when a transition cannot be saved', async () => {
    const h = harness({ specs: [spec('A')], seed: [item('A', 'ready')] });
    h.stateStore.failAfter = 0;

    await expect(h.coordinator.tick()).rejects.toThrow('disk full');
    expect(h.ledger.types()).toEqual([]);
    expect((await h.stateStore.item('A')).state).toBe('ready');
  });

  it('refuses to start on a dependency cycle', async () => {
    const h = harness({ specs: [spec('A', { dependsOn: ['B'] }), spec('B', { dependsOn: ['A'] })] });
    await expect(h.coordinator.tick()).rejects.toBeInstanceOf(CycleError);
    expect(h.stateStore.saves).toBe(0);
  });

  it('retires a change whose directory disappeared', async () => {
    const h = harness({ specs: [spec('A'), spec('B')] });
    await h.coordinator.prepare({ persist: true });

    h.setSpecs([spec('B')]);
    const prepared = await h.coordinator.prepare({ persist: true });

    expect(prepared.store.list().map((i) => i.id)).toEqual(['B']);
    expect((await h.stateStore.item('A')).retired).toBe(true);
    expect(h.ledger.entries.filter((e) => e.type === 'item_retired').map((e) => [e.itemId, e.data])).toEqual([
      ['A', { state: 'ready' }]
    ]);
  });

  it('reports a target that is not ready as idle', async () => {
    const h = harness({ specs: [spec('A'), spec('B', { dependsOn: ['A'] })] });
    expect(await h.coordinator.tick({ target: 'B' })).toEqual({ kind: 'idle', reason: 'target_not_ready' });
  });
});
