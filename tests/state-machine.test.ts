import { describe, expect, it } from 'vitest';

import { InvalidTransitionError } from '../src/core/errors.js';
import { applyEvent, canApply, priorFindings, type ItemEvent } from '../src/core/state-machine.js';
import type { RiskPolicy, WorkItem } from '../src/core/work-item/types.js';
import { critical, item, T0, vote } from './fakes.js';

const ctx = { maxRetries: 3, now: new Date('2026-02-01T10:00:00.000Z') };
const majority: RiskPolicy = { kind: 'majority', escalateOnCritical: true };
const execution = { success: true, diff: '', filesChanged: ['src/a.ts'], log: '', turnsUsed: 1, durationMs: 5 };

function run(start: WorkItem, ...events: ItemEvent[]): WorkItem {
  return events.reduce((it, e) => applyEvent(it, e, ctx).item, start);
}

function rejected(findings = [critical('breaks login')]): ItemEvent {
  return {
    type: 'verified',
    disposition: 'rejected',
    votes: [vote('v1', 'fail', findings)],
    expectedVoters: 1,
    policy: majority
  };
}

describe('state machine', () => {
  it('walks the happy path and records one attempt', () => {
    const done = run(
      item('a', 'ready'),
      { type: 'dispatch', unlocked: true },
      { type: 'compiled', brief: 'do it', baseRef: 'abc123' },
      { type: 'executed', result: execution },
      { type: 'verified', disposition: 'approved', votes: [vote('v1', 'pass')], expectedVoters: 1, policy: majority }
    );

    expect(done.state).toBe('accepted');
    expect(done.stage).toEqual({});
    expect(done.history).toHaveLength(1);
    expect(done.history[0]).toMatchObject({ attempt: 1, disposition: 'approved', risk: 'medium', expectedVoters: 1 });
    expect(done.updatedAt).toBe('2026-02-01T10:00:00.000Z');
  });

  it('keeps stage progress between stages', () => {
    const running = run(item('a', 'ready'), { type: 'dispatch', unlocked: true }, { type: 'compiled', brief: 'b', baseRef: 'r1' });
    expect(running.state).toBe('running');
    expect(running.stage).toEqual({ startedAt: '2026-02-01T10:00:00.000Z', brief: 'b', baseRef: 'r1' });

    const verifying = run(running, { type: 'executed', result: execution });
    expect(verifying.stage.execution).toEqual(execution);
    expect(verifying.stage.brief).toBe('b');
  });

  it('refuses to dispatch an item whose dependencies are not satisfied', () => {
    expect(() => applyEvent(item('a', 'ready'), { type: 'dispatch', unlocked: false }, ctx)).toThrow(InvalidTransitionError);
  });

  it('rejects any pair outside the table', () => {
    let caught: unknown;
    try {
      applyEvent(item('a', 'accepted'), { type: 'dispatch', unlocked: true }, ctx);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidTransitionError);
    expect(caught instanceof InvalidTransitionError && caught.from).toBe('accepted');

    expect(canApply('verifying', 'skip')).toBe(false);
    expect(canApply('failed', 'retry')).toBe(true);
  });

  it('returns to ready on rejection while retries remain', () => {
    const t = applyEvent(item('a', 'verifying', { retryCount: 1 }), rejected(), ctx);
    expect(t.to).toBe('ready');
    expect(t.item.retryCount).toBe(2);
    expect(t.attempt?.disposition).toBe('rejected');
  });

  it('fails a rejection at retryCount = maxRetries - 1', () => {
    const t = applyEvent(item('a', 'verifying', { retryCount: 2 }), rejected(), ctx);
    expect(t.to).toBe('failed');
    expect(t.item.retryCount).toBe(3);
  });

  it('turns a stage failure into a rejected attempt with a critical finding', () => {
    const t = applyEvent(
      item('a', 'running', { stage: { brief: 'b', baseRef: 'r1' } }),
      { type: 'stage_failed', stage: 'execute', message: 'turn budget exceeded', policy: majority },
      ctx
    );
    expect(t.to).toBe('ready');
    expect(t.item.retryCount).toBe(1);
    expect(t.item.stage).toEqual({});
    expect(t.attempt).toMatchObject({
      disposition: 'rejected',
      stage: 'execute',
      message: 'turn budget exceeded',
      findings: [{ severity: 'critical', category: 'execute', description: 'turn budget exceeded' }]
    });
  });

  it('cancels back to ready without touching the retry count', () => {
    const fromRunning = applyEvent(
      item('a', 'running', { retryCount: 1 }),
      { type: 'cancel', reason: 'SIGINT', policy: majority },
      ctx
    );
    expect(fromRunning.to).toBe('ready');
    expect(fromRunning.item.retryCount).toBe(1);
    expect(fromRunning.item.history).toEqual([]);

    const fromVerifying = applyEvent(item('a', 'verifying'), { type: 'cancel', reason: 'SIGINT', policy: majority }, ctx);
    expect(fromVerifying.item.history.map((a) => [a.disposition, a.stage, a.message])).toEqual([
      ['cancelled', 'verify', 'SIGINT']
    ]);
  });

  it('treats repeated manual actions as no-ops', () => {
    for (const [state, type] of [
      ['accepted', 'confirm'],
      ['failed', 'reject'],
      ['skipped', 'skip']
    ] as const) {
      const start = item('a', state);
      const t = applyEvent(start, { type }, ctx);
      expect(t.changed).toBe(false);
      expect(t.item).toBe(start);
    }
  });

  it('applies manual actions from their allowed states', () => {
    expect(applyEvent(item('a', 'needs_review'), { type: 'confirm' }, ctx).to).toBe('accepted');
    expect(applyEvent(item('a', 'needs_review'), { type: 'reject' }, ctx).to).toBe('failed');
    expect(applyEvent(item('a', 'blocked'), { type: 'skip' }, ctx).to).toBe('skipped');

    const retried = applyEvent(item('a', 'failed', { retryCount: 3 }), { type: 'retry' }, ctx);
    expect(retried.to).toBe('ready');
    expect(retried.item.retryCount).toBe(3);

    expect(() => applyEvent(item('a', 'running'), { type: 'skip' }, ctx)).toThrow(InvalidTransitionError);
  });

  it('resolves waiting items and leaves an unchanged ready item alone', () => {
    expect(applyEvent(item('a', 'pending'), { type: 'resolve', unlocked: false }, ctx).to).toBe('blocked');
    expect(applyEvent(item('a', 'blocked'), { type: 'resolve', unlocked: true }, ctx).to).toBe('ready');
    const same = applyEvent(item('a', 'ready'), { type: 'resolve', unlocked: true }, ctx);
    expect(same.changed).toBe(false);
    expect(same.item.updatedAt).toBe(T0.toISOString());
  });

  it('feeds only rejected attempts forward as prior findings', () => {
    const afterReject = run(item('a', 'verifying'), rejected([critical('no tests')]));
    const cancelled = run(
      { ...afterReject, state: 'verifying' },
      { type: 'cancel', reason: 'stop', policy: majority }
    );
    expect(cancelled.history.map((a) => a.disposition)).toEqual(['rejected', 'cancelled']);
    expect(priorFindings(cancelled)).toEqual([critical('no tests')]);
  });
});
