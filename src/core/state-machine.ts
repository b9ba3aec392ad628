import { InvalidTransitionError } from './errors.js';
import type {
  Disposition,
  ExecutionResult,
  Finding,
  PipelineStage,
  RiskPolicy,
  VerificationAttempt,
  Vote,
  WorkItem,
  WorkItemState
} from './work-item/types.js';

export type ItemEvent =
  | { type: 'resolve'; unlocked: boolean }
  | { type: 'dispatch'; unlocked: boolean }
  | { type: 'compiled'; brief: string; baseRef?: string }
  | { type: 'executed'; result: ExecutionResult }
  | {
      type: 'verified';
      disposition: Disposition;
      votes: readonly Vote[];
      expectedVoters: number;
      policy: RiskPolicy;
    }
  | { type: 'stage_failed'; stage: PipelineStage; message: string; policy: RiskPolicy }
  | { type: 'cancel'; reason: string; policy: RiskPolicy }
  | { type: 'confirm' }
  | { type: 'reject' }
  | { type: 'retry' }
  | { type: 'skip' };

export type ItemEventType = ItemEvent['type'];

export interface TransitionContext {
  maxRetries: number;
  now: Date;
}

export interface Transition {
  item: WorkItem;
  from: WorkItemState;
  to: WorkItemState;
  /** False when the event was an idempotent no-op (re-applied during replay). */
  changed: boolean;
  /** The attempt appended by this transition, if any. */
  attempt?: VerificationAttempt;
}

const ALLOWED: Record<ItemEventType, readonly WorkItemState[]> = {
  resolve: ['pending', 'blocked', 'ready'],
  dispatch: ['ready'],
  compiled: ['compiling'],
  executed: ['running'],
  verified: ['verifying'],
  stage_failed: ['compiling', 'running', 'verifying'],
  cancel: ['compiling', 'running', 'verifying'],
  confirm: ['needs_review'],
  reject: ['needs_review', 'ready', 'blocked'],
  retry: ['failed'],
  skip: ['pending', 'blocked', 'ready', 'failed']
};

/** Manual actions whose target state makes a repeat harmless. */
const IDEMPOTENT_TARGET: Partial<Record<ItemEventType, WorkItemState>> = {
  confirm: 'accepted',
  reject: 'failed',
  skip: 'skipped'
};

export function canApply(state: WorkItemState, type: ItemEventType): boolean {
  return ALLOWED[type].includes(state);
}

/**
 * Pure transition function: the only place item state, retry count and history change.
 *
 * Throws `InvalidTransitionError` for any (state, event) pair not in the table.
 */
export function applyEvent(item: WorkItem, event: ItemEvent, ctx: TransitionContext): Transition {
  const from = item.state;

  if (IDEMPOTENT_TARGET[event.type] === from) {
    return { item, from, to: from, changed: false };
  }
  if (!canApply(from, event.type)) {
    throw new InvalidTransitionError(item.id, from, event.type);
  }

  const stamp = ctx.now.toISOString();
  const move = (to: WorkItemState, patch: Partial<WorkItem> = {}, attempt?: VerificationAttempt): Transition => {
    if (to === from && !attempt && Object.keys(patch).length === 0) {
      return { item, from, to, changed: false };
    }
    const history = attempt ? [...item.history, attempt] : item.history;
    return { item: { ...item, ...patch, state: to, history, updatedAt: stamp }, from, to, changed: true, attempt };
  };

  switch (event.type) {
    case 'resolve':
      return move(event.unlocked ? 'ready' : 'blocked');

    case 'dispatch':
      if (!event.unlocked) throw new InvalidTransitionError(item.id, from, 'dispatch (dependencies not accepted)');
      return move('compiling', { stage: { startedAt: stamp } });

    case 'compiled':
      return move('running', { stage: { ...item.stage, brief: event.brief, baseRef: event.baseRef } });

    case 'executed':
      return move('verifying', { stage: { ...item.stage, execution: event.result } });

    case 'verified': {
      const attempt = buildAttempt(item, {
        votes: [...event.votes],
        expectedVoters: event.expectedVoters,
        policy: event.policy,
        disposition: event.disposition,
        findings: event.votes.flatMap((v) => v.findings),
        timestamp: stamp
      });
      if (event.disposition === 'approved') return move('accepted', { stage: {} }, attempt);
      if (event.disposition === 'needs_review') return move('needs_review', { stage: {} }, attempt);
      return rejectForRetry(item, attempt, ctx, move);
    }

    case 'stage_failed': {
      const attempt = buildAttempt(item, {
        votes: [],
        expectedVoters: 0,
        policy: event.policy,
        disposition: 'rejected',
        findings: [{ severity: 'critical', category: event.stage, description: event.message }],
        stage: event.stage,
        message: event.message,
        timestamp: stamp
      });
      return rejectForRetry(item, attempt, ctx, move);
    }

    case 'cancel': {
      // Only leaving `verifying` records an attempt; earlier stages have nothing to judge.
      const attempt =
        from === 'verifying'
          ? buildAttempt(item, {
              votes: [],
              expectedVoters: 0,
              policy: event.policy,
              disposition: 'cancelled',
              findings: [],
              stage: 'verify',
              message: event.reason,
              timestamp: stamp
            })
          : undefined;
      return move('ready', { stage: {} }, attempt);
    }

    case 'confirm':
      return move('accepted');

    case 'reject':
      return move('failed', { stage: {} });

    case 'retry':
      return move('ready', { stage: {} });

    case 'skip':
      return move('skipped', { stage: {} });
  }
}

type Move = (to: WorkItemState, patch?: Partial<WorkItem>, attempt?: VerificationAttempt) => Transition;

/** Every rejection counts; the item retries while the new count stays below the limit. */
function rejectForRetry(item: WorkItem, attempt: VerificationAttempt, ctx: TransitionContext, move: Move): Transition {
  const retryCount = item.retryCount + 1;
  const to: WorkItemState = retryCount < ctx.maxRetries ? 'ready' : 'failed';
  return move(to, { retryCount, stage: {} }, attempt);
}

function buildAttempt(
  item: WorkItem,
  fields: Omit<VerificationAttempt, 'attempt' | 'risk'>
): VerificationAttempt {
  return { attempt: item.history.length + 1, risk: item.risk, ...fields };
}

/** Findings of every recorded rejection, oldest first; fed into the next compilation. */
export function priorFindings(item: WorkItem): Finding[] {
  return item.history.filter((a) => a.disposition === 'rejected').flatMap((a) => a.findings);
}
