import { z } from 'zod';

import { RiskPolicyEntry } from '../verification/risk-policy.js';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

export const RiskLevel = z.enum(['low', 'medium', 'high']);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const RISK_ORDER: Record<RiskLevel, number> = { low: 0, medium: 1, high: 2 };

export const WorkItemStateSchema = z.enum([
  'pending',
  'blocked',
  'ready',
  'compiling',
  'running',
  'verifying',
  'accepted',
  'needs_review',
  'failed',
  'skipped'
]);
export type WorkItemState = z.infer<typeof WorkItemStateSchema>;

/** States in which a stage of the pipeline is in flight. */
export const IN_FLIGHT_STATES: ReadonlySet<WorkItemState> = new Set(['compiling', 'running', 'verifying']);

/** States that satisfy a dependency (skip unlocks downstream work). */
export const SATISFYING_STATES: ReadonlySet<WorkItemState> = new Set(['accepted', 'skipped']);

export const TERMINAL_STATES: ReadonlySet<WorkItemState> = new Set(['accepted', 'needs_review', 'failed', 'skipped']);

export const SubTask = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default('')
});
export type SubTask = z.infer<typeof SubTask>;

export const Finding = z.object({
  severity: z.enum(['info', 'warning', 'critical']).catch('info'),
  category: z.string().default(''),
  description: z.string().default('')
});
export type Finding = z.infer<typeof Finding>;

export const Vote = z
  .object({
    voter: z.string().min(1),
    verdict: z.enum(['pass', 'fail']),
    findings: z.array(Finding).default([]),
    summary: z.string().default(''),
    confidence: z.number().min(0).max(1).optional(),
    timestamp: TimestampIso
  })
  .readonly();
export type Vote = z.infer<typeof Vote>;

export const RiskPolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('skip') }),
  z.object({ kind: z.literal('majority'), escalateOnCritical: z.boolean() }),
  z.object({ kind: z.literal('unanimous'), requiresHumanConfirmation: z.boolean() })
]);
export type RiskPolicy = z.infer<typeof RiskPolicySchema>;

export const Disposition = z.enum(['approved', 'rejected', 'needs_review']);
export type Disposition = z.infer<typeof Disposition>;

export const AttemptDisposition = z.enum(['approved', 'rejected', 'needs_review', 'cancelled']);
export type AttemptDisposition = z.infer<typeof AttemptDisposition>;

export const PipelineStage = z.enum(['compile', 'execute', 'verify']);
export type PipelineStage = z.infer<typeof PipelineStage>;

export const VerificationAttempt = z
  .object({
    attempt: z.number().int().positive(),
    votes: z.array(Vote),
    expectedVoters: z.number().int().nonnegative(),
    policy: RiskPolicySchema,
    risk: RiskLevel,
    disposition: AttemptDisposition,
    /** All findings of this attempt, fed into the next compilation. */
    findings: z.array(Finding),
    /** Set when the attempt ended because a stage failed or was cancelled. */
    stage: PipelineStage.optional(),
    message: z.string().optional(),
    timestamp: TimestampIso
  })
  .readonly();
export type VerificationAttempt = z.infer<typeof VerificationAttempt>;

export const ItemOverrides = z.object({
  maxRetries: z.number().int().positive().optional(),
  maxDurationSec: z.number().int().positive().optional(),
  maxTurns: z.number().int().positive().optional(),
  executorModel: z.string().min(1).optional(),
  verification: RiskPolicyEntry.optional()
});
export type ItemOverrides = z.infer<typeof ItemOverrides>;

/** What the scanner discovers for one change directory. */
export const WorkItemSpec = z.object({
  id: z.string().min(1),
  changeDir: z.string(),
  title: z.string(),
  proposal: z.string(),
  tasks: z.array(SubTask).default([]),
  dependsOn: z.array(z.string().min(1)).default([]),
  priority: z.number().int().default(0),
  risk: RiskLevel.default('medium'),
  overrides: ItemOverrides.default({})
});
export type WorkItemSpec = z.infer<typeof WorkItemSpec>;

export const ExecutionResult = z.object({
  success: z.boolean(),
  commit: z.string().optional(),
  diff: z.string(),
  filesChanged: z.array(z.string()),
  log: z.string(),
  turnsUsed: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative()
});
export type ExecutionResult = z.infer<typeof ExecutionResult>;

/** Progress of the in-flight attempt, persisted so a restart does not redo completed stages. */
export const StageProgress = z.object({
  brief: z.string().optional(),
  baseRef: z.string().optional(),
  execution: ExecutionResult.optional(),
  /** Votes of the current attempt, saved before anything acts on their outcome. */
  verdicts: z.object({ votes: z.array(Vote), expectedVoters: z.number().int().nonnegative() }).optional(),
  startedAt: TimestampIso.optional()
});
export type StageProgress = z.infer<typeof StageProgress>;

export const WorkItemSchema = WorkItemSpec.extend({
  state: WorkItemStateSchema,
  retryCount: z.number().int().nonnegative(),
  history: z.array(VerificationAttempt),
  stage: StageProgress.default({}),
  retired: z.boolean().default(false),
  updatedAt: TimestampIso
});
export type WorkItem = z.infer<typeof WorkItemSchema>;

export function newWorkItem(spec: WorkItemSpec, now: Date): WorkItem {
  return {
    ...spec,
    state: 'pending',
    retryCount: 0,
    history: [],
    stage: {},
    retired: false,
    updatedAt: now.toISOString()
  };
}

export function lastAttempt(item: WorkItem): VerificationAttempt | undefined {
  return item.history.length ? item.history[item.history.length - 1] : undefined;
}
