import { z } from 'zod';

import { RiskPolicyMap } from '../verification/risk-policy.js';

export const NOTIFY_EVENTS = ['change.completed', 'change.failed', 'change.needs_review'] as const;
export const NotifyEvent = z.enum(NOTIFY_EVENTS);
export type NotifyEvent = z.infer<typeof NotifyEvent>;

/** An external command; `{model}` in args is replaced with the configured model. */
const CommandSpec = {
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  model: z.string().min(1).optional()
};

export const VoterConfig = z.object({
  id: z.string().min(1),
  ...CommandSpec
});
export type VoterConfig = z.infer<typeof VoterConfig>;

export const ChangeqConfigSchema = z.object({
  /** Relative to the repo root; detected when absent. */
  changesDir: z.string().min(1).optional(),
  scan: z
    .object({
      /** picomatch patterns over change directory names. */
      exclude: z.array(z.string()).default(['archive'])
    })
    .default({}),
  compiler: z
    .object({
      command: z.string().min(1).optional(),
      args: z.array(z.string()).default([]),
      model: z.string().min(1).optional()
    })
    .default({}),
  executor: z
    .object({
      command: z.string().min(1).optional(),
      args: z.array(z.string()).default([]),
      model: z.string().min(1).optional()
    })
    .default({}),
  verification: z
    .object({
      voters: z.array(VoterConfig).default([]),
      checks: z.array(z.string()).default(['spec_compliance', 'regression_risk', 'architecture']),
      timeoutMs: z.number().int().positive().default(120_000),
      /** Project rules handed to every voter, relative to the repo root. */
      rulesFile: z.string().min(1).optional()
    })
    .default({}),
  riskPolicy: RiskPolicyMap.default({}),
  budgets: z
    .object({
      maxRetries: z.number().int().positive().default(3),
      maxDurationSec: z.number().int().positive().default(600),
      maxTurns: z.number().int().positive().default(50)
    })
    .default({}),
  notify: z
    .object({
      webhookUrl: z.string().url().optional(),
      events: z.array(NotifyEvent).default([...NOTIFY_EVENTS]),
      timeoutMs: z.number().int().positive().default(10_000)
    })
    .default({})
});

export type ChangeqConfig = z.infer<typeof ChangeqConfigSchema>;

/** Config after the changes directory has been resolved. */
export type ResolvedConfig = ChangeqConfig & { changesDir: string };

/** Budgets in effect for one item, after its front matter overrides. */
export interface ItemBudgets {
  maxRetries: number;
  maxDurationMs: number;
  maxTurns: number;
  executorModel?: string;
}
