import { z } from 'zod';

import { PipelineStage, TimestampIso, WorkItemStateSchema } from '../work-item/types.js';

export const LedgerEventType = z.enum([
  'run_started',
  'run_finished',
  'item_discovered',
  'item_retired',
  'item_state_changed',
  'stage_started',
  'stage_failed',
  'votes_collected',
  'attempt_recorded',
  'item_cancelled',
  'manual_action',
  'notification_failed'
]);
export type LedgerEventType = z.infer<typeof LedgerEventType>;

export const LedgerEnvelope = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: LedgerEventType,
  itemId: z.string().optional(),
  data: z.record(z.unknown()).default({})
});

export const ItemStateChangedEvent = LedgerEnvelope.extend({
  type: z.literal('item_state_changed'),
  itemId: z.string(),
  data: z.object({
    from: WorkItemStateSchema,
    to: WorkItemStateSchema,
    event: z.string(),
    retryCount: z.number().int().nonnegative()
  })
});

export const StageFailedEvent = LedgerEnvelope.extend({
  type: z.literal('stage_failed'),
  itemId: z.string(),
  data: z.object({
    stage: PipelineStage,
    code: z.string(),
    message: z.string()
  })
});

export const ManualActionEvent = LedgerEnvelope.extend({
  type: z.literal('manual_action'),
  itemId: z.string(),
  data: z.object({
    action: z.enum(['accept', 'reject', 'retry', 'skip']),
    from: WorkItemStateSchema,
    to: WorkItemStateSchema
  })
});

/** Every other event type; the typed ones above never fall through to here. */
export const GenericLedgerEvent = LedgerEnvelope.extend({
  type: LedgerEventType.exclude(['item_state_changed', 'stage_failed', 'manual_action'])
});

export const LedgerEntrySchema = z.union([ItemStateChangedEvent, StageFailedEvent, ManualActionEvent, GenericLedgerEvent]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export interface LedgerEntryInput {
  type: LedgerEventType;
  itemId?: string;
  data?: Record<string, unknown>;
}

/** Append-only sink for audit entries; the coordinator depends on this, not on the file writer. */
export interface LedgerSink {
  append(event: LedgerEntryInput): Promise<LedgerEntry>;
}
