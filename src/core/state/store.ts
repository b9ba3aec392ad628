import { z } from 'zod';

import { readTextIfExists, writeFileAtomic } from '../../utils/fs.js';
import { errorMessage, PersistenceError } from '../errors.js';
import { TimestampIso, WorkItemSchema, type WorkItem } from '../work-item/types.js';

export const RunStateSchema = z.object({
  version: z.literal(1),
  items: z.record(WorkItemSchema),
  updatedAt: TimestampIso
});
export type RunState = z.infer<typeof RunStateSchema>;

/** Durable record of every work item; the only source of truth between ticks. */
export interface StateStore {
  load(): Promise<RunState | null>;
  save(state: RunState): Promise<void>;
}

/** `.changeq/state.json`, replaced atomically on every save. */
export class JsonStateStore implements StateStore {
  constructor(private readonly path: string) {}

  async load(): Promise<RunState | null> {
    let raw: string | null;
    try {
      raw = await readTextIfExists(this.path);
    } catch (err) {
      throw new PersistenceError(`Failed to read ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`State file ${this.path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = RunStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(`State file ${this.path} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }

  async save(state: RunState): Promise<void> {
    try {
      await writeFileAtomic(this.path, `${JSON.stringify(state, null, 2)}\n`);
    } catch (err) {
      throw new PersistenceError(`Failed to write ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export function snapshot(items: Record<string, WorkItem>, now: Date): RunState {
  return { version: 1, items, updatedAt: now.toISOString() };
}
