import { NotFoundError } from '../errors.js';
import type { WorkItem } from './types.js';

/**
 * In-memory view of every known work item, keyed by ID.
 *
 * Holds no behavior beyond lookup and replacement; the state machine decides what a
 * replacement looks like and the coordinator persists the result.
 */
export class WorkItemStore {
  private readonly items = new Map<string, WorkItem>();

  constructor(items: Iterable<WorkItem> = []) {
    for (const item of items) this.items.set(item.id, item);
  }

  static fromRecord(record: Record<string, WorkItem>): WorkItemStore {
    return new WorkItemStore(Object.values(record));
  }

  has(id: string): boolean {
    return this.items.has(id);
  }

  find(id: string): WorkItem | undefined {
    return this.items.get(id);
  }

  get(id: string): WorkItem {
    const item = this.items.get(id);
    if (!item) throw new NotFoundError(id);
    return item;
  }

  put(item: WorkItem): void {
    this.items.set(item.id, item);
  }

  /** Items sorted by ID; retired items are included only when asked for. */
  list(opts: { includeRetired?: boolean } = {}): WorkItem[] {
    const all = [...this.items.values()].sort((a, b) => compareIds(a.id, b.id));
    return opts.includeRetired ? all : all.filter((i) => !i.retired);
  }

  toRecord(): Record<string, WorkItem> {
    const out: Record<string, WorkItem> = {};
    for (const item of this.list({ includeRetired: true })) out[item.id] = item;
    return out;
  }

  get size(): number {
    return this.items.size;
  }
}

/** Code-unit comparison, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
