import type { NotifyEvent } from '../core/config/schema.js';
import { errorMessage } from '../core/errors.js';
import type { LedgerSink } from '../core/ledger/types.js';
import type { WorkItem } from '../core/work-item/types.js';
import type { Logger } from '../utils/logger.js';

export interface NotifierOptions {
  webhookUrl?: string;
  events: readonly NotifyEvent[];
  timeoutMs?: number;
  logger?: Logger;
  ledger?: LedgerSink;
  fetch?: typeof fetch;
}

export interface NotificationPayload {
  event: NotifyEvent;
  changeId: string;
  title: string;
  state: WorkItem['state'];
  retryCount: number;
}

/** Webhook notifications. Delivery problems are logged and recorded, never thrown. */
export class Notifier {
  private readonly enabled: ReadonlySet<NotifyEvent>;

  constructor(private readonly opts: NotifierOptions) {
    this.enabled = new Set(opts.events);
  }

  async notify(event: NotifyEvent, item: WorkItem): Promise<boolean> {
    const url = this.opts.webhookUrl;
    if (!url || !this.enabled.has(event)) return false;

    const payload: NotificationPayload = {
      event,
      changeId: item.id,
      title: item.title,
      state: item.state,
      retryCount: item.retryCount
    };

    const doFetch = this.opts.fetch ?? fetch;
    try {
      const res = await doFetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 10_000)
      });
      if (!res.ok) {
        await this.recordFailure(event, item.id, `webhook responded ${res.status}`);
        return false;
      }
      return true;
    } catch (err) {
      await this.recordFailure(event, item.id, errorMessage(err));
      return false;
    }
  }

  private async recordFailure(event: NotifyEvent, itemId: string, message: string): Promise<void> {
    this.opts.logger?.warn('notification failed', { event, itemId, message });
    if (!this.opts.ledger) return;
    try {
      await this.opts.ledger.append({ type: 'notification_failed', itemId, data: { event, message } });
    } catch (err) {
      this.opts.logger?.error('failed to record notification failure', { error: errorMessage(err) });
    }
  }
}

/** Notification that a state reached by an item warrants, if any. */
export function notifyEventFor(state: WorkItem['state']): NotifyEvent | null {
  switch (state) {
    case 'accepted':
      return 'change.completed';
    case 'failed':
      return 'change.failed';
    case 'needs_review':
      return 'change.needs_review';
    default:
      return null;
  }
}
