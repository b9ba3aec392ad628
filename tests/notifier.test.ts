import { describe, expect, it } from 'vitest';

import { Notifier, notifyEventFor } from '../src/notify/notifier.js';
import { item, MemoryLedger } from './fakes.js';

type FetchCall = { url: string; method?: string; body?: string };

function fakeFetch(respond: () => Promise<Response>) {
  const calls: FetchCall[] = [];
  const fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    calls.push({ url: String(input), method: init?.method, body: typeof init?.body === 'string' ? init.body : undefined });
    return await respond();
  };
  return { calls, fetch };
}

const done = item('add-search', 'accepted', { title: 'Add search', retryCount: 1 });

describe('Notifier', () => {
  it('posts a JSON payload for enabled events', async () => {
    const { calls, fetch } = fakeFetch(async () => new Response('ok', { status: 200 }));
    const notifier = new Notifier({ webhookUrl: 'http://hooks.test/x', events: ['change.completed'], fetch });

    expect(await notifier.notify('change.completed', done)).toBe(true);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://hooks.test/x');
    expect(calls[0].method).toBe('POST');
    expect(JSON.parse(calls[0].body ?? '')).toEqual({
      event: 'change.completed',
      changeId: 'add-search',
      title: 'Add search',
      state: 'accepted',
      retryCount: 1
    });
  });

  it('does nothing without a webhook or for a disabled event', async () => {
    const { calls, fetch } = fakeFetch(async () => new Response(null, { status: 204 }));
    expect(await new Notifier({ events: ['change.completed'], fetch }).notify('change.completed', done)).toBe(false);
    expect(
      await new Notifier({ webhookUrl: 'http://hooks.test/x', events: ['change.failed'], fetch }).notify('change.completed', done)
    ).toBe(false);
    expect(calls).toHaveLength(0);
  });

  it('records a rejected delivery in the ledger instead of throwing', async () => {
    const ledger = new MemoryLedger();
    const { fetch } = fakeFetch(async () => new Response('nope', { status: 500 }));
    const notifier = new Notifier({ webhookUrl: 'http://hooks.test/x', events: ['change.completed'], fetch, ledger });

    expect(await notifier.notify('change.completed', done)).toBe(false);
    expect(ledger.entries.map((e) => [e.type, e.itemId, e.data])).toEqual([
      ['notification_failed', 'add-search', { event: 'change.completed', message: 'webhook responded 500' }]
    ]);
  });

  it('records a network error', async () => {
    const ledger = new MemoryLedger();
    const { fetch } = fakeFetch(async () => {
      throw new TypeError('fetch failed');
    });
    const notifier = new Notifier({ webhookUrl: 'http://hooks.test/x', events: ['change.failed'], fetch, ledger });

    expect(await notifier.notify('change.failed', item('b', 'failed'))).toBe(false);
    expect(ledger.entries[0].data).toEqual({ event: 'change.failed', message: 'fetch failed' });
  });
});

describe('notifyEventFor', () => {
  it('maps terminal states to events', () => {
    expect(notifyEventFor('accepted')).toBe('change.completed');
    expect(notifyEventFor('failed')).toBe('change.failed');
    expect(notifyEventFor('needs_review')).toBe('change.needs_review');
    expect(notifyEventFor('skipped')).toBeNull();
    expect(notifyEventFor('ready')).toBeNull();
  });
});
