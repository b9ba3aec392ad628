import { describe, expect, it } from 'vitest';
import { appendFile, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';

import { LedgerReader } from '../src/core/ledger/reader.js';
import { LedgerWriter } from '../src/core/ledger/writer.js';

describe('ledger', () => {
  it('appends JSONL entries with monotonic seq and verifies integrity', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const writer = await LedgerWriter.open(ledgerPath);
    const e1 = await writer.append({ type: 'run_started', data: { target: null } });
    const e2 = await writer.append({
      type: 'item_state_changed',
      itemId: 'add-login',
      data: { from: 'ready', to: 'compiling', event: 'dispatch', retryCount: 0 }
    });

    expect(e1.seq).toBe(1);
    expect(e2.seq).toBe(2);
    expect(e1.timestamp).toMatch(/Z$/);

    const reader = new LedgerReader(ledgerPath);
    const all = await reader.readAll();
    expect(all).toHaveLength(2);
    expect(all[1].itemId).toBe('add-login');

    const integrity = await reader.verifyIntegrity();
    expect(integrity.ok).toBe(true);
  });

  it('continues the sequence when reopened', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const first = await LedgerWriter.open(ledgerPath);
    await first.append({ type: 'run_started' });
    await first.append({ type: 'run_finished' });

    const second = await LedgerWriter.open(ledgerPath);
    const e3 = await second.append({ type: 'item_discovered', itemId: 'a' });
    expect(e3.seq).toBe(3);
  });

  it('skips a garbled trailing line when computing the next seq', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const writer = await LedgerWriter.open(ledgerPath);
    await writer.append({ type: 'run_started' });
    await appendFile(ledgerPath, '{"seq": 2, "timest\n', 'utf8');

    const reopened = await LedgerWriter.open(ledgerPath);
    const next = await reopened.append({ type: 'run_finished' });
    expect(next.seq).toBe(2);

    const { entries, warnings } = await new LedgerReader(ledgerPath).readAllSafe();
    expect(entries.map((e) => e.seq)).toEqual([1, 2]);
    expect(warnings).toHaveLength(1);
  });

  it('filters entries by item', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    const writer = await LedgerWriter.open(ledgerPath);
    await writer.append({ type: 'item_discovered', itemId: 'a' });
    await writer.append({ type: 'item_discovered', itemId: 'b' });
    await writer.append({ type: 'stage_started', itemId: 'a', data: { stage: 'compile' } });

    const forA = await new LedgerReader(ledgerPath).forItem('a');
    expect(forA.map((e) => e.type)).toEqual(['item_discovered', 'stage_started']);
  });

  it('rejects a typed entry whose data does not match its type', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-ledger-'));
    const writer = await LedgerWriter.open(join(dir, 'ledger.jsonl'));

    await expect(writer.append({ type: 'item_state_changed', itemId: 'a', data: { from: 'ready' } })).rejects.toBeInstanceOf(
      ZodError
    );
    await expect(
      writer.append({ type: 'stage_failed', itemId: 'a', data: { stage: 'deploy', code: 'x', message: 'y' } })
    ).rejects.toBeInstanceOf(ZodError);

    const ok = await writer.append({ type: 'stage_started', itemId: 'a', data: { stage: 'compile' } });
    expect(ok.seq).toBe(1);
  });

  it('detects sequence gaps', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'changeq-ledger-'));
    const ledgerPath = join(dir, 'ledger.jsonl');

    await writeFile(
      ledgerPath,
      `${JSON.stringify({ seq: 1, timestamp: new Date().toISOString(), type: 'run_started', data: {} })}\n` +
        `${JSON.stringify({ seq: 3, timestamp: new Date().toISOString(), type: 'run_finished', data: {} })}\n`,
      'utf8'
    );

    const reader = new LedgerReader(ledgerPath);
    const res = await reader.verifyIntegrity();
    expect(res.ok).toBe(false);
    expect(res.message).toContain('Sequence gap');
  });
});
