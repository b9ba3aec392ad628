import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isErrnoCode } from '../errors.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEntryInput, type LedgerSink } from './types.js';

export class LedgerWriter implements LedgerSink {
  private nextSeq: number;
  private ledgerPath: string;
  private now: () => Date;

  private constructor(ledgerPath: string, nextSeq: number, now: () => Date) {
    this.ledgerPath = ledgerPath;
    this.nextSeq = nextSeq;
    this.now = now;
  }

  static async open(ledgerPath: string, opts: { now?: () => Date } = {}): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });

    const nextSeq = await computeNextSeq(ledgerPath);
    return new LedgerWriter(ledgerPath, nextSeq, opts.now ?? (() => new Date()));
  }

  async append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry: LedgerEntry = LedgerEntrySchema.parse({
      ...event,
      data: event.data ?? {},
      seq: this.nextSeq,
      timestamp: this.now().toISOString()
    });

    // One JSON object per line (JSONL). Append-only.
    const fh = await open(this.ledgerPath, 'a');
    try {
      await fh.writeFile(`${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
      await fh.sync();
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    return entry;
  }
}

async function computeNextSeq(ledgerPath: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return 1;
    throw err;
  }

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // A crash mid-write can leave a garbled trailing line; take the last one that parses.
  for (let i = lines.length - 1; i >= 0; i--) {
    const seq = readSeq(lines[i]);
    if (seq !== null) return seq + 1;
  }
  return 1;
}

function readSeq(line: string): number | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === 'object' && parsed !== null && 'seq' in parsed) {
      const seq = parsed.seq;
      if (typeof seq === 'number' && Number.isFinite(seq)) return seq;
    }
    return null;
  } catch {
    return null;
  }
}
