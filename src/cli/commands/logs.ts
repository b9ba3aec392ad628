import { ledgerReader, openProject, type CommandResult, type ProjectOptions } from '../project.js';
import { formatClock, safeJson } from '../ui/format.js';
import { getRenderer } from '../ui/renderer.js';
import { INDENT, theme } from '../ui/theme.js';

export interface LogsCommandOptions extends ProjectOptions {
  id: string;
  /** Print each entry's data in full. */
  verbose?: boolean;
}

/** `changeq logs <id>`: the ledger entries recorded for one change, oldest first. */
export async function runLogsCommand(opts: LogsCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const { entries, warnings } = await ledgerReader(ctx).readAllSafe();
  const mine = entries.filter((e) => e.itemId === opts.id);

  r.banner(`Ledger for ${opts.id}`);
  for (const w of warnings) r.warn(w);
  if (mine.length === 0) r.dim('(no entries)');

  for (const e of mine) {
    r.text(`${INDENT}${theme.dim(`${String(e.seq).padStart(5)} ${formatClock(e.timestamp)}`)}  ${e.type}`);
    const data = opts.verbose ? safeJson(e.data) : summarize(e.data);
    if (data) {
      for (const line of data.split('\n')) r.text(`${INDENT}        ${theme.dim(line)}`);
    }
  }
  r.blank();

  return { ok: warnings.length === 0, details: { id: opts.id, entries: mine.length, warnings } };
}

function summarize(data: Record<string, unknown>): string {
  return Object.entries(data)
    .filter(([, v]) => v !== null && v !== undefined && typeof v !== 'object')
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
}
