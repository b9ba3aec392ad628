import { itemBudgets } from '../../core/config/loader.js';
import { DependencyGraph } from '../../core/graph/dependency-graph.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import { describePolicy, resolvePolicy } from '../../core/verification/risk-policy.js';
import { lastAttempt, type WorkItem, type WorkItemState } from '../../core/work-item/types.js';
import { ledgerReader, openProject, viewProject, type CommandResult, type ProjectContext, type ProjectOptions } from '../project.js';
import { getRenderer, stateLabel } from '../ui/renderer.js';
import { INDENT, theme } from '../ui/theme.js';
import { formatClock } from '../ui/format.js';

export interface StatusCommandOptions extends ProjectOptions {
  id?: string;
  /** Ledger entries shown in the single-change view. */
  tail?: number;
}

/**
 * `changeq status [id]`: every change with its state and retries, or one change in detail
 * with its recent ledger entries. Read-only.
 */
export async function runStatusCommand(opts: StatusCommandOptions = {}): Promise<CommandResult> {
  const ctx = await openProject(opts);
  const { store } = await viewProject(ctx);

  if (opts.id !== undefined) {
    const item = store.find(opts.id);
    if (!item) return { ok: false, details: `Change '${opts.id}' not found` };
    const graph = DependencyGraph.build(store.list());
    await showItem(ctx, item, graph, opts.tail ?? 10);
    return { ok: true, details: { id: item.id, state: item.state, retryCount: item.retryCount } };
  }

  const r = getRenderer();
  const items = store.list();
  r.banner('Status');
  r.table(
    'status',
    ['ID', 'STATE', 'RETRIES', 'RISK', 'LAST ATTEMPT', 'UPDATED'],
    items.map((i) => [
      i.id,
      stateLabel(i.state),
      `${i.retryCount}/${itemBudgets(ctx.config, i).maxRetries}`,
      i.risk,
      lastAttempt(i)?.disposition ?? theme.dim('-'),
      formatClock(i.updatedAt)
    ])
  );

  const counts = countStates(items);
  r.blank();
  r.text(
    INDENT +
      Object.entries(counts)
        .map(([state, n]) => `${state} ${theme.bold(String(n))}`)
        .join(theme.dim('  |  '))
  );
  r.blank();
  return { ok: true, details: counts };
}

async function showItem(ctx: ProjectContext, item: WorkItem, graph: DependencyGraph, tailN: number): Promise<void> {
  const r = getRenderer();
  const budgets = itemBudgets(ctx.config, item);
  const policy = resolvePolicy(item.risk, ctx.config.riskPolicy, item.overrides.verification);

  r.banner(item.id);
  r.field('Title', item.title);
  r.field('State', stateLabel(item.state));
  r.field('Retries', `${item.retryCount}/${budgets.maxRetries}`);
  r.field('Risk', `${item.risk} (${describePolicy(policy)})`);
  r.field('Priority', String(item.priority));
  r.field('Depends on', item.dependsOn.join(', ') || theme.dim('(none)'));
  r.field('Dependents', graph.dependentsOf(item.id).join(', ') || theme.dim('(none)'));
  r.field('Directory', item.changeDir);
  if (item.retired) r.warn('retired: its change directory no longer exists');

  if (item.stage.baseRef) r.field('Base ref', item.stage.baseRef.slice(0, 12));
  if (item.stage.execution) {
    const e = item.stage.execution;
    r.field('Execution', `${e.filesChanged.length} file(s), ${e.turnsUsed} turn(s)`);
  }

  r.blank();
  r.text(`${INDENT}${theme.bold('Tasks')}`);
  if (item.tasks.length === 0) r.dim('(no tasks.md)');
  for (const t of item.tasks) r.text(`${INDENT}  ${theme.bullet} ${t.id} ${t.title}`);

  const last = lastAttempt(item);
  if (last) {
    r.blank();
    r.text(`${INDENT}${theme.bold(`Last attempt (#${last.attempt})`)} ${last.disposition}`);
    if (last.message) r.dim(`${last.stage ?? ''} ${last.message}`.trim());
    for (const f of last.findings.slice(0, 5)) r.text(`${INDENT}  ${severityMark(f.severity)} ${f.category}: ${f.description}`);
  }

  const { entries, warnings } = await ledgerReader(ctx).readAllSafe();
  const recent = entries.filter((e) => e.itemId === item.id).slice(-tailN);
  r.blank();
  r.text(`${INDENT}${theme.bold('Recent events')} ${theme.dim(`(last ${tailN})`)}`);
  for (const w of warnings) r.warn(w);
  if (recent.length === 0) r.dim('(no events)');
  for (const e of recent) r.text(`${INDENT}  ${theme.dim(formatClock(e.timestamp))}  ${e.type.padEnd(20)}${detail(e)}`);
  r.blank();
}

function countStates(items: readonly WorkItem[]): Partial<Record<WorkItemState, number>> {
  const counts: Partial<Record<WorkItemState, number>> = {};
  for (const i of items) counts[i.state] = (counts[i.state] ?? 0) + 1;
  return counts;
}

function severityMark(severity: 'info' | 'warning' | 'critical'): string {
  if (severity === 'critical') return theme.error('critical');
  if (severity === 'warning') return theme.warning('warning');
  return theme.dim('info');
}

export function detail(entry: LedgerEntry): string {
  const d: Record<string, unknown> = entry.data;
  const parts: string[] = [];
  if (typeof d.from === 'string' && typeof d.to === 'string') parts.push(`${d.from} → ${d.to}`);
  if (typeof d.event === 'string') parts.push(d.event);
  if (typeof d.action === 'string') parts.push(d.action);
  if (typeof d.stage === 'string') parts.push(d.stage);
  if (typeof d.message === 'string') parts.push(d.message);
  if (typeof d.disposition === 'string') parts.push(d.disposition);
  return parts.length ? `  ${theme.dim(parts.join('  '))}` : '';
}
