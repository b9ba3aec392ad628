import { InvalidTransitionError } from '../../core/errors.js';
import { lastAttempt } from '../../core/work-item/types.js';
import { installCliCancellation } from '../cancel.js';
import {
  applyManualAction,
  openProject,
  viewProject,
  type CommandResult,
  type ManualAction,
  type ProjectOptions
} from '../project.js';
import { promptConfirm } from '../ui/prompts.js';
import { getRenderer, stateLabel } from '../ui/renderer.js';

export interface ManualCommandOptions extends ProjectOptions {
  id: string;
}

export interface AcceptCommandOptions extends ManualCommandOptions {
  /** Skip the confirmation prompt. */
  yes?: boolean;
  /** Ask the operator; defaults to an inquirer prompt when stdin is a TTY. */
  confirm?: (message: string) => Promise<boolean>;
}

/** `changeq accept <id>`: human confirmation of a change in `needs_review`. */
export async function runAcceptCommand(opts: AcceptCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const { store } = await viewProject(ctx);
  const item = store.find(opts.id);
  if (!item) return { ok: false, details: `Change '${opts.id}' not found` };

  const ask = opts.confirm ?? (interactive() ? defaultConfirm : null);
  if (!opts.yes && item.state === 'needs_review' && ask) {
    const last = lastAttempt(item);
    if (last) {
      const passes = last.votes.filter((v) => v.verdict === 'pass').length;
      r.info(`${item.id}: ${passes}/${last.expectedVoters} voter(s) passed, ${last.findings.length} finding(s)`);
    }
    if (!(await ask(`Accept ${item.id} (${item.title})?`))) {
      r.warn('Not accepted.');
      return { ok: true, details: { id: item.id, state: item.state, changed: false } };
    }
  }

  return await act(opts, 'accept');
}

export async function runRejectCommand(opts: ManualCommandOptions): Promise<CommandResult> {
  return await act(opts, 'reject');
}

export async function runRetryCommand(opts: ManualCommandOptions): Promise<CommandResult> {
  return await act(opts, 'retry');
}

export async function runSkipCommand(opts: ManualCommandOptions): Promise<CommandResult> {
  return await act(opts, 'skip');
}

async function act(opts: ManualCommandOptions, action: ManualAction): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  try {
    const res = await applyManualAction(ctx, opts.id, action);
    if (res.changed) r.success(`${opts.id}: ${stateLabel(res.from)} → ${stateLabel(res.to)}`);
    else r.info(`${opts.id} is already ${res.to}`);
    return { ok: true, details: { id: opts.id, from: res.from, state: res.to, changed: res.changed } };
  } catch (err) {
    if (err instanceof InvalidTransitionError) {
      return { ok: false, details: `Cannot ${action} ${opts.id} while it is ${err.from}` };
    }
    throw err;
  }
}

function interactive(): boolean {
  return Boolean(process.stdin.isTTY) && process.env.CHANGEQ_QUIET !== '1';
}

async function defaultConfirm(message: string): Promise<boolean> {
  const cancellation = installCliCancellation();
  try {
    return await promptConfirm({ message, default: false });
  } finally {
    cancellation.dispose();
  }
}
