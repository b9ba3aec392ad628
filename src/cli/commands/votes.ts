import { describePolicy } from '../../core/verification/risk-policy.js';
import { openProject, viewProject, type CommandResult, type ProjectOptions } from '../project.js';
import { plural, verificationLine } from '../ui/format.js';
import { getRenderer } from '../ui/renderer.js';
import { INDENT, theme } from '../ui/theme.js';

export interface VotesCommandOptions extends ProjectOptions {
  id: string;
}

/** `changeq votes <id>`: every recorded attempt with its votes and findings. */
export async function runVotesCommand(opts: VotesCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const { store } = await viewProject(ctx);
  const item = store.find(opts.id);
  if (!item) return { ok: false, details: `Change '${opts.id}' not found` };

  r.banner(`Votes for ${item.id}`);
  if (item.history.length === 0) r.dim('(no attempts recorded)');

  for (const a of item.history) {
    const disposition =
      a.disposition === 'approved'
        ? theme.success(a.disposition)
        : a.disposition === 'rejected'
          ? theme.error(a.disposition)
          : theme.warning(a.disposition);
    r.text(
      `${INDENT}${theme.bold(`#${a.attempt}`)} ${disposition} ${theme.dim(`${a.risk} risk, ${describePolicy(a.policy)}, ${a.votes.length}/${a.expectedVoters} voted`)}`
    );
    if (a.message) r.dim(`${a.stage ?? 'stage'} failed: ${a.message}`);
    for (const v of a.votes) {
      r.text(verificationLine({ name: v.voter, passed: v.verdict === 'pass', detail: `${v.verdict}, ${plural(v.findings.length, 'finding')}` }));
      if (v.summary) r.text(`${INDENT}    ${theme.dim(v.summary)}`);
      for (const f of v.findings) r.text(`${INDENT}    ${theme.bullet} [${f.severity}] ${f.category}: ${f.description}`);
    }
    r.blank();
  }

  return { ok: true, details: { id: item.id, attempts: item.history.length } };
}
