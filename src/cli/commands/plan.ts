import { planOrder } from '../../core/scheduler.js';
import { resolvePolicy, describePolicy } from '../../core/verification/risk-policy.js';
import { openProject, viewProject, type CommandResult, type ProjectOptions } from '../project.js';
import { getRenderer, stateLabel } from '../ui/renderer.js';
import { theme } from '../ui/theme.js';

/**
 * `changeq plan`: dry run. Prints the order changes would be dispatched in if each were
 * accepted first time. Reads state and change directories; writes nothing.
 */
export async function runPlanCommand(opts: ProjectOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const { store } = await viewProject(ctx);
  const plan = planOrder(store.list());

  r.banner('Plan');
  r.table(
    'plan',
    ['#', 'ID', 'STATE', 'RISK', 'POLICY', 'UNLOCKS', 'DEPENDS ON'],
    plan.steps.map((s, i) => [
      String(i + 1),
      s.resumed ? `${s.item.id} ${theme.dim('(resume)')}` : s.item.id,
      stateLabel(s.item.state),
      s.item.risk,
      describePolicy(resolvePolicy(s.item.risk, ctx.config.riskPolicy, s.item.overrides.verification)),
      String(s.unlockDegree),
      s.item.dependsOn.join(', ') || theme.dim('-')
    ])
  );

  if (plan.unreachable.length) {
    r.blank();
    r.warn(`${plan.unreachable.length} change(s) wait on a change that will not complete on its own:`);
    for (const item of plan.unreachable) r.dim(`${item.id}  (depends on ${item.dependsOn.join(', ')})`);
  }
  r.blank();

  return { ok: true, details: { order: plan.steps.map((s) => s.item.id), unreachable: plan.unreachable.map((i) => i.id) } };
}
