import { openLedger, openProject, syncProject, type CommandResult, type ProjectOptions } from '../project.js';
import { getRenderer, stateLabel } from '../ui/renderer.js';
import { theme } from '../ui/theme.js';

/**
 * `changeq scan`: discovers change directories, validates the dependency graph and
 * records new or retired changes. Nothing is dispatched.
 */
export async function runScanCommand(opts: ProjectOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const ledger = await openLedger(ctx);
  const { store, discovered, retired } = await syncProject(ctx, ledger);
  const items = store.list();

  r.banner(`Changes in ${ctx.config.changesDir}`);
  r.table(
    'scan',
    ['ID', 'STATE', 'RISK', 'PRIORITY', 'DEPENDS ON'],
    items.map((i) => [i.id, stateLabel(i.state), i.risk, String(i.priority), i.dependsOn.join(', ') || theme.dim('-')])
  );
  r.blank();
  for (const spec of discovered) r.success(`discovered ${spec.id}`);
  for (const item of retired) r.warn(`retired ${item.id} (change directory removed)`);

  return {
    ok: true,
    details: { items: items.map((i) => i.id), discovered: discovered.map((s) => s.id), retired: retired.map((i) => i.id) }
  };
}
