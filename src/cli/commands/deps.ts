import { DependencyGraph } from '../../core/graph/dependency-graph.js';
import { openProject, viewProject, type CommandResult, type ProjectOptions } from '../project.js';
import { getRenderer, stateLabel } from '../ui/renderer.js';
import { INDENT, theme } from '../ui/theme.js';

/** `changeq deps`: the dependency graph, dependencies first, indented by depth. */
export async function runDepsCommand(opts: ProjectOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const { store } = await viewProject(ctx);
  const items = store.list();
  const graph = DependencyGraph.build(items);
  const depths = graph.depths();

  r.banner('Dependencies');
  if (items.length === 0) r.dim('(no changes)');
  for (const id of graph.topologicalOrder()) {
    const item = store.get(id);
    const depth = depths.get(id) ?? 0;
    const deps = graph.dependenciesOf(id);
    const arrow = deps.length ? ` ${theme.dim('←')} ${deps.join(', ')}` : '';
    r.text(`${INDENT}${'  '.repeat(depth)}${theme.bold(id)} ${stateLabel(item.state)}${arrow}`);
  }
  r.blank();

  return {
    ok: true,
    details: Object.fromEntries(
      items.map((i) => [i.id, { dependsOn: graph.dependenciesOf(i.id), dependents: graph.dependentsOf(i.id) }])
    )
  };
}
