import { stringifyYaml } from '../../utils/fs.js';
import { openProject, type CommandResult, type ProjectOptions } from '../project.js';
import { getRenderer } from '../ui/renderer.js';
import { INDENT, theme } from '../ui/theme.js';

export interface ConfigCommandOptions extends ProjectOptions {
  /** Also print each layer as read. */
  layers?: boolean;
}

/** `changeq config`: the merged, validated configuration in effect. */
export async function runConfigCommand(opts: ConfigCommandOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);

  r.banner('Configuration');
  for (const line of stringifyYaml(ctx.config).trimEnd().split('\n')) r.text(`${INDENT}${line}`);

  if (opts.layers) {
    for (const layer of ctx.loaded.layers) {
      r.blank();
      r.text(`${INDENT}${theme.bold(layer.name)} ${theme.dim(layer.source)}`);
      const keys = Object.keys(layer.values);
      if (keys.length === 0) {
        r.dim('(empty)');
        continue;
      }
      for (const line of stringifyYaml(layer.values).trimEnd().split('\n')) r.text(`${INDENT}  ${line}`);
    }
  }
  r.blank();

  return { ok: true, details: ctx.config };
}
