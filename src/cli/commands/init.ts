import { join, resolve } from 'node:path';

import { ensureDir, fileExists, readText, writeText } from '../../utils/fs.js';
import { detectChangesDir, initWorkspace } from '../../workspace/layout.js';
import type { CommandResult } from '../project.js';
import { getRenderer } from '../ui/renderer.js';
import { theme } from '../ui/theme.js';

export interface InitCommandOptions {
  repoRoot?: string;
}

/** Run state and personal overrides stay out of version control. */
export const GITIGNORE_ENTRIES = ['.changeq/state.json', '.changeq/ledger.jsonl', '.changeq/local.config.yaml'];

/**
 * `changeq init`: creates `.changeq/` with a commented config, the changes directory
 * and the `.gitignore` entries. Re-running it keeps an existing config untouched.
 */
export async function runInitCommand(opts: InitCommandOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const repoRoot = resolve(opts.repoRoot ?? process.cwd());

  const paths = await initWorkspace(repoRoot);
  const changesDir = await detectChangesDir(repoRoot);

  const created: string[] = [];
  if (!(await fileExists(paths.configPath))) {
    await writeText(paths.configPath, defaultConfig(changesDir));
    created.push('.changeq/config.yaml');
  }
  await ensureDir(join(repoRoot, changesDir));
  const ignored = await ensureGitignore(repoRoot);

  r.success(`Initialized changeq in ${repoRoot}`);
  for (const c of created) r.dim(`created ${c}`);
  if (ignored.length) r.dim(`.gitignore += ${ignored.join(', ')}`);
  r.info(`Add change directories under ${theme.bold(changesDir)}/, each with a proposal.md`);
  return { ok: true, details: { created, ignored, changesDir } };
}

async function ensureGitignore(repoRoot: string): Promise<string[]> {
  const p = join(repoRoot, '.gitignore');
  if (!(await fileExists(p))) {
    await writeText(p, `${GITIGNORE_ENTRIES.join('\n')}\n`);
    return [...GITIGNORE_ENTRIES];
  }
  const current = await readText(p);
  const lines = new Set(current.split('\n').map((l) => l.trim()).filter(Boolean));
  const missing = GITIGNORE_ENTRIES.filter((e) => !lines.has(e));
  if (missing.length) {
    const sep = current.endsWith('\n') || current.length === 0 ? '' : '\n';
    await writeText(p, `${current}${sep}${missing.join('\n')}\n`);
  }
  return missing;
}

function defaultConfig(changesDir: string): string {
  return `# changeq configuration (shared, tracked).
# Personal overrides go in .changeq/local.config.yaml; CHANGEQ_* env vars win over both.

changesDir: ${changesDir}

executor:
  # Agent CLI run in the repository root; the brief arrives on stdin.
  # Args may use {model}, {maxTurns} and {change}.
  # command: my-agent
  args: []

verification:
  voters: []
  #  - id: reviewer-a
  #    command: review-agent
  #    args: ["--model", "{model}"]
  #    model: some-model
  checks: [spec_compliance, regression_risk, architecture]
  timeoutMs: 120000

riskPolicy:
  low: skip
  medium: majority
  high: unanimous

budgets:
  maxRetries: 3
  maxDurationSec: 600
  maxTurns: 50
`;
}
