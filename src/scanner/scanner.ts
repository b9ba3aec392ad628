import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import picomatch from 'picomatch';
import { z } from 'zod';

import { ConfigError, errorMessage, isErrnoCode } from '../core/errors.js';
import { RiskPolicyEntry } from '../core/verification/risk-policy.js';
import { compareIds } from '../core/work-item/store.js';
import { RiskLevel, type WorkItemSpec } from '../core/work-item/types.js';
import { fileExists, readText, readTextIfExists } from '../utils/fs.js';
import { firstHeading, parseFrontMatter } from './frontmatter.js';
import { parseTasks } from './tasks.js';

export interface ScanOptions {
  repoRoot: string;
  /** Relative to `repoRoot`. */
  changesDir: string;
  /** picomatch patterns matched against change directory names. */
  exclude?: readonly string[];
}

const IdList = z.preprocess(
  (v) => (typeof v === 'string' ? [v] : v === null ? [] : v),
  z.array(z.string().min(1)).default([])
);

/** Recognised proposal front matter keys; anything else is ignored. */
export const ProposalMeta = z.object({
  depends_on: IdList,
  priority: z.number().int().default(0),
  risk: RiskLevel.default('medium'),
  max_retries: z.number().int().positive().optional(),
  max_duration_sec: z.number().int().positive().optional(),
  max_turns: z.number().int().positive().optional(),
  executor_model: z.string().min(1).optional(),
  verification: RiskPolicyEntry.optional()
});

/**
 * Every subdirectory of the changes directory holding a `proposal.md`, sorted by name.
 * A missing changes directory yields no items.
 */
export async function scanChanges(opts: ScanOptions): Promise<WorkItemSpec[]> {
  const root = join(opts.repoRoot, opts.changesDir);
  const isExcluded = picomatch([...(opts.exclude ?? [])], { dot: true });

  let entries: Array<{ name: string; isDirectory(): boolean }>;
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return [];
    throw err;
  }

  const names = entries
    .filter((e) => e.isDirectory() && !isExcluded(e.name))
    .map((e) => e.name)
    .sort(compareIds);

  const specs: WorkItemSpec[] = [];
  for (const name of names) {
    const dir = join(root, name);
    if (!(await fileExists(join(dir, 'proposal.md')))) continue;
    specs.push(await readChange(dir, name, join(opts.changesDir, name)));
  }
  return specs;
}

export async function readChange(dir: string, id: string, changeDir: string): Promise<WorkItemSpec> {
  const proposal = await readText(join(dir, 'proposal.md'));

  let fm: ReturnType<typeof parseFrontMatter>;
  try {
    fm = parseFrontMatter(proposal);
  } catch (err) {
    throw new ConfigError(`Change '${id}': malformed front matter: ${errorMessage(err)}`, { cause: err });
  }

  const meta = ProposalMeta.safeParse(fm.meta);
  if (!meta.success) {
    const issue = meta.error.issues[0];
    throw new ConfigError(`Change '${id}': invalid front matter at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown'}`);
  }

  const tasksRaw = await readTextIfExists(join(dir, 'tasks.md'));
  const m = meta.data;

  return {
    id,
    changeDir,
    title: firstHeading(fm.body) ?? id,
    proposal: fm.body.trim(),
    tasks: tasksRaw === null ? [] : parseTasks(tasksRaw),
    dependsOn: m.depends_on,
    priority: m.priority,
    risk: m.risk,
    overrides: {
      maxRetries: m.max_retries,
      maxDurationSec: m.max_duration_sec,
      maxTurns: m.max_turns,
      executorModel: m.executor_model,
      verification: m.verification
    }
  };
}
