import { execa } from 'execa';

import type { WorkingTree } from '../collaborators/types.js';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe'
  });
  return res.stdout;
}

function lines(out: string): string[] {
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

/** Porcelain status outside `.changeq/`, which holds the run state. */
async function isClean(repo: GitRepo): Promise<boolean> {
  const out = (await run(repo, ['status', '--porcelain'])).split('\n').filter(Boolean);
  return out.every((l) => l.slice(3).startsWith('.changeq/'));
}

async function listUntracked(repo: GitRepo): Promise<string[]> {
  return lines(await run(repo, ['ls-files', '--others', '--exclude-standard'])).filter((p) => !p.startsWith('.changeq/'));
}

/** Paths changed since `fromCommit`, untracked files included. */
export async function diffFiles(repo: GitRepo, fromCommit: string): Promise<string[]> {
  const [out, untracked] = await Promise.all([run(repo, ['diff', '--name-only', fromCommit]), listUntracked(repo)]);
  return Array.from(new Set([...lines(out), ...untracked])).sort();
}

/**
 * `git diff <commit>` against the working tree (committed, staged and unstaged changes).
 * Untracked files do not show up in raw diff output, so they are listed after it.
 */
export async function diff(repo: GitRepo, fromCommit: string): Promise<string> {
  const [raw, untracked] = await Promise.all([run(repo, ['diff', fromCommit]), listUntracked(repo)]);
  if (!untracked.length) return raw;
  return `${raw}${raw.endsWith('\n') || !raw ? '' : '\n'}${untracked.map((p) => `# untracked: ${p}`).join('\n')}\n`;
}

export async function resetHard(repo: GitRepo, commit: string): Promise<void> {
  await run(repo, ['reset', '--hard', commit]);
}

/** Stages everything outside `.changeq/` and commits it; nothing staged means no commit. */
async function commitAll(repo: GitRepo, message: string): Promise<string> {
  await run(repo, ['add', '-A', '--', '.', ':(exclude).changeq']);
  const staged = lines(await run(repo, ['diff', '--cached', '--name-only']));
  if (staged.length) await run(repo, ['commit', '-m', message]);
  return await getCurrentCommit(repo);
}

/** Removes untracked files but keeps `.changeq/`, which holds the run state. */
export async function clean(repo: GitRepo): Promise<void> {
  await run(repo, ['clean', '-fd', '-e', '.changeq/']);
}

export class GitWorkingTree implements WorkingTree {
  private readonly repo: GitRepo;

  constructor(readonly root: string) {
    this.repo = git(root);
  }

  async head(): Promise<string> {
    return await getCurrentCommit(this.repo);
  }

  async diffSince(ref: string): Promise<string> {
    return await diff(this.repo, ref);
  }

  async changedFilesSince(ref: string): Promise<string[]> {
    return await diffFiles(this.repo, ref);
  }

  async discard(ref: string): Promise<void> {
    await resetHard(this.repo, ref);
    await clean(this.repo);
  }

  async isClean(): Promise<boolean> {
    return await isClean(this.repo);
  }

  async commit(message: string): Promise<string> {
    return await commitAll(this.repo, message);
  }
}
