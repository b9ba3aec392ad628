import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { isDirectory } from '../utils/fs.js';

export interface WorkspacePaths {
  repoRoot: string;
  stateDir: string;
  configPath: string;
  localConfigPath: string;
  statePath: string;
  ledgerPath: string;
}

export function workspacePaths(repoRoot: string): WorkspacePaths {
  const stateDir = join(repoRoot, '.changeq');
  return {
    repoRoot,
    stateDir,
    configPath: join(stateDir, 'config.yaml'),
    localConfigPath: join(stateDir, 'local.config.yaml'),
    statePath: join(stateDir, 'state.json'),
    ledgerPath: join(stateDir, 'ledger.jsonl')
  };
}

export async function initWorkspace(repoRoot: string): Promise<WorkspacePaths> {
  const paths = workspacePaths(repoRoot);
  await mkdir(paths.stateDir, { recursive: true });
  return paths;
}

export async function isChangeqRepo(repoRoot: string): Promise<boolean> {
  return await isDirectory(workspacePaths(repoRoot).stateDir);
}

/** `openspec/changes` when that layout exists, else `changes`. */
export async function detectChangesDir(repoRoot: string): Promise<string> {
  return (await isDirectory(join(repoRoot, 'openspec', 'changes'))) ? 'openspec/changes' : 'changes';
}
