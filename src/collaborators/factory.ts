import { join } from 'node:path';

import type { ResolvedConfig } from '../core/config/schema.js';
import { ConfigError } from '../core/errors.js';
import { GitWorkingTree } from '../git/operations.js';
import { readTextIfExists } from '../utils/fs.js';
import { CommandCompiler, PassthroughCompiler } from './compiler.js';
import { CommandExecutor } from './executor.js';
import type { CommandRunner } from './process.js';
import type { Collaborators } from './types.js';
import { CommandVoter } from './voter.js';

export interface CollaboratorFactoryOptions {
  repoRoot: string;
  config: ResolvedConfig;
  runner?: CommandRunner;
}

/** Command-backed collaborators wired from config. */
export function createCollaborators(opts: CollaboratorFactoryOptions): Collaborators {
  const { config, repoRoot, runner } = opts;

  const executorCommand = config.executor.command;
  if (!executorCommand) {
    throw new ConfigError('executor.command is not configured (set it in .changeq/config.yaml)');
  }

  const compiler = config.compiler.command
    ? new CommandCompiler({ command: config.compiler.command, args: config.compiler.args, cwd: repoRoot, runner })
    : new PassthroughCompiler();

  const voters = config.verification.voters.map(
    (v) => new CommandVoter({ id: v.id, command: v.command, args: v.args, model: v.model, cwd: repoRoot, runner })
  );

  return {
    compiler,
    executor: new CommandExecutor({ command: executorCommand, args: config.executor.args, runner }),
    voters,
    workingTree: new GitWorkingTree(repoRoot)
  };
}

export async function readProjectRules(repoRoot: string, config: ResolvedConfig): Promise<string | undefined> {
  const file = config.verification.rulesFile;
  if (!file) return undefined;
  return (await readTextIfExists(join(repoRoot, file))) ?? undefined;
}
