import { ExecutionError, ExecutionTimeout } from '../core/errors.js';
import type { ExecuteRequest, Executor, ExecutorOutput } from './types.js';
import { describeFailure, expandArgs, runCommand, tail, type CommandRunner } from './process.js';

const TURNS_LINE = /^\s*turns:\s*(\d+)\s*$/im;

/** Turn count reported by the agent as a `turns: N` line; the last such line wins. */
export function parseTurns(output: string): number | null {
  let found: number | null = null;
  for (const line of output.split(/\r?\n/)) {
    const m = TURNS_LINE.exec(line);
    if (m) found = Number(m[1]);
  }
  return found;
}

export interface CommandExecutorOptions {
  command: string;
  args: readonly string[];
  runner?: CommandRunner;
}

/**
 * Runs an agent CLI inside the working tree with the brief on stdin.
 *
 * Args may use `{model}`, `{maxTurns}` and `{change}`; the same values are exported as
 * `CHANGEQ_MODEL`, `CHANGEQ_MAX_TURNS` and `CHANGEQ_CHANGE_ID`.
 */
export class CommandExecutor implements Executor {
  private readonly run: CommandRunner;

  constructor(private readonly opts: CommandExecutorOptions) {
    this.run = opts.runner ?? runCommand;
  }

  async execute(req: ExecuteRequest, signal: AbortSignal): Promise<ExecutorOutput> {
    const vars = { model: req.model, maxTurns: String(req.maxTurns), change: req.item.id };
    const outcome = await this.run({
      command: this.opts.command,
      args: expandArgs(this.opts.args, vars),
      cwd: req.workingTree.root,
      input: req.brief,
      timeoutMs: req.maxDurationMs,
      signal,
      env: {
        CHANGEQ_CHANGE_ID: req.item.id,
        CHANGEQ_MAX_TURNS: String(req.maxTurns),
        ...(req.model ? { CHANGEQ_MODEL: req.model } : {})
      }
    });

    if (outcome.timedOut) throw new ExecutionTimeout(req.maxDurationMs);
    if (outcome.cancelled) throw new ExecutionError('execution cancelled');
    if (outcome.failed) throw new ExecutionError(`executor ${describeFailure(outcome)}`);

    const turnsUsed = parseTurns(outcome.stdout) ?? 0;
    if (turnsUsed > req.maxTurns) {
      throw new ExecutionError(`turn budget exceeded: used ${turnsUsed} of ${req.maxTurns}`);
    }

    const [diff, filesChanged, head] = await Promise.all([
      req.workingTree.diffSince(req.baseRef),
      req.workingTree.changedFilesSince(req.baseRef),
      req.workingTree.head()
    ]);

    return {
      success: true,
      commit: head !== req.baseRef ? head : undefined,
      diff,
      filesChanged,
      log: tail([outcome.stdout, outcome.stderr].filter((s) => s.trim()).join('\n'), 20_000),
      turnsUsed
    };
  }
}
