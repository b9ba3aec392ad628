import { CompilationError } from '../core/errors.js';
import type { CompileRequest, ContextCompiler } from './types.js';
import { describeFailure, expandArgs, runCommand, type CommandRunner } from './process.js';

/** Plain-text brief: proposal, task list and, on a retry, the findings to address. */
export function formatBrief(req: CompileRequest): string {
  const { item } = req;
  const out: string[] = [`# ${item.title}`, '', `Change: ${item.id}`, '', '## Proposal', '', item.proposal.trim() || '(empty)'];

  if (req.tasks.length) {
    out.push('', '## Tasks', '');
    req.tasks.forEach((t, i) => {
      out.push(`${i + 1}. ${t.id}: ${t.title}`);
      if (t.description) out.push(...t.description.split('\n').map((l) => `   ${l}`));
    });
  }

  if (req.priorFindings.length) {
    out.push('', '## Findings from previous attempts (must be fixed)', '');
    for (const f of req.priorFindings) {
      out.push(`- [${f.severity}]${f.category ? ` ${f.category}:` : ''} ${f.description}`);
    }
  }

  return `${out.join('\n')}\n`;
}

export class PassthroughCompiler implements ContextCompiler {
  async compile(req: CompileRequest): Promise<string> {
    return formatBrief(req);
  }
}

export interface CommandCompilerOptions {
  command: string;
  args: readonly string[];
  cwd: string;
  runner?: CommandRunner;
}

/** Pipes the plain brief to a command and uses its stdout as the refined brief. */
export class CommandCompiler implements ContextCompiler {
  private readonly run: CommandRunner;

  constructor(private readonly opts: CommandCompilerOptions) {
    this.run = opts.runner ?? runCommand;
  }

  async compile(req: CompileRequest, signal: AbortSignal): Promise<string> {
    const outcome = await this.run({
      command: this.opts.command,
      args: expandArgs(this.opts.args, { model: req.model, change: req.item.id }),
      cwd: this.opts.cwd,
      input: formatBrief(req),
      signal
    });

    if (outcome.cancelled) throw new CompilationError('compilation cancelled');
    if (outcome.failed) throw new CompilationError(`compiler ${describeFailure(outcome)}`);

    const brief = outcome.stdout.trim();
    if (!brief) throw new CompilationError('compiler produced an empty brief');
    return `${brief}\n`;
  }
}
