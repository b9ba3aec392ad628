import { execa } from 'execa';

export interface CommandInvocation {
  command: string;
  args: readonly string[];
  cwd: string;
  /** Written to the child's stdin. */
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

export interface CommandOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure, non-zero exit, timeout or cancellation. */
  failed: boolean;
  timedOut: boolean;
  cancelled: boolean;
}

/** Seam between collaborators and child processes; tests pass their own. */
export type CommandRunner = (inv: CommandInvocation) => Promise<CommandOutcome>;

export const runCommand: CommandRunner = async (inv) => {
  const res = await execa(inv.command, [...inv.args], {
    cwd: inv.cwd,
    env: inv.env,
    input: inv.input ?? '',
    stdout: 'pipe',
    stderr: 'pipe',
    timeout: inv.timeoutMs,
    cancelSignal: inv.signal,
    // NOTE: execa v9 configures force-kill behavior via options, not kill() args.
    killSignal: 'SIGTERM',
    forceKillAfterDelay: 5_000,
    reject: false
  });

  return {
    exitCode: typeof res.exitCode === 'number' ? res.exitCode : null,
    stdout: res.stdout,
    stderr: res.stderr,
    failed: res.failed,
    timedOut: res.timedOut,
    cancelled: res.isCanceled
  };
};

/** Replace `{name}` placeholders in configured args. Unknown placeholders are left as written. */
export function expandArgs(args: readonly string[], vars: Record<string, string | undefined>): string[] {
  return args.map((a) =>
    a.replaceAll(/\{(\w+)\}/g, (whole: string, name: string) => {
      const v = vars[name];
      return v === undefined ? whole : v;
    })
  );
}

/** Last `max` characters, for logs and error messages. */
export function tail(text: string, max = 2_000): string {
  return text.length <= max ? text : `…${text.slice(text.length - max)}`;
}

export function describeFailure(outcome: CommandOutcome): string {
  const detail = tail(outcome.stderr.trim() || outcome.stdout.trim(), 500);
  const head = outcome.exitCode === null ? 'command did not start' : `exit code ${outcome.exitCode}`;
  return detail ? `${head}: ${detail}` : head;
}
