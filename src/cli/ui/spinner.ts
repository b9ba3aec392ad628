import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Falls back to static lines in non-TTY contexts (CI, piped output).

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  stop(): void;
}

export function startSpinner(text: string): SpinnerHandle {
  const isTTY = Boolean(process.stderr.isTTY);
  const stream: NodeJS.WritableStream = process.stderr;

  // ora disables itself when CI=1; force it on for a real terminal.
  if (!isTTY || process.env.CHANGEQ_QUIET === '1') {
    stream.write(`  ${text}\n`);
    return {
      update(t: string) {
        stream.write(`  ${t}\n`);
      },
      succeed(t?: string) {
        if (t) stream.write(`  ✔ ${t}\n`);
      },
      fail(t?: string) {
        if (t) stream.write(`  ✖ ${t}\n`);
      },
      warn(t?: string) {
        if (t) stream.write(`  ⚠ ${t}\n`);
      },
      stop() {}
    };
  }

  const spinner: Ora = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();

  return {
    update(t: string) {
      spinner.text = t;
    },
    succeed(t?: string) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t?: string) {
      spinner.fail(t ?? spinner.text);
    },
    warn(t?: string) {
      spinner.warn(t ?? spinner.text);
    },
    stop() {
      spinner.stop();
    }
  };
}
