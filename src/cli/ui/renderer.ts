import type { ProgressEvent, RunSummary } from '../../core/coordinator.js';
import type { WorkItemState } from '../../core/work-item/types.js';
import { theme, INDENT } from './theme.js';
import { formatMs, formatTable, keyValue, phaseBanner, plural, verificationLine } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Single output coordinator for the CLI:
 * - InteractiveRenderer for rich TTY output (colors, spinners)
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  // ── Sections ──
  banner(title: string): void;

  // ── Run progress ──
  progress(event: ProgressEvent): void;
  runSummary(summary: RunSummary, durationMs: number): void;

  // ── Structured output ──
  table(name: string, headers: readonly string[], rows: ReadonlyArray<readonly string[]>): void;
  field(label: string, value: string): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Spinners ──
  spinner(message: string): SpinnerHandle;

  // ── Generic ──
  text(message: string): void;
  blank(): void;
  info(message: string): void;
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  banner(title: string): void {
    this.writeln();
    this.writeln(INDENT + phaseBanner(title));
    this.writeln();
  }

  progress(event: ProgressEvent): void {
    switch (event.type) {
      case 'stage_started': {
        const resumed = event.resumed ? theme.dim(' (resumed)') : '';
        this.writeln(`${INDENT}${theme.bold(event.itemId)} ${theme.arrow} ${event.stage}${resumed}`);
        return;
      }
      case 'transition':
        this.writeln(
          `${INDENT}${theme.dim(event.itemId)} ${stateLabel(event.from)} ${theme.arrow} ${stateLabel(event.to)} ${theme.dim(`(${event.event})`)}`
        );
        return;
      case 'votes_collected':
        for (const v of event.votes) {
          this.writeln(
            verificationLine({
              name: v.voter,
              passed: v.verdict === 'pass',
              detail: `${v.verdict}, ${plural(v.findings.length, 'finding')}`
            })
          );
        }
        for (const n of event.nonResponses) {
          this.writeln(`${INDENT}${theme.warning('⚠')} ${n.voter} ${theme.dim(n.timedOut ? 'timed out' : n.reason)}`);
        }
        return;
    }
  }

  runSummary(summary: RunSummary, durationMs: number): void {
    this.banner(summary.cancelled ? 'Cancelled' : 'Done');
    this.writeln(keyValue('Duration', formatMs(durationMs)));
    this.writeln(keyValue('Processed', summary.processed.length ? summary.processed.join(', ') : theme.dim('(none)')));
    const states = Object.entries(summary.states)
      .map(([state, n]) => `${state}=${n}`)
      .join('  ');
    this.writeln(keyValue('States', states || theme.dim('(no changes)')));
    this.writeln();
  }

  table(_name: string, headers: readonly string[], rows: ReadonlyArray<readonly string[]>): void {
    if (rows.length === 0) {
      this.writeln(`${INDENT}${theme.dim('(none)')}`);
      return;
    }
    for (const line of formatTable(headers, rows)) this.writeln(line);
  }

  field(label: string, value: string): void {
    this.writeln(keyValue(label, value));
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    if (details) {
      this.writeln();
      for (const line of details.split('\n')) this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

export function stateLabel(state: WorkItemState): string {
  return theme.state(state)(state);
}

// ── Quiet Renderer (JSON Lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  banner(): void {}

  progress(event: ProgressEvent): void {
    const { type, ...rest } = event;
    this.emit(type, rest);
  }

  runSummary(summary: RunSummary, durationMs: number): void {
    this.emit('run_summary', { ...summary, duration_ms: durationMs });
  }

  table(name: string, headers: readonly string[], rows: ReadonlyArray<readonly string[]>): void {
    const keys = headers.map((h) => h.toLowerCase().replace(/\s+/g, '_'));
    this.emit(name, {
      rows: rows.map((r) => Object.fromEntries(keys.map((k, i) => [k, r[i] ?? ''])))
    });
  }

  field(label: string, value: string): void {
    this.emit('field', { label, value });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner', { message });
    return {
      update: () => {},
      succeed: (text) => {
        if (text) this.emit('success', { message: text });
      },
      fail: (text) => {
        if (text) this.emit('error', { title: text, details: '' });
      },
      warn: (text) => {
        if (text) this.emit('warning', { message: text });
      },
      stop: () => {}
    };
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void {}

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('text', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let instance: Renderer | null = null;

/** Global Renderer; defaults to quiet when `CHANGEQ_QUIET=1`. */
export function getRenderer(): Renderer {
  if (!instance) {
    instance = process.env.CHANGEQ_QUIET === '1' ? new QuietRenderer() : new InteractiveRenderer();
  }
  return instance;
}

/** Override the global Renderer (tests, --quiet). */
export function setRenderer(renderer: Renderer): void {
  instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  instance = r;
  return r;
}
