import { theme, INDENT, RULE_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Compact human-readable duration.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

/** `HH:MM:SS` of an ISO timestamp, or the raw slice when it does not parse. */
export function formatClock(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso.slice(11, 19);
  return d.toLocaleTimeString('en-US', { hour12: false, hour: '2-digit', minute: '2-digit', second: '2-digit' });
}

// ── Table Alignment ─────────────────────────────────────────────────────────

/** Right-pad to `width`, measuring without ANSI codes. */
export function padRight(str: string, width: number): string {
  const len = stripAnsi(str).length;
  if (len >= width) return str;
  return str + ' '.repeat(width - len);
}

/**
 * Column-aligned rows with a dim header; cells may carry colors.
 *
 * ```
 *   ID        STATE     RISK
 *   add-auth  ready     low
 * ```
 */
export function formatTable(headers: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  const widths = headers.map((h, col) => Math.max(stripAnsi(h).length, ...rows.map((r) => stripAnsi(r[col] ?? '').length)));
  const line = (cells: readonly string[]) =>
    INDENT +
    cells
      .map((c, col) => (col === cells.length - 1 ? c : padRight(c, (widths[col] ?? 0) + 2)))
      .join('')
      .trimEnd();
  return [line(headers.map((h) => theme.dim(h))), ...rows.map(line)];
}

// ── Horizontal Rules ────────────────────────────────────────────────────────

/**
 * A section banner:  ── Run ────────────────────────
 */
export function phaseBanner(title: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const label = title.charAt(0).toUpperCase() + title.slice(1);
  const suffixLen = Math.max(4, width - prefix.length - label.length - 1);
  return theme.dim(prefix) + theme.bold(label) + theme.dim(' ' + '─'.repeat(suffixLen));
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * "  State         needs_review"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Vote Formatting ─────────────────────────────────────────────────────────

export interface VerificationLine {
  name: string;
  passed: boolean;
  detail?: string;
}

/**
 *   ✔ reviewer-a          pass, 1 finding
 *   ✖ reviewer-b          fail, 3 findings
 */
export function verificationLine(item: VerificationLine, nameWidth: number = 20): string {
  const icon = item.passed ? theme.check : theme.cross;
  const name = padRight(item.name, nameWidth);
  const detail = item.detail ? theme.dim(item.detail) : '';
  return `${INDENT}${icon} ${name}${detail}`;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

export function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v, null, 2);
  } catch {
    return '"[unserializable]"';
  }
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}
