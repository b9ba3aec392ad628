import chalk, { type ChalkInstance } from 'chalk';

import type { WorkItemState } from '../../core/work-item/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  bold: chalk.bold,
  dim: chalk.dim,

  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.dim,

  check: chalk.green('✔'),
  cross: chalk.red('✖'),
  bullet: chalk.dim('•'),
  arrow: chalk.dim('→'),

  rule: chalk.dim,

  state: (state: WorkItemState): ChalkInstance => STATE_COLORS[state]
} as const;

const STATE_COLORS: Record<WorkItemState, ChalkInstance> = {
  pending: chalk.dim,
  blocked: chalk.dim,
  ready: chalk.cyan,
  compiling: chalk.yellow,
  running: chalk.yellow,
  verifying: chalk.yellow,
  accepted: chalk.green,
  needs_review: chalk.magenta,
  failed: chalk.red,
  skipped: chalk.gray
};

// ── Layout Constants ────────────────────────────────────────────────────────

export const INDENT = '  ';

/** Width used for horizontal rules. */
export const RULE_WIDTH = 56;
