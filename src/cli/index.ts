#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ChangeqError, errorMessage } from '../core/errors.js';
import { runConfigCommand } from './commands/config.js';
import { runDepsCommand } from './commands/deps.js';
import { runInitCommand } from './commands/init.js';
import { runLogsCommand } from './commands/logs.js';
import { runAcceptCommand, runRejectCommand, runRetryCommand, runSkipCommand } from './commands/manual.js';
import { runPlanCommand } from './commands/plan.js';
import { runRunCommand } from './commands/run.js';
import { runScanCommand } from './commands/scan.js';
import { runStatusCommand } from './commands/status.js';
import { runVotesCommand } from './commands/votes.js';
import type { CommandResult } from './project.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose?: boolean;
  quiet?: boolean;
}

export function buildCli(): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('changeq')
    .description('Dependency-aware change orchestration: compile, implement and verify spec-driven changes')
    .version(version, '-v, --version');

  program.option('--verbose', 'Show debug output').option('--quiet', 'Machine-friendly output (JSON lines)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<GlobalFlags>();
    process.env.CHANGEQ_VERBOSE = o.verbose ? '1' : '0';
    process.env.CHANGEQ_QUIET = o.quiet ? '1' : '0';
    createRenderer({ quiet: !!o.quiet });
  });

  // ── Setup ────────────────────────────────────────────────────────────────

  program
    .command('init')
    .description('Create .changeq/ with a starter config')
    .action(async () => {
      await handle('Init failed', () => runInitCommand());
    });

  program
    .command('config')
    .description('Print the merged configuration')
    .option('--layers', 'Also show each configuration layer')
    .action(async (opts: { layers?: boolean }) => {
      await handle('Config failed', () => runConfigCommand({ layers: !!opts.layers }));
    });

  // ── Planning ─────────────────────────────────────────────────────────────

  program
    .command('scan')
    .description('Discover changes and validate their dependencies')
    .action(async () => {
      await handle('Scan failed', () => runScanCommand());
    });

  program
    .command('plan')
    .description('Dry run: print the dispatch order without changing anything')
    .action(async () => {
      await handle('Plan failed', () => runPlanCommand());
    });

  program
    .command('deps')
    .description('Show the dependency graph')
    .action(async () => {
      await handle('Deps failed', () => runDepsCommand());
    });

  // ── Execution ────────────────────────────────────────────────────────────

  program
    .command('run')
    .description('Run the next ready change, a given change, or everything ready')
    .argument('[id]', 'Change id')
    .option('--all', 'Keep going until nothing is ready')
    .action(async (id: string | undefined, opts: { all?: boolean }) => {
      await handle('Run failed', () => runRunCommand({ id, all: !!opts.all }), 'Inspect with `changeq status` and `changeq logs <id>`.');
    });

  // ── Review ───────────────────────────────────────────────────────────────

  program
    .command('accept')
    .description('Accept a change waiting for review')
    .argument('<id>', 'Change id')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (id: string, opts: { yes?: boolean }) => {
      await handle('Accept failed', () => runAcceptCommand({ id, yes: !!opts.yes }));
    });

  program
    .command('reject')
    .description('Mark a change failed')
    .argument('<id>', 'Change id')
    .action(async (id: string) => {
      await handle('Reject failed', () => runRejectCommand({ id }));
    });

  program
    .command('retry')
    .description('Make a failed change ready again')
    .argument('<id>', 'Change id')
    .action(async (id: string) => {
      await handle('Retry failed', () => runRetryCommand({ id }));
    });

  program
    .command('skip')
    .description('Skip a change; its dependents are unblocked')
    .argument('<id>', 'Change id')
    .action(async (id: string) => {
      await handle('Skip failed', () => runSkipCommand({ id }));
    });

  // ── Observability ────────────────────────────────────────────────────────

  program
    .command('status')
    .description('Show change states, or one change in detail')
    .argument('[id]', 'Change id')
    .option('--tail <n>', 'Ledger entries in the detail view', (v) => Number(v), 10)
    .action(async (id: string | undefined, opts: { tail: number }) => {
      await handle('Status failed', () => runStatusCommand({ id, tail: opts.tail }));
    });

  program
    .command('votes')
    .description('Show recorded verification attempts for a change')
    .argument('<id>', 'Change id')
    .action(async (id: string) => {
      await handle('Votes failed', () => runVotesCommand({ id }));
    });

  program
    .command('logs')
    .description('Show ledger entries for a change')
    .argument('<id>', 'Change id')
    .option('--full', 'Print entry data in full')
    .action(async (id: string, opts: { full?: boolean }) => {
      await handle('Logs failed', () => runLogsCommand({ id, verbose: !!opts.full }));
    });

  return program;
}

async function handle(title: string, fn: () => Promise<CommandResult>, tip?: string): Promise<void> {
  const r = getRenderer();
  let res: CommandResult;
  try {
    res = await fn();
  } catch (err) {
    r.error(title, errorMessage(err), tipFor(err) ?? 'Try running with --verbose for more details.');
    process.exitCode = 1;
    return;
  }
  if (res.ok) return;

  if (isCancelled(res.details)) {
    r.warn('Cancelled.');
    process.exitCode = 130;
    return;
  }
  r.error(title, typeof res.details === 'string' ? res.details : 'unknown error', tip);
  process.exitCode = 1;
}

function isCancelled(details: unknown): boolean {
  return typeof details === 'object' && details !== null && 'reason' in details && details.reason === 'cancelled';
}

function tipFor(err: unknown): string | undefined {
  if (!(err instanceof ChangeqError)) return undefined;
  switch (err.code) {
    case 'cycle':
    case 'unknown_dependency':
      return 'Fix depends_on in the proposal front matter; no run starts on an invalid graph.';
    case 'config':
      return 'Check .changeq/config.yaml, .changeq/local.config.yaml and CHANGEQ_* variables.';
    case 'persistence':
      return 'The last transition was not recorded; fix the state directory and run again to resume.';
    case 'dirty_tree':
      return 'Commit or stash uncommitted edits, including the work of a change left in needs_review.';
    default:
      return undefined;
  }
}

function detectVersionSync(): string | null {
  let current = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 8; i++) {
    const candidate = resolve(current, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
      return null;
    }
    const parent = resolve(current, '..');
    if (parent === current) break;
    current = parent;
  }
  return null;
}

await buildCli().parseAsync(process.argv);
