import { createCollaborators, readProjectRules } from '../../collaborators/factory.js';
import type { CommandRunner } from '../../collaborators/process.js';
import type { Collaborators } from '../../collaborators/types.js';
import { RunCoordinator } from '../../core/coordinator.js';
import { Notifier } from '../../notify/notifier.js';
import { createLogger } from '../../utils/logger.js';
import { installCliCancellation } from '../cancel.js';
import { openLedger, openProject, type CommandResult, type ProjectOptions } from '../project.js';
import { getRenderer } from '../ui/renderer.js';

export interface RunCommandOptions extends ProjectOptions {
  /** Only this change (an interrupted change is still finished first). */
  id?: string;
  all?: boolean;
  /** Replaces the configured collaborators. */
  collaborators?: Collaborators;
  runner?: CommandRunner;
  fetch?: typeof fetch;
  /** Cancellation from outside; defaults to Ctrl+C / SIGTERM handling. */
  signal?: AbortSignal;
}

/**
 * `changeq run [id] [--all]`: drives ready changes through compile, execute and verify.
 * Without `--all` it stops once the first dispatched change settles.
 */
export async function runRunCommand(opts: RunCommandOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const ctx = await openProject(opts);
  const logger = createLogger('run');
  const ledger = await openLedger(ctx);
  const collaborators =
    opts.collaborators ?? createCollaborators({ repoRoot: ctx.repoRoot, config: ctx.config, runner: opts.runner });

  const coordinator = new RunCoordinator({
    repoRoot: ctx.repoRoot,
    config: ctx.config,
    collaborators,
    stateStore: ctx.stateStore,
    ledger,
    logger,
    now: ctx.now,
    projectRules: await readProjectRules(ctx.repoRoot, ctx.config),
    notifier: new Notifier({
      webhookUrl: ctx.config.notify.webhookUrl,
      events: ctx.config.notify.events,
      timeoutMs: ctx.config.notify.timeoutMs,
      logger: logger.child('notify'),
      ledger,
      fetch: opts.fetch
    }),
    onProgress: (event) => r.progress(event)
  });

  const cancellation = opts.signal
    ? null
    : installCliCancellation({
        onCancel: () => {
          r.warn('Cancellation requested; rolling back the in-flight change (press Ctrl+C again to force quit)');
        },
        logError: (message, err) => logger.error(message, { error: String(err) })
      });
  const signal = opts.signal ?? cancellation?.signal;

  r.banner(opts.id ? `Run ${opts.id}` : opts.all ? 'Run all' : 'Run');
  const started = Date.now();
  try {
    const summary = await coordinator.run({ target: opts.id, all: !!opts.all, signal });
    r.runSummary(summary, Date.now() - started);

    if (summary.cancelled) return { ok: false, details: { reason: 'cancelled', summary } };
    if (summary.processed.length === 0) {
      if (opts.id) return { ok: false, details: `${opts.id} is not ready (see \`changeq status ${opts.id}\`)` };
      r.info('Nothing is ready to run');
    }
    return { ok: true, details: summary };
  } finally {
    cancellation?.dispose();
  }
}
