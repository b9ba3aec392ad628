export type CancelSignal = 'SIGINT' | 'SIGTERM';
export type CancelSource = 'signal' | 'keypress';

export interface CancelInfo {
  signal: CancelSignal;
  source: CancelSource;
}

export interface InstalledCliCancellation {
  /** Flips when cancellation is requested. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen (Ctrl+C presses, SIGTERM). */
  count: number;
  dispose(): void;
}

let activeCancelSignal: AbortSignal | null = null;

/** Signal of the command currently holding cancellation; prompts abort on it. */
export function getActiveCancelSignal(): AbortSignal | null {
  return activeCancelSignal;
}

/**
 * First Ctrl+C / SIGTERM aborts the returned signal and calls `onCancel`, so the in-flight
 * change can be rolled back to `ready`. A second trigger force-exits after a grace period.
 */
export function installCliCancellation(
  opts: {
    onCancel?: (info: CancelInfo) => void | Promise<void>;
    /** Defaults to `process.exit(130 | 143)`. */
    onForceExit?: (info: CancelInfo & { count: number }) => void | Promise<void>;
    logError?: (message: string, err: unknown) => void;
  } = {}
): InstalledCliCancellation {
  const controller = new AbortController();
  activeCancelSignal = controller.signal;

  let count = 0;
  let disposed = false;
  let resumedStdin = false;
  let cancelPromise: Promise<void> | null = null;
  let forceExitInProgress = false;

  const forceExitGraceMs = (() => {
    const raw = Number(process.env.CHANGEQ_FORCE_EXIT_GRACE_MS ?? '');
    return Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : 6_500;
  })();

  const report = (message: string, err: unknown) => {
    opts.logError?.(message, err);
  };

  const defaultForceExit = (info: CancelInfo & { count: number }) => {
    // 130 = 128 + SIGINT(2), 143 = 128 + SIGTERM(15)
    process.exit(info.signal === 'SIGTERM' ? 143 : 130);
  };

  const trigger = (info: CancelInfo) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      controller.abort(info);
      if (opts.onCancel) {
        cancelPromise = Promise.resolve()
          .then(() => opts.onCancel?.(info))
          .catch((err: unknown) => report('cancel handler failed', err));
      }
      return;
    }

    if (forceExitInProgress) return;
    forceExitInProgress = true;
    const payload = { ...info, count };
    const waits: Array<Promise<void>> = [];
    if (opts.onForceExit) {
      const onForceExit = opts.onForceExit;
      waits.push(withTimeout(Promise.resolve().then(() => onForceExit(payload)), forceExitGraceMs));
    }
    if (cancelPromise) waits.push(withTimeout(cancelPromise, forceExitGraceMs));
    void Promise.allSettled(waits).then(() => defaultForceExit(payload));
  };

  const onSigint = () => trigger({ signal: 'SIGINT', source: 'signal' });
  const onSigterm = () => trigger({ signal: 'SIGTERM', source: 'signal' });

  // `on`, not `once`: a second press forces the exit.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  // Raw-mode TTY input (interactive prompts) delivers Ctrl+C as byte 0x03 instead of SIGINT.
  const wantsStdin = !!process.stdin.isTTY;
  const onStdinData = (chunk: Buffer | string) => {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    if (buf.includes(3)) trigger({ signal: 'SIGINT', source: 'keypress' });
  };
  if (wantsStdin) {
    process.stdin.on('data', onStdinData);
    if (process.stdin.isPaused()) {
      process.stdin.resume();
      resumedStdin = true;
    }
  }

  const dispose = () => {
    if (disposed) return;
    disposed = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    if (wantsStdin) {
      process.stdin.off('data', onStdinData);
      if (resumedStdin) process.stdin.pause();
    }
    if (activeCancelSignal === controller.signal) activeCancelSignal = null;
  };

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose
  };
}

async function withTimeout(promise: Promise<unknown>, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      promise.then(() => undefined),
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}
