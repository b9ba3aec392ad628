export type ChangeqErrorCode =
  | 'cycle'
  | 'unknown_dependency'
  | 'config'
  | 'invalid_transition'
  | 'persistence'
  | 'compilation'
  | 'execution'
  | 'execution_timeout'
  | 'voter_unavailable'
  | 'not_found'
  | 'dirty_tree';

export class ChangeqError extends Error {
  constructor(
    readonly code: ChangeqErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── Validation (fatal at scan time) ──────────────────────────────────────────

export class CycleError extends ChangeqError {
  /** Ordered cycle; first and last entries are the same ID. */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('cycle', `Dependency cycle detected: ${cycle.join(' -> ')}`);
    this.cycle = cycle;
  }
}

export class UnknownDependencyError extends ChangeqError {
  constructor(
    readonly itemId: string,
    readonly missingId: string
  ) {
    super('unknown_dependency', `Change '${itemId}' depends on unknown change '${missingId}'`);
  }
}

export class ConfigError extends ChangeqError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

export class InvalidTransitionError extends ChangeqError {
  constructor(
    readonly itemId: string,
    readonly from: string,
    readonly event: string
  ) {
    super('invalid_transition', `Change '${itemId}' cannot handle '${event}' while ${from}`);
  }
}

export class PersistenceError extends ChangeqError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence', message, options);
  }
}

export class NotFoundError extends ChangeqError {
  constructor(readonly itemId: string) {
    super('not_found', `Change '${itemId}' not found`);
  }
}

/** Raised before dispatch when the tree holds changes a later discard would wipe. */
export class DirtyWorkingTreeError extends ChangeqError {
  constructor(readonly root: string) {
    super('dirty_tree', `Working tree ${root} has uncommitted changes; commit or discard them before running`);
  }
}

// ── Stage errors (local to one work item) ────────────────────────────────────

export class CompilationError extends ChangeqError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('compilation', message, options);
  }
}

export class ExecutionError extends ChangeqError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('execution', message, options);
  }
}

export class ExecutionTimeout extends ChangeqError {
  constructor(readonly timeoutMs: number) {
    super('execution_timeout', `Execution exceeded ${timeoutMs}ms`);
  }
}

export class VoterUnavailable extends ChangeqError {
  constructor(
    readonly voter: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('voter_unavailable', `Voter ${voter} unavailable: ${message}`, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
