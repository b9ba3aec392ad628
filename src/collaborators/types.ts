import type { ExecutionResult, Finding, SubTask, Vote, WorkItem } from '../core/work-item/types.js';

export interface CompileRequest {
  item: WorkItem;
  tasks: readonly SubTask[];
  /** Findings from earlier rejected attempts, oldest first. */
  priorFindings: readonly Finding[];
  model?: string;
}

export interface ContextCompiler {
  /** Resolves to the task brief; rejects with `CompilationError`. */
  compile(req: CompileRequest, signal: AbortSignal): Promise<string>;
}

/** The shared working tree the executor mutates. */
export interface WorkingTree {
  readonly root: string;
  /** Reference to the current state (a commit hash for git). */
  head(): Promise<string>;
  diffSince(ref: string): Promise<string>;
  changedFilesSince(ref: string): Promise<string[]>;
  /** Drop every change made after `ref`, committed or not. */
  discard(ref: string): Promise<void>;
  /** No uncommitted changes outside `.changeq/`. */
  isClean(): Promise<boolean>;
  /** Commit pending changes and return the new head; a clean tree returns the current head. */
  commit(message: string): Promise<string>;
}

export interface ExecuteRequest {
  item: WorkItem;
  brief: string;
  workingTree: WorkingTree;
  /** Working-tree reference recorded before execution started. */
  baseRef: string;
  maxTurns: number;
  maxDurationMs: number;
  model?: string;
}

export type ExecutorOutput = Omit<ExecutionResult, 'durationMs'>;

export interface Executor {
  /** Rejects with `ExecutionTimeout` or `ExecutionError`. */
  execute(req: ExecuteRequest, signal: AbortSignal): Promise<ExecutorOutput>;
}

export interface ReviewRequest {
  item: WorkItem;
  diff: string;
  brief: string;
  checks: readonly string[];
  /** Project rules file contents, when one is configured. */
  projectRules?: string;
  model?: string;
}

export interface Voter {
  readonly id: string;
  /** Rejects with `VoterUnavailable`, which the aggregator treats as a non-response. */
  review(req: ReviewRequest, signal: AbortSignal): Promise<Vote>;
}

export interface Collaborators {
  compiler: ContextCompiler;
  executor: Executor;
  voters: readonly Voter[];
  workingTree: WorkingTree;
}
