/**
 * Core types shared by the scheduler and the units of work.
 */

import type { ExecutionPlan } from './plan/plan.js';
import type { ErrorRecord, RunKind, RunStatus } from './state/schema.js';

// ─────────────────────────────────────────────────────────────
// Work items
// ─────────────────────────────────────────────────────────────

export interface WorkItem {
  id: string;
  title?: string;
  /** Informational only; wave placement already encodes the order. */
  dependsOn: string[];
}

export interface ExecuteContext {
  /** 1-based attempt number for this item. */
  attempt: number;
  /** Aborted when the per-item timeout expires or the run is torn down. */
  signal: AbortSignal;
}

export interface UnitResult {
  success: boolean;
  output: string;
  timedOut?: boolean;
  exitCode?: number;
  /** Completion artifact such as a pull request URL. */
  artifact?: string;
}

/**
 * Performs the work for one item. Must be safe to call again for an item
 * whose previous attempt failed.
 */
export interface UnitOfWork {
  execute(item: WorkItem, context: ExecuteContext): Promise<UnitResult>;
}

// ─────────────────────────────────────────────────────────────
// Execution results
// ─────────────────────────────────────────────────────────────

export interface Outcome {
  itemId: string;
  success: boolean;
  output: string;
  timedOut: boolean;
  exitCode?: number;
  artifact?: string;
}

export interface ItemCounts {
  total: number;
  pending: number;
  inProgress: number;
  completed: number;
  failed: number;
  fatal: number;
}

export interface RunSummary {
  runId: string;
  kind: RunKind;
  status: RunStatus;
  /** True when nothing was executed or persisted. */
  dryRun: boolean;
  counts: ItemCounts;
  totalWaves: number;
  completedWaves: number[];
  failedItems: string[];
  fatalItems: string[];
  errors: ErrorRecord[];
  artifacts: Record<string, string>;
}

export interface FinalizerContext {
  runId: string;
  stateDir: string;
  plan: ExecutionPlan;
  summary: RunSummary;
}

/** Post-run step (final validation, report) run once all waves completed. */
export interface Finalizer {
  readonly name: string;
  run(context: FinalizerContext): Promise<void>;
}
