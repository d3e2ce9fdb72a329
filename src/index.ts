/**
 * wave-conductor
 *
 * Library entry point. For CLI usage, run the `conductor` command.
 */

// Driver and scheduler
export { RunDriver, type RunDriverOptions, type RunMode, type DriverEvent, type RunStatusEvent } from './orchestrator/driver.js';
export {
  WaveScheduler,
  eligibleItems,
  isWaveComplete,
  DEFAULT_SCHEDULER_SETTINGS,
  type SchedulerEvent,
  type SchedulerSettings,
  type WaveOutcome,
  type WaveResult,
} from './orchestrator/scheduler.js';
export { ConcurrencyBoundedExecutor, type ExecutorOptions, type ExecutionReport } from './orchestrator/executor.js';
export { backoffDelay, DEFAULT_BACKOFF } from './orchestrator/backoff.js';
export { ShutdownSignal, interruptibleSleep, type Sleep } from './orchestrator/shutdown.js';
export {
  summarize,
  formatSummary,
  formatPlan,
  renderMarkdownReport,
  exitCodeFor,
  MarkdownReportWriter,
} from './orchestrator/report.js';

// State, plans, locks
export { StateStore } from './state/store.js';
export { LockManager, type LockInfo, type LockToken } from './state/lock.js';
export type { RunState, RunStatus, ItemState, ItemStatus, ErrorRecord, RunKind } from './state/schema.js';
export {
  parsePlan,
  validatePlan,
  sequentialPlan,
  filePlanSource,
  inlinePlanSource,
  PlanStore,
  type ExecutionPlan,
  type Wave,
  type PlanSource,
} from './plan/plan.js';

// Errors
export { classify, isFatal, isRetryable, errorKindLabel, ErrorKind, type ExitSignal } from './errors/classifier.js';
export * from './errors/errors.js';

// Units of work
export { AgentCommandUnit } from './work/agent-command.js';
export { NestedRunUnit } from './work/nested-run.js';

// Config
export { ConfigLoader } from './config/loader.js';
export { ConductorConfigSchema, type ConductorConfig } from './config/schema.js';

export type * from './types.js';
