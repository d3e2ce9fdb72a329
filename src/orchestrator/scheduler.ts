/**
 * Wave Scheduler - drives one wave to a settled state.
 *
 * Each iteration reloads the run state, dispatches the items that are still
 * eligible, and records every outcome through the store. Retry iterations
 * are paced by the backoff policy. Per-item failures are absorbed here and
 * never thrown.
 */

import { classify, errorKindLabel, isFatal, type ErrorKind } from '../errors/classifier.js';
import type { BackoffConfig } from '../config/schema.js';
import type { StateStore } from '../state/store.js';
import type { ErrorRecord, ItemState, RunState } from '../state/schema.js';
import {
  hasFatalItem,
  itemState,
  markCompleted,
  markFailed,
  markFatal,
  markInProgress,
} from '../state/transitions.js';
import { workItem, type ExecutionPlan, type Wave } from '../plan/plan.js';
import type { Outcome, UnitOfWork, WorkItem } from '../types.js';
import { backoffDelay, DEFAULT_BACKOFF } from './backoff.js';
import { ConcurrencyBoundedExecutor } from './executor.js';
import { interruptibleSleep, type ShutdownSignal, type Sleep } from './shutdown.js';
import { logger } from '../utils/logger.js';

/** Longest output tail kept in an ErrorRecord. */
export const ERROR_MESSAGE_LIMIT = 500;

export interface SchedulerSettings {
  /** Attempts allowed per item before it is left `failed`. */
  maxRetries: number;
  /** <= 0 means unbounded. */
  maxParallel: number;
  /** Per-item timeout in ms, 0 for none. */
  itemTimeoutMs: number;
  backoff: BackoffConfig;
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  maxRetries: 2,
  maxParallel: 0,
  itemTimeoutMs: 0,
  backoff: DEFAULT_BACKOFF,
};

export type WaveOutcome = 'complete' | 'fatal' | 'interrupted';

export interface WaveResult {
  wave: number;
  outcome: WaveOutcome;
}

export type SchedulerEvent =
  | { type: 'wave:start'; runId: string; wave: number; items: string[] }
  | { type: 'wave:retry'; runId: string; wave: number; iteration: number; delayMs: number; items: string[] }
  | { type: 'item:start'; runId: string; wave: number; itemId: string; attempt: number }
  | { type: 'item:completed'; runId: string; wave: number; itemId: string; artifact?: string }
  | { type: 'item:failed'; runId: string; wave: number; itemId: string; kind: ErrorKind; attempts: number; willRetry: boolean }
  | { type: 'item:fatal'; runId: string; wave: number; itemId: string; kind: ErrorKind }
  | { type: 'wave:end'; runId: string; wave: number; outcome: WaveOutcome };

export interface WaveSchedulerOptions {
  runId: string;
  store: StateStore;
  unit: UnitOfWork;
  shutdown: ShutdownSignal;
  settings?: Partial<SchedulerSettings>;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
  onEvent?: (event: SchedulerEvent) => void;
}

function isSettled(item: ItemState, maxRetries: number): boolean {
  switch (item.status) {
    case 'completed':
    case 'fatal':
      return true;
    case 'failed':
      return item.attempts >= maxRetries;
    case 'pending':
    case 'in_progress':
      return false;
  }
}

/** Items of `wave` that still need a dispatch. */
export function eligibleItems(state: RunState, wave: Wave, maxRetries: number): string[] {
  return wave.items.filter((id) => !isSettled(itemState(state, id), maxRetries));
}

/** Every item is completed, fatal, or out of retries. */
export function isWaveComplete(state: RunState, wave: Wave, maxRetries: number): boolean {
  return eligibleItems(state, wave, maxRetries).length === 0;
}

export function errorMessageFrom(outcome: Outcome): string {
  const tail = outcome.output.trim().slice(-ERROR_MESSAGE_LIMIT);
  if (tail) return tail;
  if (outcome.timedOut) return 'timed out without output';
  return outcome.exitCode === undefined ? 'failed without output' : `exited with code ${outcome.exitCode}`;
}

export class WaveScheduler {
  private readonly settings: SchedulerSettings;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly executor = new ConcurrencyBoundedExecutor<WorkItem>((item) => item.id);

  constructor(private readonly options: WaveSchedulerOptions) {
    this.settings = { ...DEFAULT_SCHEDULER_SETTINGS, ...options.settings };
    this.sleep = options.sleep ?? interruptibleSleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async runWave(wave: Wave, plan: ExecutionPlan): Promise<WaveResult> {
    const { runId, store, shutdown } = this.options;
    this.emit({ type: 'wave:start', runId, wave: wave.wave, items: wave.items });
    logger.info(`Wave ${wave.wave}: ${wave.items.length} item(s)`, { runId, description: wave.description });

    let iteration = 0;
    for (;;) {
      const state = await store.load(runId);

      if (isWaveComplete(state, wave, this.settings.maxRetries)) {
        return this.finish(wave, 'complete');
      }
      if (hasFatalItem(state)) {
        return this.finish(wave, 'fatal');
      }
      if (shutdown.requested) {
        return this.finish(wave, 'interrupted');
      }

      iteration++;
      const pending = eligibleItems(state, wave, this.settings.maxRetries);

      if (iteration > 1) {
        const delayMs = backoffDelay(iteration - 1, this.settings.backoff, this.random);
        this.emit({ type: 'wave:retry', runId, wave: wave.wave, iteration, delayMs, items: pending });
        logger.warn(`Wave ${wave.wave} incomplete, retrying ${pending.length} item(s) in ${Math.round(delayMs / 1000)}s`, {
          runId,
          iteration,
        });
        await this.sleep(delayMs, shutdown.abortSignal);
        if (shutdown.requested) {
          continue;
        }
      }

      await this.dispatch(wave, plan, pending);
    }
  }

  private async dispatch(wave: Wave, plan: ExecutionPlan, ids: string[]): Promise<void> {
    const { runId, store, unit, shutdown } = this.options;
    const attempts = new Map<string, number>();
    let fatalSeen = false;

    const report = await this.executor.run(
      ids.map((id) => workItem(plan, id)),
      (item, signal) => unit.execute(item, { attempt: attempts.get(item.id) ?? 1, signal }),
      {
        maxParallel: this.settings.maxParallel,
        timeoutMs: this.settings.itemTimeoutMs,
        shouldStop: () => shutdown.requested || fatalSeen,
        onStart: async (item) => {
          const state = await store.update(runId, (s) => markInProgress(s, item.id, this.now()));
          const attempt = itemState(state, item.id).attempts + 1;
          attempts.set(item.id, attempt);
          this.emit({ type: 'item:start', runId, wave: wave.wave, itemId: item.id, attempt });
        },
        onOutcome: async (_item, outcome) => {
          fatalSeen = (await this.record(wave, outcome)) || fatalSeen;
        },
      },
    );

    if (report.skipped.length > 0) {
      logger.info(`Wave ${wave.wave}: ${report.skipped.length} item(s) not started`, { runId });
    }
  }

  /** Persist one outcome. Returns true when the item turned fatal. */
  private async record(wave: Wave, outcome: Outcome): Promise<boolean> {
    const { runId, store } = this.options;
    const now = this.now();

    if (outcome.success || outcome.artifact) {
      await store.update(runId, (s) => markCompleted(s, outcome.itemId, now, outcome.artifact));
      this.emit({ type: 'item:completed', runId, wave: wave.wave, itemId: outcome.itemId, artifact: outcome.artifact });
      logger.info(`Item ${outcome.itemId} completed`, { runId, artifact: outcome.artifact });
      return false;
    }

    const kind = classify(outcome.output, { timedOut: outcome.timedOut, exitCode: outcome.exitCode });
    const record: ErrorRecord = {
      itemId: outcome.itemId,
      kind,
      message: errorMessageFrom(outcome),
      timestamp: now.toISOString(),
    };

    if (isFatal(kind)) {
      await store.update(runId, (s) => markFatal(s, record, now));
      this.emit({ type: 'item:fatal', runId, wave: wave.wave, itemId: outcome.itemId, kind });
      logger.error(`Item ${outcome.itemId} failed fatally (${errorKindLabel(kind)})`, { runId });
      return true;
    }

    const state = await store.update(runId, (s) => markFailed(s, record, now));
    const attempts = itemState(state, outcome.itemId).attempts;
    const willRetry = attempts < this.settings.maxRetries;
    this.emit({ type: 'item:failed', runId, wave: wave.wave, itemId: outcome.itemId, kind, attempts, willRetry });
    logger.warn(`Item ${outcome.itemId} failed (${errorKindLabel(kind)}), attempt ${attempts}/${this.settings.maxRetries}`, {
      runId,
      willRetry,
    });
    return false;
  }

  private finish(wave: Wave, outcome: WaveOutcome): WaveResult {
    const { runId } = this.options;
    this.emit({ type: 'wave:end', runId, wave: wave.wave, outcome });
    logger.info(`Wave ${wave.wave} ended: ${outcome}`, { runId });
    return { wave: wave.wave, outcome };
  }

  private emit(event: SchedulerEvent): void {
    this.options.onEvent?.(event);
  }
}
