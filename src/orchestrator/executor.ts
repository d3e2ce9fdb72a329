/**
 * Concurrency-bounded executor.
 *
 * Runs one task per item with at most `maxParallel` live at once. Slots are
 * handed over by a semaphore as tasks settle; nothing polls. The executor
 * only reports raw outcomes; classification is the scheduler's job.
 */

import { errorMessage } from '../errors/errors.js';
import type { Outcome, UnitResult } from '../types.js';
import { logger } from '../utils/logger.js';

/** Exit code reported for items cut off by the per-item timeout. */
export const TIMEOUT_EXIT_CODE = 124;

class Semaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }

    return new Promise((resolve) => {
      this.queue.push(() => {
        this.permits--;
        resolve(this.releaser());
      });
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.permits++;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}

export type ExecutorTask<T> = (item: T, signal: AbortSignal) => Promise<UnitResult>;

export interface ExecutorOptions<T> {
  /** <= 0 means unbounded. */
  maxParallel: number;
  /** Per-item timeout in ms, 0 for none. */
  timeoutMs: number;
  /** Checked before each start; once true, remaining items are skipped. */
  shouldStop?: () => boolean;
  onStart?: (item: T) => Promise<void> | void;
  /** Called in completion order, one at a time. The item's slot frees once it returns. */
  onOutcome?: (item: T, outcome: Outcome) => Promise<void> | void;
}

export interface ExecutionReport<T> {
  outcomes: Outcome[];
  /** Items never started because shouldStop() turned true. */
  skipped: T[];
}

export class ConcurrencyBoundedExecutor<T> {
  constructor(private readonly idOf: (item: T) => string) {}

  async run(items: T[], task: ExecutorTask<T>, options: ExecutorOptions<T>): Promise<ExecutionReport<T>> {
    const semaphore = new Semaphore(options.maxParallel > 0 ? options.maxParallel : Number.POSITIVE_INFINITY);
    const outcomes: Outcome[] = [];
    const skipped: T[] = [];
    const inFlight: Promise<void>[] = [];
    const callbackErrors: unknown[] = [];
    let reporting: Promise<void> = Promise.resolve();

    for (const item of items) {
      const release = await semaphore.acquire();

      if (callbackErrors.length > 0 || options.shouldStop?.()) {
        release();
        skipped.push(item);
        continue;
      }

      try {
        await options.onStart?.(item);
      } catch (err) {
        release();
        callbackErrors.push(err);
        skipped.push(item);
        continue;
      }

      const settled = this.runOne(item, task, options.timeoutMs)
        .then((outcome) => {
          outcomes.push(outcome);
          reporting = reporting
            .then(() => options.onOutcome?.(item, outcome))
            .catch((err: unknown) => {
              callbackErrors.push(err);
            });
          return reporting;
        })
        .finally(release);
      inFlight.push(settled);
    }

    await Promise.all(inFlight);
    await reporting;

    if (callbackErrors.length > 0) {
      throw callbackErrors[0];
    }
    return { outcomes, skipped };
  }

  private async runOne(item: T, task: ExecutorTask<T>, timeoutMs: number): Promise<Outcome> {
    const itemId = this.idOf(item);
    const controller = new AbortController();

    const work: Promise<Outcome> = Promise.resolve()
      .then(() => task(item, controller.signal))
      .then(
        (result) => ({
          itemId,
          success: result.success,
          output: result.output,
          timedOut: result.timedOut ?? false,
          exitCode: result.exitCode,
          artifact: result.artifact,
        }),
        (err: unknown) => ({ itemId, success: false, output: errorMessage(err), timedOut: false }),
      );

    if (timeoutMs <= 0) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<Outcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          itemId,
          success: false,
          output: `Timed out after ${timeoutMs}ms`,
          timedOut: true,
          exitCode: TIMEOUT_EXIT_CODE,
        });
      }, timeoutMs);
    });

    // `work` never rejects, so the loser of the race needs no handler
    try {
      const outcome = await Promise.race([work, expired]);
      if (controller.signal.aborted) {
        logger.warn(`Item ${itemId} timed out after ${timeoutMs}ms`);
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}
