/**
 * Project-level unit of work: each outer item (an epic) is a whole inner
 * run, driven to its end by its own RunDriver.
 */

import { errorKindPhrase, isFatal } from '../errors/classifier.js';
import { errorMessage } from '../errors/errors.js';
import type { PlanSource } from '../plan/plan.js';
import { RunDriver, type RunDriverOptions } from '../orchestrator/driver.js';
import { formatSummary } from '../orchestrator/report.js';
import type { SchedulerSettings } from '../orchestrator/scheduler.js';
import type { ShutdownSignal } from '../orchestrator/shutdown.js';
import type { ExecuteContext, Finalizer, UnitOfWork, UnitResult, WorkItem } from '../types.js';
import { logger } from '../utils/logger.js';

export interface NestedRunUnitOptions {
  stateDir: string;
  /** Inner run id is `${innerRunPrefix}${item.id}`. */
  innerRunPrefix: string;
  /** Outer shutdown; each inner run gets a child of it. */
  shutdown: ShutdownSignal;
  planSourceFor: (item: WorkItem) => PlanSource;
  unitFor: (item: WorkItem) => UnitOfWork;
  settings?: Partial<SchedulerSettings>;
  finalizers?: Finalizer[];
  force?: boolean;
  /** Extra driver options (clock, sleep, collaborators) for every inner run. */
  driverOptions?: Partial<RunDriverOptions>;
  /** Called with each inner driver before it starts, e.g. to forward its events. */
  onDriver?: (driver: RunDriver, item: WorkItem) => void;
}

export class NestedRunUnit implements UnitOfWork {
  constructor(private readonly options: NestedRunUnitOptions) {}

  innerRunId(itemId: string): string {
    return `${this.options.innerRunPrefix}${itemId}`;
  }

  async execute(item: WorkItem, { attempt, signal }: ExecuteContext): Promise<UnitResult> {
    const { shutdown } = this.options;
    const runId = this.innerRunId(item.id);
    const child = shutdown.child();

    try {
      const driver = new RunDriver({
        ...this.options.driverOptions,
        runId,
        stateDir: this.options.stateDir,
        unit: this.options.unitFor(item),
        planSource: this.options.planSourceFor(item),
        mode: 'auto',
        kind: 'epic',
        force: this.options.force,
        settings: this.options.settings,
        finalizers: this.options.finalizers,
        shutdown: child,
        signal,
      });
      this.options.onDriver?.(driver, item);

      logger.info(`Starting inner run ${runId}`, { attempt });
      const summary = await driver.run();

      switch (summary.status) {
        case 'completed':
          return { success: true, output: formatSummary(summary) };
        case 'fatal_error': {
          // Lead with a phrase of the inner kind so the outer classifier lands on it too.
          // Ids stay out of the text: an id like 429 would read as a status code.
          const fatal = summary.errors
            .filter((e) => isFatal(e.kind))
            .map((e) => `${errorKindPhrase(e.kind)}: ${e.message}`);
          return { success: false, output: fatal.join('\n') };
        }
        case 'interrupted':
        case 'initialized':
        case 'running':
          return { success: false, output: `inner run ended ${summary.status}` };
      }
    } catch (err) {
      logger.error(`Inner run ${runId} could not run: ${errorMessage(err)}`);
      return { success: false, output: 'inner run could not be set up' };
    } finally {
      shutdown.release(child);
    }
  }
}
