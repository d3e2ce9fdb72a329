/**
 * Run Driver - top-level control loop for one run id.
 *
 * lock -> plan -> state -> waves -> finalizers, with the lock released on
 * every exit path. Shutdown and fatal items are only acted on at wave
 * boundaries; a wave that has started is always allowed to settle.
 */

import { EventEmitter } from 'events';
import { errorMessage, InvalidIdError, InvalidPlanError, NotFoundError } from '../errors/errors.js';
import { LockManager, type LockToken } from '../state/lock.js';
import { StateStore } from '../state/store.js';
import type { RunKind, RunState, RunStatus } from '../state/schema.js';
import {
  hasFatalItem,
  markWaveCompleted,
  missingItems,
  newRunState,
  registerItems,
  setCurrentWave,
  setRunStatus,
} from '../state/transitions.js';
import { parsePlan, planItemIds, PlanStore, type ExecutionPlan, type PlanSource } from '../plan/plan.js';
import type { Finalizer, RunSummary, UnitOfWork } from '../types.js';
import { WaveScheduler, type SchedulerEvent, type SchedulerSettings } from './scheduler.js';
import { ShutdownSignal, type Sleep } from './shutdown.js';
import { summarize } from './report.js';
import { isSafeId, SAFE_ID_RULE } from '../utils/ids.js';
import { logger } from '../utils/logger.js';

/**
 * start:  initialize a new run (fails if one exists, unless fresh over a completed run)
 * resume: continue an existing run (fails if none exists)
 * auto:   resume when state exists, start otherwise
 */
export type RunMode = 'start' | 'resume' | 'auto';

export interface RunStatusEvent {
  type: 'run:status';
  runId: string;
  status: RunStatus;
}

export type DriverEvent = SchedulerEvent | RunStatusEvent;

export interface RunDriverOptions {
  runId: string;
  stateDir: string;
  unit: UnitOfWork;
  /** Required unless a stored plan exists and the mode allows reusing it. */
  planSource?: PlanSource;
  mode?: RunMode;
  kind?: RunKind;
  fresh?: boolean;
  force?: boolean;
  dryRun?: boolean;
  settings?: Partial<SchedulerSettings>;
  finalizers?: Finalizer[];
  shutdown?: ShutdownSignal;
  /** Aborting requests shutdown of this run. */
  signal?: AbortSignal;

  // Collaborators, overridable for tests
  lockManager?: LockManager;
  store?: StateStore;
  planStore?: PlanStore;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export class RunDriver extends EventEmitter {
  readonly runId: string;
  readonly shutdown: ShutdownSignal;
  private readonly mode: RunMode;
  private readonly kind: RunKind;
  private readonly locks: LockManager;
  private readonly store: StateStore;
  private readonly plans: PlanStore;
  private readonly now: () => Date;

  constructor(private readonly options: RunDriverOptions) {
    super();
    if (!isSafeId(options.runId)) {
      throw new InvalidIdError(options.runId, SAFE_ID_RULE);
    }
    this.runId = options.runId;
    this.mode = options.mode ?? 'start';
    this.kind = options.kind ?? 'run';
    this.shutdown = options.shutdown ?? new ShutdownSignal();
    this.now = options.now ?? (() => new Date());
    this.locks = options.lockManager ?? new LockManager(options.stateDir);
    this.store = options.store ?? new StateStore(options.stateDir, { now: this.now });
    this.plans = options.planStore ?? new PlanStore(options.stateDir);
  }

  async run(): Promise<RunSummary> {
    if (this.options.dryRun) {
      return this.preview();
    }

    const token = await this.locks.acquire(this.runId, { force: this.options.force });
    const unlink = this.options.signal ? this.shutdown.link(this.options.signal, `run ${this.runId} aborted`) : undefined;

    try {
      return await this.execute();
    } finally {
      unlink?.();
      await this.releaseLock(token);
    }
  }

  /** Validate the plan and report what a run would do. Writes nothing. */
  private async preview(): Promise<RunSummary> {
    const { plan } = await this.obtainPlan();
    const state = (await this.store.exists(this.runId))
      ? await this.store.load(this.runId)
      : newRunState(this.runId, this.kind, this.now(), { pid: process.pid, hostname: 'dry-run' });
    logger.info(`Dry run for ${this.runId}: plan is valid`, { waves: plan.waves.length });
    return summarize(state, plan, { dryRun: true });
  }

  private async execute(): Promise<RunSummary> {
    if (this.mode === 'resume' && !(await this.store.exists(this.runId))) {
      throw new NotFoundError(this.runId);
    }
    const { plan, stored } = await this.obtainPlan();
    const { state: loaded, resumed } = await this.loadOrInitialize();

    if (resumed && loaded.status === 'completed') {
      logger.info(`Run ${this.runId} already completed`);
      return summarize(loaded, plan);
    }

    if (!stored) {
      await this.plans.save(this.runId, plan);
    }

    const missing = missingItems(loaded, planItemIds(plan));
    if (missing.length > 0) {
      await this.store.update(this.runId, (s) => registerItems(s, missing, this.now()));
    }

    let state = await this.setStatus('running');

    const scheduler = new WaveScheduler({
      runId: this.runId,
      store: this.store,
      unit: this.options.unit,
      shutdown: this.shutdown,
      settings: this.options.settings,
      sleep: this.options.sleep,
      random: this.options.random,
      now: this.now,
      onEvent: (event) => this.forward(event),
    });

    for (const wave of plan.waves) {
      if (state.completedWaves.includes(wave.wave)) {
        logger.debug(`Wave ${wave.wave} already completed, skipping`, { runId: this.runId });
        continue;
      }
      if (this.shutdown.requested) {
        return this.finish('interrupted', plan);
      }
      if (hasFatalItem(state)) {
        return this.finish('fatal_error', plan);
      }

      state = await this.store.update(this.runId, (s) => setCurrentWave(s, wave.wave));
      const result = await scheduler.runWave(wave, plan);

      switch (result.outcome) {
        case 'complete':
          state = await this.store.update(this.runId, (s) => markWaveCompleted(s, wave.wave));
          break;
        case 'fatal':
          return this.finish('fatal_error', plan);
        case 'interrupted':
          return this.finish('interrupted', plan);
      }
    }

    if (hasFatalItem(state)) {
      return this.finish('fatal_error', plan);
    }

    await this.runFinalizers(plan, summarize(setRunStatus(state, 'completed'), plan));
    return this.finish('completed', plan);
  }

  /**
   * The stored plan wins on resume so that waves already run keep their
   * meaning; otherwise the plan source is read and validated.
   */
  private async obtainPlan(): Promise<{ plan: ExecutionPlan; stored: boolean }> {
    if (this.mode !== 'start') {
      const stored = await this.plans.load(this.runId);
      if (stored) {
        logger.info(`Using stored execution plan for ${this.runId}`);
        return { plan: stored, stored: true };
      }
    }

    const source = this.options.planSource;
    if (!source) {
      throw new InvalidPlanError([`no stored plan for run ${this.runId} and no plan source given`]);
    }
    logger.info(`Reading execution plan from ${source.description}`);
    return { plan: parsePlan(await source.read()), stored: false };
  }

  private async loadOrInitialize(): Promise<{ state: RunState; resumed: boolean }> {
    const resume = this.mode === 'resume' || (this.mode === 'auto' && (await this.store.exists(this.runId)));
    if (resume) {
      return { state: await this.store.load(this.runId), resumed: true };
    }
    const state = await this.store.initialize(this.runId, { fresh: this.options.fresh, kind: this.kind });
    return { state, resumed: false };
  }

  private async runFinalizers(plan: ExecutionPlan, summary: RunSummary): Promise<void> {
    for (const finalizer of this.options.finalizers ?? []) {
      try {
        await finalizer.run({ runId: this.runId, stateDir: this.options.stateDir, plan, summary });
      } catch (err) {
        logger.error(`Finalizer ${finalizer.name} failed: ${errorMessage(err)}`, { runId: this.runId });
      }
    }
  }

  private async setStatus(status: RunStatus): Promise<RunState> {
    const state = await this.store.update(this.runId, (s) => setRunStatus(s, status));
    this.forward({ type: 'run:status', runId: this.runId, status });
    return state;
  }

  private async finish(status: RunStatus, plan: ExecutionPlan): Promise<RunSummary> {
    const state = await this.setStatus(status);
    const level = status === 'completed' ? 'info' : 'warn';
    logger.log(level, `Run ${this.runId} finished: ${status}`, this.shutdown.reason ? { reason: this.shutdown.reason } : {});
    return summarize(state, plan);
  }

  private async releaseLock(token: LockToken): Promise<void> {
    try {
      await this.locks.release(token);
    } catch (err) {
      logger.error(`Failed to release lock for ${this.runId}: ${errorMessage(err)}`);
    }
  }

  private forward(event: DriverEvent): void {
    this.emit(event.type, event);
    this.emit('event', event);
  }
}
