import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StateStore } from '../../src/state/store.js';
import { itemState, markInProgress, registerItems } from '../../src/state/transitions.js';
import { ShutdownSignal, type Sleep } from '../../src/orchestrator/shutdown.js';
import {
  ERROR_MESSAGE_LIMIT,
  WaveScheduler,
  type SchedulerEvent,
  type SchedulerSettings,
} from '../../src/orchestrator/scheduler.js';
import type { ExecutionPlan, Wave } from '../../src/plan/plan.js';
import type { UnitResult } from '../../src/types.js';
import { fail, makeTempDir, ok, recordingSleep, removeTempDir, ScriptedUnit, steppingClock } from '../helpers/fakes.js';

const RUN_ID = 'run-1';

describe('WaveScheduler', () => {
  let dir: string;
  let store: StateStore;
  let shutdown: ShutdownSignal;
  let events: SchedulerEvent[];

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new StateStore(dir, { now: steppingClock() });
    shutdown = new ShutdownSignal();
    events = [];
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function waveOf(items: string[]): Promise<{ wave: Wave; plan: ExecutionPlan }> {
    const wave: Wave = { wave: 1, items };
    await store.initialize(RUN_ID, { kind: 'epic' });
    await store.update(RUN_ID, (s) => registerItems(s, items, new Date()));
    return { wave, plan: { waves: [wave], items: {}, successCriteria: [] } };
  }

  function schedulerFor(unit: ScriptedUnit, settings: Partial<SchedulerSettings> = {}, sleep?: Sleep) {
    return new WaveScheduler({
      runId: RUN_ID,
      store,
      unit,
      shutdown,
      settings,
      sleep: sleep ?? recordingSleep().sleep,
      random: () => 0.5,
      onEvent: (event) => events.push(event),
    });
  }

  it('should complete a wave whose items all succeed', async () => {
    const { wave, plan } = await waveOf(['A', 'B']);
    const unit = new ScriptedUnit();

    const result = await schedulerFor(unit).runWave(wave, plan);

    expect(result).toEqual({ wave: 1, outcome: 'complete' });
    const state = await store.load(RUN_ID);
    expect(itemState(state, 'A').status).toBe('completed');
    expect(itemState(state, 'B').status).toBe('completed');
    expect(unit.calls).toEqual([
      { id: 'A', attempt: 1 },
      { id: 'B', attempt: 1 },
    ]);
  });

  it('should retry a transient failure after the backoff delay', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit({ A: [fail('connection refused'), ok()] });
    const { sleep, delays } = recordingSleep();

    const result = await schedulerFor(unit, { maxRetries: 3, backoff: { baseMs: 1000, maxMs: 10000 } }, sleep).runWave(
      wave,
      plan
    );

    expect(result.outcome).toBe('complete');
    expect(unit.calls).toEqual([
      { id: 'A', attempt: 1 },
      { id: 'A', attempt: 2 },
    ]);
    expect(delays).toEqual([1000]);

    const state = await store.load(RUN_ID);
    expect(itemState(state, 'A')).toMatchObject({ status: 'completed', attempts: 1 });
    expect(state.errors).toHaveLength(1);
    expect(state.errors[0]).toMatchObject({ itemId: 'A', kind: 'network', message: 'connection refused' });
  });

  it('should leave an item failed once its retries are used up', async () => {
    const { wave, plan } = await waveOf(['A', 'B']);
    const unit = new ScriptedUnit({ A: [fail('Segmentation fault'), fail('Segmentation fault'), ok()] });
    const { sleep, delays } = recordingSleep();

    const result = await schedulerFor(unit, { maxRetries: 2 }, sleep).runWave(wave, plan);

    expect(result.outcome).toBe('complete');
    expect(unit.callCount('A')).toBe(2);
    expect(unit.callCount('B')).toBe(1);
    expect(delays).toEqual([5000]);

    const state = await store.load(RUN_ID);
    expect(itemState(state, 'A')).toMatchObject({ status: 'failed', attempts: 2 });
    expect(itemState(state, 'B').status).toBe('completed');
  });

  it('should stop dispatching once an item fails fatally', async () => {
    const { wave, plan } = await waveOf(['A', 'B']);
    const unit = new ScriptedUnit({ A: [fail('HTTP 401 Unauthorized')] });

    const result = await schedulerFor(unit, { maxParallel: 1 }).runWave(wave, plan);

    expect(result.outcome).toBe('fatal');
    expect(unit.callOrder()).toEqual(['A']);

    const state = await store.load(RUN_ID);
    expect(itemState(state, 'A').status).toBe('fatal');
    expect(itemState(state, 'B').status).toBe('pending');
    expect(state.errors[0]).toMatchObject({ itemId: 'A', kind: 'auth', message: 'HTTP 401 Unauthorized' });
  });

  it('should count a reported artifact as success', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit({
      A: [{ success: false, output: 'cleanup step failed', exitCode: 1, artifact: 'https://example.test/pr/3' }],
    });

    await schedulerFor(unit).runWave(wave, plan);

    expect(itemState(await store.load(RUN_ID), 'A')).toMatchObject({
      status: 'completed',
      artifact: 'https://example.test/pr/3',
    });
  });

  it('should return interrupted without dispatching when shutdown was already requested', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit();
    shutdown.request('SIGINT');

    const result = await schedulerFor(unit).runWave(wave, plan);

    expect(result.outcome).toBe('interrupted');
    expect(unit.calls).toEqual([]);
  });

  it('should not start new items after shutdown is requested mid-wave', async () => {
    const { wave, plan } = await waveOf(['A', 'B']);
    const unit = new ScriptedUnit({
      A: [
        async () => {
          shutdown.request('SIGTERM');
          return ok();
        },
      ],
    });

    const result = await schedulerFor(unit, { maxParallel: 1 }).runWave(wave, plan);

    expect(result.outcome).toBe('interrupted');
    expect(unit.callOrder()).toEqual(['A']);
    const state = await store.load(RUN_ID);
    expect(itemState(state, 'A').status).toBe('completed');
    expect(itemState(state, 'B').status).toBe('pending');
  });

  it('should return interrupted when shutdown arrives during a backoff wait', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit({ A: [fail('connection refused')] });
    const delays: number[] = [];
    const sleep: Sleep = async (ms) => {
      delays.push(ms);
      shutdown.request('SIGINT');
    };

    const result = await schedulerFor(unit, { maxRetries: 3 }, sleep).runWave(wave, plan);

    expect(result.outcome).toBe('interrupted');
    expect(delays).toEqual([5000]);
    expect(unit.callCount('A')).toBe(1);
  });

  it('should re-dispatch an item a crash left in progress', async () => {
    const { wave, plan } = await waveOf(['A']);
    await store.update(RUN_ID, (s) => markInProgress(s, 'A', new Date()));
    const unit = new ScriptedUnit();

    const result = await schedulerFor(unit).runWave(wave, plan);

    expect(result.outcome).toBe('complete');
    expect(unit.calls).toEqual([{ id: 'A', attempt: 1 }]);
  });

  it('should not dispatch items that are already settled', async () => {
    const { wave, plan } = await waveOf(['A', 'B']);
    const unit = new ScriptedUnit();
    await schedulerFor(unit).runWave(wave, plan);

    const again = new ScriptedUnit();
    const result = await schedulerFor(again).runWave(wave, plan);

    expect(result.outcome).toBe('complete');
    expect(again.calls).toEqual([]);
  });

  it('should keep only the tail of long output', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit({ A: [fail(`${'x'.repeat(600)}END`)] });

    await schedulerFor(unit, { maxRetries: 1 }).runWave(wave, plan);

    const [record] = (await store.load(RUN_ID)).errors;
    expect(record?.message).toHaveLength(ERROR_MESSAGE_LIMIT);
    expect(record?.message.endsWith('xxEND')).toBe(true);
    expect(record?.kind).toBe('none');
  });

  it('should classify an item cut off by the timeout as a timeout', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit({
      A: [
        ({ signal }) =>
          new Promise<UnitResult>((resolve) => {
            signal.addEventListener('abort', () => resolve({ success: false, output: '' }));
          }),
      ],
    });

    await schedulerFor(unit, { maxRetries: 1, itemTimeoutMs: 20 }).runWave(wave, plan);

    const state = await store.load(RUN_ID);
    expect(itemState(state, 'A')).toMatchObject({ status: 'failed', attempts: 1 });
    expect(state.errors[0]).toMatchObject({ kind: 'timeout', message: 'Timed out after 20ms' });
  });

  it('should emit events in order', async () => {
    const { wave, plan } = await waveOf(['A']);
    const unit = new ScriptedUnit({ A: [fail('503 Service Unavailable'), ok()] });

    await schedulerFor(unit, { maxRetries: 2, backoff: { baseMs: 1000, maxMs: 10000 } }).runWave(wave, plan);

    expect(events).toEqual([
      { type: 'wave:start', runId: RUN_ID, wave: 1, items: ['A'] },
      { type: 'item:start', runId: RUN_ID, wave: 1, itemId: 'A', attempt: 1 },
      { type: 'item:failed', runId: RUN_ID, wave: 1, itemId: 'A', kind: 'apiError', attempts: 1, willRetry: true },
      { type: 'wave:retry', runId: RUN_ID, wave: 1, iteration: 2, delayMs: 1000, items: ['A'] },
      { type: 'item:start', runId: RUN_ID, wave: 1, itemId: 'A', attempt: 2 },
      { type: 'item:completed', runId: RUN_ID, wave: 1, itemId: 'A' },
      { type: 'wave:end', runId: RUN_ID, wave: 1, outcome: 'complete' },
    ]);
  });
});
