import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunDriver } from '../../src/orchestrator/driver.js';
import { exitCodeFor } from '../../src/orchestrator/report.js';
import { ShutdownSignal } from '../../src/orchestrator/shutdown.js';
import { inlinePlanSource } from '../../src/plan/plan.js';
import { StateStore } from '../../src/state/store.js';
import { itemState } from '../../src/state/transitions.js';
import { NestedRunUnit } from '../../src/work/nested-run.js';
import type { RunSummary } from '../../src/types.js';
import { fail, makeTempDir, recordingSleep, removeTempDir, ScriptedUnit } from '../helpers/fakes.js';

const projectPlan = {
  waves: [
    { wave: 1, items: ['e1'] },
    { wave: 2, items: ['e2'] },
  ],
};

describe('NestedRunUnit', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function runProject(innerPlans: Record<string, unknown>, innerUnits: Record<string, ScriptedUnit>): Promise<RunSummary> {
    const shutdown = new ShutdownSignal();
    const { sleep } = recordingSleep();
    const nested = new NestedRunUnit({
      stateDir: dir,
      innerRunPrefix: 'epic-',
      shutdown,
      planSourceFor: (item) => inlinePlanSource(innerPlans[item.id], `plan for ${item.id}`),
      unitFor: (item) => innerUnits[item.id] ?? new ScriptedUnit(),
      settings: { maxRetries: 2 },
      driverOptions: { sleep, random: () => 0.5 },
    });

    return new RunDriver({
      runId: 'project',
      stateDir: dir,
      unit: nested,
      planSource: inlinePlanSource(projectPlan),
      mode: 'auto',
      kind: 'project',
      settings: { maxRetries: 1 },
      shutdown,
      sleep,
      random: () => 0.5,
    }).run();
  }

  it('should name inner runs after the outer item', () => {
    const unit = new NestedRunUnit({
      stateDir: dir,
      innerRunPrefix: 'epic-',
      shutdown: new ShutdownSignal(),
      planSourceFor: () => inlinePlanSource({}),
      unitFor: () => new ScriptedUnit(),
    });
    expect(unit.innerRunId('auth')).toBe('epic-auth');
  });

  it('should fail the item when its inner run id is not a safe file name', async () => {
    const unit = new NestedRunUnit({
      stateDir: dir,
      innerRunPrefix: '../',
      shutdown: new ShutdownSignal(),
      planSourceFor: () => inlinePlanSource({ waves: [{ wave: 1, items: ['1'] }] }),
      unitFor: () => new ScriptedUnit(),
    });

    const result = await unit.execute({ id: 'auth', dependsOn: [] }, { attempt: 1, signal: new AbortController().signal });

    expect(result).toEqual({ success: false, output: 'inner run could not be set up' });
  });

  it('should drive every inner run to completion', async () => {
    const e1 = new ScriptedUnit();
    const e2 = new ScriptedUnit();

    const summary = await runProject(
      {
        e1: { waves: [{ wave: 1, items: ['1', '2'] }] },
        e2: { waves: [{ wave: 1, items: ['3'] }] },
      },
      { e1, e2 }
    );

    expect(summary.status).toBe('completed');
    expect(summary.kind).toBe('project');
    expect(e1.callOrder()).toEqual(['1', '2']);
    expect(e2.callOrder()).toEqual(['3']);

    const store = new StateStore(dir);
    expect(await store.list()).toEqual(['epic-e1', 'epic-e2', 'project']);
    const inner = await store.load('epic-e1');
    expect(inner.kind).toBe('epic');
    expect(inner.status).toBe('completed');
  });

  it('should make the outer run fatal when an inner run fails fatally', async () => {
    const e1 = new ScriptedUnit({ '1': [fail('HTTP 403 Forbidden')] });
    const e2 = new ScriptedUnit();

    const summary = await runProject(
      {
        e1: { waves: [{ wave: 1, items: ['1'] }] },
        e2: { waves: [{ wave: 1, items: ['3'] }] },
      },
      { e1, e2 }
    );

    expect(summary.status).toBe('fatal_error');
    expect(summary.fatalItems).toEqual(['e1']);
    expect(summary.errors).toHaveLength(1);
    expect(summary.errors[0]).toMatchObject({ itemId: 'e1', kind: 'auth', message: 'unauthorized: HTTP 403 Forbidden' });
    expect(e2.calls).toEqual([]);

    const store = new StateStore(dir);
    expect((await store.load('epic-e1')).status).toBe('fatal_error');
    expect(await store.exists('epic-e2')).toBe(false);
  });

  it('should record an inner run that cannot start as a failed item', async () => {
    const e2 = new ScriptedUnit();

    const summary = await runProject(
      {
        e1: { waves: [] },
        e2: { waves: [{ wave: 1, items: ['3'] }] },
      },
      { e2 }
    );

    expect(summary.status).toBe('completed');
    expect(summary.failedItems).toEqual(['e1']);
    expect(summary.errors[0]).toMatchObject({ itemId: 'e1', kind: 'none', message: 'inner run could not be set up' });
    expect(exitCodeFor(summary)).toBe(2);
    expect(e2.callOrder()).toEqual(['3']);

    const outer = await new StateStore(dir).load('project');
    expect(itemState(outer, 'e2').status).toBe('completed');
  });
});
