import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { StateStore } from '../../src/state/store.js';
import { markWaveCompleted, setRunStatus } from '../../src/state/transitions.js';
import { AlreadyExistsError, NotFoundError, StateCorruptError } from '../../src/errors/errors.js';
import { makeTempDir, removeTempDir, steppingClock } from '../helpers/fakes.js';

describe('StateStore', () => {
  let dir: string;
  let store: StateStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new StateStore(dir, { now: steppingClock(), pid: 4242, hostname: 'test-host' });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('initialize', () => {
    it('should create a fresh state document', async () => {
      const state = await store.initialize('run-1', { kind: 'epic' });

      expect(state).toEqual({
        version: 1,
        runId: 'run-1',
        kind: 'epic',
        status: 'initialized',
        currentWave: 0,
        completedWaves: [],
        items: {},
        errors: [],
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
        pid: 4242,
        hostname: 'test-host',
      });
      expect(await store.exists('run-1')).toBe(true);
      expect(await store.load('run-1')).toEqual(state);
    });

    it('should refuse to replace an existing run', async () => {
      await store.initialize('run-1');
      await expect(store.initialize('run-1')).rejects.toBeInstanceOf(AlreadyExistsError);
      await expect(store.initialize('run-1', { fresh: true })).rejects.toBeInstanceOf(AlreadyExistsError);
    });

    it('should replace a completed run only when fresh is requested', async () => {
      await store.initialize('run-1');
      await store.update('run-1', (s) => setRunStatus(markWaveCompleted(s, 1), 'completed'));

      await expect(store.initialize('run-1')).rejects.toBeInstanceOf(AlreadyExistsError);

      const fresh = await store.initialize('run-1', { fresh: true });
      expect(fresh.status).toBe('initialized');
      expect(fresh.completedWaves).toEqual([]);
    });
  });

  describe('load', () => {
    it('should fail with NotFound for an unknown run', async () => {
      await expect(store.load('missing')).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.exists('missing')).toBe(false);
    });

    it('should fail with StateCorrupt for invalid JSON', async () => {
      await writeFile(store.statePath('bad'), '{"version": 1,');
      await expect(store.load('bad')).rejects.toBeInstanceOf(StateCorruptError);
    });

    it('should fail with StateCorrupt for a document of the wrong shape', async () => {
      await writeFile(store.statePath('bad'), JSON.stringify({ version: 1, runId: 'bad', status: 'exploded' }));
      await expect(store.load('bad')).rejects.toBeInstanceOf(StateCorruptError);
    });

    it('should leave the file byte-for-byte unchanged', async () => {
      await store.initialize('run-1');
      await store.update('run-1', (s) => markWaveCompleted(s, 1));
      const before = await readFile(store.statePath('run-1'));

      await store.load('run-1');
      await store.load('run-1');

      const after = await readFile(store.statePath('run-1'));
      expect(after.equals(before)).toBe(true);
    });
  });

  describe('update', () => {
    it('should persist the mutation and stamp updatedAt and pid', async () => {
      await store.initialize('run-1');
      const next = await store.update('run-1', (s) => markWaveCompleted(s, 2));

      expect(next.completedWaves).toEqual([2]);
      expect(next.createdAt).toBe('2026-01-01T00:00:00.000Z');
      expect(next.updatedAt).toBe('2026-01-01T00:00:01.000Z');
      expect(next.pid).toBe(4242);
      expect(await store.load('run-1')).toEqual(next);
    });

    it('should apply updates in the order they were issued', async () => {
      await store.initialize('run-1');
      const order: number[] = [];

      await Promise.all(
        [3, 1, 2].map((wave) =>
          store.update('run-1', (s) => {
            order.push(wave);
            return markWaveCompleted(s, wave);
          })
        )
      );

      expect(order).toEqual([3, 1, 2]);
      expect((await store.load('run-1')).completedWaves).toEqual([1, 2, 3]);
    });

    it('should keep serving updates after a mutator throws', async () => {
      await store.initialize('run-1');
      const failing = store.update('run-1', () => {
        throw new Error('bad mutator');
      });
      const following = store.update('run-1', (s) => markWaveCompleted(s, 1));

      await expect(failing).rejects.toThrow('bad mutator');
      expect((await following).completedWaves).toEqual([1]);
    });

    it('should fail with NotFound when the run does not exist', async () => {
      await expect(store.update('missing', (s) => s)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should leave no temporary files behind', async () => {
      await store.initialize('run-1');
      await store.update('run-1', (s) => markWaveCompleted(s, 1));

      expect(await readdir(dir)).toEqual(['run-1.state.json']);
    });
  });

  describe('list', () => {
    it('should list run ids that have a state document', async () => {
      await store.initialize('beta');
      await store.initialize('alpha');
      await writeFile(`${dir}/alpha.plan.json`, '{}');

      expect(await store.list()).toEqual(['alpha', 'beta']);
    });
  });
});
