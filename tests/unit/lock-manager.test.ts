import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { LockManager } from '../../src/state/lock.js';
import { LockHeldError } from '../../src/errors/errors.js';
import { FakeProcesses, makeTempDir, removeTempDir } from '../helpers/fakes.js';

const fixedNow = () => new Date('2026-01-01T00:00:00.000Z');

describe('LockManager', () => {
  let dir: string;
  let processes: FakeProcesses;

  const managerFor = (pid: number, killWaitMs = 50) =>
    new LockManager(dir, processes, { pid, hostname: 'test-host', now: fixedNow, killWaitMs });

  beforeEach(async () => {
    dir = await makeTempDir();
    processes = new FakeProcesses([100, 200]);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should write the holder into the lock file', async () => {
    const manager = managerFor(100);
    const token = await manager.acquire('run-1');

    expect(token).toEqual({ runId: 'run-1', pid: 100, path: manager.lockPath('run-1') });
    expect(await manager.read('run-1')).toEqual({
      runId: 'run-1',
      pid: 100,
      hostname: 'test-host',
      acquiredAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('should refuse a lock held by a live process', async () => {
    await managerFor(100).acquire('run-1');

    const attempt = managerFor(200).acquire('run-1');
    await expect(attempt).rejects.toBeInstanceOf(LockHeldError);
    await expect(managerFor(200).acquire('run-1')).rejects.toThrow('Run run-1 is locked by live process 100');
    expect(processes.killed).toEqual([]);
  });

  it('should kill a live holder and take over when forced', async () => {
    const second = managerFor(200);
    await managerFor(100).acquire('run-1');

    const token = await second.acquire('run-1', { force: true });

    expect(processes.killed).toEqual([100]);
    expect(token.pid).toBe(200);
    expect((await second.read('run-1'))?.pid).toBe(200);
  });

  it('should give up when a forced kill does not stop the holder', async () => {
    processes.killWorks = false;
    await managerFor(100).acquire('run-1');

    await expect(managerFor(200).acquire('run-1', { force: true })).rejects.toBeInstanceOf(LockHeldError);
    expect(processes.killed).toEqual([100]);
  });

  it('should never kill its own process', async () => {
    await managerFor(100).acquire('run-1');

    await expect(managerFor(100).acquire('run-1', { force: true })).rejects.toBeInstanceOf(LockHeldError);
    expect(processes.killed).toEqual([]);
  });

  it('should take over a lock whose holder is gone', async () => {
    await managerFor(300).acquire('run-1');

    const token = await managerFor(200).acquire('run-1');

    expect(token.pid).toBe(200);
    expect(processes.killed).toEqual([]);
  });

  it('should take over an unreadable lock file', async () => {
    const manager = managerFor(200);
    await writeFile(manager.lockPath('run-1'), 'not json');

    expect(await manager.read('run-1')).toBeUndefined();
    const token = await manager.acquire('run-1');
    expect(token.pid).toBe(200);
  });

  describe('release', () => {
    it('should remove a lock it owns', async () => {
      const manager = managerFor(100);
      const token = await manager.acquire('run-1');

      expect(await manager.release(token)).toBe(true);
      expect(await manager.read('run-1')).toBeUndefined();
    });

    it('should leave a lock another process has since taken', async () => {
      const first = managerFor(300);
      const stale = await first.acquire('run-1');
      await managerFor(200).acquire('run-1');

      expect(await first.release(stale)).toBe(false);
      expect((await first.read('run-1'))?.pid).toBe(200);
    });

    it('should report false when there is no lock', async () => {
      const manager = managerFor(100);
      const token = await manager.acquire('run-1');
      await manager.release(token);

      expect(await manager.release(token)).toBe(false);
    });
  });

  it('should detect the current process as a live holder', async () => {
    const real = new LockManager(dir);
    await real.acquire('run-1');

    await expect(new LockManager(dir).acquire('run-1')).rejects.toBeInstanceOf(LockHeldError);
    await expect(new LockManager(dir).acquire('run-1', { force: true })).rejects.toBeInstanceOf(LockHeldError);
  });
});
