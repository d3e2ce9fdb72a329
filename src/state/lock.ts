/**
 * One live driver per run id, enforced with a pid-stamped lock file.
 *
 * A lock whose owner is dead (or whose file cannot be read) is stale and
 * gets taken over silently. A live owner blocks acquisition unless `force`
 * is set, in which case the owner's process tree is killed first.
 */

import { readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { hostname as osHostname } from 'node:os';
import { z } from 'zod';
import { LockHeldError } from '../errors/errors.js';
import { createFileExclusive } from '../utils/atomic-file.js';
import { systemProcessControl, waitForExit, type ProcessControl } from '../utils/process.js';
import { logger } from '../utils/logger.js';

const LockInfoSchema = z.object({
  runId: z.string(),
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface LockToken {
  runId: string;
  pid: number;
  path: string;
}

export interface LockManagerOptions {
  pid?: number;
  hostname?: string;
  now?: () => Date;
  /** How long to wait for a force-killed owner to exit. */
  killWaitMs?: number;
}

export class LockManager {
  private readonly pid: number;
  private readonly hostname: string;
  private readonly now: () => Date;
  private readonly killWaitMs: number;

  constructor(
    readonly stateDir: string,
    private readonly processes: ProcessControl = systemProcessControl,
    options: LockManagerOptions = {},
  ) {
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? osHostname();
    this.now = options.now ?? (() => new Date());
    this.killWaitMs = options.killWaitMs ?? 5000;
  }

  lockPath(runId: string): string {
    return join(this.stateDir, `${runId}.lock`);
  }

  async acquire(runId: string, options: { force?: boolean } = {}): Promise<LockToken> {
    const path = this.lockPath(runId);
    const info: LockInfo = {
      runId,
      pid: this.pid,
      hostname: this.hostname,
      acquiredAt: this.now().toISOString(),
    };

    // Second pass covers a racer that grabbed the lock between our unlink and create
    for (let pass = 0; pass < 2; pass++) {
      try {
        await createFileExclusive(path, JSON.stringify(info, null, 2) + '\n');
        logger.debug('Lock acquired', { runId, pid: this.pid });
        return { runId, pid: this.pid, path };
      } catch (err) {
        if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
          throw err;
        }
      }

      const holder = await this.read(runId);
      if (holder && this.processes.isAlive(holder.pid)) {
        if (!options.force || holder.pid === this.pid) {
          throw new LockHeldError(runId, holder.pid);
        }
        logger.warn(`Force-acquiring lock for ${runId}: terminating process ${holder.pid}`);
        await this.processes.killTree(holder.pid);
        const exited = await waitForExit(holder.pid, (pid) => this.processes.isAlive(pid), this.killWaitMs);
        if (!exited) {
          throw new LockHeldError(runId, holder.pid);
        }
      } else if (holder) {
        logger.info(`Removing stale lock for ${runId} (process ${holder.pid} is gone)`);
      } else {
        logger.warn(`Removing unreadable lock file ${path}`);
      }

      await this.remove(path);
    }

    const holder = await this.read(runId);
    throw new LockHeldError(runId, holder?.pid ?? 0);
  }

  /** Removes the lock only if it still belongs to the token's process. */
  async release(token: LockToken): Promise<boolean> {
    const holder = await this.read(token.runId);
    if (!holder || holder.pid !== token.pid) {
      logger.warn(`Not releasing lock for ${token.runId}: no longer owned by ${token.pid}`);
      return false;
    }
    await this.remove(token.path);
    logger.debug('Lock released', { runId: token.runId });
    return true;
  }

  /** The current holder, or undefined when there is no readable lock. */
  async read(runId: string): Promise<LockInfo | undefined> {
    let content: string;
    try {
      content = await readFile(this.lockPath(runId), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return undefined;
      }
      throw err;
    }

    try {
      const parsed = LockInfoSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : undefined;
    } catch {
      return undefined;
    }
  }

  private async remove(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
        throw err;
      }
    }
  }
}
