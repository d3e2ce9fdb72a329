/**
 * Durable RunState persistence, one JSON document per run id.
 *
 * Writes are atomic replaces; updates issued through one store instance are
 * applied strictly in the order they were issued. Exclusion across processes
 * is the LockManager's job, not the store's.
 */

import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { hostname as osHostname } from 'node:os';
import { glob } from 'glob';
import { ZodError } from 'zod';
import { writeFileAtomic } from '../utils/atomic-file.js';
import { AlreadyExistsError, NotFoundError, StateCorruptError } from '../errors/errors.js';
import { RunStateSchema, type RunKind, type RunState } from './schema.js';
import { newRunState } from './transitions.js';
import { logger } from '../utils/logger.js';

const STATE_SUFFIX = '.state.json';

export type StateMutator = (state: RunState) => RunState;

export interface StateStoreOptions {
  now?: () => Date;
  pid?: number;
  hostname?: string;
}

export interface InitializeOptions {
  /** Replace a run that has reached `completed`. */
  fresh?: boolean;
  kind?: RunKind;
}

export class StateStore {
  private readonly now: () => Date;
  private readonly pid: number;
  private readonly hostname: string;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    readonly stateDir: string,
    options: StateStoreOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
    this.hostname = options.hostname ?? osHostname();
  }

  statePath(runId: string): string {
    return join(this.stateDir, `${runId}${STATE_SUFFIX}`);
  }

  async exists(runId: string): Promise<boolean> {
    try {
      await access(this.statePath(runId));
      return true;
    } catch {
      return false;
    }
  }

  initialize(runId: string, options: InitializeOptions = {}): Promise<RunState> {
    return this.serialize(async () => {
      if (await this.exists(runId)) {
        const existing = await this.read(runId);
        if (existing.status !== 'completed' || !options.fresh) {
          throw new AlreadyExistsError(runId, existing.status);
        }
        logger.info(`Replacing completed run ${runId} with a fresh one`);
      }

      const state = newRunState(runId, options.kind ?? 'run', this.now(), { pid: this.pid, hostname: this.hostname });
      await this.write(state);
      return state;
    });
  }

  load(runId: string): Promise<RunState> {
    return this.serialize(() => this.read(runId));
  }

  /**
   * Apply `mutator` to the on-disk state and persist the result. The mutator
   * must be pure; it may be handed a state other callers have since advanced.
   */
  update(runId: string, mutator: StateMutator): Promise<RunState> {
    return this.serialize(async () => {
      const current = await this.read(runId);
      const next: RunState = {
        ...mutator(current),
        updatedAt: this.now().toISOString(),
        pid: this.pid,
      };
      await this.write(next);
      return next;
    });
  }

  /** Run ids that have a state document, sorted. */
  async list(): Promise<string[]> {
    const files = await glob(`*${STATE_SUFFIX}`, { cwd: this.stateDir });
    return files.map((f) => f.slice(0, -STATE_SUFFIX.length)).sort();
  }

  private async read(runId: string): Promise<RunState> {
    const path = this.statePath(runId);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(runId);
      }
      throw err;
    }

    try {
      return RunStateSchema.parse(JSON.parse(content));
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new StateCorruptError(path, 'not valid JSON');
      }
      if (err instanceof ZodError) {
        throw new StateCorruptError(path, err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
      }
      throw err;
    }
  }

  private async write(state: RunState): Promise<void> {
    await writeFileAtomic(this.statePath(state.runId), JSON.stringify(state, null, 2) + '\n');
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.tail.then(operation, operation);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
