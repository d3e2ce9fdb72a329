/**
 * Pure RunState transformations. Every mutation the scheduler and driver make
 * goes through one of these inside StateStore.update().
 */

import { IllegalTransitionError } from '../errors/errors.js';
import { STATE_VERSION, type ErrorRecord, type ItemState, type ItemStatus, type RunKind, type RunState, type RunStatus } from './schema.js';

const ALLOWED: Record<ItemStatus, readonly ItemStatus[]> = {
  pending: ['in_progress'],
  // in_progress -> in_progress: re-dispatch after a crash left the item in flight
  in_progress: ['in_progress', 'completed', 'failed', 'fatal'],
  failed: ['in_progress'],
  completed: [],
  fatal: [],
};

export interface RunOwner {
  pid: number;
  hostname: string;
}

export function newRunState(runId: string, kind: RunKind, now: Date, owner: RunOwner): RunState {
  const timestamp = now.toISOString();
  return {
    version: STATE_VERSION,
    runId,
    kind,
    status: 'initialized',
    currentWave: 0,
    completedWaves: [],
    items: {},
    errors: [],
    createdAt: timestamp,
    updatedAt: timestamp,
    pid: owner.pid,
    hostname: owner.hostname,
  };
}

export function canTransition(from: ItemStatus, to: ItemStatus): boolean {
  return ALLOWED[from].includes(to);
}

export function itemState(state: RunState, itemId: string): ItemState {
  const item = Object.hasOwn(state.items, itemId) ? state.items[itemId] : undefined;
  return item ?? { status: 'pending', attempts: 0, updatedAt: state.createdAt };
}

function withItem(
  state: RunState,
  itemId: string,
  to: ItemStatus,
  now: Date,
  patch: Partial<ItemState> = {},
): RunState {
  const current = itemState(state, itemId);
  if (!canTransition(current.status, to)) {
    throw new IllegalTransitionError(itemId, current.status, to);
  }
  return {
    ...state,
    items: {
      ...state.items,
      [itemId]: { ...current, ...patch, status: to, updatedAt: now.toISOString() },
    },
  };
}

/** Add any plan items the state does not know yet, as pending. */
export function registerItems(state: RunState, itemIds: Iterable<string>, now: Date): RunState {
  const items = { ...state.items };
  for (const id of itemIds) {
    if (!Object.hasOwn(items, id)) {
      items[id] = { status: 'pending', attempts: 0, updatedAt: now.toISOString() };
    }
  }
  return { ...state, items };
}

export function missingItems(state: RunState, itemIds: Iterable<string>): string[] {
  return Array.from(itemIds).filter((id) => !Object.hasOwn(state.items, id));
}

export function markInProgress(state: RunState, itemId: string, now: Date): RunState {
  return withItem(state, itemId, 'in_progress', now);
}

export function markCompleted(state: RunState, itemId: string, now: Date, artifact?: string): RunState {
  return withItem(state, itemId, 'completed', now, artifact ? { artifact } : {});
}

export function markFailed(state: RunState, record: ErrorRecord, now: Date): RunState {
  const attempts = itemState(state, record.itemId).attempts + 1;
  const next = withItem(state, record.itemId, 'failed', now, { attempts });
  return { ...next, errors: [...next.errors, record] };
}

export function markFatal(state: RunState, record: ErrorRecord, now: Date): RunState {
  const next = withItem(state, record.itemId, 'fatal', now);
  return { ...next, errors: [...next.errors, record] };
}

export function markWaveCompleted(state: RunState, wave: number): RunState {
  if (state.completedWaves.includes(wave)) {
    return state;
  }
  return { ...state, completedWaves: [...state.completedWaves, wave].sort((a, b) => a - b) };
}

export function setCurrentWave(state: RunState, wave: number): RunState {
  return { ...state, currentWave: wave };
}

export function setRunStatus(state: RunState, status: RunStatus): RunState {
  return { ...state, status };
}

export function hasFatalItem(state: RunState): boolean {
  return Object.values(state.items).some((item) => item.status === 'fatal');
}
