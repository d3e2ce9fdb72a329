/**
 * Setup and programming errors raised by the conductor.
 *
 * Per-item failures never surface as exceptions; they are classified and
 * recorded in the run state. Everything here aborts a run before (or instead
 * of) executing waves.
 */

export type ConductorErrorCode =
  | 'E_ALREADY_EXISTS'
  | 'E_NOT_FOUND'
  | 'E_LOCK_HELD'
  | 'E_INVALID_PLAN'
  | 'E_STATE_CORRUPT'
  | 'E_ILLEGAL_TRANSITION'
  | 'E_CONFIG'
  | 'E_INVALID_ID';

export class ConductorError extends Error {
  constructor(
    message: string,
    readonly code: ConductorErrorCode,
    readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AlreadyExistsError extends ConductorError {
  constructor(readonly runId: string, status: string) {
    super(
      `Run ${runId} already exists (status: ${status}). Resume it, or start fresh once it has completed.`,
      'E_ALREADY_EXISTS',
    );
  }
}

export class NotFoundError extends ConductorError {
  constructor(readonly runId: string) {
    super(`No state found for run ${runId}`, 'E_NOT_FOUND');
  }
}

export class LockHeldError extends ConductorError {
  constructor(
    readonly runId: string,
    readonly pid: number,
  ) {
    super(`Run ${runId} is locked by live process ${pid} (use --force to override)`, 'E_LOCK_HELD');
  }
}

export class InvalidPlanError extends ConductorError {
  constructor(readonly issues: string[]) {
    super(`Invalid execution plan: ${issues.join('; ')}`, 'E_INVALID_PLAN');
  }
}

export class StateCorruptError extends ConductorError {
  constructor(path: string, detail: string) {
    super(`State file ${path} is unreadable: ${detail}`, 'E_STATE_CORRUPT');
  }
}

export class IllegalTransitionError extends ConductorError {
  constructor(itemId: string, from: string, to: string) {
    super(`Illegal status transition for ${itemId}: ${from} -> ${to}`, 'E_ILLEGAL_TRANSITION');
  }
}

export class ConfigError extends ConductorError {
  constructor(message: string) {
    super(message, 'E_CONFIG');
  }
}

export class InvalidIdError extends ConductorError {
  constructor(readonly id: string, rule: string) {
    super(`Run id "${id}" ${rule}`, 'E_INVALID_ID');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
