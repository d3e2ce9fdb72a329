import chalk from 'chalk';
import type { Command } from 'commander';
import { ConductorError } from '../../errors/errors.js';
import { formatSummary, summarize } from '../../orchestrator/report.js';
import { PlanStore } from '../../plan/plan.js';
import { LockManager } from '../../state/lock.js';
import type { RunState, RunStatus } from '../../state/schema.js';
import { StateStore } from '../../state/store.js';
import { isProcessAlive } from '../../utils/process.js';
import { loadContext, type GlobalOptions } from '../shared.js';

const STATUS_COLORS: Record<RunStatus, (text: string) => string> = {
  initialized: chalk.gray,
  running: chalk.blue,
  interrupted: chalk.yellow,
  fatal_error: chalk.red,
  completed: chalk.green,
};

export function statusLine(state: RunState): string {
  const items = Object.values(state.items);
  const completed = items.filter((item) => item.status === 'completed').length;
  return [
    state.runId.padEnd(24),
    state.kind.padEnd(8),
    STATUS_COLORS[state.status](state.status.padEnd(12)),
    `${completed}/${items.length} completed`,
  ].join(' ');
}

async function showRun(stateDir: string, runId: string): Promise<void> {
  const state = await new StateStore(stateDir).load(runId);
  const plan = await new PlanStore(stateDir).load(runId);

  if (plan) {
    console.log(formatSummary(summarize(state, plan)));
  } else {
    console.log(statusLine(state));
  }

  const lock = await new LockManager(stateDir).read(runId);
  if (lock) {
    const owner = `process ${lock.pid} on ${lock.hostname} since ${lock.acquiredAt}`;
    console.log(isProcessAlive(lock.pid) ? chalk.blue(`Locked by ${owner}`) : chalk.gray(`Stale lock from ${owner}`));
  }
}

async function listRuns(stateDir: string): Promise<void> {
  const store = new StateStore(stateDir);
  const runIds = await store.list();

  if (runIds.length === 0) {
    console.log(chalk.gray(`No runs in ${stateDir}`));
    return;
  }

  for (const runId of runIds) {
    try {
      console.log(statusLine(await store.load(runId)));
    } catch (err) {
      if (!(err instanceof ConductorError)) throw err;
      console.log(`${runId.padEnd(24)} ${chalk.red(err.message)}`);
    }
  }
}

/**
 * Show one run in detail, or list every run in the state directory.
 */
export async function statusCommand(runId: string | undefined, _options: object, command: Command): Promise<void> {
  const context = await loadContext(command.optsWithGlobals<GlobalOptions>());
  if (runId) {
    await showRun(context.stateDir, runId);
  } else {
    await listRuns(context.stateDir);
  }
}
