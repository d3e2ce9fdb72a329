/**
 * Pieces every command uses: config/log setup, option parsing, progress
 * output and the common run-and-report path.
 */

import { join, resolve } from 'node:path';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { ConfigLoader } from '../config/loader.js';
import type { ConductorConfig } from '../config/schema.js';
import { errorKindLabel } from '../errors/classifier.js';
import { ConductorError } from '../errors/errors.js';
import type { DriverEvent, RunDriver } from '../orchestrator/driver.js';
import { exitCodeFor, formatSummary } from '../orchestrator/report.js';
import type { SchedulerSettings } from '../orchestrator/scheduler.js';
import type { RunSummary } from '../types.js';
import { AgentCommandUnit } from '../work/agent-command.js';
import { initCrashLogger, setupCrashHandlers } from '../utils/crash-logger.js';
import { configureLogDirectory } from '../utils/logger.js';
import { isSafeId, SAFE_ID_RULE } from '../utils/ids.js';
import { setupSignalHandlers } from './signals.js';

// A type alias, not an interface: commander's optsWithGlobals<T> needs an index-compatible type
export type GlobalOptions = {
  config?: string;
  stateDir?: string;
};

export interface CliContext {
  configDir: string;
  config: ConductorConfig;
  stateDir: string;
  logDir: string;
}

export async function loadContext(options: GlobalOptions): Promise<CliContext> {
  const configDir = resolve(options.config ?? process.cwd());
  const config = await new ConfigLoader(configDir).load();
  const stateDir = resolve(configDir, options.stateDir ?? config.stateDir);
  const logDir = config.logDirectory ? resolve(configDir, config.logDirectory) : join(stateDir, 'logs');

  configureLogDirectory(logDir);
  initCrashLogger(logDir);
  setupCrashHandlers();

  return { configDir, config, stateDir, logDir };
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function parseRunId(value: string): string {
  if (!isSafeId(value)) {
    throw new InvalidArgumentError(`Run id ${SAFE_ID_RULE}.`);
  }
  return value;
}

/**
 * Wrap a command action so setup errors print in red and set the exit code
 * instead of surfacing as a stack trace.
 */
export function withErrorHandling<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      if (err instanceof ConductorError) {
        console.error(chalk.red(`Error: ${err.message}`));
        process.exitCode = err.exitCode;
        return;
      }
      throw err;
    }
  };
}

export function describeEvent(event: DriverEvent, prefix = ''): string | undefined {
  const p = prefix ? chalk.gray(`[${prefix}] `) : '';
  switch (event.type) {
    case 'wave:start':
      return p + chalk.cyan.bold(`Wave ${event.wave}: ${event.items.map((id) => `#${id}`).join(', ')}`);
    case 'wave:retry':
      return p + chalk.yellow(`Wave ${event.wave}: retrying ${event.items.length} item(s) in ${Math.round(event.delayMs / 1000)}s`);
    case 'item:start':
      return p + chalk.blue(`  ▶ #${event.itemId} (attempt ${event.attempt})`);
    case 'item:completed':
      return p + chalk.green(`  ✓ #${event.itemId}${event.artifact ? ` ${event.artifact}` : ''}`);
    case 'item:failed':
      return p + chalk.yellow(`  ✗ #${event.itemId} ${errorKindLabel(event.kind)}${event.willRetry ? ', will retry' : ''}`);
    case 'item:fatal':
      return p + chalk.red(`  ✗ #${event.itemId} ${errorKindLabel(event.kind)} (fatal)`);
    case 'wave:end':
      return undefined;
    case 'run:status':
      return p + chalk.gray(`Run ${event.runId}: ${event.status}`);
  }
}

export function printProgress(driver: RunDriver, prefix = ''): void {
  driver.on('event', (event: DriverEvent) => {
    const line = describeEvent(event, prefix);
    if (line) console.log(line);
  });
}

export function printSummary(summary: RunSummary): void {
  const color = summary.status === 'completed' && summary.counts.failed === 0 ? chalk.green : chalk.yellow;
  console.log('');
  console.log(color(formatSummary(summary)));
}

/** Run a driver with signal handling, print its summary and set the exit code. */
export async function runToCompletion(driver: RunDriver): Promise<RunSummary> {
  const removeHandlers = setupSignalHandlers(driver.shutdown);
  try {
    const summary = await driver.run();
    printSummary(summary);
    process.exitCode = exitCodeFor(summary);
    return summary;
  } finally {
    removeHandlers();
  }
}

export interface SchedulingFlags {
  maxParallel?: number;
  maxRetries?: number;
  timeout?: number;
}

/** Epic-level scheduler settings: config file, overridden by flags. */
export function epicSettings(config: ConductorConfig, flags: SchedulingFlags): SchedulerSettings {
  return {
    maxParallel: flags.maxParallel ?? config.maxParallel,
    maxRetries: flags.maxRetries ?? config.maxRetries,
    itemTimeoutMs: flags.timeout ?? config.itemTimeoutMs,
    backoff: config.backoff,
  };
}

export function agentUnit(context: CliContext, runId: string): AgentCommandUnit {
  return new AgentCommandUnit({ agent: context.config.agent, logDir: join(context.logDir, runId) });
}
