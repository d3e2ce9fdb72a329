/**
 * Subprocess Handler - agent process execution with isolation and error handling
 *
 * - Never rejects: failures come back as a result with the captured output
 * - Cancellation via AbortSignal (the executor's per-item timeout)
 * - Interleaved stdout/stderr capture, tail-bounded
 * - Registry of live child pids for the forced-kill path on a second interrupt
 */

import { execa } from 'execa';
import { logCrash } from './crash-logger.js';
import { killProcessTree } from './process.js';
import { logger } from './logger.js';

const MAX_OUTPUT_CHARS = 200_000;

export interface SubprocessOptions {
  // Working directory
  cwd?: string;

  // Extra environment variables
  env?: Record<string, string>;

  // Aborting kills the subprocess
  signal?: AbortSignal;

  // Hard timeout enforced by execa (ms, 0 = none)
  timeout?: number;
}

export interface SubprocessResult {
  success: boolean;
  exitCode: number | null;
  output: string;
  timedOut: boolean;
  canceled: boolean;
  signal?: string;
}

const activePids = new Set<number>();

const CRASH_PATTERN = /Abort trap|Segmentation fault|SIGABRT|SIGSEGV/;

function tail(text: string): string {
  return text.length > MAX_OUTPUT_CHARS ? text.slice(-MAX_OUTPUT_CHARS) : text;
}

/**
 * Execute a subprocess and capture its combined output.
 */
export async function executeSubprocess(
  command: string,
  args: string[] = [],
  options: SubprocessOptions = {}
): Promise<SubprocessResult> {
  const startTime = Date.now();

  const child = execa(command, args, {
    cwd: options.cwd,
    env: options.env,
    cancelSignal: options.signal,
    timeout: options.timeout || undefined,
    all: true,
    reject: false,
    stdin: 'ignore',
  });

  if (child.pid !== undefined) activePids.add(child.pid);

  try {
    const result = await child;
    const output = tail(result.all ?? '');
    const durationMs = Date.now() - startTime;

    if (result.signal && CRASH_PATTERN.test(`${result.signal} ${output.slice(-2000)}`)) {
      logCrash('SUBPROCESS CRASH DETECTED', {
        command,
        signal: result.signal,
        duration: `${durationMs}ms`,
      });
    }

    if (result.failed) {
      logger.debug('Subprocess failed', {
        command,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        canceled: result.isCanceled,
        signal: result.signal,
        duration: `${durationMs}ms`,
      });
    }

    return {
      success: !result.failed,
      exitCode: result.exitCode ?? null,
      output,
      timedOut: result.timedOut,
      canceled: result.isCanceled,
      signal: result.signal,
    };
  } finally {
    if (child.pid !== undefined) activePids.delete(child.pid);
  }
}

/** Pids of agent processes currently running. */
export function activeSubprocessPids(): number[] {
  return Array.from(activePids);
}

/**
 * Kill every tracked subprocess tree. Used when the operator interrupts a
 * second time and in-flight work must not be waited for.
 */
export async function killActiveSubprocesses(): Promise<void> {
  const pids = activeSubprocessPids();
  await Promise.allSettled(pids.map((pid) => killProcessTree(pid)));
  activePids.clear();
}
