/**
 * Crash Logger - synchronous crash logging that bypasses buffered loggers
 *
 * Writes go straight to a file descriptor with fs.writeSync, so the entry is
 * on disk even when the process dies right after. winston's file transports
 * buffer and may lose the last lines of a crashing process.
 */

import { writeSync, openSync, closeSync, mkdirSync } from 'fs';
import { join } from 'path';

let crashLogFile: number | null = null;
let handlersInstalled = false;

/**
 * Open `<logDir>/crash.log` for appending.
 */
export function initCrashLogger(logDir: string): void {
  mkdirSync(logDir, { recursive: true });
  const crashLogPath = join(logDir, 'crash.log');
  closeCrashLogger();

  try {
    crashLogFile = openSync(crashLogPath, 'a');
  } catch (err) {
    // If we can't open crash log, at least write to stderr
    console.error('[CRASH LOGGER] Failed to open crash log:', err);
  }
}

/**
 * Write a crash log entry synchronously.
 */
export function logCrash(message: string, metadata?: Record<string, unknown>): void {
  const logEntry = `[${new Date().toISOString()}] ${message}\n`;

  console.error(logEntry.trimEnd());

  if (crashLogFile !== null) {
    try {
      writeSync(crashLogFile, logEntry);
      if (metadata && Object.keys(metadata).length > 0) {
        writeSync(crashLogFile, `  Metadata: ${JSON.stringify(metadata)}\n`);
      }
    } catch (err) {
      console.error('[CRASH LOGGER] Failed to write to crash log:', err);
    }
  }
}

export function closeCrashLogger(): void {
  if (crashLogFile !== null) {
    try {
      closeSync(crashLogFile);
    } catch (err) {
      console.error('[CRASH LOGGER] Failed to close crash log:', err);
    }
    crashLogFile = null;
  }
}

/**
 * Record uncaught exceptions and unhandled rejections, then exit non-zero.
 * Safe to call more than once.
 */
export function setupCrashHandlers(): void {
  if (handlersInstalled) return;
  handlersInstalled = true;

  process.on('uncaughtException', (error: Error) => {
    logCrash('UNCAUGHT EXCEPTION', {
      name: error.name,
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'),
    });
    closeCrashLogger();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logCrash('UNHANDLED REJECTION', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack?.split('\n').slice(0, 5).join('\n') : undefined,
    });
    closeCrashLogger();
    process.exit(1);
  });

  process.on('exit', (code) => {
    if (code !== 0 && crashLogFile !== null) {
      writeSync(crashLogFile, `[${new Date().toISOString()}] exit code ${code}\n`);
    }
    closeCrashLogger();
  });
}
