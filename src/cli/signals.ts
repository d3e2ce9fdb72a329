import type { ShutdownSignal } from '../orchestrator/shutdown.js';
import { EXIT_INTERRUPTED } from '../orchestrator/report.js';
import { errorMessage } from '../errors/errors.js';
import { killActiveSubprocesses } from '../utils/subprocess-handler.js';
import { logger } from '../utils/logger.js';

async function forceExit(): Promise<void> {
  try {
    await killActiveSubprocesses();
  } catch (err) {
    logger.error(`Failed to kill agent processes: ${errorMessage(err)}`);
  }
  process.exit(EXIT_INTERRUPTED);
}

/**
 * First SIGINT/SIGTERM requests a graceful stop at the next wave boundary;
 * a second one kills every running agent and exits. Returns a function that
 * removes the handlers.
 */
export function setupSignalHandlers(shutdown: ShutdownSignal): () => void {
  let isShuttingDown = false;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, killing agent processes...');
      void forceExit();
      return;
    }

    isShuttingDown = true;
    logger.warn(`Received ${signal}: letting in-flight items finish, then stopping (repeat to force)`);
    shutdown.request(signal);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}
