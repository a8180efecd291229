/**
 * Graceful Shutdown Utilities
 *
 * Stops the scheduler on SIGTERM/SIGINT, waits for an in-flight batch to
 * finish, and force-exits when that takes longer than the timeout.
 */

import logger from "./logger.js";

/** Options for creating a graceful shutdown handler. */
export interface ShutdownOptions {
  /** Human-readable name for log messages */
  processName: string;
  /** Maximum time in ms to wait before force-exiting */
  timeoutMs: number;
  /** Async cleanup steps to run during shutdown */
  cleanup: () => Promise<void>;
  /** Override for process.exit, used in tests */
  exit?: (code: number) => void;
}

/**
 * Creates a shutdown handler with timeout and double-shutdown protection.
 *
 * @returns A function to call with the received signal name
 */
export function createShutdownHandler(options: ShutdownOptions): (signal: string) => Promise<void> {
  const { processName, timeoutMs, cleanup, exit = (code: number) => process.exit(code) } = options;

  let isShuttingDown = false;

  return async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
      logger.warn({ msg: `${processName} shutdown already in progress, ignoring`, signal });
      return;
    }
    isShuttingDown = true;

    logger.info({ msg: `${processName} graceful shutdown initiated`, signal, timeoutMs });

    // unref() so the timer alone does not keep the event loop alive
    const forceTimer = setTimeout(() => {
      logger.warn({ msg: `${processName} shutdown timeout expired, forcing exit`, timeoutMs });
      exit(1);
    }, timeoutMs);
    forceTimer.unref();

    try {
      await cleanup();
      logger.info({ msg: `${processName} graceful shutdown complete` });
      clearTimeout(forceTimer);
      exit(0);
    } catch (error) {
      logger.error({ err: error, msg: `Error during ${processName} shutdown` });
      clearTimeout(forceTimer);
      exit(1);
    }
  };
}

/**
 * Routes the given process signals to a shutdown handler.
 *
 * @returns A function removing the installed listeners
 */
export function registerShutdownSignals(
  shutdown: (signal: string) => Promise<void>,
  signals: readonly NodeJS.Signals[] = ["SIGTERM", "SIGINT"]
): () => void {
  const listeners = signals.map((signal) => {
    const listener = () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error, msg: "Shutdown handler failed", signal });
      });
    };
    process.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
  };
}
