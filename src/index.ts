import "dotenv/config";
import { initSentry, flushSentry } from "./lib/sentry.js";

// Initialize Sentry before anything else so it can capture startup errors
initSentry();

import { loadConfig } from "./lib/config.js";
import { ConfigError } from "./lib/errors.js";
import { createShutdownHandler, registerShutdownSignals } from "./lib/graceful-shutdown.js";
import logger from "./lib/logger.js";
import { BatchRunner } from "./services/batch-service.js";
import { createConverter } from "./services/conversion-service.js";
import { RcloneRemoteSync } from "./services/remote-sync-service.js";
import { BatchScheduler } from "./services/scheduler.js";

/**
 * Document worker entry point.
 *
 * Loads the configuration from the environment, then either runs a single
 * batch (RUN_ONCE) and exits with its outcome, or keeps running batches every
 * INTERVAL_MINUTES until SIGTERM/SIGINT.
 */

/** Time allowed for an in-flight batch to finish after a shutdown signal. */
const SHUTDOWN_TIMEOUT_MS = 60_000;

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info({
    msg: "Document worker starting",
    environment: process.env.NODE_ENV || "production",
    intervalMs: config.intervalMs,
    spreadsheet: config.remotes.spreadsheet,
    template: config.remotes.template,
    output: config.remotes.output,
    convertTo: config.conversion?.targetFormat ?? null,
    runOnce: config.runOnce,
  });

  const sync = new RcloneRemoteSync(config.sync);
  const converter = config.conversion
    ? createConverter(config.conversion, { timeoutMs: config.sync.timeoutMs })
    : null;
  const batchRunner = new BatchRunner({ config, sync, converter });

  if (config.runOnce) {
    const report = await batchRunner.run();
    await flushSentry();
    process.exitCode = report.status === "completed" ? 0 : 1;
    return;
  }

  const scheduler = new BatchScheduler({
    intervalMs: config.intervalMs,
    runBatch: () => batchRunner.run(),
  });

  const shutdown = createShutdownHandler({
    processName: "Document worker",
    timeoutMs: SHUTDOWN_TIMEOUT_MS,
    cleanup: async () => {
      logger.info("Stopping scheduler...");
      await scheduler.stop();
      await flushSentry();
    },
  });
  registerShutdownSignals(shutdown);

  await scheduler.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal({ msg: "Invalid configuration", issues: error.issues });
  } else {
    logger.fatal({ err: error, msg: "Document worker failed" });
  }
  process.exit(1);
});
