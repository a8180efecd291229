/**
 * Structured Logger Module
 *
 * Pino-based JSON logger shared by every part of the worker.
 *
 * Usage:
 * - Import the default logger for module-level logging
 * - Use `createBatchLogger` in the batch runner for per-batch child loggers
 * - Use `createComponentLogger` for long-lived services (sync, scheduler, …)
 *
 * Environment variables:
 * - `LOG_LEVEL`: Minimum log level (default: "info")
 * - `NODE_ENV`: When "development", enables pretty-printing via pino-pretty
 */

import pino from "pino";
import { randomUUID } from "node:crypto";

/**
 * In development, use pino-pretty for human-readable output.
 * Everywhere else, output raw JSON for the container's log collector.
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV === "development") {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/**
 * Root Pino logger instance.
 */
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: getTransport(),
  base: {
    service: "sheet-docgen-worker",
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});

/**
 * Creates a child logger scoped to one batch run.
 *
 * @param batchId - Identifier of the batch, see {@link generateBatchId}
 */
export function createBatchLogger(batchId: string): pino.Logger {
  return logger.child({ batchId });
}

/**
 * Creates a child logger tagged with a component name.
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

/**
 * Generates a new UUID v4 batch identifier.
 */
export function generateBatchId(): string {
  return randomUUID();
}

export default logger;
