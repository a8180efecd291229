/**
 * Sentry Error Tracking Module
 *
 * Reports aborted batches and unexpected worker errors to Sentry. If the
 * `SENTRY_DSN` environment variable is not set, every function here is a
 * no-op and the worker only logs.
 *
 * Environment variables:
 * - `SENTRY_DSN`: Sentry Data Source Name (required to enable tracking)
 * - `NODE_ENV`: Used as the Sentry environment tag
 * - `npm_package_version`: Used as the Sentry release tag
 */

import * as Sentry from "@sentry/node";

/** Whether Sentry has been successfully initialized */
let initialized = false;

/**
 * Initializes the Sentry SDK.
 *
 * Call as early as possible, before configuration is loaded, so startup
 * errors are captured as well.
 *
 * @param options - Optional overrides for Sentry configuration
 * @param options.dsn - Sentry DSN (defaults to SENTRY_DSN env var)
 * @param options.environment - Environment name (defaults to NODE_ENV)
 * @param options.release - Release version (defaults to npm_package_version)
 */
export function initSentry(options?: {
  dsn?: string;
  environment?: string;
  release?: string;
}): void {
  const dsn = options?.dsn ?? process.env.SENTRY_DSN;

  if (!dsn) {
    return;
  }

  Sentry.init({
    dsn,
    environment: options?.environment ?? process.env.NODE_ENV ?? "production",
    release: options?.release ?? process.env.npm_package_version ?? "unknown",
    tracesSampleRate: 0,
  });

  initialized = true;
}

export function isSentryInitialized(): boolean {
  return initialized;
}

/**
 * Captures an exception with optional tags and context.
 */
export function captureExceptionWithContext(
  error: unknown,
  context?: {
    tags?: Record<string, string>;
    metadata?: Record<string, unknown>;
  },
): void {
  if (!initialized) {
    return;
  }

  Sentry.withScope((scope) => {
    for (const [key, value] of Object.entries(context?.tags ?? {})) {
      scope.setTag(key, value);
    }
    if (context?.metadata) {
      scope.setContext("metadata", context.metadata);
    }
    Sentry.captureException(error);
  });
}

/**
 * Reports an aborted batch with its id and abort reason.
 *
 * @param error - The error that aborted the batch
 * @param batchContext.batchId - Batch identifier from the logs
 * @param batchContext.stage - Step that failed (e.g. "fetch", "parse")
 */
export function captureBatchFailure(
  error: unknown,
  batchContext: {
    batchId: string;
    stage: string;
    metadata?: Record<string, unknown>;
  },
): void {
  if (!initialized) {
    return;
  }

  Sentry.withScope((scope) => {
    scope.setTag("batchId", batchContext.batchId);
    scope.setTag("stage", batchContext.stage);
    scope.setContext("batch", {
      batchId: batchContext.batchId,
      stage: batchContext.stage,
      ...batchContext.metadata,
    });

    Sentry.captureException(error);
  });
}

/**
 * Flushes pending events before the process exits.
 *
 * @param timeoutMs - Maximum time to wait for the transport
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!initialized) {
    return;
  }
  await Sentry.close(timeoutMs);
}
