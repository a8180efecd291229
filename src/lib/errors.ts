/**
 * Error taxonomy for the document generation worker.
 *
 * Whole-batch failures (a fetch or a parse) abort the current batch only.
 * Per-record failures (render, convert, upload) are recorded on the batch
 * report and the batch moves on to the next record.
 */

/** Stable machine-readable codes carried by every worker error. */
export type DocgenErrorCode =
  | "REMOTE_SYNC_FAILED"
  | "PARSE_FAILED"
  | "RENDER_FAILED"
  | "CONVERSION_FAILED"
  | "INVALID_CONFIG";

/**
 * Base class for all errors raised by the worker.
 */
export class DocgenError extends Error {
  readonly code: DocgenErrorCode;

  constructor(message: string, code: DocgenErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocgenError";
    this.code = code;
  }
}

/**
 * The external sync tool exited non-zero, timed out, or could not be started.
 */
export class RemoteSyncError extends DocgenError {
  constructor(
    message: string,
    public readonly stderr: string = "",
    public readonly exitCode: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, "REMOTE_SYNC_FAILED", options);
    this.name = "RemoteSyncError";
  }
}

/**
 * The spreadsheet could not be read as a workbook, or has no usable header.
 */
export class ParseError extends DocgenError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PARSE_FAILED", options);
    this.name = "ParseError";
  }
}

/**
 * The template is not a Word document or its tags are malformed.
 */
export class RenderError extends DocgenError {
  constructor(
    message: string,
    public readonly explanations: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, "RENDER_FAILED", options);
    this.name = "RenderError";
  }
}

/**
 * The external converter failed or produced no output file.
 */
export class ConversionError extends DocgenError {
  constructor(
    message: string,
    public readonly stderr: string = "",
    public readonly exitCode: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, "CONVERSION_FAILED", options);
    this.name = "ConversionError";
  }
}

/**
 * One or more environment variables failed validation.
 */
export class ConfigError extends DocgenError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/**
 * Extract a loggable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
