/**
 * External command execution.
 *
 * Every remote transfer and every format conversion goes through an external
 * binary. Services receive a {@link CommandRunner} so tests can substitute a
 * fake without spawning anything.
 */

import { execFile } from "node:child_process";

/** Outcome of a process that was started. */
export interface CommandResult {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: string | null;
  /** True when the process was killed because `timeoutMs` elapsed */
  timedOut: boolean;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Kill the process after this many milliseconds; 0 or absent means never */
  timeoutMs?: number;
}

/**
 * Runs `file` with `args` and captures its output.
 *
 * Resolves for every process that ran, whatever its exit code. Rejects only
 * when the binary could not be started.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/** Output above this size is treated as a failure by Node. */
const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export const runCommand: CommandRunner = (file, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    execFile(
      file,
      [...args],
      {
        encoding: "utf8",
        timeout: options.timeoutMs ?? 0,
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, signal: null, timedOut: false, stdout, stderr });
          return;
        }

        // The process ran but printed more than we keep; Node killed it
        if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
          resolve({
            exitCode: null,
            signal: null,
            timedOut: false,
            stdout,
            stderr: stderr ? `${stderr}\n${error.message}` : error.message,
          });
          return;
        }

        // Any other string code (ENOENT, EACCES, …) means the process never started
        if (typeof error.code === "string") {
          reject(error);
          return;
        }

        const signal = typeof error.signal === "string" ? error.signal : null;
        resolve({
          exitCode: typeof error.code === "number" ? error.code : null,
          signal,
          timedOut: error.killed === true && signal !== null && (options.timeoutMs ?? 0) > 0,
          stdout,
          stderr,
        });
      }
    );
  });

/**
 * Describes how a failed process ended, for error messages.
 */
export function describeExit(result: CommandResult): string {
  if (result.exitCode !== null) return `exit code ${result.exitCode}`;
  if (result.signal !== null) return `signal ${result.signal}`;
  return "no exit status";
}

/**
 * Renders a command line for debug logs.
 */
export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
