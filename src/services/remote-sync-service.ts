/**
 * Remote storage access through rclone.
 *
 * The worker never talks to a cloud provider directly: every transfer is an
 * `rclone` invocation against remotes defined in the rclone configuration
 * file, which also holds the credentials.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { runCommand, formatCommand, describeExit } from "../lib/command.js";
import type { CommandResult, CommandRunner } from "../lib/command.js";
import { RemoteSyncError, errorMessage } from "../lib/errors.js";
import { createComponentLogger } from "../lib/logger.js";
import type { RemoteLocation, SyncConfig } from "../types/index.js";

const logger = createComponentLogger("remote-sync");

/**
 * Capabilities the batch needs from remote storage.
 */
export interface RemoteSync {
  /** Copy a remote file to `localPath`, overwriting it */
  fetch(remote: RemoteLocation, localPath: string): Promise<string>;
  /** Copy a local file to `remote`, overwriting it */
  push(localPath: string, remote: RemoteLocation): Promise<void>;
  /** Whether a remote file is listed; false when the listing fails */
  exists(remote: RemoteLocation): Promise<boolean>;
}

/**
 * Flags for uploads. SharePoint rewrites Office documents on upload, so the
 * stored size and hash never match the local file.
 */
const UPLOAD_FLAGS = ["--ignore-checksum", "--ignore-size"] as const;

/**
 * Append a file name to a remote folder location.
 *
 * @example joinRemotePath("sharepoint:files", "a.docx") === "sharepoint:files/a.docx"
 * @example joinRemotePath("sharepoint:", "a.docx") === "sharepoint:a.docx"
 */
export function joinRemotePath(folder: RemoteLocation, fileName: string): RemoteLocation {
  if (folder.endsWith(":") || folder.endsWith("/")) {
    return `${folder}${fileName}`;
  }
  return `${folder}/${fileName}`;
}

/**
 * Last path segment of a remote location.
 */
export function remoteBaseName(remote: RemoteLocation): string {
  const colon = remote.indexOf(":");
  return path.posix.basename(colon >= 0 ? remote.slice(colon + 1) : remote);
}

export class RcloneRemoteSync implements RemoteSync {
  private readonly run: CommandRunner;

  constructor(
    private readonly config: SyncConfig,
    runner: CommandRunner = runCommand
  ) {
    this.run = runner;
  }

  async fetch(remote: RemoteLocation, localPath: string): Promise<string> {
    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await this.invoke("fetch", ["copyto", remote, localPath]);

    try {
      await fs.access(localPath);
    } catch (error) {
      throw new RemoteSyncError(
        `Fetched ${remote} but ${localPath} does not exist`,
        "",
        0,
        { cause: error }
      );
    }

    logger.info({ msg: "Fetched remote file", remote, localPath });
    return localPath;
  }

  async push(localPath: string, remote: RemoteLocation): Promise<void> {
    await this.invoke("push", ["copyto", localPath, remote, ...UPLOAD_FLAGS]);
    logger.info({ msg: "Uploaded file", localPath, remote });
  }

  async exists(remote: RemoteLocation): Promise<boolean> {
    let result: CommandResult;
    try {
      result = await this.exec(["lsf", remote]);
    } catch (error) {
      logger.warn({ msg: "Could not list remote file", remote, err: error });
      return false;
    }
    return result.exitCode === 0 && result.stdout.trim().length > 0;
  }

  private exec(args: string[]): Promise<CommandResult> {
    const fullArgs = this.config.configFile ? ["--config", this.config.configFile, ...args] : args;
    logger.debug({ msg: "Running sync command", command: formatCommand(this.config.binary, fullArgs) });
    return this.run(this.config.binary, fullArgs, { timeoutMs: this.config.timeoutMs });
  }

  /**
   * Run an rclone command and turn every failure into a RemoteSyncError.
   */
  private async invoke(operation: string, args: string[]): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.exec(args);
    } catch (error) {
      throw new RemoteSyncError(
        `${operation} failed: could not start ${this.config.binary}: ${errorMessage(error)}`,
        "",
        null,
        { cause: error }
      );
    }

    if (result.timedOut) {
      throw new RemoteSyncError(
        `${operation} timed out after ${this.config.timeoutMs}ms`,
        result.stderr,
        result.exitCode
      );
    }

    if (result.exitCode !== 0) {
      throw new RemoteSyncError(
        `${operation} failed with ${describeExit(result)}: ${result.stderr.trim()}`,
        result.stderr,
        result.exitCode
      );
    }

    return result;
  }
}
