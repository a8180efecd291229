/**
 * In-memory stand-in for rclone remotes. Remote locations map to file
 * contents; fetch and push copy bytes between the map and the local disk.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { RemoteSyncError } from "../../lib/errors.js";
import type { RemoteSync } from "../../services/remote-sync-service.js";
import type { RemoteLocation } from "../../types/index.js";

export class FakeRemoteSync implements RemoteSync {
  readonly files = new Map<RemoteLocation, Buffer>();
  readonly pushed: RemoteLocation[] = [];
  /** Pushes to these locations fail */
  readonly failingPushes = new Set<RemoteLocation>();
  /** Pushes to these locations succeed but are never listed */
  readonly unlisted = new Set<RemoteLocation>();

  async fetch(remote: RemoteLocation, localPath: string): Promise<string> {
    const content = this.files.get(remote);
    if (!content) {
      throw new RemoteSyncError(`fetch failed with exit code 3: ${remote}: not found`, "not found", 3);
    }
    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await fs.writeFile(localPath, content);
    return localPath;
  }

  async push(localPath: string, remote: RemoteLocation): Promise<void> {
    if (this.failingPushes.has(remote)) {
      throw new RemoteSyncError(`push failed with exit code 1: ${remote}: access denied`, "access denied", 1);
    }
    const content = await fs.readFile(localPath);
    if (!this.unlisted.has(remote)) {
      this.files.set(remote, content);
    }
    this.pushed.push(remote);
  }

  async exists(remote: RemoteLocation): Promise<boolean> {
    return this.files.has(remote);
  }
}
