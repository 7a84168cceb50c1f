import { promises as fs } from "fs";
import lockfile from "proper-lockfile";
import type { ManifestId } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import type { StorageLayout } from "./storageLayout.js";

export interface ManifestLockOptions {
  staleMs: number;
  retries: number;
}

/**
 * Per-manifest mutual exclusion. Lock directories live under `locks/` so the
 * guarantee also holds between processes sharing one storage root.
 */
export class ManifestLocks {
  private readonly logger: Logger;

  constructor(
    private readonly layout: StorageLayout,
    logger: Logger,
    private readonly opts: ManifestLockOptions
  ) {
    this.logger = logger.child({ component: "manifest-locks" });
  }

  async withLock<T>(id: ManifestId, fn: () => Promise<T>): Promise<T> {
    await fs.mkdir(this.layout.locksDir, { recursive: true });
    const lockPath = this.layout.lockPath(id);
    const release = await lockfile.lock(lockPath, {
      realpath: false,
      lockfilePath: lockPath,
      stale: this.opts.staleMs,
      retries: { retries: this.opts.retries, minTimeout: 25, maxTimeout: 200, factor: 1.5 },
      onCompromised: (err) => {
        this.logger.warn({ err, manifestId: id }, "manifest lock compromised");
      }
    });

    try {
      return await fn();
    } finally {
      try {
        await release();
      } catch (err) {
        this.logger.warn({ err, manifestId: id }, "failed to release manifest lock");
      }
    }
  }
}
