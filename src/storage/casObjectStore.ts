import { createHash } from "crypto";
import { createReadStream, createWriteStream, promises as fs } from "fs";
import path from "path";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import { ContentStoreError, isNotFoundError, throwIfAborted } from "../core/errors.js";
import { newStagingId } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import { normalizeHash } from "../core/manifest.js";
import { hashFile } from "../hashing/contentHasher.js";
import { isValidHash, type StorageLayout } from "./storageLayout.js";

export interface PutObjectResult {
  hash: string;
  sizeBytes: number;
  path: string;
  deduplicated: boolean;
}

export interface PutObjectOptions {
  expectedHash?: string;
  expectedSize?: number;
  signal?: AbortSignal;
}

export class CasObjectStore {
  private readonly logger: Logger;

  constructor(
    private readonly layout: StorageLayout,
    logger: Logger,
    private readonly opts: { verifyIntegrity: boolean; hashChunkBytes: number }
  ) {
    this.logger = logger.child({ component: "cas-object-store" });
  }

  async init(): Promise<void> {
    await fs.mkdir(this.layout.objectsDir, { recursive: true });
    await fs.mkdir(this.layout.stagingDir, { recursive: true });
  }

  objectPath(hash: string): string {
    return this.layout.objectPath(hash);
  }

  async has(hash: string): Promise<boolean> {
    if (!isValidHash(hash)) return false;
    try {
      const st = await fs.stat(this.objectPath(hash));
      return st.isFile();
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  async sizeOf(hash: string): Promise<number | null> {
    try {
      return (await fs.stat(this.objectPath(hash))).size;
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
  }

  /**
   * Streams `sourcePath` into the store. The bytes land in a staging file
   * first and are renamed into place only after the digest is known, so a
   * partially written object is never visible under its hash.
   */
  async putFromLocalPath(sourcePath: string, opts: PutObjectOptions = {}): Promise<PutObjectResult> {
    await this.init();
    throwIfAborted(opts.signal, "store object");

    const expectedHash = opts.expectedHash ? normalizeHash(opts.expectedHash) : null;
    if (expectedHash !== null && !isValidHash(expectedHash)) {
      throw new ContentStoreError(`declared hash is not a sha256 hex digest: ${opts.expectedHash ?? ""}`);
    }

    // Fast path: the declared object is already present, nothing to copy.
    if (expectedHash !== null && (await this.has(expectedHash))) {
      const st = await fs.stat(sourcePath);
      if (opts.expectedSize !== undefined && opts.expectedSize > 0 && st.size !== opts.expectedSize) {
        throw new ContentStoreError(`size mismatch for ${sourcePath} (expected ${opts.expectedSize}, got ${st.size})`);
      }
      const { hash } = await hashFile(sourcePath, { chunkBytes: this.opts.hashChunkBytes, signal: opts.signal });
      if (hash !== expectedHash) {
        throw new ContentStoreError(`hash mismatch for ${sourcePath} (expected ${expectedHash}, got ${hash})`);
      }
      this.logger.debug({ hash }, "object already stored");
      return { hash, sizeBytes: st.size, path: this.objectPath(hash), deduplicated: true };
    }

    const stagingPath = path.join(this.layout.stagingDir, `${newStagingId()}.partial`);
    const hash = createHash("sha256");
    let total = 0;

    const digester = new Transform({
      transform(chunk: Buffer, _enc, cb) {
        total += chunk.byteLength;
        hash.update(chunk);
        cb(null, chunk);
      }
    });

    try {
      await pipeline(
        createReadStream(sourcePath, { highWaterMark: this.opts.hashChunkBytes }),
        digester,
        createWriteStream(stagingPath),
        { signal: opts.signal }
      );

      const actual = hash.digest("hex");
      if (expectedHash !== null && actual !== expectedHash) {
        throw new ContentStoreError(`hash mismatch for ${sourcePath} (expected ${expectedHash}, got ${actual})`);
      }
      if (opts.expectedSize !== undefined && opts.expectedSize > 0 && total !== opts.expectedSize) {
        throw new ContentStoreError(`size mismatch for ${sourcePath} (expected ${opts.expectedSize}, got ${total})`);
      }

      const objectPath = this.objectPath(actual);
      if (await this.has(actual)) {
        this.logger.debug({ hash: actual }, "object already stored");
        return { hash: actual, sizeBytes: total, path: objectPath, deduplicated: true };
      }

      await fs.mkdir(path.dirname(objectPath), { recursive: true });
      // Identical bytes under an identical name: a concurrent writer winning the rename is harmless.
      await fs.rename(stagingPath, objectPath);

      if (this.opts.verifyIntegrity) {
        const verified = await hashFile(objectPath, { chunkBytes: this.opts.hashChunkBytes });
        if (verified.hash !== actual) {
          await fs.rm(objectPath, { force: true });
          throw new ContentStoreError(`integrity check failed for object ${actual} (read back ${verified.hash})`);
        }
      }

      this.logger.debug({ hash: actual, sizeBytes: total }, "stored object");
      return { hash: actual, sizeBytes: total, path: objectPath, deduplicated: false };
    } finally {
      await fs.rm(stagingPath, { force: true });
    }
  }

  async listHashes(): Promise<string[]> {
    let shards: string[];
    try {
      shards = await fs.readdir(this.layout.objectsDir);
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw err;
    }

    const out: string[] = [];
    for (const shard of shards.sort()) {
      if (!/^[0-9a-f]{2}$/.test(shard)) continue;
      const names = await fs.readdir(path.join(this.layout.objectsDir, shard));
      for (const name of names.sort()) {
        if (isValidHash(name) && name.startsWith(shard)) out.push(name);
      }
    }
    return out;
  }

  async totalBytes(): Promise<number> {
    let total = 0;
    for (const h of await this.listHashes()) total += (await this.sizeOf(h)) ?? 0;
    return total;
  }

  /** Returns false when the object was already gone. */
  async delete(hash: string): Promise<boolean> {
    const objectPath = this.objectPath(hash);
    try {
      await fs.unlink(objectPath);
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
    return true;
  }

  async verify(hash: string, signal?: AbortSignal): Promise<boolean> {
    const { hash: actual } = await hashFile(this.objectPath(hash), { chunkBytes: this.opts.hashChunkBytes, signal });
    return actual === normalizeHash(hash);
  }

  async materializeToPath(hash: string, destPath: string): Promise<void> {
    await fs.mkdir(path.dirname(destPath), { recursive: true });
    await fs.copyFile(this.objectPath(hash), destPath);
  }
}
