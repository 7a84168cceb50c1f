import { promises as fs } from "fs";
import path from "path";
import type { PoolConfig } from "../config/poolConfig.js";
import { ContentStoreError, isNotFoundError, ManifestRecordError, throwIfAborted } from "../core/errors.js";
import { newStagingId, type ManifestId } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import {
  contentAddressableFiles,
  isBaseContentType,
  referencedHashes,
  type ContentManifest,
  type ManifestFile
} from "../core/manifest.js";
import { describeError, failResult, okResult, type OperationResult } from "../core/result.js";
import { parseManifestJson, serializeManifest } from "../manifest/manifestSchema.js";
import { CasObjectStore } from "./casObjectStore.js";
import { InflightReferences } from "./inflightReferences.js";
import { ManifestLocks } from "./manifestLocks.js";
import { MANIFEST_FILE_SUFFIX, StorageLayout } from "./storageLayout.js";

export interface RemovalStats {
  removed: boolean;
  objectsDeleted: number;
  bytesFreed: number;
}

export interface StorageStats {
  manifestCount: number;
  objectCount: number;
  objectBytes: number;
}

export interface IntegrityReport {
  objectsChecked: number;
  corrupted: string[];
  missing: Array<{ manifestId: ManifestId; relativePath: string; hash: string }>;
  unreadableManifests: string[];
}

export interface GarbageCollectionResult {
  objectsDeleted: number;
  bytesFreed: number;
  dryRun: boolean;
}

interface ReferenceScan {
  references: Set<string>;
  unreadable: string[];
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (err) {
    if (isNotFoundError(err)) return false;
    throw err;
  }
}

function resolveInside(baseDir: string, relativePath: string): string {
  const joined = path.resolve(baseDir, relativePath);
  const rel = path.relative(baseDir, joined);
  if (rel.length === 0 || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new ContentStoreError(`unsafe relative path: ${relativePath}`, null, relativePath);
  }
  return joined;
}

export class ContentStorageService {
  readonly layout: StorageLayout;
  readonly objects: CasObjectStore;
  private readonly locks: ManifestLocks;
  private readonly inflight = new InflightReferences();
  private readonly logger: Logger;

  constructor(config: PoolConfig, logger: Logger) {
    this.layout = new StorageLayout(config.storageRoot);
    this.logger = logger.child({ component: "content-storage" });
    this.objects = new CasObjectStore(this.layout, logger, {
      verifyIntegrity: config.verifyIntegrity,
      hashChunkBytes: config.hashChunkBytes
    });
    this.locks = new ManifestLocks(this.layout, logger, {
      staleMs: config.lockStaleMs,
      retries: config.lockRetries
    });
  }

  async init(): Promise<void> {
    await fs.mkdir(this.layout.manifestsDir, { recursive: true });
    await fs.mkdir(this.layout.dataDir, { recursive: true });
    await this.objects.init();
  }

  getContentStorageRoot(): string {
    return this.layout.root;
  }

  getManifestStoragePath(id: ManifestId): string {
    return this.layout.manifestPath(id);
  }

  getContentDirectoryPath(id: ManifestId): string {
    return this.layout.contentDirectory(id);
  }

  async isContentStored(id: ManifestId): Promise<OperationResult<boolean>> {
    try {
      return okResult(await pathExists(this.layout.manifestPath(id)));
    } catch (err) {
      return failResult(`Failed to check storage for manifest ${id}: ${describeError(err)}`);
    }
  }

  /**
   * Stores every content-addressable file of `manifest` from `sourceDirectory`
   * and then writes the manifest record. The record is written last, so a
   * failure part way through never leaves a record pointing at missing content.
   */
  async storeContent(
    manifest: ContentManifest,
    sourceDirectory: string,
    opts: { signal?: AbortSignal } = {}
  ): Promise<OperationResult<ContentManifest>> {
    const sourceRoot = path.resolve(sourceDirectory);
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(sourceRoot)).isDirectory();
    } catch (err) {
      if (!isNotFoundError(err)) return failResult(`Cannot read source directory ${sourceRoot}: ${describeError(err)}`);
    }
    if (!isDirectory) return failResult(`Source directory does not exist: ${sourceRoot}`);

    const release = this.inflight.acquire(referencedHashes(manifest));
    try {
      return await this.locks.withLock(manifest.id, async () => {
        await this.init();
        const contentDir = this.layout.contentDirectory(manifest.id);
        const contentDirExisted = await pathExists(contentDir);

        try {
          this.logger.info({ manifestId: manifest.id, sourceDirectory: sourceRoot }, "storing content");
          const files = await this.storeFiles(manifest, sourceRoot, opts.signal);
          const stored: ContentManifest = { ...manifest, files };

          // Objects from the caller's declared hashes were registered up front;
          // hashes only known after storing are covered from here on.
          const releaseActual = this.inflight.acquire(referencedHashes(stored));
          try {
            await fs.mkdir(contentDir, { recursive: true });
            if (isBaseContentType(manifest.contentType)) {
              await this.writeAtomic(this.layout.sourcePathFile(manifest.id), sourceRoot);
            }
            await this.writeManifestRecord(stored);
          } finally {
            releaseActual();
          }

          this.logger.info(
            { manifestId: manifest.id, files: files.length, objects: referencedHashes(stored).size },
            "stored content"
          );
          return okResult(stored);
        } catch (err) {
          this.logger.error({ err, manifestId: manifest.id }, "failed to store content");
          if (!contentDirExisted) {
            await fs.rm(contentDir, { recursive: true, force: true }).catch((cleanupErr: unknown) => {
              this.logger.warn({ err: cleanupErr, manifestId: manifest.id }, "failed to clean up after storage failure");
            });
          }
          return failResult(`Storage failed: ${describeError(err)}`);
        }
      });
    } finally {
      release();
    }
  }

  private async storeFiles(manifest: ContentManifest, sourceRoot: string, signal?: AbortSignal): Promise<ManifestFile[]> {
    const out: ManifestFile[] = [];

    for (const file of manifest.files) {
      throwIfAborted(signal, `store content for ${manifest.id}`);

      if (file.sourceType !== "ContentAddressable") {
        out.push(file);
        continue;
      }

      const sourcePath = resolveInside(sourceRoot, file.relativePath);
      if (!(await pathExists(sourcePath))) {
        if (file.isRequired) {
          throw new ContentStoreError(`Required file not found: ${file.relativePath}`, manifest.id, file.relativePath);
        }
        this.logger.warn({ manifestId: manifest.id, relativePath: file.relativePath }, "optional file not found, skipping");
        continue;
      }

      try {
        const put = await this.objects.putFromLocalPath(sourcePath, {
          expectedHash: file.hash,
          expectedSize: file.size > 0 ? file.size : undefined,
          signal
        });
        this.logger.debug(
          { manifestId: manifest.id, relativePath: file.relativePath, hash: put.hash, deduplicated: put.deduplicated },
          "stored file"
        );
        out.push({ ...file, hash: put.hash, size: put.sizeBytes });
      } catch (err) {
        if (err instanceof ContentStoreError) {
          throw new ContentStoreError(`${file.relativePath}: ${err.message}`, manifest.id, file.relativePath);
        }
        throw err;
      }
    }

    return out;
  }

  private async writeAtomic(targetPath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tmpPath = `${targetPath}.${newStagingId()}.tmp`;
    try {
      await fs.writeFile(tmpPath, content, "utf8");
      await fs.rename(tmpPath, targetPath);
    } finally {
      await fs.rm(tmpPath, { force: true });
    }
  }

  /** Rewrites the record only; content is not touched. */
  async writeManifestRecord(manifest: ContentManifest): Promise<void> {
    await this.writeAtomic(this.layout.manifestPath(manifest.id), serializeManifest(manifest));
  }

  /** Metadata rewrite under the manifest's lock. */
  async updateManifestRecord(
    id: ManifestId,
    update: (current: ContentManifest | null) => ContentManifest | null | Promise<ContentManifest | null>
  ): Promise<ContentManifest | null> {
    return this.locks.withLock(id, async () => {
      const current = await this.readManifestRecord(id);
      const next = await update(current);
      if (next !== null && next !== current) await this.writeManifestRecord(next);
      return next;
    });
  }

  async readManifestRecord(id: ManifestId): Promise<ContentManifest | null> {
    const manifestPath = this.layout.manifestPath(id);
    let text: string;
    try {
      text = await fs.readFile(manifestPath, "utf8");
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }
    return parseManifestJson(text, manifestPath);
  }

  async listManifestRecordPaths(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.layout.manifestsDir);
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw err;
    }
    return names
      .filter((n) => n.endsWith(MANIFEST_FILE_SUFFIX))
      .sort()
      .map((n) => path.join(this.layout.manifestsDir, n));
  }

  async readManifestFile(filePath: string): Promise<ContentManifest> {
    const text = await fs.readFile(filePath, "utf8");
    return parseManifestJson(text, filePath);
  }

  private async scanReferences(signal?: AbortSignal): Promise<ReferenceScan> {
    const references = new Set<string>();
    const unreadable: string[] = [];
    for (const filePath of await this.listManifestRecordPaths()) {
      throwIfAborted(signal, "reference scan");
      try {
        const manifest = await this.readManifestFile(filePath);
        for (const h of referencedHashes(manifest)) references.add(h);
      } catch (err) {
        if (isNotFoundError(err)) continue;
        this.logger.warn({ err, manifestFile: filePath }, "unreadable manifest during reference scan");
        unreadable.push(filePath);
      }
    }
    return { references, unreadable };
  }

  /**
   * Removes the manifest record and content directory, then deletes the
   * objects it referenced that nothing else references any more. Removing an
   * absent manifest is a successful no-op.
   */
  async removeContent(id: ManifestId): Promise<OperationResult<RemovalStats>> {
    try {
      return await this.locks.withLock(id, async () => {
        const manifestPath = this.layout.manifestPath(id);
        const contentDir = this.layout.contentDirectory(id);

        let candidates = new Set<string>();
        let recordPresent = await pathExists(manifestPath);
        if (recordPresent) {
          try {
            const manifest = await this.readManifestFile(manifestPath);
            candidates = referencedHashes(manifest);
          } catch (err) {
            if (err instanceof ManifestRecordError) {
              this.logger.warn({ err, manifestId: id }, "removing unreadable manifest record; its objects are left for garbage collection");
            } else if (isNotFoundError(err)) {
              recordPresent = false;
            } else {
              throw err;
            }
          }
        }

        const contentDirPresent = await pathExists(contentDir);
        if (!recordPresent && !contentDirPresent) {
          this.logger.debug({ manifestId: id }, "nothing to remove");
          return okResult({ removed: false, objectsDeleted: 0, bytesFreed: 0 });
        }

        await fs.rm(manifestPath, { force: true });
        await fs.rm(contentDir, { recursive: true, force: true });

        let objectsDeleted = 0;
        let bytesFreed = 0;
        if (candidates.size > 0) {
          const scan = await this.scanReferences();
          if (scan.unreadable.length > 0) {
            this.logger.warn(
              { manifestId: id, unreadable: scan.unreadable.length },
              "skipping object cleanup: some manifests could not be read"
            );
          } else {
            for (const hash of candidates) {
              if (scan.references.has(hash) || this.inflight.has(hash)) continue;
              const size = (await this.objects.sizeOf(hash)) ?? 0;
              if (await this.objects.delete(hash)) {
                objectsDeleted++;
                bytesFreed += size;
              }
            }
          }
        }

        this.logger.info({ manifestId: id, objectsDeleted, bytesFreed }, "removed content");
        return okResult({ removed: true, objectsDeleted, bytesFreed });
      });
    } catch (err) {
      this.logger.error({ err, manifestId: id }, "failed to remove content");
      return failResult(`Removal failed: ${describeError(err)}`);
    }
  }

  /** Copies every stored content-addressable file of `id` under `targetDirectory`. */
  async retrieveContent(id: ManifestId, targetDirectory: string): Promise<OperationResult<string>> {
    try {
      const manifest = await this.readManifestRecord(id);
      if (!manifest) return failResult(`Content not found for manifest ${id}`);

      const targetRoot = path.resolve(targetDirectory);
      await fs.mkdir(targetRoot, { recursive: true });
      for (const file of contentAddressableFiles(manifest)) {
        if (!file.hash) continue;
        const dest = resolveInside(targetRoot, file.relativePath);
        await this.objects.materializeToPath(file.hash, dest);
        if (file.isExecutable || file.permissions.unixMode) {
          await fs.chmod(dest, file.permissions.unixMode ? parseInt(file.permissions.unixMode, 8) : 0o755);
        }
      }
      for (const dir of manifest.requiredDirectories) {
        await fs.mkdir(resolveInside(targetRoot, dir), { recursive: true });
      }

      this.logger.debug({ manifestId: id, targetDirectory: targetRoot }, "retrieved content");
      return okResult(targetRoot);
    } catch (err) {
      this.logger.error({ err, manifestId: id }, "failed to retrieve content");
      return failResult(`Retrieval failed: ${describeError(err)}`);
    }
  }

  async getStorageStats(): Promise<StorageStats> {
    const manifestCount = (await this.listManifestRecordPaths()).length;
    const objectCount = (await this.objects.listHashes()).length;
    return { manifestCount, objectCount, objectBytes: await this.objects.totalBytes() };
  }

  /** Re-hashes every object and checks that every referenced object exists. */
  async verifyObjects(opts: { signal?: AbortSignal } = {}): Promise<IntegrityReport> {
    const report: IntegrityReport = { objectsChecked: 0, corrupted: [], missing: [], unreadableManifests: [] };

    for (const hash of await this.objects.listHashes()) {
      throwIfAborted(opts.signal, "integrity scan");
      report.objectsChecked++;
      if (!(await this.objects.verify(hash, opts.signal))) report.corrupted.push(hash);
    }

    for (const filePath of await this.listManifestRecordPaths()) {
      throwIfAborted(opts.signal, "integrity scan");
      let manifest: ContentManifest;
      try {
        manifest = await this.readManifestFile(filePath);
      } catch (err) {
        this.logger.warn({ err, manifestFile: filePath }, "unreadable manifest during integrity scan");
        report.unreadableManifests.push(filePath);
        continue;
      }
      for (const file of contentAddressableFiles(manifest)) {
        if (file.hash && !(await this.objects.has(file.hash))) {
          report.missing.push({ manifestId: manifest.id, relativePath: file.relativePath, hash: file.hash });
        }
      }
    }

    return report;
  }

  /** Deletes every object no manifest references. Refuses to run over unreadable manifests. */
  async collectGarbage(opts: { dryRun?: boolean; signal?: AbortSignal } = {}): Promise<GarbageCollectionResult> {
    const dryRun = opts.dryRun ?? false;
    const scan = await this.scanReferences(opts.signal);
    if (scan.unreadable.length > 0) {
      throw new ContentStoreError(`garbage collection aborted: ${scan.unreadable.length} manifest(s) could not be read`);
    }

    let objectsDeleted = 0;
    let bytesFreed = 0;
    for (const hash of await this.objects.listHashes()) {
      throwIfAborted(opts.signal, "garbage collection");
      if (scan.references.has(hash) || this.inflight.has(hash)) continue;
      const size = (await this.objects.sizeOf(hash)) ?? 0;
      if (dryRun || (await this.objects.delete(hash))) {
        objectsDeleted++;
        bytesFreed += size;
      }
    }

    this.logger.info({ objectsDeleted, bytesFreed, dryRun }, "garbage collection finished");
    return { objectsDeleted, bytesFreed, dryRun };
  }
}
