import { promises as fs } from "fs";
import path from "path";
import type { PoolConfig } from "../config/poolConfig.js";
import { isNotFoundError, throwIfAborted } from "../core/errors.js";
import { parseManifestId } from "../core/ids.js";
import type { Logger } from "../core/logger.js";
import { contentAddressableFiles, type ContentManifest, type ContentSearchQuery } from "../core/manifest.js";
import { describeError, failResult, okResult, type OperationResult } from "../core/result.js";
import { compareVersions } from "../core/versionCompare.js";
import { ContentStorageService, type StorageStats } from "../storage/contentStorageService.js";
import { MANIFEST_FILE_SUFFIX } from "../storage/storageLayout.js";
import { ManifestCache } from "./manifestCache.js";
import { validateManifest } from "./manifestValidator.js";

export interface PoolOperationOptions {
  signal?: AbortSignal;
}

function matchesQuery(manifest: ContentManifest, query: ContentSearchQuery): boolean {
  const term = query.searchTerm?.trim().toLowerCase() ?? "";
  if (term && !manifest.name.toLowerCase().includes(term) && !manifest.id.toLowerCase().includes(term)) return false;
  if (query.contentType && manifest.contentType !== query.contentType) return false;
  if (query.targetGame && manifest.targetGame !== query.targetGame) return false;
  return true;
}

function bySearchOrder(a: ContentManifest, b: ContentManifest): number {
  const byName = a.name.toLowerCase().localeCompare(b.name.toLowerCase());
  if (byName !== 0) return byName;
  return compareVersions(b.version, a.version, b.publisher?.publisherType ?? a.publisher?.publisherType);
}

/**
 * Entry point for acquiring, querying and removing manifests. Every operation
 * reports failures as values; nothing thrown below escapes.
 */
export class ContentManifestPool {
  private readonly logger: Logger;

  constructor(
    private readonly deps: {
      storage: ContentStorageService;
      cache: ManifestCache;
    },
    logger: Logger
  ) {
    this.logger = logger.child({ component: "content-manifest-pool" });
  }

  static async open(config: PoolConfig, logger: Logger): Promise<ContentManifestPool> {
    const storage = new ContentStorageService(config, logger);
    await storage.init();
    return new ContentManifestPool({ storage, cache: new ManifestCache() }, logger);
  }

  get storage(): ContentStorageService {
    return this.deps.storage;
  }

  get cache(): ManifestCache {
    return this.deps.cache;
  }

  private async guard<T>(operation: string, id: string | null, fn: () => Promise<OperationResult<T>>): Promise<OperationResult<T>> {
    try {
      return await fn();
    } catch (err) {
      this.logger.error({ err, manifestId: id, operation }, "pool operation failed");
      const subject = id === null ? operation : `${operation} ${id}`;
      return failResult(`Failed to ${subject}: ${describeError(err)}`);
    }
  }

  async addManifestWithContent(
    manifest: ContentManifest,
    sourceDirectory: string,
    opts: PoolOperationOptions = {}
  ): Promise<OperationResult<boolean>> {
    const validation = validateManifest(manifest);
    if (!validation.ok) {
      this.logger.warn({ manifestId: manifest.id, errors: validation.errors }, "manifest rejected");
      return failResult(`Manifest validation failed: ${validation.errors.join("; ")}`);
    }

    return this.guard("add manifest", manifest.id, async () => {
      const stored = await this.deps.storage.storeContent(manifest, sourceDirectory, opts);
      if (!stored.ok) return failResult(`Failed to store content for manifest ${manifest.id}: ${stored.error}`);

      this.deps.cache.upsert(stored.value);
      this.logger.info({ manifestId: manifest.id, files: stored.value.files.length }, "manifest added");
      return okResult(true);
    });
  }

  /** Metadata-only update of a manifest whose content is already stored. */
  async addManifest(manifest: ContentManifest, opts: PoolOperationOptions = {}): Promise<OperationResult<boolean>> {
    const validation = validateManifest(manifest);
    if (!validation.ok) {
      this.logger.warn({ manifestId: manifest.id, errors: validation.errors }, "manifest rejected");
      return failResult(`Manifest validation failed: ${validation.errors.join("; ")}`);
    }

    return this.guard("add manifest", manifest.id, async () => {
      throwIfAborted(opts.signal, `add manifest ${manifest.id}`);
      // Checked under the record lock so a concurrent removal cannot be undone.
      const problems: string[] = [];
      const written = await this.deps.storage.updateManifestRecord(manifest.id, async (current) => {
        if (!current) {
          problems.push(
            `Cannot add manifest ${manifest.id} without source directory. Content must be stored first using addManifestWithContent.`
          );
          return null;
        }
        const missing: string[] = [];
        for (const file of contentAddressableFiles(manifest)) {
          if (file.hash && !(await this.deps.storage.objects.has(file.hash))) missing.push(file.relativePath);
        }
        if (missing.length > 0) {
          problems.push(`Manifest ${manifest.id} references content that is not stored: ${missing.join(", ")}`);
          return null;
        }
        return manifest;
      });
      if (!written) return failResult(...problems);

      this.deps.cache.upsert(written);
      this.logger.info({ manifestId: manifest.id }, "manifest metadata updated");
      return okResult(true);
    });
  }

  /** Null when the manifest is not stored; a corrupted record is a failure. */
  async getManifest(rawId: string, opts: PoolOperationOptions = {}): Promise<OperationResult<ContentManifest | null>> {
    const parsed = parseManifestId(rawId);
    if (!parsed.ok) return parsed;
    const id = parsed.value;

    return this.guard("get manifest", id, async () => {
      throwIfAborted(opts.signal, `get manifest ${id}`);
      const manifest = await this.deps.storage.readManifestRecord(id);
      if (manifest) this.deps.cache.upsert(manifest);
      else this.deps.cache.remove(id);
      return okResult(manifest);
    });
  }

  /** Best-effort: unreadable records are logged and skipped. */
  async getAllManifests(opts: PoolOperationOptions = {}): Promise<OperationResult<ContentManifest[]>> {
    return this.guard("list manifests", null, async () => {
      const out: ContentManifest[] = [];
      for (const filePath of await this.deps.storage.listManifestRecordPaths()) {
        throwIfAborted(opts.signal, "list manifests");
        try {
          const manifest = await this.deps.storage.readManifestFile(filePath);
          this.deps.cache.upsert(manifest);
          out.push(manifest);
        } catch (err) {
          if (isNotFoundError(err)) continue;
          this.logger.warn({ err, manifestFile: filePath }, "skipping unreadable manifest");
        }
      }
      return okResult(out);
    });
  }

  async searchManifests(query: ContentSearchQuery, opts: PoolOperationOptions = {}): Promise<OperationResult<ContentManifest[]>> {
    const all = await this.getAllManifests(opts);
    if (!all.ok) return all;
    return okResult(all.value.filter((m) => matchesQuery(m, query)).sort(bySearchOrder));
  }

  /** Removing an id that is not stored succeeds without touching the disk. */
  async removeManifest(rawId: string, opts: PoolOperationOptions = {}): Promise<OperationResult<boolean>> {
    const parsed = parseManifestId(rawId);
    if (!parsed.ok) return parsed;
    const id = parsed.value;

    return this.guard("remove manifest", id, async () => {
      throwIfAborted(opts.signal, `remove manifest ${id}`);
      const removed = await this.deps.storage.removeContent(id);
      if (!removed.ok) return failResult(`Failed to remove manifest ${id}: ${removed.error}`);
      this.deps.cache.remove(id);
      return okResult(true);
    });
  }

  async isManifestAcquired(rawId: string, opts: PoolOperationOptions = {}): Promise<OperationResult<boolean>> {
    const parsed = parseManifestId(rawId);
    if (!parsed.ok) return parsed;
    return this.guard("check manifest", parsed.value, async () => {
      throwIfAborted(opts.signal, `check manifest ${parsed.value}`);
      return this.deps.storage.isContentStored(parsed.value);
    });
  }

  /**
   * The directory holding a manifest's files: the recorded source directory
   * when one exists, else the pool's own content directory. Null when neither
   * is present.
   */
  async getContentDirectory(rawId: string, opts: PoolOperationOptions = {}): Promise<OperationResult<string | null>> {
    const parsed = parseManifestId(rawId);
    if (!parsed.ok) return parsed;
    const id = parsed.value;

    return this.guard("resolve content directory for", id, async () => {
      throwIfAborted(opts.signal, `resolve content directory for ${id}`);
      try {
        const recorded = (await fs.readFile(this.deps.storage.layout.sourcePathFile(id), "utf8")).trim();
        if (recorded) return okResult(recorded);
      } catch (err) {
        if (!isNotFoundError(err)) throw err;
      }

      const contentDir = this.deps.storage.getContentDirectoryPath(id);
      try {
        if ((await fs.stat(contentDir)).isDirectory()) return okResult(contentDir);
      } catch (err) {
        if (!isNotFoundError(err)) throw err;
      }
      return okResult(null);
    });
  }

  /**
   * Sets `isExecutable` on the named files and rewrites the manifest record in
   * place. Resolves to true when any flag changed.
   */
  async patchExecutableFlags(
    rawId: string,
    flags: Record<string, boolean>,
    opts: PoolOperationOptions = {}
  ): Promise<OperationResult<boolean>> {
    const parsed = parseManifestId(rawId);
    if (!parsed.ok) return parsed;
    const id = parsed.value;

    return this.guard("patch manifest", id, async () => {
      throwIfAborted(opts.signal, `patch manifest ${id}`);
      const problems: string[] = [];
      const changedPaths: string[] = [];

      const written = await this.deps.storage.updateManifestRecord(id, (current) => {
        if (!current) {
          problems.push(`Manifest ${id} not found`);
          return null;
        }

        const wanted = new Map(Object.entries(flags).map(([p, v]) => [p.toLowerCase(), { path: p, value: v }]));
        const seen = new Set<string>();
        const files = current.files.map((file) => {
          const key = file.relativePath.toLowerCase();
          const flag = wanted.get(key);
          if (!flag) return file;
          seen.add(key);
          if (file.isExecutable === flag.value) return file;
          changedPaths.push(file.relativePath);
          return { ...file, isExecutable: flag.value };
        });

        for (const [key, flag] of wanted) {
          if (!seen.has(key)) problems.push(`Manifest ${id} has no file ${flag.path}`);
        }
        if (problems.length > 0 || changedPaths.length === 0) return current;
        return { ...current, files };
      });

      if (problems.length > 0) return failResult(...problems);
      if (written) this.deps.cache.upsert(written);
      if (changedPaths.length > 0) this.logger.info({ manifestId: id, files: changedPaths }, "patched executable flags");
      return okResult(changedPaths.length > 0);
    });
  }

  async retrieveContent(rawId: string, targetDirectory: string, opts: PoolOperationOptions = {}): Promise<OperationResult<string>> {
    const parsed = parseManifestId(rawId);
    if (!parsed.ok) return parsed;
    return this.guard("retrieve content for", parsed.value, async () => {
      throwIfAborted(opts.signal, `retrieve content for ${parsed.value}`);
      return this.deps.storage.retrieveContent(parsed.value, targetDirectory);
    });
  }

  async getStorageStats(opts: PoolOperationOptions = {}): Promise<OperationResult<StorageStats>> {
    return this.guard("read storage stats", null, async () => {
      throwIfAborted(opts.signal, "read storage stats");
      return okResult(await this.deps.storage.getStorageStats());
    });
  }

  /** Removes every stored manifest and then sweeps any object left behind. Resolves to the number removed. */
  async removeAllManifests(opts: PoolOperationOptions = {}): Promise<OperationResult<number>> {
    return this.guard("remove all manifests", null, async () => {
      const failures: string[] = [];
      let removed = 0;

      for (const filePath of await this.deps.storage.listManifestRecordPaths()) {
        throwIfAborted(opts.signal, "remove all manifests");
        const rawId = path.basename(filePath, MANIFEST_FILE_SUFFIX);
        const parsed = parseManifestId(rawId);
        if (!parsed.ok) {
          failures.push(`Unrecognised manifest file ${filePath}: ${parsed.error}`);
          continue;
        }
        const result = await this.deps.storage.removeContent(parsed.value);
        if (!result.ok) failures.push(result.error);
        else if (result.value.removed) removed++;
      }

      this.deps.cache.clear();
      if (failures.length > 0) return failResult(...failures);

      await this.deps.storage.collectGarbage({ signal: opts.signal });
      this.logger.info({ removed }, "removed all manifests");
      return okResult(removed);
    });
  }
}
