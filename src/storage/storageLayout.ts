import path from "path";
import { manifestIdKey, type ManifestId } from "../core/ids.js";
import { normalizeHash } from "../core/manifest.js";

export const MANIFESTS_DIR = "manifests";
export const CAS_OBJECTS_DIR = "cas-objects";
export const CONTENT_DATA_DIR = "data";
export const STAGING_DIR = "tmp";
export const LOCKS_DIR = "locks";

export const MANIFEST_FILE_SUFFIX = ".manifest.json";
export const SOURCE_PATH_FILE = "source.path";

const HASH_PATTERN = /^[0-9a-f]{64}$/;

export function isValidHash(hash: string): boolean {
  return HASH_PATTERN.test(normalizeHash(hash));
}

/**
 * On-disk layout under the storage root:
 *
 *   manifests/<id>.manifest.json      manifest record (id lowercased)
 *   cas-objects/<hh>/<hash>           content object, <hh> = first two hex chars
 *   data/<id>/                        logical content directory (optional source.path)
 *   tmp/                              staging files
 *   locks/<id>.lock                   per-manifest lock files
 */
export class StorageLayout {
  readonly root: string;

  constructor(storageRoot: string) {
    this.root = path.resolve(storageRoot);
  }

  get manifestsDir(): string {
    return path.join(this.root, MANIFESTS_DIR);
  }

  get objectsDir(): string {
    return path.join(this.root, CAS_OBJECTS_DIR);
  }

  get dataDir(): string {
    return path.join(this.root, CONTENT_DATA_DIR);
  }

  get stagingDir(): string {
    return path.join(this.root, STAGING_DIR);
  }

  get locksDir(): string {
    return path.join(this.root, LOCKS_DIR);
  }

  manifestPath(id: ManifestId): string {
    return path.join(this.manifestsDir, `${manifestIdKey(id)}${MANIFEST_FILE_SUFFIX}`);
  }

  contentDirectory(id: ManifestId): string {
    return path.join(this.dataDir, manifestIdKey(id));
  }

  sourcePathFile(id: ManifestId): string {
    return path.join(this.contentDirectory(id), SOURCE_PATH_FILE);
  }

  lockPath(id: ManifestId): string {
    return path.join(this.locksDir, `${manifestIdKey(id)}.lock`);
  }

  objectPath(hash: string): string {
    const normalized = normalizeHash(hash);
    if (!HASH_PATTERN.test(normalized)) throw new Error(`invalid content hash: ${hash}`);
    return path.join(this.objectsDir, normalized.slice(0, 2), normalized);
  }
}
