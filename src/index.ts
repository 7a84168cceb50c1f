export { loadPoolConfig, resolvePoolConfig, DEFAULT_LOCK_RETRIES, DEFAULT_LOCK_STALE_MS, type PoolConfig } from "./config/poolConfig.js";
export { canonicalizeJson, stableJsonStringify } from "./core/canonicalJson.js";
export {
  ContentStoreError,
  ManifestIdError,
  ManifestRecordError,
  OperationCancelledError,
  PoolConfigError,
  isNotFoundError,
  throwIfAborted
} from "./core/errors.js";
export { isManifestId, manifestId, manifestIdEquals, manifestIdKey, parseManifestId, type ManifestId } from "./core/ids.js";
export { createLogger, type Logger } from "./core/logger.js";
export * from "./core/manifest.js";
export { describeError, failResult, okResult, type Failure, type OperationResult } from "./core/result.js";
export { compareVersions } from "./core/versionCompare.js";
export {
  DEFAULT_HASH_CHUNK_BYTES,
  Sha256HashProvider,
  hashBuffer,
  hashFile,
  hashStream,
  type FileHash,
  type HashProvider
} from "./hashing/contentHasher.js";
export { ContentManifestPool, type PoolOperationOptions } from "./manifest/contentManifestPool.js";
export { ContentManifestBuilder, type FileOptions } from "./manifest/manifestBuilder.js";
export { ManifestCache } from "./manifest/manifestCache.js";
export { ManifestDiscovery } from "./manifest/manifestDiscovery.js";
export {
  MANIFEST_FORMAT_VERSION,
  generateGameInstallationId,
  generatePublisherContentId,
  normalizeUserVersion
} from "./manifest/manifestIdService.js";
export { parseManifestJson, serializeManifest, zContentManifest } from "./manifest/manifestSchema.js";
export { pathTraversalProblem, validateManifest, type ValidationResult } from "./manifest/manifestValidator.js";
export { CasObjectStore, type PutObjectOptions, type PutObjectResult } from "./storage/casObjectStore.js";
export {
  ContentStorageService,
  type GarbageCollectionResult,
  type IntegrityReport,
  type RemovalStats,
  type StorageStats
} from "./storage/contentStorageService.js";
export { InflightReferences } from "./storage/inflightReferences.js";
export { ManifestLocks, type ManifestLockOptions } from "./storage/manifestLocks.js";
export * from "./storage/storageLayout.js";
