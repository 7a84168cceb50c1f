import type { Logger } from "../core/logger.js";
import type { ContentManifest } from "../core/manifest.js";
import { failResult, okResult, type OperationResult } from "../core/result.js";
import { compareVersions } from "../core/versionCompare.js";
import type { ContentManifestPool, PoolOperationOptions } from "./contentManifestPool.js";

const ENFORCED_BEHAVIORS = new Set(["RequireExisting", "AutoInstall"]);

export class ManifestDiscovery {
  private readonly logger: Logger;

  constructor(
    private readonly pool: ContentManifestPool,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "manifest-discovery" });
  }

  /** Replaces the cache contents with what is on disk. Resolves to the number loaded. */
  async initializeCache(opts: PoolOperationOptions = {}): Promise<OperationResult<number>> {
    this.pool.cache.clear();
    const all = await this.pool.getAllManifests(opts);
    if (!all.ok) return failResult(`Failed to initialize manifest cache: ${all.error}`);
    this.logger.info({ manifests: all.value.length }, "manifest cache initialized");
    return okResult(all.value.length);
  }

  /** Problems with the manifest's required dependencies, judged against the cache. Empty when satisfied. */
  validateDependencies(manifest: ContentManifest): string[] {
    const problems: string[] = [];
    for (const dep of manifest.dependencies) {
      if (!ENFORCED_BEHAVIORS.has(dep.installBehavior)) continue;

      const label = dep.name ? `${dep.name} (${dep.id})` : dep.id;
      const found = this.pool.cache.get(dep.id);
      if (!found) {
        problems.push(`Missing dependency ${label}`);
        continue;
      }

      const publisherType = found.publisher?.publisherType;
      if (dep.minVersion && compareVersions(found.version, dep.minVersion, publisherType) < 0) {
        problems.push(`Dependency ${label} version ${found.version} is older than required ${dep.minVersion}`);
      }
      if (dep.maxVersion && compareVersions(found.version, dep.maxVersion, publisherType) > 0) {
        problems.push(`Dependency ${label} version ${found.version} is newer than allowed ${dep.maxVersion}`);
      }
    }
    return problems;
  }
}
