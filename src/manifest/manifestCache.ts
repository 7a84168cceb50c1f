import { manifestIdKey, type ManifestId } from "../core/ids.js";
import type { ContentManifest } from "../core/manifest.js";

/** In-memory view of stored manifests, keyed case-insensitively. Last write wins. */
export class ManifestCache {
  private readonly entries = new Map<string, ContentManifest>();

  get(id: ManifestId): ContentManifest | undefined {
    return this.entries.get(manifestIdKey(id));
  }

  upsert(manifest: ContentManifest): void {
    this.entries.set(manifestIdKey(manifest.id), manifest);
  }

  getAll(): ContentManifest[] {
    return [...this.entries.values()];
  }

  remove(id: ManifestId): boolean {
    return this.entries.delete(manifestIdKey(id));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
