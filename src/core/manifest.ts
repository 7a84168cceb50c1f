import type { ManifestId } from "./ids.js";

export const CONTENT_TYPES = [
  "GameInstallation",
  "GameClient",
  "Mod",
  "Patch",
  "Addon",
  "MapPack",
  "LanguagePack",
  "ContentBundle",
  "PublisherReferral",
  "ContentReferral",
  "Mission",
  "Map",
  "UnknownContentType"
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export const GAME_TYPES = ["Generals", "ZeroHour", "Unknown"] as const;

export type GameType = (typeof GAME_TYPES)[number];

export const CONTENT_SOURCE_TYPES = [
  "Unknown",
  "ContentAddressable",
  "RemoteDownload",
  "GameInstallation",
  "ExtractedPackage",
  "PatchFile",
  "LocalFile"
] as const;

export type ContentSourceType = (typeof CONTENT_SOURCE_TYPES)[number];

export const DEPENDENCY_INSTALL_BEHAVIORS = ["RequireExisting", "AutoInstall", "Suggest", "Optional"] as const;

export type DependencyInstallBehavior = (typeof DEPENDENCY_INSTALL_BEHAVIORS)[number];

const BASE_CONTENT_TYPES: ReadonlySet<ContentType> = new Set<ContentType>(["GameInstallation", "GameClient"]);

/** Base manifests describe content supplied by an existing install and may declare no files. */
export function isBaseContentType(contentType: ContentType): boolean {
  return BASE_CONTENT_TYPES.has(contentType);
}

export interface FilePermissions {
  isReadOnly: boolean;
  unixMode?: string;
}

export interface ManifestFile {
  relativePath: string;
  size: number;
  hash?: string;
  sourceType: ContentSourceType;
  isExecutable: boolean;
  isRequired: boolean;
  permissions: FilePermissions;
  downloadUrl?: string;
  patchSourceFile?: string;
  sourcePath?: string;
}

export interface PublisherInfo {
  name: string;
  publisherType?: string;
  website?: string;
  updateSourceUrl?: string;
}

export interface ContentMetadata {
  description?: string;
  tags: string[];
  iconUrl?: string;
  releaseDate?: string;
}

export interface ContentDependency {
  id: ManifestId;
  name?: string;
  dependencyType: ContentType;
  installBehavior: DependencyInstallBehavior;
  minVersion?: string;
  maxVersion?: string;
}

export interface ContentManifest {
  manifestVersion: string;
  id: ManifestId;
  name: string;
  version: string;
  contentType: ContentType;
  targetGame: GameType;
  publisher?: PublisherInfo;
  metadata?: ContentMetadata;
  files: ManifestFile[];
  dependencies: ContentDependency[];
  requiredDirectories: string[];
}

export interface ContentSearchQuery {
  searchTerm?: string;
  contentType?: ContentType;
  targetGame?: GameType;
}

export const DEFAULT_FILE_PERMISSIONS: FilePermissions = { isReadOnly: false };

export function contentAddressableFiles(manifest: ContentManifest): ManifestFile[] {
  return manifest.files.filter((f) => f.sourceType === "ContentAddressable");
}

export function normalizeHash(hash: string): string {
  return hash.trim().toLowerCase();
}

/** Hashes of every CAS object the manifest declares, normalized. */
export function referencedHashes(manifest: ContentManifest): Set<string> {
  const out = new Set<string>();
  for (const file of contentAddressableFiles(manifest)) {
    const hash = file.hash ? normalizeHash(file.hash) : "";
    if (hash) out.add(hash);
  }
  return out;
}
