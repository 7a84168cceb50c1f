import { promises as fs } from "fs";
import path from "path";
import { parseManifestId } from "../core/ids.js";
import {
  DEFAULT_FILE_PERMISSIONS,
  type ContentDependency,
  type ContentManifest,
  type ContentMetadata,
  type ContentType,
  type FilePermissions,
  type GameType,
  type ManifestFile,
  type PublisherInfo
} from "../core/manifest.js";
import { failResult, okResult, type OperationResult } from "../core/result.js";
import type { HashProvider } from "../hashing/contentHasher.js";
import { validateManifest } from "./manifestValidator.js";

export interface FileOptions {
  isExecutable?: boolean;
  isRequired?: boolean;
  permissions?: FilePermissions;
}

interface BuilderState {
  id: string;
  name: string;
  version: string;
  contentType: ContentType;
  targetGame: GameType;
  publisher?: PublisherInfo;
  metadata?: ContentMetadata;
  files: readonly ManifestFile[];
  dependencies: readonly ContentDependency[];
  requiredDirectories: readonly string[];
}

const EMPTY_STATE: BuilderState = {
  id: "",
  name: "",
  version: "",
  contentType: "UnknownContentType",
  targetGame: "Unknown",
  files: [],
  dependencies: [],
  requiredDirectories: []
};

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

async function walkFiles(root: string, dir = root): Promise<string[]> {
  const out: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...(await walkFiles(root, full)));
    else if (entry.isFile()) out.push(toPosix(path.relative(root, full)));
  }
  return out;
}

/**
 * Immutable manifest builder. Each call returns a new builder; `build()`
 * validates once and never throws.
 */
export class ContentManifestBuilder {
  private constructor(
    private readonly state: BuilderState,
    private readonly hasher: HashProvider | null
  ) {}

  static create(hasher: HashProvider | null = null): ContentManifestBuilder {
    return new ContentManifestBuilder(EMPTY_STATE, hasher);
  }

  private with(patch: Partial<BuilderState>): ContentManifestBuilder {
    return new ContentManifestBuilder({ ...this.state, ...patch }, this.hasher);
  }

  withBasicInfo(id: string, name: string, version: string): ContentManifestBuilder {
    return this.with({ id, name, version });
  }

  withContentType(contentType: ContentType, targetGame: GameType): ContentManifestBuilder {
    return this.with({ contentType, targetGame });
  }

  withPublisher(publisher: PublisherInfo): ContentManifestBuilder {
    return this.with({ publisher: { ...publisher } });
  }

  withMetadata(description: string, tags: readonly string[] = [], iconUrl?: string): ContentManifestBuilder {
    return this.with({ metadata: { description, tags: [...tags], iconUrl } });
  }

  addDependency(dependency: ContentDependency): ContentManifestBuilder {
    return this.with({ dependencies: [...this.state.dependencies, { ...dependency }] });
  }

  addRequiredDirectories(...directories: string[]): ContentManifestBuilder {
    return this.with({ requiredDirectories: [...this.state.requiredDirectories, ...directories] });
  }

  addFile(file: ManifestFile): ContentManifestBuilder {
    return this.with({ files: [...this.state.files, { ...file }] });
  }

  addContentFile(relativePath: string, hash: string, size: number, opts: FileOptions = {}): ContentManifestBuilder {
    return this.addFile({
      relativePath,
      hash: hash.toLowerCase(),
      size,
      sourceType: "ContentAddressable",
      isExecutable: opts.isExecutable ?? false,
      isRequired: opts.isRequired ?? true,
      permissions: opts.permissions ?? { ...DEFAULT_FILE_PERMISSIONS }
    });
  }

  addRemoteFile(relativePath: string, downloadUrl: string, opts: FileOptions = {}): ContentManifestBuilder {
    return this.addFile({
      relativePath,
      size: 0,
      sourceType: "RemoteDownload",
      downloadUrl,
      isExecutable: opts.isExecutable ?? false,
      isRequired: opts.isRequired ?? true,
      permissions: opts.permissions ?? { ...DEFAULT_FILE_PERMISSIONS }
    });
  }

  /** Hashes `sourceDirectory/relativePath` and adds it as a content-addressable file. */
  async addLocalFile(sourceDirectory: string, relativePath: string, opts: FileOptions = {}): Promise<ContentManifestBuilder> {
    if (!this.hasher) throw new Error("addLocalFile needs a HashProvider");
    const fullPath = path.join(sourceDirectory, relativePath);
    const st = await fs.stat(fullPath);
    const hash = await this.hasher.computeFileHash(fullPath);
    return this.addContentFile(toPosix(relativePath), hash, st.size, opts);
  }

  /** Adds every regular file under `sourceDirectory`, in path order. */
  async addFilesFromDirectory(sourceDirectory: string, opts: FileOptions = {}): Promise<ContentManifestBuilder> {
    let next: ContentManifestBuilder = this;
    for (const relativePath of await walkFiles(sourceDirectory)) {
      next = await next.addLocalFile(sourceDirectory, relativePath, opts);
    }
    return next;
  }

  build(): OperationResult<ContentManifest> {
    const id = parseManifestId(this.state.id);
    if (!id.ok) return failResult(`Manifest ID ${this.state.id || "<empty>"} is invalid: ${id.error}`);

    const manifest: ContentManifest = {
      manifestVersion: "1",
      id: id.value,
      name: this.state.name,
      version: this.state.version,
      contentType: this.state.contentType,
      targetGame: this.state.targetGame,
      ...(this.state.publisher ? { publisher: this.state.publisher } : {}),
      ...(this.state.metadata ? { metadata: this.state.metadata } : {}),
      files: [...this.state.files],
      dependencies: [...this.state.dependencies],
      requiredDirectories: [...this.state.requiredDirectories]
    };

    const validation = validateManifest(manifest);
    if (!validation.ok) return failResult(...validation.errors);
    return okResult(manifest);
  }
}
