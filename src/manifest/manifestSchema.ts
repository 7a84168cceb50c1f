import * as z from "zod/v4";
import { stableJsonStringify } from "../core/canonicalJson.js";
import { ManifestRecordError } from "../core/errors.js";
import { isManifestId, type ManifestId } from "../core/ids.js";
import {
  CONTENT_SOURCE_TYPES,
  CONTENT_TYPES,
  DEPENDENCY_INSTALL_BEHAVIORS,
  GAME_TYPES,
  type ContentManifest
} from "../core/manifest.js";

export const zManifestId = z.custom<ManifestId>((value) => isManifestId(value), { message: "invalid manifest id" });

export const zContentType = z.enum(CONTENT_TYPES);
export const zGameType = z.enum(GAME_TYPES);
export const zContentSourceType = z.enum(CONTENT_SOURCE_TYPES);

export const zFilePermissions = z.object({
  isReadOnly: z.boolean().default(false),
  unixMode: z
    .string()
    .regex(/^[0-7]{3,4}$/)
    .optional()
});

export const zManifestFile = z.object({
  relativePath: z.string(),
  size: z.number().int().min(0).default(0),
  hash: z.string().optional(),
  sourceType: zContentSourceType,
  isExecutable: z.boolean().default(false),
  isRequired: z.boolean().default(true),
  permissions: zFilePermissions.default({ isReadOnly: false }),
  downloadUrl: z.string().optional(),
  patchSourceFile: z.string().optional(),
  sourcePath: z.string().optional()
});

export const zPublisherInfo = z.object({
  name: z.string(),
  publisherType: z.string().optional(),
  website: z.string().optional(),
  updateSourceUrl: z.string().optional()
});

export const zContentMetadata = z.object({
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
  iconUrl: z.string().optional(),
  releaseDate: z.string().optional()
});

export const zContentDependency = z.object({
  id: zManifestId,
  name: z.string().optional(),
  dependencyType: zContentType,
  installBehavior: z.enum(DEPENDENCY_INSTALL_BEHAVIORS).default("RequireExisting"),
  minVersion: z.string().optional(),
  maxVersion: z.string().optional()
});

/** Persisted manifest record. Unknown members are dropped on read. */
export const zContentManifest = z.object({
  manifestVersion: z.string().default("1"),
  id: zManifestId,
  name: z.string(),
  version: z.string(),
  contentType: zContentType,
  targetGame: zGameType.default("Unknown"),
  publisher: zPublisherInfo.optional(),
  metadata: zContentMetadata.optional(),
  files: z.array(zManifestFile).default([]),
  dependencies: z.array(zContentDependency).default([]),
  requiredDirectories: z.array(z.string()).default([])
});

export function serializeManifest(manifest: ContentManifest): string {
  return `${stableJsonStringify(manifest, 2)}\n`;
}

export function parseManifestJson(text: string, source: string): ContentManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ManifestRecordError(
      `manifest file ${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      source
    );
  }

  const parsed = zContentManifest.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.map((p) => String(p)).join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ManifestRecordError(`manifest file ${source} is invalid: ${issues}`, source);
  }
  return parsed.data;
}
