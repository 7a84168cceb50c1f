import { isManifestId } from "../core/ids.js";
import { isBaseContentType, type ContentManifest, type ManifestFile } from "../core/manifest.js";
import { zContentManifest } from "./manifestSchema.js";

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

/** Why `relativePath` could escape a workspace root, or null when it is safe. */
export function pathTraversalProblem(relativePath: string): string | null {
  if (relativePath.startsWith("/") || relativePath.startsWith("\\")) return "is an absolute path";
  if (/^[A-Za-z]:/.test(relativePath)) return "is an absolute path";
  if (relativePath.includes("\0")) return "contains a NUL character";
  const segments = relativePath.split(/[\\/]+/);
  if (segments.some((s) => s === "..")) return "contains illegal path traversal";
  return null;
}

function companionFieldProblem(file: ManifestFile): string | null {
  switch (file.sourceType) {
    case "ContentAddressable":
      return file.hash?.trim() ? null : `Content file ${file.relativePath} must have a hash for content-addressable storage`;
    case "RemoteDownload":
      return file.downloadUrl?.trim() ? null : `Remote download file ${file.relativePath} must have a downloadUrl`;
    case "PatchFile":
      return file.patchSourceFile?.trim() ? null : `Patch file ${file.relativePath} must have a patch source file`;
    default:
      return null;
  }
}

const UNIX_MODE = /^[0-7]{3,4}$/;

function fileShapeProblems(file: ManifestFile, label: string): string[] {
  const problems: string[] = [];
  if (!Number.isInteger(file.size) || file.size < 0) problems.push(`File ${label} has invalid size ${file.size}`);
  const mode = file.permissions?.unixMode;
  if (mode !== undefined && !UNIX_MODE.test(mode)) problems.push(`File ${label} has invalid unix mode ${mode}`);
  return problems;
}

/**
 * Checks a manifest before admission. Pure: no I/O. Every problem found is
 * reported, in a stable order, so callers can surface them all at once.
 */
export function validateManifest(manifest: ContentManifest): ValidationResult {
  const errors: string[] = [];

  if (!manifest.id || manifest.id.trim().length === 0) {
    errors.push("Manifest ID is required");
  } else if (!isManifestId(manifest.id)) {
    errors.push(`Manifest ID ${manifest.id} is invalid`);
  }

  if (!manifest.name || manifest.name.trim().length === 0) errors.push("Manifest name is required");
  if (!manifest.version || manifest.version.trim().length === 0) errors.push("Manifest version is required");

  const files = manifest.files ?? [];
  const dirs = manifest.requiredDirectories ?? [];
  if (files.length === 0 && dirs.length === 0 && !isBaseContentType(manifest.contentType)) {
    errors.push("Manifest must contain at least one file or required directory");
  }

  const seen = new Set<string>();
  for (const file of files) {
    const rel = file.relativePath ?? "";
    if (rel.trim().length === 0) {
      errors.push("File entries must have a relative path");
    } else {
      const problem = pathTraversalProblem(rel);
      if (problem) errors.push(`File ${rel} ${problem}`);

      const key = rel.replace(/\\/g, "/").toLowerCase();
      if (seen.has(key)) errors.push(`File ${rel} is declared more than once`);
      seen.add(key);
    }

    if (file.sourceType === "Unknown") errors.push(`File ${rel} has unknown source type`);
    errors.push(...fileShapeProblems(file, rel));

    const companion = companionFieldProblem(file);
    if (companion) errors.push(companion);
  }

  for (const dir of dirs) {
    if (dir.trim().length === 0) {
      errors.push("Required directories must not be empty");
      continue;
    }
    const problem = pathTraversalProblem(dir);
    if (problem) errors.push(`Required directory ${dir} ${problem}`);
  }

  for (const dep of manifest.dependencies ?? []) {
    if (!isManifestId(dep.id)) errors.push(`Dependency id ${dep.id} is invalid`);
  }

  // Whatever is admitted must read back through the record schema.
  if (errors.length === 0) {
    const parsed = zContentManifest.safeParse(manifest);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        errors.push(`Manifest field ${issue.path.map((p) => String(p)).join(".") || "<root>"} is invalid: ${issue.message}`);
      }
    }
  }

  return { ok: errors.length === 0, errors };
}
