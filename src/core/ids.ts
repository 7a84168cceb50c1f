import { ulid } from "ulid";
import { ManifestIdError } from "./errors.js";
import { failResult, okResult, type OperationResult } from "./result.js";

export type ManifestId = string & { readonly __brand: "ManifestId" };

const MANIFEST_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const MAX_MANIFEST_ID_LENGTH = 200;

function manifestIdProblem(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return "manifest id cannot be null or empty";
  if (trimmed !== raw) return `manifest id has leading or trailing whitespace: "${raw}"`;
  if (raw.length > MAX_MANIFEST_ID_LENGTH) return `manifest id is longer than ${MAX_MANIFEST_ID_LENGTH} characters`;
  if (raw.includes("..")) return `manifest id contains a path traversal sequence: ${raw}`;
  if (!MANIFEST_ID_PATTERN.test(raw)) return `manifest id contains invalid characters: ${raw}`;
  return null;
}

export function isManifestId(raw: unknown): raw is ManifestId {
  return typeof raw === "string" && manifestIdProblem(raw) === null;
}

export function parseManifestId(raw: string): OperationResult<ManifestId> {
  if (isManifestId(raw)) return okResult(raw);
  return failResult(manifestIdProblem(raw) ?? `invalid manifest id: ${raw}`);
}

export function manifestId(raw: string): ManifestId {
  if (isManifestId(raw)) return raw;
  throw new ManifestIdError(manifestIdProblem(raw) ?? `invalid manifest id: ${raw}`);
}

/** Case-insensitive identity used for equality, map keys and on-disk names. */
export function manifestIdKey(id: ManifestId): string {
  return id.toLowerCase();
}

export function manifestIdEquals(a: ManifestId, b: ManifestId): boolean {
  return manifestIdKey(a) === manifestIdKey(b);
}

export function newStagingId(): string {
  return `stg_${ulid()}`;
}
