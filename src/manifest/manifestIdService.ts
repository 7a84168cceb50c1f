import { parseManifestId, type ManifestId } from "../core/ids.js";
import type { ContentType, GameType } from "../core/manifest.js";
import { failResult, type OperationResult } from "../core/result.js";

export const MANIFEST_FORMAT_VERSION = 1;

function normalizeSegment(label: string, input: string): string | { problem: string } {
  if (!input.trim()) return { problem: `${label} cannot be empty` };
  const normalized = input.trim().toLowerCase().replace(/[^a-z0-9]/g, "");
  return normalized || { problem: `${label} has no letters or digits: ${input}` };
}

function contentTypeSegment(contentType: ContentType): string {
  return contentType === "UnknownContentType" ? "unknown" : contentType.toLowerCase();
}

/** "1.08" -> "108", "2.0" -> "200", "3" -> "3", blank -> "0". */
export function normalizeUserVersion(version: string | number | null | undefined): string | { problem: string } {
  if (version === null || version === undefined) return "0";
  const text = String(version).trim();
  if (!text) return "0";

  if (text.includes(".")) {
    const parts = text.split(".");
    const [major, minor] = parts;
    if (parts.length !== 2 || major === undefined || minor === undefined) {
      return { problem: `version must be 'major.minor' or a single number: ${text}` };
    }
    if (!/^\d+$/.test(major)) return { problem: `major version must be a non-negative integer: ${text}` };
    if (!/^\d+$/.test(minor)) return { problem: `minor version must be a non-negative integer: ${text}` };
    return `${Number(major)}${String(Number(minor)).padStart(2, "0")}`;
  }

  if (!/^\d+$/.test(text)) return { problem: `version must be numeric and non-negative: ${text}` };
  return text;
}

/** `1.<userVersion>.<publisher>.<contenttype>.<name>` */
export function generatePublisherContentId(
  publisherId: string,
  contentType: ContentType,
  contentName: string,
  userVersion = 0
): OperationResult<ManifestId> {
  if (!Number.isInteger(userVersion) || userVersion < 0) {
    return failResult(`user version must be a non-negative integer: ${userVersion}`);
  }
  const publisher = normalizeSegment("publisher id", publisherId);
  const name = normalizeSegment("content name", contentName);
  const problems = [publisher, name].flatMap((s) => (typeof s === "string" ? [] : [s.problem]));
  if (typeof publisher !== "string" || typeof name !== "string") return failResult(...problems);

  return parseManifestId(`${MANIFEST_FORMAT_VERSION}.${userVersion}.${publisher}.${contentTypeSegment(contentType)}.${name}`);
}

/** `1.<normalizedVersion>.<installtype>.gameinstallation.<generals|zerohour>` */
export function generateGameInstallationId(
  installationType: string,
  gameType: GameType,
  userVersion?: string | number | null
): OperationResult<ManifestId> {
  const installType = normalizeSegment("installation type", installationType);
  if (typeof installType !== "string") return failResult(installType.problem);

  const version = normalizeUserVersion(userVersion);
  if (typeof version !== "string") return failResult(version.problem);

  const game = gameType === "ZeroHour" ? "zerohour" : "generals";
  return parseManifestId(`${MANIFEST_FORMAT_VERSION}.${version}.${installType}.gameinstallation.${game}`);
}
