const DATE_VERSION_PUBLISHERS = new Set(["communityoutpost"]);
const NUMERIC_VERSION_PUBLISHERS = new Set(["thesuperhackers", "generalsonline"]);

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function ordinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function parseInteger(value: string): bigint | null {
  return /^\d+$/.test(value.trim()) ? BigInt(value.trim()) : null;
}

function compareBig(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function digitsOf(value: string): bigint | null {
  const digits = value.replace(/\D/g, "");
  return digits.length > 0 ? BigInt(digits) : null;
}

function compareDateVersions(a: string, b: string): number {
  const da = /^(\d{4})-(\d{2})-(\d{2})$/.exec(a.trim());
  const db = /^(\d{4})-(\d{2})-(\d{2})$/.exec(b.trim());
  if (da && db) return ordinal(da.slice(1).join(""), db.slice(1).join(""));
  const na = digitsOf(a);
  const nb = digitsOf(b);
  if (na !== null && nb !== null) return compareBig(na, nb);
  return ordinal(a, b);
}

function compareNumericVersions(a: string, b: string): number {
  const ia = parseInteger(a);
  const ib = parseInteger(b);
  if (ia !== null && ib !== null) return compareBig(ia, ib);
  const na = digitsOf(a);
  const nb = digitsOf(b);
  if (na !== null && nb !== null) return compareBig(na, nb);
  return ordinal(a, b);
}

function compareDottedVersions(a: string, b: string): number | null {
  const pattern = /^v?\d+(\.\d+)*$/i;
  if (!pattern.test(a.trim()) || !pattern.test(b.trim())) return null;
  const pa = a.trim().replace(/^v/i, "").split(".").map((p) => BigInt(p));
  const pb = b.trim().replace(/^v/i, "").split(".").map((p) => BigInt(p));
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const c = compareBig(pa[i] ?? 0n, pb[i] ?? 0n);
    if (c !== 0) return c;
  }
  return 0;
}

/**
 * Loose ordering for publisher version strings (not semver).
 * Returns -1, 0 or 1. Blank versions sort before anything else.
 */
export function compareVersions(a: string | null | undefined, b: string | null | undefined, publisherType?: string): number {
  const va = a?.trim() ?? "";
  const vb = b?.trim() ?? "";
  if (!va && !vb) return 0;
  if (!va) return -1;
  if (!vb) return 1;

  const publisher = publisherType?.trim().toLowerCase() ?? "";
  if (DATE_VERSION_PUBLISHERS.has(publisher)) return sign(compareDateVersions(va, vb));
  if (NUMERIC_VERSION_PUBLISHERS.has(publisher)) return sign(compareNumericVersions(va, vb));

  const ia = parseInteger(va);
  const ib = parseInteger(vb);
  if (ia !== null && ib !== null) return compareBig(ia, ib);

  const dotted = compareDottedVersions(va, vb);
  if (dotted !== null) return dotted;

  return ordinal(va, vb);
}
