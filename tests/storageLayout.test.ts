import { describe, it, expect } from "vitest";
import path from "path";

import { manifestId } from "../src/core/ids.js";
import { normalizeHash, referencedHashes } from "../src/core/manifest.js";
import { StorageLayout, isValidHash } from "../src/storage/storageLayout.js";
import { contentFile, makeManifest } from "./testUtils.js";

const HASH = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

describe("storage layout", () => {
  const root = path.resolve("/srv/pool");
  const layout = new StorageLayout(root);

  it("maps manifest ids to lowercased record and content paths", () => {
    const id = manifestId("Pub.Tool.V1");
    expect(layout.manifestPath(id)).toBe(path.join(root, "manifests", "pub.tool.v1.manifest.json"));
    expect(layout.contentDirectory(id)).toBe(path.join(root, "data", "pub.tool.v1"));
    expect(layout.sourcePathFile(id)).toBe(path.join(root, "data", "pub.tool.v1", "source.path"));
    expect(layout.lockPath(id)).toBe(path.join(root, "locks", "pub.tool.v1.lock"));
  });

  it("shards objects by the first two hex characters", () => {
    expect(layout.objectPath(HASH.toUpperCase())).toBe(path.join(root, "cas-objects", "ba", HASH));
  });

  it("rejects strings that are not sha256 digests", () => {
    expect(() => layout.objectPath("../../etc/passwd")).toThrow("invalid content hash");
    expect(isValidHash("abc")).toBe(false);
    expect(isValidHash(` ${HASH.toUpperCase()} `)).toBe(true);
    expect(normalizeHash(` ${HASH.toUpperCase()} `)).toBe(HASH);
  });

  it("collects referenced hashes in normalized form", () => {
    const file = contentFile("a.big", Buffer.from("a"));
    const manifest = makeManifest("pub.hashes.v1", [
      { ...file, hash: `\t${HASH.toUpperCase()} ` },
      { ...file, relativePath: "b.big", hash: HASH },
      { ...file, relativePath: "c.big", hash: "   " },
      { ...file, relativePath: "remote.zip", sourceType: "RemoteDownload", hash: "ff" }
    ]);
    expect([...referencedHashes(manifest)]).toEqual([HASH]);
  });
});
