import { describe, it, expect } from "vitest";

import type { ContentDependency, ContentManifest } from "../src/core/manifest.js";
import { pathTraversalProblem, validateManifest } from "../src/manifest/manifestValidator.js";
import { contentFile, makeManifest } from "./testUtils.js";

describe("manifest validator", () => {
  it("accepts a well-formed manifest", () => {
    const manifest = makeManifest("pub.tool.v1", [contentFile("bin/tool.exe", Buffer.from("tool"))]);
    expect(validateManifest(manifest)).toEqual({ ok: true, errors: [] });
  });

  it("rejects path traversal and names the offending path", () => {
    const manifest = makeManifest("pub.evil.v1", [contentFile("../../etc/passwd", Buffer.from("x"))]);
    expect(validateManifest(manifest)).toEqual({
      ok: false,
      errors: ["File ../../etc/passwd contains illegal path traversal"]
    });
  });

  it("classifies unsafe relative paths", () => {
    expect(pathTraversalProblem("/etc/passwd")).toBe("is an absolute path");
    expect(pathTraversalProblem("\\\\server\\share")).toBe("is an absolute path");
    expect(pathTraversalProblem("C:\\Windows")).toBe("is an absolute path");
    expect(pathTraversalProblem("data\\..\\..\\x")).toBe("contains illegal path traversal");
    expect(pathTraversalProblem("maps/..hidden/x.map")).toBeNull();
    expect(pathTraversalProblem("Data/INI/Object.ini")).toBeNull();
  });

  it("collects every problem in order", () => {
    const manifest: ContentManifest = {
      ...makeManifest("pub.broken.v1", []),
      name: " ",
      version: "",
      files: [
        { ...contentFile("a.big", Buffer.from("a")), hash: undefined },
        { ...contentFile("A.BIG", Buffer.from("a")), sourceType: "Unknown" },
        { ...contentFile("remote.zip", Buffer.from("r")), sourceType: "RemoteDownload" },
        { ...contentFile("fix.patch", Buffer.from("p")), sourceType: "PatchFile" }
      ],
      requiredDirectories: ["", "../outside"]
    };

    expect(validateManifest(manifest).errors).toEqual([
      "Manifest name is required",
      "Manifest version is required",
      "Content file a.big must have a hash for content-addressable storage",
      "File A.BIG is declared more than once",
      "File A.BIG has unknown source type",
      "Remote download file remote.zip must have a downloadUrl",
      "Patch file fix.patch must have a patch source file",
      "Required directories must not be empty",
      "Required directory ../outside contains illegal path traversal"
    ]);
  });

  it("requires content unless the manifest is a base installation", () => {
    expect(validateManifest(makeManifest("pub.empty.v1", [])).errors).toEqual([
      "Manifest must contain at least one file or required directory"
    ]);
    expect(validateManifest(makeManifest("1.0.steam.gameinstallation.generals", [], { contentType: "GameInstallation" })).ok).toBe(
      true
    );
    expect(validateManifest(makeManifest("pub.dirs.v1", [], { requiredDirectories: ["Maps"] })).ok).toBe(true);
  });

  it("rejects sizes the record schema cannot read back", () => {
    const remote = { ...contentFile("remote.zip", Buffer.from("r")), sourceType: "RemoteDownload" as const, downloadUrl: "https://example.invalid/r.zip", hash: undefined };
    expect(validateManifest(makeManifest("pub.size.v1", [{ ...remote, size: -1 }])).errors).toEqual([
      "File remote.zip has invalid size -1"
    ]);
    expect(validateManifest(makeManifest("pub.size.v1", [{ ...remote, size: 1.5 }])).errors).toEqual([
      "File remote.zip has invalid size 1.5"
    ]);
  });

  it("rejects a unix mode that is not octal", () => {
    const file = { ...contentFile("bin/run.sh", Buffer.from("sh")), permissions: { isReadOnly: false, unixMode: "999" } };
    expect(validateManifest(makeManifest("pub.mode.v1", [file])).errors).toEqual(["File bin/run.sh has invalid unix mode 999"]);
    const ok = { ...file, permissions: { isReadOnly: false, unixMode: "0755" } };
    expect(validateManifest(makeManifest("pub.mode.v1", [ok])).ok).toBe(true);
  });

  it("rejects a dependency whose id is not a manifest id", () => {
    const dependency: ContentDependency = JSON.parse(
      '{"id":"not an id","dependencyType":"Mod","installBehavior":"RequireExisting"}'
    );
    const manifest = makeManifest("pub.deps.v1", [contentFile("a.big", Buffer.from("a"))], { dependencies: [dependency] });
    expect(validateManifest(manifest).errors).toEqual(["Dependency id not an id is invalid"]);
  });

  it("reports record schema problems the field checks do not cover", () => {
    const manifest: ContentManifest = JSON.parse(
      JSON.stringify({ ...makeManifest("pub.shape.v1", [contentFile("a.big", Buffer.from("a"))]), targetGame: "Tetris" })
    );
    const result = validateManifest(manifest);
    expect(result.ok).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Manifest field targetGame is invalid: /);
  });
});
