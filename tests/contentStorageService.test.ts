import { describe, it, expect, vi } from "vitest";
import { readFile, rm, stat, writeFile } from "fs/promises";
import path from "path";

import { ContentStoreError, ManifestRecordError, OperationCancelledError } from "../src/core/errors.js";
import { manifestId } from "../src/core/ids.js";
import { hashBuffer } from "../src/hashing/contentHasher.js";
import { ContentStorageService } from "../src/storage/contentStorageService.js";
import { makeManifest, makeTempDir, silentLogger, testConfig, writeSourceFile } from "./testUtils.js";

async function withStorage(fn: (storage: ContentStorageService, dir: string) => Promise<void>): Promise<void> {
  const dir = await makeTempDir("storage");
  try {
    const storage = new ContentStorageService(testConfig(path.join(dir, "pool")), silentLogger);
    await storage.init();
    await fn(storage, dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Holds every object put until the returned `open` is called; `entered` resolves on the first put. */
function gateObjectPuts(storage: ContentStorageService): { entered: Promise<void>; open: () => void } {
  const put = storage.objects.putFromLocalPath.bind(storage.objects);
  let open = (): void => {};
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  let enter = (): void => {};
  const entered = new Promise<void>((resolve) => {
    enter = resolve;
  });
  vi.spyOn(storage.objects, "putFromLocalPath").mockImplementation(async (sourcePath, opts) => {
    enter();
    await gate;
    return put(sourcePath, opts);
  });
  return { entered, open };
}

async function exists(p: string): Promise<boolean> {
  return stat(p).then(
    () => true,
    () => false
  );
}

describe("content storage service", () => {
  it("stores content and writes the record last", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const file = await writeSourceFile(src, "Data/game.ini", "[Game]\n");
      const manifest = makeManifest("pub.mod.v1", [{ ...file, hash: file.hash?.toUpperCase(), size: 0 }]);

      const result = await storage.storeContent(manifest, src);
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.files).toEqual([{ ...file, size: 7 }]);
      expect(await storage.readManifestRecord(manifest.id)).toEqual(result.value);
      expect(await storage.isContentStored(manifestId("PUB.MOD.V1"))).toEqual({ ok: true, value: true });
      expect(await exists(storage.getContentDirectoryPath(manifest.id))).toBe(true);
      expect(await storage.listManifestRecordPaths()).toEqual([storage.getManifestStoragePath(manifest.id)]);
    });
  });

  it("records the source directory of base manifests", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "install");
      const file = await writeSourceFile(src, "generals.exe", "exe");
      const manifest = makeManifest("1.0.steam.gameinstallation.generals", [file], { contentType: "GameInstallation" });

      expect((await storage.storeContent(manifest, src)).ok).toBe(true);
      expect(await readFile(storage.layout.sourcePathFile(manifest.id), "utf8")).toBe(path.resolve(src));
    });
  });

  it("skips missing optional files and drops them from the record", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const present = await writeSourceFile(src, "a.txt", "a");
      const optional = { ...present, relativePath: "extras/readme.txt", hash: hashBuffer("readme"), isRequired: false };

      const result = await storage.storeContent(makeManifest("pub.opt.v1", [present, optional]), src);
      expect(result.ok && result.value.files.map((f) => f.relativePath)).toEqual(["a.txt"]);
    });
  });

  it("writes nothing when a required file is missing", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const present = await writeSourceFile(src, "a.txt", "a");
      const missing = { ...present, relativePath: "b.txt", hash: hashBuffer("b") };
      const manifest = makeManifest("pub.missing.v1", [present, missing]);

      expect(await storage.storeContent(manifest, src)).toEqual({
        ok: false,
        error: "Storage failed: Required file not found: b.txt",
        errors: ["Storage failed: Required file not found: b.txt"]
      });
      expect(await storage.readManifestRecord(manifest.id)).toBeNull();
      expect(await exists(storage.getContentDirectoryPath(manifest.id))).toBe(false);
      // Objects written before the failure stay until garbage collection.
      expect(await storage.objects.listHashes()).toEqual([present.hash]);
    });
  });

  it("refuses paths that escape the source directory", async () => {
    await withStorage(async (storage, dir) => {
      await writeFile(path.join(dir, "secret.txt"), "secret");
      const src = path.join(dir, "src");
      const escaping = await writeSourceFile(src, "ok.txt", "secret");
      const manifest = makeManifest("pub.escape.v1", [{ ...escaping, relativePath: "../secret.txt" }]);

      const result = await storage.storeContent(manifest, src);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBe("Storage failed: unsafe relative path: ../secret.txt");
    });
  });

  it("fails for a missing source directory", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "nowhere");
      const manifest = makeManifest("pub.none.v1", [{ ...(await writeSourceFile(dir, "x.txt", "x")) }]);
      const result = await storage.storeContent(manifest, src);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBe(`Source directory does not exist: ${src}`);
    });
  });

  it("stops between files when cancelled", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const manifest = makeManifest("pub.cancel.v1", [await writeSourceFile(src, "a.txt", "a")]);
      const controller = new AbortController();
      controller.abort();

      const result = await storage.storeContent(manifest, src, { signal: controller.signal });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBe(`Storage failed: ${new OperationCancelledError("store content for pub.cancel.v1").message}`);
      expect(await storage.readManifestRecord(manifest.id)).toBeNull();
    });
  });

  it("throws ManifestRecordError for a corrupted record", async () => {
    await withStorage(async (storage) => {
      const id = manifestId("pub.corrupt.v1");
      await writeFile(storage.getManifestStoragePath(id), '{"id": "pub.corr', "utf8");
      await expect(storage.readManifestRecord(id)).rejects.toBeInstanceOf(ManifestRecordError);
    });
  });

  it("removes only objects no other manifest references", async () => {
    await withStorage(async (storage, dir) => {
      const srcA = path.join(dir, "a");
      const srcB = path.join(dir, "b");
      const sharedA = await writeSourceFile(srcA, "shared.big", "shared-bytes");
      const unique = await writeSourceFile(srcA, "unique.big", "unique-to-a");
      const sharedB = await writeSourceFile(srcB, "Data/shared.big", "shared-bytes");

      const a = makeManifest("pub.a.v1", [sharedA, unique]);
      const b = makeManifest("pub.b.v1", [sharedB]);
      expect((await storage.storeContent(a, srcA)).ok).toBe(true);
      expect((await storage.storeContent(b, srcB)).ok).toBe(true);
      expect(await storage.getStorageStats()).toEqual({ manifestCount: 2, objectCount: 2, objectBytes: 12 + 11 });

      expect(await storage.removeContent(a.id)).toEqual({
        ok: true,
        value: { removed: true, objectsDeleted: 1, bytesFreed: 11 }
      });
      expect(await storage.objects.listHashes()).toEqual([sharedB.hash]);

      expect(await storage.removeContent(a.id)).toEqual({
        ok: true,
        value: { removed: false, objectsDeleted: 0, bytesFreed: 0 }
      });
    });
  });

  it("keeps an object that a store in flight is about to reference", async () => {
    await withStorage(async (storage, dir) => {
      const srcA = path.join(dir, "a");
      const srcB = path.join(dir, "b");
      const first = await writeSourceFile(srcA, "shared.big", "shared-bytes");
      const second = await writeSourceFile(srcB, "Data/shared.big", "shared-bytes");
      const a = makeManifest("pub.a.v1", [first]);
      const b = makeManifest("pub.b.v1", [second]);
      expect((await storage.storeContent(a, srcA)).ok).toBe(true);

      const gate = gateObjectPuts(storage);
      const pending = storage.storeContent(b, srcB);
      try {
        await gate.entered;
        expect(await storage.removeContent(a.id)).toEqual({
          ok: true,
          value: { removed: true, objectsDeleted: 0, bytesFreed: 0 }
        });
        expect(await storage.objects.listHashes()).toEqual([first.hash]);
      } finally {
        gate.open();
      }

      const stored = await pending;
      expect(stored).toEqual({ ok: true, value: b });
      expect(await storage.readManifestRecord(b.id)).toEqual(b);
      expect(await storage.objects.listHashes()).toEqual([second.hash]);
      expect(await storage.verifyObjects()).toMatchObject({ corrupted: [], missing: [] });
    });
  });

  it("protects in-flight objects declared with untrimmed hashes", async () => {
    await withStorage(async (storage, dir) => {
      const srcA = path.join(dir, "a");
      const srcB = path.join(dir, "b");
      const first = await writeSourceFile(srcA, "shared.big", "padded-bytes");
      const second = await writeSourceFile(srcB, "shared.big", "padded-bytes");
      expect((await storage.storeContent(makeManifest("pub.a.v1", [first]), srcA)).ok).toBe(true);

      const gate = gateObjectPuts(storage);
      const pending = storage.storeContent(
        makeManifest("pub.b.v1", [{ ...second, hash: `  ${second.hash?.toUpperCase() ?? ""}\n` }]),
        srcB
      );
      try {
        await gate.entered;
        const removed = await storage.removeContent(manifestId("pub.a.v1"));
        expect(removed.ok && removed.value.objectsDeleted).toBe(0);
        expect(await storage.objects.has(first.hash ?? "")).toBe(true);
      } finally {
        gate.open();
      }

      const stored = await pending;
      expect(stored.ok && stored.value.files).toEqual([second]);
    });
  });

  it("keeps every object while another record is unreadable", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const file = await writeSourceFile(src, "only.big", "only");
      const manifest = makeManifest("pub.only.v1", [file]);
      expect((await storage.storeContent(manifest, src)).ok).toBe(true);

      const corrupt = manifestId("pub.corrupt.v1");
      await writeFile(storage.getManifestStoragePath(corrupt), "{", "utf8");

      expect(await storage.removeContent(manifest.id)).toEqual({
        ok: true,
        value: { removed: true, objectsDeleted: 0, bytesFreed: 0 }
      });
      expect(await storage.objects.has(file.hash ?? "")).toBe(true);
      await expect(storage.collectGarbage()).rejects.toBeInstanceOf(ContentStoreError);

      expect(await storage.removeContent(corrupt)).toEqual({
        ok: true,
        value: { removed: true, objectsDeleted: 0, bytesFreed: 0 }
      });
      expect(await storage.collectGarbage({ dryRun: true })).toEqual({ objectsDeleted: 1, bytesFreed: 4, dryRun: true });
      expect(await storage.objects.has(file.hash ?? "")).toBe(true);
      expect(await storage.collectGarbage()).toEqual({ objectsDeleted: 1, bytesFreed: 4, dryRun: false });
      expect(await storage.objects.listHashes()).toEqual([]);
    });
  });

  it("reports corrupted and missing objects", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const kept = await writeSourceFile(src, "kept.txt", "kept");
      const lost = await writeSourceFile(src, "lost.txt", "lost");
      const manifest = makeManifest("pub.scan.v1", [kept, lost]);
      expect((await storage.storeContent(manifest, src)).ok).toBe(true);

      const keptHash = kept.hash ?? "";
      const lostHash = lost.hash ?? "";
      await writeFile(storage.objects.objectPath(keptHash), "changed");
      await rm(storage.objects.objectPath(lostHash));

      expect(await storage.verifyObjects()).toEqual({
        objectsChecked: 1,
        corrupted: [keptHash],
        missing: [{ manifestId: "pub.scan.v1", relativePath: "lost.txt", hash: lostHash }],
        unreadableManifests: []
      });
    });
  });

  it("retrieves stored content into a target directory", async () => {
    await withStorage(async (storage, dir) => {
      const src = path.join(dir, "src");
      const exe = await writeSourceFile(src, "bin/tool.exe", "binary");
      const manifest = makeManifest("pub.get.v1", [{ ...exe, isExecutable: true }], { requiredDirectories: ["Maps"] });
      expect((await storage.storeContent(manifest, src)).ok).toBe(true);

      const target = path.join(dir, "out");
      expect(await storage.retrieveContent(manifest.id, target)).toEqual({ ok: true, value: target });
      expect(await readFile(path.join(target, "bin", "tool.exe"), "utf8")).toBe("binary");
      expect((await stat(path.join(target, "bin", "tool.exe"))).mode & 0o777).toBe(0o755);
      expect((await stat(path.join(target, "Maps"))).isDirectory()).toBe(true);

      const missing = await storage.retrieveContent(manifestId("pub.absent.v1"), target);
      expect(missing.ok).toBe(false);
      if (!missing.ok) expect(missing.error).toBe("Content not found for manifest pub.absent.v1");
    });
  });
});
