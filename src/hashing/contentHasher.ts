import { createHash } from "crypto";
import { promises as fs } from "fs";
import type { Readable } from "stream";
import { throwIfAborted } from "../core/errors.js";

export const DEFAULT_HASH_CHUNK_BYTES = 1024 * 1024;

export interface FileHash {
  hash: string;
  sizeBytes: number;
}

export interface HashProvider {
  computeFileHash(filePath: string, signal?: AbortSignal): Promise<string>;
}

export function hashBuffer(bytes: Uint8Array | string): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export async function hashStream(input: Readable, opts: { signal?: AbortSignal } = {}): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of input) {
    throwIfAborted(opts.signal, "hash");
    hash.update(chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk), "utf8"));
  }
  return hash.digest("hex");
}

export async function hashFile(
  filePath: string,
  opts: { chunkBytes?: number; signal?: AbortSignal } = {}
): Promise<FileHash> {
  const hash = createHash("sha256");
  const fd = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(opts.chunkBytes ?? DEFAULT_HASH_CHUNK_BYTES);
    let total = 0;
    for (;;) {
      throwIfAborted(opts.signal, "hash");
      const { bytesRead } = await fd.read(buf, 0, buf.length, null);
      if (bytesRead === 0) break;
      total += bytesRead;
      hash.update(buf.subarray(0, bytesRead));
    }
    return { hash: hash.digest("hex"), sizeBytes: total };
  } finally {
    await fd.close();
  }
}

export class Sha256HashProvider implements HashProvider {
  constructor(private readonly chunkBytes: number = DEFAULT_HASH_CHUNK_BYTES) {}

  async computeFileHash(filePath: string, signal?: AbortSignal): Promise<string> {
    const { hash } = await hashFile(filePath, { chunkBytes: this.chunkBytes, signal });
    return hash;
  }
}
