import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { PoolConfigError } from "../core/errors.js";
import { DEFAULT_HASH_CHUNK_BYTES } from "../hashing/contentHasher.js";

export interface PoolConfig {
  readonly storageRoot: string;
  readonly hashChunkBytes: number;
  readonly verifyIntegrity: boolean;
  readonly lockStaleMs: number;
  readonly lockRetries: number;
}

export const DEFAULT_LOCK_STALE_MS = 10000;
export const DEFAULT_LOCK_RETRIES = 300;

const zPoolConfigFile = z.object({
  version: z.literal(1),
  storage_root: z.string().min(1),
  hash_chunk_bytes: z.number().int().min(4096).max(64 * 1024 * 1024).default(DEFAULT_HASH_CHUNK_BYTES),
  verify_integrity: z.boolean().default(true),
  locks: z
    .object({
      stale_ms: z.number().int().min(1000).default(DEFAULT_LOCK_STALE_MS),
      retries: z.number().int().min(0).default(DEFAULT_LOCK_RETRIES)
    })
    .optional()
});

const zPoolConfig = z.object({
  storageRoot: z.string().min(1),
  hashChunkBytes: z.number().int().min(4096).max(64 * 1024 * 1024),
  verifyIntegrity: z.boolean(),
  lockStaleMs: z.number().int().min(1000),
  lockRetries: z.number().int().min(0)
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.map((p) => String(p)).join(".");
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

const ENV_TOKEN = /^\$(?:\{([A-Z0-9_]+)\}|([A-Z0-9_]+))$/;

/** `${VAR}` or `$VAR` becomes the variable's value (null when unset or blank); anything else is kept. */
function expandEnvToken(value: string): string | null {
  const match = ENV_TOKEN.exec(value.trim());
  if (!match) return value;
  const varName = match[1] ?? match[2] ?? "";
  return process.env[varName]?.trim() || null;
}

export function resolvePoolConfig(input: Partial<PoolConfig> & { storageRoot: string }): PoolConfig {
  const parsed = zPoolConfig.safeParse({
    storageRoot: input.storageRoot,
    hashChunkBytes: input.hashChunkBytes ?? DEFAULT_HASH_CHUNK_BYTES,
    verifyIntegrity: input.verifyIntegrity ?? true,
    lockStaleMs: input.lockStaleMs ?? DEFAULT_LOCK_STALE_MS,
    lockRetries: input.lockRetries ?? DEFAULT_LOCK_RETRIES
  });
  if (!parsed.success) throw new PoolConfigError(`invalid pool config: ${formatIssues(parsed.error)}`);
  return Object.freeze({ ...parsed.data, storageRoot: path.resolve(parsed.data.storageRoot) });
}

export async function loadPoolConfig(filePath: string): Promise<PoolConfig> {
  const raw = await fs.readFile(filePath, "utf8");
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    throw new PoolConfigError(`invalid pool config at ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = zPoolConfigFile.safeParse(doc);
  if (!parsed.success) {
    throw new PoolConfigError(`invalid pool config at ${filePath}: ${formatIssues(parsed.error)}`);
  }

  const storageRoot = expandEnvToken(parsed.data.storage_root);
  if (!storageRoot) {
    throw new PoolConfigError(`invalid pool config at ${filePath}: storage_root resolves to an empty value`);
  }

  return resolvePoolConfig({
    storageRoot: path.resolve(path.dirname(filePath), storageRoot),
    hashChunkBytes: parsed.data.hash_chunk_bytes,
    verifyIntegrity: parsed.data.verify_integrity,
    lockStaleMs: parsed.data.locks?.stale_ms,
    lockRetries: parsed.data.locks?.retries
  });
}
