import path from "path";
import { loadPoolConfig } from "../src/config/poolConfig.js";
import { createLogger } from "../src/core/logger.js";
import { ContentStorageService } from "../src/storage/contentStorageService.js";
import { parseArgs } from "./cliArgs.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/pool_gc.ts --config <pool.yaml> [--dry-run]",
    "",
    "notes:",
    "  - Deletes every stored object that no manifest references",
    "  - Refuses to run while any manifest record is unreadable",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const configPath = args.config;
  if (typeof configPath !== "string") throw new Error(`--config is required\n\n${usage()}`);

  const config = await loadPoolConfig(path.resolve(configPath));
  const storage = new ContentStorageService(config, createLogger({ level: process.env.POOL_LOG_LEVEL ?? "warn" }));
  const result = await storage.collectGarbage({ dryRun: args["dry-run"] === true });

  const verb = result.dryRun ? "would delete" : "deleted";
  process.stdout.write(`${verb} ${result.objectsDeleted} objects (${result.bytesFreed} bytes)\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
