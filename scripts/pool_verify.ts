import path from "path";
import { loadPoolConfig } from "../src/config/poolConfig.js";
import { createLogger } from "../src/core/logger.js";
import { ContentStorageService } from "../src/storage/contentStorageService.js";
import { parseArgs } from "./cliArgs.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/pool_verify.ts --config <pool.yaml>",
    "",
    "notes:",
    "  - Re-hashes every stored object and checks that every object a manifest references exists",
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
  const report = await storage.verifyObjects();

  const problems = [
    ...report.corrupted.map((h) => `corrupted object ${h}`),
    ...report.missing.map((m) => `missing object ${m.hash} for ${m.manifestId}:${m.relativePath}`),
    ...report.unreadableManifests.map((p) => `unreadable manifest ${p}`)
  ];
  if (problems.length > 0) {
    process.stdout.write(`${problems.join("\n")}\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`ok (${report.objectsChecked} objects)\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
