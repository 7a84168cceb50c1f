import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "content-pool",
    level: process.env.POOL_LOG_LEVEL ?? "info",
    ...options
  });
}
