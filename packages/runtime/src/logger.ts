import winston from "winston";

import type { Config } from "./config.js";

export type Logger = winston.Logger;

export type LoggerOptions = Partial<Pick<Config, "LOG_LEVEL" | "NODE_ENV">> & {
  silent?: boolean;
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const nodeEnv = opts.NODE_ENV ?? process.env.NODE_ENV;

  return winston.createLogger({
    level: opts.LOG_LEVEL ?? "info",
    silent: opts.silent ?? nodeEnv === "test",
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: "equistat" },
    // stderr keeps command output on stdout machine-readable
    transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "http", "verbose", "debug"] })],
  });
}

let shared: Logger | null = null;

export function getLogger(): Logger {
  if (!shared) shared = createLogger();
  return shared;
}

export function setLogger(logger: Logger): void {
  shared = logger;
}
