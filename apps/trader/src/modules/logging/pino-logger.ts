import fs from "node:fs";
import path from "node:path";

import pino from "pino";

import { resolveDataDir } from "../config/config.service";

export type CreateLoggerOptions = {
  /** Minimum level echoed to stdout; the log file always gets `LOG_LEVEL`. */
  stdoutLevel?: pino.Level;
};

const LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function resolveLevel(raw: string | undefined): pino.Level {
  const wanted = raw?.trim().toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? "info";
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const logDir = process.env.LOG_DIR ?? path.join(resolveDataDir(), "logs");
  fs.mkdirSync(logDir, { recursive: true });

  const level = resolveLevel(process.env.LOG_LEVEL);
  const destination = pino.destination({
    dest: path.join(logDir, "trader.log"),
    sync: false
  });

  return pino(
    {
      level,
      base: undefined
    },
    pino.multistream([
      { level: options.stdoutLevel ?? level, stream: process.stdout },
      { level, stream: destination }
    ])
  );
}
