import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "./pino-logger";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "logs-"));
  vi.stubEnv("LOG_DIR", path.join(dir, "nested"));
});

afterEach(() => {
  // The file stream opens asynchronously, so the directory is left to the OS.
  vi.unstubAllEnvs();
});

describe("createLogger", () => {
  it("takes its level from LOG_LEVEL and creates the log directory", () => {
    vi.stubEnv("LOG_LEVEL", " DEBUG ");

    const logger = createLogger();

    expect(logger.level).toBe("debug");
    expect(fs.existsSync(path.join(dir, "nested"))).toBe(true);
  });

  it("falls back to info for unknown levels", () => {
    vi.stubEnv("LOG_LEVEL", "chatty");

    expect(createLogger({ stdoutLevel: "warn" }).level).toBe("info");
  });
});
