import fs from "node:fs";
import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { EngineConfig } from "@spotledger/shared";
import { EngineConfigSchema } from "@spotledger/shared";
import type { ZodError } from "zod";

import { ConfigurationError } from "../errors/trading-errors";

export function resolveDataDir(): string {
  return process.env.DATA_DIR ?? path.resolve(process.cwd(), "data");
}

function envValue(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function envInt(name: string): number | undefined {
  const value = envValue(name);
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function describeIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

@Injectable()
export class ConfigService {
  private cachedFileConfig: EngineConfig | null = null;
  private cachedMtimeMs: number | null = null;

  get dataDir(): string {
    return resolveDataDir();
  }

  get configPath(): string {
    return path.join(this.dataDir, "trader.config.json");
  }

  /** File settings (if any) with exchange settings from the environment laid over them. */
  load(): EngineConfig {
    const base = this.loadFile();
    const baseUrl = envValue("EXCHANGE_BASE_URL");
    const apiKey = envValue("EXCHANGE_API_KEY");
    const apiSecret = envValue("EXCHANGE_API_SECRET");
    const symbolFormat = envValue("EXCHANGE_SYMBOL_FORMAT");
    const orderSizeField = envValue("EXCHANGE_ORDER_SIZE_FIELD");
    const timeoutMs = envInt("EXCHANGE_TIMEOUT_MS");

    const parsed = EngineConfigSchema.safeParse({
      ...base,
      exchange: {
        ...base.exchange,
        ...(baseUrl ? { baseUrl } : {}),
        ...(apiKey ? { apiKey } : {}),
        ...(apiSecret ? { apiSecret } : {}),
        ...(symbolFormat ? { symbolFormat } : {}),
        ...(orderSizeField ? { orderSizeField } : {}),
        ...(timeoutMs === undefined ? {} : { timeoutMs })
      }
    });
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid exchange settings: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  private loadFile(): EngineConfig {
    if (!fs.existsSync(this.configPath)) {
      this.cachedFileConfig = null;
      this.cachedMtimeMs = null;
      return EngineConfigSchema.parse({});
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedFileConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedFileConfig;
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`${this.configPath} is not valid JSON`, { cause: err });
    }

    const parsed = EngineConfigSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`${this.configPath}: ${describeIssues(parsed.error)}`);
    }

    this.cachedFileConfig = parsed.data;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed.data;
  }
}
