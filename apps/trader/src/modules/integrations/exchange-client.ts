import { GatewayError, type RejectionKind } from "../errors/trading-errors";

export type ExchangeClientOptions = {
  baseUrl: string;
  apiKey?: string;
  apiSecret?: string;
  timeoutMs?: number;
};

export type ExchangeHttpMethod = "GET" | "POST" | "DELETE";

export type ExchangeRequestOptions = {
  method?: ExchangeHttpMethod;
  body?: Record<string, unknown>;
};

/** Authenticated request/response boundary; resolves to the unwrapped `result`. */
export interface ExchangeTransport {
  request(path: string, options?: ExchangeRequestOptions): Promise<unknown>;
}

const UNRECOGNIZED_PARAMETER_PATTERN = /unexpected parameter|unknown parameter|unrecognized parameter|parameter .* not allowed/i;
const INVALID_SYMBOL_PATTERN = /invalid symbol|unknown symbol|symbol not found|invalid (trading )?pair/i;

export function classifyRejection(message: string): RejectionKind {
  if (UNRECOGNIZED_PARAMETER_PATTERN.test(message)) return "UNRECOGNIZED_PARAMETER";
  if (INVALID_SYMBOL_PATTERN.test(message)) return "INVALID_SYMBOL";
  return "OTHER";
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object" || Array.isArray(v)) return null;
  return Object.fromEntries(Object.entries(v));
}

function extractMessage(payload: unknown): string | null {
  const rec = asRecord(payload);
  if (!rec) return null;
  for (const key of ["message", "msg", "error"]) {
    const value = rec[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export class ExchangeClient implements ExchangeTransport {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly apiSecret?: string;
  private readonly timeoutMs: number;

  constructor(options: ExchangeClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  async request(path: string, options?: ExchangeRequestOptions): Promise<unknown> {
    const method: ExchangeHttpMethod = options?.method ?? "GET";
    const label = `${method} ${path}`;

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const res = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          ...(this.apiKey ? { "X-API-KEY": this.apiKey } : {}),
          ...(this.apiSecret ? { "X-API-SECRET": this.apiSecret } : {})
        },
        body: options?.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal
      });
      status = res.status;
      ok = res.ok;
      text = await res.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new GatewayError(`${label} timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new GatewayError(`${label} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    } finally {
      clearTimeout(t);
    }

    const parsed = text.trim() ? parseJson(text) : null;

    if (!ok) {
      const message = (parsed?.ok ? extractMessage(parsed.value) : null) ?? text.slice(0, 250);
      throw new GatewayError(`Exchange HTTP ${status} on ${label}: ${message}`, {
        kind: classifyRejection(message),
        status
      });
    }

    if (parsed === null) {
      return undefined;
    }
    if (!parsed.ok) {
      throw new GatewayError(`${label} returned a non-JSON body: ${text.slice(0, 250)}`, { status });
    }

    const envelope = asRecord(parsed.value);
    if (envelope && envelope.status === false) {
      const message = extractMessage(envelope) ?? JSON.stringify(envelope).slice(0, 250);
      throw new GatewayError(`Exchange rejected ${label}: ${message}`, {
        kind: classifyRejection(message),
        status
      });
    }

    return envelope && "result" in envelope ? envelope.result : parsed.value;
  }
}
