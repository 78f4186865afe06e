import type { SymbolFormat } from "@spotledger/shared";

export type SymbolInfo = {
  base: string;
  quote: string;
  /** Spelling last seen in the price feed. */
  raw: string;
};

export type PriceEntry = Record<string, unknown>;

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** Upper-case alphanumerics only: `ltc/usdt`, `LTC-USDT` and `LTCUSDT` share one key. */
export function normalizeSymbol(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, "");
}

export function priceEntryNames(entry: PriceEntry): string[] {
  return [text(entry.symbol), text(entry.symbolCode), `${text(entry.baseCurrency)}${text(entry.quoteCurrency)}`].filter(Boolean);
}

export function symbolInfoFromEntry(entry: PriceEntry): { key: string; info: SymbolInfo } | null {
  const raw = text(entry.symbol) || text(entry.symbolCode);
  let base = text(entry.baseCurrency) || text(entry.baseCurrencyCode);
  let quote = text(entry.quoteCurrency) || text(entry.quoteCurrencyCode);

  if ((!base || !quote) && raw) {
    const parts = raw.replace(/[-_]/g, "/").split("/");
    if (parts.length === 2) {
      base = base || parts[0];
      quote = quote || parts[1];
    }
  }

  const key = normalizeSymbol(raw || `${base}${quote}`);
  if (!key) return null;
  return { key, info: { base: base.toUpperCase(), quote: quote.toUpperCase(), raw } };
}

/**
 * Spells a pair for the order endpoint. Without a cache entry the quote is
 * assumed to be the trailing four characters (USDT, USDC, ...).
 */
export function formatSymbol(symbol: string, format: SymbolFormat, info?: SymbolInfo): string {
  const normalized = normalizeSymbol(symbol);
  const base = info?.base && info.quote ? info.base : normalized.slice(0, -4);
  const quote = info?.base && info.quote ? info.quote : normalized.slice(-4);

  switch (format) {
    case "upper":
      return `${base}${quote}`;
    case "lower":
      return `${base}${quote}`.toLowerCase();
    case "slash":
      return `${base}/${quote}`;
    case "dash":
      return `${base}-${quote}`;
  }
}
