import { z } from "zod";

import { compareDecimal, isDecimal } from "../decimal/fixed-decimal";

export const CONFIG_VERSION = 1 as const;

export const SymbolFormatSchema = z.enum(["dash", "slash", "upper", "lower"]);
export type SymbolFormat = z.infer<typeof SymbolFormatSchema>;

export const DEFAULT_SYMBOL_FORMATS: readonly SymbolFormat[] = ["dash", "slash", "upper", "lower"];
export const DEFAULT_ORDER_SIZE_FIELDS: readonly string[] = ["quantity", "amount", "volume"];

const DecimalTextSchema = z.string().trim().refine((v) => isDecimal(v) && compareDecimal(v, 0) >= 0, {
  message: "Expected a non-negative decimal"
});

const FractionSchema = DecimalTextSchema.refine((v) => isDecimal(v) && compareDecimal(v, 1) < 0, {
  message: "Expected a fraction below 1"
});

export const ExchangeSettingsSchema = z.object({
  baseUrl: z.string().url().default("https://api.ataix.kz/api"),
  apiKey: z.string().min(1).optional(),
  apiSecret: z.string().min(1).optional(),
  symbolFormat: z.string().optional(),
  orderSizeField: z.string().optional(),
  timeoutMs: z.number().int().min(1_000).max(120_000).default(20_000)
});
export type ExchangeSettings = z.infer<typeof ExchangeSettingsSchema>;

export const TradingSettingsSchema = z.object({
  quoteCurrency: z.string().min(2).default("USDT"),
  defaultSymbol: z.string().min(3).default("LTCUSDT"),
  maxSymbolPrice: DecimalTextSchema.default("0.6"),
  ladderDiscounts: z.array(FractionSchema).min(1).default(["0.02", "0.05", "0.08"]),
  interactiveDiscounts: z.array(FractionSchema).min(1).default(["0.02", "0.04", "0.06"]),
  sellMarkup: DecimalTextSchema.default("0.02")
});
export type TradingSettings = z.infer<typeof TradingSettingsSchema>;

export const SimulationSettingsSchema = z.object({
  balance: DecimalTextSchema.default("1000"),
  highestBid: DecimalTextSchema.default("0.5"),
  lowestAsk: DecimalTextSchema.default("0.51")
});
export type SimulationSettings = z.infer<typeof SimulationSettingsSchema>;

export const EngineConfigSchema = z.object({
  version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
  exchange: ExchangeSettingsSchema.default({}),
  trading: TradingSettingsSchema.default({}),
  simulation: SimulationSettingsSchema.default({})
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}

function dedupe<T>(values: readonly T[]): T[] {
  return values.filter((value, index) => values.indexOf(value) === index);
}

/** Override first (ignored unless it names a known format), then the fixed fallback order. */
export function resolveSymbolFormats(override?: string): SymbolFormat[] {
  const parsed = SymbolFormatSchema.safeParse(override?.trim().toLowerCase());
  return dedupe([...(parsed.success ? [parsed.data] : []), ...DEFAULT_SYMBOL_FORMATS]);
}

export function resolveOrderSizeFields(override?: string): string[] {
  const trimmed = override?.trim();
  return dedupe([...(trimmed ? [trimmed] : []), ...DEFAULT_ORDER_SIZE_FIELDS]);
}
