import { describe, expect, it } from "vitest";

import { EngineConfigSchema, defaultEngineConfig, resolveOrderSizeFields, resolveSymbolFormats } from "./engine-config";

describe("defaultEngineConfig", () => {
  it("fills every section with defaults", () => {
    const config = defaultEngineConfig();
    expect(config.exchange.baseUrl).toBe("https://api.ataix.kz/api");
    expect(config.exchange.timeoutMs).toBe(20_000);
    expect(config.trading.maxSymbolPrice).toBe("0.6");
    expect(config.trading.ladderDiscounts).toEqual(["0.02", "0.05", "0.08"]);
    expect(config.trading.interactiveDiscounts).toEqual(["0.02", "0.04", "0.06"]);
    expect(config.trading.sellMarkup).toBe("0.02");
    expect(config.simulation).toEqual({ balance: "1000", highestBid: "0.5", lowestAsk: "0.51" });
  });

  it("rejects discounts of one or more", () => {
    expect(EngineConfigSchema.safeParse({ trading: { ladderDiscounts: ["1"] } }).success).toBe(false);
    expect(EngineConfigSchema.safeParse({ trading: { ladderDiscounts: ["abc"] } }).success).toBe(false);
  });
});

describe("negotiation candidates", () => {
  it("puts a valid symbol-format override first without duplicates", () => {
    expect(resolveSymbolFormats(" SLASH ")).toEqual(["slash", "dash", "upper", "lower"]);
    expect(resolveSymbolFormats()).toEqual(["dash", "slash", "upper", "lower"]);
  });

  it("ignores unknown symbol formats", () => {
    expect(resolveSymbolFormats("colon")).toEqual(["dash", "slash", "upper", "lower"]);
  });

  it("puts a size-field override first", () => {
    expect(resolveOrderSizeFields("qty")).toEqual(["qty", "quantity", "amount", "volume"]);
    expect(resolveOrderSizeFields("amount")).toEqual(["amount", "quantity", "volume"]);
    expect(resolveOrderSizeFields("  ")).toEqual(["quantity", "amount", "volume"]);
  });
});
