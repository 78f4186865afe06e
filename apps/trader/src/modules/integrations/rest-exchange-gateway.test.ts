import fc from "fast-check";
import pino from "pino";
import { describe, expect, it } from "vitest";

import { ConfigurationError, GatewayError, type RejectionKind } from "../errors/trading-errors";
import type { ExchangeRequestOptions, ExchangeTransport } from "./exchange-client";
import { RestExchangeGateway } from "./rest-exchange-gateway";

type Call = { path: string; options?: ExchangeRequestOptions };
type Handler = (path: string, options: ExchangeRequestOptions | undefined, call: number) => unknown;

class FakeTransport implements ExchangeTransport {
  readonly calls: Call[] = [];

  constructor(private readonly handler: Handler) {}

  async request(path: string, options?: ExchangeRequestOptions): Promise<unknown> {
    this.calls.push({ path, options });
    return this.handler(path, options, this.calls.length);
  }
}

const logger = pino({ level: "silent" });
const candidates = { symbolFormats: ["dash", "slash", "upper", "lower"] as const, sizeFields: ["quantity", "amount", "volume"] };

function gatewayWith(handler: Handler): { gateway: RestExchangeGateway; transport: FakeTransport } {
  const transport = new FakeTransport(handler);
  return { gateway: new RestExchangeGateway(transport, candidates, logger), transport };
}

function reject(kind: RejectionKind): never {
  throw new GatewayError(`rejected: ${kind}`, { kind });
}

const buyOrder = { symbol: "LTCUSDT", side: "buy" as const, amount: "10", price: "0.49" };

describe("RestExchangeGateway market data", () => {
  const prices = [
    { symbol: "LTC-USDT", baseCurrency: "LTC", quoteCurrency: "USDT", bid: "0.49", ask: "0.52" },
    { symbol: "LTC/USDT", bid: 0.5, ask: "0.51" },
    { symbol: "BTC-USDT", bid: "100", ask: "101" }
  ];

  it("returns the best bid and ask across matching entries", async () => {
    const { gateway } = gatewayWith(() => prices);

    await expect(gateway.getHighestBid("ltcusdt")).resolves.toBe("0.50000000");
    await expect(gateway.getLowestAsk("LTC-USDT")).resolves.toBe("0.51000000");
    expect(gateway.cachedSymbol("LTCUSDT")).toEqual({ base: "LTC", quote: "USDT", raw: "LTC/USDT" });
  });

  it("skips prices with out-of-range exponents", async () => {
    const { gateway } = gatewayWith(() => [
      { symbol: "LTC-USDT", bid: "1e-10000000" },
      { symbol: "LTC-USDT", bid: "0.5" }
    ]);

    await expect(gateway.getHighestBid("LTCUSDT")).resolves.toBe("0.50000000");
  });

  it("fails when no entry matches the pair", async () => {
    const { gateway } = gatewayWith(() => prices);

    await expect(gateway.getHighestBid("XRPUSDT")).rejects.toThrow("Cannot determine highest bid for XRPUSDT");
  });

  it("reads the available balance and quantizes it", async () => {
    const { gateway, transport } = gatewayWith(() => ({ currency: "USDT", available: "12.345678912" }));

    await expect(gateway.getAvailableBalance("usdt")).resolves.toBe("12.34567891");
    expect(transport.calls[0].path).toBe("/user/balances/USDT");
  });

  it("rejects a balance payload without an amount", async () => {
    const { gateway } = gatewayWith(() => ({ currency: "USDT" }));

    await expect(gateway.getAvailableBalance("USDT")).rejects.toBeInstanceOf(GatewayError);
  });
});

describe("RestExchangeGateway order negotiation", () => {
  it("moves to the next size field when a parameter is not recognized", async () => {
    const { gateway, transport } = gatewayWith((_path, options) => {
      if (options?.body && "quantity" in options.body) reject("UNRECOGNIZED_PARAMETER");
      return { orderId: 42, status: "open" };
    });

    const record = await gateway.createLimitOrder(buyOrder);

    expect(record).toMatchObject({
      orderId: "42",
      symbol: "LTCUSDT",
      side: "buy",
      amount: "10.00000000",
      price: "0.49000000",
      status: "NEW"
    });
    expect(transport.calls).toHaveLength(2);
    expect(transport.calls[1].options).toEqual({
      method: "POST",
      body: { symbol: "LTC-USDT", side: "buy", type: "limit", price: "0.49000000", amount: "10.00000000" }
    });
    expect(gateway.negotiationOrder.sizeFields).toEqual(["amount", "quantity", "volume"]);
  });

  it("moves to the next symbol format when the symbol is rejected", async () => {
    const { gateway, transport } = gatewayWith((_path, options) => {
      const symbol = options?.body?.symbol;
      if (typeof symbol === "string" && /[-/]/.test(symbol)) reject("INVALID_SYMBOL");
      return { id: "abc" };
    });

    const record = await gateway.createLimitOrder(buyOrder);

    expect(record.orderId).toBe("abc");
    expect(transport.calls.map((c) => c.options?.body?.symbol)).toEqual(["LTC-USDT", "LTC/USDT", "LTCUSDT"]);
    expect(gateway.negotiationOrder.symbolFormats).toEqual(["upper", "dash", "slash", "lower"]);
  });

  it("starts later placements with the shape that worked", async () => {
    const { gateway, transport } = gatewayWith((_path, options) => {
      const body = options?.body ?? {};
      if (body.symbol !== "LTCUSDT") reject("INVALID_SYMBOL");
      if (!("volume" in body)) reject("UNRECOGNIZED_PARAMETER");
      return { orderId: "ok" };
    });

    await gateway.createLimitOrder(buyOrder);
    const firstRun = transport.calls.length;
    await gateway.createLimitOrder(buyOrder);

    expect(transport.calls.length - firstRun).toBe(1);
  });

  it("spells the symbol from the price feed when it has seen the pair", async () => {
    const { gateway, transport } = gatewayWith((path) => {
      if (path === "/prices") return [{ symbol: "ETH_BTC", bid: "0.05", ask: "0.051" }];
      return { orderId: "eth-1" };
    });

    await gateway.getHighestBid("ETHBTC");
    await gateway.createLimitOrder({ symbol: "ETHBTC", side: "sell", amount: "1", price: "0.06" });

    expect(transport.calls[1].options?.body?.symbol).toBe("ETH-BTC");
  });

  it("stops at the first rejection of any other kind", async () => {
    const { gateway, transport } = gatewayWith(() => reject("OTHER"));

    await expect(gateway.createLimitOrder(buyOrder)).rejects.toThrow("rejected: OTHER");
    expect(transport.calls).toHaveLength(1);
  });

  it("surfaces a parameter rejection on the last size field", async () => {
    const { gateway, transport } = gatewayWith(() => reject("UNRECOGNIZED_PARAMETER"));

    await expect(gateway.createLimitOrder(buyOrder)).rejects.toThrow("rejected: UNRECOGNIZED_PARAMETER");
    expect(transport.calls).toHaveLength(3);
  });

  it("surfaces a symbol rejection on the last format", async () => {
    const { gateway, transport } = gatewayWith(() => reject("INVALID_SYMBOL"));

    await expect(gateway.createLimitOrder(buyOrder)).rejects.toThrow("rejected: INVALID_SYMBOL");
    expect(transport.calls.map((c) => c.options?.body?.symbol)).toEqual(["LTC-USDT", "LTC/USDT", "LTCUSDT", "ltcusdt"]);
  });

  it("never makes more attempts than there are shapes, and none after an OTHER rejection", async () => {
    const outcome = fc.constantFrom<RejectionKind | "ACCEPT">("UNRECOGNIZED_PARAMETER", "INVALID_SYMBOL", "OTHER", "ACCEPT");

    await fc.assert(
      fc.asyncProperty(fc.array(outcome, { minLength: 12, maxLength: 12 }), async (script) => {
        const { gateway, transport } = gatewayWith((_path, _options, call) => {
          const next = script[call - 1];
          if (next !== "ACCEPT") reject(next);
          return { orderId: `o-${call}` };
        });

        await gateway.createLimitOrder(buyOrder).catch((err: unknown) => {
          if (!(err instanceof GatewayError)) throw err;
        });

        expect(transport.calls.length).toBeLessThanOrEqual(12);
        const firstOther = script.indexOf("OTHER");
        if (firstOther >= 0 && firstOther < transport.calls.length) {
          expect(transport.calls).toHaveLength(firstOther + 1);
        }
      })
    );
  });

  it("requires an order id in the response", async () => {
    const { gateway } = gatewayWith(() => ({ status: "open" }));

    await expect(gateway.createLimitOrder(buyOrder)).rejects.toThrow('Order response lacks an id: {"status":"open"}');
  });

  it("needs at least one candidate of each kind", () => {
    expect(() => new RestExchangeGateway(new FakeTransport(() => null), { symbolFormats: [], sizeFields: ["amount"] }, logger)).toThrow(
      ConfigurationError
    );
  });
});

describe("RestExchangeGateway order status", () => {
  it("reads and normalizes the remote status", async () => {
    const { gateway, transport } = gatewayWith(() => ({ result: { orderStatus: "filled" } }));

    await expect(gateway.getOrderStatus("42")).resolves.toBe("FILLED");
    expect(transport.calls[0].path).toBe("/orders/42");
  });

  it("fails when the payload carries no status", async () => {
    const { gateway } = gatewayWith(() => ({ orderId: "42" }));

    await expect(gateway.getOrderStatus("42")).rejects.toThrow('Failed to read status for order 42: {"orderId":"42"}');
  });

  it("cancels with DELETE and defaults to CANCELED", async () => {
    const { gateway, transport } = gatewayWith(() => undefined);

    await expect(gateway.cancelOrder("42")).resolves.toBe("CANCELED");
    expect(transport.calls[0]).toEqual({ path: "/orders/42", options: { method: "DELETE" } });
  });

  it("reports the status returned by a cancel", async () => {
    const { gateway } = gatewayWith(() => ({ status: "filled" }));

    await expect(gateway.cancelOrder("42")).resolves.toBe("FILLED");
  });
});
