import type { OrderRecord, OrderStatus, SymbolFormat } from "@spotledger/shared";
import { isDecimal, ledgerTimestamp, maxDecimal, minDecimal, normalizeOrderStatus, quantize } from "@spotledger/shared";
import type { Logger } from "pino";

import { ConfigurationError, GatewayError } from "../errors/trading-errors";
import type { ExchangeTransport } from "./exchange-client";
import type { ExchangeGateway, LimitOrderRequest } from "./exchange-gateway";
import { formatSymbol, normalizeSymbol, priceEntryNames, symbolInfoFromEntry, type PriceEntry, type SymbolInfo } from "./symbol-format";

const BALANCE_FIELDS = ["available", "balance", "amount"];
const BID_FIELDS = ["bid", "buy", "highestBid"];
const ASK_FIELDS = ["ask", "sell", "lowestAsk"];
const ORDER_ID_FIELDS = ["orderId", "orderID", "id", "order_id"];
const ORDER_STATUS_FIELDS = ["orderStatus", "status", "state"];

export type NegotiationCandidates = {
  symbolFormats: readonly SymbolFormat[];
  sizeFields: readonly string[];
};

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object" || Array.isArray(v)) return null;
  return Object.fromEntries(Object.entries(v));
}

function preview(payload: unknown): string {
  return (JSON.stringify(payload) ?? String(payload)).slice(0, 250);
}

function pickDecimal(rec: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = rec[key];
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    if (typeof value === "string" && isDecimal(value)) return value.trim();
  }
  return undefined;
}

function pickString(rec: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = rec[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return undefined;
}

function priceEntries(payload: unknown): PriceEntry[] {
  if (Array.isArray(payload)) {
    return payload.map((item) => asRecord(item)).filter((item): item is PriceEntry => item !== null);
  }
  const single = asRecord(payload);
  return single ? [single] : [];
}

function moveToFront<T>(values: readonly T[], first: T): T[] {
  return [first, ...values.filter((v) => v !== first)];
}

export class RestExchangeGateway implements ExchangeGateway {
  readonly mode = "live" as const;

  private readonly symbolCache = new Map<string, SymbolInfo>();
  private symbolFormats: readonly SymbolFormat[];
  private sizeFields: readonly string[];

  constructor(
    private readonly transport: ExchangeTransport,
    candidates: NegotiationCandidates,
    private readonly logger: Logger
  ) {
    if (candidates.symbolFormats.length === 0 || candidates.sizeFields.length === 0) {
      throw new ConfigurationError("Order negotiation needs at least one symbol format and one size field.");
    }
    this.symbolFormats = [...candidates.symbolFormats];
    this.sizeFields = [...candidates.sizeFields];
  }

  /** Current candidate order; the last shape that worked leads. */
  get negotiationOrder(): NegotiationCandidates {
    return { symbolFormats: [...this.symbolFormats], sizeFields: [...this.sizeFields] };
  }

  cachedSymbol(symbol: string): SymbolInfo | undefined {
    return this.symbolCache.get(normalizeSymbol(symbol));
  }

  async getAvailableBalance(currency: string): Promise<string> {
    const code = currency.trim().toUpperCase();
    const payload = await this.transport.request(`/user/balances/${encodeURIComponent(code)}`);
    const rec = asRecord(payload);
    const available = rec ? pickDecimal(rec, BALANCE_FIELDS) : undefined;
    if (available === undefined) {
      throw new GatewayError(`Balance payload for ${code} has no available amount: ${preview(payload)}`);
    }
    return quantize(available);
  }

  async getHighestBid(symbol: string): Promise<string> {
    const bids = await this.collectPrices(symbol, BID_FIELDS);
    const best = maxDecimal(bids);
    if (best === undefined) {
      throw new GatewayError(`Cannot determine highest bid for ${normalizeSymbol(symbol)}`);
    }
    return quantize(best);
  }

  async getLowestAsk(symbol: string): Promise<string> {
    const asks = await this.collectPrices(symbol, ASK_FIELDS);
    const best = minDecimal(asks);
    if (best === undefined) {
      throw new GatewayError(`Cannot determine lowest ask for ${normalizeSymbol(symbol)}`);
    }
    return quantize(best);
  }

  async createLimitOrder(request: LimitOrderRequest): Promise<OrderRecord> {
    const symbol = normalizeSymbol(request.symbol);
    const amount = quantize(request.amount);
    const price = quantize(request.price);

    const response = await this.negotiate({ symbol, side: request.side, amount, price });
    const rec = asRecord(response) ?? {};
    const orderId = pickString(rec, ORDER_ID_FIELDS);
    if (!orderId) {
      throw new GatewayError(`Order response lacks an id: ${preview(response)}`);
    }
    const rawStatus = rec.status;

    return {
      orderId,
      symbol,
      side: request.side,
      amount,
      price,
      status: typeof rawStatus === "string" ? normalizeOrderStatus(rawStatus) : "NEW",
      createdAt: ledgerTimestamp()
    };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatus> {
    const payload = await this.transport.request(`/orders/${encodeURIComponent(orderId)}`);
    const envelope = asRecord(payload);
    const details = asRecord(envelope?.result) ?? envelope;
    if (details) {
      for (const key of ORDER_STATUS_FIELDS) {
        const value = details[key];
        if (typeof value === "string") return normalizeOrderStatus(value);
      }
    }
    throw new GatewayError(`Failed to read status for order ${orderId}: ${preview(payload)}`);
  }

  async cancelOrder(orderId: string): Promise<OrderStatus> {
    const payload = await this.transport.request(`/orders/${encodeURIComponent(orderId)}`, { method: "DELETE" });
    const rec = asRecord(payload);
    const status = rec ? pickString(rec, ORDER_STATUS_FIELDS) : undefined;
    return status ? normalizeOrderStatus(status) : "CANCELED";
  }

  private async collectPrices(symbol: string, fields: readonly string[]): Promise<string[]> {
    const target = normalizeSymbol(symbol);
    const payload = await this.transport.request("/prices");

    const prices: string[] = [];
    for (const entry of priceEntries(payload)) {
      if (!priceEntryNames(entry).some((name) => normalizeSymbol(name) === target)) continue;
      this.rememberSymbol(entry);
      const price = pickDecimal(entry, fields);
      if (price !== undefined) prices.push(price);
    }
    return prices;
  }

  private rememberSymbol(entry: PriceEntry): void {
    const remembered = symbolInfoFromEntry(entry);
    if (remembered) this.symbolCache.set(remembered.key, remembered.info);
  }

  /**
   * Bounded search over request shapes: symbol formats outside, size-field
   * names inside, at most |formats| x |fields| submissions.
   */
  private async negotiate(order: { symbol: string; side: string; amount: string; price: string }): Promise<unknown> {
    const formats = this.symbolFormats;
    const fields = this.sizeFields;
    const info = this.symbolCache.get(order.symbol);
    let attempt = 0;

    for (const [formatIndex, format] of formats.entries()) {
      const formattedSymbol = formatSymbol(order.symbol, format, info);

      for (const [fieldIndex, sizeField] of fields.entries()) {
        attempt += 1;
        const body: Record<string, unknown> = {
          symbol: formattedSymbol,
          side: order.side,
          type: "limit",
          price: order.price,
          [sizeField]: order.amount
        };

        try {
          const response = await this.transport.request("/orders", { method: "POST", body });
          this.logger.debug({ msg: "Order shape accepted", attempt, symbol: formattedSymbol, sizeField });
          this.symbolFormats = moveToFront(this.symbolFormats, format);
          this.sizeFields = moveToFront(this.sizeFields, sizeField);
          return response;
        } catch (err) {
          if (!(err instanceof GatewayError)) throw err;
          this.logger.debug({ msg: "Order shape rejected", attempt, symbol: formattedSymbol, sizeField, kind: err.kind });

          if (err.kind === "UNRECOGNIZED_PARAMETER" && fieldIndex < fields.length - 1) continue;
          if (err.kind === "INVALID_SYMBOL" && formatIndex < formats.length - 1) break;
          throw err;
        }
      }
    }

    // Unreachable with non-empty candidate lists: the last attempt either returns or throws.
    throw new GatewayError("Failed to place order: no request shape was attempted");
  }
}
