import { randomUUID } from "node:crypto";

import type { DecimalInput, OrderRecord, OrderStatus } from "@spotledger/shared";
import { isTerminalStatus, ledgerTimestamp, quantize } from "@spotledger/shared";
import type { Logger } from "pino";

import type { ExchangeGateway, LimitOrderRequest } from "./exchange-gateway";
import { normalizeSymbol } from "./symbol-format";

export type SimulatedMarket = {
  balance: DecimalInput;
  highestBid: DecimalInput;
  lowestAsk: DecimalInput;
  /** Id factory for placed orders; defaults to `dry-<hex>`. */
  nextOrderId?: () => string;
};

function defaultOrderId(): string {
  return `dry-${randomUUID().replace(/-/g, "").slice(0, 16)}`;
}

/** Dry-run gateway: fixed market figures, orders kept in memory for one process. */
export class SimulatedExchangeGateway implements ExchangeGateway {
  readonly mode = "simulated" as const;

  private readonly orders = new Map<string, OrderRecord>();
  private readonly balance: string;
  private readonly highestBid: string;
  private readonly lowestAsk: string;
  private readonly nextOrderId: () => string;

  constructor(
    market: SimulatedMarket,
    private readonly logger?: Logger
  ) {
    this.balance = quantize(market.balance);
    this.highestBid = quantize(market.highestBid);
    this.lowestAsk = quantize(market.lowestAsk);
    this.nextOrderId = market.nextOrderId ?? defaultOrderId;
  }

  async getAvailableBalance(_currency: string): Promise<string> {
    return this.balance;
  }

  async getHighestBid(_symbol: string): Promise<string> {
    return this.highestBid;
  }

  async getLowestAsk(_symbol: string): Promise<string> {
    return this.lowestAsk;
  }

  async createLimitOrder(request: LimitOrderRequest): Promise<OrderRecord> {
    const record: OrderRecord = {
      orderId: this.nextOrderId(),
      symbol: normalizeSymbol(request.symbol),
      side: request.side,
      amount: quantize(request.amount),
      price: quantize(request.price),
      status: "NEW",
      createdAt: ledgerTimestamp()
    };
    this.orders.set(record.orderId, record);
    this.logger?.info({ msg: "Simulated order placed", orderId: record.orderId, side: record.side, price: record.price });
    return { ...record };
  }

  async getOrderStatus(orderId: string): Promise<OrderStatus> {
    return this.orders.get(orderId)?.status ?? "UNKNOWN";
  }

  async cancelOrder(orderId: string): Promise<OrderStatus> {
    const order = this.orders.get(orderId);
    if (!order) return "UNKNOWN";
    if (isTerminalStatus(order.status)) return order.status;
    order.status = "CANCELED";
    return order.status;
  }

  /** Moves a placed order to another status, as the market would. Returns false for unknown ids. */
  settleOrder(orderId: string, status: OrderStatus): boolean {
    const order = this.orders.get(orderId);
    if (!order) return false;
    order.status = status;
    return true;
  }

  placedOrders(): OrderRecord[] {
    return [...this.orders.values()].map((order) => ({ ...order }));
  }
}
