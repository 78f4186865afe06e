import type { DecimalInput, OrderRecord, OrderSide, OrderStatus } from "@spotledger/shared";

export type LimitOrderRequest = {
  symbol: string;
  side: OrderSide;
  amount: DecimalInput;
  price: DecimalInput;
};

export type GatewayMode = "live" | "simulated";

/**
 * Single point of contact with the exchange. Prices, amounts and balances
 * come back quantized to the tick grid.
 */
export interface ExchangeGateway {
  readonly mode: GatewayMode;
  getAvailableBalance(currency: string): Promise<string>;
  getHighestBid(symbol: string): Promise<string>;
  getLowestAsk(symbol: string): Promise<string>;
  createLimitOrder(request: LimitOrderRequest): Promise<OrderRecord>;
  getOrderStatus(orderId: string): Promise<OrderStatus>;
  cancelOrder(orderId: string): Promise<OrderStatus>;
}
