import { Inject, Injectable } from "@nestjs/common";
import type { DecimalInput, OrderRecord, OrderStatus } from "@spotledger/shared";
import { compareDecimal, isDecimal, isTerminalStatus, multiplyDecimal, quantize } from "@spotledger/shared";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import { ConfigurationError } from "../errors/trading-errors";
import type { ExchangeGateway } from "../integrations/exchange-gateway";
import { OrderLedgerService } from "../ledger/order-ledger.service";
import { assertPriceWithinLimit, assertSufficientFunds, buyNote, ladderCost, planBuyLadder } from "../policy/order-preconditions";
import { type ReconciliationReport, ReconciliationService } from "../reconcile/reconciliation.service";
import type { RunOptions } from "../run-options";
import { EXCHANGE_GATEWAY, LOGGER, RUN_OPTIONS } from "../tokens";

export type LadderResult = {
  placed: OrderRecord[];
  reconciliation: ReconciliationReport;
};

export type DiscountBuyResult = {
  placed: OrderRecord;
  reconciliation: ReconciliationReport;
};

export type CancelResult = {
  orderId: string;
  status: OrderStatus;
  /** Whether the ledger held a record for the order. */
  tracked: boolean;
};

export type MarketSnapshot = {
  symbol: string;
  quoteCurrency: string;
  balance: string;
  highestBid: string;
  lowestAsk: string;
  recentOrders: OrderRecord[];
  simulated: boolean;
};

const RECENT_ORDER_COUNT = 5;

function positiveAmount(value: DecimalInput | undefined): string {
  if (value === undefined || value === "") {
    throw new ConfigurationError("An order amount is required (--amount)");
  }
  if (typeof value === "string" && !isDecimal(value)) {
    throw new ConfigurationError(`Order amount ${JSON.stringify(value)} is not a decimal number`);
  }
  const amount = quantize(value);
  if (compareDecimal(amount, 0) <= 0) {
    throw new ConfigurationError(`Order amount must be positive, got ${String(value)}`);
  }
  return amount;
}

@Injectable()
export class TradingWorkflowService {
  constructor(
    @Inject(EXCHANGE_GATEWAY) private readonly gateway: ExchangeGateway,
    @Inject(OrderLedgerService) private readonly ledger: OrderLedgerService,
    @Inject(ReconciliationService) private readonly reconciliation: ReconciliationService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(RUN_OPTIONS) private readonly options: RunOptions,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  /**
   * Scripted mode: one buy per ladder discount under the best bid, then a
   * reconciliation pass. Price and balance are checked before anything is placed.
   */
  async runLadder(): Promise<LadderResult> {
    const amount = positiveAmount(this.options.amount);
    const { symbol } = this.options;
    const trading = this.configService.load().trading;

    const balance = await this.gateway.getAvailableBalance(trading.quoteCurrency);
    const bid = await this.gateway.getHighestBid(symbol);
    this.logger.info({ msg: "Ladder market check", symbol, bid, balance, currency: trading.quoteCurrency });

    assertPriceWithinLimit({ symbol, price: bid, limit: trading.maxSymbolPrice });
    const steps = planBuyLadder({ bid, discounts: trading.ladderDiscounts, amount });
    assertSufficientFunds({ currency: trading.quoteCurrency, available: balance, required: ladderCost(steps) });

    const placed: OrderRecord[] = [];
    for (const step of steps) {
      const order = await this.gateway.createLimitOrder({ symbol, side: "buy", amount: step.amount, price: step.price });
      const record: OrderRecord = { ...order, note: buyNote(step.discount) };
      this.ledger.append([record]);
      placed.push(record);
      this.logger.info({ msg: "Ladder buy placed", orderId: record.orderId, price: record.price, amount: record.amount });
    }

    const reconciliation = await this.reconciliation.reconcile();
    return { placed, reconciliation };
  }

  async placeDiscountBuy(discount: string, amountInput: DecimalInput): Promise<DiscountBuyResult> {
    const amount = positiveAmount(amountInput);
    const { symbol } = this.options;
    const trading = this.configService.load().trading;

    const balance = await this.gateway.getAvailableBalance(trading.quoteCurrency);
    const bid = await this.gateway.getHighestBid(symbol);
    const [step] = planBuyLadder({ bid, discounts: [discount], amount });
    assertSufficientFunds({ currency: trading.quoteCurrency, available: balance, required: multiplyDecimal(step.price, step.amount) });

    const order = await this.gateway.createLimitOrder({ symbol, side: "buy", amount: step.amount, price: step.price });
    const placed: OrderRecord = { ...order, note: buyNote(discount) };
    this.ledger.append([placed]);
    this.logger.info({ msg: "Discount buy placed", orderId: placed.orderId, price: placed.price, amount: placed.amount });

    const reconciliation = await this.reconciliation.reconcile();
    return { placed, reconciliation };
  }

  async cancelOrder(orderId: string): Promise<CancelResult> {
    const id = orderId.trim();
    if (!id) throw new ConfigurationError("An order id is required to cancel");

    const recorded = this.ledger.load().find((record) => record.orderId === id);
    if (recorded && isTerminalStatus(recorded.status)) {
      this.logger.info({ msg: "Order already final, not cancelled", orderId: id, status: recorded.status });
      return { orderId: id, status: recorded.status, tracked: true };
    }

    const status = await this.gateway.cancelOrder(id);
    const tracked = this.ledger.updateStatus(id, status);
    this.logger.info({ msg: "Order cancel requested", orderId: id, status, tracked });
    return { orderId: id, status, tracked };
  }

  async snapshot(): Promise<MarketSnapshot> {
    const { symbol } = this.options;
    const { quoteCurrency } = this.configService.load().trading;

    const balance = await this.gateway.getAvailableBalance(quoteCurrency);
    const highestBid = await this.gateway.getHighestBid(symbol);
    const lowestAsk = await this.gateway.getLowestAsk(symbol);
    return {
      symbol,
      quoteCurrency,
      balance,
      highestBid,
      lowestAsk,
      recentOrders: this.ledger.load().slice(-RECENT_ORDER_COUNT),
      simulated: this.gateway.mode === "simulated"
    };
  }

  reconcile(): Promise<ReconciliationReport> {
    return this.reconciliation.reconcile();
  }
}
