import { Inject, Injectable } from "@nestjs/common";
import type { OrderRecord, OrderStatus } from "@spotledger/shared";
import { formatPercent, isTerminalStatus, markupPrice } from "@spotledger/shared";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import type { ExchangeGateway } from "../integrations/exchange-gateway";
import { OrderLedgerService } from "../ledger/order-ledger.service";
import { EXCHANGE_GATEWAY, LOGGER } from "../tokens";

export type StatusChange = { orderId: string; from: OrderStatus; to: OrderStatus };
export type LinkedSell = { buyOrderId: string; sellOrderId: string; price: string };

export type ReconciliationReport = {
  statusChanges: StatusChange[];
  linkedSells: LinkedSell[];
  /** True when the ledger file was rewritten. */
  saved: boolean;
};

export function sellNote(markup: string, buyOrderId: string): string {
  return `Sell order +${formatPercent(markup)}% over buy ${buyOrderId}`;
}

@Injectable()
export class ReconciliationService {
  constructor(
    @Inject(EXCHANGE_GATEWAY) private readonly gateway: ExchangeGateway,
    @Inject(OrderLedgerService) private readonly ledger: OrderLedgerService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  /**
   * Polls open orders, then places one markup sell for every filled buy that
   * has none yet. Whatever changed is saved even when a gateway call fails, and that
   * failure is what propagates.
   */
  async reconcile(): Promise<ReconciliationReport> {
    const report: ReconciliationReport = { statusChanges: [], linkedSells: [], saved: false };
    const records = this.ledger.load();
    if (records.length === 0) return report;

    const markup = this.configService.load().trading.sellMarkup;
    const tracked = records.length;
    let dirty = false;

    try {
      for (let i = 0; i < tracked; i += 1) {
        const record = records[i];
        if (isTerminalStatus(record.status)) continue;

        const status = await this.gateway.getOrderStatus(record.orderId);
        if (status === record.status) continue;

        records[i] = { ...record, status };
        report.statusChanges.push({ orderId: record.orderId, from: record.status, to: status });
        dirty = true;
        this.logger.info({ msg: "Order status changed", orderId: record.orderId, from: record.status, to: status });
      }

      for (let i = 0; i < tracked; i += 1) {
        const buy = records[i];
        if (buy.side !== "buy" || buy.status !== "FILLED" || buy.linkedOrderId) continue;

        const placed = await this.gateway.createLimitOrder({
          symbol: buy.symbol,
          side: "sell",
          amount: buy.amount,
          price: markupPrice(buy.price, markup)
        });
        const sell: OrderRecord = { ...placed, note: sellNote(markup, buy.orderId), linkedOrderId: buy.orderId };

        records.push(sell);
        records[i] = { ...buy, linkedOrderId: sell.orderId };
        report.linkedSells.push({ buyOrderId: buy.orderId, sellOrderId: sell.orderId, price: sell.price });
        dirty = true;
        this.logger.info({ msg: "Linked sell placed", buyOrderId: buy.orderId, sellOrderId: sell.orderId, price: sell.price });
      }
    } catch (err) {
      if (dirty) this.saveAfterFailure(records, report, err);
      throw err;
    }

    if (dirty) {
      this.ledger.save(records);
      report.saved = true;
    }
    return report;
  }

  /** Keeps confirmed changes on disk; the gateway failure stays the error the caller sees. */
  private saveAfterFailure(records: OrderRecord[], report: ReconciliationReport, failure: unknown): void {
    try {
      this.ledger.save(records);
      report.saved = true;
    } catch (saveErr) {
      this.logger.error({ msg: "Ledger save after a failed reconciliation also failed", err: saveErr, failure });
    }
  }
}
