import type { OrderRecord } from "@spotledger/shared";
import { formatPercent } from "@spotledger/shared";
import type { Logger } from "pino";

import type { MarketSnapshot, TradingWorkflowService } from "../modules/workflow/trading-workflow.service";
import { parseAmount } from "./args";

export type MenuIO = {
  prompt(question: string): Promise<string>;
  print(line: string): void;
};

export type MenuWorkflow = Pick<TradingWorkflowService, "snapshot" | "placeDiscountBuy" | "cancelOrder">;

export type InteractiveMenuOptions = {
  workflow: MenuWorkflow;
  /** One buy action per entry, numbered from 1. */
  discounts: readonly string[];
  io: MenuIO;
  logger: Logger;
};

function describeOrder(order: OrderRecord): string {
  const link = order.linkedOrderId ? ` -> ${order.linkedOrderId}` : "";
  return `  ${order.orderId} ${order.side} ${order.amount} @ ${order.price} ${order.status}${link}`;
}

export function renderSnapshot(snapshot: MarketSnapshot): string[] {
  const mode = snapshot.simulated ? " (dry run)" : "";
  return [
    `${snapshot.symbol}${mode} | balance ${snapshot.balance} ${snapshot.quoteCurrency} | bid ${snapshot.highestBid} | ask ${snapshot.lowestAsk}`,
    "Recent orders:",
    ...(snapshot.recentOrders.length ? snapshot.recentOrders.map(describeOrder) : ["  (none)"])
  ];
}

export function menuLines(discounts: readonly string[]): string[] {
  const cancelKey = discounts.length + 1;
  return [
    ...discounts.map((d, i) => `${i + 1}) Buy ${formatPercent(d)}% below best bid`),
    `${cancelKey}) Cancel an order`,
    "q) Quit"
  ];
}

/** Runs until the user quits. Failed actions are reported and the menu comes back. */
export async function runInteractiveMenu(options: InteractiveMenuOptions): Promise<void> {
  const { workflow, discounts, io, logger } = options;
  const cancelKey = String(discounts.length + 1);

  const report = (action: string, err: unknown): void => {
    logger.error({ msg: "Interactive action failed", action, err });
    io.print(`Error: ${err instanceof Error ? err.message : String(err)}`);
  };

  for (;;) {
    try {
      renderSnapshot(await workflow.snapshot()).forEach((line) => io.print(line));
    } catch (err) {
      report("snapshot", err);
    }
    menuLines(discounts).forEach((line) => io.print(line));

    const choice = (await io.prompt("Select an option: ")).trim().toLowerCase();
    if (choice === "q") return;

    const index = Number.parseInt(choice, 10) - 1;
    if (/^\d+$/.test(choice) && index >= 0 && index < discounts.length) {
      const discount = discounts[index];
      const raw = await io.prompt("Amount (empty to go back): ");
      if (!raw.trim()) continue;
      const amount = parseAmount(raw);
      if (amount === null) {
        io.print("Amount must be a positive decimal number.");
        continue;
      }
      try {
        const { placed, reconciliation } = await workflow.placeDiscountBuy(discount, amount);
        io.print(`Placed buy ${placed.orderId}: ${placed.amount} @ ${placed.price}`);
        reconciliation.linkedSells.forEach((s) => io.print(`Placed sell ${s.sellOrderId} @ ${s.price} for buy ${s.buyOrderId}`));
      } catch (err) {
        report("buy", err);
      }
      continue;
    }

    if (choice === cancelKey) {
      const orderId = (await io.prompt("Order id (empty to go back): ")).trim();
      if (!orderId) continue;
      try {
        const result = await workflow.cancelOrder(orderId);
        io.print(`Order ${result.orderId} is ${result.status}${result.tracked ? "" : " (not in the ledger)"}`);
      } catch (err) {
        report("cancel", err);
      }
      continue;
    }

    io.print(`Unknown option ${JSON.stringify(choice)}`);
  }
}
