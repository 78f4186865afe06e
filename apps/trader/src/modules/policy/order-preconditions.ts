import type { DecimalInput } from "@spotledger/shared";
import { compareDecimal, discountPrice, formatPercent, multiplyDecimal, quantize, sumDecimals } from "@spotledger/shared";

import { InsufficientFundsError, PriceConstraintError } from "../errors/trading-errors";

export type LadderStep = {
  discount: string;
  price: string;
  amount: string;
  /** Quote currency spent if the step fills. */
  cost: string;
};

export function buyNote(discount: DecimalInput): string {
  return `Buy order ${formatPercent(discount)}% below best bid`;
}

export function planBuyLadder(params: { bid: DecimalInput; discounts: readonly string[]; amount: DecimalInput }): LadderStep[] {
  const amount = quantize(params.amount);
  return params.discounts.map((discount) => {
    const price = discountPrice(params.bid, discount);
    return { discount, price, amount, cost: multiplyDecimal(price, amount) };
  });
}

export function ladderCost(steps: readonly LadderStep[]): string {
  return sumDecimals(steps.map((s) => s.cost));
}

export function assertPriceWithinLimit(params: { symbol: string; price: string; limit: string }): void {
  if (compareDecimal(params.price, params.limit) >= 0) {
    throw new PriceConstraintError(params.symbol, params.price, params.limit);
  }
}

export function assertSufficientFunds(params: { currency: string; available: string; required: string }): void {
  if (compareDecimal(params.available, params.required) < 0) {
    throw new InsufficientFundsError(params.currency, params.available, params.required);
  }
}
