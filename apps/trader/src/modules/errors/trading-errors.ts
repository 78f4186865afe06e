import { TradingError } from "@spotledger/shared";

export { TradingError };

/** How the exchange classified a rejected request. */
export type RejectionKind = "UNRECOGNIZED_PARAMETER" | "INVALID_SYMBOL" | "OTHER";

export class GatewayError extends TradingError {
  readonly kind: RejectionKind;
  readonly status?: number;

  constructor(message: string, options: { kind?: RejectionKind; status?: number; cause?: unknown } = {}) {
    super(message, "GATEWAY_ERROR", { cause: options.cause });
    this.kind = options.kind ?? "OTHER";
    this.status = options.status;
  }
}

export class LedgerCorruptError extends TradingError {
  constructor(
    readonly filePath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Ledger ${filePath} ${detail}`, "LEDGER_CORRUPT", options);
  }
}

export class InsufficientFundsError extends TradingError {
  constructor(
    readonly currency: string,
    readonly available: string,
    readonly required: string
  ) {
    super(`Not enough ${currency} balance (${available}) to cover ${required} required.`, "INSUFFICIENT_FUNDS");
  }
}

export class PriceConstraintError extends TradingError {
  constructor(
    readonly symbol: string,
    readonly price: string,
    readonly limit: string
  ) {
    super(`The ${symbol} price ${price} is not below the ${limit} limit.`, "PRICE_CONSTRAINT");
  }
}

export class ConfigurationError extends TradingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", options);
  }
}
