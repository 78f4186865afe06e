export class TradingError extends Error {
  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidDecimalError extends TradingError {
  constructor(readonly input: string) {
    super(`Cannot read ${JSON.stringify(input)} as a decimal`, "INVALID_DECIMAL");
  }
}
