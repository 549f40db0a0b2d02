// Domain errors raised by the ledger, registry and aggregator.
// Thrown synchronously and never retried; MarketExceptionFilter maps them to HTTP.
export abstract class MarketError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Trade rejected before it reaches the ledger (bad quantity, price or timestamp). */
export class InvalidTradeError extends MarketError {}

/** Instrument definition breaks the kind / fixed dividend rate pairing. */
export class InvalidInstrumentError extends MarketError {}

export class UnknownInstrumentError extends MarketError {
  constructor(readonly symbol: string) {
    super(`Unknown instrument: ${symbol}`);
  }
}

export class DuplicateInstrumentError extends MarketError {
  constructor(readonly symbol: string) {
    super(`Instrument already registered: ${symbol}`);
  }
}

// Yield or P/E asked for while the price or dividend base is zero.
export class DivisionUndefinedError extends MarketError {}
