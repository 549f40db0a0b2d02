import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { Clock } from '../common/clock/clock';
import { InvalidTradeError } from '../common/errors/market.errors';
import { divide, toDecimal } from '../common/utils/decimal.util';
import { InstrumentDefinition, InstrumentKind } from './entities/instrument.entity';
import { Trade, TradeDirection } from './entities/trade.entity';
import { DEFAULT_PRICE_WINDOW_MS, windowedPrice } from './trade-window';

export interface LedgerOptions {
  defaultWindowMs?: number;
}

// One instrument's static attributes plus its append-only trade history.
// recordTrade is the only mutator; every query is read-only.
export class InstrumentLedger {
  private readonly trades: Trade[] = [];
  private readonly defaultWindowMs: number;

  constructor(
    readonly definition: Readonly<InstrumentDefinition>,
    private readonly clock: Clock,
    options: LedgerOptions = {},
  ) {
    this.defaultWindowMs = options.defaultWindowMs ?? DEFAULT_PRICE_WINDOW_MS;
  }

  get symbol(): string {
    return this.definition.symbol;
  }

  get kind(): InstrumentKind {
    return this.definition.kind;
  }

  get windowMs(): number {
    return this.defaultWindowMs;
  }

  /**
   * Appends a trade after validating it against the clock.
   * @throws InvalidTradeError on a non-positive quantity, negative price or future timestamp
   */
  recordTrade(direction: TradeDirection, quantity: number, price: number, timestamp: Date): Trade {
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw new InvalidTradeError(`Trade quantity must be a positive integer, got ${quantity}`);
    }
    if (!Number.isSafeInteger(price) || price < 0) {
      throw new InvalidTradeError(`Trade price must be a non-negative integer, got ${price}`);
    }
    if (Number.isNaN(timestamp.getTime())) {
      throw new InvalidTradeError('Trade timestamp is not a valid date');
    }

    const now = this.clock.now();
    if (timestamp.getTime() > now.getTime()) {
      throw new InvalidTradeError(
        `Trade timestamp ${timestamp.toISOString()} is after the current time ${now.toISOString()}`,
      );
    }

    const trade: Trade = Object.freeze({
      id: uuidv4(),
      direction,
      quantity,
      price,
      timestamp: timestamp.getTime(),
      recordedAt: now.getTime(),
    });
    this.trades.push(trade);
    return trade;
  }

  buy(quantity: number, price: number, timestamp: Date = this.clock.now()): Trade {
    return this.recordTrade(TradeDirection.BUY, quantity, price, timestamp);
  }

  sell(quantity: number, price: number, timestamp: Date = this.clock.now()): Trade {
    return this.recordTrade(TradeDirection.SELL, quantity, price, timestamp);
  }

  /** Snapshot of the trade history in recording order */
  getTrades(): Trade[] {
    return [...this.trades];
  }

  get tradeCount(): number {
    return this.trades.length;
  }

  /**
   * Volume-weighted trade price over the window.
   * Par value when nothing usable has traded. Never throws.
   */
  price(windowMs: number = this.defaultWindowMs): Decimal {
    return windowedPrice(this.trades, this.definition.parValue, this.clock.now(), windowMs);
  }

  /** Last dividend for common stock, fixed rate × par for preferred */
  dividend(): Decimal {
    const definition = this.definition;
    switch (definition.kind) {
      case InstrumentKind.COMMON:
        return toDecimal(definition.lastDividend);
      case InstrumentKind.PREFERRED:
        return toDecimal(definition.fixedDividendRate).times(definition.parValue);
    }
  }

  /** @throws DivisionUndefinedError when the windowed price is zero */
  dividendYield(windowMs: number = this.defaultWindowMs): Decimal {
    return divide(this.dividend(), this.price(windowMs), `Dividend yield of ${this.symbol}`);
  }

  /** @throws DivisionUndefinedError when the dividend is zero */
  priceEarningsRatio(windowMs: number = this.defaultWindowMs): Decimal {
    return divide(this.price(windowMs), this.dividend(), `P/E ratio of ${this.symbol}`);
  }
}
