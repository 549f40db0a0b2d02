import Decimal from 'decimal.js';
import { Trade } from './entities/trade.entity';
import { add, divide, toDecimal } from '../common/utils/decimal.util';

export const MINUTE_MS = 60 * 1000;
export const DEFAULT_PRICE_WINDOW_MS = 15 * MINUTE_MS;

export function minutesToMs(minutes: number): number {
  return minutes * MINUTE_MS;
}

// Bounds are epoch milliseconds; a window longer than a Date can span still compares correctly.
export interface PriceWindow {
  start: number;
  end: number;
  anchoredAt: 'now' | 'latest-trade';
}

/**
 * Resolves the averaging window for a non-empty trade history.
 *
 * The window ends at `now` when the newest trade is at most `windowMs` old.
 * Otherwise nothing is recent, and the window ends at the newest trade
 * instead, so an instrument with only old trades still gets a price from
 * its last burst of activity.
 *
 * `latest` is the maximum timestamp, not the last appended trade: trades can
 * be recorded out of chronological order.
 */
export function resolveWindow(trades: readonly Trade[], now: Date, windowMs: number): PriceWindow {
  const latest = trades.reduce(
    (max, trade) => Math.max(max, trade.timestamp),
    Number.NEGATIVE_INFINITY,
  );
  const nowMs = now.getTime();

  if (nowMs - latest <= windowMs) {
    return { start: nowMs - windowMs, end: nowMs, anchoredAt: 'now' };
  }
  return { start: latest - windowMs, end: latest, anchoredAt: 'latest-trade' };
}

/** Trades with timestamp in [start, end], both ends inclusive, in insertion order */
export function selectTradesInWindow(trades: readonly Trade[], window: PriceWindow): Trade[] {
  return trades.filter((trade) => trade.timestamp >= window.start && trade.timestamp <= window.end);
}

/**
 * Σ(price × quantity) / Σ(quantity).
 * @throws DivisionUndefinedError for an empty selection
 */
export function volumeWeightedPrice(trades: readonly Trade[]): Decimal {
  const notional = add(...trades.map((t) => toDecimal(t.price).times(t.quantity)));
  const volume = add(...trades.map((t) => toDecimal(t.quantity)));
  return divide(notional, volume, 'Volume-weighted price');
}

/**
 * Windowed price of a trade history, falling back to `parValue` when there
 * are no trades or none land inside the resolved window. Never throws.
 */
export function windowedPrice(
  trades: readonly Trade[],
  parValue: number,
  now: Date,
  windowMs: number = DEFAULT_PRICE_WINDOW_MS,
): Decimal {
  if (trades.length === 0) {
    return toDecimal(parValue);
  }

  const selected = selectTradesInWindow(trades, resolveWindow(trades, now, windowMs));
  if (selected.length === 0) {
    return toDecimal(parValue);
  }
  return volumeWeightedPrice(selected);
}
