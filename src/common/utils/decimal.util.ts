import Decimal from 'decimal.js';
import { DivisionUndefinedError } from '../errors/market.errors';

// Configure Decimal.js globally for price and ratio calculations.
// A price × quantity product of two safe integers needs up to 32 digits.
Decimal.set({
  precision: 40,           // 40 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Sum of Decimal values, zero for an empty list.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0));
}

/**
 * Division with zero check.
 * @throws DivisionUndefinedError when the divisor is zero
 */
export function divide(a: Decimal, b: Decimal, what = 'Division'): Decimal {
  if (b.isZero()) {
    throw new DivisionUndefinedError(`${what} is undefined: divisor is zero`);
  }
  return a.dividedBy(b);
}
