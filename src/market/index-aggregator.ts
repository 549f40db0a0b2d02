import Decimal from 'decimal.js';
import { add } from '../common/utils/decimal.util';

// Anything that can be priced over a window; InstrumentLedger satisfies it.
export interface PricedInstrument {
  price(windowMs?: number): Decimal;
}

/**
 * Geometric mean of the instruments' windowed prices, computed in log space.
 *
 * Instruments priced at exactly zero are left out of the mean rather than
 * collapsing it to zero. Returns 0 when every instrument is zero-priced,
 * which includes an empty collection.
 */
export function geometricMeanIndex(
  instruments: Iterable<PricedInstrument>,
  windowMs?: number,
): Decimal {
  const logs: Decimal[] = [];
  let total = 0;
  let zeros = 0;

  for (const instrument of instruments) {
    total++;
    const price = instrument.price(windowMs);
    if (price.isZero()) {
      zeros++;
      continue;
    }
    logs.push(price.ln());
  }

  if (zeros === total) {
    return new Decimal(0);
  }

  return add(...logs).dividedBy(total - zeros).exp();
}
