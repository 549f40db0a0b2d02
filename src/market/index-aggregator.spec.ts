import Decimal from 'decimal.js';
import { ManualClock } from '../common/clock/manual-clock';
import { InstrumentKind } from './entities/instrument.entity';
import { geometricMeanIndex, PricedInstrument } from './index-aggregator';
import { InstrumentLedger } from './instrument-ledger';
import { minutesToMs } from './trade-window';

describe('geometricMeanIndex', () => {
  const fixed = (price: number): PricedInstrument => ({ price: () => new Decimal(price) });

  it('should equal the nth root of the product of prices', () => {
    const prices = [2, 8, 27, 125];

    const index = geometricMeanIndex(prices.map(fixed));

    expect(index.toNumber()).toBeCloseTo(Math.pow(2 * 8 * 27 * 125, 1 / 4), 10);
  });

  it('should return the price itself for a single instrument', () => {
    expect(geometricMeanIndex([fixed(60)]).toNumber()).toBeCloseTo(60, 10);
  });

  it('should leave zero-priced instruments out of the mean', () => {
    const index = geometricMeanIndex([fixed(0), fixed(2), fixed(8)]);

    expect(index.toNumber()).toBeCloseTo(4, 10);
  });

  it('should return exactly zero when every price is zero', () => {
    const index = geometricMeanIndex([fixed(0), fixed(0)]);

    expect(index.isZero()).toBe(true);
    expect(index.toNumber()).toBe(0);
  });

  it('should return zero for an empty collection', () => {
    expect(geometricMeanIndex([]).toNumber()).toBe(0);
  });

  it('should stay finite for extreme price ratios', () => {
    const prices = Array.from({ length: 200 }, (_, i) => (i % 2 === 0 ? 1e12 : 1));

    expect(geometricMeanIndex(prices.map(fixed)).toNumber()).toBeCloseTo(1e6, 4);
  });

  it('should pass the window through to every instrument', () => {
    const price = jest.fn(() => new Decimal(10));
    const instruments: PricedInstrument[] = [{ price }, { price }];

    geometricMeanIndex(instruments, minutesToMs(5));

    expect(price).toHaveBeenCalledTimes(2);
    expect(price).toHaveBeenCalledWith(300000);
  });

  it('should combine traded and untraded instruments', () => {
    const clock = new ManualClock('2024-01-15T12:00:00.000Z');
    const make = (symbol: string, parValue: number) =>
      new InstrumentLedger({ symbol, kind: InstrumentKind.COMMON, lastDividend: 0, parValue }, clock);

    const tea = make('TEA', 100);
    const pop = make('POP', 100);
    const ale = make('ALE', 60);
    const gin = new InstrumentLedger(
      { symbol: 'GIN', kind: InstrumentKind.PREFERRED, lastDividend: 8, fixedDividendRate: 0.02, parValue: 100 },
      clock,
    );
    const joe = make('JOE', 250);

    tea.buy(10, 95);
    tea.sell(20, 90);
    tea.buy(45, 120);
    pop.buy(90, 95);
    pop.buy(65, 90);
    pop.sell(200, 100);
    ale.buy(35, 50);
    ale.sell(50, 10);
    gin.buy(100, 1000, clock.minutesAgo(14));

    const prices = [
      (10 * 95 + 20 * 90 + 45 * 120) / (10 + 20 + 45),
      (90 * 95 + 65 * 90 + 200 * 100) / (90 + 65 + 200),
      (35 * 50 + 50 * 10) / (35 + 50),
      1000,
      250,
    ];
    const expected = Math.pow(prices.reduce((product, p) => product * p, 1), 1 / 5);

    expect(geometricMeanIndex([tea, pop, ale, gin, joe]).toNumber()).toBeCloseTo(expected, 6);
  });
});
