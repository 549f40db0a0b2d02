import { divide, toDecimal, toNumber } from './decimal.util';
import { DivisionUndefinedError } from '../errors/market.errors';

describe('decimal.util', () => {
  it('should multiply safe integers without rounding', () => {
    const product = toDecimal(Number.MAX_SAFE_INTEGER).times(Number.MAX_SAFE_INTEGER);

    expect(product.toFixed()).toBe('81129638414606663681390495662081');
  });

  it('should round output to 8 decimal places', () => {
    expect(toNumber(divide(toDecimal(23), toDecimal(60)))).toBe(0.38333333);
  });

  it('should refuse to divide by zero', () => {
    expect(() => divide(toDecimal(1), toDecimal(0), 'Dividend yield')).toThrow(DivisionUndefinedError);
  });
});
