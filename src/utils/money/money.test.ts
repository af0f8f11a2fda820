import { describe, it, expect } from 'vitest';
import { roundCurrency, sumAmounts } from './money';

describe('money', () => {
  it('should round to cents', () => {
    expect(roundCurrency(1.005)).toBe(1.01);
    expect(roundCurrency(12.344)).toBe(12.34);
    expect(roundCurrency(5 * 31)).toBe(155);
  });

  it('should sum without floating point noise', () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
    expect(sumAmounts([])).toBe(0);
  });
});
