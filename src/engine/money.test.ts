import { describe, it, expect } from 'vitest';
import { currencyOf, formatAmount, parseAmount } from './money';

describe('parseAmount', () => {
  it('reads amounts into integer cents', () => {
    expect(parseAmount('$1,234.5')).toBe(123450);
    expect(parseAmount('2')).toBe(200);
    expect(parseAmount('€0.07')).toBe(7);
    expect(parseAmount(' $0.10 ')).toBe(10);
  });

  it('rejects text that is not a plain amount', () => {
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('-1')).toBeNull();
    expect(parseAmount('1.234')).toBeNull();
    expect(parseAmount('')).toBeNull();
  });

  it('keeps sums exact where floats would drift', () => {
    const total = ['$0.10', '$0.20'].map(a => parseAmount(a) ?? 0).reduce((a, b) => a + b, 0);
    expect(total).toBe(30);
  });
});

describe('currencyOf', () => {
  it('returns the leading currency symbol', () => {
    expect(currencyOf('$0.05')).toBe('$');
    expect(currencyOf('£3')).toBe('£');
    expect(currencyOf('10')).toBeNull();
  });
});

describe('formatAmount', () => {
  it('formats cents with sign and symbol', () => {
    expect(formatAmount(-5)).toBe('-$0.05');
    expect(formatAmount(123450, '€')).toBe('€1234.50');
    expect(formatAmount(0, null)).toBe('0.00');
  });
});
