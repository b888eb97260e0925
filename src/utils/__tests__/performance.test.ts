import { describe, it, expect } from 'vitest';
import {
  computePerformanceAmount,
  formatHundredths,
  normalizeFactor,
  toHundredths,
} from '../performance';
import { InvalidFactorError, InvalidQuantityError } from '../../lib/errors';

describe('computePerformanceAmount', () => {
  it('multiplies quantity by factor at two decimals', () => {
    expect(computePerformanceAmount(50, 1.2)).toBe('60.00');
    expect(computePerformanceAmount(7, '0.5')).toBe('3.50');
  });

  it('rounds the factor half up before multiplying', () => {
    // 0.335 -> 0.34
    expect(computePerformanceAmount(3, '0.335')).toBe('1.02');
  });

  it('rejects non-positive or fractional quantities', () => {
    expect(() => computePerformanceAmount(0, 1)).toThrow(InvalidQuantityError);
    expect(() => computePerformanceAmount(-3, 1)).toThrow(InvalidQuantityError);
    expect(() => computePerformanceAmount(1.5, 1)).toThrow(InvalidQuantityError);
  });

  it('rejects non-positive or unparseable factors', () => {
    expect(() => computePerformanceAmount(5, 0)).toThrow(InvalidFactorError);
    expect(() => computePerformanceAmount(5, -1)).toThrow(InvalidFactorError);
    expect(() => computePerformanceAmount(5, 'abc')).toThrow(InvalidFactorError);
  });

  it('reports the quantity when both inputs are bad', () => {
    expect(() => computePerformanceAmount(0, 0)).toThrow(InvalidQuantityError);
  });
});

describe('normalizeFactor', () => {
  it('formats to two decimals', () => {
    expect(normalizeFactor(1.2)).toBe('1.20');
    expect(normalizeFactor('  2 ')).toBe('2.00');
    expect(normalizeFactor('9999.99')).toBe('9999.99');
  });

  it('rejects factors that do not fit NUMERIC(6,2)', () => {
    expect(() => normalizeFactor(10000)).toThrow(InvalidFactorError);
  });
});

describe('toHundredths / formatHundredths', () => {
  it('parses plain and exponent forms', () => {
    expect(toHundredths('12.3')).toBe(1230);
    expect(toHundredths('1e2')).toBe(10000);
    expect(toHundredths('')).toBeNull();
    expect(toHundredths('-')).toBeNull();
  });

  it('formats small and negative values', () => {
    expect(formatHundredths(5)).toBe('0.05');
    expect(formatHundredths(-150)).toBe('-1.50');
  });
});
