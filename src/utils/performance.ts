// server/src/utils/performance.ts
// Performance amounts are computed in hundredths so quantity × factor is exact at 2dp.

import { InvalidFactorError, InvalidQuantityError } from '../lib/errors';

const MAX_INT4 = 2_147_483_647;
// NUMERIC(6,2)
const MAX_FACTOR_HUNDREDTHS = 999_999;

/**
 * Parses a decimal into integer hundredths, rounding half up on the third decimal.
 * Returns null for anything that is not a finite number.
 */
export function toHundredths(value: number | string): number | null {
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (text === '') return null;

  const plain = /^([+-]?)(\d*)(?:\.(\d*))?$/.exec(text);
  if (!plain || (plain[2] === '' && (plain[3] ?? '') === '')) {
    // exponent forms and the like
    const n = Number(text);
    return Number.isFinite(n) ? Math.round(n * 100) : null;
  }

  const [, sign, whole, frac = ''] = plain;
  const digits = frac.padEnd(3, '0');
  let hundredths = Number(whole || '0') * 100 + Number(digits.slice(0, 2));
  if (Number(digits[2]) >= 5) hundredths += 1;
  return sign === '-' ? -hundredths : hundredths;
}

export function formatHundredths(hundredths: number): string {
  const sign = hundredths < 0 ? '-' : '';
  const abs = Math.abs(hundredths);
  return `${sign}${Math.trunc(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export function assertQuantity(quantity: number): number {
  if (!Number.isInteger(quantity) || quantity <= 0 || quantity > MAX_INT4) {
    throw new InvalidQuantityError(quantity);
  }
  return quantity;
}

function factorHundredths(factor: number | string): number {
  const hundredths = toHundredths(factor);
  if (hundredths === null || hundredths <= 0 || hundredths > MAX_FACTOR_HUNDREDTHS) {
    throw new InvalidFactorError(factor);
  }
  return hundredths;
}

/** Factor as stored in a NUMERIC(6,2) column, e.g. `1.2` → `"1.20"`. */
export function normalizeFactor(factor: number | string): string {
  return formatHundredths(factorHundredths(factor));
}

/** `quantity × performanceFactor` at 2dp, e.g. (50, 1.2) → `"60.00"`. */
export function computePerformanceAmount(quantity: number, factor: number | string): string {
  // quantity first: an invalid quantity is reported even when the factor is also bad
  const qty = assertQuantity(quantity);
  return formatHundredths(qty * factorHundredths(factor));
}
