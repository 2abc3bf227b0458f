/**
 * Milliunit Utilities
 *
 * YNAB stores every currency value as an integer number of "milliunits":
 * - 1 dollar = 1000 milliunits
 * - $10.50 = 10500 milliunits
 * - -$25.00 = -25000 milliunits
 *
 * Conversions in both directions use plain double arithmetic so that
 * `toMilliunits` truncates exactly like `Math.trunc(amount * 1000)`.
 * Aggregates (sums, averages, percentages) go through Decimal.js.
 */

import { Decimal } from 'decimal.js';

Decimal.set({ precision: 20, rounding: Decimal.ROUND_HALF_UP });

/**
 * Convert milliunits to a decimal amount (`m / 1000`).
 */
export function toDecimal(milliunits: number): number {
  return milliunits / 1000;
}

/**
 * Convert a decimal amount to milliunits.
 *
 * Truncates toward zero after multiplying by 1000. Digits past the third
 * decimal place are dropped, and a product such as `1.005 * 1000`
 * (1004.9999999999999) becomes 1004.
 */
export function toMilliunits(amount: number): number {
  return Math.trunc(amount * 1000);
}

/**
 * Sum an array of milliunit amounts.
 */
export function sumMilliunits(amounts: number[]): number {
  return amounts.reduce((sum, amt) => new Decimal(sum).plus(amt).toNumber(), 0);
}

/**
 * Average a milliunit total over `count` periods, as a decimal rounded to cents.
 */
export function averageToDecimal(milliunits: number, count: number): number {
  if (count <= 0) return 0;
  return new Decimal(milliunits).dividedBy(1000).dividedBy(count).toDecimalPlaces(2).toNumber();
}

/**
 * Percentage change from `previous` to `current`, one decimal place.
 * Returns null when there is no base to compare against.
 */
export function percentChange(previous: number, current: number): number | null {
  if (previous === 0) return null;
  return new Decimal(current)
    .minus(previous)
    .dividedBy(Math.abs(previous))
    .times(100)
    .toDecimalPlaces(1)
    .toNumber();
}

/**
 * Format milliunits as a currency string like "$10.50" or "-$25.00".
 */
export function formatCurrency(milliunits: number, currencySymbol = '$'): string {
  const amount = new Decimal(milliunits).dividedBy(1000);
  const formatted = amount.absoluteValue().toFixed(2);
  return amount.isNegative() ? `-${currencySymbol}${formatted}` : `${currencySymbol}${formatted}`;
}
