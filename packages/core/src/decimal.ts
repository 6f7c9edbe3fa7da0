/**
 * @fileoverview Precise decimal mathematics for monetary amounts.
 * Wraps decimal.js so deposit amounts keep their full precision and are
 * never rounded through JavaScript floats.
 */

import Decimal from 'decimal.js';

// Configure Decimal.js for financial precision
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_DOWN, // Never send more than was computed
  toExpPos: 40,
  toExpNeg: -40,
});

export { Decimal };

/**
 * Strict format for amounts crossing a boundary (handlers, config, database).
 * Rejects signs, exponents and empty fractions.
 */
const AMOUNT_REGEX = /^\d+(\.\d+)?$/;

/**
 * Parses a string amount into a Decimal object for precise arithmetic.
 *
 * @example
 * parseAmount("1.5").mul(2) // 3
 */
export function parseAmount(amount: string): Decimal {
  return new Decimal(amount);
}

/**
 * Whether `amount` is a plain non-negative decimal string.
 *
 * @example
 * isDecimalString("0.5")  // true
 * isDecimalString("1e18") // false
 */
export function isDecimalString(amount: string): boolean {
  return AMOUNT_REGEX.test(amount);
}

/**
 * Whether `amount` is a plain decimal string strictly greater than zero.
 */
export function isPositiveAmount(amount: string): boolean {
  return isDecimalString(amount) && parseAmount(amount).gt(0);
}

/**
 * Truncates an amount to `decimals` places (always rounds down) and
 * returns it in its shortest form.
 *
 * @example
 * truncateAmount("1.23456789", 4) // "1.2345"
 * truncateAmount("49.30000000", 8) // "49.3"
 */
export function truncateAmount(amount: Decimal | string, decimals: number): string {
  const d = typeof amount === 'string' ? parseAmount(amount) : amount;
  return d.toDecimalPlaces(decimals, Decimal.ROUND_DOWN).toString();
}

/**
 * Normalises a decimal string: trailing zeros are dropped, '-0' becomes '0'.
 *
 * @example
 * normalizeAmount("10.500") // "10.5"
 */
export function normalizeAmount(amount: string): string {
  const d = parseAmount(amount);
  return d.isZero() ? '0' : d.toString();
}

/**
 * Compares two amounts and returns their relative ordering.
 *
 * @returns -1 if a < b, 0 if a == b, 1 if a > b
 */
export function compareAmounts(a: string, b: string): number {
  return parseAmount(a).comparedTo(parseAmount(b));
}

/**
 * Sums an array of amount strings with full precision.
 *
 * @example
 * sumAmounts(["0.000001", "0.000002"]) // "0.000003"
 */
export function sumAmounts(amounts: string[]): string {
  return amounts.reduce((sum, amount) => {
    return sum.add(parseAmount(amount));
  }, new Decimal(0)).toString();
}
