/**
 * Decimal.js utility functions for payroll tax calculations
 *
 * Every monetary amount in the engine goes through this module so that the
 * same inputs always produce the same cents.
 *
 * exact and exactSum keep full precision for the intermediate values of the
 * percentage method and for rollup sums; roundCents rounds line items to
 * 2 decimal places with ROUND_HALF_UP.
 */

import { Decimal } from 'decimal.js';

// Precision: 20 significant digits
// Rounding: ROUND_HALF_UP (standard rounding used by IRS)
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9e15,  // Don't use exponential notation for small numbers
  toExpPos: 9e15    // Don't use exponential notation for large numbers
});

export type DecimalInput = number | string | Decimal;

/**
 * Create a Decimal without rounding
 */
export function exact(value: DecimalInput): Decimal {
  return new Decimal(value);
}

/**
 * Convert Decimal to number (for ledger rows and JSON serialization)
 * Always rounds to 2 decimal places
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(2).toNumber();
}

/**
 * Fixed two-place string, e.g. "310.13"
 */
export function toCentsString(value: Decimal): string {
  return value.toFixed(2);
}

/**
 * Sum without rounding. Addition of cent amounts is exact, so the result
 * does not depend on the order of the values.
 */
export function exactSum(values: Iterable<DecimalInput>): Decimal {
  let sum = new Decimal(0);
  for (const value of values) {
    sum = sum.plus(value);
  }
  return sum;
}

/**
 * Round to nearest cent, half up
 */
export function roundCents(value: DecimalInput): Decimal {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

// Export the configured Decimal class for advanced use cases
export { Decimal };
