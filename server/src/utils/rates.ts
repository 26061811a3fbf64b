/**
 * Rate parsing for employer-entered rates (e.g. the Florida reemployment
 * tax rate on the DOR rate notice)
 *
 * Examples:
 * - "2.7" / "2.7%" -> 0.027
 * - "0.027" / 0.027 -> 0.027
 * - "3" -> 0.03
 *
 * Values above 1 are read as percentages; values at or below 1 as decimals.
 */

import { AppError } from './AppError.js';
import { Decimal } from './decimal.js';

export function parseRateToDecimal(rate: string | number): number {
  let text = typeof rate === 'number' ? String(rate) : rate.trim();
  if (text.length === 0) {
    throw AppError.badRequest('Rate is required', 'INVALID_RATE');
  }

  const percentSuffix = text.endsWith('%');
  if (percentSuffix) {
    text = text.slice(0, -1).trim();
  }

  let value: Decimal;
  try {
    value = new Decimal(text);
  } catch {
    throw AppError.badRequest(`Rate must be a valid number, received '${String(rate)}'`, 'INVALID_RATE');
  }

  if (!value.isFinite()) {
    throw AppError.badRequest(`Rate must be a valid number, received '${String(rate)}'`, 'INVALID_RATE');
  }
  if (value.isNegative() && !value.isZero()) {
    throw AppError.badRequest('Rate cannot be negative', 'INVALID_RATE');
  }

  if (percentSuffix || value.greaterThan(1)) {
    return value.dividedBy(100).toNumber();
  }
  return value.toNumber();
}

/**
 * 0.027 -> "2.7%"
 */
export function formatRatePercent(rate: number): string {
  return `${new Decimal(rate).times(100).toDecimalPlaces(4).toString()}%`;
}
