/**
 * Date Utilities for payroll periods
 *
 * Ledger rows are keyed by calendar year and month. Non-monthly frequencies
 * map to the month of the pay date, which is also what places wages in a
 * quarter for Form 941 and RT-6.
 */

import { isValid, parseISO } from 'date-fns';
import type { PayFrequency, PayPeriod, Quarter } from '../../../shared/types/index.js';
import { AppError } from './AppError.js';

const QUARTER_MONTHS: Record<Quarter, readonly [number, number, number]> = {
  1: [1, 2, 3],
  2: [4, 5, 6],
  3: [7, 8, 9],
  4: [10, 11, 12],
};

/**
 * Build a period from a pay date in YYYY-MM-DD format
 */
export function periodFromPayDate(payDate: string): PayPeriod {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(payDate)) {
    throw AppError.badRequest(`Invalid pay date: ${payDate}. Expected YYYY-MM-DD`, 'INVALID_PAY_DATE');
  }

  const parsed = parseISO(payDate);
  if (!isValid(parsed)) {
    throw AppError.badRequest(`Invalid pay date: ${payDate}`, 'INVALID_PAY_DATE');
  }

  return {
    year: parsed.getFullYear(),
    month: parsed.getMonth() + 1,
    payDate,
  };
}

/**
 * Frequencies that pay more than once a month. Their runs share a period
 * month, so the pay date is what orders them.
 */
export function requiresPayDate(payFrequency: PayFrequency): boolean {
  return payFrequency !== 'MONTHLY';
}

export function isQuarter(value: number): value is Quarter {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function quarterOfMonth(month: number): Quarter {
  const quarter = Math.ceil(month / 3);
  if (!isQuarter(quarter)) {
    throw AppError.badRequest(`Invalid month: ${month}`, 'INVALID_PERIOD');
  }
  return quarter;
}

export function quarterMonths(quarter: Quarter): readonly [number, number, number] {
  return QUARTER_MONTHS[quarter];
}

/**
 * Ordering of periods within a year: by month, then by pay date when rows
 * share a month (weekly, biweekly and semimonthly payrolls)
 */
export function comparePeriods(a: PayPeriod, b: PayPeriod): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  const left = a.payDate ?? '';
  const right = b.payDate ?? '';
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
