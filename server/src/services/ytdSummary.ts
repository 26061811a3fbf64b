/**
 * Year-to-date figures folded from ledger rows
 *
 * priorYtdFromRows supplies the wage-base inputs for the next computation;
 * summarizeYtd is the employee's running totals through a month.
 */

import type { PayPeriod, PayrollLedgerRow, PriorYtd, YtdSummary } from '../../../shared/types/index.js';
import { AppError, PayrollError } from '../utils/AppError.js';
import { comparePeriods, requiresPayDate } from '../utils/dateUtils.js';
import { exactSum, toNumber } from '../utils/decimal.js';

function rowsFor(rows: readonly PayrollLedgerRow[], companyId: string, employeeId: string, year: number) {
  return rows.filter(
    row => row.companyId === companyId && row.employeeId === employeeId && row.period.year === year
  );
}

function sumOf(rows: readonly PayrollLedgerRow[], pick: (row: PayrollLedgerRow) => number): number {
  return toNumber(exactSum(rows.map(pick)));
}

/**
 * A run paid more than once a month shares its period month with the other
 * runs of that month. Without distinct pay dates there is no telling which
 * of them came first.
 */
function assertOrderable(row: PayrollLedgerRow, period: PayPeriod): void {
  if (row.period.month !== period.month || !requiresPayDate(row.payFrequency)) {
    return;
  }
  const rowPayDate = row.period.payDate;
  if (rowPayDate === undefined || period.payDate === undefined || rowPayDate === period.payDate) {
    throw new PayrollError(
      `Cannot order a ${row.payFrequency} run paid ${rowPayDate ?? 'without a pay date'} against the requested ` +
        `period ${period.year}-${period.month} (${period.payDate ?? 'no pay date'})`,
      'AMBIGUOUS_PAY_PERIOD',
      { employeeId: row.employeeId, period, conflictingPayDate: rowPayDate ?? null }
    );
  }
}

/**
 * Taxable wages already paid in the calendar year before the given period.
 * Caps reset every January, so earlier years never count.
 *
 * @throws PayrollError AMBIGUOUS_PAY_PERIOD when a run in the same month
 *   cannot be ordered against the period by pay date
 */
export function priorYtdFromRows(
  rows: readonly PayrollLedgerRow[],
  companyId: string,
  employeeId: string,
  period: PayPeriod
): PriorYtd {
  const sameYear = rowsFor(rows, companyId, employeeId, period.year);
  for (const row of sameYear) {
    assertOrderable(row, period);
  }
  const earlier = sameYear.filter(row => comparePeriods(row.period, period) < 0);

  return {
    socialSecurityWages: sumOf(earlier, row => row.taxableWages.socialSecurity),
    medicareWages: sumOf(earlier, row => row.taxableWages.medicare),
    futaWages: sumOf(earlier, row => row.taxableWages.futa),
    sutaWages: sumOf(earlier, row => row.taxableWages.suta),
  };
}

export function summarizeYtd(
  rows: readonly PayrollLedgerRow[],
  companyId: string,
  employeeId: string,
  year: number,
  throughMonth = 12
): YtdSummary {
  if (!Number.isInteger(throughMonth) || throughMonth < 1 || throughMonth > 12) {
    throw AppError.badRequest(`throughMonth must be 1-12, received ${throughMonth}`, 'INVALID_PERIOD');
  }

  const included = rowsFor(rows, companyId, employeeId, year).filter(row => row.period.month <= throughMonth);

  return {
    companyId,
    employeeId,
    year,
    throughMonth,
    grossPay: sumOf(included, row => row.earnings.grossPay),
    federalIncomeTax: sumOf(included, row => row.employeeTaxes.federalIncomeTax),
    socialSecurityWages: sumOf(included, row => row.taxableWages.socialSecurity),
    socialSecurityEmployee: sumOf(included, row => row.employeeTaxes.socialSecurity),
    socialSecurityEmployer: sumOf(included, row => row.employerTaxes.socialSecurity),
    medicareWages: sumOf(included, row => row.taxableWages.medicare),
    medicareEmployee: sumOf(included, row => row.employeeTaxes.medicare),
    medicareEmployer: sumOf(included, row => row.employerTaxes.medicare),
    additionalMedicareEmployee: sumOf(included, row => row.employeeTaxes.additionalMedicare),
    futaWages: sumOf(included, row => row.taxableWages.futa),
    futaEmployer: sumOf(included, row => row.employerTaxes.futa),
    sutaWages: sumOf(included, row => row.taxableWages.suta),
    sutaEmployer: sumOf(included, row => row.employerTaxes.suta),
    otherDeductions: sumOf(included, row => row.otherDeductions),
    netPay: sumOf(included, row => row.netPay),
    rowCount: included.length,
  };
}
