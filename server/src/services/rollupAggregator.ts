/**
 * Report Rollups
 *
 * Folds stored ledger rows into the quarterly Form 941 and Florida RT-6
 * totals and the annual Form 940 totals. Caps were already applied when each
 * row was computed, so the rollups are straight sums over the rows' taxable
 * wages. Sums are exact decimal additions of cent amounts: the result does not
 * depend on row order, and folding the same rows twice gives the same figures.
 *
 * Rows are a closed snapshot; nothing here reads storage or tax files.
 */

import type {
  CompanyTaxProfile,
  Form940EmployeeDetail,
  Form940Summary,
  Form941Summary,
  FutaCapViolation,
  PayrollLedgerRow,
  Quarter,
  Rt6EmployeeDetail,
  Rt6Summary,
} from '../../../shared/types/index.js';
import { AppError, InconsistentRateAcrossPeriodError } from '../utils/AppError.js';
import { isQuarter, quarterMonths, quarterOfMonth } from '../utils/dateUtils.js';
import { Decimal, exact, exactSum, roundCents, toNumber } from '../utils/decimal.js';
import { createModuleLogger } from './logger.js';

const log = createModuleLogger('rollupAggregator');

export interface QuarterlyReports {
  form941: Form941Summary;
  rt6: Rt6Summary;
}

function sum(rows: readonly PayrollLedgerRow[], pick: (row: PayrollLedgerRow) => number): Decimal {
  return exactSum(rows.map(pick));
}

function byEmployee(rows: readonly PayrollLedgerRow[]): Map<string, PayrollLedgerRow[]> {
  const groups = new Map<string, PayrollLedgerRow[]>();
  for (const row of rows) {
    const group = groups.get(row.employeeId);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.employeeId, [row]);
    }
  }
  return groups;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function distinct(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Total deposit liability a row contributes to a 941 month
 */
function rowTaxLiability(row: PayrollLedgerRow): Decimal {
  return exactSum([
    row.employeeTaxes.federalIncomeTax,
    row.employeeTaxes.socialSecurity,
    row.employerTaxes.socialSecurity,
    row.employeeTaxes.medicare,
    row.employerTaxes.medicare,
    row.employeeTaxes.additionalMedicare,
  ]);
}

function assertYear(year: number): void {
  if (!Number.isInteger(year)) {
    throw AppError.badRequest(`Invalid tax year: ${year}`, 'INVALID_PERIOD');
  }
}

function buildForm941(
  rows: readonly PayrollLedgerRow[],
  companyId: string,
  year: number,
  quarter: Quarter
): Form941Summary {
  const ssWages = sum(rows, row => row.taxableWages.socialSecurity);
  const ssTax = sum(rows, row => row.employeeTaxes.socialSecurity).plus(
    sum(rows, row => row.employerTaxes.socialSecurity)
  );
  const medicareWages = sum(rows, row => row.taxableWages.medicare);
  const medicareTax = sum(rows, row => row.employeeTaxes.medicare).plus(sum(rows, row => row.employerTaxes.medicare));
  const additionalWages = sum(rows, row => row.taxableWages.additionalMedicare);
  const additionalTax = sum(rows, row => row.employeeTaxes.additionalMedicare);
  const federalIncomeTax = sum(rows, row => row.employeeTaxes.federalIncomeTax);

  const line5e = ssTax.plus(medicareTax).plus(additionalTax);
  const [m1, m2, m3] = quarterMonths(quarter);
  const monthLiability = (month: number) =>
    toNumber(exactSum(rows.filter(row => row.period.month === month).map(rowTaxLiability)));

  return {
    companyId,
    year,
    quarter,
    line1EmployeeCount: byEmployee(rows).size,
    line2Wages: toNumber(sum(rows, row => row.earnings.grossPay)),
    line3FederalIncomeTax: toNumber(federalIncomeTax),
    line5aSocialSecurityWages: toNumber(ssWages),
    line5aSocialSecurityTax: toNumber(ssTax),
    line5cMedicareWages: toNumber(medicareWages),
    line5cMedicareTax: toNumber(medicareTax),
    line5dAdditionalMedicareWages: toNumber(additionalWages),
    line5dAdditionalMedicareTax: toNumber(additionalTax),
    line5eTotalSocialSecurityMedicare: toNumber(line5e),
    line6TotalTaxes: toNumber(federalIncomeTax.plus(line5e)),
    monthlyTaxLiability: {
      month1: monthLiability(m1),
      month2: monthLiability(m2),
      month3: monthLiability(m3),
    },
    rowCount: rows.length,
  };
}

/**
 * RT-6: tax due is the company rate applied once to the quarter's taxable
 * total. The per-row contributions are reported beside it so the two can be
 * reconciled.
 */
function buildRt6(
  rows: readonly PayrollLedgerRow[],
  company: CompanyTaxProfile,
  year: number,
  quarter: Quarter
): Rt6Summary {
  const employeeDetail: Rt6EmployeeDetail[] = [...byEmployee(rows).entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([employeeId, employeeRows]) => {
      const gross = sum(employeeRows, row => row.earnings.grossPay);
      const taxable = sum(employeeRows, row => row.taxableWages.suta);
      return {
        employeeId,
        grossWages: toNumber(gross),
        taxableWages: toNumber(taxable),
        excessWages: toNumber(gross.minus(taxable)),
      };
    });

  const grossWages = sum(rows, row => row.earnings.grossPay);
  const taxableWages = sum(rows, row => row.taxableWages.suta);

  return {
    companyId: company.companyId,
    year,
    quarter,
    sutaRate: company.sutaRate,
    grossWages: toNumber(grossWages),
    excessWages: toNumber(grossWages.minus(taxableWages)),
    taxableWages: toNumber(taxableWages),
    taxDue: toNumber(roundCents(taxableWages.times(company.sutaRate))),
    rowContributions: toNumber(sum(rows, row => row.employerTaxes.suta)),
    employeeDetail,
    rowCount: rows.length,
  };
}

/**
 * Form 941 and RT-6 totals for one company and quarter
 */
export function aggregateQuarter(
  rows: readonly PayrollLedgerRow[],
  company: CompanyTaxProfile,
  year: number,
  quarter: number
): QuarterlyReports {
  assertYear(year);
  if (!isQuarter(quarter)) {
    throw AppError.badRequest(`Invalid quarter: ${quarter}`, 'INVALID_PERIOD');
  }

  const months = quarterMonths(quarter);
  const quarterRows = rows.filter(
    row =>
      row.companyId === company.companyId && row.period.year === year && months.includes(row.period.month)
  );

  log.debug(`Aggregating Q${quarter} ${year}`, { companyId: company.companyId, rows: quarterRows.length });

  return {
    form941: buildForm941(quarterRows, company.companyId, year, quarter),
    rt6: buildRt6(quarterRows, company, year, quarter),
  };
}

/**
 * Form 940 totals for one company and calendar year
 *
 * @throws InconsistentRateAcrossPeriodError when the rows carry more than one FUTA rate
 */
export function aggregateYear(rows: readonly PayrollLedgerRow[], companyId: string, year: number): Form940Summary {
  assertYear(year);
  const yearRows = rows.filter(row => row.companyId === companyId && row.period.year === year);

  const rates = distinct(yearRows.map(row => row.appliedRates.futa));
  if (rates.length > 1) {
    throw new InconsistentRateAcrossPeriodError('FUTA rate', rates, { companyId, year });
  }
  const futaRate = rates.length === 1 ? rates[0] : null;

  const employeeDetail: Form940EmployeeDetail[] = [];
  const violations: FutaCapViolation[] = [];

  const employees = [...byEmployee(yearRows).entries()].sort(([a], [b]) => compareIds(a, b));
  for (const [employeeId, employeeRows] of employees) {
    const payments = sum(employeeRows, row => row.earnings.grossPay);
    const taxable = sum(employeeRows, row => row.taxableWages.futa);
    employeeDetail.push({
      employeeId,
      totalPayments: toNumber(payments),
      futaTaxableWages: toNumber(taxable),
      exemptPayments: toNumber(payments.minus(taxable)),
    });

    const wageBase = Math.min(...employeeRows.map(row => row.appliedRates.futaWageBase));
    if (taxable.greaterThan(wageBase)) {
      violations.push({ employeeId, futaTaxableWages: toNumber(taxable), wageBase });
    }
  }

  if (violations.length > 0) {
    log.warn(`Form 940 ${year}: FUTA taxable wages exceed the wage base for ${violations.length} employee(s)`, {
      companyId,
      violations,
    });
  }

  const totalPayments = sum(yearRows, row => row.earnings.grossPay);
  const taxableWages = sum(yearRows, row => row.taxableWages.futa);

  const quarterTax = (quarter: Quarter) =>
    sum(
      yearRows.filter(row => quarterOfMonth(row.period.month) === quarter),
      row => row.employerTaxes.futa
    );
  const q1 = quarterTax(1);
  const q2 = quarterTax(2);
  const q3 = quarterTax(3);
  const q4 = quarterTax(4);

  return {
    companyId,
    year,
    futaRate,
    line3TotalPayments: toNumber(totalPayments),
    line5ExcessPayments: toNumber(totalPayments.minus(taxableWages)),
    line7TaxableFutaWages: toNumber(taxableWages),
    line8FutaTax: futaRate === null ? 0 : toNumber(roundCents(taxableWages.times(exact(futaRate)))),
    rowFutaTax: toNumber(sum(yearRows, row => row.employerTaxes.futa)),
    quarterlyLiability: {
      q1: toNumber(q1),
      q2: toNumber(q2),
      q3: toNumber(q3),
      q4: toNumber(q4),
      total: toNumber(exactSum([q1, q2, q3, q4])),
    },
    employeeDetail,
    consistency: {
      ok: violations.length === 0,
      violations,
    },
    rowCount: yearRows.length,
  };
}
