/**
 * W-2 box values from one employee's ledger rows for a tax year
 *
 * Boxes 3 and 5 are derived back from the tax withheld and the employee rate
 * stamped on the rows. A year whose rows carry more than one rate cannot be
 * derived that way and is refused rather than resolved with either rate.
 */

import type { PayrollLedgerRow, W2Boxes } from '../../../shared/types/index.js';
import { InconsistentRateAcrossPeriodError, PayrollError } from '../utils/AppError.js';
import { Decimal, exactSum, roundCents, toNumber } from '../utils/decimal.js';
import { createModuleLogger } from './logger.js';

const log = createModuleLogger('w2Mapper');

function distinctValues<T>(values: T[]): T[] {
  return [...new Set(values)];
}

function singleRate(rows: readonly PayrollLedgerRow[], name: string, pick: (row: PayrollLedgerRow) => number): number {
  const rates = distinctValues(rows.map(pick)).sort((a, b) => a - b);
  if (rates.length > 1) {
    const { companyId, employeeId } = rows[0];
    throw new InconsistentRateAcrossPeriodError(name, rates, {
      companyId,
      employeeId,
      taxYear: rows[0].period.year,
    });
  }
  return rates[0];
}

/**
 * Wages implied by the tax withheld. A zero rate implies nothing, so the
 * stored taxable wages are used instead.
 */
function wagesFromTax(tax: Decimal, rate: number, storedWages: Decimal): Decimal {
  if (rate === 0) {
    return storedWages;
  }
  return roundCents(tax.dividedBy(rate));
}

export function mapYear(rows: readonly PayrollLedgerRow[]): W2Boxes {
  if (rows.length === 0) {
    throw PayrollError.insufficientData('No ledger rows to build a W-2 from');
  }

  const companies = distinctValues(rows.map(row => row.companyId));
  const employees = distinctValues(rows.map(row => row.employeeId));
  const years = distinctValues(rows.map(row => row.period.year));
  if (companies.length > 1 || employees.length > 1 || years.length > 1) {
    throw new PayrollError('W-2 rows must belong to one company, one employee and one tax year', 'MIXED_ROW_SET', {
      companies,
      employees,
      years,
    });
  }

  const ssRate = singleRate(rows, 'Social Security employee rate', row => row.appliedRates.socialSecurityEmployee);
  const medicareRate = singleRate(rows, 'Medicare employee rate', row => row.appliedRates.medicareEmployee);

  const gross = exactSum(rows.map(row => row.earnings.grossPay));
  const fit = exactSum(rows.map(row => row.employeeTaxes.federalIncomeTax));
  const ssTax = exactSum(rows.map(row => row.employeeTaxes.socialSecurity));
  const medicareTax = exactSum(rows.map(row => row.employeeTaxes.medicare));
  const additionalMedicare = exactSum(rows.map(row => row.employeeTaxes.additionalMedicare));
  const storedSsWages = exactSum(rows.map(row => row.taxableWages.socialSecurity));
  const storedMedicareWages = exactSum(rows.map(row => row.taxableWages.medicare));

  const box3 = wagesFromTax(ssTax, ssRate, storedSsWages);
  const box5 = wagesFromTax(medicareTax, medicareRate, storedMedicareWages);

  if (!box3.equals(storedSsWages) || !box5.equals(storedMedicareWages)) {
    log.info('W-2 derived wages differ from stored taxable wages', {
      employeeId: employees[0],
      box3: toNumber(box3),
      storedSocialSecurityWages: toNumber(storedSsWages),
      box5: toNumber(box5),
      storedMedicareWages: toNumber(storedMedicareWages),
    });
  }

  return {
    companyId: companies[0],
    employeeId: employees[0],
    taxYear: years[0],
    box1WagesTipsOther: toNumber(gross),
    box2FederalWithholding: toNumber(fit),
    box3SocialSecurityWages: toNumber(box3),
    box4SocialSecurityTax: toNumber(ssTax),
    box5MedicareWages: toNumber(box5),
    box6MedicareTax: toNumber(medicareTax.plus(additionalMedicare)),
    reconciliation: {
      socialSecurityEmployeeRate: ssRate,
      medicareEmployeeRate: medicareRate,
      storedSocialSecurityWages: toNumber(storedSsWages),
      storedMedicareWages: toNumber(storedMedicareWages),
    },
  };
}
