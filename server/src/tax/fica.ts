/**
 * FICA: Social Security and Medicare, employee and employer shares
 *
 * - Social Security stops at the annual wage base
 * - Medicare has no wage base
 * - Additional Medicare (employee only) applies to year-to-date Medicare
 *   wages above a fixed withholding threshold, regardless of filing status
 *   (IRS Publication 15); the liability is reconciled on the employee's return
 */

import { Decimal } from '../utils/decimal.js';
import type { TaxRates } from './config/taxYearSchema.js';
import type { CalculationTrace } from './trace.js';
import { cappedTaxableWages } from './wageBase.js';

export interface SocialSecurityResult {
  taxableWages: Decimal;
  employee: Decimal;
  employer: Decimal;
}

export interface MedicareResult {
  taxableWages: Decimal;
  employee: Decimal;
  employer: Decimal;
  additionalTaxableWages: Decimal;
  additionalEmployee: Decimal;
}

export function calculateSocialSecurity(
  grossPay: Decimal,
  priorYtdWages: Decimal,
  rates: TaxRates['socialSecurity'],
  trace: CalculationTrace
): SocialSecurityResult {
  const taxableWages = cappedTaxableWages('socialSecurity', grossPay, rates.wageBase, priorYtdWages, trace);

  const employee = trace.cents(
    'socialSecurity.employeeTax',
    'taxableWages * employeeRate',
    { taxableWages, employeeRate: rates.employeeRate },
    taxableWages.times(rates.employeeRate)
  );

  const employer = trace.cents(
    'socialSecurity.employerTax',
    'taxableWages * employerRate',
    { taxableWages, employerRate: rates.employerRate },
    taxableWages.times(rates.employerRate)
  );

  return { taxableWages, employee, employer };
}

export function calculateMedicare(
  grossPay: Decimal,
  priorYtdWages: Decimal,
  rates: TaxRates['medicare'],
  trace: CalculationTrace
): MedicareResult {
  const taxableWages = trace.cents(
    'medicare.taxableWages',
    'max(0, grossPay)',
    { grossPay },
    Decimal.max(0, grossPay)
  );

  const employee = trace.cents(
    'medicare.employeeTax',
    'taxableWages * employeeRate',
    { taxableWages, employeeRate: rates.employeeRate },
    taxableWages.times(rates.employeeRate)
  );

  const employer = trace.cents(
    'medicare.employerTax',
    'taxableWages * employerRate',
    { taxableWages, employerRate: rates.employerRate },
    taxableWages.times(rates.employerRate)
  );

  // Only the part of this period's wages that lands above the threshold
  const threshold = new Decimal(rates.additionalThreshold);
  const additionalTaxableWages = trace.cents(
    'medicare.additionalTaxableWages',
    'max(0, priorYtdWages + taxableWages - threshold) - max(0, priorYtdWages - threshold)',
    { priorYtdWages, taxableWages, threshold },
    Decimal.max(0, priorYtdWages.plus(taxableWages).minus(threshold))
      .minus(Decimal.max(0, priorYtdWages.minus(threshold)))
  );

  const additionalEmployee = trace.cents(
    'medicare.additionalEmployeeTax',
    'additionalTaxableWages * additionalEmployeeRate',
    { additionalTaxableWages, additionalEmployeeRate: rates.additionalEmployeeRate },
    additionalTaxableWages.times(rates.additionalEmployeeRate)
  );

  return { taxableWages, employee, employer, additionalTaxableWages, additionalEmployee };
}
