/**
 * Employer-only unemployment taxes
 *
 * - FUTA: federal rate and wage base from the tax-year configuration (the
 *   configured rate is the effective rate after the state credit)
 * - SUTA: Florida reemployment tax; the wage base comes from the tax-year
 *   configuration, the rate is the employer's own assigned rate
 */

import { Decimal } from '../utils/decimal.js';
import type { TaxRates } from './config/taxYearSchema.js';
import type { CalculationTrace } from './trace.js';
import { cappedTaxableWages } from './wageBase.js';

export interface UnemploymentTaxResult {
  taxableWages: Decimal;
  tax: Decimal;
  rate: number;
}

export function calculateFuta(
  grossPay: Decimal,
  priorYtdWages: Decimal,
  rates: TaxRates['futa'],
  trace: CalculationTrace
): UnemploymentTaxResult {
  const taxableWages = cappedTaxableWages('futa', grossPay, rates.wageBase, priorYtdWages, trace);
  const tax = trace.cents(
    'futa.employerTax',
    'taxableWages * employerRate',
    { taxableWages, employerRate: rates.employerRate },
    taxableWages.times(rates.employerRate)
  );
  return { taxableWages, tax, rate: rates.employerRate };
}

export function calculateSuta(
  grossPay: Decimal,
  priorYtdWages: Decimal,
  rates: TaxRates['suta'],
  companySutaRate: number,
  trace: CalculationTrace
): UnemploymentTaxResult {
  const taxableWages = cappedTaxableWages('suta', grossPay, rates.wageBase, priorYtdWages, trace);
  const tax = trace.cents(
    'suta.employerTax',
    'taxableWages * companySutaRate',
    { taxableWages, companySutaRate, state: rates.state },
    taxableWages.times(companySutaRate)
  );
  return { taxableWages, tax, rate: companySutaRate };
}
