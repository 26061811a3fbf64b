/**
 * Federal Income Tax Withholding - annualized percentage method
 * (IRS Publication 15-T, Worksheet 1A style, 2020+ Form W-4)
 *
 * Annual amounts come from the tax-year configuration; nothing here is
 * specific to a year. Intermediate values are kept at full precision and the
 * withholding is rounded to cents once, at the end.
 */

import type { W4Adjustments } from '../../../shared/types/index.js';
import { PayrollError } from '../utils/AppError.js';
import { Decimal, exact } from '../utils/decimal.js';
import type { FilingStatusTable, TaxBracket } from './config/taxYearSchema.js';
import type { CalculationTrace } from './trace.js';

export const FIT_TRACE = {
  annualizedWages: 'fit.annualizedWages',
  adjustedAnnualWages: 'fit.adjustedAnnualWages',
  bracket: 'fit.bracketSelected',
  annualTax: 'fit.annualTax',
  annualTaxAfterCredits: 'fit.annualTaxAfterCredits',
  periodTax: 'fit.periodTax',
  withholding: 'fit.withholding',
} as const;

export interface FederalWithholdingInput {
  grossPay: Decimal;
  periodsPerYear: number;
  table: FilingStatusTable;
  w4: W4Adjustments;
}

export interface FederalWithholdingResult {
  withholding: Decimal;
  adjustedAnnualWages: Decimal;
  bracket: TaxBracket | null;
}

/**
 * Largest bracket whose lower bound is at or below the amount
 */
export function selectBracket(brackets: readonly TaxBracket[], amount: Decimal): TaxBracket | undefined {
  let selected: TaxBracket | undefined;
  for (const bracket of brackets) {
    if (amount.greaterThanOrEqualTo(bracket.min)) {
      selected = bracket;
    }
  }
  return selected;
}

export function calculateFederalWithholding(
  input: FederalWithholdingInput,
  trace: CalculationTrace
): FederalWithholdingResult {
  const { grossPay, periodsPerYear, table, w4 } = input;

  // No wages, no withholding (extra withholding included)
  if (grossPay.lessThanOrEqualTo(0)) {
    const withholding = trace.cents(
      FIT_TRACE.withholding,
      'no wages paid this period',
      { grossPay },
      new Decimal(0)
    );
    return { withholding, adjustedAnnualWages: new Decimal(0), bracket: null };
  }

  const annualizedWages = trace.exact(
    FIT_TRACE.annualizedWages,
    'grossPay * periodsPerYear',
    { grossPay, periodsPerYear },
    grossPay.times(periodsPerYear)
  );

  // Step 4(a) raises the base, Step 4(b) and the standard deduction lower it
  const adjustedAnnualWages = trace.exact(
    FIT_TRACE.adjustedAnnualWages,
    'max(0, annualizedWages + otherIncome - deductions - standardDeduction)',
    {
      annualizedWages,
      otherIncome: w4.otherIncome,
      deductions: w4.deductions,
      standardDeduction: table.standardDeduction,
    },
    Decimal.max(
      0,
      annualizedWages.plus(w4.otherIncome).minus(w4.deductions).minus(table.standardDeduction)
    )
  );

  const bracket = selectBracket(table.brackets, adjustedAnnualWages);
  if (bracket === undefined) {
    throw PayrollError.calculationError(
      `No FIT bracket covers an adjusted annual wage of ${adjustedAnnualWages.toString()}`
    );
  }

  trace.exact(
    FIT_TRACE.bracket,
    'largest bracket with min <= adjustedAnnualWages',
    {
      adjustedAnnualWages,
      min: bracket.min,
      max: bracket.max === null ? 'none' : bracket.max,
      rate: bracket.rate,
      base: bracket.base,
    },
    exact(bracket.min)
  );

  const annualTax = trace.exact(
    FIT_TRACE.annualTax,
    'base + rate * (adjustedAnnualWages - min)',
    { base: bracket.base, rate: bracket.rate, adjustedAnnualWages, min: bracket.min },
    exact(bracket.base).plus(exact(bracket.rate).times(adjustedAnnualWages.minus(bracket.min)))
  );

  const annualTaxAfterCredits = trace.exact(
    FIT_TRACE.annualTaxAfterCredits,
    'max(0, annualTax - dependentsCredit)',
    { annualTax, dependentsCredit: w4.dependentsCredit },
    Decimal.max(0, annualTax.minus(w4.dependentsCredit))
  );

  const periodTax = trace.exact(
    FIT_TRACE.periodTax,
    'annualTaxAfterCredits / periodsPerYear',
    { annualTaxAfterCredits, periodsPerYear },
    annualTaxAfterCredits.dividedBy(periodsPerYear)
  );

  // Step 4(c) is already a per-period amount
  const withholding = trace.cents(
    FIT_TRACE.withholding,
    'periodTax + extraWithholding',
    { periodTax, extraWithholding: w4.extraWithholding },
    periodTax.plus(w4.extraWithholding)
  );

  return { withholding, adjustedAnnualWages, bracket };
}
