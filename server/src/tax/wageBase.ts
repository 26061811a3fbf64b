import { Decimal } from '../utils/decimal.js';
import type { CalculationTrace } from './trace.js';

/**
 * Wages subject to a tax with an annual wage base, for one period:
 * max(0, min(grossPay, wageBase - priorYtdTaxableWages)).
 *
 * The prior figure is supplied by the caller, so no running total is kept
 * here. Calendar-year reset is implied by passing that year's prior wages.
 */
export function cappedTaxableWages(
  prefix: string,
  grossPay: Decimal,
  wageBase: number,
  priorYtdTaxableWages: Decimal,
  trace: CalculationTrace
): Decimal {
  const headroom = trace.exact(
    `${prefix}.capHeadroom`,
    'max(0, wageBase - priorYtdTaxableWages)',
    { wageBase, priorYtdTaxableWages },
    Decimal.max(0, new Decimal(wageBase).minus(priorYtdTaxableWages))
  );

  return trace.cents(
    `${prefix}.taxableWages`,
    'max(0, min(grossPay, capHeadroom))',
    { grossPay, capHeadroom: headroom },
    Decimal.max(0, Decimal.min(grossPay, headroom))
  );
}
