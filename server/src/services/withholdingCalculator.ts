import type {
  AppliedRates,
  CompanyTaxProfile,
  EmployeePayProfile,
  PayrollLedgerRow,
  PayrollRunInput,
  PriorYtd,
} from '../../../shared/types/index.js';
import type { TaxYearConfig } from '../tax/config/taxYearSchema.js';
import { definedFilingStatuses } from '../tax/config/validationGate.js';
import { calculateFuta, calculateSuta } from '../tax/employerTax.js';
import { calculateFederalWithholding } from '../tax/federalWithholding.js';
import { calculateMedicare, calculateSocialSecurity } from '../tax/fica.js';
import { CalculationTrace } from '../tax/trace.js';
import {
  AppError,
  NegativeInputRejectedError,
  PayrollError,
  UnsupportedFilingStatusError,
  UnsupportedFrequencyError,
} from '../utils/AppError.js';
import { periodFromPayDate, requiresPayDate } from '../utils/dateUtils.js';
import { Decimal, exact, toNumber } from '../utils/decimal.js';
import { deepFreeze } from '../utils/freeze.js';
import { logger } from './logger.js';

export const ZERO_PRIOR_YTD: PriorYtd = Object.freeze({
  socialSecurityWages: 0,
  medicareWages: 0,
  futaWages: 0,
  sutaWages: 0,
});

export interface WithholdingInput {
  company: CompanyTaxProfile;
  profile: EmployeePayProfile;
  run: PayrollRunInput;
  priorYtd?: PriorYtd;   // Taxable wages already paid this calendar year
}

interface Earnings {
  hoursWorked: number | null;
  regularPay: Decimal;
  bonus: Decimal;
  reimbursements: Decimal;
  grossPay: Decimal;
}

/**
 * Computes one ledger row for a (company, employee, period).
 *
 * Pure: the result depends only on the input and the configuration, and the
 * returned row is frozen. Wage-base caps use the prior year-to-date figures
 * passed in rather than any stored running total.
 */
export class WithholdingCalculator {
  compute(input: WithholdingInput, config: TaxYearConfig): PayrollLedgerRow {
    const { company, profile, run } = input;
    const priorYtd = input.priorYtd ?? ZERO_PRIOR_YTD;

    this.assertInputs(input, priorYtd);
    this.assertConfigMatches(input, config);
    this.assertPayDate(input);

    const table = config.fit.filingStatuses[profile.filingStatus];
    if (table === undefined) {
      throw new UnsupportedFilingStatusError(profile.filingStatus, config.year, definedFilingStatuses(config));
    }

    const trace = new CalculationTrace();
    const earnings = this.calculateEarnings(profile, run, trace);
    const { grossPay } = earnings;

    const federal = calculateFederalWithholding(
      {
        grossPay,
        periodsPerYear: config.fit.periodsPerYear,
        table,
        w4: profile.w4,
      },
      trace
    );

    const socialSecurity = calculateSocialSecurity(
      grossPay,
      exact(priorYtd.socialSecurityWages),
      config.rates.socialSecurity,
      trace
    );
    const medicare = calculateMedicare(grossPay, exact(priorYtd.medicareWages), config.rates.medicare, trace);
    const futa = calculateFuta(grossPay, exact(priorYtd.futaWages), config.rates.futa, trace);
    const suta = calculateSuta(grossPay, exact(priorYtd.sutaWages), config.rates.suta, company.sutaRate, trace);

    const otherDeductions = exact(run.otherDeductions ?? 0);
    const netPay = trace.cents(
      'netPay',
      'grossPay - (federalIncomeTax + socialSecurityEmployee + medicareEmployee + additionalMedicareEmployee + otherDeductions)',
      {
        grossPay,
        federalIncomeTax: federal.withholding,
        socialSecurityEmployee: socialSecurity.employee,
        medicareEmployee: medicare.employee,
        additionalMedicareEmployee: medicare.additionalEmployee,
        otherDeductions,
      },
      grossPay.minus(
        federal.withholding
          .plus(socialSecurity.employee)
          .plus(medicare.employee)
          .plus(medicare.additionalEmployee)
          .plus(otherDeductions)
      )
    );

    const row: PayrollLedgerRow = {
      companyId: company.companyId,
      employeeId: profile.employeeId,
      period: { ...run.period },
      payFrequency: profile.payFrequency,
      filingStatus: profile.filingStatus,
      configRef: {
        taxYear: config.year,
        payFrequency: config.payFrequency,
        version: config.metadata.version,
        source: config.metadata.source,
        effectiveDate: config.metadata.effectiveDate,
      },
      appliedRates: this.appliedRates(config, company.sutaRate),
      hoursWorked: earnings.hoursWorked,
      earnings: {
        regularPay: toNumber(earnings.regularPay),
        bonus: toNumber(earnings.bonus),
        reimbursements: toNumber(earnings.reimbursements),
        grossPay: toNumber(grossPay),
      },
      taxableWages: {
        federalIncomeTax: toNumber(federal.adjustedAnnualWages),
        socialSecurity: toNumber(socialSecurity.taxableWages),
        medicare: toNumber(medicare.taxableWages),
        additionalMedicare: toNumber(medicare.additionalTaxableWages),
        futa: toNumber(futa.taxableWages),
        suta: toNumber(suta.taxableWages),
      },
      employeeTaxes: {
        federalIncomeTax: toNumber(federal.withholding),
        socialSecurity: toNumber(socialSecurity.employee),
        medicare: toNumber(medicare.employee),
        additionalMedicare: toNumber(medicare.additionalEmployee),
      },
      employerTaxes: {
        socialSecurity: toNumber(socialSecurity.employer),
        medicare: toNumber(medicare.employer),
        futa: toNumber(futa.tax),
        suta: toNumber(suta.tax),
      },
      otherDeductions: toNumber(otherDeductions),
      netPay: toNumber(netPay),
      calculationTrace: trace.toArray(),
    };

    logger.debug('Computed payroll ledger row', {
      companyId: row.companyId,
      employeeId: row.employeeId,
      period: row.period,
      grossPay: row.earnings.grossPay,
      netPay: row.netPay,
      traceEntries: trace.length,
    });

    return deepFreeze(row);
  }

  private calculateEarnings(profile: EmployeePayProfile, run: PayrollRunInput, trace: CalculationTrace): Earnings {
    const baseRate = exact(profile.baseRate);
    const bonus = exact(run.bonus ?? 0);
    const reimbursements = exact(run.reimbursements ?? 0);

    let hoursWorked: number | null = null;
    let regularPay: Decimal;

    if (profile.payType === 'HOURLY') {
      const hours = run.hoursWorked ?? profile.standardHours;
      if (hours === null || hours === undefined) {
        throw PayrollError.insufficientData(
          `Hourly employee ${profile.employeeId} has no hours worked and no standard hours`
        );
      }
      hoursWorked = hours;
      regularPay = trace.cents(
        'earnings.regularPay',
        'baseRate * hoursWorked',
        { payType: profile.payType, baseRate, hoursWorked: hours },
        baseRate.times(hours)
      );
    } else {
      regularPay = trace.cents(
        'earnings.regularPay',
        'baseRate',
        { payType: profile.payType, baseRate },
        baseRate
      );
    }

    const grossPay = trace.cents(
      'earnings.grossPay',
      'regularPay + bonus + reimbursements',
      { regularPay, bonus, reimbursements },
      regularPay.plus(bonus).plus(reimbursements)
    );

    return { hoursWorked, regularPay, bonus, reimbursements, grossPay };
  }

  /**
   * Non-negativity is checked again here even when the caller validated,
   * and a negative value fails the computation rather than being clamped.
   */
  private assertInputs(input: WithholdingInput, priorYtd: PriorYtd): void {
    const { company, profile, run } = input;

    const amounts: Array<[string, number | null | undefined]> = [
      ['profile.baseRate', profile.baseRate],
      ['profile.standardHours', profile.standardHours],
      ['profile.w4.otherIncome', profile.w4.otherIncome],
      ['profile.w4.deductions', profile.w4.deductions],
      ['profile.w4.dependentsCredit', profile.w4.dependentsCredit],
      ['profile.w4.extraWithholding', profile.w4.extraWithholding],
      ['run.hoursWorked', run.hoursWorked],
      ['run.bonus', run.bonus],
      ['run.reimbursements', run.reimbursements],
      ['run.otherDeductions', run.otherDeductions],
      ['priorYtd.socialSecurityWages', priorYtd.socialSecurityWages],
      ['priorYtd.medicareWages', priorYtd.medicareWages],
      ['priorYtd.futaWages', priorYtd.futaWages],
      ['priorYtd.sutaWages', priorYtd.sutaWages],
      ['company.sutaRate', company.sutaRate],
    ];

    for (const [field, value] of amounts) {
      if (value === null || value === undefined) continue;
      if (!Number.isFinite(value)) {
        throw AppError.badRequest(`${field} must be a finite number`, 'VALIDATION_ERROR', { field });
      }
      if (value < 0) {
        throw new NegativeInputRejectedError(field, value);
      }
    }

    if (company.sutaRate > 1) {
      throw AppError.badRequest(
        `company.sutaRate must be a decimal rate within [0, 1], received ${company.sutaRate}`,
        'INVALID_RATE',
        { field: 'company.sutaRate' }
      );
    }

    const { month } = run.period;
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw AppError.badRequest(`run.period.month must be 1-12, received ${month}`, 'INVALID_PERIOD');
    }
  }

  private assertConfigMatches(input: WithholdingInput, config: TaxYearConfig): void {
    if (input.profile.payFrequency !== config.payFrequency) {
      throw new UnsupportedFrequencyError(input.profile.payFrequency, [config.payFrequency]);
    }
    if (input.run.period.year !== config.year) {
      throw new PayrollError(
        `Period year ${input.run.period.year} does not match the ${config.year} tax configuration`,
        'TAX_YEAR_MISMATCH'
      );
    }
  }

  /**
   * Runs paid more than once a month are ordered by pay date when prior
   * year-to-date wages are folded, so they must carry one that falls in the
   * period.
   */
  private assertPayDate(input: WithholdingInput): void {
    const { profile, run } = input;
    const { payDate } = run.period;
    const field = 'run.period.payDate';

    if (payDate === undefined) {
      if (requiresPayDate(profile.payFrequency)) {
        const message = `payDate is required for ${profile.payFrequency} payrolls`;
        throw AppError.unprocessableEntity(message, 'VALIDATION_ERROR', [{ field, message }]);
      }
      return;
    }

    const fromPayDate = periodFromPayDate(payDate);
    if (fromPayDate.year !== run.period.year || fromPayDate.month !== run.period.month) {
      const message = 'payDate must fall in the period year and month';
      throw AppError.unprocessableEntity(message, 'VALIDATION_ERROR', [{ field, message }]);
    }
  }

  private appliedRates(config: TaxYearConfig, sutaRate: number): AppliedRates {
    const { socialSecurity, medicare, futa, suta } = config.rates;
    return {
      socialSecurityEmployee: socialSecurity.employeeRate,
      socialSecurityEmployer: socialSecurity.employerRate,
      socialSecurityWageBase: socialSecurity.wageBase,
      medicareEmployee: medicare.employeeRate,
      medicareEmployer: medicare.employerRate,
      additionalMedicareEmployee: medicare.additionalEmployeeRate,
      additionalMedicareThreshold: medicare.additionalThreshold,
      futa: futa.employerRate,
      futaWageBase: futa.wageBase,
      suta: sutaRate,
      sutaWageBase: suta.wageBase,
    };
  }
}

const defaultCalculator = new WithholdingCalculator();

/**
 * compute(profile, run, priorYtd, config) as a plain function
 */
export function computePayroll(input: WithholdingInput, config: TaxYearConfig): PayrollLedgerRow {
  return defaultCalculator.compute(input, config);
}
