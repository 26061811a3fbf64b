/**
 * Withholding Calculator Unit Tests
 * One ledger row per (employee, period) against the 2025 monthly tables
 */

import { describe, it, expect } from '@jest/globals';
import {
  config2025,
  createCompany,
  createProfile,
  createRun,
  createW4,
  runMonths,
} from '../../__tests__/fixtures';
import { findTraceEntry } from '../../tax/trace';
import {
  AppError,
  NegativeInputRejectedError,
  UnsupportedFilingStatusError,
  UnsupportedFrequencyError,
} from '../../utils/AppError';
import { computePayroll, type WithholdingInput } from '../withholdingCalculator';
import { summarizeYtd } from '../ytdSummary';

describe('WithholdingCalculator', () => {
  const config = config2025();

  const createInput = (overrides: Partial<WithholdingInput> = {}): WithholdingInput => ({
    company: createCompany(),
    profile: createProfile(),
    run: createRun(),
    ...overrides,
  });

  const expectAppError = (fn: () => unknown, code: string) => {
    try {
      fn();
      throw new Error(`expected ${code}`);
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.code).toBe(code);
      }
    }
  };

  describe('salaried employee, 4000 per month, single', () => {
    const row = computePayroll(createInput(), config);

    it('should compute every line item', () => {
      expect(row.earnings).toEqual({ regularPay: 4000, bonus: 0, reimbursements: 0, grossPay: 4000 });
      expect(row.employeeTaxes).toEqual({
        federalIncomeTax: 310.13,
        socialSecurity: 248,
        medicare: 58,
        additionalMedicare: 0,
      });
      expect(row.employerTaxes).toEqual({ socialSecurity: 248, medicare: 58, futa: 24, suta: 108 });
      expect(row.netPay).toBe(3383.87);
    });

    it('should record taxable wages for later rollups', () => {
      expect(row.taxableWages).toEqual({
        federalIncomeTax: 33000,
        socialSecurity: 4000,
        medicare: 4000,
        additionalMedicare: 0,
        futa: 4000,
        suta: 4000,
      });
    });

    it('should stamp the configuration and rates it used', () => {
      expect(row.configRef).toMatchObject({ taxYear: 2025, payFrequency: 'MONTHLY', version: '2025.1' });
      expect(row.appliedRates).toMatchObject({
        socialSecurityEmployee: 0.062,
        socialSecurityWageBase: 176100,
        medicareEmployee: 0.0145,
        futa: 0.006,
        futaWageBase: 7000,
        suta: 0.027,
        sutaWageBase: 7000,
      });
    });

    it('should trace the calculation from earnings to net pay', () => {
      const trace = row.calculationTrace;
      expect(trace).toHaveLength(25);
      expect(trace.map(entry => entry.step)).toEqual(trace.map((_, index) => index + 1));
      expect(trace[0].label).toBe('earnings.regularPay');
      expect(trace[trace.length - 1]).toMatchObject({ label: 'netPay', value: '3383.87' });
      expect(findTraceEntry(trace, 'fit.withholding')?.value).toBe('310.13');
      expect(findTraceEntry(trace, 'suta.employerTax')?.inputs.companySutaRate).toBe('0.027');
    });

    it('should be deterministic', () => {
      expect(computePayroll(createInput(), config)).toEqual(row);
    });

    it('should return a frozen row', () => {
      expect(Object.isFrozen(row)).toBe(true);
      expect(Object.isFrozen(row.employeeTaxes)).toBe(true);
      expect(Object.isFrozen(row.calculationTrace)).toBe(true);
      expect(Object.isFrozen(row.calculationTrace[0].inputs)).toBe(true);
    });
  });

  describe('earnings', () => {
    it('should multiply the hourly rate by hours worked', () => {
      const row = computePayroll(
        createInput({
          profile: createProfile({ payType: 'HOURLY', baseRate: 25.5 }),
          run: createRun({ hoursWorked: 160 }),
        }),
        config
      );
      expect(row.earnings.regularPay).toBe(4080);
      expect(row.hoursWorked).toBe(160);
    });

    it('should fall back to standard hours', () => {
      const row = computePayroll(
        createInput({ profile: createProfile({ payType: 'HOURLY', baseRate: 20, standardHours: 173.33 }) }),
        config
      );
      expect(row.earnings.regularPay).toBe(3466.6);
    });

    it('should include bonus and reimbursements in gross pay', () => {
      const row = computePayroll(createInput({ run: createRun({ bonus: 1000, reimbursements: 200 }) }), config);
      expect(row.earnings).toEqual({ regularPay: 4000, bonus: 1000, reimbursements: 200, grossPay: 5200 });
    });

    it('should subtract other deductions from net pay only', () => {
      const row = computePayroll(createInput({ run: createRun({ otherDeductions: 150 }) }), config);
      expect(row.employeeTaxes.federalIncomeTax).toBe(310.13);
      expect(row.netPay).toBe(3233.87);
    });
  });

  describe('zero gross pay', () => {
    it('should produce no taxes and net equal to gross', () => {
      const row = computePayroll(
        createInput({
          profile: createProfile({ payType: 'HOURLY', baseRate: 25, w4: createW4({ extraWithholding: 50 }) }),
          run: createRun({ hoursWorked: 0 }),
        }),
        config
      );

      expect(row.earnings.grossPay).toBe(0);
      expect(row.employeeTaxes).toEqual({ federalIncomeTax: 0, socialSecurity: 0, medicare: 0, additionalMedicare: 0 });
      expect(row.employerTaxes).toEqual({ socialSecurity: 0, medicare: 0, futa: 0, suta: 0 });
      expect(row.netPay).toBe(0);
    });
  });

  describe('wage bases', () => {
    it('should tax only the Social Security headroom left', () => {
      const row = computePayroll(
        createInput({
          profile: createProfile({ baseRate: 2000 }),
          priorYtd: { socialSecurityWages: 175600, medicareWages: 175600, futaWages: 7000, sutaWages: 7000 },
        }),
        config
      );

      expect(row.taxableWages.socialSecurity).toBe(500);
      expect(row.employeeTaxes.socialSecurity).toBe(31);
      expect(row.employerTaxes.socialSecurity).toBe(31);
      expect(row.employeeTaxes.medicare).toBe(29);
      expect(row.employerTaxes.futa).toBe(0);
      expect(row.employerTaxes.suta).toBe(0);
    });

    it('should keep a year of Social Security tax within the wage base', () => {
      const company = createCompany();
      const profile = createProfile({ baseRate: 20000 });
      const rows = runMonths(profile, company, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12], config);
      const ytd = summarizeYtd(rows, company.companyId, profile.employeeId, 2025);

      // 176100 x 6.2%
      expect(ytd.socialSecurityWages).toBe(176100);
      expect(ytd.socialSecurityEmployee).toBe(10918.2);
      expect(rows[8].taxableWages.socialSecurity).toBe(16100);
      expect(rows[9].taxableWages.socialSecurity).toBe(0);

      // 240000 of Medicare wages, 40000 above the threshold
      expect(rows[9].employeeTaxes.additionalMedicare).toBe(0);
      expect(rows[10].employeeTaxes.additionalMedicare).toBe(180);
      expect(ytd.additionalMedicareEmployee).toBe(360);
    });
  });

  describe('rejected input', () => {
    it('should reject negative hours', () => {
      try {
        computePayroll(
          createInput({ profile: createProfile({ payType: 'HOURLY', baseRate: 20 }), run: createRun({ hoursWorked: -1 }) }),
          config
        );
        throw new Error('expected a rejection');
      } catch (error) {
        expect(error).toBeInstanceOf(NegativeInputRejectedError);
        if (error instanceof NegativeInputRejectedError) {
          expect(error.field).toBe('run.hoursWorked');
        }
      }
    });

    it('should reject negative W-4 amounts and prior wages', () => {
      expectAppError(
        () => computePayroll(createInput({ profile: createProfile({ w4: createW4({ deductions: -100 }) }) }), config),
        'NEGATIVE_INPUT_REJECTED'
      );
      expectAppError(
        () =>
          computePayroll(
            createInput({ priorYtd: { socialSecurityWages: -1, medicareWages: 0, futaWages: 0, sutaWages: 0 } }),
            config
          ),
        'NEGATIVE_INPUT_REJECTED'
      );
    });

    it('should reject a filing status the configuration does not define', () => {
      const single = config.fit.filingStatuses.SINGLE;
      const singleOnly = { ...config, fit: { ...config.fit, filingStatuses: { SINGLE: single } } };

      expect(() =>
        computePayroll(createInput({ profile: createProfile({ filingStatus: 'HEAD_OF_HOUSEHOLD' }) }), singleOnly)
      ).toThrow(UnsupportedFilingStatusError);
    });

    it('should reject a profile paid on another frequency', () => {
      expect(() => computePayroll(createInput({ profile: createProfile({ payFrequency: 'WEEKLY' }) }), config)).toThrow(
        UnsupportedFrequencyError
      );
    });

    it('should reject a period outside the configuration year', () => {
      expectAppError(
        () => computePayroll(createInput({ run: createRun({ period: { year: 2024, month: 12 } }) }), config),
        'TAX_YEAR_MISMATCH'
      );
    });

    it('should require a pay date for runs paid more than once a month', () => {
      const biweekly = createProfile({ baseRate: 2000, payFrequency: 'BIWEEKLY' });
      expectAppError(() => computePayroll(createInput({ profile: biweekly }), config2025('BIWEEKLY')), 'VALIDATION_ERROR');
    });

    it('should reject a pay date outside the period', () => {
      expectAppError(
        () => computePayroll(createInput({ run: createRun({ period: { year: 2025, month: 1, payDate: '2025-02-07' } }) }), config),
        'VALIDATION_ERROR'
      );
      expectAppError(
        () => computePayroll(createInput({ run: createRun({ period: { year: 2025, month: 1, payDate: '2025-01-32' } }) }), config),
        'INVALID_PAY_DATE'
      );
    });

    it('should require hours for hourly employees', () => {
      expectAppError(
        () => computePayroll(createInput({ profile: createProfile({ payType: 'HOURLY', baseRate: 20 }) }), config),
        'INSUFFICIENT_DATA'
      );
    });

    it('should reject a SUTA rate entered as a percentage', () => {
      expectAppError(
        () => computePayroll(createInput({ company: createCompany({ sutaRate: 2.7 }) }), config),
        'INVALID_RATE'
      );
    });
  });
});
