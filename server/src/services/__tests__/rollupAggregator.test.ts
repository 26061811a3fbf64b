/**
 * Report Rollup Tests
 * Two employees paid monthly through Q1 2025 at a 2.7% Florida rate
 */

import { describe, it, expect } from '@jest/globals';
import type { PayrollLedgerRow } from '../../../../shared/types';
import { config2025, createCompany, createProfile, runMonths } from '../../__tests__/fixtures';
import { AppError, InconsistentRateAcrossPeriodError } from '../../utils/AppError';
import { aggregateQuarter, aggregateYear } from '../rollupAggregator';

describe('Rollup Aggregator', () => {
  const config = config2025();
  const company = createCompany();
  const first = createProfile();
  const second = createProfile({ employeeId: 'emp-2', baseRate: 3000 });

  const rows: PayrollLedgerRow[] = [
    ...runMonths(first, company, [1, 2, 3], config),
    ...runMonths(second, company, [1, 2, 3], config),
  ];
  const otherCompanyRows = runMonths(first, createCompany({ companyId: 'company-2' }), [1], config);

  describe('Form 941', () => {
    const { form941 } = aggregateQuarter(rows, company, 2025, 1);

    it('should total wages and withholding for the quarter', () => {
      expect(form941).toMatchObject({
        companyId: 'company-1',
        year: 2025,
        quarter: 1,
        line1EmployeeCount: 2,
        line2Wages: 21000,
        line3FederalIncomeTax: 1500.78,
        rowCount: 6,
      });
    });

    it('should combine employee and employer FICA', () => {
      expect(form941.line5aSocialSecurityWages).toBe(21000);
      expect(form941.line5aSocialSecurityTax).toBe(2604);
      expect(form941.line5cMedicareWages).toBe(21000);
      expect(form941.line5cMedicareTax).toBe(609);
      expect(form941.line5dAdditionalMedicareTax).toBe(0);
      expect(form941.line5eTotalSocialSecurityMedicare).toBe(3213);
      expect(form941.line6TotalTaxes).toBe(4713.78);
    });

    it('should split the deposit liability by month', () => {
      expect(form941.monthlyTaxLiability).toEqual({ month1: 1571.26, month2: 1571.26, month3: 1571.26 });
    });

    it('should ignore rows from other companies and quarters', () => {
      const { form941: withNoise } = aggregateQuarter(
        [...rows, ...otherCompanyRows, ...runMonths(first, company, [1, 2, 3, 4], config).slice(3)],
        company,
        2025,
        1
      );
      expect(withNoise).toEqual(form941);
    });

    it('should report an empty quarter as zeros', () => {
      const { form941: empty } = aggregateQuarter(rows, company, 2025, 3);
      expect(empty.line1EmployeeCount).toBe(0);
      expect(empty.line6TotalTaxes).toBe(0);
      expect(empty.monthlyTaxLiability).toEqual({ month1: 0, month2: 0, month3: 0 });
    });
  });

  describe('Florida RT-6', () => {
    const { rt6 } = aggregateQuarter(rows, company, 2025, 1);

    it('should stop each employee at the state wage base', () => {
      expect(rt6.employeeDetail).toEqual([
        { employeeId: 'emp-1', grossWages: 12000, taxableWages: 7000, excessWages: 5000 },
        { employeeId: 'emp-2', grossWages: 9000, taxableWages: 7000, excessWages: 2000 },
      ]);
    });

    it('should apply the company rate to the taxable total', () => {
      expect(rt6).toMatchObject({
        sutaRate: 0.027,
        grossWages: 21000,
        taxableWages: 14000,
        excessWages: 7000,
        taxDue: 378,
        rowContributions: 378,
        rowCount: 6,
      });
    });
  });

  describe('Form 940', () => {
    const form940 = aggregateYear(rows, 'company-1', 2025);

    it('should total FUTA wages and tax for the year', () => {
      expect(form940).toMatchObject({
        futaRate: 0.006,
        line3TotalPayments: 21000,
        line5ExcessPayments: 7000,
        line7TaxableFutaWages: 14000,
        line8FutaTax: 84,
        rowFutaTax: 84,
      });
      expect(form940.quarterlyLiability).toEqual({ q1: 84, q2: 0, q3: 0, q4: 0, total: 84 });
    });

    it('should list each employee with their exempt payments', () => {
      expect(form940.employeeDetail).toEqual([
        { employeeId: 'emp-1', totalPayments: 12000, futaTaxableWages: 7000, exemptPayments: 5000 },
        { employeeId: 'emp-2', totalPayments: 9000, futaTaxableWages: 7000, exemptPayments: 2000 },
      ]);
      expect(form940.consistency).toEqual({ ok: true, violations: [] });
    });

    it('should flag an employee whose taxable wages exceed the wage base', () => {
      const inflated = rows.map(row =>
        row.employeeId === 'emp-2' && row.period.month === 3
          ? { ...row, taxableWages: { ...row.taxableWages, futa: 2000 } }
          : row
      );

      const result = aggregateYear(inflated, 'company-1', 2025);
      expect(result.consistency).toEqual({
        ok: false,
        violations: [{ employeeId: 'emp-2', futaTaxableWages: 8000, wageBase: 7000 }],
      });
    });

    it('should refuse rows that carry different FUTA rates', () => {
      const mixed = rows.map((row, index) =>
        index === 0 ? { ...row, appliedRates: { ...row.appliedRates, futa: 0.054 } } : row
      );
      expect(() => aggregateYear(mixed, 'company-1', 2025)).toThrow(InconsistentRateAcrossPeriodError);
    });

    it('should report no rate for a year without rows', () => {
      const empty = aggregateYear(rows, 'company-1', 2024);
      expect(empty.futaRate).toBeNull();
      expect(empty.line8FutaTax).toBe(0);
      expect(empty.rowCount).toBe(0);
    });
  });

  describe('determinism', () => {
    it('should not depend on row order', () => {
      const reversed = [...rows].reverse();
      expect(aggregateQuarter(reversed, company, 2025, 1)).toEqual(aggregateQuarter(rows, company, 2025, 1));
      expect(aggregateYear(reversed, 'company-1', 2025)).toEqual(aggregateYear(rows, 'company-1', 2025));
    });

    it('should give the same figures when run twice', () => {
      expect(aggregateQuarter(rows, company, 2025, 1)).toEqual(aggregateQuarter(rows, company, 2025, 1));
    });
  });

  it('should reject a quarter outside 1-4', () => {
    try {
      aggregateQuarter(rows, company, 2025, 5);
      throw new Error('expected aggregateQuarter to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.code).toBe('INVALID_PERIOD');
      }
    }
  });
});
