import { afterEach, beforeEach, describe, it, expect } from '@jest/globals';
import { existsSync } from 'fs';
import { join } from 'path';
import { copyTaxData, removeDir } from '../../../__tests__/fixtures';
import { AppError, ConfigNotFoundError } from '../../../utils/AppError';
import { scaffoldTaxYear } from '../scaffold';
import { TaxYearConfigLoader } from '../taxYearLoader';

describe('scaffoldTaxYear', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = copyTaxData([2025]);
  });

  afterEach(() => {
    removeDir(dataDir);
  });

  it('should copy a previous year and restamp it', () => {
    const result = scaffoldTaxYear({ dataDir, year: 2027, fromYear: 2025 });

    expect(result.mode).toBe('copy');
    expect(result.yearDir).toBe(join(dataDir, '2027'));
    expect(result.files).toHaveLength(8);
    expect(existsSync(join(dataDir, '2027', 'fit', 'biweekly', 'percentage_method.json'))).toBe(true);

    const { config } = new TaxYearConfigLoader({ dataDir }).resolve(2027, 'MONTHLY');
    expect(config.metadata).toMatchObject({
      taxYear: 2027,
      version: '2027.1',
      effectiveDate: '2027-01-01',
      lastUpdated: '2027-01-01',
    });
    expect(config.fit.taxYear).toBe(2027);
    expect(config.rates.socialSecurity.wageBase).toBe(176100);
  });

  it('should fail validation until the new checkpoints are recorded', () => {
    scaffoldTaxYear({ dataDir, year: 2027, fromYear: 2025 });

    const report = new TaxYearConfigLoader({ dataDir }).report(2027, 'MONTHLY');
    expect(report.status).toBe('FAIL');
    expect(report.failures.map(failure => failure.field)).toContain('validation.standardDeduction.SINGLE');
  });

  it('should write a zeroed template when no source year is given', () => {
    const result = scaffoldTaxYear({ dataDir, year: 2030 });
    expect(result.mode).toBe('template');

    const loader = new TaxYearConfigLoader({ dataDir });
    const { config } = loader.resolve(2030, 'SEMIMONTHLY');
    expect(config.fit.periodsPerYear).toBe(24);
    expect(config.fit.filingStatuses.HEAD_OF_HOUSEHOLD?.brackets).toEqual([{ min: 0, max: null, rate: 0, base: 0 }]);
    expect(loader.report(2030, 'SEMIMONTHLY').status).toBe('FAIL');
  });

  it('should refuse to overwrite an existing year', () => {
    try {
      scaffoldTaxYear({ dataDir, year: 2025 });
      throw new Error('expected scaffold to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.code).toBe('TAX_YEAR_EXISTS');
      }
    }
  });

  it('should fail when the source year is missing', () => {
    expect(() => scaffoldTaxYear({ dataDir, year: 2027, fromYear: 2019 })).toThrow(ConfigNotFoundError);
    expect(existsSync(join(dataDir, '2027'))).toBe(false);
  });
});
