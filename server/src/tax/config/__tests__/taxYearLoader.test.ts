/**
 * Tax-Year Loader Tests
 *
 * File-level failures run against a scratch copy of the checked-in data.
 */

import { afterEach, beforeEach, describe, it, expect } from '@jest/globals';
import { readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { TAX_DATA_DIR, copyTaxData, removeDir } from '../../../__tests__/fixtures';
import {
  ConfigInvalidError,
  ConfigNotFoundError,
  UnsupportedFrequencyError,
} from '../../../utils/AppError';
import { TaxYearConfigLoader, taxYearPaths } from '../taxYearLoader';
import { percentageMethodSchema } from '../taxYearSchema';

describe('TaxYearConfigLoader', () => {
  describe('checked-in data', () => {
    const loader = new TaxYearConfigLoader({ dataDir: TAX_DATA_DIR });

    it('should resolve 2025 MONTHLY and pass validation', () => {
      const { config, validation } = loader.resolve(2025, 'MONTHLY');

      expect(config.year).toBe(2025);
      expect(config.payFrequency).toBe('MONTHLY');
      expect(config.fit.periodsPerYear).toBe(12);
      expect(config.rates.socialSecurity.wageBase).toBe(176100);
      expect(config.metadata.version).toBe('2025.1');
      expect(validation.status).toBe('PASS');
      expect(validation.checkedFiles).toHaveLength(4);
    });

    it('should pass every frequency of every checked-in year', () => {
      for (const year of loader.availableYears()) {
        for (const report of loader.reportYear(year)) {
          expect(report).toMatchObject({ year, status: 'PASS', failures: [] });
        }
      }
    });

    it('should list the years on disk', () => {
      expect(loader.availableYears()).toEqual([2024, 2025, 2026]);
    });

    it('should return the cached value on a second resolve', () => {
      const first = loader.resolve(2025, 'WEEKLY');
      expect(loader.resolve(2025, 'WEEKLY')).toBe(first);
    });

    it('should return a frozen configuration', () => {
      const { config } = loader.resolve(2025, 'MONTHLY');
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.rates.socialSecurity)).toBe(true);
    });

    it('should not fall back to another year', () => {
      expect(() => loader.resolve(2099, 'MONTHLY')).toThrow(ConfigNotFoundError);
    });

    it('should reject a frequency it does not know', () => {
      expect(() => loader.resolve(2025, 'QUARTERLY')).toThrow(UnsupportedFrequencyError);
    });

    it('should report a missing year as FAIL instead of throwing', () => {
      const report = loader.report(2099, 'MONTHLY');
      expect(report.status).toBe('FAIL');
      expect(report.failures).toEqual([
        { field: 'files', message: `missing ${join(TAX_DATA_DIR, '2099')}` },
      ]);
    });
  });

  describe('damaged files', () => {
    let dataDir: string;
    let loader: TaxYearConfigLoader;

    beforeEach(() => {
      dataDir = copyTaxData([2025]);
      loader = new TaxYearConfigLoader({ dataDir });
    });

    afterEach(() => {
      removeDir(dataDir);
    });

    const paths = () => taxYearPaths(dataDir, 2025, 'MONTHLY');

    it('should report a missing frequency file as not found', () => {
      const weekly = taxYearPaths(dataDir, 2025, 'WEEKLY').fit;
      rmSync(weekly);

      try {
        loader.resolve(2025, 'WEEKLY');
        throw new Error('expected resolve to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigNotFoundError);
        if (error instanceof ConfigNotFoundError) {
          expect(error.missingPath).toBe(weekly);
          expect(error.code).toBe('CONFIG_NOT_FOUND');
        }
      }

      expect(loader.resolve(2025, 'MONTHLY').validation.status).toBe('PASS');
    });

    it('should reject malformed JSON', () => {
      writeFileSync(paths().rates, '{ "socialSecurity": ');

      try {
        loader.resolve(2025, 'MONTHLY');
        throw new Error('expected resolve to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigInvalidError);
        if (error instanceof ConfigInvalidError) {
          expect(error.reasons).toHaveLength(1);
          expect(error.reasons[0].field).toBe('rates');
        }
      }
    });

    it('should name the keys that break the file contract', () => {
      const rates: Record<string, unknown> = JSON.parse(readFileSync(paths().rates, 'utf-8'));
      rates.socialSecurity = { employeeRate: 0.062, employerRate: 0.062, wageBase: 'unlimited' };
      delete rates.futa;
      writeFileSync(paths().rates, JSON.stringify(rates));

      try {
        loader.resolve(2025, 'MONTHLY');
        throw new Error('expected resolve to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigInvalidError);
        if (error instanceof ConfigInvalidError) {
          expect(error.reasons.map(reason => reason.field).sort()).toEqual([
            'rates.futa',
            'rates.socialSecurity.wageBase',
          ]);
        }
      }
    });

    it('should refuse a table from another year through requireValid', () => {
      const fit = percentageMethodSchema.parse(JSON.parse(readFileSync(paths().fit, 'utf-8')));
      const single = fit.filingStatuses.SINGLE;
      if (single === undefined) throw new Error('no SINGLE table in the 2025 fixtures');
      single.standardDeduction = 14600;
      writeFileSync(paths().fit, JSON.stringify(fit));

      expect(loader.report(2025, 'MONTHLY').failures).toEqual([
        {
          field: 'fit.filingStatuses.SINGLE.standardDeduction',
          message: 'tables appear to be for a different year (expected standard deduction 15000, found 14600)',
        },
      ]);
      expect(() => loader.requireValid(2025, 'MONTHLY')).toThrow(ConfigInvalidError);
    });

    it('should serve the cached value until the cache is cleared', () => {
      const before = loader.resolve(2025, 'MONTHLY');
      writeFileSync(paths().rates, 'not json');

      expect(loader.resolve(2025, 'MONTHLY')).toBe(before);

      loader.clearCache();
      expect(() => loader.resolve(2025, 'MONTHLY')).toThrow(ConfigInvalidError);
    });
  });
});
