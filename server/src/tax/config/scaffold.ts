/**
 * Tax-year scaffolding
 *
 * Creates <dataDir>/<year>/ either from a previous year's files or from a
 * zeroed template. The validation checkpoints are always left empty, so a new
 * year fails the validation gate until someone records the published figures
 * for it and checks the tables against them.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { PayFrequency } from '../../../../shared/types/index.js';
import { createModuleLogger } from '../../services/logger.js';
import { AppError, ConfigNotFoundError } from '../../utils/AppError.js';
import { readTaxFile, taxYearPaths } from './taxYearLoader.js';
import {
  FILING_STATUSES,
  PAY_FREQUENCIES,
  PAY_PERIODS_PER_YEAR,
  metadataSchema,
  percentageMethodSchema,
  ratesSchema,
  type PercentageMethodTable,
  type TaxRates,
  type TaxYearMetadata,
  type ValidationCheckpoints,
} from './taxYearSchema.js';

const log = createModuleLogger('taxYearScaffold');

export interface ScaffoldOptions {
  dataDir: string;
  year: number;
  fromYear?: number;
}

export interface ScaffoldResult {
  yearDir: string;
  mode: 'copy' | 'template';
  files: string[];
}

function writeJson(path: string, value: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

function emptyCheckpoints(year: number): ValidationCheckpoints {
  return { taxYear: year, standardDeduction: {}, topBracketThreshold: {} };
}

function templateRates(): TaxRates {
  return {
    socialSecurity: { employeeRate: 0.062, employerRate: 0.062, wageBase: 0 },
    medicare: { employeeRate: 0.0145, employerRate: 0.0145, additionalEmployeeRate: 0.009, additionalThreshold: 200000 },
    futa: { employerRate: 0.006, wageBase: 7000 },
    suta: { state: 'FL', wageBase: 7000 },
  };
}

function templateFit(year: number, payFrequency: PayFrequency): PercentageMethodTable {
  const filingStatuses: PercentageMethodTable['filingStatuses'] = {};
  for (const status of FILING_STATUSES) {
    filingStatuses[status] = {
      standardDeduction: 0,
      brackets: [{ min: 0, max: null, rate: 0, base: 0 }],
    };
  }
  return {
    taxYear: year,
    payFrequency,
    periodsPerYear: PAY_PERIODS_PER_YEAR[payFrequency],
    filingStatuses,
  };
}

/**
 * Create a new tax-year folder. Refuses to touch a year that already exists.
 */
export function scaffoldTaxYear(options: ScaffoldOptions): ScaffoldResult {
  const { dataDir, year, fromYear } = options;
  const target = taxYearPaths(dataDir, year, 'MONTHLY');

  if (existsSync(target.yearDir)) {
    throw new AppError(`Tax year ${year} already exists: ${target.yearDir}`, 409, 'TAX_YEAR_EXISTS', true, {
      yearDir: target.yearDir,
    });
  }

  const effectiveDate = `${year}-01-01`;
  const files: string[] = [];
  const write = (path: string, value: unknown) => {
    writeJson(path, value);
    files.push(path);
  };

  if (fromYear !== undefined) {
    const source = taxYearPaths(dataDir, fromYear, 'MONTHLY');
    if (!existsSync(source.yearDir)) {
      throw new ConfigNotFoundError(fromYear, source.yearDir);
    }

    for (const path of [source.metadata, source.rates]) {
      if (!existsSync(path)) {
        throw new ConfigNotFoundError(fromYear, path);
      }
    }

    // Read everything first so a broken source leaves no partial target behind
    const metadata = readTaxFile(source.metadata, 'metadata', metadataSchema);
    const rates = readTaxFile(source.rates, 'rates', ratesSchema);
    const fitTables = PAY_FREQUENCIES.map(frequency => {
      const paths = taxYearPaths(dataDir, fromYear, frequency);
      if (!existsSync(paths.fit)) {
        throw new ConfigNotFoundError(fromYear, paths.fit, frequency);
      }
      return { frequency, table: readTaxFile(paths.fit, 'fit', percentageMethodSchema) };
    });

    const nextMetadata: TaxYearMetadata = {
      ...metadata,
      taxYear: year,
      version: `${year}.1`,
      effectiveDate,
      lastUpdated: effectiveDate,
      notes: `Copied from ${fromYear}. Update rates.json, fit/*/percentage_method.json and validation.json before use.`,
    };

    write(target.metadata, nextMetadata);
    write(target.rates, rates);
    write(target.validation, emptyCheckpoints(year));
    for (const { frequency, table } of fitTables) {
      write(taxYearPaths(dataDir, year, frequency).fit, { ...table, taxYear: year });
    }

    log.info(`Scaffolded tax year ${year} from ${fromYear}`, { yearDir: target.yearDir });
    return { yearDir: target.yearDir, mode: 'copy', files };
  }

  const metadata: TaxYearMetadata = {
    taxYear: year,
    source: 'Fill with IRS Pub 15-T, SSA and Florida DOR sources',
    version: `${year}.1`,
    effectiveDate,
    lastUpdated: effectiveDate,
    method: 'percentage',
    notes: 'Template. Update rates.json, fit/*/percentage_method.json and validation.json before use.',
  };

  write(target.metadata, metadata);
  write(target.rates, templateRates());
  write(target.validation, emptyCheckpoints(year));
  for (const frequency of PAY_FREQUENCIES) {
    write(taxYearPaths(dataDir, year, frequency).fit, templateFit(year, frequency));
  }

  log.info(`Scaffolded tax year ${year} from template`, { yearDir: target.yearDir });
  return { yearDir: target.yearDir, mode: 'template', files };
}
