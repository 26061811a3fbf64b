/**
 * Tax-Year Configuration Loader
 *
 * Loads the parameter set for a (year, pay frequency) from JSON files, so a
 * new tax year needs a new validated data folder and no code change.
 *
 * There is no fallback: a missing year or frequency file is a
 * ConfigNotFoundError, a file that does not match its schema is a
 * ConfigInvalidError listing the offending keys.
 *
 * Resolutions are cached for the lifetime of the loader. Tax files do not
 * change at runtime, so two concurrent first resolutions produce the same
 * frozen value and either may win the cache slot.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import NodeCache from 'node-cache';
import type { ZodType, ZodTypeDef } from 'zod';
import type { PayFrequency, ValidationIssue, ValidationResult } from '../../../../shared/types/index.js';
import { getTaxDataDir } from '../../config/env.js';
import { createModuleLogger } from '../../services/logger.js';
import { taxConfigResolutionsTotal, taxConfigValidationFailuresTotal } from '../../services/metrics.js';
import { ConfigInvalidError, ConfigNotFoundError, UnsupportedFrequencyError } from '../../utils/AppError.js';
import { deepFreeze } from '../../utils/freeze.js';
import {
  PAY_FREQUENCIES,
  frequencyDirName,
  isPayFrequency,
  metadataSchema,
  percentageMethodSchema,
  ratesSchema,
  validationCheckpointsSchema,
  type TaxYearConfig,
} from './taxYearSchema.js';
import { validateTaxYearConfig } from './validationGate.js';

const log = createModuleLogger('taxYearLoader');

export interface ResolvedTaxYear {
  readonly config: TaxYearConfig;
  readonly validation: ValidationResult;
}

export interface TaxYearLoaderOptions {
  dataDir?: string;
}

export interface TaxYearPaths {
  yearDir: string;
  metadata: string;
  rates: string;
  validation: string;
  fit: string;
}

export function taxYearPaths(dataDir: string, year: number, payFrequency: PayFrequency): TaxYearPaths {
  const yearDir = join(dataDir, String(year));
  return {
    yearDir,
    metadata: join(yearDir, 'metadata.json'),
    rates: join(yearDir, 'rates.json'),
    validation: join(yearDir, 'validation.json'),
    fit: join(yearDir, 'fit', frequencyDirName(payFrequency), 'percentage_method.json'),
  };
}

function zodIssuesToReasons(label: string, issues: { path: (string | number)[]; message: string }[]): ValidationIssue[] {
  return issues.map(issue => ({
    field: issue.path.length > 0 ? `${label}.${issue.path.join('.')}` : label,
    message: issue.message,
  }));
}

/**
 * Parse one tax file against its schema
 *
 * @throws ConfigInvalidError naming the offending keys as `<label>.<path>`
 */
export function readTaxFile<T>(path: string, label: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigInvalidError(`Invalid JSON in ${path}`, [{ field: label, message: reason }]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const reasons = zodIssuesToReasons(label, parsed.error.issues);
    throw new ConfigInvalidError(
      `${path} does not match the ${label} file contract: ${reasons.map(r => r.field).join(', ')}`,
      reasons
    );
  }
  return parsed.data;
}

export class TaxYearConfigLoader {
  readonly dataDir: string;
  private readonly cache = new NodeCache({
    stdTTL: 0,         // Tax files are immutable for the process lifetime
    checkperiod: 0,
    useClones: false   // Values are frozen
  });

  constructor(options: TaxYearLoaderOptions = {}) {
    this.dataDir = options.dataDir ?? getTaxDataDir();
  }

  /**
   * Resolve and validate the parameter set for a year and pay frequency.
   *
   * @throws UnsupportedFrequencyError if the frequency is not one the engine knows
   * @throws ConfigNotFoundError if the year folder or any required file is absent
   * @throws ConfigInvalidError if a file is not valid JSON or breaks its schema
   */
  resolve(year: number, payFrequency: string): ResolvedTaxYear {
    if (!isPayFrequency(payFrequency)) {
      taxConfigResolutionsTotal.inc({ result: 'unsupported_frequency' });
      throw new UnsupportedFrequencyError(payFrequency, [...PAY_FREQUENCIES]);
    }

    const cacheKey = `${year}:${payFrequency}`;
    const cached = this.cache.get<ResolvedTaxYear>(cacheKey);
    if (cached !== undefined) {
      taxConfigResolutionsTotal.inc({ result: 'cache_hit' });
      return cached;
    }

    let resolved: ResolvedTaxYear;
    try {
      resolved = this.load(year, payFrequency);
    } catch (error) {
      const result = error instanceof ConfigNotFoundError ? 'not_found' : 'invalid';
      taxConfigResolutionsTotal.inc({ result });
      throw error;
    }

    if (resolved.validation.status === 'FAIL') {
      taxConfigValidationFailuresTotal.inc({ year: String(year) });
      log.warn(`Tax configuration ${year}/${payFrequency} failed validation`, {
        failures: resolved.validation.failures,
      });
    } else {
      log.info(`Loaded tax configuration ${year}/${payFrequency} (version ${resolved.config.metadata.version})`);
    }

    this.cache.set(cacheKey, resolved);
    taxConfigResolutionsTotal.inc({ result: 'loaded' });
    return resolved;
  }

  /**
   * Resolve and refuse anything that did not PASS the validation gate
   *
   * @throws ConfigInvalidError carrying the validation failures
   */
  requireValid(year: number, payFrequency: string): TaxYearConfig {
    const { config, validation } = this.resolve(year, payFrequency);
    if (validation.status === 'FAIL') {
      throw new ConfigInvalidError(
        `Tax configuration ${year}/${payFrequency} failed validation with ${validation.failures.length} issue(s)`,
        validation.failures
      );
    }
    return config;
  }

  /**
   * Operator-facing validation report. Lookup and parse errors become FAIL
   * entries instead of exceptions.
   */
  report(year: number, payFrequency: string): ValidationResult {
    try {
      return this.resolve(year, payFrequency).validation;
    } catch (error) {
      const failures = failuresFromError(error);
      if (failures === undefined) {
        throw error;
      }
      return {
        year,
        payFrequency: isPayFrequency(payFrequency) ? payFrequency : null,
        status: 'FAIL',
        failures,
        warnings: [],
        checkedFiles: [],
      };
    }
  }

  /**
   * Report for every frequency of a year
   */
  reportYear(year: number): ValidationResult[] {
    return PAY_FREQUENCIES.map(frequency => this.report(year, frequency));
  }

  /**
   * Tax years present under the data directory
   */
  availableYears(): number[] {
    if (!existsSync(this.dataDir)) {
      return [];
    }
    return readdirYears(this.dataDir);
  }

  clearCache(): void {
    this.cache.flushAll();
  }

  private load(year: number, payFrequency: PayFrequency): ResolvedTaxYear {
    const paths = taxYearPaths(this.dataDir, year, payFrequency);

    if (!existsSync(paths.yearDir)) {
      throw new ConfigNotFoundError(year, paths.yearDir, payFrequency);
    }

    const metadata = this.readFile(year, payFrequency, paths.metadata, 'metadata', metadataSchema);
    const rates = this.readFile(year, payFrequency, paths.rates, 'rates', ratesSchema);
    const checkpoints = this.readFile(year, payFrequency, paths.validation, 'validation', validationCheckpointsSchema);
    const fit = this.readFile(year, payFrequency, paths.fit, 'fit', percentageMethodSchema);

    const config: TaxYearConfig = deepFreeze({
      year,
      payFrequency,
      metadata,
      rates,
      checkpoints,
      fit,
    });

    const checkedFiles = [paths.metadata, paths.rates, paths.validation, paths.fit];
    const validation = deepFreeze(validateTaxYearConfig(config, checkedFiles));

    return Object.freeze({ config, validation });
  }

  private readFile<T>(
    year: number,
    payFrequency: PayFrequency,
    path: string,
    label: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): T {
    if (!existsSync(path)) {
      throw new ConfigNotFoundError(year, path, payFrequency);
    }
    return readTaxFile(path, label, schema);
  }
}

function failuresFromError(error: unknown): ValidationIssue[] | undefined {
  if (error instanceof ConfigNotFoundError) {
    return [{ field: 'files', message: `missing ${error.missingPath}` }];
  }
  if (error instanceof ConfigInvalidError) {
    return error.reasons;
  }
  if (error instanceof UnsupportedFrequencyError) {
    return [{ field: 'payFrequency', message: error.message }];
  }
  return undefined;
}

function readdirYears(dataDir: string): number[] {
  const years: number[] = [];
  for (const entry of readdirSync(dataDir, { withFileTypes: true })) {
    if (entry.isDirectory() && /^\d{4}$/.test(entry.name)) {
      years.push(parseInt(entry.name, 10));
    }
  }
  return years.sort((a, b) => a - b);
}

// Process-wide loader over TAX_DATA_DIR
let defaultLoader: TaxYearConfigLoader | undefined;

export function getDefaultTaxYearLoader(): TaxYearConfigLoader {
  if (defaultLoader === undefined) {
    defaultLoader = new TaxYearConfigLoader();
  }
  return defaultLoader;
}

/**
 * resolve(year, frequency) against TAX_DATA_DIR
 */
export function resolveTaxYear(year: number, payFrequency: string): ResolvedTaxYear {
  return getDefaultTaxYearLoader().resolve(year, payFrequency);
}
