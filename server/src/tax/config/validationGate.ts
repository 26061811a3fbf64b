/**
 * Tax-year validation gate
 *
 * Runs over a parsed configuration before any payroll is computed with it.
 * Catches structurally valid files that are still wrong: a rate entered as a
 * percentage, brackets out of order, or a different year's table copied into
 * place (caught through the checkpoint values recorded in validation.json).
 */

import type { FilingStatus, ValidationIssue, ValidationResult } from '../../../../shared/types/index.js';
import { exact } from '../../utils/decimal.js';
import { FILING_STATUSES, PAY_PERIODS_PER_YEAR, type TaxBracket, type TaxYearConfig } from './taxYearSchema.js';

const REQUIRED_METADATA_FIELDS = ['source', 'version', 'effectiveDate', 'lastUpdated', 'method'] as const;

class IssueCollector {
  readonly failures: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];

  fail(field: string, message: string): void {
    this.failures.push({ field, message });
  }

  warn(field: string, message: string): void {
    this.warnings.push({ field, message });
  }
}

function checkMetadata(config: TaxYearConfig, issues: IssueCollector): void {
  const { metadata } = config;

  for (const field of REQUIRED_METADATA_FIELDS) {
    if (metadata[field].trim().length === 0) {
      issues.fail(`metadata.${field}`, `metadata.json field '${field}' is empty`);
    }
  }

  if (metadata.taxYear !== config.year) {
    issues.fail('metadata.taxYear', `tax year mismatch: expected ${config.year}, found ${metadata.taxYear}`);
  }

  if (metadata.method !== 'percentage') {
    issues.fail('metadata.method', `method must be 'percentage', found '${metadata.method}'`);
  }

  if (config.checkpoints.taxYear !== config.year) {
    issues.fail(
      'validation.taxYear',
      `tax year mismatch: expected ${config.year}, found ${config.checkpoints.taxYear}`
    );
  }
}

function checkRate(field: string, value: number, issues: IssueCollector): void {
  if (!(value >= 0 && value <= 1)) {
    issues.fail(field, `rate must be within [0, 1], found ${value}`);
  }
}

function checkAmount(field: string, value: number, issues: IssueCollector): void {
  if (!(value >= 0)) {
    issues.fail(field, `must be non-negative, found ${value}`);
  }
}

function checkRates(config: TaxYearConfig, issues: IssueCollector): void {
  const { socialSecurity, medicare, futa, suta } = config.rates;

  checkRate('rates.socialSecurity.employeeRate', socialSecurity.employeeRate, issues);
  checkRate('rates.socialSecurity.employerRate', socialSecurity.employerRate, issues);
  checkAmount('rates.socialSecurity.wageBase', socialSecurity.wageBase, issues);

  checkRate('rates.medicare.employeeRate', medicare.employeeRate, issues);
  checkRate('rates.medicare.employerRate', medicare.employerRate, issues);
  checkRate('rates.medicare.additionalEmployeeRate', medicare.additionalEmployeeRate, issues);
  checkAmount('rates.medicare.additionalThreshold', medicare.additionalThreshold, issues);

  checkRate('rates.futa.employerRate', futa.employerRate, issues);
  checkAmount('rates.futa.wageBase', futa.wageBase, issues);

  if (suta.state !== 'FL') {
    issues.fail('rates.suta.state', `only Florida reemployment tax is supported, found '${suta.state}'`);
  }
  checkAmount('rates.suta.wageBase', suta.wageBase, issues);
}

/**
 * Lower bounds start at 0 and strictly increase; each bracket ends where the
 * next one starts; only the top bracket is open-ended.
 */
function checkBrackets(field: string, brackets: readonly TaxBracket[], issues: IssueCollector): void {
  if (brackets.length === 0) {
    issues.fail(field, 'at least one bracket is required');
    return;
  }

  if (brackets[0].min !== 0) {
    issues.fail(`${field}[0].min`, `first bracket must start at 0, found ${brackets[0].min}`);
  }

  brackets.forEach((bracket, index) => {
    const path = `${field}[${index}]`;
    checkRate(`${path}.rate`, bracket.rate, issues);
    checkAmount(`${path}.base`, bracket.base, issues);

    const next = brackets[index + 1];
    if (next === undefined) {
      if (bracket.max !== null) {
        issues.fail(`${path}.max`, `top bracket must be open-ended (max null), found ${bracket.max}`);
      }
      return;
    }

    if (!(next.min > bracket.min)) {
      issues.fail(
        `${field}[${index + 1}].min`,
        `lower bounds must strictly increase: ${next.min} follows ${bracket.min}`
      );
    }

    if (bracket.max === null) {
      issues.fail(`${path}.max`, 'only the top bracket may be open-ended');
    } else if (bracket.max !== next.min) {
      issues.fail(
        `${path}.max`,
        `bracket ends at ${bracket.max} but the next bracket starts at ${next.min} (overlap or gap)`
      );
    } else {
      // base tax should carry forward from the previous bracket
      const expectedBase = exact(bracket.base).plus(exact(bracket.max).minus(bracket.min).times(bracket.rate));
      if (!expectedBase.equals(next.base)) {
        issues.warn(
          `${field}[${index + 1}].base`,
          `base ${next.base} differs from the carried-forward amount ${expectedBase.toString()}`
        );
      }
    }
  });
}

function checkFitTables(config: TaxYearConfig, issues: IssueCollector): void {
  const { fit } = config;

  if (fit.taxYear !== config.year) {
    issues.fail('fit.taxYear', `tax year mismatch: expected ${config.year}, found ${fit.taxYear}`);
  }
  if (fit.payFrequency !== config.payFrequency) {
    issues.fail('fit.payFrequency', `expected ${config.payFrequency}, found ${fit.payFrequency}`);
  }

  const expectedPeriods = PAY_PERIODS_PER_YEAR[config.payFrequency];
  if (fit.periodsPerYear !== expectedPeriods) {
    issues.fail(
      'fit.periodsPerYear',
      `${config.payFrequency} pays ${expectedPeriods} periods per year, found ${fit.periodsPerYear}`
    );
  }

  const statuses = definedFilingStatuses(config);
  if (statuses.length === 0) {
    issues.fail('fit.filingStatuses', 'no filing status tables defined');
  }

  for (const status of statuses) {
    const table = fit.filingStatuses[status];
    if (table === undefined) continue;
    checkAmount(`fit.filingStatuses.${status}.standardDeduction`, table.standardDeduction, issues);
    checkBrackets(`fit.filingStatuses.${status}.brackets`, table.brackets, issues);
  }
}

/**
 * Expected figures recorded for the year. A mismatch usually means another
 * year's file was dropped into this year's folder.
 */
function checkCheckpoints(config: TaxYearConfig, issues: IssueCollector): void {
  const { checkpoints, fit } = config;

  for (const status of FILING_STATUSES) {
    const table = fit.filingStatuses[status];
    const expectedDeduction = checkpoints.standardDeduction[status];
    const expectedTop = checkpoints.topBracketThreshold[status];

    if (table === undefined) {
      if (expectedDeduction !== undefined || expectedTop !== undefined) {
        issues.fail(
          `fit.filingStatuses.${status}`,
          `validation.json has checkpoints for ${status} but the FIT table does not define it`
        );
      }
      continue;
    }

    if (expectedDeduction === undefined) {
      issues.fail(`validation.standardDeduction.${status}`, `no expected standard deduction recorded for ${status}`);
    } else if (table.standardDeduction !== expectedDeduction) {
      issues.fail(
        `fit.filingStatuses.${status}.standardDeduction`,
        `tables appear to be for a different year (expected standard deduction ${expectedDeduction}, found ${table.standardDeduction})`
      );
    }

    const top = table.brackets[table.brackets.length - 1];
    if (expectedTop === undefined) {
      issues.fail(`validation.topBracketThreshold.${status}`, `no expected top bracket threshold recorded for ${status}`);
    } else if (top !== undefined && top.min !== expectedTop) {
      issues.fail(
        `fit.filingStatuses.${status}.brackets`,
        `tables appear to be for a different year (expected top bracket threshold ${expectedTop}, found ${top.min})`
      );
    }
  }

  if (
    checkpoints.socialSecurityWageBase !== undefined &&
    checkpoints.socialSecurityWageBase !== config.rates.socialSecurity.wageBase
  ) {
    issues.fail(
      'rates.socialSecurity.wageBase',
      `expected Social Security wage base ${checkpoints.socialSecurityWageBase}, found ${config.rates.socialSecurity.wageBase}`
    );
  }
}

export function definedFilingStatuses(config: TaxYearConfig): FilingStatus[] {
  return FILING_STATUSES.filter(status => config.fit.filingStatuses[status] !== undefined);
}

/**
 * Validate a resolved configuration. Returns FAIL with field-tagged reasons;
 * never throws for bad data.
 */
export function validateTaxYearConfig(config: TaxYearConfig, checkedFiles: string[] = []): ValidationResult {
  const issues = new IssueCollector();

  checkMetadata(config, issues);
  checkRates(config, issues);
  checkFitTables(config, issues);
  checkCheckpoints(config, issues);

  return {
    year: config.year,
    payFrequency: config.payFrequency,
    status: issues.failures.length === 0 ? 'PASS' : 'FAIL',
    failures: issues.failures,
    warnings: issues.warnings,
    checkedFiles,
  };
}
