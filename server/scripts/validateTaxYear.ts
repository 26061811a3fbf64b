/**
 * Validate a tax-year file set before it is used for payroll
 * Run with: npx tsx server/scripts/validateTaxYear.ts <year> [frequency]
 *
 * Exits 1 when any checked frequency FAILs.
 */

import dotenv from 'dotenv';
import { TaxYearConfigLoader } from '../src/tax/config/taxYearLoader.js';
import type { ValidationResult } from '../../shared/types/index.js';

dotenv.config();

function printReport(report: ValidationResult): void {
  const frequency = report.payFrequency ?? 'unknown frequency';
  console.log(`${report.year} ${frequency}: ${report.status}`);
  for (const failure of report.failures) {
    console.log(`  FAIL ${failure.field}: ${failure.message}`);
  }
  for (const warning of report.warnings) {
    console.log(`  WARN ${warning.field}: ${warning.message}`);
  }
}

function main(): number {
  const [yearArg, frequencyArg] = process.argv.slice(2);
  const year = Number(yearArg);

  if (!yearArg || !Number.isInteger(year)) {
    console.error('Usage: validateTaxYear <year> [DAILY|WEEKLY|BIWEEKLY|SEMIMONTHLY|MONTHLY]');
    return 2;
  }

  const loader = new TaxYearConfigLoader();
  console.log(`Validating tax year ${year} in ${loader.dataDir}`);

  const reports =
    frequencyArg === undefined ? loader.reportYear(year) : [loader.report(year, frequencyArg.toUpperCase())];

  reports.forEach(printReport);

  const failed = reports.filter(report => report.status === 'FAIL').length;
  console.log(failed === 0 ? '\nAll checks passed' : `\n${failed} of ${reports.length} file set(s) failed`);
  return failed === 0 ? 0 : 1;
}

try {
  process.exitCode = main();
} catch (error) {
  console.error(error);
  process.exitCode = 1;
}
