/**
 * Shared test data: the checked-in tax years, profile builders and a helper
 * that chains monthly rows the way a host application would.
 */

import { cpSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import type {
  CompanyTaxProfile,
  EmployeePayProfile,
  PayrollLedgerRow,
  PayrollRunInput,
  W4Adjustments,
} from '../../../shared/types';
import { computePayroll } from '../services/withholdingCalculator';
import { priorYtdFromRows } from '../services/ytdSummary';
import { TaxYearConfigLoader } from '../tax/config/taxYearLoader';
import type { TaxYearConfig } from '../tax/config/taxYearSchema';

export const TAX_DATA_DIR = resolve(__dirname, '../../../data/tax');

export const fixtureLoader = new TaxYearConfigLoader({ dataDir: TAX_DATA_DIR });

export function config2025(payFrequency = 'MONTHLY'): TaxYearConfig {
  return fixtureLoader.requireValid(2025, payFrequency);
}

export const createW4 = (overrides: Partial<W4Adjustments> = {}): W4Adjustments => ({
  otherIncome: 0,
  deductions: 0,
  dependentsCredit: 0,
  extraWithholding: 0,
  ...overrides,
});

export const createCompany = (overrides: Partial<CompanyTaxProfile> = {}): CompanyTaxProfile => ({
  companyId: 'company-1',
  name: 'Test Company',
  sutaRate: 0.027,
  ...overrides,
});

export const createProfile = (overrides: Partial<EmployeePayProfile> = {}): EmployeePayProfile => ({
  employeeId: 'emp-1',
  payType: 'SALARY',
  baseRate: 4000,
  filingStatus: 'SINGLE',
  payFrequency: 'MONTHLY',
  w4: createW4(),
  ...overrides,
});

export const createRun = (overrides: Partial<PayrollRunInput> = {}): PayrollRunInput => ({
  period: { year: 2025, month: 1 },
  ...overrides,
});

/**
 * One row per month, each computed with the prior YTD folded from the rows
 * before it
 */
export function runMonths(
  profile: EmployeePayProfile,
  company: CompanyTaxProfile,
  months: number[],
  config: TaxYearConfig
): PayrollLedgerRow[] {
  const rows: PayrollLedgerRow[] = [];
  for (const month of months) {
    const period = { year: config.year, month };
    const priorYtd = priorYtdFromRows(rows, company.companyId, profile.employeeId, period);
    rows.push(computePayroll({ company, profile, run: { period }, priorYtd }, config));
  }
  return rows;
}

/**
 * Copy checked-in tax years into a scratch directory that tests may edit
 */
export function copyTaxData(years: number[] = [2025]): string {
  const dir = mkdtempSync(join(tmpdir(), 'tax-data-'));
  for (const year of years) {
    cpSync(join(TAX_DATA_DIR, String(year)), join(dir, String(year)), { recursive: true });
  }
  return dir;
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
