/**
 * Florida payroll tax engine
 *
 * Computes per-run withholding and employer tax as ledger rows, and folds
 * stored rows into Form 941, RT-6, Form 940, W-2 and year-to-date totals.
 * Storage and rendering stay with the host application.
 */

// Engine facade
export { PayrollEngine, type PayrollEngineOptions } from './services/payrollEngine.js';

// Calculation
export {
  WithholdingCalculator,
  computePayroll,
  ZERO_PRIOR_YTD,
  type WithholdingInput,
} from './services/withholdingCalculator.js';
export {
  payrollRequestSchema,
  companySchema,
  employeeProfileSchema,
  payrollRunSchema,
  priorYtdSchema,
  parsePayrollRequest,
  parseCompany,
  type PayrollRequest,
} from './services/payrollSchemas.js';
export { CalculationTrace, findTraceEntry } from './tax/trace.js';
export { FIT_TRACE } from './tax/federalWithholding.js';

// Reports
export { aggregateQuarter, aggregateYear, type QuarterlyReports } from './services/rollupAggregator.js';
export { mapYear } from './services/w2Mapper.js';
export { priorYtdFromRows, summarizeYtd } from './services/ytdSummary.js';

// Tax-year configuration
export {
  TaxYearConfigLoader,
  getDefaultTaxYearLoader,
  resolveTaxYear,
  taxYearPaths,
  type ResolvedTaxYear,
  type TaxYearLoaderOptions,
} from './tax/config/taxYearLoader.js';
export { validateTaxYearConfig } from './tax/config/validationGate.js';
export { scaffoldTaxYear, type ScaffoldOptions, type ScaffoldResult } from './tax/config/scaffold.js';
export {
  FILING_STATUSES,
  PAY_FREQUENCIES,
  PAY_PERIODS_PER_YEAR,
  type TaxYearConfig,
} from './tax/config/taxYearSchema.js';

// Errors and utilities
export {
  AppError,
  PayrollError,
  ConfigNotFoundError,
  ConfigInvalidError,
  UnsupportedFilingStatusError,
  UnsupportedFrequencyError,
  NegativeInputRejectedError,
  InconsistentRateAcrossPeriodError,
} from './utils/AppError.js';
export { parseRateToDecimal, formatRatePercent } from './utils/rates.js';
export { periodFromPayDate, quarterOfMonth } from './utils/dateUtils.js';
export { logger, createModuleLogger } from './services/logger.js';
export { metricsRegistry, getMetrics, getMetricsContentType } from './services/metrics.js';

export type * from '../../shared/types/index.js';
