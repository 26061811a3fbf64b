/**
 * Payroll Engine
 *
 * Entry point for host applications. Each operation returns a structured
 * result instead of throwing:
 *
 *   { success: true, data }
 *   { success: false, error: <code>, message, details? }
 *
 * A failure blocks persistence of the ledger row; the caller decides how to
 * present it. Unexpected errors are logged with a reference id and come back
 * as INTERNAL_ERROR.
 */

import crypto from 'crypto';
import type {
  EngineFailure,
  EngineResult,
  Form940Summary,
  PayPeriod,
  PayrollLedgerRow,
  PriorYtd,
  ValidationResult,
  W2Boxes,
  YtdSummary,
} from '../../../shared/types/index.js';
import { TaxYearConfigLoader, getDefaultTaxYearLoader } from '../tax/config/taxYearLoader.js';
import { AppError } from '../utils/AppError.js';
import { createModuleLogger } from './logger.js';
import { recordPayrollComputation, recordReportAggregation } from './metrics.js';
import { parseCompany, parsePayrollRequest } from './payrollSchemas.js';
import { aggregateQuarter, aggregateYear, type QuarterlyReports } from './rollupAggregator.js';
import { WithholdingCalculator } from './withholdingCalculator.js';
import { mapYear } from './w2Mapper.js';
import { priorYtdFromRows, summarizeYtd } from './ytdSummary.js';

const log = createModuleLogger('payrollEngine');

export interface PayrollEngineOptions {
  loader?: TaxYearConfigLoader;
  calculator?: WithholdingCalculator;
}

function generateErrorRef(): string {
  return crypto.randomBytes(8).toString('hex').toUpperCase();
}

function toFailure(operation: string, error: unknown): EngineFailure {
  if (error instanceof AppError) {
    log.warn(`${operation} failed: ${error.message}`, { code: error.code });
    return {
      success: false,
      error: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
    };
  }

  const reference = generateErrorRef();
  log.error(`${operation} failed unexpectedly [${reference}]`, {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  return {
    success: false,
    error: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    reference,
  };
}

export class PayrollEngine {
  private readonly loader: TaxYearConfigLoader;
  private readonly calculator: WithholdingCalculator;

  constructor(options: PayrollEngineOptions = {}) {
    this.loader = options.loader ?? getDefaultTaxYearLoader();
    this.calculator = options.calculator ?? new WithholdingCalculator();
  }

  /**
   * Compute one ledger row. When the request carries no priorYtd, the wage
   * bases are taken from `history` (earlier rows of the same employee).
   */
  runPayroll(request: unknown, history: readonly PayrollLedgerRow[] = []): EngineResult<PayrollLedgerRow> {
    const started = process.hrtime.bigint();
    try {
      const input = parsePayrollRequest(request);
      const priorYtd =
        input.priorYtd ??
        priorYtdFromRows(history, input.company.companyId, input.profile.employeeId, input.run.period);

      const config = this.loader.requireValid(input.run.period.year, input.profile.payFrequency);
      const row = this.calculator.compute({ ...input, priorYtd }, config);

      recordPayrollComputation('success', Number(process.hrtime.bigint() - started) / 1e9);
      return { success: true, data: row };
    } catch (error) {
      recordPayrollComputation('failure');
      return toFailure('runPayroll', error);
    }
  }

  /**
   * Validation report for one frequency, or for every frequency of the year
   */
  validateTaxYear(year: number, payFrequency?: string): EngineResult<ValidationResult[]> {
    try {
      const reports =
        payFrequency === undefined ? this.loader.reportYear(year) : [this.loader.report(year, payFrequency)];
      return { success: true, data: reports };
    } catch (error) {
      return toFailure('validateTaxYear', error);
    }
  }

  quarterlyReports(
    rows: readonly PayrollLedgerRow[],
    company: unknown,
    year: number,
    quarter: number
  ): EngineResult<QuarterlyReports> {
    try {
      const reports = aggregateQuarter(rows, parseCompany(company), year, quarter);
      recordReportAggregation('941', 'success');
      recordReportAggregation('rt6', 'success');
      return { success: true, data: reports };
    } catch (error) {
      recordReportAggregation('941', 'failure');
      recordReportAggregation('rt6', 'failure');
      return toFailure('quarterlyReports', error);
    }
  }

  annualReport(rows: readonly PayrollLedgerRow[], companyId: string, year: number): EngineResult<Form940Summary> {
    try {
      const summary = aggregateYear(rows, companyId, year);
      recordReportAggregation('940', 'success');
      return { success: true, data: summary };
    } catch (error) {
      recordReportAggregation('940', 'failure');
      return toFailure('annualReport', error);
    }
  }

  w2(rows: readonly PayrollLedgerRow[], companyId: string, employeeId: string, year: number): EngineResult<W2Boxes> {
    try {
      const employeeRows = rows.filter(
        row => row.companyId === companyId && row.employeeId === employeeId && row.period.year === year
      );
      const boxes = mapYear(employeeRows);
      recordReportAggregation('w2', 'success');
      return { success: true, data: boxes };
    } catch (error) {
      recordReportAggregation('w2', 'failure');
      return toFailure('w2', error);
    }
  }

  ytd(
    rows: readonly PayrollLedgerRow[],
    companyId: string,
    employeeId: string,
    year: number,
    throughMonth?: number
  ): EngineResult<YtdSummary> {
    try {
      return { success: true, data: summarizeYtd(rows, companyId, employeeId, year, throughMonth) };
    } catch (error) {
      return toFailure('ytd', error);
    }
  }

  priorYtd(
    rows: readonly PayrollLedgerRow[],
    companyId: string,
    employeeId: string,
    period: PayPeriod
  ): EngineResult<PriorYtd> {
    try {
      return { success: true, data: priorYtdFromRows(rows, companyId, employeeId, period) };
    } catch (error) {
      return toFailure('priorYtd', error);
    }
  }
}
