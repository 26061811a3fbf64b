import { z } from 'zod';
import type { CompanyTaxProfile, PayPeriod } from '../../../shared/types/index.js';
import { FILING_STATUSES, PAY_FREQUENCIES, filingStatusSchema, payFrequencySchema } from '../tax/config/taxYearSchema.js';
import {
  AppError,
  NegativeInputRejectedError,
  UnsupportedFilingStatusError,
  UnsupportedFrequencyError,
} from '../utils/AppError.js';
import { periodFromPayDate, requiresPayDate } from '../utils/dateUtils.js';
import { parseRateToDecimal } from '../utils/rates.js';
import type { WithholdingInput } from './withholdingCalculator.js';

// Amounts are only type-checked here. Sign checks happen in the calculator so
// that a negative value is reported as NEGATIVE_INPUT_REJECTED.
const amount = z.number().finite();

// Custom issues carry the engine error they stand for in `params`, so that
// requestError reports them under the same code a direct call would.

// SUTA rates arrive as "2.7", "2.7%" or 0.027 from the DOR rate notice
const sutaRate = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const numeric = typeof value === 'number' ? value : Number(value.trim().replace(/%$/, ''));
  if (numeric < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Rate cannot be negative',
      params: { negativeValue: numeric },
    });
    return z.NEVER;
  }
  try {
    return parseRateToDecimal(value);
  } catch (error) {
    if (!(error instanceof AppError)) throw error;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message, params: { errorCode: error.code } });
    return z.NEVER;
  }
});

export const companySchema = z.object({
  companyId: z.string().min(1),
  name: z.string().optional(),
  sutaRate,
});

export const w4Schema = z.object({
  otherIncome: amount.default(0),
  deductions: amount.default(0),
  dependentsCredit: amount.default(0),
  extraWithholding: amount.default(0),
});

export const employeeProfileSchema = z.object({
  employeeId: z.string().min(1),
  payType: z.enum(['HOURLY', 'SALARY']),
  baseRate: amount,
  standardHours: amount.nullable().optional(),
  filingStatus: filingStatusSchema,
  payFrequency: payFrequencySchema,
  w4: w4Schema.default({}),
});

export const payPeriodSchema = z
  .object({
    year: z.number().int().min(1900).max(9999),
    month: z.number().int().min(1).max(12),
    payDate: z.string().optional(),
  })
  .superRefine((period, ctx) => {
    if (period.payDate === undefined) return;

    let fromPayDate: PayPeriod;
    try {
      fromPayDate = periodFromPayDate(period.payDate);
    } catch (error) {
      if (!(error instanceof AppError)) throw error;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error.message,
        path: ['payDate'],
        params: { errorCode: error.code },
      });
      return;
    }

    if (fromPayDate.year !== period.year || fromPayDate.month !== period.month) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'payDate must fall in the period year and month',
        path: ['payDate'],
      });
    }
  });

export const payrollRunSchema = z.object({
  period: payPeriodSchema,
  hoursWorked: amount.nullable().optional(),
  bonus: amount.optional(),
  reimbursements: amount.optional(),
  otherDeductions: amount.optional(),
});

export const priorYtdSchema = z.object({
  socialSecurityWages: amount.default(0),
  medicareWages: amount.default(0),
  futaWages: amount.default(0),
  sutaWages: amount.default(0),
});

export const payrollRequestSchema = z
  .object({
    company: companySchema,
    employee: employeeProfileSchema,
    run: payrollRunSchema,
    priorYtd: priorYtdSchema.optional(),
  })
  .superRefine((request, ctx) => {
    const { payFrequency } = request.employee;
    if (requiresPayDate(payFrequency) && request.run.period.payDate === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `payDate is required for ${payFrequency} payrolls`,
        path: ['run', 'period', 'payDate'],
      });
    }
  });

export type PayrollRequest = z.infer<typeof payrollRequestSchema>;

function lastKey(path: (string | number)[]): string | number | undefined {
  return path[path.length - 1];
}

/**
 * Engine error carried by a custom issue, if any
 */
function customIssueError(issue: z.ZodIssue): AppError | undefined {
  if (issue.code !== z.ZodIssueCode.custom || issue.params === undefined) {
    return undefined;
  }
  const field = issue.path.join('.');
  const negativeValue: unknown = issue.params.negativeValue;
  if (typeof negativeValue === 'number') {
    return new NegativeInputRejectedError(field, negativeValue);
  }
  const errorCode: unknown = issue.params.errorCode;
  if (typeof errorCode === 'string') {
    return AppError.badRequest(issue.message, errorCode, { field });
  }
  return undefined;
}

/**
 * Map a zod failure onto the engine's error codes. An unknown filing status
 * or frequency, a negative rate and an unreadable pay date have their own
 * codes; every other shape problem is VALIDATION_ERROR.
 */
export function requestError(error: z.ZodError): AppError {
  for (const issue of error.issues) {
    const mapped = customIssueError(issue);
    if (mapped !== undefined) {
      return mapped;
    }
    if (issue.code !== z.ZodIssueCode.invalid_enum_value) continue;
    const key = lastKey(issue.path);
    if (key === 'filingStatus') {
      return new UnsupportedFilingStatusError(String(issue.received), undefined, [...FILING_STATUSES]);
    }
    if (key === 'payFrequency') {
      return new UnsupportedFrequencyError(String(issue.received), [...PAY_FREQUENCIES]);
    }
  }

  return AppError.unprocessableEntity(
    'Invalid payroll request',
    'VALIDATION_ERROR',
    error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
  );
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw requestError(parsed.error);
  }
  return parsed.data;
}

export function parsePayrollRequest(input: unknown): WithholdingInput {
  const request = parseWith(payrollRequestSchema, input);
  return {
    company: request.company,
    profile: request.employee,
    run: request.run,
    priorYtd: request.priorYtd,
  };
}

export function parseCompany(input: unknown): CompanyTaxProfile {
  return parseWith(companySchema, input);
}
