/**
 * Shapes of the tax-year file set
 *
 *   <TAX_DATA_DIR>/<year>/metadata.json
 *   <TAX_DATA_DIR>/<year>/rates.json
 *   <TAX_DATA_DIR>/<year>/validation.json
 *   <TAX_DATA_DIR>/<year>/fit/<frequency>/percentage_method.json
 *
 * The schemas check structure only. Range and ordering rules (rates within
 * [0,1], increasing bracket bounds, expected checkpoints) belong to the
 * validation gate so that they come back as a report instead of a parse error.
 */

import { z } from 'zod';
import type { FilingStatus, PayFrequency } from '../../../../shared/types/index.js';

export const FILING_STATUSES = [
  'SINGLE',
  'MARRIED_FILING_JOINTLY',
  'MARRIED_FILING_SEPARATELY',
  'HEAD_OF_HOUSEHOLD',
] as const satisfies readonly FilingStatus[];

export const PAY_FREQUENCIES = [
  'DAILY',
  'WEEKLY',
  'BIWEEKLY',
  'SEMIMONTHLY',
  'MONTHLY',
] as const satisfies readonly PayFrequency[];

export const PAY_PERIODS_PER_YEAR: Record<PayFrequency, number> = {
  DAILY: 260,
  WEEKLY: 52,
  BIWEEKLY: 26,
  SEMIMONTHLY: 24,
  MONTHLY: 12,
};

export const filingStatusSchema = z.enum(FILING_STATUSES);
export const payFrequencySchema = z.enum(PAY_FREQUENCIES);

export function isPayFrequency(value: string): value is PayFrequency {
  return payFrequencySchema.safeParse(value).success;
}

export function isFilingStatus(value: string): value is FilingStatus {
  return filingStatusSchema.safeParse(value).success;
}

/** Directory name used for a frequency under fit/ */
export function frequencyDirName(payFrequency: PayFrequency): string {
  return payFrequency.toLowerCase();
}

export const metadataSchema = z.object({
  taxYear: z.number().int(),
  source: z.string(),
  version: z.string(),
  effectiveDate: z.string(),
  lastUpdated: z.string(),
  method: z.string(),
  notes: z.string().optional(),
});

export const ratesSchema = z.object({
  socialSecurity: z.object({
    employeeRate: z.number(),
    employerRate: z.number(),
    wageBase: z.number(),
  }),
  medicare: z.object({
    employeeRate: z.number(),
    employerRate: z.number(),
    additionalEmployeeRate: z.number(),
    additionalThreshold: z.number(),
  }),
  futa: z.object({
    employerRate: z.number(),
    wageBase: z.number(),
  }),
  suta: z.object({
    state: z.string(),
    wageBase: z.number(),
  }),
});

export const validationCheckpointsSchema = z.object({
  taxYear: z.number().int(),
  standardDeduction: z.record(filingStatusSchema, z.number()),
  topBracketThreshold: z.record(filingStatusSchema, z.number()),
  socialSecurityWageBase: z.number().optional(),
});

export const bracketSchema = z.object({
  min: z.number(),
  max: z.number().nullable(),
  rate: z.number(),
  base: z.number(),
});

export const filingStatusTableSchema = z.object({
  standardDeduction: z.number(),
  brackets: z.array(bracketSchema).min(1),
});

export const percentageMethodSchema = z.object({
  taxYear: z.number().int(),
  payFrequency: payFrequencySchema,
  periodsPerYear: z.number().int().positive(),
  filingStatuses: z.record(filingStatusSchema, filingStatusTableSchema),
});

export type TaxYearMetadata = z.infer<typeof metadataSchema>;
export type TaxRates = z.infer<typeof ratesSchema>;
export type ValidationCheckpoints = z.infer<typeof validationCheckpointsSchema>;
export type TaxBracket = z.infer<typeof bracketSchema>;
export type FilingStatusTable = z.infer<typeof filingStatusTableSchema>;
export type PercentageMethodTable = z.infer<typeof percentageMethodSchema>;

/**
 * Fully resolved parameter set for one (year, pay frequency)
 */
export interface TaxYearConfig {
  readonly year: number;
  readonly payFrequency: PayFrequency;
  readonly metadata: Readonly<TaxYearMetadata>;
  readonly rates: Readonly<TaxRates>;
  readonly checkpoints: Readonly<ValidationCheckpoints>;
  readonly fit: Readonly<PercentageMethodTable>;
}
