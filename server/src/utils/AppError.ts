import type { ValidationIssue } from '../../../shared/types/index.js';

/**
 * Custom application error class with HTTP status codes and error codes
 * Provides structured error handling across the engine
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: unknown
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string, code: string = 'BAD_REQUEST', details?: unknown): AppError {
    return new AppError(message, 400, code, true, details);
  }

  static unprocessableEntity(message: string, code: string = 'VALIDATION_ERROR', details?: unknown): AppError {
    return new AppError(message, 422, code, true, details);
  }
}

// Payroll computation errors
export class PayrollError extends AppError {
  constructor(message: string, code: string = 'PAYROLL_ERROR', details?: unknown) {
    super(message, 422, code, true, details);
  }

  static calculationError(message: string, details?: unknown): PayrollError {
    return new PayrollError(message, 'CALCULATION_ERROR', details);
  }

  static insufficientData(message: string, details?: unknown): PayrollError {
    return new PayrollError(message, 'INSUFFICIENT_DATA', details);
  }
}

/**
 * The year directory or one of its files is absent. Never answered with a
 * fallback year.
 */
export class ConfigNotFoundError extends AppError {
  constructor(
    public readonly year: number,
    public readonly missingPath: string,
    payFrequency?: string
  ) {
    super(
      `Tax configuration not found for ${year}${payFrequency ? ` (${payFrequency})` : ''}: ${missingPath}`,
      404,
      'CONFIG_NOT_FOUND',
      true,
      { year, payFrequency, missingPath }
    );
  }
}

/**
 * A tax file is unreadable, out of contract, or failed the validation gate
 */
export class ConfigInvalidError extends AppError {
  constructor(
    message: string,
    public readonly reasons: ValidationIssue[]
  ) {
    super(message, 422, 'CONFIG_INVALID', true, { reasons });
  }
}

export class UnsupportedFilingStatusError extends AppError {
  constructor(filingStatus: string, year?: number, supported: string[] = []) {
    super(
      `Filing status '${filingStatus}' is not defined${year ? ` in the ${year} tax configuration` : ''}`,
      422,
      'UNSUPPORTED_FILING_STATUS',
      true,
      { filingStatus, year, supported }
    );
  }
}

export class UnsupportedFrequencyError extends AppError {
  constructor(payFrequency: string, supported: string[] = []) {
    super(
      `Pay frequency '${payFrequency}' is not supported`,
      422,
      'UNSUPPORTED_FREQUENCY',
      true,
      { payFrequency, supported }
    );
  }
}

export class NegativeInputRejectedError extends AppError {
  constructor(public readonly field: string, value: number) {
    super(`${field} must not be negative (received ${value})`, 400, 'NEGATIVE_INPUT_REJECTED', true, {
      field,
      value
    });
  }
}

/**
 * A row set mixes rates that a single report figure cannot be derived from
 */
export class InconsistentRateAcrossPeriodError extends AppError {
  constructor(rateName: string, rates: number[], details: Record<string, unknown> = {}) {
    super(
      `Rows use more than one ${rateName} (${rates.join(', ')}); cannot derive a single figure`,
      422,
      'INCONSISTENT_RATE_ACROSS_PERIOD',
      true,
      { rateName, rates, ...details }
    );
  }
}
