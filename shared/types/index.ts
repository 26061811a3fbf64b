// Shared types between the payroll engine and the systems that store and render its output

export type PayFrequency = 'DAILY' | 'WEEKLY' | 'BIWEEKLY' | 'SEMIMONTHLY' | 'MONTHLY'

export type PayType = 'HOURLY' | 'SALARY'

export type FilingStatus =
  | 'SINGLE'
  | 'MARRIED_FILING_JOINTLY'
  | 'MARRIED_FILING_SEPARATELY'
  | 'HEAD_OF_HOUSEHOLD'

export type Quarter = 1 | 2 | 3 | 4

export interface PayPeriod {
  year: number
  month: number
  payDate?: string
}

export interface W4Adjustments {
  otherIncome: number       // Step 4(a), annual
  deductions: number        // Step 4(b), annual
  dependentsCredit: number  // Step 3, annual amount
  extraWithholding: number  // Step 4(c), per period
}

export interface EmployeePayProfile {
  employeeId: string
  payType: PayType
  baseRate: number
  standardHours?: number | null
  filingStatus: FilingStatus
  payFrequency: PayFrequency
  w4: W4Adjustments
}

export interface CompanyTaxProfile {
  companyId: string
  name?: string
  sutaRate: number
}

export interface PayrollRunInput {
  period: PayPeriod
  hoursWorked?: number | null
  bonus?: number
  reimbursements?: number
  otherDeductions?: number
}

export interface PriorYtd {
  socialSecurityWages: number
  medicareWages: number
  futaWages: number
  sutaWages: number
}

// Calculation trace

export type RoundingApplied = 'ROUND_HALF_UP_CENTS' | 'NONE'

export interface TraceEntry {
  readonly step: number
  readonly label: string
  readonly formula: string
  readonly inputs: Readonly<Record<string, string>>
  readonly rawValue: string
  readonly value: string
  readonly rounding: RoundingApplied
}

// Ledger

export interface TaxConfigRef {
  readonly taxYear: number
  readonly payFrequency: PayFrequency
  readonly version: string
  readonly source: string
  readonly effectiveDate: string
}

export interface AppliedRates {
  readonly socialSecurityEmployee: number
  readonly socialSecurityEmployer: number
  readonly socialSecurityWageBase: number
  readonly medicareEmployee: number
  readonly medicareEmployer: number
  readonly additionalMedicareEmployee: number
  readonly additionalMedicareThreshold: number
  readonly futa: number
  readonly futaWageBase: number
  readonly suta: number
  readonly sutaWageBase: number
}

export interface PayrollLedgerRow {
  readonly companyId: string
  readonly employeeId: string
  readonly period: Readonly<PayPeriod>
  readonly payFrequency: PayFrequency
  readonly filingStatus: FilingStatus
  readonly configRef: TaxConfigRef
  readonly appliedRates: AppliedRates
  readonly hoursWorked: number | null
  readonly earnings: {
    readonly regularPay: number
    readonly bonus: number
    readonly reimbursements: number
    readonly grossPay: number
  }
  readonly taxableWages: {
    readonly federalIncomeTax: number   // annualized, after W-4 adjustments
    readonly socialSecurity: number
    readonly medicare: number
    readonly additionalMedicare: number
    readonly futa: number
    readonly suta: number
  }
  readonly employeeTaxes: {
    readonly federalIncomeTax: number
    readonly socialSecurity: number
    readonly medicare: number
    readonly additionalMedicare: number
  }
  readonly employerTaxes: {
    readonly socialSecurity: number
    readonly medicare: number
    readonly futa: number
    readonly suta: number
  }
  readonly otherDeductions: number
  readonly netPay: number
  readonly calculationTrace: readonly TraceEntry[]
}

// Reports

export interface Form941Summary {
  companyId: string
  year: number
  quarter: Quarter
  line1EmployeeCount: number
  line2Wages: number
  line3FederalIncomeTax: number
  line5aSocialSecurityWages: number
  line5aSocialSecurityTax: number
  line5cMedicareWages: number
  line5cMedicareTax: number
  line5dAdditionalMedicareWages: number
  line5dAdditionalMedicareTax: number
  line5eTotalSocialSecurityMedicare: number
  line6TotalTaxes: number
  monthlyTaxLiability: {
    month1: number
    month2: number
    month3: number
  }
  rowCount: number
}

export interface Rt6EmployeeDetail {
  employeeId: string
  grossWages: number
  taxableWages: number
  excessWages: number
}

export interface Rt6Summary {
  companyId: string
  year: number
  quarter: Quarter
  sutaRate: number
  grossWages: number
  excessWages: number
  taxableWages: number
  taxDue: number
  rowContributions: number
  employeeDetail: Rt6EmployeeDetail[]
  rowCount: number
}

export interface Form940EmployeeDetail {
  employeeId: string
  totalPayments: number
  futaTaxableWages: number
  exemptPayments: number
}

export interface FutaCapViolation {
  employeeId: string
  futaTaxableWages: number
  wageBase: number
}

export interface Form940Summary {
  companyId: string
  year: number
  futaRate: number | null
  line3TotalPayments: number
  line5ExcessPayments: number
  line7TaxableFutaWages: number
  line8FutaTax: number
  rowFutaTax: number
  quarterlyLiability: {
    q1: number
    q2: number
    q3: number
    q4: number
    total: number
  }
  employeeDetail: Form940EmployeeDetail[]
  consistency: {
    ok: boolean
    violations: FutaCapViolation[]
  }
  rowCount: number
}

export interface YtdSummary {
  companyId: string
  employeeId: string
  year: number
  throughMonth: number
  grossPay: number
  federalIncomeTax: number
  socialSecurityWages: number
  socialSecurityEmployee: number
  socialSecurityEmployer: number
  medicareWages: number
  medicareEmployee: number
  medicareEmployer: number
  additionalMedicareEmployee: number
  futaWages: number
  futaEmployer: number
  sutaWages: number
  sutaEmployer: number
  otherDeductions: number
  netPay: number
  rowCount: number
}

export interface W2Boxes {
  companyId: string
  employeeId: string
  taxYear: number
  box1WagesTipsOther: number
  box2FederalWithholding: number
  box3SocialSecurityWages: number
  box4SocialSecurityTax: number
  box5MedicareWages: number
  box6MedicareTax: number
  reconciliation: {
    socialSecurityEmployeeRate: number
    medicareEmployeeRate: number
    storedSocialSecurityWages: number
    storedMedicareWages: number
  }
}

// Validation

export type ValidationStatus = 'PASS' | 'FAIL'

export interface ValidationIssue {
  field: string
  message: string
}

export interface ValidationResult {
  year: number
  payFrequency: PayFrequency | null
  status: ValidationStatus
  failures: ValidationIssue[]
  warnings: ValidationIssue[]
  checkedFiles: string[]
}

// Engine results

export interface EngineSuccess<T> {
  success: true
  data: T
}

export interface EngineFailure {
  success: false
  error: string
  message: string
  reference?: string
  details?: unknown
}

export type EngineResult<T> = EngineSuccess<T> | EngineFailure
