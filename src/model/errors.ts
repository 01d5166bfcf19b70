/**
 * Error taxonomy. Every error is raised before any amount is computed,
 * so a caller never sees a partial result.
 */

export interface ValidationIssue {
  path: string
  message: string
}

export type PayrollErrorCode = 'INVALID_INPUT' | 'UNSUPPORTED_YEAR' | 'CONFIGURATION'

export class PayrollError extends Error {
  readonly code: PayrollErrorCode

  constructor(code: PayrollErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** Negative or malformed salary, unknown prefecture, invalid dependents. */
export class InvalidInputError extends PayrollError {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super('INVALID_INPUT', `Invalid salary input: ${formatIssues(issues)}`)
    this.issues = issues
  }
}

/** No rate tables are registered for the requested tax year. */
export class UnsupportedYearError extends PayrollError {
  readonly taxYear: number
  readonly supportedYears: number[]

  constructor(taxYear: number, supportedYears: number[]) {
    super(
      'UNSUPPORTED_YEAR',
      `No rate tables registered for tax year ${taxYear}. Supported years: ${supportedYears.join(', ')}`,
    )
    this.taxYear = taxYear
    this.supportedYears = supportedYears
  }
}

/** Rate or bracket tables are malformed or incomplete. */
export class ConfigurationError extends PayrollError {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super('CONFIGURATION', `Invalid rate tables: ${formatIssues(issues)}`)
    this.issues = issues
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  return issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')
}
