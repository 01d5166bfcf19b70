/**
 * Public API
 */

export type * from './model/types'
export type { TracedValue, ValueSource, InputSource, RateTableSource, ComputedSource } from './model/traced'
export type { ValidationIssue, PayrollErrorCode } from './model/errors'
export type { LogLevel, LogContext, LogEntry, PayrollLogger } from './utils/logger'
export type { DeductionCalculator, DeductionCalculatorOptions } from './rules/engine'
export type { RateTableRegistry } from './rules/yearModules'
export type { ComputeTrace } from './rules/explain'

export { PREFECTURE_CODES, isPrefectureCode, jisCodeOf } from './model/prefectures'
export { PayrollError, InvalidInputError, UnsupportedYearError, ConfigurationError } from './model/errors'
export { parseRateTables, parseSalaryInput } from './model/schemas'
export { Logger, logger } from './utils/logger'
export {
  calculateDeductions,
  computeDeductions,
  createDeductionCalculator,
  estimateYearEndAdjustment,
} from './rules/engine'
export { DEFAULT_TAX_YEAR, createRateTableRegistry, getRateTables, getSupportedTaxYears } from './rules/yearModules'
export { NODE_LABELS, buildTrace, collectTracedValues, explainLine, formatYen } from './rules/explain'
