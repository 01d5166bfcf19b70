/**
 * Deduction engine
 *
 * Runs the payroll pipeline for one validated input against one year's
 * rate tables, and wraps it in a calculator that validates input,
 * resolves the tax year and logs each computation.
 *
 * Pipeline (all amounts integer yen):
 *   period normalisation → standard remuneration → premiums →
 *   income tax worksheet → residence tax worksheet → net pay
 */

import type {
  DeductionResult,
  NormalizedSalaryInput,
  PrefectureCode,
  PrefectureRates,
  RateTables,
  SalaryInput,
  YearEndAdjustmentInput,
  YearEndAdjustmentResult,
} from '../model/types'
import { ConfigurationError, PayrollError } from '../model/errors'
import { parseRateTables, parseSalaryInput, parseYearEndFigures } from '../model/schemas'
import { logger as rootLogger } from '../utils/logger'
import type { PayrollLogger } from '../utils/logger'
import { multiplyFloor } from './rounding'
import { computeMonthlyPremiums, monthlyPremiumTotal } from './socialInsurance'
import { computeIncomeTaxWorksheet } from './incomeTax'
import { computeResidenceTax } from './residenceTax'
import type { ResidenceTaxFigures } from './residenceTax'
import { computeYearEndAdjustment } from './yearEndAdjustment'
import { createRateTableRegistry, DEFAULT_TAX_YEAR, getRateTables, getSupportedTaxYears } from './yearModules'
import type { RateTableRegistry } from './yearModules'

// ── Helpers ──────────────────────────────────────────────────────

export function prefectureRatesFor(tables: RateTables, code: PrefectureCode): PrefectureRates {
  const rates = tables.prefectures.find(p => p.code === code)
  if (!rates) {
    throw new ConfigurationError([
      { path: 'prefectures', message: `No rates for prefecture ${code} in ${tables.taxYear}` },
    ])
  }
  return rates
}

// ── computeDeductions ────────────────────────────────────────────

export function computeDeductions(input: NormalizedSalaryInput, tables: RateTables): DeductionResult {
  const monthly = input.payPeriod === 'monthly'
  const monthlyWage = monthly ? input.grossAmount : Math.floor(input.grossAmount / 12)
  const annualGross = monthly ? input.grossAmount * 12 : input.grossAmount
  const months = monthly ? 1 : 12

  const prefecture = prefectureRatesFor(tables, input.prefecture)

  const { standardRemuneration, premiums } = computeMonthlyPremiums(
    monthlyWage,
    prefecture,
    input.ageBand,
    input.employmentCategory,
    tables.socialInsurance,
  )
  const annualSocialInsurance = monthlyPremiumTotal(premiums) * 12

  const incomeTax = computeIncomeTaxWorksheet(
    annualGross,
    annualSocialInsurance,
    input.dependents,
    tables.incomeTax,
  )

  const figures: ResidenceTaxFigures = input.priorYear
    ? { basis: 'prior-year', ...input.priorYear }
    : { basis: 'current', grossAnnual: annualGross, socialInsurance: annualSocialInsurance }

  const residenceTax = computeResidenceTax(
    figures,
    input.dependents,
    input.dependentCount,
    prefecture,
    tables.residentTax,
    tables.incomeTax.salaryIncomeDeduction,
  )

  const healthInsurance = premiums.health * months
  const pensionInsurance = premiums.pension * months
  const employmentInsurance = premiums.employment * months
  const nationalIncomeTax = monthly ? Math.floor(incomeTax.incomeTax / 12) : incomeTax.incomeTax
  const reconstructionSurcharge = multiplyFloor(nationalIncomeTax, tables.incomeTax.surchargeRate)
  const residence = monthly ? residenceTax.installments.otherMonths : residenceTax.annualTotal

  const totalDeductions = healthInsurance
    + pensionInsurance
    + employmentInsurance
    + nationalIncomeTax
    + reconstructionSurcharge
    + residence

  return {
    taxYear: tables.taxYear,
    payPeriod: input.payPeriod,
    prefecture: input.prefecture,
    grossAmount: input.grossAmount,
    healthInsurance,
    pensionInsurance,
    employmentInsurance,
    nationalIncomeTax,
    reconstructionSurcharge,
    residenceTax: residence,
    totalDeductions,
    netPay: input.grossAmount - totalDeductions,
    detail: {
      standardRemuneration,
      monthlyPremiums: premiums,
      longTermCareInsurance: premiums.longTermCare * months,
      incomeTax,
      residenceTax,
    },
  }
}

// ── Calculator ───────────────────────────────────────────────────

export interface DeductionCalculatorOptions {
  /** Replaces the shipped tables; each entry is validated. */
  rateTables?: RateTables[]
  /** Year used when an input omits `taxYear`. Must be one of the registered years. */
  defaultTaxYear?: number
  logger?: PayrollLogger
}

export interface DeductionCalculator {
  readonly defaultTaxYear: number
  compute: (input: SalaryInput) => DeductionResult
  estimateYearEndAdjustment: (input: YearEndAdjustmentInput) => YearEndAdjustmentResult
  supportedTaxYears: () => number[]
  rateTablesFor: (taxYear: number) => RateTables
}

function buildRegistry(supplied: RateTables[], log: PayrollLogger): RateTableRegistry {
  if (supplied.length === 0) {
    throw new ConfigurationError([{ path: 'rateTables', message: 'At least one tax year is required' }])
  }

  const validated = supplied.map((raw, i) => {
    try {
      return parseRateTables(raw)
    } catch (err) {
      if (err instanceof ConfigurationError) {
        log.warn('Rate tables rejected', { index: i, taxYear: raw.taxYear, issues: err.issues })
      }
      throw err
    }
  })

  const seen = new Set<number>()
  for (const tables of validated) {
    if (seen.has(tables.taxYear)) {
      throw new ConfigurationError([
        { path: 'rateTables', message: `Duplicate tables for tax year ${tables.taxYear}` },
      ])
    }
    seen.add(tables.taxYear)
  }

  return createRateTableRegistry(validated)
}

const SHIPPED_REGISTRY: RateTableRegistry = {
  get: getRateTables,
  has: year => getSupportedTaxYears().includes(year),
  years: getSupportedTaxYears,
}

export function createDeductionCalculator(options: DeductionCalculatorOptions = {}): DeductionCalculator {
  const log = (options.logger ?? rootLogger).child({ component: 'deduction-calculator' })
  const registry = options.rateTables ? buildRegistry(options.rateTables, log) : SHIPPED_REGISTRY

  const years = registry.years()
  const defaultTaxYear = options.defaultTaxYear
    ?? (registry.has(DEFAULT_TAX_YEAR) ? DEFAULT_TAX_YEAR : years[years.length - 1])

  if (!registry.has(defaultTaxYear)) {
    throw new ConfigurationError([
      {
        path: 'defaultTaxYear',
        message: `${defaultTaxYear} is not a registered tax year (${years.join(', ')})`,
      },
    ])
  }

  /** Log rejected calls at debug, then let the error propagate unchanged. */
  function logRejection<T>(operation: string, run: () => T): T {
    try {
      return run()
    } catch (err) {
      if (err instanceof PayrollError) {
        log.debug('Calculation rejected', { operation, code: err.code, error: err.message })
      }
      throw err
    }
  }

  function compute(input: SalaryInput): DeductionResult {
    return logRejection('compute', () => {
      const normalized = parseSalaryInput(input, defaultTaxYear)
      const result = computeDeductions(normalized, registry.get(normalized.taxYear))

      log.debug('Deductions computed', {
        taxYear: result.taxYear,
        payPeriod: result.payPeriod,
        prefecture: result.prefecture,
        grossAmount: result.grossAmount,
        totalDeductions: result.totalDeductions,
        netPay: result.netPay,
      })
      return result
    })
  }

  function estimateYearEndAdjustment(input: YearEndAdjustmentInput): YearEndAdjustmentResult {
    return logRejection('estimateYearEndAdjustment', () => {
      const figures = parseYearEndFigures(input)
      const normalized = parseSalaryInput(
        { ...input, grossAmount: figures.annualGross, payPeriod: 'annual' },
        defaultTaxYear,
      )
      const tables = registry.get(normalized.taxYear)

      // Default to what this salary would have paid in premiums over the year
      const socialInsurance = figures.socialInsurancePaid ?? monthlyPremiumTotal(
        computeMonthlyPremiums(
          Math.floor(figures.annualGross / 12),
          prefectureRatesFor(tables, normalized.prefecture),
          normalized.ageBand,
          normalized.employmentCategory,
          tables.socialInsurance,
        ).premiums,
      ) * 12

      const result = computeYearEndAdjustment(
        normalized.taxYear,
        figures.annualGross,
        socialInsurance,
        normalized.dependents,
        figures.withheldIncomeTax,
        tables.incomeTax,
      )

      log.debug('Year-end adjustment estimated', {
        taxYear: result.taxYear,
        annualTaxLiability: result.annualTaxLiability,
        refund: result.refund,
        additionalPayment: result.additionalPayment,
      })
      return result
    })
  }

  return {
    defaultTaxYear,
    compute,
    estimateYearEndAdjustment,
    supportedTaxYears: () => registry.years(),
    rateTablesFor: year => registry.get(year),
  }
}

// ── Default calculator ───────────────────────────────────────────

const defaultCalculator = createDeductionCalculator()

/** Compute deductions with the shipped rate tables. */
export function calculateDeductions(input: SalaryInput): DeductionResult {
  return defaultCalculator.compute(input)
}

/** Estimate the year-end adjustment with the shipped rate tables. */
export function estimateYearEndAdjustment(input: YearEndAdjustmentInput): YearEndAdjustmentResult {
  return defaultCalculator.estimateYearEndAdjustment(input)
}
