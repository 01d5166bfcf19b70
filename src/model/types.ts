/**
 * Canonical payroll model — inputs, rate tables and results.
 *
 * All monetary values are integer yen. Rates are decimals (0.0991 = 9.91%)
 * with at most six decimal places; products are exact in millionths.
 */

import type { PrefectureCode } from './prefectures'

export type { PrefectureCode } from './prefectures'

// ── Enumerated variants ────────────────────────────────────────

export type PayPeriod = 'monthly' | 'annual'

/** Age at the end of the pay month; drives which premiums apply. */
export type AgeBand = 'under-40' | '40-64' | '65-69' | '70-74' | '75-plus'

/**
 * Dependent deduction tiers.
 *   general            — 一般の控除対象扶養親族
 *   specified          — 特定扶養親族 (age 19–22)
 *   elderly            — 老人扶養親族 (70+)
 *   elderly-cohabiting — 同居老親等
 */
export type DependentTier = 'general' | 'specified' | 'elderly' | 'elderly-cohabiting'

/** Employment insurance business category (一般 / 農林水産・清酒製造 / 建設). */
export type EmploymentCategory = 'general' | 'agriculture' | 'construction'

// ── Input ──────────────────────────────────────────────────────

export interface PriorYearFigures {
  readonly grossAnnual: number
  readonly socialInsurance: number
}

export interface SalaryInput {
  readonly grossAmount: number
  readonly payPeriod: PayPeriod
  readonly prefecture: PrefectureCode
  readonly dependents?: number
  /** How many of `dependents` fall in each non-general tier; the rest are general. */
  readonly dependentTiers?: Partial<Record<DependentTier, number>>
  readonly ageBand?: AgeBand
  readonly employmentCategory?: EmploymentCategory
  readonly taxYear?: number
  /** Residence tax is assessed on these figures when present. */
  readonly priorYear?: PriorYearFigures
}

/** SalaryInput after validation and defaulting. */
export interface NormalizedSalaryInput {
  grossAmount: number
  payPeriod: PayPeriod
  prefecture: PrefectureCode
  dependents: Record<DependentTier, number>
  dependentCount: number
  ageBand: AgeBand
  employmentCategory: EmploymentCategory
  taxYear: number
  priorYear?: PriorYearFigures
}

export interface YearEndAdjustmentInput extends Omit<SalaryInput, 'payPeriod' | 'grossAmount' | 'priorYear'> {
  readonly annualGross: number
  readonly withheldIncomeTax: number
  /** Defaults to the premiums computed for `annualGross`. */
  readonly socialInsurancePaid?: number
}

// ── Rate tables ────────────────────────────────────────────────

/** Standard remuneration grade (標準報酬月額等級). `upper` is exclusive; null = unbounded. */
export interface RemunerationBand {
  grade: number
  lower: number
  upper: number | null
  standard: number
}

/** National income tax bracket. `lower` inclusive, `upper` exclusive; null = unbounded. */
export interface TaxBracket {
  lower: number
  upper: number | null
  rate: number
  deduction: number
}

/** A deduction amount that depends on total income (`upTo` inclusive; null = unbounded). */
export interface IncomeTieredAmount {
  upTo: number | null
  amount: number
}

/** Salary income deduction: amount × rate + add, for income from `lower`. */
export interface SalaryDeductionBracket {
  lower: number
  rate: number
  add: number
}

export interface PrefectureResidentTaxOverride {
  prefecturalIncomeRate?: number
  prefecturalPerCapita?: number
}

export interface PrefectureRates {
  code: PrefectureCode
  jisCode: string
  name: string
  healthInsuranceRate: number
  residentTax?: PrefectureResidentTaxOverride
}

export interface SocialInsuranceTables {
  bands: RemunerationBand[]
  pension: { minimumStandard: number; maximumStandard: number }
  enrollmentThreshold: number
  employeeShare: number
  pensionRate: number
  longTermCareRate: number
  employmentRates: Record<EmploymentCategory, number>
}

export interface IncomeTaxTables {
  brackets: TaxBracket[]
  surchargeRate: number
  basicDeduction: IncomeTieredAmount[]
  dependentDeductions: Record<DependentTier, number>
  salaryIncomeDeduction: {
    brackets: SalaryDeductionBracket[]
    /** 所得税法別表第五: income in [from, to) is rounded down to `unit` first. */
    tableRounding: { from: number; to: number; unit: number }
  }
}

export interface ResidentTaxTables {
  prefecturalIncomeRate: number
  municipalIncomeRate: number
  perCapita: { prefectural: number; municipal: number; forestEnvironment: number }
  basicDeduction: IncomeTieredAmount[]
  dependentDeductions: Record<DependentTier, number>
  nonTaxable: {
    /** Exempt at or below perPerson × (1 + dependents) + base (+ additions). */
    perPerson: number
    base: number
    /** Added to the per-capita threshold when the taxpayer has dependents. */
    dependentAddition: number
    /** Added to the income-levy threshold when the taxpayer has dependents. */
    incomeLevyDependentAddition: number
  }
  adjustmentCredit: {
    prefecturalRate: number
    municipalRate: number
    taxableIncomeThreshold: number
    minimumBase: number
    totalIncomeLimit: number
    basicDifference: number
    dependentDifferences: Record<DependentTier, number>
  }
}

export interface RateTables {
  taxYear: number
  socialInsurance: SocialInsuranceTables
  prefectures: PrefectureRates[]
  incomeTax: IncomeTaxTables
  residentTax: ResidentTaxTables
}

// ── Results ────────────────────────────────────────────────────

export interface StandardRemuneration {
  /** False when the monthly wage is below the enrollment threshold. */
  enrolled: boolean
  grade: number
  monthlyWage: number
  health: number
  pension: number
}

/** Employee-share premiums for one month. */
export interface MonthlyPremiums {
  health: number
  /** Portion of `health` attributable to long-term care insurance. */
  longTermCare: number
  pension: number
  employment: number
}

export interface IncomeTaxWorksheet {
  grossIncome: number
  salaryIncomeDeduction: number
  salaryIncome: number
  socialInsurance: number
  basicDeduction: number
  dependentDeduction: number
  taxableIncome: number
  incomeTax: number
  reconstructionSurcharge: number
}

export type ResidenceTaxBasis = 'current' | 'prior-year'

/** none = fully taxed; income-levy = only per-capita due; all = nothing due. */
export type ResidenceTaxExemption = 'none' | 'income-levy' | 'all'

export interface ResidenceTaxWorksheet {
  basis: ResidenceTaxBasis
  /** Annual gross salary the assessment is based on. */
  grossIncome: number
  totalIncome: number
  socialInsurance: number
  basicDeduction: number
  dependentDeduction: number
  taxableIncome: number
  exemption: ResidenceTaxExemption
  adjustmentCredit: { prefectural: number; municipal: number }
  prefecturalIncomeLevy: number
  municipalIncomeLevy: number
  perCapitaLevy: number
  annualTotal: number
  installments: { june: number; otherMonths: number }
}

export interface DeductionDetail {
  standardRemuneration: StandardRemuneration
  monthlyPremiums: MonthlyPremiums
  /** Long-term care portion of `healthInsurance` for the pay period. */
  longTermCareInsurance: number
  incomeTax: IncomeTaxWorksheet
  residenceTax: ResidenceTaxWorksheet
}

export interface DeductionResult {
  readonly taxYear: number
  readonly payPeriod: PayPeriod
  readonly prefecture: PrefectureCode
  readonly grossAmount: number
  readonly healthInsurance: number
  readonly pensionInsurance: number
  readonly employmentInsurance: number
  readonly nationalIncomeTax: number
  readonly reconstructionSurcharge: number
  readonly residenceTax: number
  readonly totalDeductions: number
  readonly netPay: number
  readonly detail: DeductionDetail
}

export interface YearEndAdjustmentResult {
  taxYear: number
  annualGross: number
  socialInsurance: number
  taxableIncome: number
  calculatedTax: number
  reconstructionSurcharge: number
  /** 年調年税額: calculated tax × 102.1%, rounded down to 100 yen. */
  annualTaxLiability: number
  withheldIncomeTax: number
  refund: number
  additionalPayment: number
}
