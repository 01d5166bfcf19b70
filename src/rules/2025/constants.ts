/**
 * 2025 Tax Year Constants
 *
 * Single source of truth for the 2025 payroll rates (令和7年分).
 * All monetary amounts are integer yen; rates are decimals.
 *
 * Health insurance: 協会けんぽ rates effective March 2025 (see
 * healthInsuranceRates.json). Income tax: 令和7年度税制改正, which raised
 * the basic deduction and the salary income deduction floor.
 */

import type {
  DependentTier,
  EmploymentCategory,
  IncomeTaxTables,
  IncomeTieredAmount,
  ResidentTaxTables,
  TaxBracket,
} from '../../model/types'

// ── Social insurance ───────────────────────────────────────────

/** Welfare pension: 18.3%, split evenly with the employer. */
export const PENSION_RATE = 0.183

/** Standard remuneration floor and ceiling for welfare pension (grades 1–32). */
export const PENSION_STANDARD = {
  minimumStandard: 88_000,
  maximumStandard: 650_000,
}

/** Long-term care insurance, insured persons aged 40–64. */
export const LONG_TERM_CARE_RATE = 0.0159

export const EMPLOYEE_SHARE = 0.5

/** Monthly wage below which the employee is not enrolled in health or pension. */
export const ENROLLMENT_THRESHOLD = 58_000

// Source: 雇用保険料率 令和7年度 (employee share)
export const EMPLOYMENT_INSURANCE_RATES: Record<EmploymentCategory, number> = {
  general:      0.0055,
  agriculture:  0.0065,
  construction: 0.0065,
}

// ── National income tax ────────────────────────────────────────
// Source: 所得税の速算表. `upper` of each bracket is the next `lower`.

export const INCOME_TAX_BRACKETS: TaxBracket[] = [
  { lower: 0,          upper: 1_950_000,  rate: 0.05, deduction: 0 },
  { lower: 1_950_000,  upper: 3_300_000,  rate: 0.10, deduction: 97_500 },
  { lower: 3_300_000,  upper: 6_950_000,  rate: 0.20, deduction: 427_500 },
  { lower: 6_950_000,  upper: 9_000_000,  rate: 0.23, deduction: 636_000 },
  { lower: 9_000_000,  upper: 18_000_000, rate: 0.33, deduction: 1_536_000 },
  { lower: 18_000_000, upper: 40_000_000, rate: 0.40, deduction: 2_796_000 },
  { lower: 40_000_000, upper: null,       rate: 0.45, deduction: 4_796_000 },
]

/** 復興特別所得税, levied through 2037. */
export const RECONSTRUCTION_SURCHARGE_RATE = 0.021

/** 基礎控除, stepped by total income (令和7・8年分の特例を含む). */
export const BASIC_DEDUCTION: IncomeTieredAmount[] = [
  { upTo: 1_320_000,  amount: 950_000 },
  { upTo: 3_360_000,  amount: 880_000 },
  { upTo: 4_890_000,  amount: 680_000 },
  { upTo: 6_550_000,  amount: 630_000 },
  { upTo: 23_500_000, amount: 580_000 },
  { upTo: 24_000_000, amount: 480_000 },
  { upTo: 24_500_000, amount: 320_000 },
  { upTo: 25_000_000, amount: 160_000 },
  { upTo: null,       amount: 0 },
]

export const DEPENDENT_DEDUCTIONS: Record<DependentTier, number> = {
  general:              380_000,
  specified:            630_000,
  elderly:              480_000,
  'elderly-cohabiting': 580_000,
}

export const SALARY_INCOME_DEDUCTION: IncomeTaxTables['salaryIncomeDeduction'] = {
  brackets: [
    { lower: 0,         rate: 0,   add: 650_000 },
    { lower: 1_900_000, rate: 0.3, add: 80_000 },
    { lower: 3_600_000, rate: 0.2, add: 440_000 },
    { lower: 6_600_000, rate: 0.1, add: 1_100_000 },
    { lower: 8_500_000, rate: 0,   add: 1_950_000 },
  ],
  tableRounding: { from: 1_900_000, to: 6_600_000, unit: 4_000 },
}

// ── Residence tax ──────────────────────────────────────────────

export const RESIDENT_TAX: ResidentTaxTables = {
  prefecturalIncomeRate: 0.04,
  municipalIncomeRate: 0.06,
  perCapita: {
    prefectural: 1_500,
    municipal: 3_500,
    // 森林環境税, collected with the per-capita levy from 2024
    forestEnvironment: 1_000,
  },
  basicDeduction: [
    { upTo: 24_000_000, amount: 430_000 },
    { upTo: 24_500_000, amount: 290_000 },
    { upTo: 25_000_000, amount: 150_000 },
    { upTo: null,       amount: 0 },
  ],
  dependentDeductions: {
    general:              330_000,
    specified:            450_000,
    elderly:              380_000,
    'elderly-cohabiting': 450_000,
  },
  // 1級地 thresholds
  nonTaxable: {
    perPerson: 350_000,
    base: 100_000,
    dependentAddition: 210_000,
    incomeLevyDependentAddition: 320_000,
  },
  adjustmentCredit: {
    prefecturalRate: 0.02,
    municipalRate: 0.03,
    taxableIncomeThreshold: 2_000_000,
    minimumBase: 50_000,
    totalIncomeLimit: 25_000_000,
    basicDifference: 50_000,
    dependentDifferences: {
      general:              50_000,
      specified:            180_000,
      elderly:              100_000,
      'elderly-cohabiting': 130_000,
    },
  },
}

// ── Tax Year ───────────────────────────────────────────────────

export const TAX_YEAR = 2025
