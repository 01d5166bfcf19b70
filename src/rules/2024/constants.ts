/**
 * 2024 Tax Year Constants — delta over 2025
 *
 * Only the values that differ from ../2025/constants are defined here;
 * yearModule.ts reuses everything else.
 *
 * Source: 協会けんぽ rates effective March 2024, 雇用保険料率 令和6年度,
 * and the income tax rules before the 令和7年度 reform.
 */

import type {
  EmploymentCategory,
  IncomeTaxTables,
  IncomeTieredAmount,
} from '../../model/types'

// ── Social insurance ───────────────────────────────────────────

export const LONG_TERM_CARE_RATE = 0.016

export const EMPLOYMENT_INSURANCE_RATES: Record<EmploymentCategory, number> = {
  general:      0.006,
  agriculture:  0.007,
  construction: 0.007,
}

// ── National income tax ────────────────────────────────────────

export const BASIC_DEDUCTION: IncomeTieredAmount[] = [
  { upTo: 24_000_000, amount: 480_000 },
  { upTo: 24_500_000, amount: 320_000 },
  { upTo: 25_000_000, amount: 160_000 },
  { upTo: null,       amount: 0 },
]

// 1,625,000–1,800,000: 40% − 100,000
export const SALARY_INCOME_DEDUCTION: IncomeTaxTables['salaryIncomeDeduction'] = {
  brackets: [
    { lower: 0,         rate: 0,   add: 550_000 },
    { lower: 1_625_000, rate: 0.4, add: -100_000 },
    { lower: 1_800_000, rate: 0.3, add: 80_000 },
    { lower: 3_600_000, rate: 0.2, add: 440_000 },
    { lower: 6_600_000, rate: 0.1, add: 1_100_000 },
    { lower: 8_500_000, rate: 0,   add: 1_950_000 },
  ],
  tableRounding: { from: 1_628_000, to: 6_600_000, unit: 4_000 },
}

// ── Tax Year ───────────────────────────────────────────────────

export const TAX_YEAR = 2024
