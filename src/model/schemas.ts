/**
 * Zod runtime validation schemas — mirror the TypeScript types in types.ts.
 *
 * Two entry points:
 *  - salary input, validated on every calculation (InvalidInputError)
 *  - rate tables, validated once when a tax year is registered (ConfigurationError)
 *
 * Conventions:
 *  - Monetary amounts are non-negative integer yen.
 *  - Rates are decimals in [0, 1) with at most six decimal places.
 *  - Validated rate tables are deeply frozen.
 */

import { z } from 'zod'
import { PREFECTURE_CODES, jisCodeOf } from './prefectures'
import { ConfigurationError, InvalidInputError } from './errors'
import type { ValidationIssue } from './errors'
import type { NormalizedSalaryInput, RateTables } from './types'
import { RATE_DECIMALS, hasRateResolution } from '../rules/rounding'

// ── Reusable validators ──────────────────────────────────────────

/** Upper bound keeping amount × rate products exact. */
const MAX_YEN = 10_000_000_000

/** Largest gross salary accepted, per period or per year. */
const MAX_GROSS = 1_000_000_000

const yen = z.number()
  .int('Amount must be a whole number of yen')
  .min(0, 'Amount must be non-negative')
  .max(MAX_YEN, 'Amount is out of range')

const count = z.number()
  .int('Count must be a whole number')
  .min(0, 'Count must be non-negative')

const rateRange = z.number().min(0, 'Rate must be non-negative').lt(1, 'Rate must be below 1')

const resolution = `Rate must have at most ${RATE_DECIMALS} decimal places`

const rate = rateRange.refine(hasRateResolution, resolution)

const positiveRate = rateRange.positive().refine(hasRateResolution, resolution)

const grossYen = yen.max(MAX_GROSS, 'Gross amount is out of range')

const prefectureSchema = z.enum(PREFECTURE_CODES, {
  errorMap: () => ({ message: 'Unknown prefecture code' }),
})

const payPeriodSchema = z.enum(['monthly', 'annual'])

const ageBandSchema = z.enum(['under-40', '40-64', '65-69', '70-74', '75-plus'])

const employmentCategorySchema = z.enum(['general', 'agriculture', 'construction'])

const taxYearSchema = z.number().int('Tax year must be a whole number').min(1989).max(2999)

// ── Salary input ─────────────────────────────────────────────────

const dependentTiersSchema = z.object({
  general: count.optional(),
  specified: count.optional(),
  elderly: count.optional(),
  'elderly-cohabiting': count.optional(),
}).strict()

const priorYearSchema = z.object({
  grossAnnual: yen,
  socialInsurance: yen,
})

const salaryInputSchema = z.object({
  grossAmount: grossYen,
  payPeriod: payPeriodSchema,
  prefecture: prefectureSchema,
  dependents: count.default(0),
  dependentTiers: dependentTiersSchema.optional(),
  ageBand: ageBandSchema.default('under-40'),
  employmentCategory: employmentCategorySchema.default('general'),
  taxYear: taxYearSchema.optional(),
  priorYear: priorYearSchema.optional(),
}).superRefine((value, ctx) => {
  const tiers = value.dependentTiers
  if (!tiers) return
  const nonGeneral = (tiers.specified ?? 0) + (tiers.elderly ?? 0) + (tiers['elderly-cohabiting'] ?? 0)
  const declared = nonGeneral + (tiers.general ?? 0)
  if (nonGeneral > value.dependents || (tiers.general !== undefined && declared !== value.dependents)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['dependentTiers'],
      message: `Tier counts (${declared}) do not add up to dependents (${value.dependents})`,
    })
  }
})

const yearEndAdjustmentInputSchema = z.object({
  annualGross: grossYen,
  withheldIncomeTax: yen,
  socialInsurancePaid: yen.optional(),
})

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/**
 * Validate and default a salary input. Throws InvalidInputError listing
 * every problem found.
 */
export function parseSalaryInput(input: unknown, defaultTaxYear: number): NormalizedSalaryInput {
  const result = salaryInputSchema.safeParse(input)
  if (!result.success) throw new InvalidInputError(toIssues(result.error))

  const v = result.data
  const tiers = v.dependentTiers ?? {}
  const specified = tiers.specified ?? 0
  const elderly = tiers.elderly ?? 0
  const elderlyCohabiting = tiers['elderly-cohabiting'] ?? 0

  return {
    grossAmount: v.grossAmount,
    payPeriod: v.payPeriod,
    prefecture: v.prefecture,
    dependents: {
      general: v.dependents - specified - elderly - elderlyCohabiting,
      specified,
      elderly,
      'elderly-cohabiting': elderlyCohabiting,
    },
    dependentCount: v.dependents,
    ageBand: v.ageBand,
    employmentCategory: v.employmentCategory,
    taxYear: v.taxYear ?? defaultTaxYear,
    priorYear: v.priorYear,
  }
}

export function parseYearEndFigures(input: unknown): z.infer<typeof yearEndAdjustmentInputSchema> {
  const result = yearEndAdjustmentInputSchema.safeParse(input)
  if (!result.success) throw new InvalidInputError(toIssues(result.error))
  return result.data
}

// ── Rate tables ──────────────────────────────────────────────────

interface Banded {
  lower: number
  upper: number | null
}

/** Rows start at 0, are contiguous and strictly increasing, and only the last is unbounded. */
function checkContiguous(rows: Banded[], ctx: z.RefinementCtx): void {
  rows.forEach((row, i) => {
    if (i === 0 && row.lower !== 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [0, 'lower'], message: 'First row must start at 0' })
    }
    if (i === rows.length - 1) {
      if (row.upper !== null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'upper'], message: 'Last row must be unbounded' })
      }
      return
    }
    if (row.upper === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'upper'], message: 'Only the last row may be unbounded' })
      return
    }
    if (row.upper <= row.lower) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'upper'], message: 'Upper bound must exceed lower bound' })
    }
    if (rows[i + 1].lower !== row.upper) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i + 1, 'lower'], message: 'Rows must be contiguous' })
    }
  })
}

/** Income tiers: strictly increasing `upTo`, last one unbounded. */
function checkTiers(rows: { upTo: number | null }[], ctx: z.RefinementCtx): void {
  rows.forEach((row, i) => {
    const last = i === rows.length - 1
    if (last !== (row.upTo === null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'upTo'],
        message: last ? 'Last tier must be unbounded' : 'Only the last tier may be unbounded',
      })
    }
    const prev = i > 0 ? rows[i - 1].upTo : null
    if (prev !== null && row.upTo !== null && row.upTo <= prev) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'upTo'], message: 'Tiers must be increasing' })
    }
  })
}

const tierSchema = z.object({ upTo: yen.nullable(), amount: yen })

const tiersSchema = z.array(tierSchema).min(1).superRefine(checkTiers)

const perTierSchema = z.object({
  general: yen,
  specified: yen,
  elderly: yen,
  'elderly-cohabiting': yen,
})

const bandSchema = z.object({
  grade: z.number().int().positive(),
  lower: yen,
  upper: yen.nullable(),
  standard: yen.positive(),
})

const socialInsuranceSchema = z.object({
  bands: z.array(bandSchema).min(1).superRefine((bands, ctx) => {
    checkContiguous(bands, ctx)
    bands.forEach((band, i) => {
      if (i > 0 && band.standard <= bands[i - 1].standard) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'standard'], message: 'Standard amounts must increase' })
      }
    })
  }),
  pension: z.object({
    minimumStandard: yen.positive(),
    maximumStandard: yen.positive(),
  }).refine(p => p.minimumStandard < p.maximumStandard, {
    message: 'Pension minimum must be below maximum',
  }),
  enrollmentThreshold: yen,
  employeeShare: positiveRate,
  pensionRate: rate,
  longTermCareRate: rate,
  employmentRates: z.object({
    general: rate,
    agriculture: rate,
    construction: rate,
  }),
})

const taxBracketSchema = z.object({
  lower: yen,
  upper: yen.nullable(),
  rate,
  deduction: yen,
})

const incomeTaxSchema = z.object({
  brackets: z.array(taxBracketSchema).min(1).superRefine((brackets, ctx) => {
    checkContiguous(brackets, ctx)
    brackets.forEach((b, i) => {
      if (i > 0 && b.rate <= brackets[i - 1].rate) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'rate'], message: 'Marginal rates must increase' })
      }
    })
  }),
  surchargeRate: rate,
  basicDeduction: tiersSchema,
  dependentDeductions: perTierSchema,
  salaryIncomeDeduction: z.object({
    brackets: z.array(z.object({ lower: yen, rate, add: z.number().int() })).min(1).superRefine((rows, ctx) => {
      rows.forEach((row, i) => {
        if (i === 0 && row.lower !== 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [0, 'lower'], message: 'First row must start at 0' })
        }
        if (i > 0 && row.lower <= rows[i - 1].lower) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'lower'], message: 'Rows must be increasing' })
        }
      })
    }),
    tableRounding: z.object({
      from: yen,
      to: yen,
      unit: yen.positive(),
    }),
  }),
})

const residentTaxSchema = z.object({
  prefecturalIncomeRate: rate,
  municipalIncomeRate: rate,
  perCapita: z.object({
    prefectural: yen,
    municipal: yen,
    forestEnvironment: yen,
  }),
  basicDeduction: tiersSchema,
  dependentDeductions: perTierSchema,
  nonTaxable: z.object({
    perPerson: yen,
    base: yen,
    dependentAddition: yen,
    incomeLevyDependentAddition: yen,
  }),
  adjustmentCredit: z.object({
    prefecturalRate: rate,
    municipalRate: rate,
    taxableIncomeThreshold: yen,
    minimumBase: yen,
    totalIncomeLimit: yen,
    basicDifference: yen,
    dependentDifferences: perTierSchema,
  }),
})

const prefectureRatesSchema = z.object({
  code: prefectureSchema,
  jisCode: z.string().regex(/^\d{2}$/, 'JIS code must be 2 digits'),
  name: z.string().min(1),
  healthInsuranceRate: positiveRate,
  residentTax: z.object({
    prefecturalIncomeRate: rate.optional(),
    prefecturalPerCapita: yen.optional(),
  }).optional(),
})

const rateTablesSchema = z.object({
  taxYear: taxYearSchema,
  socialInsurance: socialInsuranceSchema,
  prefectures: z.array(prefectureRatesSchema).superRefine((rows, ctx) => {
    const seen = new Set<string>()
    rows.forEach((row, i) => {
      if (seen.has(row.code)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'code'], message: `Duplicate prefecture ${row.code}` })
      }
      seen.add(row.code)
      if (row.jisCode !== jisCodeOf(row.code)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'jisCode'], message: `Expected ${jisCodeOf(row.code)} for ${row.code}` })
      }
    })
    const missing = PREFECTURE_CODES.filter(code => !seen.has(code))
    if (missing.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing prefectures: ${missing.join(', ')}` })
    }
  }),
  incomeTax: incomeTaxSchema,
  residentTax: residentTaxSchema,
})

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    Object.values(value).forEach(deepFreeze)
    Object.freeze(value)
  }
  return value
}

/**
 * Validate externally supplied rate tables. Throws ConfigurationError
 * listing every problem found. The returned copy is frozen, so writes
 * through it throw instead of changing later calculations.
 */
export function parseRateTables(raw: unknown): RateTables {
  const result = rateTablesSchema.safeParse(raw)
  if (!result.success) throw new ConfigurationError(toIssues(result.error))
  return deepFreeze(result.data)
}

// ── Export sub-schemas for testing ────────────────────────────────

export {
  prefectureSchema,
  ageBandSchema,
  bandSchema,
  taxBracketSchema,
}
