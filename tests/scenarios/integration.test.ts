/**
 * Properties that hold for every input: the accounting identity, net pay
 * bounds, monotonicity and idempotence.
 */

import { describe, it, expect } from 'vitest'
import { calculateDeductions, computeDeductions } from '../../src/rules/engine'
import { parseSalaryInput } from '../../src/model/schemas'
import { getRateTables } from '../../src/rules/yearModules'
import { PREFECTURE_CODES } from '../../src/model/prefectures'
import type { AgeBand, DeductionResult, NormalizedSalaryInput, PayPeriod } from '../../src/model/types'
import { tokyoAnnual5m, tokyoMonthly300k } from '../fixtures/inputs'

function lineSum(r: DeductionResult): number {
  return r.healthInsurance
    + r.pensionInsurance
    + r.employmentInsurance
    + r.nationalIncomeTax
    + r.reconstructionSurcharge
    + r.residenceTax
}

const AGE_BANDS: AgeBand[] = ['under-40', '40-64', '65-69', '70-74', '75-plus']
const PERIODS: PayPeriod[] = ['monthly', 'annual']

describe('accounting identity', () => {
  it('holds across prefectures, age bands and periods', () => {
    for (const prefecture of PREFECTURE_CODES) {
      for (const ageBand of AGE_BANDS) {
        for (const payPeriod of PERIODS) {
          const grossAmount = payPeriod === 'monthly' ? 412_345 : 6_543_210
          const r = calculateDeductions({ grossAmount, payPeriod, prefecture, ageBand, dependents: 2 })
          expect(r.totalDeductions).toBe(lineSum(r))
          expect(r.netPay).toBe(r.grossAmount - r.totalDeductions)
        }
      }
    }
  })
})

describe('net pay bounds', () => {
  it('never exceeds gross and never goes negative for ordinary salaries', () => {
    for (let gross = 0; gross <= 2_000_000; gross += 25_000) {
      const r = calculateDeductions(tokyoMonthly300k({ grossAmount: gross }))
      expect(r.netPay).toBeLessThanOrEqual(r.grossAmount)
      expect(r.netPay).toBeGreaterThanOrEqual(0)
      for (const line of [r.healthInsurance, r.pensionInsurance, r.employmentInsurance, r.residenceTax]) {
        expect(line).toBeGreaterThanOrEqual(0)
      }
    }
  })
})

// ── Monotonicity ─────────────────────────────────────────────────

interface YenScan {
  /** Gross amounts whose total deductions are below those one yen lower. */
  falls: number[]
  largestFall: number
  /** Gross amounts where a premium fell, or a tax fell while premiums held. */
  violations: number[]
}

function premiumsOf(r: DeductionResult): number[] {
  return [r.healthInsurance, r.pensionInsurance, r.employmentInsurance]
}

function taxesOf(r: DeductionResult): number[] {
  return [r.nationalIncomeTax, r.reconstructionSurcharge, r.residenceTax]
}

/** Compare every gross amount in the range with the amount one yen lower. */
function scanByYen(base: NormalizedSalaryInput, from: number, to: number): YenScan {
  const tables = getRateTables(2025)
  const falls: number[] = []
  const violations: number[] = []
  let largestFall = 0

  let before = computeDeductions({ ...base, grossAmount: from }, tables)
  for (let gross = from + 1; gross <= to; gross++) {
    const after = computeDeductions({ ...base, grossAmount: gross }, tables)

    const premiumsBefore = premiumsOf(before)
    const premiumsAfter = premiumsOf(after)
    const taxesBefore = taxesOf(before)
    const premiumFell = premiumsAfter.some((p, i) => p < premiumsBefore[i])
    const premiumsHeld = premiumsAfter.every((p, i) => p === premiumsBefore[i])
    const taxFell = taxesOf(after).some((t, i) => t < taxesBefore[i])
    if (premiumFell || (premiumsHeld && taxFell)) violations.push(gross)

    const fall = before.totalDeductions - after.totalDeductions
    if (fall > 0) {
      falls.push(gross)
      largestFall = Math.max(largestFall, fall)
    }
    before = after
  }

  return { falls, largestFall, violations }
}

describe('monotonicity', () => {
  it('total deductions dip only where a one-yen premium rise crosses a ¥1,000 step of taxable income', () => {
    const base = parseSalaryInput(tokyoMonthly300k(), 2025)
    const tables = getRateTables(2025)
    const before = computeDeductions({ ...base, grossAmount: 177_727 }, tables)
    const after = computeDeductions({ ...base, grossAmount: 177_728 }, tables)

    expect([before.employmentInsurance, after.employmentInsurance]).toEqual([977, 978])
    expect([before.detail.incomeTax.taxableIncome, after.detail.incomeTax.taxableIncome]).toEqual([216_000, 215_000])
    expect([before.nationalIncomeTax, after.nationalIncomeTax]).toEqual([900, 895])
    expect([before.totalDeductions, after.totalDeductions]).toEqual([33_084, 33_080])
  })

  it('monthly: premiums never fall, taxes never fall while premiums hold, and any dip stays under ¥200', () => {
    const scan = scanByYen(parseSalaryInput(tokyoMonthly300k(), 2025), 150_000, 260_000)
    expect(scan.violations).toEqual([])
    expect(scan.falls).toContain(177_728)
    expect(scan.largestFall).toBeLessThan(200)
  }, 30_000)

  it('annual: the same holds with dependents and care insurance, any dip under ¥1,000', () => {
    const input = tokyoAnnual5m({ dependents: 2, ageBand: '40-64' })
    const scan = scanByYen(parseSalaryInput(input, 2025), 2_500_000, 2_620_000)
    expect(scan.violations).toEqual([])
    // Employment insurance 1,170 → 1,171 a month; residence taxable 209,000 → 208,000
    expect(scan.falls).toContain(2_553_828)
    expect(scan.largestFall).toBeLessThan(1_000)
  }, 30_000)

  it('annual income tax never falls as taxable income rises', () => {
    let previousTaxable = -1
    let previousTax = -1
    for (let gross = 0; gross <= 30_000_000; gross += 50_000) {
      const { taxableIncome, incomeTax } = calculateDeductions(tokyoAnnual5m({ grossAmount: gross })).detail.incomeTax
      if (taxableIncome >= previousTaxable) {
        expect(incomeTax).toBeGreaterThanOrEqual(previousTax)
      }
      previousTaxable = taxableIncome
      previousTax = incomeTax
    }
  })
})

describe('idempotence', () => {
  it('returns equal results for the same input and leaves the input untouched', () => {
    const input = Object.freeze(tokyoMonthly300k({ dependents: 2, dependentTiers: { specified: 1 } }))
    const first = calculateDeductions(input)
    const second = calculateDeductions(input)
    expect(second).toEqual(first)
    expect(second).not.toBe(first)
    expect(input).toEqual(tokyoMonthly300k({ dependents: 2, dependentTiers: { specified: 1 } }))
  })
})
