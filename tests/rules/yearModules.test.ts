/**
 * Tests for the multi-year rate table registry.
 *
 * Verifies:
 * 1. The shipped registry resolves 2024 and 2025
 * 2. Unsupported years throw UnsupportedYearError
 * 3. 2024 overrides only its deltas
 * 4. Served tables cannot be written to
 */

import { describe, it, expect } from 'vitest'
import {
  DEFAULT_TAX_YEAR,
  createRateTableRegistry,
  getRateTables,
  getSupportedTaxYears,
} from '../../src/rules/yearModules'
import { UnsupportedYearError } from '../../src/model/errors'
import { parseRateTables } from '../../src/model/schemas'
import { calculateDeductions, createDeductionCalculator } from '../../src/rules/engine'
import { TAX_YEAR as TAX_YEAR_2024 } from '../../src/rules/2024/constants'
import { TAX_YEAR as TAX_YEAR_2025 } from '../../src/rules/2025/constants'
import { RecordingLogger } from '../fixtures/logger'
import { tokyoAnnual5m } from '../fixtures/inputs'

// ── 1. Registry resolution ──────────────────────────────────────

describe('getRateTables', () => {
  it('resolves the 2025 tables', () => {
    const tables = getRateTables(2025)
    expect(tables.taxYear).toBe(TAX_YEAR_2025)
    expect(tables.prefectures).toHaveLength(47)
    expect(tables.socialInsurance.bands).toHaveLength(50)
  })

  it('resolves the 2024 tables', () => {
    expect(getRateTables(2024).taxYear).toBe(TAX_YEAR_2024)
  })

  it('lists supported years ascending', () => {
    expect(getSupportedTaxYears()).toEqual([2024, 2025])
    expect(DEFAULT_TAX_YEAR).toBe(2025)
  })
})

// ── 2. Unsupported year ─────────────────────────────────────────

describe('unsupported year', () => {
  it('throws UnsupportedYearError listing supported years', () => {
    expect(() => getRateTables(2023)).toThrow(UnsupportedYearError)
    expect(() => getRateTables(2023)).toThrow('No rate tables registered for tax year 2023. Supported years: 2024, 2025')
  })

  it('carries the requested and supported years', () => {
    try {
      getRateTables(2030)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedYearError)
      if (err instanceof UnsupportedYearError) {
        expect(err.code).toBe('UNSUPPORTED_YEAR')
        expect(err.taxYear).toBe(2030)
        expect(err.supportedYears).toEqual([2024, 2025])
      }
    }
  })
})

// ── 3. Year deltas ──────────────────────────────────────────────

describe('2024 deltas', () => {
  const t2024 = getRateTables(2024)
  const t2025 = getRateTables(2025)

  it('shares the standard remuneration bands and pension rate', () => {
    expect(t2024.socialInsurance.bands).toEqual(t2025.socialInsurance.bands)
    expect(t2024.socialInsurance.pensionRate).toBe(0.183)
  })

  it('overrides care, employment and health rates', () => {
    expect(t2024.socialInsurance.longTermCareRate).toBe(0.016)
    expect(t2024.socialInsurance.employmentRates.general).toBe(0.006)
    expect(t2024.prefectures.find(p => p.code === 'tokyo')?.healthInsuranceRate).toBe(0.0998)
  })

  it('overrides the basic deduction and salary deduction floor', () => {
    expect(t2024.incomeTax.basicDeduction[0]).toEqual({ upTo: 24_000_000, amount: 480_000 })
    expect(t2024.incomeTax.salaryIncomeDeduction.brackets[0].add).toBe(550_000)
    expect(t2024.incomeTax.brackets).toEqual(t2025.incomeTax.brackets)
  })
})

// ── Custom registries ───────────────────────────────────────────

describe('createRateTableRegistry', () => {
  it('serves only the tables it was given', () => {
    const registry = createRateTableRegistry([getRateTables(2024)])
    expect(registry.years()).toEqual([2024])
    expect(registry.has(2025)).toBe(false)
    expect(() => registry.get(2025)).toThrow('Supported years: 2024')
  })
})

// ── 4. Immutability ─────────────────────────────────────────────

describe('frozen tables', () => {
  it('rejects writes to the shipped tables and keeps results unchanged', () => {
    const tables = getRateTables(2025)
    expect(() => {
      tables.incomeTax.brackets[1].rate = 0.3
    }).toThrow(TypeError)
    expect(() => {
      tables.prefectures.push(tables.prefectures[0])
    }).toThrow(TypeError)
    expect(tables.incomeTax.brackets[1].rate).toBe(0.1)
    expect(calculateDeductions(tokyoAnnual5m()).nationalIncomeTax).toBe(118_300)
  })

  it('serves the same frozen tables through a calculator', () => {
    const tables = createDeductionCalculator({ logger: new RecordingLogger() }).rateTablesFor(2024)
    expect(Object.isFrozen(tables)).toBe(true)
    expect(Object.isFrozen(tables.socialInsurance.bands[0])).toBe(true)
    expect(Object.isFrozen(tables.residentTax.adjustmentCredit.dependentDifferences)).toBe(true)
  })

  it('freezes a validated copy and leaves the supplied object writable', () => {
    const raw: unknown = JSON.parse(JSON.stringify(getRateTables(2025)))
    const parsed = parseRateTables(raw)
    expect(Object.isFrozen(parsed.incomeTax)).toBe(true)
    expect(Object.isFrozen(raw)).toBe(false)
  })
})
