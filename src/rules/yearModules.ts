/**
 * Multi-Year Rate Table Registry
 *
 * Maps tax year → RateTables, so the calculator can dispatch to the
 * correct year's rates based on SalaryInput.taxYear.
 *
 * Adding a new tax year:
 * 1. Create src/rules/<year>/constants.ts — year-specific rates/brackets
 * 2. Create src/rules/<year>/yearModule.ts — reuse the previous year, override deltas
 * 3. Import & register the tables in this file
 *
 * All existing years remain untouched.
 */

import type { RateTables } from '../model/types'
import { UnsupportedYearError } from '../model/errors'
import { rateTables2024 } from './2024/yearModule'
import { rateTables2025 } from './2025/yearModule'

// ── Interface ────────────────────────────────────────────────────

export interface RateTableRegistry {
  /** Tables for the year; throws UnsupportedYearError when none are registered. */
  get: (taxYear: number) => RateTables

  has: (taxYear: number) => boolean

  /** Registered years, ascending. */
  years: () => number[]
}

export function createRateTableRegistry(tables: RateTables[]): RateTableRegistry {
  const byYear = new Map<number, RateTables>(tables.map((t): [number, RateTables] => [t.taxYear, t]))
  const years = (): number[] => [...byYear.keys()].sort((a, b) => a - b)

  return {
    get(taxYear) {
      const found = byYear.get(taxYear)
      if (!found) throw new UnsupportedYearError(taxYear, years())
      return found
    },
    has: taxYear => byYear.has(taxYear),
    years,
  }
}

// ── Shipped registry ─────────────────────────────────────────────

export const DEFAULT_TAX_YEAR = 2025

const SHIPPED = createRateTableRegistry([rateTables2024, rateTables2025])

/**
 * Resolve the shipped rate tables for a given tax year.
 * Throws UnsupportedYearError if the year is not registered.
 */
export function getRateTables(year: number): RateTables {
  return SHIPPED.get(year)
}

/** List all tax years with shipped rate tables. */
export function getSupportedTaxYears(): number[] {
  return SHIPPED.years()
}
