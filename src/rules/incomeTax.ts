/**
 * National income tax — bracket math and the annual worksheet
 *
 * Tax = taxable income × marginal rate − the bracket's fixed deduction
 * (速算表). The reconstruction surcharge is a flat percentage of the
 * computed tax and does not feed back into the bracket lookup.
 */

import type {
  DependentTier,
  IncomeTaxTables,
  IncomeTaxWorksheet,
  IncomeTieredAmount,
  TaxBracket,
} from '../model/types'
import { clampZero, floorTo, multiplyFloor } from './rounding'
import { computeSalaryIncome } from './salaryIncome'

// ── Lookups ──────────────────────────────────────────────────────

/** Bracket containing the amount; lower bound inclusive. */
export function findBracket(taxableIncome: number, brackets: TaxBracket[]): TaxBracket {
  const bracket = brackets.find(b => taxableIncome >= b.lower && (b.upper === null || taxableIncome < b.upper))
  return bracket ?? brackets[brackets.length - 1]
}

/** Amount of the first tier whose `upTo` covers the income. */
export function lookupTiered(totalIncome: number, tiers: IncomeTieredAmount[]): number {
  const tier = tiers.find(t => t.upTo === null || totalIncome <= t.upTo)
  return tier ? tier.amount : 0
}

export function dependentDeductionTotal(
  dependents: Record<DependentTier, number>,
  amounts: Record<DependentTier, number>,
): number {
  return dependents.general * amounts.general
    + dependents.specified * amounts.specified
    + dependents.elderly * amounts.elderly
    + dependents['elderly-cohabiting'] * amounts['elderly-cohabiting']
}

// ── Bracket computation ──────────────────────────────────────────

/**
 * Compute tax from the quick-calculation table.
 *
 * @param taxableIncome - already rounded down to 1,000 yen
 * @returns tax in yen, rounded down, never negative
 */
export function computeBracketTax(taxableIncome: number, brackets: TaxBracket[]): number {
  if (taxableIncome <= 0) return 0
  const bracket = findBracket(taxableIncome, brackets)
  return clampZero(multiplyFloor(taxableIncome, bracket.rate) - bracket.deduction)
}

// ── Annual worksheet ─────────────────────────────────────────────

export function computeIncomeTaxWorksheet(
  grossAnnual: number,
  socialInsurance: number,
  dependents: Record<DependentTier, number>,
  tables: IncomeTaxTables,
): IncomeTaxWorksheet {
  const salary = computeSalaryIncome(grossAnnual, tables.salaryIncomeDeduction)
  const basicDeduction = lookupTiered(salary.income, tables.basicDeduction)
  const dependentDeduction = dependentDeductionTotal(dependents, tables.dependentDeductions)

  const taxableIncome = floorTo(
    clampZero(salary.income - socialInsurance - basicDeduction - dependentDeduction),
    1000,
  )
  const incomeTax = computeBracketTax(taxableIncome, tables.brackets)

  return {
    grossIncome: grossAnnual,
    salaryIncomeDeduction: salary.deduction,
    salaryIncome: salary.income,
    socialInsurance,
    basicDeduction,
    dependentDeduction,
    taxableIncome,
    incomeTax,
    reconstructionSurcharge: multiplyFloor(incomeTax, tables.surchargeRate),
  }
}
