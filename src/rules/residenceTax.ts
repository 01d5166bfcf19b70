/**
 * Residence tax (住民税) — prefectural + municipal income levy and
 * per-capita levy, assessed annually and withheld in twelve installments
 * from June.
 *
 * Order of rounding:
 *  1. taxable income rounded down to 1,000 yen
 *  2. each income levy = ⌊taxable × rate⌋ − its share of the adjustment
 *     credit (調整控除), clamped at 0, rounded down to 100 yen
 *  3. per-capita levy added unrounded
 */

import type {
  DependentTier,
  IncomeTaxTables,
  PrefectureRates,
  ResidenceTaxBasis,
  ResidenceTaxExemption,
  ResidenceTaxWorksheet,
  ResidentTaxTables,
} from '../model/types'
import { clampZero, floorTo, multiplyFloor } from './rounding'
import { computeSalaryIncome } from './salaryIncome'
import { dependentDeductionTotal, lookupTiered } from './incomeTax'

export interface ResidenceTaxFigures {
  basis: ResidenceTaxBasis
  grossAnnual: number
  socialInsurance: number
}

// ── Non-taxable thresholds ───────────────────────────────────────

export function nonTaxableThresholds(
  dependentCount: number,
  rules: ResidentTaxTables['nonTaxable'],
): { perCapita: number; incomeLevy: number } {
  const base = rules.perPerson * (1 + dependentCount) + rules.base
  return {
    perCapita: base + (dependentCount > 0 ? rules.dependentAddition : 0),
    incomeLevy: base + (dependentCount > 0 ? rules.incomeLevyDependentAddition : 0),
  }
}

export function exemptionFor(
  totalIncome: number,
  dependentCount: number,
  rules: ResidentTaxTables['nonTaxable'],
): ResidenceTaxExemption {
  const thresholds = nonTaxableThresholds(dependentCount, rules)
  if (totalIncome <= thresholds.perCapita) return 'all'
  if (totalIncome <= thresholds.incomeLevy) return 'income-levy'
  return 'none'
}

// ── Adjustment credit ────────────────────────────────────────────

/**
 * 調整控除: offsets the gap between income tax and residence tax
 * personal deductions.
 */
export function computeAdjustmentCredit(
  taxableIncome: number,
  totalIncome: number,
  dependents: Record<DependentTier, number>,
  rules: ResidentTaxTables['adjustmentCredit'],
): { prefectural: number; municipal: number } {
  if (taxableIncome <= 0 || totalIncome > rules.totalIncomeLimit) {
    return { prefectural: 0, municipal: 0 }
  }

  const difference = rules.basicDifference + dependentDeductionTotal(dependents, rules.dependentDifferences)
  const base = taxableIncome <= rules.taxableIncomeThreshold
    ? Math.min(difference, taxableIncome)
    : Math.max(difference - (taxableIncome - rules.taxableIncomeThreshold), rules.minimumBase)

  return {
    prefectural: multiplyFloor(base, rules.prefecturalRate),
    municipal: multiplyFloor(base, rules.municipalRate),
  }
}

// ── Installments ─────────────────────────────────────────────────

/** Eleven equal installments rounded down to 100 yen; June carries the remainder. */
export function splitInstallments(annualTotal: number): { june: number; otherMonths: number } {
  const otherMonths = floorTo(Math.floor(annualTotal / 12), 100)
  return { june: annualTotal - otherMonths * 11, otherMonths }
}

// ── Worksheet ────────────────────────────────────────────────────

export function computeResidenceTax(
  figures: ResidenceTaxFigures,
  dependents: Record<DependentTier, number>,
  dependentCount: number,
  prefecture: PrefectureRates,
  rules: ResidentTaxTables,
  salaryDeduction: IncomeTaxTables['salaryIncomeDeduction'],
): ResidenceTaxWorksheet {
  const totalIncome = computeSalaryIncome(figures.grossAnnual, salaryDeduction).income
  const basicDeduction = lookupTiered(totalIncome, rules.basicDeduction)
  const dependentDeduction = dependentDeductionTotal(dependents, rules.dependentDeductions)
  const taxableIncome = floorTo(
    clampZero(totalIncome - figures.socialInsurance - basicDeduction - dependentDeduction),
    1000,
  )
  const exemption = exemptionFor(totalIncome, dependentCount, rules.nonTaxable)

  const prefecturalRate = prefecture.residentTax?.prefecturalIncomeRate ?? rules.prefecturalIncomeRate
  const prefecturalPerCapita = prefecture.residentTax?.prefecturalPerCapita ?? rules.perCapita.prefectural

  const adjustmentCredit = exemption === 'none'
    ? computeAdjustmentCredit(taxableIncome, totalIncome, dependents, rules.adjustmentCredit)
    : { prefectural: 0, municipal: 0 }

  const levy = (rate: number, credit: number): number =>
    exemption === 'none' ? floorTo(clampZero(multiplyFloor(taxableIncome, rate) - credit), 100) : 0

  const prefecturalIncomeLevy = levy(prefecturalRate, adjustmentCredit.prefectural)
  const municipalIncomeLevy = levy(rules.municipalIncomeRate, adjustmentCredit.municipal)
  const perCapitaLevy = exemption === 'all'
    ? 0
    : prefecturalPerCapita + rules.perCapita.municipal + rules.perCapita.forestEnvironment

  const annualTotal = prefecturalIncomeLevy + municipalIncomeLevy + perCapitaLevy

  return {
    basis: figures.basis,
    grossIncome: figures.grossAnnual,
    totalIncome,
    socialInsurance: figures.socialInsurance,
    basicDeduction,
    dependentDeduction,
    taxableIncome,
    exemption,
    adjustmentCredit,
    prefecturalIncomeLevy,
    municipalIncomeLevy,
    perCapitaLevy,
    annualTotal,
    installments: splitInstallments(annualTotal),
  }
}
