/**
 * Year-end adjustment (年末調整) estimate
 *
 * Reconciles the income tax withheld through the year against the annual
 * liability: 年調年税額 = calculated tax × 102.1%, rounded down to 100 yen.
 */

import type { DependentTier, IncomeTaxTables, YearEndAdjustmentResult } from '../model/types'
import { clampZero, floorTo, multiplyFloor } from './rounding'
import { computeIncomeTaxWorksheet } from './incomeTax'

export function computeYearEndAdjustment(
  taxYear: number,
  annualGross: number,
  socialInsurance: number,
  dependents: Record<DependentTier, number>,
  withheldIncomeTax: number,
  tables: IncomeTaxTables,
): YearEndAdjustmentResult {
  const worksheet = computeIncomeTaxWorksheet(annualGross, socialInsurance, dependents, tables)
  const annualTaxLiability = floorTo(multiplyFloor(worksheet.incomeTax, 1 + tables.surchargeRate), 100)

  return {
    taxYear,
    annualGross,
    socialInsurance,
    taxableIncome: worksheet.taxableIncome,
    calculatedTax: worksheet.incomeTax,
    reconstructionSurcharge: worksheet.reconstructionSurcharge,
    annualTaxLiability,
    withheldIncomeTax,
    refund: clampZero(withheldIncomeTax - annualTaxLiability),
    additionalPayment: clampZero(annualTaxLiability - withheldIncomeTax),
  }
}
