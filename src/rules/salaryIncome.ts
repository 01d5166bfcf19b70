/**
 * Salary income (給与所得) — gross salary less the salary income deduction.
 *
 * Inside the statutory table range (所得税法別表第五) the salary is first
 * rounded down to a multiple of 4,000 yen and the formula applied to that
 * amount, so the reported deduction absorbs the rounding remainder.
 */

import type { IncomeTaxTables, SalaryDeductionBracket } from '../model/types'
import { clampZero, floorTo, multiplyFloor } from './rounding'

export interface SalaryIncome {
  deduction: number
  income: number
}

function bracketFor(amount: number, brackets: SalaryDeductionBracket[]): SalaryDeductionBracket {
  let found = brackets[0]
  for (const bracket of brackets) {
    if (amount >= bracket.lower) found = bracket
  }
  return found
}

export function computeSalaryIncome(
  grossAnnual: number,
  rules: IncomeTaxTables['salaryIncomeDeduction'],
): SalaryIncome {
  if (grossAnnual <= 0) return { deduction: 0, income: 0 }

  const { from, to, unit } = rules.tableRounding
  const basis = grossAnnual >= from && grossAnnual < to ? floorTo(grossAnnual, unit) : grossAnnual

  const bracket = bracketFor(basis, rules.brackets)
  const formulaDeduction = multiplyFloor(basis, bracket.rate) + bracket.add
  const income = clampZero(basis - formulaDeduction)

  return { deduction: grossAnnual - income, income }
}
