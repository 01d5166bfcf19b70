import { describe, it, expect } from 'vitest'
import { computeSalaryIncome } from '../../src/rules/salaryIncome'
import { getRateTables } from '../../src/rules/yearModules'

const rules2025 = getRateTables(2025).incomeTax.salaryIncomeDeduction
const rules2024 = getRateTables(2024).incomeTax.salaryIncomeDeduction

describe('computeSalaryIncome (2025)', () => {
  it('applies the 650,000 minimum deduction', () => {
    expect(computeSalaryIncome(1_000_000, rules2025)).toEqual({ deduction: 650_000, income: 350_000 })
  })

  it('never produces negative income', () => {
    expect(computeSalaryIncome(500_000, rules2025)).toEqual({ deduction: 500_000, income: 0 })
  })

  it('starts the 30% bracket at 1,900,000', () => {
    expect(computeSalaryIncome(1_900_000, rules2025).income).toBe(1_250_000)
  })

  it('rounds down to 4,000 yen inside the table range', () => {
    // 3,601,999 → 3,600,000 → 3,600,000 × 20% + 440,000
    expect(computeSalaryIncome(3_601_999, rules2025)).toEqual({ deduction: 1_161_999, income: 2_440_000 })
  })

  it('computes 5,000,000 → 3,560,000', () => {
    expect(computeSalaryIncome(5_000_000, rules2025)).toEqual({ deduction: 1_440_000, income: 3_560_000 })
  })

  it('caps the deduction at 1,950,000', () => {
    expect(computeSalaryIncome(10_000_000, rules2025)).toEqual({ deduction: 1_950_000, income: 8_050_000 })
  })

  it('returns zero for zero gross', () => {
    expect(computeSalaryIncome(0, rules2025)).toEqual({ deduction: 0, income: 0 })
  })
})

describe('computeSalaryIncome (2024)', () => {
  it('applies the 550,000 minimum deduction', () => {
    expect(computeSalaryIncome(1_000_000, rules2024).income).toBe(450_000)
  })

  it('uses the 40% − 100,000 bracket', () => {
    expect(computeSalaryIncome(1_700_000, rules2024)).toEqual({ deduction: 580_000, income: 1_120_000 })
  })

  it('matches 2025 above 1,900,000', () => {
    expect(computeSalaryIncome(3_600_000, rules2024).income).toBe(2_440_000)
  })
})
