/**
 * 2025 Year Rules Module
 *
 * Bundles the 2025 constants and data files into a validated RateTables
 * for the year registry.
 */

import type { RateTables } from '../../model/types'
import { parseRateTables } from '../../model/schemas'
import bands from './standardRemuneration.json'
import prefectures from './healthInsuranceRates.json'
import {
  BASIC_DEDUCTION,
  DEPENDENT_DEDUCTIONS,
  EMPLOYEE_SHARE,
  EMPLOYMENT_INSURANCE_RATES,
  ENROLLMENT_THRESHOLD,
  INCOME_TAX_BRACKETS,
  LONG_TERM_CARE_RATE,
  PENSION_RATE,
  PENSION_STANDARD,
  RECONSTRUCTION_SURCHARGE_RATE,
  RESIDENT_TAX,
  SALARY_INCOME_DEDUCTION,
  TAX_YEAR,
} from './constants'

export const rateTables2025: RateTables = parseRateTables({
  taxYear: TAX_YEAR,
  socialInsurance: {
    bands,
    pension: PENSION_STANDARD,
    enrollmentThreshold: ENROLLMENT_THRESHOLD,
    employeeShare: EMPLOYEE_SHARE,
    pensionRate: PENSION_RATE,
    longTermCareRate: LONG_TERM_CARE_RATE,
    employmentRates: EMPLOYMENT_INSURANCE_RATES,
  },
  prefectures,
  incomeTax: {
    brackets: INCOME_TAX_BRACKETS,
    surchargeRate: RECONSTRUCTION_SURCHARGE_RATE,
    basicDeduction: BASIC_DEDUCTION,
    dependentDeductions: DEPENDENT_DEDUCTIONS,
    salaryIncomeDeduction: SALARY_INCOME_DEDUCTION,
  },
  residentTax: RESIDENT_TAX,
})
