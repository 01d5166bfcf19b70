/**
 * 2024 Year Rules Module
 *
 * Delta-override pattern: starts from the 2025 tables and replaces only
 * what changed between the two years. The standard remuneration grades,
 * pension rate, tax brackets and residence tax rules are shared.
 */

import type { RateTables } from '../../model/types'
import { parseRateTables } from '../../model/schemas'
import { rateTables2025 } from '../2025/yearModule'
import prefectures from './healthInsuranceRates.json'
import {
  BASIC_DEDUCTION,
  EMPLOYMENT_INSURANCE_RATES,
  LONG_TERM_CARE_RATE,
  SALARY_INCOME_DEDUCTION,
  TAX_YEAR,
} from './constants'

export const rateTables2024: RateTables = parseRateTables({
  ...rateTables2025,
  taxYear: TAX_YEAR,
  socialInsurance: {
    ...rateTables2025.socialInsurance,
    longTermCareRate: LONG_TERM_CARE_RATE,
    employmentRates: EMPLOYMENT_INSURANCE_RATES,
  },
  prefectures,
  incomeTax: {
    ...rateTables2025.incomeTax,
    basicDeduction: BASIC_DEDUCTION,
    salaryIncomeDeduction: SALARY_INCOME_DEDUCTION,
  },
})
