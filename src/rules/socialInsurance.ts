/**
 * Social insurance — standard remuneration and employee-share premiums
 *
 * Health and pension premiums are levied on the standard monthly
 * remuneration (標準報酬月額), a step function of the monthly wage.
 * Employment insurance is levied on the actual wage.
 *
 * Rounding: each premium is rounded once with the 50-sen rule. When the
 * insured is liable for long-term care insurance, the health and care
 * rates are added first and the combined premium is rounded once; the
 * care portion is the difference from the health-only premium.
 */

import type {
  AgeBand,
  EmploymentCategory,
  MonthlyPremiums,
  PrefectureRates,
  RemunerationBand,
  SocialInsuranceTables,
  StandardRemuneration,
} from '../model/types'
import { premiumShare } from './rounding'

// ── Coverage by age band ─────────────────────────────────────────

export interface Coverage {
  health: boolean
  longTermCare: boolean
  pension: boolean
  employment: boolean
}

/**
 * 40–64: long-term care (介護保険第2号被保険者).
 * 70+: no welfare pension. 75+: late-stage elderly medical system,
 * collected outside payroll.
 */
export const AGE_BAND_COVERAGE: Record<AgeBand, Coverage> = {
  'under-40': { health: true, longTermCare: false, pension: true, employment: true },
  '40-64': { health: true, longTermCare: true, pension: true, employment: true },
  '65-69': { health: true, longTermCare: false, pension: true, employment: true },
  '70-74': { health: true, longTermCare: false, pension: false, employment: true },
  '75-plus': { health: false, longTermCare: false, pension: false, employment: true },
}

// ── Standard remuneration ────────────────────────────────────────

/** Band containing the wage; lower bound inclusive, upper exclusive. */
export function findBand(monthlyWage: number, bands: RemunerationBand[]): RemunerationBand {
  const band = bands.find(b => monthlyWage >= b.lower && (b.upper === null || monthlyWage < b.upper))
  return band ?? bands[bands.length - 1]
}

export function lookupStandardRemuneration(
  monthlyWage: number,
  tables: SocialInsuranceTables,
): StandardRemuneration {
  const band = findBand(monthlyWage, tables.bands)
  const { minimumStandard, maximumStandard } = tables.pension
  return {
    enrolled: monthlyWage > 0 && monthlyWage >= tables.enrollmentThreshold,
    grade: band.grade,
    monthlyWage,
    health: band.standard,
    // Pension ceiling and floor apply to the standard amount, before the rate
    pension: Math.min(maximumStandard, Math.max(minimumStandard, band.standard)),
  }
}

// ── Premiums ─────────────────────────────────────────────────────

export interface MonthlyPremiumResult {
  standardRemuneration: StandardRemuneration
  premiums: MonthlyPremiums
}

export function computeMonthlyPremiums(
  monthlyWage: number,
  prefecture: PrefectureRates,
  ageBand: AgeBand,
  category: EmploymentCategory,
  tables: SocialInsuranceTables,
): MonthlyPremiumResult {
  const standardRemuneration = lookupStandardRemuneration(monthlyWage, tables)
  const coverage = AGE_BAND_COVERAGE[ageBand]
  const share = tables.employeeShare
  const insured = standardRemuneration.enrolled

  const healthOnly = insured && coverage.health
    ? premiumShare(standardRemuneration.health, prefecture.healthInsuranceRate, share)
    : 0

  const health = insured && coverage.health && coverage.longTermCare
    ? premiumShare(
      standardRemuneration.health,
      prefecture.healthInsuranceRate + tables.longTermCareRate,
      share,
    )
    : healthOnly

  const pension = insured && coverage.pension
    ? premiumShare(standardRemuneration.pension, tables.pensionRate, share)
    : 0

  // Employment insurance rates are already the employee's share
  const employment = coverage.employment
    ? premiumShare(monthlyWage, tables.employmentRates[category])
    : 0

  return {
    standardRemuneration,
    premiums: {
      health,
      longTermCare: health - healthOnly,
      pension,
      employment,
    },
  }
}

export function monthlyPremiumTotal(premiums: MonthlyPremiums): number {
  return premiums.health + premiums.pension + premiums.employment
}
