import { describe, it, expect } from 'vitest'
import {
  AGE_BAND_COVERAGE,
  computeMonthlyPremiums,
  findBand,
  lookupStandardRemuneration,
  monthlyPremiumTotal,
} from '../../src/rules/socialInsurance'
import { getRateTables } from '../../src/rules/yearModules'
import { prefectureRatesFor } from '../../src/rules/engine'

const tables2025 = getRateTables(2025)
const si = tables2025.socialInsurance
const tokyo = prefectureRatesFor(tables2025, 'tokyo')

// ── Band lookup ─────────────────────────────────────────────────

describe('findBand', () => {
  it('is lower-bound inclusive', () => {
    expect(findBand(290_000, si.bands).standard).toBe(300_000)
    expect(findBand(289_999, si.bands).standard).toBe(280_000)
  })

  it('places 300,000 in grade 22', () => {
    const band = findBand(300_000, si.bands)
    expect(band.grade).toBe(22)
    expect(band.standard).toBe(300_000)
  })

  it('uses the open-ended top band above the last bound', () => {
    const band = findBand(5_000_000, si.bands)
    expect(band.grade).toBe(50)
    expect(band.standard).toBe(1_390_000)
  })

  it('uses the first band for zero', () => {
    expect(findBand(0, si.bands).grade).toBe(1)
  })
})

describe('lookupStandardRemuneration', () => {
  it('caps the pension standard at 650,000', () => {
    const sr = lookupStandardRemuneration(1_000_000, si)
    expect(sr.health).toBe(980_000)
    expect(sr.pension).toBe(650_000)
  })

  it('raises the pension standard to the 88,000 floor', () => {
    const sr = lookupStandardRemuneration(60_000, si)
    expect(sr.health).toBe(58_000)
    expect(sr.pension).toBe(88_000)
  })

  it('is not enrolled below the threshold or at zero', () => {
    expect(lookupStandardRemuneration(57_999, si).enrolled).toBe(false)
    expect(lookupStandardRemuneration(0, si).enrolled).toBe(false)
    expect(lookupStandardRemuneration(58_000, si).enrolled).toBe(true)
  })
})

// ── Premiums ────────────────────────────────────────────────────

describe('computeMonthlyPremiums', () => {
  it('computes the under-40 Tokyo premiums on 300,000', () => {
    const { premiums } = computeMonthlyPremiums(300_000, tokyo, 'under-40', 'general', si)
    expect(premiums).toEqual({ health: 14_865, longTermCare: 0, pension: 27_450, employment: 1_650 })
    expect(monthlyPremiumTotal(premiums)).toBe(43_965)
  })

  it('adds long-term care for 40-64 and rounds once on the combined rate', () => {
    // 300,000 × (9.91% + 1.59%) ÷ 2 = 17,250
    const { premiums } = computeMonthlyPremiums(300_000, tokyo, '40-64', 'general', si)
    expect(premiums.health).toBe(17_250)
    expect(premiums.longTermCare).toBe(2_385)
  })

  it('uses the standard amount for health and the actual wage for employment', () => {
    // 416,666 → grade 27 (410,000)
    const { standardRemuneration, premiums } = computeMonthlyPremiums(416_666, tokyo, 'under-40', 'general', si)
    expect(standardRemuneration.grade).toBe(27)
    expect(premiums.health).toBe(20_315)
    expect(premiums.pension).toBe(37_515)
    expect(premiums.employment).toBe(2_292)
  })

  it('applies the construction employment rate', () => {
    const { premiums } = computeMonthlyPremiums(300_000, tokyo, 'under-40', 'construction', si)
    expect(premiums.employment).toBe(1_950)
  })

  it('uses the prefecture rate', () => {
    const saga = prefectureRatesFor(tables2025, 'saga')
    // 300,000 × 10.78% ÷ 2 = 16,170
    const { premiums } = computeMonthlyPremiums(300_000, saga, 'under-40', 'general', si)
    expect(premiums.health).toBe(16_170)
  })

  it('drops pension from 70 and health from 75', () => {
    const at70 = computeMonthlyPremiums(300_000, tokyo, '70-74', 'general', si).premiums
    expect(at70.pension).toBe(0)
    expect(at70.health).toBe(14_865)

    const at75 = computeMonthlyPremiums(300_000, tokyo, '75-plus', 'general', si).premiums
    expect(at75).toEqual({ health: 0, longTermCare: 0, pension: 0, employment: 1_650 })
  })

  it('levies only employment insurance below the enrollment threshold', () => {
    const { premiums } = computeMonthlyPremiums(50_000, tokyo, 'under-40', 'general', si)
    // 50,000 × 0.55% = 275
    expect(premiums).toEqual({ health: 0, longTermCare: 0, pension: 0, employment: 275 })
  })

  it('is all zero for a zero wage', () => {
    const { premiums } = computeMonthlyPremiums(0, tokyo, '40-64', 'general', si)
    expect(monthlyPremiumTotal(premiums)).toBe(0)
  })
})

describe('AGE_BAND_COVERAGE', () => {
  it('only 40-64 pays long-term care', () => {
    const bands = Object.entries(AGE_BAND_COVERAGE).filter(([, c]) => c.longTermCare).map(([band]) => band)
    expect(bands).toEqual(['40-64'])
  })
})
