/**
 * Yen rounding helpers.
 *
 * Rates are converted to integer millionths and multiplied as BigInt so
 * that a product like 410,000 × 9.91% ÷ 2 lands on exactly 20,315.5 and
 * the payroll rounding rule sees the true fraction.
 */

export const RATE_DECIMALS = 6

const RATE_SCALE = 1_000_000n

function toUnits(rate: number): bigint {
  return BigInt(Math.round(rate * 1_000_000))
}

/** True when the rate converts to whole millionths without loss. */
export function hasRateResolution(rate: number): boolean {
  const units = rate * 1_000_000
  return Math.abs(units - Math.round(units)) < 1e-6
}

/** ⌊amount × rate⌋ for non-negative integer amounts. */
export function multiplyFloor(amount: number, rate: number): number {
  if (amount <= 0) return 0
  return Number((BigInt(amount) * toUnits(rate)) / RATE_SCALE)
}

/**
 * Employee share of a premium: amount × rate × share, with the payroll
 * rule for deductions from wages — a fraction of 50 sen or less is
 * dropped, more than 50 sen rounds up to the next yen.
 */
export function premiumShare(amount: number, rate: number, share = 1): number {
  if (amount <= 0) return 0
  const numerator = BigInt(amount) * toUnits(rate) * toUnits(share)
  const denominator = RATE_SCALE * RATE_SCALE
  const whole = numerator / denominator
  const remainder = numerator % denominator
  return Number(remainder * 2n > denominator ? whole + 1n : whole)
}

/** Round down to a multiple of `unit` (1,000 for taxable income, 100 for levies). */
export function floorTo(amount: number, unit: number): number {
  return Math.floor(amount / unit) * unit
}

export function clampZero(amount: number): number {
  return Math.max(0, amount)
}
