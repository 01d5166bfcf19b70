/**
 * TracedValue and ValueSource — the explainability backbone.
 *
 * Every amount in a deduction result carries its provenance: the input
 * field it came from, the rate table row it was looked up in, or the
 * computation node that derived it.
 */

// ── Value sources ──────────────────────────────────────────────

/** A value taken from the caller's salary input */
export interface InputSource {
  kind: 'input'
  field: string          // e.g., "grossAmount", "priorYear.socialInsurance"
}

/** A value looked up in the year's rate tables */
export interface RateTableSource {
  kind: 'rate-table'
  taxYear: number
  table: string          // e.g., "incomeTax.basicDeduction"
}

/** A value produced by a deterministic computation node */
export interface ComputedSource {
  kind: 'computed'
  nodeId: string         // e.g., "incomeTax.taxableIncome"
  inputs: string[]       // node IDs this was derived from
}

export type ValueSource = InputSource | RateTableSource | ComputedSource

// ── TracedValue ────────────────────────────────────────────────

/**
 * An amount in integer yen with provenance.
 */
export interface TracedValue {
  amount: number
  source: ValueSource
  citation?: string      // e.g., "所得税法第28条"
}

// ── Helpers ────────────────────────────────────────────────────

export function tracedFromInput(amount: number, field: string): TracedValue {
  return {
    amount,
    source: { kind: 'input', field },
  }
}

export function tracedFromRateTable(
  amount: number,
  taxYear: number,
  table: string,
  citation?: string,
): TracedValue {
  return {
    amount,
    source: { kind: 'rate-table', taxYear, table },
    citation,
  }
}

/**
 * Create a TracedValue from a computation.
 */
export function tracedFromComputation(
  amount: number,
  nodeId: string,
  inputs: string[],
  citation?: string,
): TracedValue {
  return {
    amount,
    source: {
      kind: 'computed',
      nodeId,
      inputs,
    },
    citation,
  }
}

/**
 * Create a zero-value TracedValue (for nodes a result does not carry).
 */
export function tracedZero(nodeId: string): TracedValue {
  return tracedFromComputation(0, nodeId, [])
}
