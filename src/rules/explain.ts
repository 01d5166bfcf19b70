/**
 * Explainability Trace
 *
 * Flattens a DeductionResult into a Map<string, TracedValue>, then
 * provides trace tree building and human-readable explanation.
 *
 * Node IDs:
 *   input.*              caller-supplied amounts
 *   wage.*               period normalisation
 *   standardRemuneration.*, premium.*   monthly social insurance
 *   incomeTax.*          annual national income tax worksheet
 *   residenceTax.*       annual residence tax worksheet
 *   result.*             the amounts for the pay period
 */

import type { DeductionResult } from '../model/types'
import type { TracedValue } from '../model/traced'
import { tracedFromComputation, tracedFromInput, tracedFromRateTable, tracedZero } from '../model/traced'

// ── Types ────────────────────────────────────────────────────────

export interface ComputeTrace {
  nodeId: string
  label: string
  output: TracedValue
  inputs: ComputeTrace[]
  citation?: string
}

// ── Node labels ──────────────────────────────────────────────────

export const NODE_LABELS: Record<string, string> = {
  // Input
  'input.grossAmount': 'Gross amount',
  'input.priorYear.grossAnnual': 'Prior-year gross salary',
  'input.priorYear.socialInsurance': 'Prior-year social insurance',

  // Period normalisation
  'wage.monthly': 'Monthly wage',
  'wage.annualGross': 'Annual gross salary',

  // Social insurance
  'standardRemuneration.health': 'Standard monthly remuneration (標準報酬月額)',
  'standardRemuneration.pension': 'Pension standard remuneration',
  'premium.health': 'Health insurance premium, monthly',
  'premium.longTermCare': 'Long-term care portion, monthly',
  'premium.pension': 'Welfare pension premium, monthly',
  'premium.employment': 'Employment insurance premium, monthly',

  // Income tax
  'incomeTax.salaryIncomeDeduction': 'Salary income deduction (給与所得控除)',
  'incomeTax.salaryIncome': 'Salary income (給与所得)',
  'incomeTax.socialInsurance': 'Social insurance deduction (社会保険料控除)',
  'incomeTax.basicDeduction': 'Basic deduction (基礎控除)',
  'incomeTax.dependentDeduction': 'Dependent deduction (扶養控除)',
  'incomeTax.taxableIncome': 'Taxable income (課税所得)',
  'incomeTax.annualTax': 'Annual income tax',

  // Residence tax
  'residenceTax.totalIncome': 'Residence tax total income',
  'residenceTax.socialInsurance': 'Residence tax social insurance deduction',
  'residenceTax.basicDeduction': 'Residence tax basic deduction',
  'residenceTax.dependentDeduction': 'Residence tax dependent deduction',
  'residenceTax.taxableIncome': 'Residence tax taxable income',
  'residenceTax.adjustmentCredit': 'Adjustment credit (調整控除)',
  'residenceTax.prefecturalIncomeLevy': 'Prefectural income levy',
  'residenceTax.municipalIncomeLevy': 'Municipal income levy',
  'residenceTax.perCapitaLevy': 'Per-capita levy (均等割)',
  'residenceTax.annualTotal': 'Annual residence tax',

  // Result
  'result.healthInsurance': 'Health insurance',
  'result.pensionInsurance': 'Welfare pension',
  'result.employmentInsurance': 'Employment insurance',
  'result.nationalIncomeTax': 'National income tax (源泉所得税)',
  'result.reconstructionSurcharge': 'Reconstruction surcharge (復興特別所得税)',
  'result.residenceTax': 'Residence tax (住民税)',
  'result.totalDeductions': 'Total deductions',
  'result.netPay': 'Net pay',
}

// ── collectTracedValues ──────────────────────────────────────────

export function collectTracedValues(result: DeductionResult): Map<string, TracedValue> {
  const values = new Map<string, TracedValue>()
  const { standardRemuneration: sr, monthlyPremiums: premiums, incomeTax: it, residenceTax: rt } = result.detail
  const year = result.taxYear

  function computed(nodeId: string, amount: number, inputs: string[], citation?: string): void {
    values.set(nodeId, tracedFromComputation(amount, nodeId, inputs, citation))
  }

  values.set('input.grossAmount', tracedFromInput(result.grossAmount, 'grossAmount'))

  computed('wage.monthly', sr.monthlyWage, ['input.grossAmount'])
  computed('wage.annualGross', it.grossIncome, ['input.grossAmount'])

  // Social insurance
  computed('standardRemuneration.health', sr.health, ['wage.monthly'], `Grade ${sr.grade}`)
  computed('standardRemuneration.pension', sr.pension, ['standardRemuneration.health'])
  computed('premium.health', premiums.health, ['standardRemuneration.health'], '健康保険法第160条')
  computed('premium.longTermCare', premiums.longTermCare, ['standardRemuneration.health'])
  computed('premium.pension', premiums.pension, ['standardRemuneration.pension'], '厚生年金保険法第81条')
  computed('premium.employment', premiums.employment, ['wage.monthly'])

  // Income tax
  computed('incomeTax.salaryIncomeDeduction', it.salaryIncomeDeduction, ['wage.annualGross'], '所得税法第28条')
  computed('incomeTax.salaryIncome', it.salaryIncome, ['wage.annualGross', 'incomeTax.salaryIncomeDeduction'])
  computed('incomeTax.socialInsurance', it.socialInsurance, ['premium.health', 'premium.pension', 'premium.employment'])
  values.set('incomeTax.basicDeduction', tracedFromRateTable(it.basicDeduction, year, 'incomeTax.basicDeduction'))
  values.set(
    'incomeTax.dependentDeduction',
    tracedFromRateTable(it.dependentDeduction, year, 'incomeTax.dependentDeductions'),
  )
  computed('incomeTax.taxableIncome', it.taxableIncome, [
    'incomeTax.salaryIncome',
    'incomeTax.socialInsurance',
    'incomeTax.basicDeduction',
    'incomeTax.dependentDeduction',
  ])
  computed('incomeTax.annualTax', it.incomeTax, ['incomeTax.taxableIncome'])

  // Residence tax
  if (rt.basis === 'prior-year') {
    values.set('input.priorYear.grossAnnual', tracedFromInput(rt.grossIncome, 'priorYear.grossAnnual'))
    values.set('input.priorYear.socialInsurance', tracedFromInput(rt.socialInsurance, 'priorYear.socialInsurance'))
    computed('residenceTax.totalIncome', rt.totalIncome, ['input.priorYear.grossAnnual'])
    computed('residenceTax.socialInsurance', rt.socialInsurance, ['input.priorYear.socialInsurance'])
  } else {
    computed('residenceTax.totalIncome', rt.totalIncome, ['incomeTax.salaryIncome'])
    computed('residenceTax.socialInsurance', rt.socialInsurance, ['incomeTax.socialInsurance'])
  }
  values.set(
    'residenceTax.basicDeduction',
    tracedFromRateTable(rt.basicDeduction, year, 'residentTax.basicDeduction'),
  )
  values.set(
    'residenceTax.dependentDeduction',
    tracedFromRateTable(rt.dependentDeduction, year, 'residentTax.dependentDeductions'),
  )
  computed('residenceTax.taxableIncome', rt.taxableIncome, [
    'residenceTax.totalIncome',
    'residenceTax.socialInsurance',
    'residenceTax.basicDeduction',
    'residenceTax.dependentDeduction',
  ])
  computed(
    'residenceTax.adjustmentCredit',
    rt.adjustmentCredit.prefectural + rt.adjustmentCredit.municipal,
    ['residenceTax.taxableIncome'],
  )
  computed('residenceTax.prefecturalIncomeLevy', rt.prefecturalIncomeLevy, [
    'residenceTax.taxableIncome',
    'residenceTax.adjustmentCredit',
  ])
  computed('residenceTax.municipalIncomeLevy', rt.municipalIncomeLevy, [
    'residenceTax.taxableIncome',
    'residenceTax.adjustmentCredit',
  ])
  values.set('residenceTax.perCapitaLevy', tracedFromRateTable(rt.perCapitaLevy, year, 'residentTax.perCapita'))
  computed('residenceTax.annualTotal', rt.annualTotal, [
    'residenceTax.prefecturalIncomeLevy',
    'residenceTax.municipalIncomeLevy',
    'residenceTax.perCapitaLevy',
  ])

  // Result lines for the pay period
  computed('result.healthInsurance', result.healthInsurance, ['premium.health'])
  computed('result.pensionInsurance', result.pensionInsurance, ['premium.pension'])
  computed('result.employmentInsurance', result.employmentInsurance, ['premium.employment'])
  computed('result.nationalIncomeTax', result.nationalIncomeTax, ['incomeTax.annualTax'])
  computed('result.reconstructionSurcharge', result.reconstructionSurcharge, ['result.nationalIncomeTax'])
  computed('result.residenceTax', result.residenceTax, ['residenceTax.annualTotal'])
  computed('result.totalDeductions', result.totalDeductions, [
    'result.healthInsurance',
    'result.pensionInsurance',
    'result.employmentInsurance',
    'result.nationalIncomeTax',
    'result.reconstructionSurcharge',
    'result.residenceTax',
  ])
  computed('result.netPay', result.netPay, ['input.grossAmount', 'result.totalDeductions'])

  return values
}

// ── buildTrace ───────────────────────────────────────────────────

export function buildTrace(values: Map<string, TracedValue>, nodeId: string): ComputeTrace {
  const tv = values.get(nodeId)

  if (!tv) {
    return {
      nodeId,
      label: NODE_LABELS[nodeId] ?? `Unknown (${nodeId})`,
      output: tracedZero(nodeId),
      inputs: [],
    }
  }

  const inputs = tv.source.kind === 'computed'
    ? tv.source.inputs.map(inputId => buildTrace(values, inputId))
    : []

  return {
    nodeId,
    label: NODE_LABELS[nodeId] ?? nodeId,
    output: tv,
    inputs,
    citation: tv.citation,
  }
}

// ── explainLine ──────────────────────────────────────────────────

export function explainLine(result: DeductionResult, nodeId: string): string {
  const trace = buildTrace(collectTracedValues(result), nodeId)
  return formatTrace(trace, 0)
}

function formatTrace(trace: ComputeTrace, depth: number): string {
  const prefix = depth === 0 ? '' : '  '.repeat(depth) + '|- '
  const amount = formatYen(trace.output.amount)
  const citation = trace.citation ? ` [${trace.citation}]` : ''
  const line = `${prefix}${trace.label}: ${amount}${citation}`

  if (trace.inputs.length === 0) return line

  const children = trace.inputs.map(child => formatTrace(child, depth + 1))
  return [line, ...children].join('\n')
}

export function formatYen(amount: number): string {
  const formatted = Math.abs(amount).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',')
  return amount < 0 ? `-¥${formatted}` : `¥${formatted}`
}
