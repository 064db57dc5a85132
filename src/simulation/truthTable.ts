import type { Circuit, InputSwitch, LedOutput } from '../types'
import { isInputSwitch, isLedOutput } from '../types'
import { MAX_TRUTH_TABLE_INPUTS, SETTLE_ITERATION_LIMIT, TRUTH_TABLE_SETTLE_STEPS } from '../config'
import { setSwitchState } from '../circuit/components'
import { executeLedOutput } from './evaluator'
import { SimulationContext, clearCircuitState } from './context'
import type { SimulationOptions } from './types'

// === Types ===

export interface TruthTableRow {
  inputs: boolean[]
  outputs: boolean[]
}

export interface TruthTable {
  inputColumns: string[]
  outputColumns: string[]
  rows: TruthTableRow[]
  // Row indices whose outputs were still changing when settling gave up
  unsettledRows: number[]
}

export type SettleMode = 'fixed-steps' | 'fixed-point'

export interface TruthTableOptions extends SimulationOptions {
  settle?: SettleMode
  steps?: number
  maxIterations?: number
}

// === Generation ===

/**
 * Enumerate every combination of the circuit's input switches and record
 * the LED values each one produces. Row i sets switch j to bit (n-1-j) of i,
 * so the first switch is the most significant column.
 *
 * The circuit is driven in place; callers that need the current signal
 * values should pass a clone.
 */
export function generateTruthTable(circuit: Circuit, options: TruthTableOptions = {}): TruthTable {
  const switches: InputSwitch[] = circuit.components.filter(isInputSwitch)
  const leds: LedOutput[] = circuit.components.filter(isLedOutput)
  const n = switches.length
  if (n > MAX_TRUTH_TABLE_INPUTS) {
    throw new RangeError(`Truth table needs ${2 ** n} rows; at most ${MAX_TRUTH_TABLE_INPUTS} inputs are supported`)
  }

  const mode = options.settle ?? 'fixed-steps'
  const steps = options.steps ?? TRUTH_TABLE_SETTLE_STEPS
  const maxIterations = options.maxIterations ?? SETTLE_ITERATION_LIMIT
  const context = new SimulationContext(circuit, {
    loader: options.loader,
    ancestry: options.ancestry ?? [circuit.name],
  })

  const rows: TruthTableRow[] = []
  const unsettledRows: number[] = []
  const rowCount = 2 ** n

  for (let i = 0; i < rowCount; i++) {
    clearCircuitState(circuit)
    switches.forEach((input, j) => setSwitchState(input, ((i >> (n - 1 - j)) & 1) === 1))

    if (mode === 'fixed-point') {
      const result = context.settle(maxIterations)
      if (!result.converged) unsettledRows.push(i)
    } else {
      for (let s = 0; s < steps; s++) context.step()
    }

    const outputs = leds.map((led) => {
      executeLedOutput(led)
      return led.lit
    })
    rows.push({ inputs: switches.map((input) => input.state), outputs })
  }

  return {
    inputColumns: switches.map((input) => input.name),
    outputColumns: leds.map((led) => led.name),
    rows,
    unsettledRows,
  }
}

// === Expression derivation ===

function minterm(columns: string[], inputs: boolean[]): string {
  return columns.map((name, j) => (inputs[j] ? name : `${name}'`)).join('·')
}

/**
 * Sum-of-products expression for one output column: "0" when the output is
 * never true, "1" when it always is, otherwise one minterm per true row.
 * No minimization is attempted.
 */
export function deriveBooleanExpression(table: TruthTable, outputIndex: number): string {
  if (!Number.isInteger(outputIndex) || outputIndex < 0 || outputIndex >= table.outputColumns.length) {
    throw new RangeError(`Output index ${outputIndex} is out of range (0..${table.outputColumns.length - 1})`)
  }

  const trueRows = table.rows.filter((row) => row.outputs[outputIndex] === true)
  if (trueRows.length === 0) return '0'
  if (trueRows.length === table.rows.length) return '1'

  return trueRows.map((row) => minterm(table.inputColumns, row.inputs)).join(' + ')
}

// === Text rendering ===

function bit(value: boolean): string {
  return value ? '1' : '0'
}

export function formatTruthTable(table: TruthTable): string[] {
  const headers = [...table.inputColumns, ...table.outputColumns]
  const widths = headers.map((h) => Math.max(h.length, 1))
  const pad = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i] ?? 1)).join(' | ')

  const lines = [pad(headers), widths.map((w) => '-'.repeat(w)).join('-+-')]
  for (const row of table.rows) {
    lines.push(pad([...row.inputs.map(bit), ...row.outputs.map(bit)]))
  }
  return lines
}
