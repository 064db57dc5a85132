import type { Component, GateKind, InputSwitch, LedOutput, SubCircuitComponent } from '../types'

// Runs a sub-circuit for one outer execution and returns its output values
export type SubCircuitExecutor = (component: SubCircuitComponent, inputs: boolean[]) => boolean[]

// Gate evaluation functions for the combinational primitives
const GATE_FUNCTIONS: Record<GateKind, (inputs: boolean[]) => boolean> = {
  AND: (inputs) => (inputs[0] ?? false) && (inputs[1] ?? false),
  OR: (inputs) => (inputs[0] ?? false) || (inputs[1] ?? false),
  NOT: (inputs) => !(inputs[0] ?? false),
}

export function evaluateGate(kind: GateKind, inputs: boolean[]): boolean {
  return GATE_FUNCTIONS[kind](inputs)
}

function writeOutputs(component: Component, values: boolean[]): void {
  component.outputs.forEach((port, i) => {
    port.value = values[i] ?? false
  })
}

export function executeInputSwitch(input: InputSwitch): void {
  writeOutputs(input, [input.state])
}

export function executeLedOutput(led: LedOutput): void {
  led.lit = led.inputs[0]?.value ?? false
}

/**
 * Recompute a component's outputs from its current input port values.
 * Repeating the call with unchanged inputs leaves every port as it was.
 */
export function executeComponent(component: Component, executeSubCircuit: SubCircuitExecutor): void {
  switch (component.kind) {
    case 'AND':
    case 'OR':
    case 'NOT': {
      const inputs = component.inputs.map((port) => port.value)
      writeOutputs(component, [evaluateGate(component.kind, inputs)])
      return
    }
    case 'INPUT_SWITCH':
      executeInputSwitch(component)
      return
    case 'LED_OUTPUT':
      executeLedOutput(component)
      return
    case 'SUB_CIRCUIT': {
      const inputs = component.inputs.map((port) => port.value)
      writeOutputs(component, executeSubCircuit(component, inputs))
      return
    }
    default: {
      const unknown: never = component
      throw new Error(`Unknown component kind: ${JSON.stringify(unknown)}`)
    }
  }
}
