import type {
  AndGate,
  Component,
  ComponentId,
  InputSwitch,
  LedOutput,
  NotGate,
  OrGate,
  Point,
  Port,
  PortDirection,
  PrimitiveKind,
  SubCircuitComponent,
  SubCircuitReference,
} from '../types'
import { executeInputSwitch } from '../simulation/evaluator'
import { layoutPorts } from '../utils/pinLayout'

export interface ComponentOptions {
  name?: string
  position?: Point
}

// Static port ids per primitive kind
export const PORT_DEFINITIONS: Record<PrimitiveKind, { inputs: string[]; outputs: string[] }> = {
  AND: { inputs: ['in1', 'in2'], outputs: ['out'] },
  OR: { inputs: ['in1', 'in2'], outputs: ['out'] },
  NOT: { inputs: ['in'], outputs: ['out'] },
  INPUT_SWITCH: { inputs: [], outputs: ['out'] },
  LED_OUTPUT: { inputs: ['in'], outputs: [] },
}

const DEFAULT_NAMES: Record<PrimitiveKind, string> = {
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',
  INPUT_SWITCH: 'Input',
  LED_OUTPUT: 'LED',
}

export function createPort(id: string, direction: PortDirection): Port {
  return { id, direction, position: { x: 0, y: 0 }, value: false }
}

function createPorts(kind: PrimitiveKind): { inputs: Port[]; outputs: Port[] } {
  const def = PORT_DEFINITIONS[kind]
  return {
    inputs: def.inputs.map((id) => createPort(id, 'input')),
    outputs: def.outputs.map((id) => createPort(id, 'output')),
  }
}

function base(id: ComponentId, kind: PrimitiveKind, options: ComponentOptions) {
  const position = options.position ? { ...options.position } : { x: 0, y: 0 }
  const ports = createPorts(kind)
  layoutPorts({ position, ...ports })
  return { id, name: options.name ?? DEFAULT_NAMES[kind], position, ...ports }
}

export function createAndGate(id: ComponentId, options: ComponentOptions = {}): AndGate {
  return { kind: 'AND', ...base(id, 'AND', options) }
}

export function createOrGate(id: ComponentId, options: ComponentOptions = {}): OrGate {
  return { kind: 'OR', ...base(id, 'OR', options) }
}

export function createNotGate(id: ComponentId, options: ComponentOptions = {}): NotGate {
  return { kind: 'NOT', ...base(id, 'NOT', options) }
}

export function createInputSwitch(id: ComponentId, options: ComponentOptions = {}): InputSwitch {
  return { kind: 'INPUT_SWITCH', state: false, ...base(id, 'INPUT_SWITCH', options) }
}

export function createLedOutput(id: ComponentId, options: ComponentOptions = {}): LedOutput {
  return { kind: 'LED_OUTPUT', lit: false, ...base(id, 'LED_OUTPUT', options) }
}

export function createComponent(kind: PrimitiveKind, id: ComponentId, options: ComponentOptions = {}): Component {
  switch (kind) {
    case 'AND':
      return createAndGate(id, options)
    case 'OR':
      return createOrGate(id, options)
    case 'NOT':
      return createNotGate(id, options)
    case 'INPUT_SWITCH':
      return createInputSwitch(id, options)
    case 'LED_OUTPUT':
      return createLedOutput(id, options)
  }
}

/**
 * A sub-circuit starts unloaded with no ports; they are synthesized the first
 * time the referenced circuit is loaded.
 */
export function createSubCircuitComponent(
  id: ComponentId,
  reference: SubCircuitReference,
  options: ComponentOptions = {}
): SubCircuitComponent {
  const circuitName = reference.circuitName.trim()
  if (!circuitName) {
    throw new Error('Sub-circuit reference needs a circuit name')
  }
  return {
    kind: 'SUB_CIRCUIT',
    id,
    name: options.name ?? circuitName,
    position: options.position ? { ...options.position } : { x: 0, y: 0 },
    inputs: [],
    outputs: [],
    reference: reference.filePath ? { circuitName, filePath: reference.filePath } : { circuitName },
    body: { status: 'unloaded' },
  }
}

export function moveComponent(component: Component, position: Point): void {
  component.position = { ...position }
  layoutPorts(component)
}

// === Input switch actions ===
export function setSwitchState(input: InputSwitch, state: boolean): void {
  input.state = state
  executeInputSwitch(input)
}

export function toggleSwitch(input: InputSwitch): void {
  setSwitchState(input, !input.state)
}
