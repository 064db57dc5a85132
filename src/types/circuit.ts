// === Point (presentation only) ===
export interface Point {
  x: number
  y: number
}

// === Core Identifiers ===
export type ComponentId = string & { readonly __brand: 'ComponentId' }
export type ConnectorId = string & { readonly __brand: 'ConnectorId' }
export type CircuitId = string & { readonly __brand: 'CircuitId' }

// === Ports ===
export type PortDirection = 'input' | 'output'

export interface Port {
  id: string  // Unique within its owning component
  direction: PortDirection
  position: Point
  value: boolean
}

// Non-owning handle to a port inside the circuit that owns the component
export interface PortRef {
  componentId: ComponentId
  portIndex: number
}

// === Component Kinds ===
export type GateKind = 'AND' | 'OR' | 'NOT'
export type PrimitiveKind = GateKind | 'INPUT_SWITCH' | 'LED_OUTPUT'
export type ComponentKind = PrimitiveKind | 'SUB_CIRCUIT'

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = ['AND', 'OR', 'NOT', 'INPUT_SWITCH', 'LED_OUTPUT']

interface ComponentBase {
  id: ComponentId
  name: string
  position: Point
  inputs: Port[]   // Order fixes wiring conventions and truth-table columns
  outputs: Port[]
}

export interface AndGate extends ComponentBase {
  kind: 'AND'
}

export interface OrGate extends ComponentBase {
  kind: 'OR'
}

export interface NotGate extends ComponentBase {
  kind: 'NOT'
}

export interface InputSwitch extends ComponentBase {
  kind: 'INPUT_SWITCH'
  state: boolean
}

export interface LedOutput extends ComponentBase {
  kind: 'LED_OUTPUT'
  lit: boolean
}

// === Sub-circuit ===
export interface SubCircuitReference {
  circuitName: string
  filePath?: string
}

export type SubCircuitFailure = 'missing' | 'error' | 'cycle'

// Owns a private copy of the referenced circuit and the context that steps it
export interface SubCircuitRuntime {
  readonly body: Circuit
  readonly inputCount: number
  readonly outputCount: number
  execute(inputs: boolean[]): boolean[]
  clear(): void
  snapshot(): boolean[]
}

export type SubCircuitBody =
  | { status: 'unloaded' }
  | { status: 'loaded'; runtime: SubCircuitRuntime }
  | { status: 'failed'; reason: SubCircuitFailure; message: string }

export interface SubCircuitComponent extends ComponentBase {
  kind: 'SUB_CIRCUIT'
  reference: SubCircuitReference
  body: SubCircuitBody
}

export type GateComponent = AndGate | OrGate | NotGate

export type Component = AndGate | OrGate | NotGate | InputSwitch | LedOutput | SubCircuitComponent

// === Connector ===
export interface Connector {
  id: ConnectorId
  source: PortRef  // Must resolve to an output port
  sink: PortRef    // Must resolve to an input port
  value: boolean   // Mirrors the source port at the last propagation
  color: string
}

// === Circuit ===
export interface Circuit {
  id: CircuitId
  name: string
  components: Component[]
  connectors: Connector[]
}

// === Project ===
export interface Project {
  name: string
  path?: string
  circuits: Circuit[]
  currentCircuitId?: CircuitId
}

// === Helpers to create typed IDs ===
export function createComponentId(id: string): ComponentId {
  return id as ComponentId
}
export function createConnectorId(id: string): ConnectorId {
  return id as ConnectorId
}
export function createCircuitId(id: string): CircuitId {
  return id as CircuitId
}

// === Type Guards ===
export function isPrimitiveKind(kind: string): kind is PrimitiveKind {
  return (PRIMITIVE_KINDS as readonly string[]).includes(kind)
}

export function isGate(component: Component): component is GateComponent {
  return component.kind === 'AND' || component.kind === 'OR' || component.kind === 'NOT'
}

export function isInputSwitch(component: Component): component is InputSwitch {
  return component.kind === 'INPUT_SWITCH'
}

export function isLedOutput(component: Component): component is LedOutput {
  return component.kind === 'LED_OUTPUT'
}

export function isSubCircuit(component: Component): component is SubCircuitComponent {
  return component.kind === 'SUB_CIRCUIT'
}
