import type {
  Circuit,
  InputSwitch,
  LedOutput,
  SubCircuitBody,
  SubCircuitComponent,
  SubCircuitFailure,
  SubCircuitRuntime,
} from '../types'
import { isInputSwitch, isLedOutput } from '../types'
import { SETTLE_ITERATION_LIMIT } from '../config'
import { createPort, setSwitchState } from '../circuit/components'
import { indexComponents, propagateConnector, resolvePort, setConnectorValue } from '../circuit/connector'
import { cloneCircuit } from '../circuit/graph'
import { layoutPorts } from '../utils/pinLayout'
import { executeComponent, executeLedOutput } from './evaluator'
import type { SubCircuitExecutor } from './evaluator'
import type { SettleResult, SimulationListener, SimulationOptions } from './types'

// === Circuit-level passes ===

function executeAll(circuit: Circuit, executeSubCircuit: SubCircuitExecutor): void {
  for (const component of circuit.components) {
    executeComponent(component, executeSubCircuit)
  }
}

function propagateAll(circuit: Circuit): void {
  const byId = indexComponents(circuit)
  for (const connector of circuit.connectors) {
    const source = resolvePort(byId, connector.source, 'output')
    const sink = resolvePort(byId, connector.sink, 'input')
    // Ports of a sub-circuit that has not loaded yet do not resolve
    if (source && sink) {
      propagateConnector(connector, source, sink)
    }
  }
}

/**
 * Force every switch, port and connector to false, including those inside
 * loaded sub-circuit bodies. Nothing is executed.
 */
export function clearCircuitState(circuit: Circuit): void {
  for (const component of circuit.components) {
    if (isInputSwitch(component)) {
      component.state = false
    }
    for (const port of component.inputs) port.value = false
    for (const port of component.outputs) port.value = false
    if (component.kind === 'SUB_CIRCUIT' && component.body.status === 'loaded') {
      component.body.runtime.clear()
    }
  }
  for (const connector of circuit.connectors) {
    setConnectorValue(connector, false)
  }
}

// Every port value in the circuit and its loaded bodies, in a stable order
export function snapshotSignals(circuit: Circuit): boolean[] {
  const signals: boolean[] = []
  for (const component of circuit.components) {
    for (const port of component.inputs) signals.push(port.value)
    for (const port of component.outputs) signals.push(port.value)
    if (component.kind === 'SUB_CIRCUIT' && component.body.status === 'loaded') {
      signals.push(...component.body.runtime.snapshot())
    }
  }
  return signals
}

function sameSignals(a: boolean[], b: boolean[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

// === Simulation Context ===

export class SimulationContext {
  private circuit: Circuit | null
  private running = false
  private readonly listeners: SimulationListener[] = []
  private readonly options: SimulationOptions

  constructor(circuit: Circuit | null, options: SimulationOptions = {}) {
    this.circuit = circuit
    this.options = options
  }

  getCircuit(): Circuit | null {
    return this.circuit
  }

  setCircuit(circuit: Circuit | null): void {
    this.circuit = circuit
  }

  isRunning(): boolean {
    return this.running
  }

  /**
   * One evaluation cycle: execute every component, propagate every
   * connector, execute every component again, then notify. A chain of N
   * gates needs several calls to settle; feedback loops never do.
   */
  step(): void {
    if (!this.circuit) return
    executeAll(this.circuit, this.executeSubCircuit)
    propagateAll(this.circuit)
    executeAll(this.circuit, this.executeSubCircuit)
    this.notifyListeners()
  }

  /**
   * Step until no port value changes between two steps, or give up after
   * `maxIterations` steps.
   */
  settle(maxIterations: number = SETTLE_ITERATION_LIMIT): SettleResult {
    const circuit = this.circuit
    if (!circuit) return { converged: true, iterations: 0 }

    let previous = snapshotSignals(circuit)
    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      this.step()
      const next = snapshotSignals(circuit)
      if (sameSignals(previous, next)) {
        return { converged: true, iterations: iteration }
      }
      previous = next
    }
    return { converged: false, iterations: maxIterations }
  }

  start(): void {
    this.running = true
    this.notifyListeners()
  }

  stop(): void {
    this.running = false
    this.notifyListeners()
  }

  /** Return the circuit to the all-false state and execute every component once. */
  reset(): void {
    if (this.circuit) {
      clearCircuitState(this.circuit)
      executeAll(this.circuit, this.executeSubCircuit)
    }
    this.notifyListeners()
  }

  addListener(listener: SimulationListener): void {
    if (!this.listeners.includes(listener)) {
      this.listeners.push(listener)
    }
  }

  removeListener(listener: SimulationListener): void {
    const index = this.listeners.indexOf(listener)
    if (index !== -1) {
      this.listeners.splice(index, 1)
    }
  }

  private notifyListeners(): void {
    for (const listener of [...this.listeners]) {
      listener(this)
    }
  }

  private readonly executeSubCircuit: SubCircuitExecutor = (component, inputs) =>
    executeSubCircuit(component, inputs, {
      loader: this.options.loader,
      ancestry: this.options.ancestry ?? (this.circuit ? [this.circuit.name] : []),
    })
}

// === Sub-circuit runtime ===

class BodyRuntime implements SubCircuitRuntime {
  readonly body: Circuit
  private readonly switches: InputSwitch[]
  private readonly leds: LedOutput[]
  private readonly context: SimulationContext

  constructor(body: Circuit, options: SimulationOptions) {
    this.body = body
    // Port i of the sub-circuit maps to the i-th switch / LED in component order
    this.switches = body.components.filter(isInputSwitch)
    this.leds = body.components.filter(isLedOutput)
    this.context = new SimulationContext(body, options)
  }

  get inputCount(): number {
    return this.switches.length
  }

  get outputCount(): number {
    return this.leds.length
  }

  execute(inputs: boolean[]): boolean[] {
    this.switches.forEach((input, i) => setSwitchState(input, inputs[i] ?? false))
    this.context.step()
    return this.leds.map((led) => {
      executeLedOutput(led)
      return led.lit
    })
  }

  clear(): void {
    clearCircuitState(this.body)
  }

  snapshot(): boolean[] {
    return snapshotSignals(this.body)
  }
}

function rebuildPorts(component: SubCircuitComponent, inputCount: number, outputCount: number): void {
  component.inputs = Array.from({ length: inputCount }, (_, i) => createPort(`in${i}`, 'input'))
  component.outputs = Array.from({ length: outputCount }, (_, i) => createPort(`out${i}`, 'output'))
  layoutPorts(component)
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function failLoad(component: SubCircuitComponent, reason: SubCircuitFailure, message: string): SubCircuitBody {
  console.warn('Sub-circuit unavailable:', message)
  component.body = { status: 'failed', reason, message }
  rebuildPorts(component, 0, 0)
  return component.body
}

function attachBody(component: SubCircuitComponent, body: Circuit, options: SimulationOptions): void {
  const ancestry = [...(options.ancestry ?? []), component.reference.circuitName]
  const runtime = new BodyRuntime(body, { loader: options.loader, ancestry })
  component.body = { status: 'loaded', runtime }
  rebuildPorts(component, runtime.inputCount, runtime.outputCount)
}

/**
 * Load the referenced circuit the first time it is needed. Failures leave the
 * component in the `failed` state with no ports; they never throw.
 */
export function ensureSubCircuitLoaded(component: SubCircuitComponent, options: SimulationOptions): SubCircuitBody {
  if (component.body.status !== 'unloaded') {
    return component.body
  }

  const name = component.reference.circuitName
  const ancestry = options.ancestry ?? []
  if (ancestry.includes(name)) {
    return failLoad(component, 'cycle', `"${name}" contains itself (${[...ancestry, name].join(' > ')})`)
  }
  if (!options.loader) {
    return failLoad(component, 'missing', `no circuit loader for "${name}"`)
  }

  let loaded: Circuit | null
  try {
    loaded = options.loader.loadCircuit(name)
  } catch (e) {
    return failLoad(component, 'error', `loading "${name}" failed: ${describeError(e)}`)
  }
  if (!loaded) {
    return failLoad(component, 'missing', `circuit "${name}" was not found`)
  }

  // Each instance simulates its own copy of the body
  attachBody(component, cloneCircuit(loaded), options)
  return component.body
}

/** Replace the body of a sub-circuit and rebuild its ports from scratch. */
export function updateSubCircuit(component: SubCircuitComponent, body: Circuit, options: SimulationOptions = {}): void {
  attachBody(component, body, options)
}

/** Forget the loaded body so the next use fetches the circuit again. */
export function reloadSubCircuit(component: SubCircuitComponent): void {
  component.body = { status: 'unloaded' }
  rebuildPorts(component, 0, 0)
}

export function executeSubCircuit(
  component: SubCircuitComponent,
  inputs: boolean[],
  options: SimulationOptions
): boolean[] {
  const body = ensureSubCircuitLoaded(component, options)
  if (body.status !== 'loaded') return []
  return body.runtime.execute(inputs)
}
