import type {
  Circuit,
  CircuitId,
  Component,
  ComponentId,
  Connector,
  ConnectorId,
  Point,
  Port,
  PortDirection,
  PortRef,
} from '../types'
import type { IdAllocator } from '../utils/idAllocator'
import { computeComponentSize } from '../utils/pinLayout'
import { awaitsPorts, createConnector, indexComponents, isSameRef, resolvePort } from './connector'

export function createCircuit(id: CircuitId, name: string): Circuit {
  return { id, name, components: [], connectors: [] }
}

// === Components ===
export function addComponent(circuit: Circuit, component: Component | null | undefined): void {
  if (!component || circuit.components.includes(component)) return
  circuit.components.push(component)
}

/** Remove a component together with every connector touching it. */
export function removeComponent(circuit: Circuit, component: Component): void {
  circuit.components = circuit.components.filter((c) => c !== component)
  circuit.connectors = circuit.connectors.filter(
    (w) => w.source.componentId !== component.id && w.sink.componentId !== component.id
  )
}

export function getComponentById(circuit: Circuit, id: string): Component | null {
  return circuit.components.find((c) => c.id === id) ?? null
}

/** The topmost component whose bounds contain the point, edges included. */
export function findComponentAt(circuit: Circuit, point: Point): Component | null {
  for (let i = circuit.components.length - 1; i >= 0; i--) {
    const component = circuit.components[i]
    if (!component) continue
    const { x, y } = component.position
    const { width, height } = computeComponentSize(component.inputs.length, component.outputs.length)
    if (point.x >= x && point.x <= x + width && point.y >= y && point.y <= y + height) {
      return component
    }
  }
  return null
}

// === Connectors ===
export function addConnector(circuit: Circuit, connector: Connector | null | undefined): void {
  if (!connector || circuit.connectors.includes(connector)) return
  circuit.connectors.push(connector)
}

export function removeConnector(circuit: Circuit, connector: Connector): void {
  circuit.connectors = circuit.connectors.filter((w) => w !== connector)
}

export function getConnectorById(circuit: Circuit, id: string): Connector | null {
  return circuit.connectors.find((w) => w.id === id) ?? null
}

export function getConnectorsFor(circuit: Circuit, componentId: ComponentId): Connector[] {
  return circuit.connectors.filter(
    (w) => w.source.componentId === componentId || w.sink.componentId === componentId
  )
}

/**
 * Wire an output port to an input port. An identical existing connector is
 * returned as is; any other connector driving the same input is replaced.
 */
export function connect(circuit: Circuit, source: PortRef, sink: PortRef, ids: IdAllocator): Connector {
  const existing = circuit.connectors.find((w) => isSameRef(w.source, source) && isSameRef(w.sink, sink))
  if (existing) return existing

  const connector = createConnector(circuit, ids.allocateConnectorId(), source, sink)
  // Input ports can only have one driver
  circuit.connectors = circuit.connectors.filter((w) => !isSameRef(w.sink, sink))
  circuit.connectors.push(connector)
  return connector
}

export function disconnect(circuit: Circuit, id: ConnectorId): boolean {
  const before = circuit.connectors.length
  circuit.connectors = circuit.connectors.filter((w) => w.id !== id)
  return circuit.connectors.length !== before
}

function endpointHolds(byId: Map<ComponentId, Component>, ref: PortRef, direction: PortDirection): boolean {
  const component = byId.get(ref.componentId)
  if (!component) return false
  return awaitsPorts(component) || resolvePort(byId, ref, direction) !== null
}

/**
 * Drop connectors whose endpoints no longer resolve. Connectors to a
 * sub-circuit that is unloaded or failed are kept until its ports are known.
 * Returns the dropped ids.
 */
export function pruneDanglingConnectors(circuit: Circuit): ConnectorId[] {
  const byId = indexComponents(circuit)
  const dropped: ConnectorId[] = []
  circuit.connectors = circuit.connectors.filter((w) => {
    const ok = endpointHolds(byId, w.source, 'output') && endpointHolds(byId, w.sink, 'input')
    if (!ok) dropped.push(w.id)
    return ok
  })
  return dropped
}

// === Cloning ===
function clonePorts(ports: Port[]): Port[] {
  return ports.map((port) => ({ ...port, position: { ...port.position } }))
}

function cloneComponent(component: Component): Component {
  const inputs = clonePorts(component.inputs)
  const outputs = clonePorts(component.outputs)
  const position = { ...component.position }

  if (component.kind !== 'SUB_CIRCUIT') {
    return { ...component, position, inputs, outputs }
  }

  // Bodies are private to each instance; the copy loads its own on demand
  return {
    ...component,
    position,
    inputs: [],
    outputs: [],
    reference: { ...component.reference },
    body: { status: 'unloaded' },
  }
}

/**
 * An independent copy of the graph sharing no mutable state with the
 * source. Sub-circuit components come back unloaded.
 */
export function cloneCircuit(circuit: Circuit): Circuit {
  return {
    id: circuit.id,
    name: circuit.name,
    components: circuit.components.map(cloneComponent),
    connectors: circuit.connectors.map((w) => ({
      ...w,
      source: { ...w.source },
      sink: { ...w.sink },
    })),
  }
}
