import type { Circuit, Component, ComponentId, Connector, ConnectorId, Port, PortDirection, PortRef } from '../types'
import { CONNECTOR_COLOR_OFF, CONNECTOR_COLOR_ON } from '../config'

export function connectorColor(value: boolean): string {
  return value ? CONNECTOR_COLOR_ON : CONNECTOR_COLOR_OFF
}

export function setConnectorValue(connector: Connector, value: boolean): void {
  connector.value = value
  connector.color = connectorColor(value)
}

export function indexComponents(circuit: Circuit): Map<ComponentId, Component> {
  const byId = new Map<ComponentId, Component>()
  for (const component of circuit.components) {
    byId.set(component.id, component)
  }
  return byId
}

export function resolvePort(
  components: Map<ComponentId, Component>,
  ref: PortRef,
  direction: PortDirection
): Port | null {
  const component = components.get(ref.componentId)
  if (!component) return null
  const ports = direction === 'output' ? component.outputs : component.inputs
  return ports[ref.portIndex] ?? null
}

/** A sub-circuit that is not loaded has no ports yet; wires to it wait. */
export function awaitsPorts(component: Component | undefined): boolean {
  return component?.kind === 'SUB_CIRCUIT' && component.body.status !== 'loaded'
}

function describeRef(ref: PortRef, direction: PortDirection): string {
  return `${direction} ${ref.portIndex} of ${ref.componentId}`
}

/**
 * Build a connector between an output port and an input port of the same
 * circuit. Both endpoints must resolve; nothing is added to the circuit.
 */
export function createConnector(circuit: Circuit, id: ConnectorId, source: PortRef, sink: PortRef): Connector {
  const byId = indexComponents(circuit)
  if (!resolvePort(byId, source, 'output')) {
    throw new Error(`Connector source does not exist: ${describeRef(source, 'output')}`)
  }
  if (!resolvePort(byId, sink, 'input')) {
    throw new Error(`Connector sink does not exist: ${describeRef(sink, 'input')}`)
  }
  return {
    id,
    source: { ...source },
    sink: { ...sink },
    value: false,
    color: connectorColor(false),
  }
}

// Copy the source value onto the connector and into the sink port
export function propagateConnector(connector: Connector, source: Port, sink: Port): void {
  const value = source.value
  setConnectorValue(connector, value)
  sink.value = value
}

export function isSameRef(a: PortRef, b: PortRef): boolean {
  return a.componentId === b.componentId && a.portIndex === b.portIndex
}
