import type { Circuit, ComponentId, ConnectorId } from '../types'
import { isInputSwitch, isLedOutput } from '../types'
import { awaitsPorts, indexComponents, resolvePort } from '../circuit/connector'

export type ValidationError =
  | { type: 'no_inputs' }
  | { type: 'no_outputs' }
  | { type: 'floating_input'; componentId: ComponentId; name: string; portIndex: number }
  | { type: 'multiple_drivers'; componentId: ComponentId; name: string; portIndex: number; count: number }
  | { type: 'dangling_connector'; connectorId: ConnectorId }

export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
}

// Floating inputs read as false; the circuit still runs
const WARNING_TYPES: ReadonlySet<ValidationError['type']> = new Set(['floating_input'])

export function isBlockingError(error: ValidationError): boolean {
  return !WARNING_TYPES.has(error.type)
}

/**
 * Check that a circuit can stand in as a sub-circuit: it needs switches to
 * drive and LEDs to read, and every connector must resolve.
 */
export function validateCircuit(circuit: Circuit): ValidationResult {
  const errors: ValidationError[] = []

  if (!circuit.components.some(isInputSwitch)) {
    errors.push({ type: 'no_inputs' })
  }
  if (!circuit.components.some(isLedOutput)) {
    errors.push({ type: 'no_outputs' })
  }

  const byId = indexComponents(circuit)
  const driverCounts = new Map<string, number>()
  for (const connector of circuit.connectors) {
    const source = resolvePort(byId, connector.source, 'output')
    const sink = resolvePort(byId, connector.sink, 'input')
    if (!source || !sink) {
      if (awaitsPorts(byId.get(connector.source.componentId)) || awaitsPorts(byId.get(connector.sink.componentId))) {
        continue
      }
      errors.push({ type: 'dangling_connector', connectorId: connector.id })
      continue
    }
    const key = `${connector.sink.componentId}:${connector.sink.portIndex}`
    driverCounts.set(key, (driverCounts.get(key) ?? 0) + 1)
  }

  for (const component of circuit.components) {
    component.inputs.forEach((_, portIndex) => {
      const count = driverCounts.get(`${component.id}:${portIndex}`) ?? 0
      if (count === 0) {
        errors.push({ type: 'floating_input', componentId: component.id, name: component.name, portIndex })
      } else if (count > 1) {
        errors.push({ type: 'multiple_drivers', componentId: component.id, name: component.name, portIndex, count })
      }
    })
  }

  return { valid: !errors.some(isBlockingError), errors }
}

export function formatValidationError(error: ValidationError): string {
  switch (error.type) {
    case 'no_inputs':
      return 'Circuit must have at least one input switch'
    case 'no_outputs':
      return 'Circuit must have at least one LED output'
    case 'floating_input':
      return `Input ${error.portIndex} of "${error.name}" is not connected`
    case 'multiple_drivers':
      return `Input ${error.portIndex} of "${error.name}" has ${error.count} drivers`
    case 'dangling_connector':
      return `Connector ${error.connectorId} points at a port that does not exist`
    default:
      return 'Unknown validation error'
  }
}
