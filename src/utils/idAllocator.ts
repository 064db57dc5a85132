import type { CircuitId, ComponentId, ConnectorId, Project } from '../types'
import { createCircuitId, createComponentId, createConnectorId } from '../types'

/**
 * Hands out ids of the form `<prefix>_<n>` from one counter shared by every
 * prefix. Each workbench or test owns its own allocator.
 */
export class IdAllocator {
  private next: number

  constructor(start: number = 0) {
    this.next = start
  }

  /** Start past every numeric suffix already used in the project. */
  static forProject(project: Project): IdAllocator {
    const ids: string[] = []
    for (const circuit of project.circuits) {
      ids.push(circuit.id)
      circuit.components.forEach((c) => ids.push(c.id))
      circuit.connectors.forEach((c) => ids.push(c.id))
    }
    return new IdAllocator(maxSuffix(ids) + 1)
  }

  allocate(prefix: string): string {
    return `${prefix}_${this.next++}`
  }

  allocateComponentId(): ComponentId {
    return createComponentId(this.allocate('comp'))
  }

  allocateConnectorId(): ConnectorId {
    return createConnectorId(this.allocate('conn'))
  }

  allocateCircuitId(): CircuitId {
    return createCircuitId(this.allocate('circuit'))
  }
}

function maxSuffix(ids: string[]): number {
  let max = -1
  for (const id of ids) {
    const match = /_(\d+)$/.exec(id)
    if (match?.[1] !== undefined) {
      max = Math.max(max, Number(match[1]))
    }
  }
  return max
}
