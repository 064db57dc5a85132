import { describe, it, expect } from 'vitest'
import { createComponentId } from '../types'
import { createInputSwitch } from '../circuit/components'
import { addComponent, createCircuit } from '../circuit/graph'
import { addCircuit, createProject } from '../circuit/project'
import { IdAllocator } from './idAllocator'

describe('IdAllocator', () => {
  it('should share one counter across prefixes', () => {
    const ids = new IdAllocator()
    expect(ids.allocateCircuitId()).toBe('circuit_0')
    expect(ids.allocateComponentId()).toBe('comp_1')
    expect(ids.allocateConnectorId()).toBe('conn_2')
    expect(ids.allocate('net')).toBe('net_3')
  })

  it('should keep separate allocators independent', () => {
    const first = new IdAllocator()
    const second = new IdAllocator()
    first.allocateComponentId()
    expect(second.allocateComponentId()).toBe('comp_0')
  })

  it('should continue past the highest suffix in a project', () => {
    const project = createProject('Seeded')
    const circuit = createCircuit(new IdAllocator(3).allocateCircuitId(), 'Main')
    addComponent(circuit, createInputSwitch(createComponentId('comp_41')))
    addComponent(circuit, createInputSwitch(createComponentId('imported')))
    addCircuit(project, circuit)

    expect(IdAllocator.forProject(project).allocateConnectorId()).toBe('conn_42')
    expect(IdAllocator.forProject(createProject('Empty')).allocateCircuitId()).toBe('circuit_0')
  })
})
