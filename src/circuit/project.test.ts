import { describe, it, expect } from 'vitest'
import { IdAllocator } from '../utils/idAllocator'
import { createProjectLoader } from '../simulation/loader'
import { createCircuit } from './graph'
import { addCircuit, createProject, getCircuitById, getCircuitByName, removeCircuit } from './project'

describe('project', () => {
  it('should look circuits up by id and by name', () => {
    const ids = new IdAllocator()
    const project = createProject('Demo', '/tmp/Demo.lcp')
    const main = createCircuit(ids.allocateCircuitId(), 'Main')
    addCircuit(project, main)
    addCircuit(project, main)
    addCircuit(project, null)

    expect(project.path).toBe('/tmp/Demo.lcp')
    expect(project.circuits).toEqual([main])
    expect(getCircuitById(project, 'circuit_0')).toBe(main)
    expect(getCircuitByName(project, 'Main')).toBe(main)
    expect(getCircuitByName(project, 'main')).toBeNull()
  })

  it('should clear the current circuit when it is removed', () => {
    const ids = new IdAllocator()
    const project = createProject('Demo')
    const main = createCircuit(ids.allocateCircuitId(), 'Main')
    addCircuit(project, main)
    project.currentCircuitId = main.id

    removeCircuit(project, main)
    expect(project.circuits).toEqual([])
    expect(project.currentCircuitId).toBeUndefined()
  })

  it('should resolve loader requests against the latest project', () => {
    const ids = new IdAllocator()
    let project = createProject('First')
    const loader = createProjectLoader(() => project)
    expect(loader.loadCircuit('Main')).toBeNull()

    project = createProject('Second')
    const main = createCircuit(ids.allocateCircuitId(), 'Main')
    addCircuit(project, main)
    expect(loader.loadCircuit('Main')).toBe(main)
  })
})
