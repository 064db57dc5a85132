import type { Circuit, Project } from '../types'

export function createProject(name: string, path?: string): Project {
  return path ? { name, path, circuits: [] } : { name, circuits: [] }
}

export function addCircuit(project: Project, circuit: Circuit | null | undefined): void {
  if (!circuit || project.circuits.includes(circuit)) return
  project.circuits.push(circuit)
}

export function removeCircuit(project: Project, circuit: Circuit): void {
  project.circuits = project.circuits.filter((c) => c !== circuit)
  if (project.currentCircuitId === circuit.id) {
    delete project.currentCircuitId
  }
}

export function getCircuitById(project: Project, id: string): Circuit | null {
  return project.circuits.find((c) => c.id === id) ?? null
}

export function getCircuitByName(project: Project, name: string): Circuit | null {
  return project.circuits.find((c) => c.name === name) ?? null
}
