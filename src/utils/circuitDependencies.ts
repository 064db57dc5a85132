import type { Circuit, Project } from '../types'
import { isSubCircuit } from '../types'

// Names of the circuits a circuit places directly as sub-circuits
export function directDependencies(circuit: Circuit): string[] {
  const deps = new Set<string>()
  for (const comp of circuit.components) {
    if (isSubCircuit(comp)) {
      deps.add(comp.reference.circuitName)
    }
  }
  return [...deps]
}

function buildDependencyMap(project: Project): Map<string, string[]> {
  const dependencyMap = new Map<string, string[]>()
  for (const circuit of project.circuits) {
    dependencyMap.set(circuit.name, directDependencies(circuit))
  }
  return dependencyMap
}

/**
 * Collect the given circuits and all their transitive sub-circuit
 * dependencies in post order (dependencies before dependents). Names that
 * are not in the project are skipped.
 */
export function collectDependencies(names: string[], project: Project): string[] {
  const dependencyMap = buildDependencyMap(project)
  const ordered: string[] = []
  const visited = new Set<string>()

  const visit = (name: string) => {
    if (visited.has(name)) return
    visited.add(name)

    const deps = dependencyMap.get(name)
    if (!deps) return

    for (const dep of deps) {
      visit(dep)
    }
    ordered.push(name)
  }

  for (const name of names) {
    visit(name)
  }
  return ordered
}

/** Every circuit that uses `name`, directly or through other sub-circuits, sorted by name. */
export function findDependents(name: string, project: Project): string[] {
  const dependencyMap = buildDependencyMap(project)
  const memo = new Map<string, boolean>()
  const inStack = new Set<string>()

  const dependsOnTarget = (id: string): boolean => {
    if (memo.has(id)) return memo.get(id) ?? false
    if (inStack.has(id)) return false
    inStack.add(id)

    const deps = dependencyMap.get(id) ?? []
    let result = deps.some((dep) => dep === name)
    if (!result) {
      result = deps.some((dep) => dependsOnTarget(dep))
    }

    inStack.delete(id)
    memo.set(id, result)
    return result
  }

  const dependents: string[] = []
  for (const id of dependencyMap.keys()) {
    if (id !== name && dependsOnTarget(id)) {
      dependents.push(id)
    }
  }
  return dependents.sort((a, b) => a.localeCompare(b))
}

/**
 * Would placing `referenceName` inside `hostName` make a circuit contain
 * itself? True for a self-reference or when the referenced circuit already
 * depends on the host.
 */
export function wouldCreateCycle(project: Project, hostName: string, referenceName: string): boolean {
  if (hostName === referenceName) return true
  return collectDependencies([referenceName], project).includes(hostName)
}
