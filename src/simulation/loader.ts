import type { Project } from '../types'
import { getCircuitByName } from '../circuit/project'
import type { CircuitLoader } from './types'

/**
 * Resolve sub-circuit references by name against a project. The project is
 * read on every call so circuits saved after the loader was made are found.
 */
export function createProjectLoader(getProject: () => Project): CircuitLoader {
  return {
    loadCircuit: (name) => getCircuitByName(getProject(), name),
  }
}
