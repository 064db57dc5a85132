import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import { enableMapSet } from 'immer'
import type {
  Circuit,
  CircuitId,
  Component,
  ComponentId,
  ConnectorId,
  Point,
  PortRef,
  PrimitiveKind,
  Project,
} from '../types'
import { isInputSwitch } from '../types'
import * as components from '../circuit/components'
import type { ComponentOptions } from '../circuit/components'
import * as graph from '../circuit/graph'
import * as projects from '../circuit/project'
import { SimulationContext, ensureSubCircuitLoaded, reloadSubCircuit } from '../simulation/context'
import { createProjectLoader } from '../simulation/loader'
import { generateTruthTable } from '../simulation/truthTable'
import type { TruthTable, TruthTableOptions } from '../simulation/truthTable'
import type { SchedulerTarget } from '../simulation/scheduler'
import type { CircuitLoader, SettleResult } from '../simulation/types'
import type { ProjectRepository } from '../persistence/projectRepository'
import { IdAllocator } from '../utils/idAllocator'
import { collectDependencies, findDependents, wouldCreateCycle } from '../utils/circuitDependencies'
import { importCircuits } from '../utils/projectFile'
import type { ImportResolution } from '../utils/projectFile'
import { formatValidationError, validateCircuit } from '../utils/validation'

// Enable Immer support for Map and Set
enableMapSet()

// === Store Interface ===
export interface WorkbenchState {
  project: Project
  running: boolean
  // Last generated table per circuit
  truthTables: Map<CircuitId, TruthTable>

  // Circuit actions
  createCircuit: (name: string) => CircuitId | null
  selectCircuit: (id: CircuitId) => boolean
  renameCircuit: (id: CircuitId, name: string) => boolean
  removeCircuit: (id: CircuitId) => boolean

  // Editing actions (on the current circuit)
  addComponent: (kind: PrimitiveKind, options?: ComponentOptions) => ComponentId | null
  addSubCircuit: (circuitName: string, options?: ComponentOptions) => ComponentId | null
  removeComponent: (id: ComponentId) => void
  moveComponent: (id: ComponentId, position: Point) => void
  connect: (source: PortRef, sink: PortRef) => ConnectorId | null
  disconnect: (id: ConnectorId) => void
  toggleSwitch: (id: ComponentId) => void
  setSwitchState: (id: ComponentId, state: boolean) => void

  // Simulation actions
  step: () => void
  reset: () => void
  start: () => void
  stop: () => void
  settle: (maxIterations?: number) => SettleResult
  generateTruthTable: (options?: Omit<TruthTableOptions, 'loader' | 'ancestry'>) => TruthTable | null
  refreshSubCircuits: (circuitName: string) => number

  // Persistence actions
  loadProject: (path: string) => Promise<boolean>
  saveProject: () => Promise<string | null>
  importCircuitFile: (path: string) => Promise<ImportResolution | null>
}

export interface WorkbenchOptions {
  projectName?: string
  project?: Project
  ids?: IdAllocator
  repository?: ProjectRepository
}

// === Selectors ===
export function selectCurrentCircuit(state: Pick<WorkbenchState, 'project'>): Circuit | null {
  const id = state.project.currentCircuitId
  return id ? projects.getCircuitById(state.project, id) : null
}

function findComponent(circuit: Circuit, id: ComponentId): Component | null {
  return graph.getComponentById(circuit, id)
}

// Reload every instance of the given circuits, dependencies first, and drop
// connectors that lost their ports
function rebuildSubCircuits(project: Project, names: Set<string> | null, loader: CircuitLoader): number {
  let rebuilt = 0
  const order = collectDependencies(
    project.circuits.map((c) => c.name),
    project
  )
  for (const name of order) {
    const circuit = projects.getCircuitByName(project, name)
    if (!circuit) continue
    let touched = false
    for (const component of circuit.components) {
      if (component.kind !== 'SUB_CIRCUIT') continue
      if (names && !names.has(component.reference.circuitName)) continue
      reloadSubCircuit(component)
      ensureSubCircuitLoaded(component, { loader, ancestry: [circuit.name] })
      rebuilt++
      touched = true
    }
    if (touched) {
      const dropped = graph.pruneDanglingConnectors(circuit)
      if (dropped.length > 0) {
        console.warn(`Dropped connectors to missing ports in "${circuit.name}":`, dropped)
      }
    }
  }
  return rebuilt
}

// === Store Implementation ===
export function createWorkbenchStore(options: WorkbenchOptions = {}) {
  const initialProject = options.project ?? projects.createProject(options.projectName ?? 'Untitled Project')
  let ids = options.ids ?? IdAllocator.forProject(initialProject)
  const repository = options.repository

  return createStore<WorkbenchState>()(
    immer((set, get) => {
      // Always resolves against the committed project
      const loader = createProjectLoader(() => get().project)

      // Rebuild every instance of the named circuits and of circuits that use them
      const refreshReferences = (names: string[]): number => {
        const project = get().project
        const affected = new Set(names)
        for (const name of names) {
          findDependents(name, project).forEach((dependent) => affected.add(dependent))
        }
        let rebuilt = 0
        set((state) => {
          rebuilt = rebuildSubCircuits(state.project, affected, loader)
        })
        return rebuilt
      }

      const simulate = <T>(run: (context: SimulationContext) => T, fallback: T): T => {
        let result = fallback
        set((state) => {
          const circuit = selectCurrentCircuit(state)
          if (!circuit) return
          result = run(new SimulationContext(circuit, { loader, ancestry: [circuit.name] }))
        })
        return result
      }

      const editCurrent = (recipe: (circuit: Circuit) => void) => {
        set((state) => {
          const circuit = selectCurrentCircuit(state)
          if (circuit) recipe(circuit)
        })
      }

      return {
        project: initialProject,
        running: false,
        truthTables: new Map<CircuitId, TruthTable>(),

        // === Circuit Actions ===
        createCircuit: (name) => {
          const normalizedName = name.trim()
          if (!normalizedName) {
            console.warn('Circuit name is empty')
            return null
          }
          if (projects.getCircuitByName(get().project, normalizedName)) {
            console.warn('Circuit name already exists:', normalizedName)
            return null
          }

          const circuit = graph.createCircuit(ids.allocateCircuitId(), normalizedName)
          set((state) => {
            projects.addCircuit(state.project, circuit)
            state.project.currentCircuitId = circuit.id
          })
          return circuit.id
        },

        selectCircuit: (id) => {
          if (!projects.getCircuitById(get().project, id)) {
            console.warn('Unknown circuit:', id)
            return false
          }
          set((state) => {
            state.project.currentCircuitId = id
          })
          return true
        },

        renameCircuit: (id, name) => {
          const project = get().project
          const circuit = projects.getCircuitById(project, id)
          const normalizedName = name.trim()
          if (!circuit || !normalizedName) return false
          if (circuit.name === normalizedName) return true

          if (projects.getCircuitByName(project, normalizedName)) {
            console.warn('Circuit name already exists:', normalizedName)
            return false
          }
          // Sub-circuits refer to circuits by name
          if (findDependents(circuit.name, project).length > 0) {
            console.warn('Circuit is used as a sub-circuit and cannot be renamed:', circuit.name)
            return false
          }

          set((state) => {
            const target = projects.getCircuitById(state.project, id)
            if (target) target.name = normalizedName
          })
          return true
        },

        removeCircuit: (id) => {
          const project = get().project
          const circuit = projects.getCircuitById(project, id)
          if (!circuit) return false

          const dependents = findDependents(circuit.name, project)
          if (dependents.length > 0) {
            console.warn(`Circuit "${circuit.name}" is used by:`, dependents)
            return false
          }

          set((state) => {
            const target = projects.getCircuitById(state.project, id)
            if (target) projects.removeCircuit(state.project, target)
            state.truthTables.delete(id)
          })
          return true
        },

        // === Editing Actions ===
        addComponent: (kind, componentOptions) => {
          if (!selectCurrentCircuit(get())) return null
          const component = components.createComponent(kind, ids.allocateComponentId(), componentOptions)
          editCurrent((circuit) => graph.addComponent(circuit, component))
          return component.id
        },

        addSubCircuit: (circuitName, componentOptions) => {
          const project = get().project
          const host = selectCurrentCircuit(get())
          if (!host) return null

          const target = projects.getCircuitByName(project, circuitName)
          if (!target) {
            console.warn('Circuit not found:', circuitName)
            return null
          }
          if (wouldCreateCycle(project, host.name, circuitName)) {
            console.warn('Sub-circuit would contain itself:', circuitName)
            return null
          }
          const validation = validateCircuit(target)
          if (!validation.valid) {
            console.warn('Circuit validation failed:', validation.errors.map(formatValidationError))
            return null
          }

          const component = components.createSubCircuitComponent(
            ids.allocateComponentId(),
            { circuitName },
            componentOptions
          )
          ensureSubCircuitLoaded(component, { loader, ancestry: [host.name] })
          editCurrent((circuit) => graph.addComponent(circuit, component))
          return component.id
        },

        removeComponent: (id) => {
          editCurrent((circuit) => {
            const component = findComponent(circuit, id)
            if (component) graph.removeComponent(circuit, component)
          })
        },

        moveComponent: (id, position) => {
          editCurrent((circuit) => {
            const component = findComponent(circuit, id)
            if (component) components.moveComponent(component, position)
          })
        },

        connect: (source, sink) => {
          let connectorId: ConnectorId | null = null
          editCurrent((circuit) => {
            try {
              connectorId = graph.connect(circuit, source, sink, ids).id
            } catch (e) {
              console.warn('Cannot connect:', e instanceof Error ? e.message : e)
            }
          })
          return connectorId
        },

        disconnect: (id) => {
          editCurrent((circuit) => {
            graph.disconnect(circuit, id)
          })
        },

        toggleSwitch: (id) => {
          editCurrent((circuit) => {
            const component = findComponent(circuit, id)
            if (component && isInputSwitch(component)) components.toggleSwitch(component)
          })
        },

        setSwitchState: (id, value) => {
          editCurrent((circuit) => {
            const component = findComponent(circuit, id)
            if (component && isInputSwitch(component)) components.setSwitchState(component, value)
          })
        },

        // === Simulation Actions ===
        step: () => {
          simulate((context) => context.step(), undefined)
        },

        reset: () => {
          simulate((context) => context.reset(), undefined)
        },

        start: () => {
          set((state) => {
            state.running = true
          })
        },

        stop: () => {
          set((state) => {
            state.running = false
          })
        },

        settle: (maxIterations) =>
          simulate((context) => context.settle(maxIterations), { converged: true, iterations: 0 }),

        generateTruthTable: (tableOptions) => {
          const current = selectCurrentCircuit(get())
          if (!current) return null

          // The editor's signal values are left alone
          const table = generateTruthTable(graph.cloneCircuit(current), {
            ...tableOptions,
            loader,
            ancestry: [current.name],
          })
          set((state) => {
            state.truthTables.set(current.id, table)
          })
          return table
        },

        refreshSubCircuits: (circuitName) => refreshReferences([circuitName]),

        // === Persistence Actions ===
        loadProject: async (path) => {
          if (!repository) {
            console.error('No project repository configured')
            return false
          }
          try {
            const project = await repository.load(path)
            ids = IdAllocator.forProject(project)
            set((state) => {
              state.project = project
              state.running = false
              state.truthTables.clear()
            })
            // Bodies loaded while parsing resolve against the parsed copy
            set((state) => {
              rebuildSubCircuits(state.project, null, loader)
            })
            return true
          } catch (e) {
            console.error('Failed to load project:', e)
            return false
          }
        },

        saveProject: async () => {
          if (!repository) {
            console.error('No project repository configured')
            return null
          }
          try {
            const path = await repository.save(get().project)
            set((state) => {
              state.project.path = path
            })
            return path
          } catch (e) {
            console.error('Failed to save project:', e)
            return null
          }
        },

        importCircuitFile: async (path) => {
          if (!repository) {
            console.error('No project repository configured')
            return null
          }
          try {
            const incoming = await repository.load(path)
            let resolution: ImportResolution = { imported: [], skippedNames: [] }
            set((state) => {
              resolution = importCircuits(state.project, incoming, ids)
            })
            if (resolution.skippedNames.length > 0) {
              console.warn('Skipped circuits that already exist:', resolution.skippedNames)
            }
            // Instances that failed for want of these circuits can load now
            if (resolution.imported.length > 0) {
              refreshReferences(resolution.imported)
            }
            return resolution
          } catch (e) {
            console.error('Failed to import circuits:', e)
            return null
          }
        },
      }
    })
  )
}

export type WorkbenchStore = ReturnType<typeof createWorkbenchStore>

/** Adapter so a SimulationScheduler can drive the workbench. */
export function workbenchSchedulerTarget(store: WorkbenchStore): SchedulerTarget {
  return {
    start: () => store.getState().start(),
    stop: () => store.getState().stop(),
    step: () => store.getState().step(),
    isRunning: () => store.getState().running,
  }
}
