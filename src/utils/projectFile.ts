import type {
  Circuit,
  Component,
  ComponentId,
  Connector,
  Point,
  PortRef,
  Project,
  SubCircuitReference,
} from '../types'
import { createCircuitId, createComponentId, createConnectorId, isPrimitiveKind } from '../types'
import { PROJECT_FILE_FORMAT, PROJECT_FILE_VERSION } from '../config'
import { createComponent, createSubCircuitComponent, setSwitchState } from '../circuit/components'
import { connectorColor } from '../circuit/connector'
import { cloneCircuit, createCircuit, pruneDanglingConnectors } from '../circuit/graph'
import { addCircuit, createProject, getCircuitByName } from '../circuit/project'
import { ensureSubCircuitLoaded } from '../simulation/context'
import { createProjectLoader } from '../simulation/loader'
import type { IdAllocator } from './idAllocator'
import { collectDependencies } from './circuitDependencies'

// === File format ===

export interface SerializedComponent {
  kind: Component['kind']
  id: string
  name: string
  position: Point
  state?: boolean
  reference?: SubCircuitReference
}

export interface SerializedConnector {
  id: string
  source: PortRef
  sink: PortRef
}

export interface SerializedCircuit {
  id: string
  name: string
  components: SerializedComponent[]
  connectors: SerializedConnector[]
}

export interface ProjectFileFormat {
  format: typeof PROJECT_FILE_FORMAT
  version: typeof PROJECT_FILE_VERSION
  savedAt: number
  project: {
    name: string
    currentCircuitId?: string
    circuits: SerializedCircuit[]
  }
}

// === Serialization ===

function serializeComponent(component: Component): SerializedComponent {
  const base = {
    kind: component.kind,
    id: component.id,
    name: component.name,
    position: { ...component.position },
  }
  switch (component.kind) {
    case 'INPUT_SWITCH':
      return { ...base, state: component.state }
    case 'SUB_CIRCUIT':
      // Only the reference is saved; the body is loaded by name
      return { ...base, reference: { ...component.reference } }
    default:
      return base
  }
}

function serializeCircuit(circuit: Circuit): SerializedCircuit {
  return {
    id: circuit.id,
    name: circuit.name,
    components: circuit.components.map(serializeComponent),
    connectors: circuit.connectors.map((w) => ({
      id: w.id,
      source: { ...w.source },
      sink: { ...w.sink },
    })),
  }
}

export function serializeProject(project: Project, savedAt: number = Date.now()): ProjectFileFormat {
  return {
    format: PROJECT_FILE_FORMAT,
    version: PROJECT_FILE_VERSION,
    savedAt,
    project: {
      name: project.name,
      ...(project.currentCircuitId ? { currentCircuitId: project.currentCircuitId } : {}),
      circuits: project.circuits.map(serializeCircuit),
    },
  }
}

export function stringifyProject(project: Project, savedAt?: number): string {
  return JSON.stringify(serializeProject(project, savedAt), null, 2)
}

// === Parsing ===

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// Missing or null collections read as empty
function listField(obj: JsonObject, field: string, owner: string): unknown[] {
  const value = obj[field]
  if (value === undefined || value === null) return []
  if (!Array.isArray(value)) {
    throw new Error(`${owner} has an invalid ${field} list`)
  }
  return value
}

function stringField(obj: JsonObject, field: string, owner: string): string {
  const value = obj[field]
  if (typeof value !== 'string' || !value) {
    throw new Error(`${owner} is missing a valid ${field}`)
  }
  return value
}

function parsePoint(value: unknown, owner: string): Point {
  if (value === undefined || value === null) return { x: 0, y: 0 }
  if (!isObject(value) || !Number.isFinite(value.x) || !Number.isFinite(value.y)) {
    throw new Error(`${owner} has an invalid position`)
  }
  return { x: Number(value.x), y: Number(value.y) }
}

function parsePortRef(value: unknown, owner: string): PortRef {
  if (
    !isObject(value) ||
    typeof value.componentId !== 'string' ||
    !Number.isInteger(value.portIndex) ||
    Number(value.portIndex) < 0
  ) {
    throw new Error(`${owner} has an invalid endpoint`)
  }
  return { componentId: createComponentId(value.componentId), portIndex: Number(value.portIndex) }
}

function parseComponent(value: unknown, circuitName: string): Component {
  if (!isObject(value)) {
    throw new Error(`Circuit "${circuitName}" contains an invalid component entry`)
  }
  const id = createComponentId(stringField(value, 'id', `A component in "${circuitName}"`))
  const owner = `Component "${id}"`
  const kind = stringField(value, 'kind', owner)
  const name = typeof value.name === 'string' && value.name ? value.name : undefined
  const position = parsePoint(value.position, owner)

  if (kind === 'SUB_CIRCUIT') {
    const reference = value.reference
    if (!isObject(reference) || typeof reference.circuitName !== 'string') {
      throw new Error(`${owner} is missing its sub-circuit reference`)
    }
    const filePath = typeof reference.filePath === 'string' ? reference.filePath : undefined
    return createSubCircuitComponent(
      id,
      filePath ? { circuitName: reference.circuitName, filePath } : { circuitName: reference.circuitName },
      { name, position }
    )
  }

  if (!isPrimitiveKind(kind)) {
    throw new Error(`${owner} has unknown kind "${kind}"`)
  }
  const component = createComponent(kind, id, { name, position })
  if (component.kind === 'INPUT_SWITCH' && value.state === true) {
    setSwitchState(component, true)
  }
  return component
}

function parseConnector(value: unknown, circuitName: string): Connector {
  if (!isObject(value)) {
    throw new Error(`Circuit "${circuitName}" contains an invalid connector entry`)
  }
  const id = stringField(value, 'id', `A connector in "${circuitName}"`)
  const owner = `Connector "${id}"`
  return {
    id: createConnectorId(id),
    source: parsePortRef(value.source, owner),
    sink: parsePortRef(value.sink, owner),
    value: false,
    color: connectorColor(false),
  }
}

function parseCircuit(value: unknown): Circuit {
  if (!isObject(value)) {
    throw new Error('File contains an invalid circuit entry')
  }
  const name = stringField(value, 'name', 'A circuit')
  const circuit = createCircuit(createCircuitId(stringField(value, 'id', `Circuit "${name}"`)), name)
  const owner = `Circuit "${name}"`
  circuit.components = listField(value, 'components', owner).map((c) => parseComponent(c, name))
  circuit.connectors = listField(value, 'connectors', owner).map((w) => parseConnector(w, name))

  const seen = new Set<ComponentId>()
  for (const component of circuit.components) {
    if (seen.has(component.id)) {
      throw new Error(`${owner} contains component id "${component.id}" twice`)
    }
    seen.add(component.id)
  }
  return circuit
}

/**
 * Load sub-circuit bodies so their ports exist, then drop connectors whose
 * endpoints do not resolve. Wires to an instance that failed to load stay.
 */
function normalizeProject(project: Project): void {
  const loader = createProjectLoader(() => project)
  for (const circuit of project.circuits) {
    for (const component of circuit.components) {
      if (component.kind === 'SUB_CIRCUIT') {
        ensureSubCircuitLoaded(component, { loader, ancestry: [circuit.name] })
      }
    }
    const dropped = pruneDanglingConnectors(circuit)
    if (dropped.length > 0) {
      console.warn(`Dropped connectors with missing endpoints in "${circuit.name}":`, dropped)
    }
  }
}

/**
 * Read and validate project file text. Returns the project or throws an
 * Error naming the first problem.
 */
export function parseProjectFile(text: string, path?: string): Project {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new Error('File is not valid JSON')
  }

  if (!isObject(parsed)) {
    throw new Error('File does not contain a valid object')
  }
  if (parsed.format !== PROJECT_FILE_FORMAT) {
    throw new Error('File is not a logic circuit project (missing or invalid format field)')
  }
  if (parsed.version !== PROJECT_FILE_VERSION) {
    throw new Error(`Unsupported file version: ${String(parsed.version)}`)
  }
  const body = parsed.project
  if (!isObject(body)) {
    throw new Error('File is missing project data')
  }

  const project = createProject(stringField(body, 'name', 'Project'), path)
  for (const circuit of listField(body, 'circuits', 'Project').map(parseCircuit)) {
    if (getCircuitByName(project, circuit.name)) {
      throw new Error(`Project contains circuit "${circuit.name}" twice`)
    }
    addCircuit(project, circuit)
  }

  const currentId = body.currentCircuitId
  if (typeof currentId === 'string' && project.circuits.some((c) => c.id === currentId)) {
    project.currentCircuitId = createCircuitId(currentId)
  }

  normalizeProject(project)
  return project
}

// === Importing circuits from another project ===

export interface ImportResolution {
  imported: string[]
  skippedNames: string[]
}

// Copy a circuit under fresh ids so it cannot collide with the target project
function reassignIds(circuit: Circuit, ids: IdAllocator): Circuit {
  const copy = cloneCircuit(circuit)
  const remap = new Map<ComponentId, ComponentId>()
  copy.id = ids.allocateCircuitId()
  for (const component of copy.components) {
    const id = ids.allocateComponentId()
    remap.set(component.id, id)
    component.id = id
  }
  for (const connector of copy.connectors) {
    connector.id = ids.allocateConnectorId()
    connector.source.componentId = remap.get(connector.source.componentId) ?? connector.source.componentId
    connector.sink.componentId = remap.get(connector.sink.componentId) ?? connector.sink.componentId
  }
  return copy
}

/**
 * Add the circuits of `incoming` to `project`, dependencies first. A circuit
 * whose name already exists in the project is skipped and the existing one
 * is used by anything that references it.
 */
export function importCircuits(project: Project, incoming: Project, ids: IdAllocator): ImportResolution {
  const names = collectDependencies(
    incoming.circuits.map((c) => c.name),
    incoming
  )
  const imported: string[] = []
  const skippedNames: string[] = []

  for (const name of names) {
    const circuit = getCircuitByName(incoming, name)
    if (!circuit) continue
    if (getCircuitByName(project, name)) {
      skippedNames.push(name)
      continue
    }
    addCircuit(project, reassignIds(circuit, ids))
    imported.push(name)
  }
  return { imported, skippedNames }
}
