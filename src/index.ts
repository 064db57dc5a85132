export * from './types'
export * from './config'
export {
  createPort,
  createComponent,
  createAndGate,
  createOrGate,
  createNotGate,
  createInputSwitch,
  createLedOutput,
  createSubCircuitComponent,
  moveComponent,
  setSwitchState,
  toggleSwitch,
  PORT_DEFINITIONS,
} from './circuit/components'
export type { ComponentOptions } from './circuit/components'
export {
  connectorColor,
  createConnector,
  propagateConnector,
  setConnectorValue,
  resolvePort,
} from './circuit/connector'
export {
  createCircuit,
  addComponent,
  removeComponent,
  getComponentById,
  findComponentAt,
  addConnector,
  removeConnector,
  getConnectorById,
  getConnectorsFor,
  connect,
  disconnect,
  pruneDanglingConnectors,
  cloneCircuit,
} from './circuit/graph'
export { createProject, addCircuit, removeCircuit, getCircuitById, getCircuitByName } from './circuit/project'
export * from './simulation'
export { IdAllocator } from './utils/idAllocator'
export { computeComponentSize, layoutPorts } from './utils/pinLayout'
export type { ComponentSize } from './utils/pinLayout'
export { validateCircuit, formatValidationError, isBlockingError } from './utils/validation'
export type { ValidationError, ValidationResult } from './utils/validation'
export { collectDependencies, directDependencies, findDependents, wouldCreateCycle } from './utils/circuitDependencies'
export { serializeProject, stringifyProject, parseProjectFile, importCircuits } from './utils/projectFile'
export type {
  ProjectFileFormat,
  SerializedCircuit,
  SerializedComponent,
  SerializedConnector,
  ImportResolution,
} from './utils/projectFile'
export { FileProjectRepository } from './persistence/projectRepository'
export type { ProjectRepository } from './persistence/projectRepository'
export { createWorkbenchStore, selectCurrentCircuit, workbenchSchedulerTarget } from './store'
export type { WorkbenchState, WorkbenchOptions, WorkbenchStore } from './store'
