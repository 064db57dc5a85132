export { evaluateGate, executeComponent, executeInputSwitch, executeLedOutput } from './evaluator'
export type { SubCircuitExecutor } from './evaluator'
export {
  SimulationContext,
  clearCircuitState,
  snapshotSignals,
  ensureSubCircuitLoaded,
  updateSubCircuit,
  reloadSubCircuit,
  executeSubCircuit,
} from './context'
export { createProjectLoader } from './loader'
export { SimulationScheduler } from './scheduler'
export type { SchedulerTarget } from './scheduler'
export { generateTruthTable, deriveBooleanExpression, formatTruthTable } from './truthTable'
export type { TruthTable, TruthTableRow, TruthTableOptions, SettleMode } from './truthTable'
export type { CircuitLoader, SimulationListener, SimulationOptions, SettleResult } from './types'
