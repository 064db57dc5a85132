// === Simulation ===
export const SIMULATION_TICK_MS = 100
export const TRUTH_TABLE_SETTLE_STEPS = 5
export const SETTLE_ITERATION_LIMIT = 256
export const MAX_TRUTH_TABLE_INPUTS = 16

// === Layout (presentation only) ===
export const GRID_SIZE = 20
export const COMPONENT_WIDTH = 60

// === Connector colors ===
export const CONNECTOR_COLOR_ON = '#22c55e'
export const CONNECTOR_COLOR_OFF = '#64748b'

// === Project files ===
export const PROJECT_FILE_FORMAT = 'logic-circuit-project'
export const PROJECT_FILE_VERSION = 1
export const PROJECT_FILE_EXTENSION = '.lcp'
