import type { Circuit } from '../types'
import type { SimulationContext } from './context'

// === Loader ===
// Supplied by the owning application; may return null or throw when the
// named circuit is unavailable.
export interface CircuitLoader {
  loadCircuit(name: string): Circuit | null
}

// === Listener ===
export type SimulationListener = (context: SimulationContext) => void

// === Options ===
export interface SimulationOptions {
  loader?: CircuitLoader
  // Names of the circuits enclosing this one, outermost first
  ancestry?: readonly string[]
}

// === Fixed-point settling ===
export interface SettleResult {
  converged: boolean
  iterations: number
}
