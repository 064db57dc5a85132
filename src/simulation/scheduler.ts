import { SIMULATION_TICK_MS } from '../config'

// Anything that can be run continuously: a SimulationContext or the workbench store
export interface SchedulerTarget {
  start(): void
  stop(): void
  step(): void
  isRunning(): boolean
}

/**
 * Drives a target's step() on a fixed interval while it reports running.
 * The core never schedules itself; this is the periodic caller.
 */
export class SimulationScheduler {
  private readonly target: SchedulerTarget
  private readonly intervalMs: number
  private timer: ReturnType<typeof setInterval> | null = null

  constructor(target: SchedulerTarget, intervalMs: number = SIMULATION_TICK_MS) {
    this.target = target
    this.intervalMs = intervalMs
  }

  isActive(): boolean {
    return this.timer !== null
  }

  start(): void {
    this.target.start()
    if (this.timer) return
    this.timer = setInterval(() => this.tick(), this.intervalMs)
  }

  stop(): void {
    this.clearTimer()
    this.target.stop()
  }

  // Stop ticking; the target is only told if it still thinks it is running
  dispose(): void {
    this.clearTimer()
    if (this.target.isRunning()) {
      this.target.stop()
    }
  }

  private tick(): void {
    if (!this.target.isRunning()) {
      this.clearTimer()
      return
    }
    this.target.step()
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }
}
