import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { buildNotGate } from '../test/builders'
import { SimulationContext } from './context'
import { SimulationScheduler } from './scheduler'

describe('SimulationScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function setup(intervalMs?: number) {
    const context = new SimulationContext(buildNotGate().circuit)
    const step = vi.spyOn(context, 'step')
    const scheduler = new SimulationScheduler(context, intervalMs)
    return { context, step, scheduler }
  }

  it('should step every tick while running', () => {
    const { context, step, scheduler } = setup()
    scheduler.start()
    expect(context.isRunning()).toBe(true)

    vi.advanceTimersByTime(350)
    expect(step).toHaveBeenCalledTimes(3)
    scheduler.stop()
  })

  it('should stop stepping after stop', () => {
    const { context, step, scheduler } = setup()
    scheduler.start()
    vi.advanceTimersByTime(100)
    scheduler.stop()

    vi.advanceTimersByTime(500)
    expect(step).toHaveBeenCalledTimes(1)
    expect(context.isRunning()).toBe(false)
    expect(scheduler.isActive()).toBe(false)
  })

  it('should keep a single interval when started twice', () => {
    const { step, scheduler } = setup(50)
    scheduler.start()
    scheduler.start()

    vi.advanceTimersByTime(100)
    expect(step).toHaveBeenCalledTimes(2)
    scheduler.stop()
  })

  it('should stop ticking once the target stops on its own', () => {
    const { context, step, scheduler } = setup()
    scheduler.start()
    context.stop()

    vi.advanceTimersByTime(300)
    expect(step).not.toHaveBeenCalled()
    expect(scheduler.isActive()).toBe(false)
  })

  it('should not notify twice when disposed after the target stopped', () => {
    const { context, scheduler } = setup()
    const listener = vi.fn()
    context.addListener(listener)
    scheduler.start()
    context.stop()

    scheduler.dispose()
    // start and stop only
    expect(listener).toHaveBeenCalledTimes(2)
  })

  it('should stop a running target when disposed', () => {
    const { context, scheduler } = setup()
    scheduler.start()
    scheduler.dispose()
    expect(context.isRunning()).toBe(false)
    expect(scheduler.isActive()).toBe(false)
  })
})
