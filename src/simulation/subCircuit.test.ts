import { describe, it, expect, vi } from 'vitest'
import type { Circuit, SubCircuitComponent, SubCircuitRuntime } from '../types'
import { createInputSwitch, createLedOutput, createSubCircuitComponent, setSwitchState } from '../circuit/components'
import { addComponent, connect, createCircuit } from '../circuit/graph'
import { IdAllocator } from '../utils/idAllocator'
import { buildTwoInputGate, inPort, outPort } from '../test/builders'
import { SimulationContext, ensureSubCircuitLoaded, reloadSubCircuit, updateSubCircuit } from './context'
import { deriveBooleanExpression, generateTruthTable } from './truthTable'
import type { CircuitLoader } from './types'

function loaderFor(...circuits: Circuit[]): CircuitLoader {
  return { loadCircuit: (name) => circuits.find((c) => c.name === name) ?? null }
}

function runtimeOf(component: SubCircuitComponent): SubCircuitRuntime {
  if (component.body.status !== 'loaded') {
    throw new Error(`sub-circuit is ${component.body.status}`)
  }
  return component.body.runtime
}

// Host "Top": switches X1, X2 -> AndBlock -> LED Out
function buildHost(ids = new IdAllocator(100)) {
  const block = buildTwoInputGate('AND', 'AndBlock')
  const top = createCircuit(ids.allocateCircuitId(), 'Top')
  const x1 = createInputSwitch(ids.allocateComponentId(), { name: 'X1' })
  const x2 = createInputSwitch(ids.allocateComponentId(), { name: 'X2' })
  const sub = createSubCircuitComponent(
    ids.allocateComponentId(),
    { circuitName: 'AndBlock' },
    { position: { x: 100, y: 40 } }
  )
  const out = createLedOutput(ids.allocateComponentId(), { name: 'Out' })
  for (const component of [x1, x2, sub, out]) addComponent(top, component)

  const loader = loaderFor(block.circuit)
  ensureSubCircuitLoaded(sub, { loader, ancestry: ['Top'] })
  connect(top, outPort(x1), inPort(sub, 0), ids)
  connect(top, outPort(x2), inPort(sub, 1), ids)
  connect(top, outPort(sub), inPort(out), ids)
  return { block, top, x1, x2, sub, out, loader, ids }
}

describe('sub-circuit loading', () => {
  it('should synthesize one port per switch and LED of the body', () => {
    const { sub } = buildHost()
    expect(sub.body.status).toBe('loaded')
    expect(sub.inputs.map((p) => p.id)).toEqual(['in0', 'in1'])
    expect(sub.outputs.map((p) => p.id)).toEqual(['out0'])
    expect(sub.inputs.map((p) => p.position)).toEqual([
      { x: 100, y: 50 },
      { x: 100, y: 70 },
    ])
    expect(sub.outputs[0]?.position).toEqual({ x: 160, y: 50 })
  })

  it('should load only once', () => {
    const block = buildTwoInputGate('AND', 'AndBlock')
    const loader = { loadCircuit: vi.fn(() => block.circuit) }
    const sub = createSubCircuitComponent(new IdAllocator().allocateComponentId(), { circuitName: 'AndBlock' })

    ensureSubCircuitLoaded(sub, { loader })
    ensureSubCircuitLoaded(sub, { loader })
    expect(loader.loadCircuit).toHaveBeenCalledTimes(1)
    expect(loader.loadCircuit).toHaveBeenCalledWith('AndBlock')
  })

  it('should degrade to no ports when the circuit is missing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const sub = createSubCircuitComponent(new IdAllocator().allocateComponentId(), { circuitName: 'Nope' })

    const body = ensureSubCircuitLoaded(sub, { loader: loaderFor(), ancestry: ['Top'] })
    expect(body).toEqual({ status: 'failed', reason: 'missing', message: 'circuit "Nope" was not found' })
    expect(sub.inputs).toEqual([])
    expect(sub.outputs).toEqual([])
    expect(warn).toHaveBeenCalledWith('Sub-circuit unavailable:', 'circuit "Nope" was not found')
  })

  it('should degrade when there is no loader', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const sub = createSubCircuitComponent(new IdAllocator().allocateComponentId(), { circuitName: 'AndBlock' })
    expect(ensureSubCircuitLoaded(sub, {})).toEqual({
      status: 'failed',
      reason: 'missing',
      message: 'no circuit loader for "AndBlock"',
    })
  })

  it('should contain loader errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const sub = createSubCircuitComponent(new IdAllocator().allocateComponentId(), { circuitName: 'AndBlock' })
    const loader: CircuitLoader = {
      loadCircuit: () => {
        throw new Error('disk unavailable')
      },
    }

    expect(ensureSubCircuitLoaded(sub, { loader })).toEqual({
      status: 'failed',
      reason: 'error',
      message: 'loading "AndBlock" failed: disk unavailable',
    })
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should refuse a circuit that contains itself', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const ids = new IdAllocator()
    const loop = createCircuit(ids.allocateCircuitId(), 'Loop')
    const sub = createSubCircuitComponent(ids.allocateComponentId(), { circuitName: 'Loop' })
    addComponent(loop, sub)

    const context = new SimulationContext(loop, { loader: loaderFor(loop) })
    expect(() => context.step()).not.toThrow()
    expect(sub.body).toEqual({ status: 'failed', reason: 'cycle', message: '"Loop" contains itself (Loop > Loop)' })
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should refuse an indirect self-reference inside the loaded body', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const ids = new IdAllocator()
    const outer = createCircuit(ids.allocateCircuitId(), 'Outer')
    const inner = createCircuit(ids.allocateCircuitId(), 'Inner')
    const innerInOuter = createSubCircuitComponent(ids.allocateComponentId(), { circuitName: 'Inner' })
    addComponent(outer, innerInOuter)
    addComponent(inner, createSubCircuitComponent(ids.allocateComponentId(), { circuitName: 'Outer' }))

    new SimulationContext(outer, { loader: loaderFor(outer, inner) }).step()

    const [nested] = runtimeOf(innerInOuter).body.components
    expect(nested?.kind).toBe('SUB_CIRCUIT')
    if (nested?.kind !== 'SUB_CIRCUIT') return
    expect(nested.body).toEqual({
      status: 'failed',
      reason: 'cycle',
      message: '"Outer" contains itself (Outer > Inner > Outer)',
    })
  })
})

describe('sub-circuit execution', () => {
  it('should behave like the circuit it references', () => {
    const { top, loader } = buildHost()
    const table = generateTruthTable(top, { loader })

    expect(table.inputColumns).toEqual(['X1', 'X2'])
    expect(table.outputColumns).toEqual(['Out'])
    expect(table.rows.map((row) => row.outputs)).toEqual([[false], [false], [false], [true]])
    expect(deriveBooleanExpression(table, 0)).toBe('X1·X2')
  })

  it('should simulate a private copy of the referenced circuit', () => {
    const { block, top, x1, x2, out, loader } = buildHost()
    const context = new SimulationContext(top, { loader })
    setSwitchState(x1, true)
    setSwitchState(x2, true)
    for (let i = 0; i < 5; i++) context.step()

    expect(out.lit).toBe(true)
    expect(block.a.state).toBe(false)
    expect(block.led.lit).toBe(false)
  })

  it('should keep two instances independent', () => {
    const ids = new IdAllocator(200)
    const { top, x1, x2, loader } = buildHost()
    const second = createSubCircuitComponent(ids.allocateComponentId(), { circuitName: 'AndBlock' })
    const secondOut = createLedOutput(ids.allocateComponentId(), { name: 'Out2' })
    addComponent(top, second)
    addComponent(top, secondOut)
    ensureSubCircuitLoaded(second, { loader, ancestry: ['Top'] })
    connect(top, outPort(x1), inPort(second, 0), ids)
    connect(top, outPort(second), inPort(secondOut), ids)

    const context = new SimulationContext(top, { loader })
    setSwitchState(x1, true)
    setSwitchState(x2, true)
    for (let i = 0; i < 5; i++) context.step()

    // The second instance only sees X1
    expect(runtimeOf(second).body).not.toBe(loader.loadCircuit('AndBlock'))
    expect(secondOut.lit).toBe(false)
  })

  it('should clear the body on reset', () => {
    const { top, x1, x2, sub, loader } = buildHost()
    const context = new SimulationContext(top, { loader })
    setSwitchState(x1, true)
    setSwitchState(x2, true)
    for (let i = 0; i < 5; i++) context.step()

    context.reset()
    expect(new Set(runtimeOf(sub).snapshot())).toEqual(new Set([false]))
  })
})

describe('sub-circuit updates', () => {
  it('should rebuild ports from a replacement body', () => {
    const { sub, ids } = buildHost()
    const wide = createCircuit(ids.allocateCircuitId(), 'AndBlock')
    for (const name of ['A', 'B', 'C']) {
      addComponent(wide, createInputSwitch(ids.allocateComponentId(), { name }))
    }
    addComponent(wide, createLedOutput(ids.allocateComponentId()))
    addComponent(wide, createLedOutput(ids.allocateComponentId()))

    updateSubCircuit(sub, wide)
    expect(sub.inputs.map((p) => p.id)).toEqual(['in0', 'in1', 'in2'])
    expect(sub.outputs.map((p) => p.id)).toEqual(['out0', 'out1'])
    expect(runtimeOf(sub).body).toBe(wide)
  })

  it('should fetch the circuit again after a reload', () => {
    const { sub, loader } = buildHost()
    reloadSubCircuit(sub)
    expect(sub.body).toEqual({ status: 'unloaded' })
    expect(sub.inputs).toEqual([])

    ensureSubCircuitLoaded(sub, { loader, ancestry: ['Top'] })
    expect(sub.inputs).toHaveLength(2)
  })
})
