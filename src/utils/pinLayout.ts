import type { Point, Port } from '../types'
import { COMPONENT_WIDTH, GRID_SIZE } from '../config'

const MIN_HEIGHT = GRID_SIZE * 2
const PORT_SPACING = GRID_SIZE

export interface ComponentSize {
  width: number
  height: number
}

interface LayoutTarget {
  position: Point
  inputs: Port[]
  outputs: Port[]
}

export function computeComponentSize(inputCount: number, outputCount: number): ComponentSize {
  const maxPorts = Math.max(inputCount, outputCount, 1)
  return {
    width: COMPONENT_WIDTH,
    height: Math.max(MIN_HEIGHT, maxPorts * PORT_SPACING),
  }
}

function portOffsetY(index: number): number {
  return PORT_SPACING / 2 + index * PORT_SPACING
}

/**
 * Place input ports on the left edge and output ports on the right edge,
 * one grid step apart, relative to the component's top-left corner.
 */
export function layoutPorts(target: LayoutTarget): void {
  const { x, y } = target.position
  target.inputs.forEach((port, i) => {
    port.position = { x, y: y + portOffsetY(i) }
  })
  target.outputs.forEach((port, i) => {
    port.position = { x: x + COMPONENT_WIDTH, y: y + portOffsetY(i) }
  })
}
