/**
 * Mass lumping: distributed mass/inertia per unit span → one body per node.
 *
 * Node i owns the half-interval [x_L, x_R] between the midpoints to its
 * neighbours (the first and last nodes clamp to the end sections).
 * Endpoint-mean rule over that interval:
 *
 *   dL = x_R − x_L
 *   M  = mean(dM)  · dL
 *   JX = mean(dJX) · dL
 *   JY = mean(dJY) · dL + M·dL²/12
 *   JZ = mean(dJZ) · dL + M·dL²/12
 *
 * The dL²/12 term is the slender-rod inertia of the lumped segment about
 * its own centre.
 */

import type { BladeGrid } from './types.ts'

export interface NodeBody {
  /** 1-based node index, matching the emitted labels */
  index: number
  x: number
  xL: number
  xR: number
  dL: number
  mass: number
  JX: number
  JY: number
  JZ: number
}

export interface LumpedBodies {
  bodies: NodeBody[]
  totalMass: number
}

function mean2(a: number, b: number): number {
  return 0.5 * (a + b)
}

/**
 * Half-interval owned by node i (0-based).
 */
export function nodeInterval(nodes: readonly number[], sections: readonly number[], i: number): { xL: number; xR: number } {
  const n = nodes.length
  const xL = i === 0 ? sections[0] : 0.5 * (nodes[i - 1] + nodes[i])
  const xR = i === n - 1 ? sections[sections.length - 1] : 0.5 * (nodes[i] + nodes[i + 1])
  return { xL, xR }
}

/**
 * Lump the structural mass distribution onto every grid node.
 */
export function lumpNodeBodies(grid: BladeGrid): LumpedBodies {
  const ev = grid.evaluateStructural
  const bodies: NodeBody[] = []
  let totalMass = 0

  for (let i = 0; i < grid.nodes.length; i++) {
    const { xL, xR } = nodeInterval(grid.nodes, grid.sections, i)
    const dL = Math.max(0, xR - xL)

    let mass = 0, JX = 0, JY = 0, JZ = 0
    if (dL > 0) {
      mass = Math.max(0, mean2(ev('dM', xL), ev('dM', xR)) * dL)
      JX = Math.max(0, mean2(ev('dJX', xL), ev('dJX', xR)) * dL)
      const rod = (mass * dL * dL) / 12
      JY = Math.max(0, mean2(ev('dJY', xL), ev('dJY', xR)) * dL + rod)
      JZ = Math.max(0, mean2(ev('dJZ', xL), ev('dJZ', xR)) * dL + rod)
    }

    totalMass += mass
    bodies.push({ index: i + 1, x: grid.nodes[i], xL, xR, dL, mass, JX, JY, JZ })
  }

  return { bodies, totalMass }
}
