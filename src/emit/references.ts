/**
 * Reference frames and structural nodes.
 *
 * Per grid node i (1-based):
 *   FEATH+i  at x = nodes[i], rotated about x by ROTAPI_deg(x)
 *   NEUTR+i  FEATH+i translated by (0, YNA, ZNA)
 *   BODY+i   FEATH+i translated by (0, YCG, ZCG)
 *   AERO+i   co-located and co-oriented with FEATH+i
 *
 * One dynamic structural node per grid node, placed at NEUTR+i.
 */

import type { BladeGrid } from '../blade/types.ts'
import { banner, fx, joinLines, label } from './format.ts'

const DEG2RAD = Math.PI / 180

function offsetReference(name: string, kind: string, i: number, y: number, z: number): string[] {
  const feath = label(name, i, 'FEATH')
  return [
    `reference: ${label(name, i, kind)}, #gen ref`,
    `    reference, ${feath}, 0., ${fx(y)}, ${fx(z)},`,
    `    reference, ${feath}, eye,`,
    `    reference, ${feath}, null,`,
    `    reference, ${feath}, null;`,
    '',
  ]
}

/**
 * blade.ref: FEATH / NEUTR / BODY frames for every node.
 */
export function formatReferences(grid: BladeGrid, name: string): string {
  const ev = grid.evaluateStructural
  const lines = banner('blade.ref', name)

  grid.nodes.forEach((x, k) => {
    const i = k + 1
    const twist = ev('ROTAPI_deg', x) * DEG2RAD
    lines.push(
      `reference: ${label(name, i, 'FEATH')}, #gen ref`,
      `    reference, CURR_ROTOR + BASE, ${fx(x)}, 0., 0.,`,
      '    reference, CURR_ROTOR + BASE,',
      '        1, 1., 0., 0.,',
      `        2, 0., ${fx(Math.cos(twist))}, ${fx(Math.sin(twist))},`,
      '    reference, CURR_ROTOR + BASE, null,',
      '    reference, CURR_ROTOR + BASE, null;',
      '',
    )
    lines.push(...offsetReference(name, 'NEUTR', i, ev('YNA', x), ev('ZNA', x)))
    lines.push(...offsetReference(name, 'BODY', i, ev('YCG', x), ev('ZCG', x)))
  })

  return joinLines(lines)
}

/**
 * blade.nod: dynamic structural nodes at NEUTR+i.
 */
export function formatNodes(grid: BladeGrid, name: string): string {
  const lines = banner('blade.nod', name)
  grid.nodes.forEach((_x, k) => {
    const i = k + 1
    const neutr = label(name, i, 'NEUTR')
    lines.push(
      `structural:  ${label(name, i)}, dynamic,`,
      `    reference, ${neutr}, null,`,
      `    reference, ${neutr}, eye,`,
      `    reference, ${neutr}, null,`,
      `    reference, ${neutr}, null;`,
      '',
    )
  })
  return joinLines(lines)
}

/**
 * blade_aero.ref: AERO+i frames coincident with FEATH+i.
 */
export function formatAeroReferences(grid: BladeGrid, name: string): string {
  const lines = banner('blade_aero.ref', name)
  grid.nodes.forEach((_x, k) => {
    const i = k + 1
    const feath = label(name, i, 'FEATH')
    lines.push(
      `reference: ${label(name, i, 'AERO')}, #gen ref`,
      `    reference, ${feath}, 0., 0., 0.,`,
      `    reference, ${feath}, eye,`,
      '    reference, CURR_ROTOR + BASE, null,',
      '    reference, CURR_ROTOR + BASE, null;',
      '',
    )
  })
  return joinLines(lines)
}
