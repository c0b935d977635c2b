/**
 * blade.aerobeam: one aerodynamic beam3 per element.
 *
 * Chord is piecewise linear over ξ ∈ {−1, 0, +1} (end, mid, end);
 * BC = −0.5·chord; AC and twist are constant zero, the FEATH frames
 * carry the structural pitch.
 */

import type { BladeGrid, SignalEvaluator } from '../blade/types.ts'
import { banner, elementNodeIds, finiteOr0, fx, joinLines, label } from './format.ts'

const AERO_REF_LINE = '        1, 0., 1., 0., 3, 1., 0., 0.,'

function piecewise3(v1: number, vm: number, v2: number): string[] {
  return [
    '    piecewise linear, 3,',
    `        -1.0000000000, ${fx(v1)},`,
    `         0.0000000000, ${fx(vm)},`,
    `         1.0000000000, ${fx(v2)},`,
  ]
}

/**
 * Returns null when the grid has no aero interpolator; there is nothing
 * to write for a blade without aerodynamic data.
 */
export function formatAeroBeams(grid: BladeGrid, name: string, chordSignal = 'Chord'): string | null {
  const aero: SignalEvaluator | null = grid.evaluateAero
  if (!aero) return null

  const lines = banner('blade.aerobeam', name)
  grid.elements.forEach(([x1, xm, x2], k) => {
    const e = k + 1
    const [n1, n2, n3] = elementNodeIds(e)
    const c1 = finiteOr0(aero(chordSignal, x1))
    const cm = finiteOr0(aero(chordSignal, xm))
    const c2 = finiteOr0(aero(chordSignal, x2))

    lines.push(
      `# element ${e}: x1=${fx(x1)} xm=${fx(xm)} x2=${fx(x2)}`,
      'aerodynamic beam3:',
      `    ${label(name, e)},   # aero panel name`,
      `    ${label(name, e)},   # link to structural beam`,
      '    induced velocity, CURR_ROTOR,',
      `    reference, ${label(name, n1, 'AERO')}, null,`,
      AERO_REF_LINE,
      `    reference, ${label(name, n2, 'AERO')}, null,`,
      AERO_REF_LINE,
      `    reference, ${label(name, n3, 'AERO')}, null,`,
      AERO_REF_LINE,
      ...piecewise3(c1, cm, c2),
      '    const, 0.,     # AC',
      ...piecewise3(-0.5 * c1, -0.5 * cm, -0.5 * c2),
      '    const, 0.,     # Twist',
      '',
    )
  })

  return joinLines(lines)
}
