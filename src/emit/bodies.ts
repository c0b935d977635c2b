/**
 * blade.body: one lumped body per grid node, attached to BODY+i.
 */

import type { BladeGrid } from '../blade/types.ts'
import { lumpNodeBodies } from '../blade/lumping.ts'
import { banner, fx, joinLines, label, sci } from './format.ts'

export function formatBodies(grid: BladeGrid, name: string): string {
  const { bodies, totalMass } = lumpNodeBodies(grid)
  const lines = banner('blade.body', name)

  for (const b of bodies) {
    const ref = label(name, b.index, 'BODY')
    lines.push(
      `# node ${b.index}: x=[${fx(b.xL)}, ${fx(b.xR)}], dL=${fx(b.dL)}`,
      `body: ${label(name, b.index)}, ${label(name, b.index)}`,
      '    ,',
      `    ${sci(b.mass)},`,
      `    reference, ${ref}, 0., 0., 0.,`,
      `    reference, ${ref},`,
      `        diag, ${sci(b.JX)}, ${sci(b.JY)}, ${sci(b.JZ)}`,
      ';',
      '',
    )
  }

  lines.push(`# total_mass = ${sci(totalMass)}`)
  return joinLines(lines)
}
