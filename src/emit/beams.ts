/**
 * blade.beam: one beam3 per element.
 *
 * Nodes are placed from NEUTR+i with the shear-centre offset; the two
 * constitutive blocks are assembled at the element's Gauss stations.
 */

import type { BladeGrid } from '../blade/types.ts'
import type { Matrix6 } from '../blade/constitutive.ts'
import { constitutiveAt, shearCentreOffset } from '../blade/constitutive.ts'
import { banner, elementNodeIds, fx, joinLines, label, sci } from './format.ts'

export function formatMatrixBlock(K: Matrix6, comment: string): string[] {
  const lines = [`        linear elastic generic, matr,  ${comment}`]
  K.forEach((row, r) => {
    const end = r < K.length - 1 ? ',' : ';'
    lines.push(`            ${row.map(sci).join(', ')}${end}`)
  })
  return lines
}

function beamNode(grid: BladeGrid, name: string, id: number, x: number): string[] {
  const off = shearCentreOffset(grid, x)
  const neutr = label(name, id, 'NEUTR')
  return [
    `    ${label(name, id)}`,
    `        position, reference, ${neutr}, 0., ${fx(off.y)}, ${fx(off.z)},`,
    `        orientation, reference, ${neutr}, eye,`,
  ]
}

/**
 * @param nu  Poisson ratio for the shear stiffness terms
 */
export function formatBeams(grid: BladeGrid, name: string, nu: number): string {
  const lines = banner('blade.beam', name)

  grid.elements.forEach(([x1, xm, x2], k) => {
    const e = k + 1
    const [n1, n2, n3] = elementNodeIds(e)
    const [ev1, ev2] = grid.evalPoints[k]

    lines.push(
      `# element ${e}: x1=${fx(x1)} xm=${fx(xm)} x2=${fx(x2)}`,
      'beam3:',
      `    ${label(name, e)},`,
      ...beamNode(grid, name, n1, x1),
      ...beamNode(grid, name, n2, xm),
      ...beamNode(grid, name, n3, x2),
      '        from nodes,',
      ...formatMatrixBlock(constitutiveAt(grid, ev1, nu), `# sec I @ r=${fx(ev1)}`),
      ...formatMatrixBlock(constitutiveAt(grid, ev2, nu), `# sec II @ r=${fx(ev2)}`),
      '',
    )
  })

  return joinLines(lines)
}
