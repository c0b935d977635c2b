/**
 * Constitutive matrix and mass lumping tests.
 */

import { describe, it, expect } from 'vitest'
import { assembleConstitutive, constitutiveAt, shearCentreOffset } from '../blade/constitutive.ts'
import { lumpNodeBodies, nodeInterval } from '../blade/lumping.ts'
import { attachInterpolators, buildGrid } from '../blade/grid.ts'
import { stations, structuralTable } from './helpers.ts'

const BASE = { EA: 10, EJY: 2, EJZ: 3, GJ: 4, Y1: 0.5, Z1: 0.2, rotanDeg: 0 }

// ─── Constitutive ────────────────────────────────────────────────────────────

describe('assembleConstitutive', () => {
  it('couples axial and bending through the shear-centre offset', () => {
    const K = assembleConstitutive(BASE, 0.25)
    expect(K[0][0]).toBe(10)
    expect(K[1][1]).toBeCloseTo(4, 12)   // 10 / (2 · 1.25)
    expect(K[2][2]).toBeCloseTo(4, 12)
    expect(K[3][3]).toBe(4)
    expect(K[0][4]).toBeCloseTo(2, 12)   // Z1 · EA
    expect(K[0][5]).toBeCloseTo(-5, 12)  // −Y1 · EA
    expect(K[4][4]).toBeCloseTo(2.4, 12) // EJY + Z1² · EA
    expect(K[5][5]).toBeCloseTo(5.5, 12) // EJZ + Y1² · EA
    expect(K[4][5]).toBeCloseTo(-1, 12)  // −Y1 · Z1 · EA
  })

  it('is symmetric', () => {
    const K = assembleConstitutive({ ...BASE, rotanDeg: 30 }, 0.33)
    for (let i = 0; i < 6; i++) {
      for (let j = 0; j < 6; j++) expect(K[i][j]).toBe(K[j][i])
    }
  })

  it('swaps the bending stiffnesses at 90° principal-axis rotation', () => {
    const K = assembleConstitutive({ ...BASE, rotanDeg: 90 }, 0.25)
    expect(K[4][4]).toBeCloseTo(3.4, 10) // EJZ + Z1² · EA
    expect(K[5][5]).toBeCloseTo(4.5, 10) // EJY + Y1² · EA
    expect(K[4][5]).toBeCloseTo(-1, 10)
  })

  it('leaves shear-extension terms at zero', () => {
    const K = assembleConstitutive(BASE, 0.33)
    expect(K[0][1]).toBe(0)
    expect(K[1][2]).toBe(0)
    expect(K[3][4]).toBe(0)
  })
})

describe('grid evaluation', () => {
  const grid = attachInterpolators(
    buildGrid([0, 2]),
    structuralTable(stations(2, 1), { YCT: () => 0.5, YNA: () => 0.1, ZCT: xi => xi, EA: () => 10 }),
    null,
  )

  it('offsets the shear centre from the neutral axis', () => {
    const off = shearCentreOffset(grid, 1.5)
    expect(off.y).toBeCloseTo(0.4, 12)
    expect(off.z).toBeCloseTo(1.5, 12)
  })

  it('assembles from interpolated properties', () => {
    const K = constitutiveAt(grid, 1, 0.25)
    expect(K[0][4]).toBeCloseTo(10, 12)  // Z1 = 1
    expect(K[0][5]).toBeCloseTo(-4, 12)  // Y1 = 0.4
  })
})

// ─── Lumping ─────────────────────────────────────────────────────────────────

describe('lumpNodeBodies', () => {
  const uniform = structuralTable(stations(2, 1), {
    dM: () => 3, dJX: () => 1, dJY: () => 2, dJZ: () => 4,
  })

  it('splits the span at node midpoints and clamps the ends', () => {
    const g = buildGrid([0, 2])
    expect(nodeInterval(g.nodes, g.sections, 0)).toEqual({ xL: 0, xR: 0.5 })
    expect(nodeInterval(g.nodes, g.sections, 1)).toEqual({ xL: 0.5, xR: 1.5 })
    expect(nodeInterval(g.nodes, g.sections, 2)).toEqual({ xL: 1.5, xR: 2 })
  })

  it('lumps mass and inertia with the rod term', () => {
    const { bodies, totalMass } = lumpNodeBodies(attachInterpolators(buildGrid([0, 2]), uniform, null))
    expect(bodies.map(b => b.index)).toEqual([1, 2, 3])
    expect(bodies.map(b => b.mass)).toEqual([1.5, 3, 1.5])
    expect(bodies[0].JX).toBe(0.5)
    expect(bodies[0].JY).toBeCloseTo(1.03125, 12) // 2·0.5 + 1.5·0.25/12
    expect(bodies[1].JY).toBeCloseTo(2.25, 12)    // 2·1 + 3/12
    expect(bodies[1].JZ).toBeCloseTo(4.25, 12)
    expect(totalMass).toBe(6)
  })

  it('keeps total mass equal to the span integral for any section layout', () => {
    const { totalMass } = lumpNodeBodies(attachInterpolators(buildGrid([0, 0.3, 1.1, 2]), uniform, null))
    expect(totalMass).toBeCloseTo(6, 12)
  })

  it('clamps negative distributed mass to zero', () => {
    const table = structuralTable(stations(2, 1), { dM: () => -1 })
    const { bodies } = lumpNodeBodies(attachInterpolators(buildGrid([0, 2]), table, null))
    expect(bodies.every(b => b.mass === 0)).toBe(true)
  })
})
