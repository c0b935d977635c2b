/**
 * Beam cross-section constitutive matrix.
 *
 * Generalized strains (ε, γy, γz, κx, κy, κz) → (N, Ty, Tz, Mx, My, Mz).
 * Axial/bending terms are coupled through the neutral-axis offset from
 * the shear centre:  Y1 = YCT − YNA,  Z1 = ZCT − ZNA.
 *
 * This module is I/O-free.
 */

import type { BladeGrid } from './types.ts'

const DEG2RAD = Math.PI / 180

export type Matrix6 = number[][]

export interface SectionStiffness {
  EA: number      // axial stiffness
  EJY: number     // flapwise bending stiffness
  EJZ: number     // chordwise bending stiffness
  GJ: number      // torsional stiffness
  Y1: number      // shear centre − neutral axis, y
  Z1: number      // shear centre − neutral axis, z
  rotanDeg: number // principal-axis rotation [deg]
}

// ─── Assembly ────────────────────────────────────────────────────────────────

/**
 * Symmetric 6×6 stiffness at one evaluation point.
 *
 *   GA  = EA / (2(1+ν))                    (both shear terms)
 *   A22 = EJY·c² + EJZ·s² + Z1²·EA
 *   A33 = EJZ·c² + EJY·s² + Y1²·EA
 *   A23 = (EJY − EJZ)·c·s − Y1·Z1·EA
 */
export function assembleConstitutive(p: SectionStiffness, nu: number): Matrix6 {
  const c = Math.cos(p.rotanDeg * DEG2RAD)
  const s = Math.sin(p.rotanDeg * DEG2RAD)

  const GA = p.EA / (2 * (1 + nu))

  const A22 = p.EJY * c * c + p.EJZ * s * s + p.Z1 * p.Z1 * p.EA
  const A33 = p.EJZ * c * c + p.EJY * s * s + p.Y1 * p.Y1 * p.EA
  const A23 = (p.EJY - p.EJZ) * c * s - p.Y1 * p.Z1 * p.EA

  const K15 = p.Z1 * p.EA
  const K16 = -p.Y1 * p.EA

  return [
    [p.EA, 0,  0,  0,    K15, K16],
    [0,    GA, 0,  0,    0,   0  ],
    [0,    0,  GA, 0,    0,   0  ],
    [0,    0,  0,  p.GJ, 0,   0  ],
    [K15,  0,  0,  0,    A22, A23],
    [K16,  0,  0,  0,    A23, A33],
  ]
}

// ─── Grid Evaluation ─────────────────────────────────────────────────────────

/**
 * Shear-centre offset from the neutral axis at span position x.
 */
export function shearCentreOffset(grid: BladeGrid, x: number): { y: number; z: number } {
  const ev = grid.evaluateStructural
  return {
    y: ev('YCT', x) - ev('YNA', x),
    z: ev('ZCT', x) - ev('ZNA', x),
  }
}

export function sectionStiffnessAt(grid: BladeGrid, x: number): SectionStiffness {
  const ev = grid.evaluateStructural
  const off = shearCentreOffset(grid, x)
  return {
    EA: ev('EA', x),
    EJY: ev('EJY', x),
    EJZ: ev('EJZ', x),
    GJ: ev('GJ', x),
    Y1: off.y,
    Z1: off.z,
    rotanDeg: ev('ROTAN_deg', x),
  }
}

/** Interpolate properties at x and assemble the 6×6 matrix */
export function constitutiveAt(grid: BladeGrid, x: number, nu: number): Matrix6 {
  return assembleConstitutive(sectionStiffnessAt(grid, x), nu)
}
