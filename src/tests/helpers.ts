/**
 * Shared test tables.
 */

import type { SampleTable } from '../blade/types.ts'

export const STRUCTURAL_FIELDS = [
  'EA', 'EJY', 'EJZ', 'GJ',
  'YNA', 'ZNA', 'YCT', 'ZCT', 'YCG', 'ZCG',
  'ROTAN_deg', 'ROTAPI_deg',
  'dM', 'dJX', 'dJY', 'dJZ',
] as const

/** 0, step, 2·step, …, end */
export function stations(end: number, step: number): number[] {
  const n = Math.round(end / step)
  return Array.from({ length: n + 1 }, (_, i) => i * step)
}

/**
 * Structural table with every field the emitters read.
 * Stiffness defaults to 100, offsets/angles to 0, mass terms to 1.
 */
export function structuralTable(
  x: number[],
  overrides: Partial<Record<string, (xi: number) => number>> = {},
): SampleTable {
  const fields: Record<string, number[]> = {}
  for (const name of STRUCTURAL_FIELDS) {
    const base = ['EA', 'EJY', 'EJZ', 'GJ'].includes(name) ? 100
      : name.startsWith('d') ? 1
      : 0
    const fn = overrides[name]
    fields[name] = x.map(xi => (fn ? fn(xi) : base))
  }
  return { x, fields }
}

export function aeroTable(x: number[], chord: number[]): SampleTable {
  return { x, fields: { Chord: chord } }
}
