/**
 * Sample table normalization.
 *
 * Rows are stable-sorted by station, then rows sharing a station are
 * collapsed to the arithmetic mean of every field.
 */

import type { SampleSeries, SampleTable } from './types.ts'
import { DataShapeError, UnknownSignalError } from './errors.ts'

// ─── Normalization ───────────────────────────────────────────────────────────

/**
 * Validate, sort and deduplicate raw columns into a SampleTable.
 *
 * @param x       Raw stations (any order, duplicates allowed)
 * @param fields  Columns keyed by signal name, each the same length as x
 */
export function normalizeTable(
  x: readonly number[],
  fields: Readonly<Record<string, readonly number[]>>,
): SampleTable {
  if (x.length === 0) {
    throw new DataShapeError('Sample table has no stations')
  }
  const names = Object.keys(fields)
  for (const name of names) {
    const col = fields[name]
    if (col.length !== x.length) {
      throw new DataShapeError(
        `Field '${name}' has ${col.length} values but there are ${x.length} stations`,
      )
    }
    if (!col.some(v => Number.isFinite(v))) {
      throw new DataShapeError(`Field '${name}' has no finite values`)
    }
  }

  // Rows with a non-finite station cannot be placed on the span
  const rows: number[] = []
  for (let i = 0; i < x.length; i++) {
    if (Number.isFinite(x[i])) rows.push(i)
  }
  if (rows.length === 0) {
    throw new DataShapeError('Sample table has no finite stations')
  }

  // Array.prototype.sort is stable; ties keep their input order
  rows.sort((a, b) => x[a] - x[b])

  const xs: number[] = []
  const sums: Record<string, number[]> = {}
  const counts: number[] = []
  for (const name of names) sums[name] = []

  for (const row of rows) {
    const xi = x[row]
    const last = xs.length - 1
    if (last >= 0 && xs[last] === xi) {
      counts[last] += 1
      for (const name of names) sums[name][last] += fields[name][row]
    } else {
      xs.push(xi)
      counts.push(1)
      for (const name of names) sums[name].push(fields[name][row])
    }
  }

  const out: Record<string, number[]> = {}
  for (const name of names) {
    out[name] = sums[name].map((s, k) => s / counts[k])
  }

  return { x: xs, fields: out }
}

/**
 * Normalize a single (x, y) series.
 */
export function normalizeSeries(x: readonly number[], y: readonly number[]): SampleSeries {
  const table = normalizeTable(x, { y })
  return { x: table.x, y: table.fields.y }
}

// ─── Access ──────────────────────────────────────────────────────────────────

export function hasSignal(table: SampleTable, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(table.fields, name)
}

/**
 * One field of a table as a SampleSeries over the shared stations.
 */
export function seriesOf(table: SampleTable, name: string): SampleSeries {
  if (!hasSignal(table, name)) {
    throw new UnknownSignalError(name, Object.keys(table.fields))
  }
  return { x: table.x, y: table.fields[name] }
}

/** [min, max] of the table's stations */
export function domainOf(table: SampleTable): { min: number; max: number } {
  return { min: table.x[0], max: table.x[table.x.length - 1] }
}
