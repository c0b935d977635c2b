/**
 * Aerodynamic .dat table reader.
 *
 * Header: Radial Chord [Twist Sweep Anhedral], synonyms accepted; an
 * optional units row follows.  Without canonical names the columns are
 * guessed: the most monotonic column is Radial, the most varying of the
 * rest is Chord.
 */

import type { SampleTable } from '../blade/types.ts'
import { TableFormatError } from '../blade/errors.ts'
import { normalizeTable } from '../blade/series.ts'
import { column, isCommentLine, isNumericRow, looksLikeUnitsLine, normalizeName, tokenize } from './table-text.ts'

export type AeroColumn = 'Radial' | 'Chord' | 'Twist' | 'Sweep' | 'Anhedral'

const SYNONYMS: ReadonlyArray<readonly [AeroColumn, ReadonlySet<string>]> = [
  ['Radial', new Set(['RADIAL', 'R', 'STA', 'RADIUS', 'RAD', 'STATION', 'SPAN'])],
  ['Chord', new Set(['CHORD', 'C', 'CRD', 'CHRD', 'CH', 'CHORDM', 'CHORDMM', 'CHORDIN', 'CHORDLENGTH'])],
  ['Twist', new Set(['TWIST', 'THETA', 'PITCH', 'TWISTDEG', 'TWISTANGLE'])],
  ['Sweep', new Set(['SWEEP'])],
  ['Anhedral', new Set(['ANHEDRAL', 'DIHEDRAL', 'ANHD', 'ANH'])],
]

const OPTIONAL_COLUMNS: readonly AeroColumn[] = ['Twist', 'Sweep', 'Anhedral']

export interface AeroTable {
  table: SampleTable
  header: string[]
  warnings: string[]
}

// ─── Header ──────────────────────────────────────────────────────────────────

/**
 * Map header tokens to aero columns; the first token matching a column wins.
 */
export function mapAeroColumns(header: readonly string[]): Partial<Record<AeroColumn, number>> {
  const map: Partial<Record<AeroColumn, number>> = {}
  header.forEach((raw, j) => {
    const key = normalizeName(raw)
    for (const [name, keys] of SYNONYMS) {
      if (keys.has(key)) {
        if (map[name] === undefined) map[name] = j
        break
      }
    }
  })
  return map
}

// ─── Column Heuristics ───────────────────────────────────────────────────────

/** Fraction of non-decreasing steps */
function monotonicScore(col: readonly number[]): number {
  if (col.length < 2) return 0
  let nondec = 0
  for (let k = 1; k < col.length; k++) {
    if (col[k] >= col[k - 1]) nondec++
  }
  return nondec / (col.length - 1)
}

/** Population standard deviation */
function stdDev(col: readonly number[]): number {
  const n = col.length
  const mean = col.reduce((s, v) => s + v, 0) / n
  const v = col.reduce((s, x) => s + (x - mean) * (x - mean), 0) / n
  return Math.sqrt(v)
}

/** First index of the maximum score */
function argMax(indices: readonly number[], score: (j: number) => number): number {
  let best = indices[0]
  for (const j of indices) {
    if (score(j) > score(best)) best = j
  }
  return best
}

/**
 * Guess (radial, chord) column indices.  Returns null chord when there
 * is only one column.
 */
export function guessAeroColumns(cols: readonly number[][]): { radial: number; chord: number | null } {
  const all = cols.map((_, j) => j)
  const radial = argMax(all, j => monotonicScore(cols[j]))
  const rest = all.filter(j => j !== radial)
  if (rest.length === 0) return { radial, chord: null }
  return { radial, chord: argMax(rest, j => stdDev(cols[j])) }
}

// ─── Reader ──────────────────────────────────────────────────────────────────

/**
 * Parse aero .dat text into a normalized table (x = Radial).
 */
export function parseAeroTable(text: string): AeroTable {
  const lines = text
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l.length > 0 && !isCommentLine(l))

  let header: string[] = []
  let i = 0
  if (lines.length > 0 && !isNumericRow(tokenize(lines[0]))) {
    header = tokenize(lines[0])
    i = 1
    while (i < lines.length) {
      const toks = tokenize(lines[i])
      if (isNumericRow(toks)) break
      if (!looksLikeUnitsLine(toks)) header = [...header, ...toks]
      i++
    }
  }

  const rows: number[][] = []
  for (let k = i; k < lines.length; k++) {
    const toks = tokenize(lines[k])
    if (isNumericRow(toks)) rows.push(toks.map(Number))
  }
  if (rows.length === 0) {
    throw new TableFormatError('No numeric data rows found in AERO')
  }

  const warnings: string[] = []
  const ncols = Math.max(...rows.map(r => r.length))
  const cols = Array.from({ length: ncols }, (_, j) => column(rows, j))
  const zeros = () => rows.map(() => 0)

  const idx = mapAeroColumns(header)
  let radial: number[]
  const fields: Record<string, number[]> = {}

  if (idx.Radial === undefined || idx.Chord === undefined) {
    warnings.push('AERO header lacks canonical names; guessing Radial/Chord columns')
    const guess = guessAeroColumns(cols)
    if (guess.chord === null) {
      throw new TableFormatError('AERO: could not infer Radial/Chord columns')
    }
    radial = cols[guess.radial]
    fields.Chord = cols[guess.chord]
    for (const name of OPTIONAL_COLUMNS) fields[name] = zeros()
  } else {
    radial = cols[idx.Radial]
    fields.Chord = cols[idx.Chord]
    for (const name of OPTIONAL_COLUMNS) {
      const j = idx[name]
      if (j === undefined) {
        warnings.push(`AERO missing optional column '${name}', filled with 0`)
        fields[name] = zeros()
      } else {
        fields[name] = cols[j]
      }
    }
  }

  return { table: normalizeTable(radial, fields), header, warnings }
}
