/**
 * Structural .tip table reader.
 *
 * Finds every "BLADE … STRUCT … Y" heading followed by a TABLE … ENDTABLE
 * block (header row, units row, data rows), prefers the metric block, maps
 * columns by name, and applies the X/Z → y/z axis mapping once so that
 * downstream code only sees beam-local names:
 *
 *   EJY ← EJX   EJZ ← EJZ   YNA ← ZNA   ZNA ← XNA   YCT ← ZCT   ZCT ← XCT
 *   YCG ← ZCG   ZCG ← XCG   dJX ← JP    dJY ← JZ    dJZ ← JX    dM  ← WEIGHT
 */

import type { SampleTable } from '../blade/types.ts'
import { TableFormatError } from '../blade/errors.ts'
import { normalizeTable } from '../blade/series.ts'
import { column, isCommentLine, isNumericRow, normalizeName, tokenize } from './table-text.ts'

/** Source column names, in the fixed order of the reference metric table */
export const TIP_COLUMNS = [
  'SEC', 'STA', 'WEIGHT', 'XCG', 'ZCG', 'ROTAPI', 'JX', 'JZ', 'JP',
  'EA', 'XNA', 'ZNA', 'ROTAN', 'EJZ', 'EJX', 'GJ', 'XCT', 'ZCT',
] as const

type TipColumn = typeof TIP_COLUMNS[number]

/** Beam-local field ← source column */
const AXIS_MAP: ReadonlyArray<readonly [string, TipColumn]> = [
  ['dM', 'WEIGHT'],
  ['YCG', 'ZCG'],
  ['ZCG', 'XCG'],
  ['ROTAPI_deg', 'ROTAPI'],
  ['ROTAN_deg', 'ROTAN'],
  ['dJX', 'JP'],
  ['dJY', 'JZ'],
  ['dJZ', 'JX'],
  ['EA', 'EA'],
  ['EJY', 'EJX'],
  ['EJZ', 'EJZ'],
  ['GJ', 'GJ'],
  ['YNA', 'ZNA'],
  ['ZNA', 'XNA'],
  ['YCT', 'ZCT'],
  ['ZCT', 'XCT'],
]

export interface TipBlock {
  header: string[]
  units: string[]
  rows: number[][]
}

export interface TipTable {
  table: SampleTable
  unitsRow: string[]
  warnings: string[]
}

// ─── Block Scan ──────────────────────────────────────────────────────────────

function isStructHeading(line: string): boolean {
  const u = line.toUpperCase()
  return u.includes('BLADE') && u.includes('STRUCT') && /\bY\b/.test(u)
}

function isEndTable(line: string): boolean {
  return line.toUpperCase().includes('ENDTABLE')
}

/**
 * Every STRUCT Y table block with at least one numeric data row.
 */
export function findTipBlocks(text: string): TipBlock[] {
  const lines = text.split(/\r?\n/)
  const blocks: TipBlock[] = []

  let i = 0
  while (i < lines.length) {
    if (!isStructHeading(lines[i])) {
      i++
      continue
    }
    let j = i + 1
    while (j < lines.length && !lines[j].toUpperCase().includes('TABLE')) j++
    if (j >= lines.length) break

    const header = j + 1 < lines.length ? tokenize(lines[j + 1]) : []
    const units = j + 2 < lines.length ? tokenize(lines[j + 2]) : []
    const rows: number[][] = []
    let k = j + 3
    while (k < lines.length && !isEndTable(lines[k])) {
      const line = lines[k]
      if (line.trim() && !isCommentLine(line)) {
        const toks = tokenize(line)
        if (isNumericRow(toks)) rows.push(toks.map(Number))
      }
      k++
    }
    if (rows.length > 0) blocks.push({ header, units, rows })
    i = k + 1
  }

  return blocks
}

/** Metric units row: station in M, weight in KG/M */
function isMetric(units: readonly string[]): boolean {
  const u = units.map(normalizeName)
  return u.length >= 3 && u[1].includes('M') && u[2].includes('KGM')
}

// ─── Column Mapping ──────────────────────────────────────────────────────────

/**
 * Map source column names to header indices: exact match first, then
 * substring (headers may carry prefixes like "…ROTAN").
 */
export function mapTipColumns(header: readonly string[]): Partial<Record<TipColumn, number>> {
  const norm = header.map(normalizeName)
  const map: Partial<Record<TipColumn, number>> = {}
  for (const want of TIP_COLUMNS) {
    let idx = norm.indexOf(want)
    if (idx < 0) idx = norm.findIndex(h => h.includes(want))
    if (idx >= 0) map[want] = idx
  }
  return map
}

function fixedOrderMap(): Partial<Record<TipColumn, number>> {
  const map: Partial<Record<TipColumn, number>> = {}
  TIP_COLUMNS.forEach((name, i) => { map[name] = i })
  return map
}

// ─── Reader ──────────────────────────────────────────────────────────────────

/**
 * Parse .tip text into a normalized structural table keyed by beam-local
 * names.  Throws TableFormatError when no block or no STA/WEIGHT mapping.
 */
export function parseTipTable(text: string): TipTable {
  const blocks = findTipBlocks(text)
  if (blocks.length === 0) {
    throw new TableFormatError('No STRUCT Y TABLE found in TIP')
  }

  const chosen = blocks.find(b => isMetric(b.units)) ?? blocks[0]
  const warnings: string[] = []
  if (!isMetric(chosen.units)) {
    warnings.push('TIP: no metric STRUCT Y table found; using the first table as-is')
  }

  let idx = mapTipColumns(chosen.header)
  if (idx.STA === undefined || idx.WEIGHT === undefined) {
    if (chosen.rows.every(r => r.length >= TIP_COLUMNS.length)) {
      warnings.push('TIP: header mapping failed; using the fixed column order')
      idx = fixedOrderMap()
    } else {
      throw new TableFormatError('TIP header mapping failed: cannot locate STA/WEIGHT')
    }
  }

  const rows = chosen.rows
  const source = (name: TipColumn): number[] => {
    const j = idx[name]
    return j === undefined ? rows.map(() => 0) : column(rows, j)
  }

  const fields: Record<string, number[]> = {}
  for (const [target, from] of AXIS_MAP) fields[target] = source(from)

  return {
    table: normalizeTable(source('STA'), fields),
    unitsRow: chosen.units,
    warnings,
  }
}
