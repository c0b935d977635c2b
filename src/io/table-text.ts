/**
 * Shared tokenizing helpers for whitespace/comma separated blade tables.
 */

const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const COMMENT_PREFIXES = ['#', '!', '//']

const UNIT_KEYS = ['deg', 'adim', 'unit', 'lb', 'slug', 'ft', 'm', 'kg', '**', '[]', 'rad', 'in', 'mm', 'cm']

export function tokenize(line: string): string[] {
  return line.replace(/,/g, ' ').split(/\s+/).filter(t => t.length > 0)
}

export function isNumericToken(token: string): boolean {
  return NUMBER_RE.test(token)
}

export function isNumericRow(tokens: readonly string[]): boolean {
  return tokens.length > 0 && tokens.every(isNumericToken)
}

export function isCommentLine(line: string): boolean {
  const t = line.trim()
  return COMMENT_PREFIXES.some(p => t.startsWith(p))
}

/**
 * Non-numeric line that reads like a units row (lb, ft, DEG, ADIM, …).
 * Any units-like substring counts.
 */
export function looksLikeUnitsLine(tokens: readonly string[]): boolean {
  const text = tokens.join(' ').toLowerCase()
  return UNIT_KEYS.some(k => text.includes(k))
}

/** Uppercase, alphanumerics only: "…ROTAN" → "ROTAN", "kg/m" → "KGM" */
export function normalizeName(token: string): string {
  return token.toUpperCase().replace(/[^A-Z0-9]/g, '')
}

/** Column j of ragged rows; short rows read as 0 */
export function column(rows: readonly number[][], j: number): number[] {
  return rows.map(r => (j < r.length ? r[j] : 0))
}
