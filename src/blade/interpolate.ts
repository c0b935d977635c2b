/**
 * Clamped linear interpolation over sample series.
 *
 *   x ≤ x₀  → y₀
 *   x ≥ xₙ  → yₙ
 *   else    → linear between the bracketing samples
 *
 * Used by section selection (jump / midpoint error evaluation) and by
 * every emitter through the grid's bound closures.
 */

import type { SampleSeries, SampleTable, SignalEvaluator } from './types.ts'
import { UnknownSignalError } from './errors.ts'
import { normalizeTable } from './series.ts'

// ─── Single Series ───────────────────────────────────────────────────────────

/**
 * Index i such that x[i] ≤ xq < x[i+1].  Caller guarantees x₀ < xq < xₙ.
 */
function bracket(x: readonly number[], xq: number): number {
  let lo = 0
  let hi = x.length - 1
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1
    if (x[mid] <= xq) lo = mid
    else hi = mid
  }
  return lo
}

/**
 * Clamped linear estimate of a normalized series at xq.
 */
export function interpolateSeries(series: SampleSeries, xq: number): number {
  const { x, y } = series
  const n = x.length
  if (xq <= x[0]) return y[0]
  if (xq >= x[n - 1]) return y[n - 1]
  const i = bracket(x, xq)
  const t = (xq - x[i]) / (x[i + 1] - x[i])
  return y[i] + (y[i + 1] - y[i]) * t
}

// ─── Bound Closure ───────────────────────────────────────────────────────────

export interface Interpolator {
  evaluate: SignalEvaluator
  has(signal: string): boolean
  signals(): string[]
  domain: { min: number; max: number }
}

/**
 * Bind a table to a query closure.
 *
 * The table is normalized again here, so raw columns can be passed
 * directly.  Throws DataShapeError on empty or mismatched columns.
 */
export function createInterpolator(table: SampleTable): Interpolator {
  const normalized = normalizeTable(table.x, table.fields)
  const series = new Map<string, SampleSeries>()
  for (const name of Object.keys(normalized.fields)) {
    series.set(name, { x: normalized.x, y: normalized.fields[name] })
  }
  const xs = normalized.x

  return {
    evaluate(signal: string, xq: number): number {
      const s = series.get(signal)
      if (!s) throw new UnknownSignalError(signal, [...series.keys()])
      return interpolateSeries(s, xq)
    },
    has: (signal: string) => series.has(signal),
    signals: () => [...series.keys()],
    domain: { min: xs[0], max: xs[xs.length - 1] },
  }
}
