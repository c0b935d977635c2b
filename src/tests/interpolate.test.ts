/**
 * Sample normalization and clamped interpolation tests.
 *
 * Normalization must sort by station and collapse duplicate stations by
 * mean, independent of input order.  Interpolation clamps to the end
 * values and is linear between bracketing samples.
 */

import { describe, it, expect } from 'vitest'
import { normalizeTable, normalizeSeries, seriesOf } from '../blade/series.ts'
import { createInterpolator, interpolateSeries } from '../blade/interpolate.ts'
import { DataShapeError, UnknownSignalError } from '../blade/errors.ts'

// ─── normalizeTable ──────────────────────────────────────────────────────────

describe('normalizeTable', () => {
  it('sorts by station and averages duplicate stations', () => {
    const t = normalizeTable([2, 0, 1, 1], { a: [20, 0, 10, 30] })
    expect(t.x).toEqual([0, 1, 2])
    expect(t.fields.a).toEqual([0, 20, 20])
  })

  it('gives the same result for any input order', () => {
    const t1 = normalizeTable([1, 0, 1], { a: [4, 0, 2], b: [1, 1, 3] })
    const t2 = normalizeTable([1, 1, 0], { a: [2, 4, 0], b: [3, 1, 1] })
    expect(t1).toEqual(t2)
    expect(t1.fields.a).toEqual([0, 3])
    expect(t1.fields.b).toEqual([1, 2])
  })

  it('drops rows whose station is not finite', () => {
    const t = normalizeTable([0, NaN, 2], { a: [1, 5, 3] })
    expect(t.x).toEqual([0, 2])
    expect(t.fields.a).toEqual([1, 3])
  })

  it('rejects an empty table', () => {
    expect(() => normalizeTable([], { a: [] })).toThrow(DataShapeError)
  })

  it('rejects a field whose length does not match the stations', () => {
    expect(() => normalizeTable([0, 1, 2], { a: [1, 2] })).toThrow(DataShapeError)
  })

  it('rejects a field with no finite value', () => {
    expect(() => normalizeTable([0, 1], { a: [NaN, Infinity] })).toThrow(DataShapeError)
  })

  it('rejects a table whose stations are all non-finite', () => {
    expect(() => normalizeTable([NaN, NaN], { a: [1, 2] })).toThrow(DataShapeError)
  })

  it('normalizeSeries returns a single (x, y) series', () => {
    const s = normalizeSeries([3, 1], [30, 10])
    expect(s.x).toEqual([1, 3])
    expect(s.y).toEqual([10, 30])
  })

  it('seriesOf throws UnknownSignalError for a missing field', () => {
    const t = normalizeTable([0, 1], { a: [1, 2] })
    expect(seriesOf(t, 'a').y).toEqual([1, 2])
    expect(() => seriesOf(t, 'b')).toThrow(UnknownSignalError)
  })
})

// ─── interpolateSeries ───────────────────────────────────────────────────────

describe('interpolateSeries', () => {
  const s = { x: [0, 1, 2], y: [0, 10, 40] }

  it('clamps below the first sample', () => {
    expect(interpolateSeries(s, -1)).toBe(0)
    expect(interpolateSeries(s, 0)).toBe(0)
  })

  it('clamps above the last sample', () => {
    expect(interpolateSeries(s, 2)).toBe(40)
    expect(interpolateSeries(s, 5)).toBe(40)
  })

  it('is linear between bracketing samples', () => {
    expect(interpolateSeries(s, 0.5)).toBeCloseTo(5, 12)
    expect(interpolateSeries(s, 1.5)).toBeCloseTo(25, 12)
    expect(interpolateSeries(s, 1)).toBe(10)
  })

  it('stays between the bracketing values', () => {
    for (let xq = 0.05; xq < 2; xq += 0.1) {
      const v = interpolateSeries(s, xq)
      const i = xq < 1 ? 0 : 1
      expect(v).toBeGreaterThanOrEqual(s.y[i])
      expect(v).toBeLessThanOrEqual(s.y[i + 1])
    }
  })

  it('returns the only value of a single-sample series everywhere', () => {
    const one = { x: [3], y: [7] }
    expect(interpolateSeries(one, -10)).toBe(7)
    expect(interpolateSeries(one, 3)).toBe(7)
    expect(interpolateSeries(one, 10)).toBe(7)
  })
})

// ─── createInterpolator ──────────────────────────────────────────────────────

describe('createInterpolator', () => {
  it('normalizes raw columns before binding', () => {
    const interp = createInterpolator({ x: [2, 0, 1], fields: { a: [40, 0, 10] } })
    expect(interp.evaluate('a', 0.5)).toBeCloseTo(5, 12)
    expect(interp.domain).toEqual({ min: 0, max: 2 })
  })

  it('throws UnknownSignalError for an unbound signal', () => {
    const interp = createInterpolator({ x: [0, 1], fields: { a: [0, 1] } })
    expect(interp.has('a')).toBe(true)
    expect(interp.has('b')).toBe(false)
    expect(() => interp.evaluate('b', 0.5)).toThrow(UnknownSignalError)
  })

  it('throws DataShapeError on mismatched columns', () => {
    expect(() => createInterpolator({ x: [0, 1], fields: { a: [0] } })).toThrow(DataShapeError)
  })

  it('lists its signals', () => {
    const interp = createInterpolator({ x: [0, 1], fields: { a: [0, 1], b: [1, 0] } })
    expect(interp.signals()).toEqual(['a', 'b'])
  })
})
