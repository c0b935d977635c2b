/**
 * Automatic control-section selection.
 *
 * Chooses K span positions so that a piecewise-linear beam/aero model
 * reproduces the tabulated properties within a tolerance, while keeping
 * discontinuities, element-size bounds and an element cap.
 *
 * Pipeline: every step takes an immutable state and returns a new one:
 *
 *   1. detectStart            blade start (override, chord, or stiffness)
 *   2. detectHardConstraints  START / END / JUMP / VERTEX
 *   3. enforceMaxLength       equal subdivision of long intervals  (MAX_DR)
 *   4. refineByError          midpoint bisection while error > tol (ERR)
 *   5. enforceMinLength       drop unprotected sections at short intervals
 *   6. enforceCap             drop unprotected sections nearest midspan
 *
 * Precedence on conflict: discontinuities > size bounds > element cap.
 * Conflicts are never fatal; they are recorded as report warnings.
 *
 * Termination: steps 5 and 6 remove one section per iteration; step 4
 * adds at least one section per sweep (or stops with a warning) and stops
 * at the cap; step 3 has an explicit iteration ceiling.
 */

import type { ControlSection, SampleSeries, SampleTable, SectionReport, SectionSelection, SectionTag } from './types.ts'
import { InsufficientDomainError } from './errors.ts'
import { interpolateSeries } from './interpolate.ts'
import { domainOf, hasSignal, normalizeTable, seriesOf } from './series.ts'
import { resolveSelectionConfig } from './selection-config.ts'
import type { SelectionConfig, SelectionConfigInput } from './selection-config.ts'
import {
  POSITION_EPS,
  elementCount,
  insertAll,
  insertSection,
  isProtected,
  positionsOf,
  removeAt,
} from './section-tags.ts'

/** Below this a denominator is treated as zero */
const TINY = 1e-12

/** Stiffness start threshold, as a fraction of the global max magnitude */
const STIFFNESS_START_FRACTION = 1e-6

/** Chord vertex threshold, as a fraction of the max chord */
const VERTEX_FRACTION = 1e-3

const MAX_LENGTH_ITERATIONS = 64

const NO_PROGRESS_WARNING =
  'error refinement stopped: bisection midpoints coincide with existing sections'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TrackedSignal {
  name: string
  series: SampleSeries
}

/**
 * Everything the steps read but never change.
 */
export interface SelectionContext {
  config: SelectionConfig
  domain: { min: number; max: number }
  start: number
  /** tracked structural signals, in configured order */
  structural: TrackedSignal[]
  /** chord series when aero data carries one */
  chord: TrackedSignal | null
}

export interface SelectionState {
  sections: readonly ControlSection[]
  warnings: readonly string[]
  notes: readonly string[]
}

// ─── Signal Helpers ──────────────────────────────────────────────────────────

/**
 * Relative change between neighbouring raw samples at or beyond start.
 * Returns the stations (right-hand sample) where it meets the tolerance.
 */
export function detectJumps(
  series: SampleSeries,
  start: number,
  end: number,
  jumpTolerance: number,
): number[] {
  const { x, y } = series
  const out: number[] = []
  for (let i = 1; i < x.length; i++) {
    if (x[i] < start || x[i] > end) continue
    const base = Math.max(Math.abs(y[i - 1]), Math.abs(y[i]), TINY)
    const rel = Math.abs(y[i] - y[i - 1]) / base
    if (rel >= jumpTolerance) out.push(x[i])
  }
  return out
}

/**
 * Local extrema of chord (slope sign change) large enough to matter:
 *   (cᵢ - cᵢ₋₁)·(cᵢ₊₁ - cᵢ) ≤ 0  and  max(|ΔL|, |ΔR|) > 1e-3 · max|c|
 */
export function detectChordVertices(series: SampleSeries, start: number, end: number): number[] {
  const { x, y } = series
  if (x.length < 3) return []
  let cmax = 0
  for (const c of y) {
    if (Number.isFinite(c)) cmax = Math.max(cmax, Math.abs(c))
  }
  if (cmax <= 0) return []
  const threshold = VERTEX_FRACTION * cmax

  const out: number[] = []
  for (let i = 1; i < x.length - 1; i++) {
    if (x[i] < start || x[i] > end) continue
    const dL = y[i] - y[i - 1]
    const dR = y[i + 1] - y[i]
    if (dL * dR <= 0 && Math.max(Math.abs(dL), Math.abs(dR)) > threshold) {
      out.push(x[i])
    }
  }
  return out
}

/**
 * Relative error at the midpoint of [a, b] between the signal and the
 * straight line through its values at a and b.
 */
export function midpointError(series: SampleSeries, a: number, b: number): number {
  if (b <= a + TINY) return 0
  const m = 0.5 * (a + b)
  const ya = interpolateSeries(series, a)
  const yb = interpolateSeries(series, b)
  const ym = interpolateSeries(series, m)
  const ylin = 0.5 * (ya + yb)
  const denom = Math.max(Math.abs(ym), Math.abs(ya), Math.abs(yb), TINY)
  return Math.abs(ym - ylin) / denom
}

/**
 * Worst midpoint error over all tracked signals.
 * Ties keep the first signal (structural order, then chord).
 */
function worstError(ctx: SelectionContext, a: number, b: number): { error: number; signal: string } {
  let worst = { error: 0, signal: '' }
  let first = true
  for (const s of trackedSignals(ctx)) {
    const e = midpointError(s.series, a, b)
    if (first || e > worst.error) {
      worst = { error: e, signal: s.name }
      first = false
    }
  }
  return worst
}

function trackedSignals(ctx: SelectionContext): TrackedSignal[] {
  return ctx.chord ? [...ctx.structural, ctx.chord] : ctx.structural
}

/**
 * Clamp a start into [min, max).  The upper bound sits far enough below
 * max that START and END never merge into one section.
 */
export function clampStart(r: number, min: number, max: number): number {
  if (r < min) return min
  const upper = Math.max(min, max - 2 * POSITION_EPS * Math.max(1, Math.abs(max)))
  return r > upper ? upper : r
}

function fmt6(v: number): string {
  return v.toFixed(6)
}

// ─── Step 1: Start Detection ─────────────────────────────────────────────────

function startFromChord(chord: SampleSeries, epsilon: number): number | null {
  const { x, y } = chord
  for (let i = 0; i < x.length; i++) {
    if (y[i] > epsilon) return x[i]
  }
  return null
}

function startFromStiffness(structural: TrackedSignal[], stations: readonly number[]): number | null {
  let maxMag = 0
  for (const s of structural) {
    for (const v of s.series.y) {
      if (Number.isFinite(v)) maxMag = Math.max(maxMag, Math.abs(v))
    }
  }
  const threshold = STIFFNESS_START_FRACTION * Math.max(1, maxMag)
  for (let i = 0; i < stations.length; i++) {
    if (structural.some(s => s.series.y[i] > threshold)) return stations[i]
  }
  return null
}

/**
 * Effective blade start.
 *
 * Override → first station with chord > ε → first station where any
 * tracked stiffness clears the noise floor → domain minimum.  Every
 * branch is clamped into [min, max).
 */
export function detectStart(
  config: SelectionConfig,
  domain: { min: number; max: number },
  structural: TrackedSignal[],
  stations: readonly number[],
  chord: TrackedSignal | null,
): number {
  if (config.startOverride !== undefined) {
    return clampStart(config.startOverride, domain.min, domain.max)
  }
  if (chord) {
    const r = startFromChord(chord.series, config.chordEpsilon)
    if (r !== null) return clampStart(r, domain.min, domain.max)
  }
  const r = startFromStiffness(structural, stations)
  return clampStart(r ?? domain.min, domain.min, domain.max)
}

// ─── Step 2: Hard Constraints ────────────────────────────────────────────────

export function detectHardConstraints(ctx: SelectionContext): SelectionState {
  const { start, domain, config } = ctx
  let sections: ControlSection[] = []
  sections = insertSection(sections, start, { kind: 'start' })
  sections = insertSection(sections, domain.max, { kind: 'end' })

  const points: { position: number; tag: SectionTag }[] = []
  for (const s of ctx.structural) {
    for (const r of detectJumps(s.series, start, domain.max, config.jumpTolerance)) {
      points.push({ position: r, tag: { kind: 'jump', signal: s.name } })
    }
  }
  if (ctx.chord) {
    const chord = ctx.chord
    for (const r of detectJumps(chord.series, start, domain.max, config.jumpTolerance)) {
      points.push({ position: r, tag: { kind: 'jump', signal: chord.name } })
    }
    for (const r of detectChordVertices(chord.series, start, domain.max)) {
      points.push({ position: r, tag: { kind: 'vertex', signal: chord.name } })
    }
  }

  return { sections: insertAll(sections, points), warnings: [], notes: [] }
}

// ─── Step 3: Max Length ──────────────────────────────────────────────────────

export function enforceMaxLength(state: SelectionState, ctx: SelectionContext): SelectionState {
  const maxLen = ctx.config.maxSegmentLength
  if (maxLen === undefined) return state

  let sections = state.sections
  for (let iter = 0; iter < MAX_LENGTH_ITERATIONS; iter++) {
    const points: { position: number; tag: SectionTag }[] = []
    for (let i = 0; i < sections.length - 1; i++) {
      const a = sections[i].position
      const dr = sections[i + 1].position - a
      if (dr > maxLen + POSITION_EPS) {
        const n = Math.ceil(dr / maxLen)
        for (let k = 1; k < n; k++) {
          points.push({ position: a + dr * k / n, tag: { kind: 'max-segment' } })
        }
      }
    }
    if (points.length === 0) return { ...state, sections }
    sections = insertAll(sections, points)
    if (elementCount(sections) >= ctx.config.maxElements) return { ...state, sections }
  }

  return {
    ...state,
    sections,
    warnings: [
      ...state.warnings,
      `max segment length not reached after ${MAX_LENGTH_ITERATIONS} passes`,
    ],
  }
}

// ─── Step 4: Error Refinement ────────────────────────────────────────────────

export function refineByError(state: SelectionState, ctx: SelectionContext): SelectionState {
  const { errorTolerance, maxElements, minSegmentLength } = ctx.config
  let sections = state.sections
  let notes = state.notes

  while (elementCount(sections) < maxElements) {
    const splits: { position: number; tag: SectionTag }[] = []
    for (let i = 0; i < sections.length - 1; i++) {
      const a = sections[i].position
      const b = sections[i + 1].position
      // a midpoint this close to either end would merge into it
      if (b - a <= 2 * POSITION_EPS) continue
      if (minSegmentLength !== undefined && b - a <= minSegmentLength + POSITION_EPS) continue
      const worst = worstError(ctx, a, b)
      if (worst.error > errorTolerance) {
        splits.push({
          position: 0.5 * (a + b),
          tag: { kind: 'error', tolerance: errorTolerance, signal: worst.signal },
        })
      }
    }
    if (splits.length === 0) return { ...state, sections, notes }
    const before = sections.length
    sections = insertAll(sections, splits)
    if (sections.length === before) {
      return {
        ...state,
        sections,
        notes,
        warnings: [...state.warnings, NO_PROGRESS_WARNING],
      }
    }
    if (elementCount(sections) >= maxElements) {
      notes = [...notes, `error refinement stopped at max elements (${maxElements})`]
    }
  }

  return { ...state, sections, notes }
}

// ─── Step 5: Min Length ──────────────────────────────────────────────────────

export function enforceMinLength(state: SelectionState, ctx: SelectionContext): SelectionState {
  const minLen = ctx.config.minSegmentLength
  if (minLen === undefined || minLen <= 0) return state

  let sections = state.sections
  const warnings = [...state.warnings]

  // Each pass removes one section or stops
  let removed = true
  while (removed && sections.length > 2) {
    removed = false
    for (let i = 1; i < sections.length - 1; i++) {
      const left = sections[i].position - sections[i - 1].position
      const right = sections[i + 1].position - sections[i].position
      if (Math.min(left, right) < minLen - POSITION_EPS && !isProtected(sections[i].tags)) {
        warnings.push(`min segment merge: removed section at r=${fmt6(sections[i].position)}`)
        sections = removeAt(sections, i)
        removed = true
        break
      }
    }
  }

  for (let i = 0; i < sections.length - 1; i++) {
    const a = sections[i].position
    const b = sections[i + 1].position
    if (b - a < minLen - POSITION_EPS) {
      warnings.push(
        `interval [${fmt6(a)}, ${fmt6(b)}] kept below min segment length ${minLen}: bounded by protected sections`,
      )
    }
  }

  return { ...state, sections, warnings }
}

// ─── Step 6: Element Cap ─────────────────────────────────────────────────────

export function enforceCap(state: SelectionState, ctx: SelectionContext): SelectionState {
  const cap = ctx.config.maxElements
  let sections = state.sections
  const warnings = [...state.warnings]

  while (elementCount(sections) > cap) {
    const mid = 0.5 * (sections[0].position + sections[sections.length - 1].position)
    let drop = -1
    let best = Infinity
    for (let i = 1; i < sections.length - 1; i++) {
      if (isProtected(sections[i].tags)) continue
      const d = Math.abs(sections[i].position - mid)
      // strict < keeps the lowest index on ties
      if (d < best) {
        best = d
        drop = i
      }
    }
    if (drop < 0) {
      warnings.push(
        `max elements limit (${cap}) cannot be met without dropping protected sections; keeping ${elementCount(sections)} elements`,
      )
      break
    }
    sections = removeAt(sections, drop)
  }

  return { ...state, sections, warnings }
}

// ─── Main Routine ────────────────────────────────────────────────────────────

/**
 * Build the read-only context: normalized signals, domain, and start.
 */
export function createSelectionContext(
  structural: SampleTable,
  aero: SampleTable | null,
  config: SelectionConfig,
): SelectionContext {
  if (structural.x.length < 2) throw new InsufficientDomainError(structural.x.length)
  const tip = normalizeTable(structural.x, structural.fields)
  if (tip.x.length < 2) throw new InsufficientDomainError(tip.x.length)

  const tracked = config.trackedSignals.map(name => ({ name, series: seriesOf(tip, name) }))

  let chord: TrackedSignal | null = null
  if (aero && hasSignal(aero, config.chordSignal)) {
    const aer = normalizeTable(aero.x, aero.fields)
    chord = { name: config.chordSignal, series: seriesOf(aer, config.chordSignal) }
  }

  const domain = domainOf(tip)
  const start = detectStart(config, domain, tracked, tip.x, chord)
  return { config, domain, start, structural: tracked, chord }
}

function buildReport(state: SelectionState, ctx: SelectionContext): SectionReport {
  const sections = positionsOf(state.sections)
  const reasons = new Map<number, readonly SectionTag[]>()
  for (const s of state.sections) reasons.set(s.position, s.tags)

  const k = sections.length
  const { config } = ctx
  const signalList = trackedSignals(ctx).map(s => s.name)
  const fmtOpt = (v: number | undefined) => (v === undefined ? 'none' : String(v))

  return {
    sections,
    reasons,
    startUsed: ctx.start,
    elements: Math.max(0, k - 1),
    nodes: Math.max(0, 2 * k - 1),
    warnings: [...new Set(state.warnings)],
    notes: [
      `signals=${signalList.join(',')}`,
      `err_tol=${config.errorTolerance}, jump_tol=${config.jumpTolerance}, max_elems=${config.maxElements}, ` +
        `max_dr=${fmtOpt(config.maxSegmentLength)}, min_dr=${fmtOpt(config.minSegmentLength)}`,
      ...state.notes,
    ],
  }
}

/**
 * Select control sections for one blade.
 *
 * @param structural  Structural table (stations + tracked stiffness signals)
 * @param aero        Aero table with chord, or null
 * @param input       Selection config; defaults fill missing fields
 */
export function selectSections(
  structural: SampleTable,
  aero: SampleTable | null,
  input: SelectionConfigInput = {},
): SectionSelection {
  const config = resolveSelectionConfig(input)
  const ctx = createSelectionContext(structural, aero, config)

  const steps = [enforceMaxLength, refineByError, enforceMinLength, enforceCap]
  const state = steps.reduce((s, step) => step(s, ctx), detectHardConstraints(ctx))

  const report = buildReport(state, ctx)
  return { sections: report.sections, report }
}
