/**
 * Blade model types: sample tables, section tags, grids, reports.
 *
 * Pure types with no logic.  Everything in src/blade is free of file I/O;
 * readers and writers live in src/io and src/emit.
 */

// ─── Sample Data ─────────────────────────────────────────────────────────────

/**
 * One physical quantity sampled at raw stations.
 * x is strictly increasing once normalized.
 */
export interface SampleSeries {
  x: readonly number[]
  y: readonly number[]
}

/**
 * Several quantities sampled at the same stations.
 *
 * Structural tables are keyed by the beam-local names produced by the
 * .tip reader (EA, EJY, EJZ, GJ, YNA, ...).  Aero tables carry at least
 * Chord, plus Twist / Sweep / Anhedral when the file has them.
 */
export interface SampleTable {
  x: readonly number[]
  fields: Readonly<Record<string, readonly number[]>>
}

// ─── Section Tags ────────────────────────────────────────────────────────────

/**
 * Why a control section exists.  Formatted to text only in reports.
 */
export type SectionTag =
  | { kind: 'start' }
  | { kind: 'end' }
  | { kind: 'jump'; signal: string }
  | { kind: 'vertex'; signal: string }
  | { kind: 'max-segment' }
  | { kind: 'error'; tolerance: number; signal: string }

export interface ControlSection {
  position: number
  tags: readonly SectionTag[]
}

// ─── Grid ────────────────────────────────────────────────────────────────────

/** (start, mid, end) of one beam element */
export type ElementTriple = readonly [start: number, mid: number, end: number]

/** Two-point Gauss stations inside one element */
export type EvalPair = readonly [ev1: number, ev2: number]

export interface GridLayout {
  /** K control sections, strictly increasing */
  sections: readonly number[]
  /** 2K-1 end–mid–end nodes */
  nodes: readonly number[]
  /** K-1 element triples */
  elements: readonly ElementTriple[]
  /** K-1 Gauss pairs */
  evalPoints: readonly EvalPair[]
}

export type SignalEvaluator = (signal: string, x: number) => number

/**
 * Grid with its interpolation closures bound.
 * evaluateAero is null when no aerodynamic table was supplied.
 */
export interface BladeGrid extends GridLayout {
  evaluateStructural: SignalEvaluator
  evaluateAero: SignalEvaluator | null
}

// ─── Selection Report ────────────────────────────────────────────────────────

export interface SectionReport {
  sections: readonly number[]
  /** tags per section, in section order */
  reasons: ReadonlyMap<number, readonly SectionTag[]>
  startUsed: number
  elements: number
  nodes: number
  warnings: readonly string[]
  notes: readonly string[]
}

export interface SectionSelection {
  sections: readonly number[]
  report: SectionReport
}
