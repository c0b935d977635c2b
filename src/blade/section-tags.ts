/**
 * Section tags, precedence ranking, and the immutable section set.
 *
 * Precedence (lower rank wins):
 *   0  boundary       START, END
 *   1  discontinuity  JUMP, VERTEX
 *   2  size           MAX_DR
 *   3  fidelity       ERR
 *
 * Ranks 0–1 are protected: min-length merging and cap enforcement never
 * remove them, even under extreme element-count pressure.
 */

import type { ControlSection, SectionTag } from './types.ts'

/** Positions closer than this are the same section */
export const POSITION_EPS = 1e-12

export const PROTECTED_RANK = 1

export function tagRank(tag: SectionTag): number {
  switch (tag.kind) {
    case 'start':
    case 'end':
      return 0
    case 'jump':
    case 'vertex':
      return 1
    case 'max-segment':
      return 2
    case 'error':
      return 3
  }
}

/** Best (lowest) rank among a section's tags; Infinity when untagged */
export function sectionRank(tags: readonly SectionTag[]): number {
  let best = Infinity
  for (const t of tags) best = Math.min(best, tagRank(t))
  return best
}

export function isProtected(tags: readonly SectionTag[]): boolean {
  return sectionRank(tags) <= PROTECTED_RANK
}

// ─── Formatting ──────────────────────────────────────────────────────────────

export function formatTag(tag: SectionTag): string {
  switch (tag.kind) {
    case 'start': return 'START'
    case 'end': return 'END'
    case 'jump': return `JUMP:${tag.signal}`
    case 'vertex': return `VERTEX:${tag.signal}`
    case 'max-segment': return 'MAX_DR'
    case 'error': return `ERR>${tag.tolerance.toFixed(3)}:${tag.signal}`
  }
}

function sameTag(a: SectionTag, b: SectionTag): boolean {
  return formatTag(a) === formatTag(b)
}

// ─── Section Set ─────────────────────────────────────────────────────────────

/**
 * Insert a tagged position into a sorted section list.
 *
 * A position within POSITION_EPS of an existing section merges its tag
 * into that section instead of creating a new one.  Returns a new array.
 */
export function insertSection(
  sections: readonly ControlSection[],
  position: number,
  tag: SectionTag,
): ControlSection[] {
  const out = [...sections]
  let i = 0
  while (i < out.length && out[i].position < position - POSITION_EPS) i++

  if (i < out.length && Math.abs(out[i].position - position) <= POSITION_EPS) {
    const existing = out[i]
    if (!existing.tags.some(t => sameTag(t, tag))) {
      out[i] = { position: existing.position, tags: [...existing.tags, tag] }
    }
    return out
  }

  out.splice(i, 0, { position, tags: [tag] })
  return out
}

export function insertAll(
  sections: readonly ControlSection[],
  points: readonly { position: number; tag: SectionTag }[],
): ControlSection[] {
  let out = [...sections]
  for (const p of points) out = insertSection(out, p.position, p.tag)
  return out
}

export function removeAt(sections: readonly ControlSection[], index: number): ControlSection[] {
  return [...sections.slice(0, index), ...sections.slice(index + 1)]
}

export function positionsOf(sections: readonly ControlSection[]): number[] {
  return sections.map(s => s.position)
}

export function elementCount(sections: readonly ControlSection[]): number {
  return Math.max(0, sections.length - 1)
}
