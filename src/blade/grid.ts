/**
 * Beam grid: end–mid–end node layout over K control sections.
 *
 *   nodes    = [r₀, m₀₁, r₁, m₁₂, r₂, …, r_K-1]       (2K-1)
 *   elements = (rᵢ, mᵢ, rᵢ₊₁)                          (K-1)
 *   Gauss    = mᵢ ∓ (0.5/√3)·(rᵢ₊₁ - rᵢ)               (K-1 pairs)
 *
 * The Gauss pair is the two-point Gauss–Legendre rule (ξ = ±1/√3)
 * mapped onto each element span.
 */

import type { BladeGrid, ElementTriple, EvalPair, GridLayout, SampleTable } from './types.ts'
import { InvalidSectionsError } from './errors.ts'
import { createInterpolator } from './interpolate.ts'

const GAUSS_HALF_OFFSET = 0.5 / Math.sqrt(3)

// ─── Layout ──────────────────────────────────────────────────────────────────

/**
 * Build nodes, element triples and Gauss stations from control sections.
 * Throws InvalidSectionsError unless K ≥ 2 and strictly increasing.
 */
export function buildGrid(sections: readonly number[]): GridLayout {
  if (sections.length < 2) {
    throw new InvalidSectionsError(`Need at least 2 control sections, got ${sections.length}`)
  }
  for (let i = 0; i < sections.length; i++) {
    if (!Number.isFinite(sections[i])) {
      throw new InvalidSectionsError(`Section ${i} is not finite: ${sections[i]}`)
    }
    if (i > 0 && !(sections[i] - sections[i - 1] > 0)) {
      throw new InvalidSectionsError(
        `Sections must be strictly increasing: [${i - 1}]=${sections[i - 1]}, [${i}]=${sections[i]}`,
      )
    }
  }

  const nodes: number[] = [sections[0]]
  const elements: ElementTriple[] = []
  const evalPoints: EvalPair[] = []

  for (let i = 0; i < sections.length - 1; i++) {
    const a = sections[i]
    const b = sections[i + 1]
    const mid = 0.5 * (a + b)
    nodes.push(mid, b)
    elements.push([a, mid, b])
    const h = GAUSS_HALF_OFFSET * (b - a)
    evalPoints.push([mid - h, mid + h])
  }

  return { sections: [...sections], nodes, elements, evalPoints }
}

// ─── Interpolators ───────────────────────────────────────────────────────────

/**
 * Bind structural (and optional aero) interpolation closures to a layout.
 * The returned grid owns its closures; the layout is not mutated.
 */
export function attachInterpolators(
  layout: GridLayout,
  structural: SampleTable,
  aero: SampleTable | null,
): BladeGrid {
  const tip = createInterpolator(structural)
  const aer = aero ? createInterpolator(aero) : null
  return {
    ...layout,
    evaluateStructural: tip.evaluate,
    evaluateAero: aer ? aer.evaluate : null,
  }
}
