/**
 * Section selection configuration: schema, defaults, validation.
 */

import { z } from 'zod'
import { SelectionConfigError } from './errors.ts'

export const DEFAULT_TRACKED_SIGNALS = ['EA', 'EJY', 'EJZ', 'GJ'] as const

export const SelectionConfigSchema = z
  .object({
    startOverride: z.number().finite().optional(),
    errorTolerance: z.number().finite().positive().default(0.05),
    jumpTolerance: z.number().finite().positive().default(0.10),
    maxElements: z.number().int().min(1).default(40),
    maxSegmentLength: z.number().finite().positive().optional(),
    minSegmentLength: z.number().finite().nonnegative().optional(),
    chordEpsilon: z.number().finite().nonnegative().default(1e-3),
    trackedSignals: z.array(z.string().min(1)).min(1).default([...DEFAULT_TRACKED_SIGNALS]),
    chordSignal: z.string().min(1).default('Chord'),
  })
  .strict()

/** Config as accepted from callers (every field optional) */
export type SelectionConfigInput = z.input<typeof SelectionConfigSchema>

/** Config after defaults are applied */
export type SelectionConfig = z.output<typeof SelectionConfigSchema>

/**
 * Apply defaults and validate.  Throws SelectionConfigError listing
 * every offending path.
 */
export function resolveSelectionConfig(input: SelectionConfigInput = {}): SelectionConfig {
  const parsed = SelectionConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new SelectionConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return parsed.data
}
