/**
 * Single-blade generation: tables → sections → grid → artifact texts.
 *
 * Pure: nothing here touches the file system.  The CLI reads the tables
 * and writes the returned files.
 */

import type { BladeGrid, SampleTable, SectionReport, SelectionConfigInput } from './blade/index.ts'
import { attachInterpolators, buildGrid, resolveSelectionConfig, selectSections } from './blade/index.ts'
import { formatAeroReferences, formatNodes, formatReferences } from './emit/references.ts'
import { formatBeams } from './emit/beams.ts'
import { formatBodies } from './emit/bodies.ts'
import { formatAeroBeams } from './emit/aero-beams.ts'
import { formatReport } from './emit/report.ts'

export const DEFAULT_POISSON_RATIO = 0.33

export interface BladeInput {
  name: string
  structural: SampleTable
  aero: SampleTable | null
  selection?: SelectionConfigInput
  /** Poisson ratio for shear stiffness (default 0.33) */
  nu?: number
  /** extra report header lines */
  reportExtra?: readonly string[]
}

export interface BladeOutput {
  report: SectionReport
  grid: BladeGrid
  /** file name → text */
  files: Record<string, string>
}

/**
 * Replace anything outside [A-Za-z0-9_-] with '_' and trim underscores.
 */
export function sanitizeName(name: string, fallback: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_-]/g, '_').replace(/^_+|_+$/g, '')
  return cleaned || fallback
}

export function generateBlade(input: BladeInput): BladeOutput {
  const config = resolveSelectionConfig(input.selection)
  const nu = input.nu ?? DEFAULT_POISSON_RATIO
  const { name } = input

  const { sections, report } = selectSections(input.structural, input.aero, config)
  const grid = attachInterpolators(buildGrid(sections), input.structural, input.aero)

  const files: Record<string, string> = {
    'blade.ref': formatReferences(grid, name),
    'blade.nod': formatNodes(grid, name),
    'blade.beam': formatBeams(grid, name, nu),
    'blade.body': formatBodies(grid, name),
    'blade_aero.ref': formatAeroReferences(grid, name),
  }
  const aeroBeams = formatAeroBeams(grid, name, config.chordSignal)
  if (aeroBeams !== null) files['blade.aerobeam'] = aeroBeams

  files['blade.report.txt'] = formatReport(report, { name, config, nu, extra: input.reportExtra })

  return { report, grid, files }
}
