/**
 * blade.report.txt: plain-text audit log of the section selection.
 */

import type { SectionReport } from '../blade/types.ts'
import type { SelectionConfig } from '../blade/selection-config.ts'
import { formatTag } from '../blade/section-tags.ts'
import { joinLines } from './format.ts'

export interface ReportContext {
  name: string
  config: SelectionConfig
  nu: number
  /** extra header lines (source files, reader warnings, …) */
  extra?: readonly string[]
}

function opt(v: number | undefined): string {
  return v === undefined ? 'none' : String(v)
}

export function formatReport(report: SectionReport, ctx: ReportContext): string {
  const { config } = ctx
  const lines = ['# Section selection report', `name=${ctx.name}`]
  if (ctx.extra) lines.push(...ctx.extra)

  lines.push(
    `K=${report.sections.length}, elems=${report.elements}, nodes=${report.nodes}`,
    `r_start_used=${report.startUsed}`,
    `params: err_tol=${config.errorTolerance}, jump_tol=${config.jumpTolerance}, ` +
      `max_elems=${config.maxElements}, max_dr=${opt(config.maxSegmentLength)}, ` +
      `min_dr=${opt(config.minSegmentLength)}, nu=${ctx.nu}, c_eps=${config.chordEpsilon}`,
    '',
    'Reasons per section:',
  )
  for (const r of report.sections) {
    const tags = report.reasons.get(r) ?? []
    lines.push(`  ${r.toFixed(6)}: ${tags.map(formatTag).join(', ')}`)
  }

  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:', ...report.warnings.map(w => `  - ${w}`))
  }
  if (report.notes.length > 0) {
    lines.push('', 'Notes:', ...report.notes.map(n => `  - ${n}`))
  }

  return joinLines(lines)
}
