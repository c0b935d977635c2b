/**
 * Blade beam-model generator: command line entry.
 *
 * Usage:
 *   npm run generate -- --tip blade.tip [--aero blade.dat] --out out/ [--name blade]
 *     [--r-start R] [--err-tol 0.05] [--jump-tol 0.10] [--max-elems 40]
 *     [--max-dr DR] [--min-dr DR] [--c-eps 1e-3] [--nu 0.33]
 */

import path from 'node:path'
import { pathToFileURL } from 'node:url'
import type { SelectionConfigInput } from './blade/selection-config.ts'
import { loadAeroFile, loadTipFile, writeBladeFiles } from './io/files.ts'
import { DEFAULT_POISSON_RATIO, generateBlade, sanitizeName } from './generate.ts'

// ─── Argument Helpers ────────────────────────────────────────────────────────

export function arg(argv: readonly string[], name: string): string | null {
  const i = argv.indexOf(name)
  if (i === -1) return null
  const v = argv[i + 1]
  return v === undefined || v.startsWith('--') ? null : v
}

function numArg(argv: readonly string[], name: string): number | undefined {
  const v = arg(argv, name)
  if (v === null) return undefined
  const n = Number(v)
  if (!Number.isFinite(n)) throw new Error(`${name} expects a number, got '${v}'`)
  return n
}

export interface CliOptions {
  tip: string
  aero: string | null
  out: string
  name: string
  nu: number
  selection: SelectionConfigInput
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const tip = arg(argv, '--tip')
  const out = arg(argv, '--out')
  if (!tip) throw new Error('--tip <file> is required')
  if (!out) throw new Error('--out <dir> is required')

  const selection: SelectionConfigInput = {
    startOverride: numArg(argv, '--r-start'),
    errorTolerance: numArg(argv, '--err-tol'),
    jumpTolerance: numArg(argv, '--jump-tol'),
    maxElements: numArg(argv, '--max-elems'),
    maxSegmentLength: numArg(argv, '--max-dr'),
    minSegmentLength: numArg(argv, '--min-dr'),
    chordEpsilon: numArg(argv, '--c-eps'),
  }

  return {
    tip,
    aero: arg(argv, '--aero'),
    out,
    name: sanitizeName(arg(argv, '--name') ?? path.parse(tip).name, 'blade'),
    nu: numArg(argv, '--nu') ?? DEFAULT_POISSON_RATIO,
    selection,
  }
}

// ─── Main ────────────────────────────────────────────────────────────────────

export function main(argv: readonly string[]): number {
  let opts: CliOptions
  try {
    opts = parseCliArgs(argv)
  } catch (err) {
    console.error(err instanceof Error ? err.message : err)
    return 1
  }

  try {
    const tip = loadTipFile(opts.tip)
    const aero = opts.aero ? loadAeroFile(opts.aero) : null
    for (const w of [...tip.warnings, ...(aero?.warnings ?? [])]) console.warn(`[WARN] ${w}`)

    const result = generateBlade({
      name: opts.name,
      structural: tip.table,
      aero: aero ? aero.table : null,
      selection: opts.selection,
      nu: opts.nu,
      reportExtra: [`tip=${opts.tip}`, `aero=${opts.aero ?? 'none'}`],
    })
    for (const w of result.report.warnings) console.warn(`[WARN] ${w}`)

    const written = writeBladeFiles(opts.out, result.files)
    console.log(
      `${opts.name}: K=${result.report.sections.length}, elems=${result.report.elements}, ` +
        `nodes=${result.report.nodes}; wrote ${written.length} files to ${opts.out}`,
    )
    return 0
  } catch (err) {
    console.error(`Failed to generate blade '${opts.name}':`, err instanceof Error ? err.message : err)
    return 1
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = main(process.argv.slice(2))
}
