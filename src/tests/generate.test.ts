/**
 * End-to-end blade generation and command-line tests.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { describe, it, expect, vi, afterEach } from 'vitest'
import { generateBlade, sanitizeName, DEFAULT_POISSON_RATIO } from '../generate.ts'
import { main, parseCliArgs } from '../cli.ts'
import { aeroTable, stations, structuralTable } from './helpers.ts'

const x = stations(10, 1)

// ─── generateBlade ───────────────────────────────────────────────────────────

describe('generateBlade', () => {
  it('produces every artifact when aero data is present', () => {
    const out = generateBlade({
      name: 'b',
      structural: structuralTable(x),
      aero: aeroTable(x, x.map(() => 0.5)),
    })
    expect(Object.keys(out.files)).toEqual([
      'blade.ref',
      'blade.nod',
      'blade.beam',
      'blade.body',
      'blade_aero.ref',
      'blade.aerobeam',
      'blade.report.txt',
    ])
    expect(out.grid.sections).toEqual(out.report.sections)
    expect(out.grid.nodes).toHaveLength(out.report.nodes)
  })

  it('omits the aero beams without aero data', () => {
    const out = generateBlade({ name: 'b', structural: structuralTable(x), aero: null })
    expect(out.files['blade.aerobeam']).toBeUndefined()
    expect(out.files['blade.report.txt']).toContain('nu=0.33')
  })

  it('keeps structural node count at 2K-1', () => {
    const out = generateBlade({
      name: 'b',
      structural: structuralTable(stations(10, 0.5), { EA: xi => 1 + xi * xi }),
      aero: null,
      selection: { maxSegmentLength: 2 },
      nu: 0.3,
    })
    const k = out.report.sections.length
    const nodes = out.files['blade.nod'].split('\n').filter(l => l.startsWith('structural:'))
    expect(nodes).toHaveLength(2 * k - 1)
    expect(out.files['blade.beam'].split('\n').filter(l => l === 'beam3:')).toHaveLength(k - 1)
    expect(out.files['blade.report.txt']).toContain('max_dr=2, min_dr=none, nu=0.3,')
  })
})

describe('sanitizeName', () => {
  it('replaces unsafe characters and trims underscores', () => {
    expect(sanitizeName('rotor 1!', 'blade')).toBe('rotor_1')
    expect(sanitizeName('main-rotor_A', 'blade')).toBe('main-rotor_A')
  })

  it('falls back when nothing is left', () => {
    expect(sanitizeName('***', 'blade')).toBe('blade')
  })
})

// ─── CLI ─────────────────────────────────────────────────────────────────────

describe('parseCliArgs', () => {
  it('derives the name from the tip file and keeps defaults unset', () => {
    const opts = parseCliArgs(['--tip', 'data/rotor 1.tip', '--out', 'out'])
    expect(opts.name).toBe('rotor_1')
    expect(opts.aero).toBeNull()
    expect(opts.nu).toBe(DEFAULT_POISSON_RATIO)
    expect(opts.selection.errorTolerance).toBeUndefined()
  })

  it('reads numeric options', () => {
    const opts = parseCliArgs([
      '--tip', 't.tip', '--out', 'o', '--aero', 'a.dat', '--name', 'b',
      '--err-tol', '0.1', '--max-elems', '12', '--min-dr', '0.05', '--nu', '0.3',
    ])
    expect(opts.name).toBe('b')
    expect(opts.aero).toBe('a.dat')
    expect(opts.nu).toBe(0.3)
    expect(opts.selection.errorTolerance).toBe(0.1)
    expect(opts.selection.maxElements).toBe(12)
    expect(opts.selection.minSegmentLength).toBe(0.05)
  })

  it('requires --tip and --out', () => {
    expect(() => parseCliArgs(['--out', 'o'])).toThrow('--tip <file> is required')
    expect(() => parseCliArgs(['--tip', 't.tip'])).toThrow('--out <dir> is required')
  })

  it('rejects a non-numeric value', () => {
    expect(() => parseCliArgs(['--tip', 't', '--out', 'o', '--max-elems', 'many']))
      .toThrow("--max-elems expects a number, got 'many'")
  })
})

describe('main', () => {
  const dirs: string[] = []

  afterEach(() => {
    vi.restoreAllMocks()
    for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true })
  })

  it('exits with 1 on bad arguments', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(main([])).toBe(1)
    expect(error).toHaveBeenCalledWith('--tip <file> is required')
  })

  it('exits with 1 when the tip file is missing', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(main(['--tip', path.join(os.tmpdir(), 'blade-sectioner-none.tip'), '--out', 'o'])).toBe(1)
  })

  it('writes the blade files', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'blade-sectioner-'))
    dirs.push(dir)
    const tip = path.join(dir, 'b.tip')
    fs.writeFileSync(tip, [
      'BLADE STRUCT Y',
      'TABLE',
      'SEC STA WEIGHT XCG ZCG ROTAPI JX JZ JP EA XNA ZNA ROTAN EJZ EJX GJ XCT ZCT',
      '- M KG/M M M DEG KGM KGM KGM N M M DEG NM2 NM2 NM2 M M',
      '1 0.0 10 0 0 0 0.1 0.2 0.3 1e8 0 0 0 1e6 2e6 3e5 0 0',
      '2 2.0 10 0 0 0 0.1 0.2 0.3 1e8 0 0 0 1e6 2e6 3e5 0 0',
      'ENDTABLE',
    ].join('\n'))
    const out = path.join(dir, 'out')

    expect(main(['--tip', tip, '--out', out])).toBe(0)
    expect(fs.readdirSync(out).sort()).toEqual([
      'blade.beam',
      'blade.body',
      'blade.nod',
      'blade.ref',
      'blade.report.txt',
      'blade_aero.ref',
    ])
    expect(log).toHaveBeenCalledWith(`b: K=2, elems=1, nodes=3; wrote 6 files to ${out}`)
    expect(fs.readFileSync(path.join(out, 'blade.body'), 'utf-8')).toContain('# total_mass = 2.000000e+01')
  })
})
