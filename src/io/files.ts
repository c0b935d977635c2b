/**
 * File-system boundary: read blade tables, write generated artifacts.
 */

import fs from 'node:fs'
import path from 'node:path'
import { TableFormatError } from '../blade/errors.ts'
import { parseTipTable, type TipTable } from './tip-reader.ts'
import { parseAeroTable, type AeroTable } from './aero-reader.ts'

function readTableText(filePath: string, kind: string): string {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new TableFormatError(`${kind} file not found: ${filePath}`)
  }
  return fs.readFileSync(filePath, 'utf-8')
}

export function loadTipFile(filePath: string): TipTable {
  return parseTipTable(readTableText(filePath, 'TIP'))
}

export function loadAeroFile(filePath: string): AeroTable {
  return parseAeroTable(readTableText(filePath, 'AERO'))
}

/**
 * Write every artifact under outDir, creating it when needed.
 * Returns the written paths in input order.
 */
export function writeBladeFiles(outDir: string, files: Readonly<Record<string, string>>): string[] {
  fs.mkdirSync(outDir, { recursive: true })
  const written: string[] = []
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(outDir, name)
    fs.writeFileSync(target, content, 'utf-8')
    written.push(target)
  }
  return written
}
