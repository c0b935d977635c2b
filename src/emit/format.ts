/**
 * Number and label formatting shared by the MBDyn-style writers.
 */

/** Fixed-point with 10 decimals */
export function fx(v: number): string {
  return v.toFixed(10)
}

/** Scientific with 6 decimals and an at-least-two-digit exponent: 1.500000e+05 */
export function sci(v: number): string {
  return v.toExponential(6).replace(/e([+-])(\d)$/, (_m, sign: string, digit: string) => `e${sign}0${digit}`)
}

/** Finite value or 0 */
export function finiteOr0(v: number): number {
  return Number.isFinite(v) ? v : 0
}

/** Label of a per-node / per-element entity of the current blade */
export function label(name: string, index: number, kind?: string): string {
  return kind
    ? `CURR_ROTOR + CURR_${name} + ${kind} + ${index}`
    : `CURR_ROTOR + CURR_${name} + ${index}`
}

/** End–mid–end node ids of 1-based element e */
export function elementNodeIds(e: number): [number, number, number] {
  return [2 * e - 1, 2 * e, 2 * e + 1]
}

/** Two-line file banner */
export function banner(fileName: string, name: string): string[] {
  return [`# ${fileName}`, `# name=${name}`]
}

export function joinLines(lines: readonly string[]): string {
  return lines.join('\n') + '\n'
}
