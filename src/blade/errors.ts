/**
 * Error taxonomy.
 *
 * Shape problems are fatal and thrown where they are detected.
 * Tolerance conflicts never throw; they end up as report warnings.
 */

/** Empty, mismatched or all-non-finite sample data. */
export class DataShapeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DataShapeError'
  }
}

/** Query for a signal that is not bound to the interpolator. */
export class UnknownSignalError extends Error {
  public readonly signal: string

  constructor(signal: string, known: readonly string[] = []) {
    const hint = known.length > 0 ? ` (known: ${known.join(', ')})` : ''
    super(`Unknown signal '${signal}'${hint}`)
    this.name = 'UnknownSignalError'
    this.signal = signal
  }
}

/** Grid construction given a too-short or non-increasing section list. */
export class InvalidSectionsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidSectionsError'
  }
}

/** Fewer than 2 usable structural stations. */
export class InsufficientDomainError extends Error {
  public readonly stations: number

  constructor(stations: number) {
    super(`Need at least 2 structural stations, got ${stations}`)
    this.name = 'InsufficientDomainError'
    this.stations = stations
  }
}

/** Section-selection configuration rejected by its schema. */
export class SelectionConfigError extends Error {
  public readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid section selection config: ${issues.join('; ')}`)
    this.name = 'SelectionConfigError'
    this.issues = issues
  }
}

/** Blade table text that cannot be mapped to columns. */
export class TableFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TableFormatError'
  }
}
