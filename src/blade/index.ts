/**
 * Blade module: public API.
 *
 * Barrel export for the sectioning / grid / interpolation library.
 * Everything in this directory is I/O-free.
 */

export type {
  SampleSeries, SampleTable, SectionTag, ControlSection,
  ElementTriple, EvalPair, GridLayout, SignalEvaluator, BladeGrid,
  SectionReport, SectionSelection,
} from './types.ts'
export {
  DataShapeError, UnknownSignalError, InvalidSectionsError,
  InsufficientDomainError, SelectionConfigError, TableFormatError,
} from './errors.ts'
export { normalizeTable, normalizeSeries, seriesOf, hasSignal, domainOf } from './series.ts'
export { interpolateSeries, createInterpolator } from './interpolate.ts'
export type { Interpolator } from './interpolate.ts'
export { buildGrid, attachInterpolators } from './grid.ts'
export { SelectionConfigSchema, resolveSelectionConfig, DEFAULT_TRACKED_SIGNALS } from './selection-config.ts'
export type { SelectionConfig, SelectionConfigInput } from './selection-config.ts'
export { tagRank, sectionRank, isProtected, formatTag, POSITION_EPS } from './section-tags.ts'
export {
  selectSections, createSelectionContext, detectStart, clampStart, detectHardConstraints,
  enforceMaxLength, refineByError, enforceMinLength, enforceCap,
  detectJumps, detectChordVertices, midpointError,
} from './section-select.ts'
export type { SelectionContext, SelectionState, TrackedSignal } from './section-select.ts'
export { assembleConstitutive, constitutiveAt, sectionStiffnessAt, shearCentreOffset } from './constitutive.ts'
export type { Matrix6, SectionStiffness } from './constitutive.ts'
export { lumpNodeBodies, nodeInterval } from './lumping.ts'
export type { NodeBody, LumpedBodies } from './lumping.ts'
