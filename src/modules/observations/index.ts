/**
 * Observations Module Public API
 *
 * Raw time-series rows and their normalization onto real counties.
 */

export type {
  RawObservation,
  NormalizedObservation,
  ObservationRow,
  DropReason,
} from './core/types.js';
export { ObservationRowSchema, OBSERVATION_COLUMNS } from './core/types.js';

export type {
  DataIntegrityWarning,
  UnresolvedSpecialCaseWarning,
  MalformedRowWarning,
} from './core/errors.js';
export { createUnresolvedSpecialCaseWarning, createMalformedRowWarning } from './core/errors.js';

export {
  SPECIAL_CASE_CITIES,
  RESERVED_COUNTY_LABELS,
  UNKNOWN_COUNTY_LABEL,
  findSpecialCase,
  isReservedCountyLabel,
  type SpecialCaseCity,
} from './core/special-cases.js';

export {
  normalizeObservation,
  normalizeObservations,
  type NormalizeOutcome,
  type NormalizationReport,
  type FipsLookup,
} from './core/normalize.js';

export type { ObservationRepository } from './core/ports.js';

export {
  makeObservationRepo,
  toRawObservations,
  type ObservationRepoOptions,
} from './shell/repo/csv-repo.js';
