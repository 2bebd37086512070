/**
 * Record normalization: turns each raw time-series row into zero or one
 * observation keyed by a real county.
 *
 * 1. A row with a FIPS code and an ordinary county name passes through.
 * 2. "Unknown" without a FIPS code is dropped.
 * 3. Special-case cities (New York City, Kansas City, Joplin) are attributed to
 *    their county, with the code looked up in the gazetteer by city name.
 *    An unresolvable city is dropped with a data-integrity warning.
 * 4. Anything else without a usable location is dropped.
 */

import { toCountyStateKey } from '../../../common/types/location.js';
import { parseIsoDate, toPeriodKey } from '../../../common/types/temporal.js';
import { createUnresolvedSpecialCaseWarning, type DataIntegrityWarning } from './errors.js';
import { UNKNOWN_COUNTY_LABEL, findSpecialCase, isReservedCountyLabel } from './special-cases.js';

import type { DropReason, NormalizedObservation, RawObservation } from './types.js';
import type { GazetteerIndex } from '../../gazetteer/index.js';

export type NormalizeOutcome =
  | { kind: 'emit'; observation: NormalizedObservation }
  | { kind: 'drop'; reason: DropReason; warning?: DataIntegrityWarning };

export interface NormalizationReport {
  observations: NormalizedObservation[];
  dropped: Record<DropReason, number>;
  warnings: DataIntegrityWarning[];
}

export type FipsLookup = Pick<GazetteerIndex, 'fipsForCity'>;

const drop = (reason: DropReason, warning?: DataIntegrityWarning): NormalizeOutcome =>
  warning !== undefined ? { kind: 'drop', reason, warning } : { kind: 'drop', reason };

const emit = (
  raw: RawObservation,
  location: { county: string; state: string; fips: string }
): NormalizeOutcome => {
  const date = parseIsoDate(raw.date);
  if (date === null) {
    return drop('INVALID_DATE');
  }

  return {
    kind: 'emit',
    observation: {
      date: raw.date,
      county: location.county,
      state: location.state,
      fips: location.fips,
      cases: raw.cases,
      deaths: raw.deaths,
      countyStateKey: toCountyStateKey(location.county, location.state),
      periodKey: toPeriodKey(date),
      casesPerThousand: raw.cases / 1000,
    },
  };
};

/**
 * Normalizes a single row. Pure: the same row and gazetteer always give the
 * same outcome.
 */
export const normalizeObservation = (
  raw: RawObservation,
  gazetteer: FipsLookup
): NormalizeOutcome => {
  const specialCase = findSpecialCase(raw.county);
  if (specialCase !== undefined) {
    const fips = gazetteer.fipsForCity(specialCase.gazetteerCity, raw.state);
    if (fips.isErr()) {
      return drop(
        'UNRESOLVED_SPECIAL_CASE',
        createUnresolvedSpecialCaseWarning(raw.county, raw.state, raw.date)
      );
    }

    return emit(raw, { county: specialCase.county, state: specialCase.state, fips: fips.value });
  }

  if (raw.fips !== null && !isReservedCountyLabel(raw.county)) {
    return emit(raw, { county: raw.county, state: raw.state, fips: raw.fips });
  }

  if (raw.county === UNKNOWN_COUNTY_LABEL && raw.fips === null) {
    return drop('UNKNOWN_COUNTY');
  }

  return drop('UNRESOLVABLE_LOCATION');
};

const emptyDropCounts = (): Record<DropReason, number> => ({
  UNKNOWN_COUNTY: 0,
  UNRESOLVED_SPECIAL_CASE: 0,
  UNRESOLVABLE_LOCATION: 0,
  INVALID_DATE: 0,
});

/**
 * Normalizes a whole source, keeping source order for the emitted rows.
 */
export const normalizeObservations = (
  rows: readonly RawObservation[],
  gazetteer: FipsLookup
): NormalizationReport => {
  const observations: NormalizedObservation[] = [];
  const dropped = emptyDropCounts();
  const warnings: DataIntegrityWarning[] = [];

  for (const row of rows) {
    const outcome = normalizeObservation(row, gazetteer);

    if (outcome.kind === 'emit') {
      observations.push(outcome.observation);
      continue;
    }

    dropped[outcome.reason] += 1;
    if (outcome.warning !== undefined) {
      warnings.push(outcome.warning);
    }
  }

  return { observations, dropped, warnings };
};
