import type { PeriodNotFoundError } from '../../../periods/index.js';
import type { CountyMapEntry } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';
import type { Result } from 'neverthrow';

/** Upper bound of the choropleth colour scale, in cases per thousand */
export const CASES_PER_THOUSAND_DISPLAY_MAX = 11;

export interface GetCountyMapInput {
  periodOrdinal: number;
}

export const clipCasesPerThousand = (value: number): number =>
  Math.min(CASES_PER_THOUSAND_DISPLAY_MAX, Math.max(0, value));

/**
 * One entry per reporting county with its period peak, for the map layer.
 */
export const getCountyMap = (
  deps: CaseAnalyticsDeps,
  input: GetCountyMapInput
): Result<CountyMapEntry[], PeriodNotFoundError> => {
  const { periods, store } = deps.dataset;

  return periods.labelFor(input.periodOrdinal).map((label) =>
    store.allInPeriod(label).map((peak) => ({
      fips: peak.fips,
      countyStateKey: peak.countyStateKey,
      county: peak.county,
      state: peak.state,
      cases: peak.cases,
      deaths: peak.deaths,
      casesPerThousand: clipCasesPerThousand(peak.casesPerThousand),
      asOfDate: peak.date,
    }))
  );
};
