import type { CityLocation, CityNotFoundError } from '../../../gazetteer/index.js';
import type { CityQueryResult } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';
import type { Result } from 'neverthrow';

export interface ResolveCityQueryInput {
  /** Picker label, e.g. "Kansas City, MO" */
  city: string;
}

export const toCityQueryResult = (location: CityLocation): CityQueryResult => ({
  cityKey: location.cityKey,
  city: location.city,
  stateAbbr: location.stateAbbr,
  county: location.county,
  countyStateKey: location.countyStateKey,
  state: location.state,
  fips: location.fips,
});

/**
 * Maps a selected city to the county/state key the time series is indexed by.
 */
export const resolveCityQuery = (
  deps: CaseAnalyticsDeps,
  input: ResolveCityQueryInput
): Result<CityQueryResult, CityNotFoundError> => {
  return deps.dataset.gazetteer.resolveCity(input.city).map(toCityQueryResult);
};
