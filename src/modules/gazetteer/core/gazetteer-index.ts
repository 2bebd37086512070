import { err, ok, type Result } from 'neverthrow';

import { toCityKey, toCountyStateKey } from '../../../common/types/location.js';
import {
  createCityFipsNotFoundError,
  createCityNotFoundError,
  createCountyFipsNotFoundError,
  type CityFipsNotFoundError,
  type CityNotFoundError,
  type CountyFipsNotFoundError,
} from './errors.js';

import type { CityLocation, GazetteerEntry, ListCitiesInput } from './types.js';

/**
 * Read-only lookups over the city/county/state reference table.
 */
export interface GazetteerIndex {
  /** Number of distinct city labels */
  readonly size: number;
  resolveCity(cityKey: string): Result<CityLocation, CityNotFoundError>;
  /**
   * FIPS code of a county. The gazetteer repeats a county once per city, so the
   * first row with a non-empty code wins; codes are never combined.
   */
  countyFipsFor(county: string, state: string): Result<string, CountyFipsNotFoundError>;
  /** FIPS code of the county containing a city (first non-empty match). */
  fipsForCity(city: string, state: string): Result<string, CityFipsNotFoundError>;
  listCities(input: ListCitiesInput): CityLocation[];
}

const cityStateKey = (city: string, state: string): string => `${city}\u0000${state}`;

const toCityLocation = (entry: GazetteerEntry): CityLocation => ({
  cityKey: toCityKey(entry.city, entry.stateAbbr),
  city: entry.city,
  stateAbbr: entry.stateAbbr,
  county: entry.countyName,
  state: entry.stateName,
  countyStateKey: toCountyStateKey(entry.countyName, entry.stateName),
  fips: entry.countyFips,
});

/**
 * Builds the index in one pass. Rows keep source order; on duplicate keys the
 * earliest row wins, so lookups do not depend on how many duplicates exist.
 */
export const createGazetteerIndex = (entries: readonly GazetteerEntry[]): GazetteerIndex => {
  const cities: CityLocation[] = [];
  const cityByKey = new Map<string, CityLocation>();
  const fipsByCounty = new Map<string, string>();
  const fipsByCity = new Map<string, string>();

  for (const entry of entries) {
    const location = toCityLocation(entry);

    if (!cityByKey.has(location.cityKey)) {
      cityByKey.set(location.cityKey, location);
      cities.push(location);
    }

    if (entry.countyFips === null) {
      continue;
    }

    if (!fipsByCounty.has(location.countyStateKey)) {
      fipsByCounty.set(location.countyStateKey, entry.countyFips);
    }

    const cityKey = cityStateKey(entry.city, entry.stateName);
    if (!fipsByCity.has(cityKey)) {
      fipsByCity.set(cityKey, entry.countyFips);
    }
  }

  return {
    size: cities.length,

    resolveCity(cityKey) {
      const location = cityByKey.get(cityKey.trim());
      return location !== undefined ? ok(location) : err(createCityNotFoundError(cityKey));
    },

    countyFipsFor(county, state) {
      const fips = fipsByCounty.get(toCountyStateKey(county, state));
      return fips !== undefined ? ok(fips) : err(createCountyFipsNotFoundError(county, state));
    },

    fipsForCity(city, state) {
      const fips = fipsByCity.get(cityStateKey(city, state));
      return fips !== undefined ? ok(fips) : err(createCityFipsNotFoundError(city, state));
    },

    listCities({ search, limit }) {
      const needle = search?.trim().toLowerCase() ?? '';
      const matches =
        needle === ''
          ? cities
          : cities.filter((location) => location.cityKey.toLowerCase().includes(needle));
      return matches.slice(0, Math.max(0, limit));
    },
  };
};
