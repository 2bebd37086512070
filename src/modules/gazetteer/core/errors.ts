/**
 * Gazetteer Module - Domain Errors
 */

export interface CityNotFoundError {
  readonly type: 'CITY_NOT_FOUND';
  readonly cityKey: string;
  readonly message: string;
}

export interface CountyFipsNotFoundError {
  readonly type: 'COUNTY_FIPS_NOT_FOUND';
  readonly county: string;
  readonly state: string;
  readonly message: string;
}

export interface CityFipsNotFoundError {
  readonly type: 'CITY_FIPS_NOT_FOUND';
  readonly city: string;
  readonly state: string;
  readonly message: string;
}

export type GazetteerError = CityNotFoundError | CountyFipsNotFoundError | CityFipsNotFoundError;

export const createCityNotFoundError = (cityKey: string): CityNotFoundError => ({
  type: 'CITY_NOT_FOUND',
  cityKey,
  message: `City '${cityKey}' is not in the gazetteer`,
});

export const createCountyFipsNotFoundError = (
  county: string,
  state: string
): CountyFipsNotFoundError => ({
  type: 'COUNTY_FIPS_NOT_FOUND',
  county,
  state,
  message: `No FIPS code for county '${county}' in ${state}`,
});

export const createCityFipsNotFoundError = (city: string, state: string): CityFipsNotFoundError => ({
  type: 'CITY_FIPS_NOT_FOUND',
  city,
  state,
  message: `No FIPS code for city '${city}' in ${state}`,
});
