import { type Static, Type } from '@sinclair/typebox';

/**
 * Gazetteer CSV row as read from disk. Extra columns (population, lat/lng, ...)
 * are allowed and ignored.
 */
export const GazetteerRowSchema = Type.Object(
  {
    city: Type.String({ minLength: 1 }),
    state_id: Type.String({ minLength: 1 }),
    state_name: Type.String({ minLength: 1 }),
    county_fips: Type.String({ description: 'County FIPS code, may be empty or unpadded' }),
    county_name: Type.String({ minLength: 1 }),
  },
  { additionalProperties: true }
);

export type GazetteerRow = Static<typeof GazetteerRowSchema>;

export const GAZETTEER_COLUMNS = [
  'city',
  'state_id',
  'state_name',
  'county_fips',
  'county_name',
] as const;

export interface GazetteerEntry {
  city: string;
  stateAbbr: string;
  stateName: string;
  /** 5-digit code, null when the source cell is empty */
  countyFips: string | null;
  countyName: string;
}

/**
 * A city resolved to its containing county and state.
 */
export interface CityLocation {
  /** Picker label, e.g. "Kansas City, MO" */
  cityKey: string;
  city: string;
  stateAbbr: string;
  county: string;
  state: string;
  /** Join key into the time series, e.g. "Jackson, Missouri" */
  countyStateKey: string;
  fips: string | null;
}

export interface ListCitiesInput {
  /** Case-insensitive substring of the city label */
  search?: string | undefined;
  limit: number;
}
