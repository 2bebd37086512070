import { type Static, Type } from '@sinclair/typebox';

/**
 * Time-series CSV row as read from disk.
 * `deaths` may be empty in early reports and is read as 0.
 */
export const ObservationRowSchema = Type.Object(
  {
    date: Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' }),
    county: Type.String({ minLength: 1 }),
    state: Type.String({ minLength: 1 }),
    fips: Type.String({ pattern: '^(\\d{1,5}(\\.0+)?)?$' }),
    cases: Type.String({ pattern: '^\\d+$' }),
    deaths: Type.String({ pattern: '^\\d*$' }),
  },
  { additionalProperties: true }
);

export type ObservationRow = Static<typeof ObservationRowSchema>;

export const OBSERVATION_COLUMNS = ['date', 'county', 'state', 'fips', 'cases', 'deaths'] as const;

/**
 * One county report for one date. Counts are cumulative.
 */
export interface RawObservation {
  /** YYYY-MM-DD */
  date: string;
  county: string;
  state: string;
  /** 5-digit county code, null when the source leaves it empty */
  fips: string | null;
  cases: number;
  deaths: number;
}

/**
 * A raw observation whose location has been reconciled to a real county.
 */
export interface NormalizedObservation extends RawObservation {
  fips: string;
  /** "County, State" */
  countyStateKey: string;
  /** "Mon, YYYY" */
  periodKey: string;
  /** cases / 1000; clipped only where it is displayed */
  casesPerThousand: number;
}

export type DropReason =
  | 'UNKNOWN_COUNTY'
  | 'UNRESOLVED_SPECIAL_CASE'
  | 'UNRESOLVABLE_LOCATION'
  | 'INVALID_DATE';
