import type { SeriesPoint } from '../../time-series/index.js';

/**
 * CURRENT: the requested period is the latest one; the percent change compares
 * the last 7 days with the 7 days before.
 * HISTORICAL: an earlier period; the percent change compares the period's new
 * counts with the location's eventual total.
 */
export type SnapshotMode = 'CURRENT' | 'HISTORICAL';

export type CountMetric = 'cases' | 'deaths';

/**
 * A series point with the increments since the previous report.
 */
export interface DailyPoint extends SeriesPoint {
  newCases: number;
  newDeaths: number;
}

export interface CountySnapshot {
  countyStateKey: string;
  period: string;
  periodOrdinal: number;
  mode: SnapshotMode;
  cumulativeCases: number;
  cumulativeDeaths: number;
  /** Signed, two decimals; 0 when the comparison is undefined */
  pctChangeCases: number;
  pctChangeDeaths: number;
  asOfDate: string | null;
  /** False when the location has no observations at all */
  hasData: boolean;
}

export interface StateSnapshot {
  state: string;
  period: string;
  periodOrdinal: number;
  totalCases: number;
  totalDeaths: number;
  countyCount: number;
}

export interface NationalSnapshot {
  period: string;
  periodOrdinal: number;
  totalCases: number;
  totalDeaths: number;
  stateCount: number;
  countyCount: number;
}

export interface MonthlySeriesPoint {
  period: string;
  newCases: number;
  newDeaths: number;
}

export interface CountyMapEntry {
  fips: string;
  countyStateKey: string;
  county: string;
  state: string;
  cases: number;
  deaths: number;
  /** cases / 1000 clipped to the colour scale range */
  casesPerThousand: number;
  asOfDate: string;
}

export interface CityQueryResult {
  cityKey: string;
  city: string;
  stateAbbr: string;
  county: string;
  countyStateKey: string;
  state: string;
  fips: string | null;
}

export interface PeriodCatalogView {
  periods: { ordinal: number; label: string }[];
  latestOrdinal: number;
  latestLabel: string | null;
}
