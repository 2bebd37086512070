import { err, ok, type Result } from 'neverthrow';

import {
  createLocationPeriodNotFoundError,
  type LocationPeriodNotFoundError,
} from './errors.js';

import type { SeriesPoint } from './types.js';
import type { NormalizedObservation } from '../../observations/index.js';

/**
 * Read-only index over normalized observations.
 *
 * "Period peak" below means one observation per (county, period) holding the
 * largest cumulative cases and the largest cumulative deaths seen in that
 * period, dated at the county's last report in the period. Cumulative counts
 * only grow, so the peak is the period's closing value even when the source
 * repeats or reorders rows.
 */
export interface TimeSeriesStore {
  /** Number of normalized observations indexed */
  readonly observationCount: number;
  /** Number of distinct county/state keys */
  readonly locationCount: number;
  hasLocation(countyStateKey: string): boolean;
  /** Date-ascending series, one point per date. Empty for an unknown key. */
  seriesFor(countyStateKey: string): readonly SeriesPoint[];
  byLocationPeriod(
    countyStateKey: string,
    periodKey: string
  ): Result<NormalizedObservation, LocationPeriodNotFoundError>;
  /** Period peaks of every county of a state, ordered by county key */
  seriesForState(state: string, periodKey: string): readonly NormalizedObservation[];
  /** Period peaks of every county, ordered by county key */
  allInPeriod(periodKey: string): readonly NormalizedObservation[];
  /** Latest date reported anywhere within the period */
  periodMaxDate(periodKey: string): string | null;
  latestDate(): string | null;
}

const compositeKey = (...parts: string[]): string => parts.join('\u0000');

const byCountyKey = (a: NormalizedObservation, b: NormalizedObservation): number =>
  a.countyStateKey < b.countyStateKey ? -1 : a.countyStateKey > b.countyStateKey ? 1 : 0;

const maxDate = (a: string, b: string): string => (a >= b ? a : b);

const mergePeak = (
  peak: NormalizedObservation | undefined,
  row: NormalizedObservation
): NormalizedObservation => {
  if (peak === undefined) {
    return { ...row };
  }

  // Identity fields follow the most recent report
  const latest = row.date >= peak.date ? row : peak;
  const cases = Math.max(peak.cases, row.cases);

  return {
    ...latest,
    cases,
    deaths: Math.max(peak.deaths, row.deaths),
    casesPerThousand: cases / 1000,
  };
};

/**
 * Sorts one county's rows by date (stable) and collapses same-date rows,
 * keeping the larger cumulative value of each count.
 */
const toSeries = (rows: readonly NormalizedObservation[]): SeriesPoint[] => {
  const sorted = [...rows].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  const series: SeriesPoint[] = [];

  for (const row of sorted) {
    const last = series[series.length - 1];
    if (last?.date === row.date) {
      last.cases = Math.max(last.cases, row.cases);
      last.deaths = Math.max(last.deaths, row.deaths);
      continue;
    }

    series.push({
      date: row.date,
      periodKey: row.periodKey,
      cases: row.cases,
      deaths: row.deaths,
    });
  }

  return series;
};

/**
 * Builds the store in one pass over the observations plus one sort per county.
 */
export const createTimeSeriesStore = (
  observations: readonly NormalizedObservation[]
): TimeSeriesStore => {
  const rowsByLocation = new Map<string, NormalizedObservation[]>();
  const peaks = new Map<string, NormalizedObservation>();
  const periodDates = new Map<string, string>();
  let latest: string | null = null;

  for (const row of observations) {
    const rows = rowsByLocation.get(row.countyStateKey);
    if (rows === undefined) {
      rowsByLocation.set(row.countyStateKey, [row]);
    } else {
      rows.push(row);
    }

    const peakKey = compositeKey(row.countyStateKey, row.periodKey);
    peaks.set(peakKey, mergePeak(peaks.get(peakKey), row));

    const periodDate = periodDates.get(row.periodKey);
    periodDates.set(
      row.periodKey,
      periodDate === undefined ? row.date : maxDate(periodDate, row.date)
    );
    latest = latest === null ? row.date : maxDate(latest, row.date);
  }

  const seriesByLocation = new Map<string, readonly SeriesPoint[]>();
  for (const [key, rows] of rowsByLocation) {
    seriesByLocation.set(key, toSeries(rows));
  }

  const peaksByPeriod = new Map<string, NormalizedObservation[]>();
  const peaksByStatePeriod = new Map<string, NormalizedObservation[]>();
  for (const peak of peaks.values()) {
    const inPeriod = peaksByPeriod.get(peak.periodKey) ?? [];
    inPeriod.push(peak);
    peaksByPeriod.set(peak.periodKey, inPeriod);

    const stateKey = compositeKey(peak.state, peak.periodKey);
    const inState = peaksByStatePeriod.get(stateKey) ?? [];
    inState.push(peak);
    peaksByStatePeriod.set(stateKey, inState);
  }
  for (const list of [...peaksByPeriod.values(), ...peaksByStatePeriod.values()]) {
    list.sort(byCountyKey);
  }

  return {
    observationCount: observations.length,
    locationCount: seriesByLocation.size,

    hasLocation(countyStateKey) {
      return seriesByLocation.has(countyStateKey);
    },

    seriesFor(countyStateKey) {
      return seriesByLocation.get(countyStateKey) ?? [];
    },

    byLocationPeriod(countyStateKey, periodKey) {
      const peak = peaks.get(compositeKey(countyStateKey, periodKey));
      return peak !== undefined
        ? ok(peak)
        : err(createLocationPeriodNotFoundError(countyStateKey, periodKey));
    },

    seriesForState(state, periodKey) {
      return peaksByStatePeriod.get(compositeKey(state, periodKey)) ?? [];
    },

    allInPeriod(periodKey) {
      return peaksByPeriod.get(periodKey) ?? [];
    },

    periodMaxDate(periodKey) {
      return periodDates.get(periodKey) ?? null;
    },

    latestDate() {
      return latest;
    },
  };
};
