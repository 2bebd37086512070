/**
 * Get County Snapshot Use Case
 *
 * Cumulative counts and percent change for one county in one period.
 *
 * - CURRENT mode (latest period): counts as of the county's last report;
 *   percent change of the trailing 7 days against the 7 days before.
 * - HISTORICAL mode: counts at the county's peak within the period; percent
 *   change of the period's new counts against the county's eventual total.
 * - A county with no observations at all gets zero counts dated at the
 *   period's latest date across the whole dataset.
 */

import { ok, type Result } from 'neverthrow';

import { withNewCounts } from '../new-counts.js';
import { currentWindowChange, historicalChange } from '../percent-change.js';

import type { PeriodNotFoundError } from '../../../periods/index.js';
import type { DailyPoint, CountySnapshot, SnapshotMode } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';

export interface GetCountySnapshotInput {
  countyStateKey: string;
  periodOrdinal: number;
}

interface PeriodRef {
  label: string;
  ordinal: number;
  mode: SnapshotMode;
}

const emptySnapshot = (
  countyStateKey: string,
  period: PeriodRef,
  asOfDate: string | null
): CountySnapshot => ({
  countyStateKey,
  period: period.label,
  periodOrdinal: period.ordinal,
  mode: period.mode,
  cumulativeCases: 0,
  cumulativeDeaths: 0,
  pctChangeCases: 0,
  pctChangeDeaths: 0,
  asOfDate,
  hasData: false,
});

const currentSnapshot = (
  countyStateKey: string,
  period: PeriodRef,
  daily: readonly DailyPoint[],
  last: DailyPoint
): CountySnapshot => ({
  countyStateKey,
  period: period.label,
  periodOrdinal: period.ordinal,
  mode: period.mode,
  cumulativeCases: last.cases,
  cumulativeDeaths: last.deaths,
  pctChangeCases: currentWindowChange(daily, 'cases').unwrapOr(0),
  pctChangeDeaths: currentWindowChange(daily, 'deaths').unwrapOr(0),
  asOfDate: last.date,
  hasData: true,
});

const historicalSnapshot = (
  deps: CaseAnalyticsDeps,
  countyStateKey: string,
  period: PeriodRef,
  daily: readonly DailyPoint[]
): CountySnapshot => {
  const { store } = deps.dataset;
  const peak = store.byLocationPeriod(countyStateKey, period.label);

  let cumulativeCases: number;
  let cumulativeDeaths: number;
  let asOfDate: string | null;

  if (peak.isOk()) {
    cumulativeCases = peak.value.cases;
    cumulativeDeaths = peak.value.deaths;
    asOfDate = peak.value.date;
  } else {
    // Silent in this period: carry the last earlier report forward
    const periodEnd = store.periodMaxDate(period.label);
    const carried =
      periodEnd === null ? undefined : daily.filter((point) => point.date <= periodEnd).at(-1);
    cumulativeCases = carried?.cases ?? 0;
    cumulativeDeaths = carried?.deaths ?? 0;
    asOfDate = periodEnd;
  }

  return {
    countyStateKey,
    period: period.label,
    periodOrdinal: period.ordinal,
    mode: period.mode,
    cumulativeCases,
    cumulativeDeaths,
    pctChangeCases: historicalChange(daily, period.label, 'cases').unwrapOr(0),
    pctChangeDeaths: historicalChange(daily, period.label, 'deaths').unwrapOr(0),
    asOfDate,
    hasData: true,
  };
};

export const getCountySnapshot = (
  deps: CaseAnalyticsDeps,
  input: GetCountySnapshotInput
): Result<CountySnapshot, PeriodNotFoundError> => {
  const { periods, store } = deps.dataset;

  return periods.labelFor(input.periodOrdinal).andThen((label) => {
    const period: PeriodRef = {
      label,
      ordinal: input.periodOrdinal,
      mode: input.periodOrdinal === periods.latestOrdinal() ? 'CURRENT' : 'HISTORICAL',
    };

    const daily = withNewCounts(store.seriesFor(input.countyStateKey));
    const last = daily.at(-1);
    if (last === undefined) {
      return ok(emptySnapshot(input.countyStateKey, period, store.periodMaxDate(label)));
    }

    return ok(
      period.mode === 'CURRENT'
        ? currentSnapshot(input.countyStateKey, period, daily, last)
        : historicalSnapshot(deps, input.countyStateKey, period, daily)
    );
  });
};
