import { withNewCounts } from '../new-counts.js';

import type { MonthlySeriesPoint } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';

export interface GetMonthlySeriesInput {
  countyStateKey: string;
}

/**
 * New cases and deaths per month for the chart.
 *
 * Increments come from the full date-ordered series, so the first report of a
 * month is measured against the last report of the previous month. An unknown
 * location gets a zero for every period so the chart axis stays complete.
 */
export const getMonthlySeries = (
  deps: CaseAnalyticsDeps,
  input: GetMonthlySeriesInput
): MonthlySeriesPoint[] => {
  const { periods, store } = deps.dataset;

  if (!store.hasLocation(input.countyStateKey)) {
    return periods.entries().map((entry) => ({ period: entry.label, newCases: 0, newDeaths: 0 }));
  }

  const byPeriod = new Map<string, MonthlySeriesPoint>();
  for (const point of withNewCounts(store.seriesFor(input.countyStateKey))) {
    const bucket = byPeriod.get(point.periodKey);
    if (bucket === undefined) {
      byPeriod.set(point.periodKey, {
        period: point.periodKey,
        newCases: point.newCases,
        newDeaths: point.newDeaths,
      });
    } else {
      bucket.newCases += point.newCases;
      bucket.newDeaths += point.newDeaths;
    }
  }

  // Map iteration follows first insertion, i.e. chronological order
  return [...byPeriod.values()];
};
