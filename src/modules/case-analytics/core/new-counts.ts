import type { CountMetric, DailyPoint } from './types.js';
import type { SeriesPoint } from '../../time-series/index.js';

/**
 * Derives per-report increments from cumulative counts.
 *
 * Scans the date-ascending series carrying the previous cumulative value: the
 * first point reports its cumulative value, later points the difference from
 * the previous point. Downward corrections give negative increments.
 */
export const withNewCounts = (series: readonly SeriesPoint[]): DailyPoint[] => {
  const daily: DailyPoint[] = [];
  let previous: SeriesPoint | undefined;

  for (const point of series) {
    daily.push({
      ...point,
      newCases: point.cases - (previous?.cases ?? 0),
      newDeaths: point.deaths - (previous?.deaths ?? 0),
    });
    previous = point;
  }

  return daily;
};

export const newCountOf = (point: DailyPoint, metric: CountMetric): number =>
  metric === 'cases' ? point.newCases : point.newDeaths;
