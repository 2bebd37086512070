import { withNewCounts } from '../new-counts.js';

import type { DailyPoint } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';

export interface GetDailySeriesInput {
  countyStateKey: string;
}

/**
 * Per-report cumulative and new counts for one county; empty when unknown.
 */
export const getDailySeries = (
  deps: CaseAnalyticsDeps,
  input: GetDailySeriesInput
): DailyPoint[] => {
  return withNewCounts(deps.dataset.store.seriesFor(input.countyStateKey));
};
