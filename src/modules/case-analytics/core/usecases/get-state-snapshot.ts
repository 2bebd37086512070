import type { PeriodNotFoundError } from '../../../periods/index.js';
import type { StateSnapshot } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';
import type { Result } from 'neverthrow';

export interface GetStateSnapshotInput {
  state: string;
  periodOrdinal: number;
}

/**
 * State totals for a period: each county contributes its peak cumulative
 * value within the period, never the sum of its daily rows.
 */
export const getStateSnapshot = (
  deps: CaseAnalyticsDeps,
  input: GetStateSnapshotInput
): Result<StateSnapshot, PeriodNotFoundError> => {
  const { periods, store } = deps.dataset;

  return periods.labelFor(input.periodOrdinal).map((label) => {
    const counties = store.seriesForState(input.state, label);

    let totalCases = 0;
    let totalDeaths = 0;
    for (const county of counties) {
      totalCases += county.cases;
      totalDeaths += county.deaths;
    }

    return {
      state: input.state,
      period: label,
      periodOrdinal: input.periodOrdinal,
      totalCases,
      totalDeaths,
      countyCount: counties.length,
    };
  });
};
