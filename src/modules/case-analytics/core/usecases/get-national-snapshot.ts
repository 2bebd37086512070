import type { PeriodNotFoundError } from '../../../periods/index.js';
import type { NationalSnapshot } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';
import type { Result } from 'neverthrow';

export interface GetNationalSnapshotInput {
  periodOrdinal: number;
}

/**
 * Country-wide totals for a period, summed the same way as state totals.
 */
export const getNationalSnapshot = (
  deps: CaseAnalyticsDeps,
  input: GetNationalSnapshotInput
): Result<NationalSnapshot, PeriodNotFoundError> => {
  const { periods, store } = deps.dataset;

  return periods.labelFor(input.periodOrdinal).map((label) => {
    const counties = store.allInPeriod(label);
    const states = new Set<string>();

    let totalCases = 0;
    let totalDeaths = 0;
    for (const county of counties) {
      totalCases += county.cases;
      totalDeaths += county.deaths;
      states.add(county.state);
    }

    return {
      period: label,
      periodOrdinal: input.periodOrdinal,
      totalCases,
      totalDeaths,
      stateCount: states.size,
      countyCount: counties.length,
    };
  });
};
