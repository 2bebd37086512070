import { toCityQueryResult } from './resolve-city-query.js';

import type { CityQueryResult } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';

export interface ListCitiesQueryInput {
  search?: string | undefined;
  limit: number;
}

/**
 * City picker options in gazetteer order.
 */
export const listCities = (
  deps: CaseAnalyticsDeps,
  input: ListCitiesQueryInput
): CityQueryResult[] => {
  return deps.dataset.gazetteer
    .listCities({ search: input.search, limit: input.limit })
    .map(toCityQueryResult);
};
