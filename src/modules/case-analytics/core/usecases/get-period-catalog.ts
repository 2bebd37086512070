import type { PeriodCatalogView } from '../types.js';
import type { CaseAnalyticsDeps } from './deps.js';

/**
 * Lists the slider positions and their month labels.
 */
export const getPeriodCatalog = (deps: CaseAnalyticsDeps): PeriodCatalogView => {
  const { periods } = deps.dataset;
  const entries = periods.entries();
  const latest = entries[entries.length - 1];

  return {
    periods: entries.map((entry) => ({ ordinal: entry.ordinal, label: entry.label })),
    latestOrdinal: periods.latestOrdinal(),
    latestLabel: latest?.label ?? null,
  };
};
