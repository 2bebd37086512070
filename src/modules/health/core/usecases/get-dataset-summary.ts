import type { DatasetSummary } from '../types.js';
import type { EpiDataset } from '../../../epi-dataset/index.js';

export type GetDatasetSummaryDeps = Pick<EpiDataset, 'store' | 'periods' | 'report'>;

/**
 * Row counts of the loaded dataset, for operators checking a deploy.
 */
export const getDatasetSummary = (dataset: GetDatasetSummaryDeps): DatasetSummary => {
  const { store, periods, report } = dataset;
  const latest = periods.entries().at(-1);

  return {
    rawRows: report.rawRows,
    gazetteerRows: report.gazetteerRows,
    observations: store.observationCount,
    locations: store.locationCount,
    periods: periods.size,
    latestDate: store.latestDate(),
    latestPeriod: latest?.label ?? null,
    dropped: { ...report.dropped },
    warnings: report.warnings.length,
  };
};
