import type { EpiDataset } from '../../../epi-dataset/index.js';

/**
 * Every case-analytics use case reads from the same immutable dataset.
 */
export interface CaseAnalyticsDeps {
  dataset: EpiDataset;
}
