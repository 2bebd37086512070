import {
  getDatasetSummary,
  type GetDatasetSummaryDeps,
} from '../../core/usecases/get-dataset-summary.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { IResolvers } from 'mercurius';

export interface MakeHealthResolversDeps extends Partial<GetReadinessDeps> {
  dataset?: GetDatasetSummaryDeps;
}

/**
 * Factory function to create health resolvers with dependencies
 */
export const makeHealthResolvers = (deps: MakeHealthResolversDeps = {}): IResolvers => {
  const { version, checkers = [], dataset } = deps;

  return {
    Query: {
      health: () => 'ok',
      ready: async () =>
        getReadiness(
          { version, checkers },
          { uptime: process.uptime(), timestamp: new Date().toISOString() }
        ),
      datasetSummary: () => (dataset !== undefined ? getDatasetSummary(dataset) : null),
    },
  };
};
