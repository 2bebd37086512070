/**
 * Dataset health checker
 *
 * The dataset is loaded once before the server listens; the service is only
 * useful when that load produced at least one observation and one period.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';
import type { EpiDataset } from '../../../epi-dataset/index.js';

export interface DatasetHealthCheckerOptions {
  /** Name to identify the dataset in health check results (default: 'dataset') */
  name?: string;
}

/**
 * Creates a health checker over the loaded dataset.
 *
 * @example
 * ```typescript
 * const datasetChecker = makeDatasetHealthChecker(dataset);
 * const result = await datasetChecker();
 * // { name: 'dataset', status: 'healthy', message: '1200 observations, 9 periods', critical: true }
 * ```
 */
export const makeDatasetHealthChecker = (
  dataset: Pick<EpiDataset, 'store' | 'periods'>,
  options: DatasetHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'dataset' } = options;

  return (): Promise<HealthCheckResult> => {
    const observations = dataset.store.observationCount;
    const periods = dataset.periods.size;

    const result: HealthCheckResult = {
      name,
      status: observations > 0 && periods > 0 ? 'healthy' : 'unhealthy',
      message: `${String(observations)} observations, ${String(periods)} periods`,
      critical: true,
    };
    return Promise.resolve(result);
  };
};
