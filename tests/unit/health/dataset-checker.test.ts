import { describe, expect, it } from 'vitest';

import { makeDatasetHealthChecker } from '@/modules/health/index.js';

import { kingRow, makeTestDataset } from '../../fixtures/builders.js';

describe('makeDatasetHealthChecker', () => {
  it('is healthy when observations and periods were loaded', async () => {
    const checker = makeDatasetHealthChecker(
      makeTestDataset({ observations: [kingRow('2020-03-01', 1), kingRow('2020-04-01', 2)] })
    );

    expect(await checker()).toEqual({
      name: 'dataset',
      status: 'healthy',
      message: '2 observations, 2 periods',
      critical: true,
    });
  });

  it('is unhealthy when nothing was loaded', async () => {
    const checker = makeDatasetHealthChecker(makeTestDataset({ observations: [] }), {
      name: 'time-series',
    });

    expect(await checker()).toEqual({
      name: 'time-series',
      status: 'unhealthy',
      message: '0 observations, 0 periods',
      critical: true,
    });
  });
});
