/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import { buildEpiDataset, type EpiDataset } from '@/modules/epi-dataset/index.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { GazetteerEntry } from '@/modules/gazetteer/index.js';
import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';
import type { RawObservation } from '@/modules/observations/index.js';

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

/**
 * Create a test configuration with defaults
 */
export const makeTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => {
  const defaults: AppConfig = {
    server: {
      port: 3000,
      host: '0.0.0.0',
      isDevelopment: false,
      isProduction: false,
      isTest: true,
    },
    logger: {
      level: 'silent',
      pretty: false,
    },
    sources: {
      timeSeriesPath: './data/us-counties.csv',
      gazetteerPath: './data/us-cities.csv',
    },
    cors: {
      allowedOrigins: undefined,
      clientBaseUrl: undefined,
    },
  };

  return { ...defaults, ...overrides };
};

// ─────────────────────────────────────────────────────────────────────────────
// Source rows
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a gazetteer entry with defaults (Seattle, King County)
 */
export const makeGazetteerEntry = (overrides: Partial<GazetteerEntry> = {}): GazetteerEntry => ({
  city: 'Seattle',
  stateAbbr: 'WA',
  stateName: 'Washington',
  countyFips: '53033',
  countyName: 'King',
  ...overrides,
});

/**
 * Reference rows covering the special-case cities and one ordinary county.
 */
export const DEFAULT_GAZETTEER: readonly GazetteerEntry[] = [
  makeGazetteerEntry({
    city: 'New York',
    stateAbbr: 'NY',
    stateName: 'New York',
    countyFips: '36061',
    countyName: 'New York',
  }),
  makeGazetteerEntry({
    city: 'Kansas City',
    stateAbbr: 'MO',
    stateName: 'Missouri',
    countyFips: '29095',
    countyName: 'Jackson',
  }),
  makeGazetteerEntry({
    city: 'Independence',
    stateAbbr: 'MO',
    stateName: 'Missouri',
    countyFips: '29095',
    countyName: 'Jackson',
  }),
  makeGazetteerEntry({
    city: 'Joplin',
    stateAbbr: 'MO',
    stateName: 'Missouri',
    countyFips: '29097',
    countyName: 'Jasper',
  }),
  makeGazetteerEntry(),
  makeGazetteerEntry({
    city: 'Kansas City',
    stateAbbr: 'KS',
    stateName: 'Kansas',
    countyFips: '20209',
    countyName: 'Wyandotte',
  }),
];

/**
 * Create a raw time-series row. Defaults to King County, Washington.
 */
export const makeRawObservation = (overrides: Partial<RawObservation> = {}): RawObservation => ({
  date: '2020-03-01',
  county: 'King',
  state: 'Washington',
  fips: '53033',
  cases: 0,
  deaths: 0,
  ...overrides,
});

/**
 * Shorthand for a King County row: `kingRow('2020-03-01', 10, 1)`
 */
export const kingRow = (date: string, cases: number, deaths = 0): RawObservation =>
  makeRawObservation({ date, cases, deaths });

export interface TestDatasetInput {
  observations: readonly RawObservation[];
  gazetteer?: readonly GazetteerEntry[];
}

/**
 * Builds a dataset in memory from literal rows, as the loader would.
 */
export const makeTestDataset = (input: TestDatasetInput): EpiDataset =>
  buildEpiDataset({
    observations: { records: [...input.observations], issues: [] },
    gazetteer: { records: [...(input.gazetteer ?? DEFAULT_GAZETTEER)], issues: [] },
  });
