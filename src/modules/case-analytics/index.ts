/**
 * Case Analytics Module Public API
 *
 * Read-side queries over the loaded dataset: snapshots, series, county map,
 * period catalog and city resolution.
 */

// ============================================================================
// Core Types
// ============================================================================

export type {
  SnapshotMode,
  CountMetric,
  DailyPoint,
  CountySnapshot,
  StateSnapshot,
  NationalSnapshot,
  MonthlySeriesPoint,
  CountyMapEntry,
  CityQueryResult,
  PeriodCatalogView,
} from './core/types.js';

// ============================================================================
// Errors
// ============================================================================

export type { CaseAnalyticsError, DivisionUndefinedError } from './core/errors.js';
export { createDivisionUndefinedError } from './core/errors.js';

// ============================================================================
// Calculations
// ============================================================================

export { withNewCounts, newCountOf } from './core/new-counts.js';
export {
  TRAILING_WINDOW_DAYS,
  percentChange,
  trailingWindowTotals,
  currentWindowChange,
  historicalChange,
  type WindowTotals,
} from './core/percent-change.js';

// ============================================================================
// Use Cases
// ============================================================================

export type { CaseAnalyticsDeps } from './core/usecases/deps.js';
export { getPeriodCatalog } from './core/usecases/get-period-catalog.js';
export {
  resolveCityQuery,
  toCityQueryResult,
  type ResolveCityQueryInput,
} from './core/usecases/resolve-city-query.js';
export { listCities, type ListCitiesQueryInput } from './core/usecases/list-cities.js';
export {
  getCountySnapshot,
  type GetCountySnapshotInput,
} from './core/usecases/get-county-snapshot.js';
export { getStateSnapshot, type GetStateSnapshotInput } from './core/usecases/get-state-snapshot.js';
export {
  getNationalSnapshot,
  type GetNationalSnapshotInput,
} from './core/usecases/get-national-snapshot.js';
export { getMonthlySeries, type GetMonthlySeriesInput } from './core/usecases/get-monthly-series.js';
export { getDailySeries, type GetDailySeriesInput } from './core/usecases/get-daily-series.js';
export {
  getCountyMap,
  clipCasesPerThousand,
  CASES_PER_THOUSAND_DISPLAY_MAX,
  type GetCountyMapInput,
} from './core/usecases/get-county-map.js';

// ============================================================================
// GraphQL
// ============================================================================

export { CaseAnalyticsSchema } from './shell/graphql/schema.js';
export {
  makeCaseAnalyticsResolvers,
  DEFAULT_CITY_LIMIT,
  MAX_CITY_LIMIT,
  type MakeCaseAnalyticsResolversDeps,
} from './shell/graphql/resolvers.js';
