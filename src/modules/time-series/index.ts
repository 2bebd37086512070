/**
 * Time-Series Module Public API
 *
 * Normalized observations indexed by county and by (state, period).
 */

export type { SeriesPoint } from './core/types.js';
export type { TimeSeriesError, LocationPeriodNotFoundError } from './core/errors.js';
export { createLocationPeriodNotFoundError } from './core/errors.js';
export { createTimeSeriesStore, type TimeSeriesStore } from './core/store.js';
