/**
 * Periods Module Public API
 *
 * Month periods present in the time series, addressed by slider ordinal.
 */

export type { PeriodNotFoundError } from './core/errors.js';
export {
  createPeriodOrdinalNotFoundError,
  createPeriodLabelNotFoundError,
} from './core/errors.js';
export {
  createPeriodCatalog,
  type PeriodCatalog,
  type PeriodEntry,
  type DatedPeriod,
} from './core/period-catalog.js';
