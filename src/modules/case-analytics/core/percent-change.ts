/**
 * Percent-change statistics for county snapshots.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { toDayNumber } from '../../../common/types/temporal.js';
import { createDivisionUndefinedError, type DivisionUndefinedError } from './errors.js';
import { newCountOf } from './new-counts.js';

import type { CountMetric, DailyPoint } from './types.js';

/** Length of each comparison window in CURRENT mode */
export const TRAILING_WINDOW_DAYS = 7;

/**
 * `numerator / denominator * 100`, rounded half-up to two decimals.
 * A zero or negative denominator has no meaningful percentage.
 */
export const percentChange = (
  numerator: number,
  denominator: number
): Result<number, DivisionUndefinedError> => {
  if (denominator <= 0) {
    return err(createDivisionUndefinedError(numerator, denominator));
  }

  return ok(
    new Decimal(numerator)
      .div(denominator)
      .mul(100)
      .toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
      .toNumber()
  );
};

export interface WindowTotals {
  /** New counts in (D-7, D] */
  newTotal: number;
  /** New counts in (D-14, D-7] */
  oldTotal: number;
}

/**
 * Sums new counts over the two trailing windows ending at the last point's date.
 */
export const trailingWindowTotals = (
  daily: readonly DailyPoint[],
  metric: CountMetric
): WindowTotals => {
  const last = daily[daily.length - 1];
  if (last === undefined) {
    return { newTotal: 0, oldTotal: 0 };
  }

  const end = toDayNumber(last.date);
  let newTotal = 0;
  let oldTotal = 0;

  for (const point of daily) {
    const age = end - toDayNumber(point.date);
    if (age < TRAILING_WINDOW_DAYS) {
      newTotal += newCountOf(point, metric);
    } else if (age < 2 * TRAILING_WINDOW_DAYS) {
      oldTotal += newCountOf(point, metric);
    }
  }

  return { newTotal, oldTotal };
};

/**
 * CURRENT mode: last 7 days against the 7 days before,
 * `(new - old) / old * 100`.
 */
export const currentWindowChange = (
  daily: readonly DailyPoint[],
  metric: CountMetric
): Result<number, DivisionUndefinedError> => {
  const { newTotal, oldTotal } = trailingWindowTotals(daily, metric);
  return percentChange(newTotal - oldTotal, oldTotal);
};

/**
 * HISTORICAL mode: the period's new counts against the location's eventual
 * cumulative maximum, with the subtraction reversed:
 * `(eventual - period) / eventual * 100`.
 */
export const historicalChange = (
  daily: readonly DailyPoint[],
  periodKey: string,
  metric: CountMetric
): Result<number, DivisionUndefinedError> => {
  let periodTotal = 0;
  let eventual = 0;

  for (const point of daily) {
    if (point.periodKey === periodKey) {
      periodTotal += newCountOf(point, metric);
    }
    eventual = Math.max(eventual, metric === 'cases' ? point.cases : point.deaths);
  }

  return percentChange(eventual - periodTotal, eventual);
};
