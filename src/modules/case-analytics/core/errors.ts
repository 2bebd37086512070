/**
 * Case Analytics Module - Domain Errors
 */

import type { CityNotFoundError } from '../../gazetteer/index.js';
import type { PeriodNotFoundError } from '../../periods/index.js';

/**
 * A percent change whose comparison base is zero or negative.
 * Callers display 0% instead.
 */
export interface DivisionUndefinedError {
  readonly type: 'DIVISION_UNDEFINED';
  readonly reason: 'ZERO_DENOMINATOR' | 'NEGATIVE_DENOMINATOR';
  readonly numerator: number;
  readonly denominator: number;
  readonly message: string;
}

export type CaseAnalyticsError = PeriodNotFoundError | CityNotFoundError | DivisionUndefinedError;

export const createDivisionUndefinedError = (
  numerator: number,
  denominator: number
): DivisionUndefinedError => ({
  type: 'DIVISION_UNDEFINED',
  reason: denominator === 0 ? 'ZERO_DENOMINATOR' : 'NEGATIVE_DENOMINATOR',
  numerator,
  denominator,
  message: `Percent change of ${String(numerator)} over ${String(denominator)} is undefined`,
});
