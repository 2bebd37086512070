/**
 * Periods Module - Domain Errors
 */

export interface PeriodNotFoundError {
  readonly type: 'PERIOD_NOT_FOUND';
  /** The ordinal or label that was requested */
  readonly period: number | string;
  readonly message: string;
}

export const createPeriodOrdinalNotFoundError = (
  ordinal: number,
  latestOrdinal: number
): PeriodNotFoundError => ({
  type: 'PERIOD_NOT_FOUND',
  period: ordinal,
  message:
    latestOrdinal === 0
      ? `Period ${String(ordinal)} does not exist: no periods are loaded`
      : `Period ${String(ordinal)} is outside 1..${String(latestOrdinal)}`,
});

export const createPeriodLabelNotFoundError = (label: string): PeriodNotFoundError => ({
  type: 'PERIOD_NOT_FOUND',
  period: label,
  message: `Period '${label}' is not in the catalog`,
});
