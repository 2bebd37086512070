/**
 * Time-Series Module - Domain Errors
 */

export interface LocationPeriodNotFoundError {
  readonly type: 'LOCATION_PERIOD_NOT_FOUND';
  readonly countyStateKey: string;
  readonly periodKey: string;
  readonly message: string;
}

export type TimeSeriesError = LocationPeriodNotFoundError;

export const createLocationPeriodNotFoundError = (
  countyStateKey: string,
  periodKey: string
): LocationPeriodNotFoundError => ({
  type: 'LOCATION_PERIOD_NOT_FOUND',
  countyStateKey,
  periodKey,
  message: `No observations for '${countyStateKey}' in ${periodKey}`,
});
