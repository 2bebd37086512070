import type { RawObservation } from './types.js';
import type { SourceError } from '../../../common/types/errors.js';
import type { SourceLoad } from '../../../common/types/source.js';
import type { Result } from 'neverthrow';

/**
 * Source of raw time-series rows, in source order.
 */
export interface ObservationRepository {
  load(): Promise<Result<SourceLoad<RawObservation>, SourceError>>;
}
