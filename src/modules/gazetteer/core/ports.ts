import type { GazetteerEntry } from './types.js';
import type { SourceError } from '../../../common/types/errors.js';
import type { SourceLoad } from '../../../common/types/source.js';
import type { Result } from 'neverthrow';

/**
 * Source of gazetteer rows. Shell layer provides a CSV implementation.
 */
export interface GazetteerRepository {
  /**
   * Loads every usable row. Rows that fail validation are reported as issues,
   * not errors; only an unreadable or headerless file fails the load.
   */
  load(): Promise<Result<SourceLoad<GazetteerEntry>, SourceError>>;
}
