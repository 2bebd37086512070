import { createGazetteerIndex, type GazetteerEntry } from '../../gazetteer/index.js';
import {
  createMalformedRowWarning,
  normalizeObservations,
  type DataIntegrityWarning,
  type RawObservation,
} from '../../observations/index.js';
import { createPeriodCatalog } from '../../periods/index.js';
import { createTimeSeriesStore } from '../../time-series/index.js';

import type { EpiDataset } from './types.js';
import type { SourceLoad } from '../../../common/types/source.js';

export interface EpiDatasetSources {
  observations: SourceLoad<RawObservation>;
  gazetteer: SourceLoad<GazetteerEntry>;
}

/**
 * Builds every lookup table from the two loaded sources.
 * Malformed source rows become data-integrity warnings alongside the
 * normalizer's own warnings.
 */
export const buildEpiDataset = (sources: EpiDatasetSources): EpiDataset => {
  const gazetteer = createGazetteerIndex(sources.gazetteer.records);
  const normalized = normalizeObservations(sources.observations.records, gazetteer);

  const warnings: DataIntegrityWarning[] = [
    ...sources.gazetteer.issues.map((issue) =>
      createMalformedRowWarning('gazetteer', issue.line, issue.message)
    ),
    ...sources.observations.issues.map((issue) =>
      createMalformedRowWarning('time-series', issue.line, issue.message)
    ),
    ...normalized.warnings,
  ];

  return Object.freeze({
    gazetteer,
    store: createTimeSeriesStore(normalized.observations),
    periods: createPeriodCatalog(normalized.observations),
    report: {
      rawRows: sources.observations.records.length,
      gazetteerRows: sources.gazetteer.records.length,
      observations: normalized.observations.length,
      dropped: normalized.dropped,
      warnings,
    },
  });
};
