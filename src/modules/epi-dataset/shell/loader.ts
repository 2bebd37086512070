import { err, ok, type Result } from 'neverthrow';

import { buildEpiDataset } from '../core/build-dataset.js';

import type { SourceError } from '../../../common/types/errors.js';
import type { Logger } from '../../../infra/logger/index.js';
import type { GazetteerRepository } from '../../gazetteer/index.js';
import type { ObservationRepository } from '../../observations/index.js';
import type { EpiDataset } from '../core/types.js';

/** Individual warnings logged before switching to a summary line */
const MAX_LOGGED_WARNINGS = 50;

export interface LoadEpiDatasetDeps {
  observationRepo: ObservationRepository;
  gazetteerRepo: GazetteerRepository;
  logger: Logger;
}

/**
 * Reads both sources, builds the dataset and logs what was dropped.
 * Only a source that cannot be read fails the load.
 */
export const loadEpiDataset = async (
  deps: LoadEpiDatasetDeps
): Promise<Result<EpiDataset, SourceError>> => {
  const { logger } = deps;
  const startedAt = Date.now();

  const [gazetteer, observations] = await Promise.all([
    deps.gazetteerRepo.load(),
    deps.observationRepo.load(),
  ]);

  if (gazetteer.isErr()) {
    return err(gazetteer.error);
  }
  if (observations.isErr()) {
    return err(observations.error);
  }

  const dataset = buildEpiDataset({
    gazetteer: gazetteer.value,
    observations: observations.value,
  });
  const { report } = dataset;

  for (const warning of report.warnings.slice(0, MAX_LOGGED_WARNINGS)) {
    logger.warn({ warning }, warning.message);
  }
  if (report.warnings.length > MAX_LOGGED_WARNINGS) {
    logger.warn(
      { total: report.warnings.length },
      `${String(report.warnings.length - MAX_LOGGED_WARNINGS)} more data-integrity warning(s) not shown`
    );
  }

  logger.info(
    {
      rawRows: report.rawRows,
      gazetteerRows: report.gazetteerRows,
      observations: report.observations,
      dropped: report.dropped,
      locations: dataset.store.locationCount,
      periods: dataset.periods.size,
      latestDate: dataset.store.latestDate(),
      durationMs: Date.now() - startedAt,
    },
    'Dataset loaded'
  );

  return ok(dataset);
};
