import path from 'node:path';

import { buildEpiDataset } from '../src/modules/epi-dataset/index.js';
import { makeGazetteerRepo } from '../src/modules/gazetteer/index.js';
import { getDatasetSummary } from '../src/modules/health/index.js';
import { makeObservationRepo } from '../src/modules/observations/index.js';

const DEFAULT_TIME_SERIES = 'data/us-counties.csv';
const DEFAULT_GAZETTEER = 'data/us-cities.csv';

/** Warnings printed in full before the rest are summarized */
const MAX_PRINTED_WARNINGS = 20;

const resolveSource = (envValue: string | undefined, fallback: string): string =>
  path.resolve(process.cwd(), envValue ?? fallback);

const main = async (): Promise<void> => {
  const timeSeriesPath = resolveSource(process.env['TIME_SERIES_PATH'], DEFAULT_TIME_SERIES);
  const gazetteerPath = resolveSource(process.env['GAZETTEER_PATH'], DEFAULT_GAZETTEER);

  const [gazetteer, observations] = await Promise.all([
    makeGazetteerRepo({ filePath: gazetteerPath }).load(),
    makeObservationRepo({ filePath: timeSeriesPath }).load(),
  ]);

  const failures = [gazetteer, observations].flatMap((result) =>
    result.isErr() ? [`[${result.error.type}] ${result.error.message}`] : []
  );
  if (gazetteer.isErr() || observations.isErr()) {
    console.error('Source validation failed:\n');
    for (const failure of failures) {
      console.error(`- ${failure}`);
    }
    process.exit(1);
  }

  const dataset = buildEpiDataset({
    gazetteer: gazetteer.value,
    observations: observations.value,
  });
  const { report } = dataset;
  const summary = getDatasetSummary(dataset);

  console.log(`Time series: ${timeSeriesPath}`);
  console.log(`Gazetteer:   ${gazetteerPath}\n`);
  console.log(`Raw rows:          ${String(summary.rawRows)}`);
  console.log(`Gazetteer rows:    ${String(summary.gazetteerRows)}`);
  console.log(`Observations kept: ${String(summary.observations)}`);
  console.log(`Counties:          ${String(summary.locations)}`);
  console.log(`Periods:           ${String(summary.periods)}`);
  console.log(`Latest period:     ${summary.latestPeriod ?? '-'} (${summary.latestDate ?? '-'})\n`);

  console.log('Dropped rows:');
  for (const [reason, count] of Object.entries(summary.dropped)) {
    console.log(`  ${reason}: ${String(count)}`);
  }

  if (report.warnings.length > 0) {
    console.warn(`\n${String(report.warnings.length)} data-integrity warning(s):`);
    for (const warning of report.warnings.slice(0, MAX_PRINTED_WARNINGS)) {
      console.warn(`- [${warning.type}] ${warning.message}`);
    }
    if (report.warnings.length > MAX_PRINTED_WARNINGS) {
      console.warn(`  ... ${String(report.warnings.length - MAX_PRINTED_WARNINGS)} more`);
    }
  }
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
