import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { normalizeFips } from '../../../../common/types/location.js';
import { isIsoDate } from '../../../../common/types/temporal.js';
import { mergeRowIssues, readCsvFile, type CsvRow } from '../../../../infra/csv/index.js';
import { OBSERVATION_COLUMNS, ObservationRowSchema, type RawObservation } from '../../core/types.js';

import type { SourceError } from '../../../../common/types/errors.js';
import type { RowIssue, SourceLoad } from '../../../../common/types/source.js';
import type { ObservationRepository } from '../../core/ports.js';

const validator = TypeCompiler.Compile(ObservationRowSchema);

export interface ObservationRepoOptions {
  filePath: string;
}

const parseCount = (value: string): number | null => {
  if (value === '') {
    return 0;
  }
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : null;
};

/**
 * Maps CSV rows to raw observations. Rows with a bad date or count are
 * reported and skipped; the rest keep source order.
 */
export const toRawObservations = (rows: readonly CsvRow[]): SourceLoad<RawObservation> => {
  const records: RawObservation[] = [];
  const issues: RowIssue[] = [];

  for (const { line, values } of rows) {
    if (!validator.Check(values)) {
      const first = validator.Errors(values).First();
      issues.push({
        line,
        message: first !== undefined ? `${first.path}: ${first.message}` : 'invalid row',
      });
      continue;
    }

    if (!isIsoDate(values.date)) {
      issues.push({ line, message: `/date: '${values.date}' is not a calendar date` });
      continue;
    }

    const cases = parseCount(values.cases);
    const deaths = parseCount(values.deaths);
    if (cases === null || deaths === null) {
      issues.push({ line, message: 'counts exceed the safe integer range' });
      continue;
    }

    records.push({
      date: values.date,
      county: values.county,
      state: values.state,
      fips: normalizeFips(values.fips),
      cases,
      deaths,
    });
  }

  return { records, issues };
};

export const makeObservationRepo = (options: ObservationRepoOptions): ObservationRepository => ({
  async load(): Promise<Result<SourceLoad<RawObservation>, SourceError>> {
    const table = await readCsvFile(options.filePath, OBSERVATION_COLUMNS);
    if (table.isErr()) {
      return err(table.error);
    }

    const load = toRawObservations(table.value.rows);
    return ok({ records: load.records, issues: mergeRowIssues(table.value, load.issues) });
  },
});
