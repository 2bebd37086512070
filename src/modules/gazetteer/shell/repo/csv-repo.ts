import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { normalizeFips } from '../../../../common/types/location.js';
import { mergeRowIssues, readCsvFile, type CsvRow } from '../../../../infra/csv/index.js';
import { GAZETTEER_COLUMNS, GazetteerRowSchema, type GazetteerEntry } from '../../core/types.js';

import type { SourceError } from '../../../../common/types/errors.js';
import type { RowIssue, SourceLoad } from '../../../../common/types/source.js';
import type { GazetteerRepository } from '../../core/ports.js';

const validator = TypeCompiler.Compile(GazetteerRowSchema);

export interface GazetteerRepoOptions {
  filePath: string;
}

/**
 * Maps validated CSV rows to gazetteer entries, collecting rows that fail the schema.
 */
export const toGazetteerEntries = (rows: readonly CsvRow[]): SourceLoad<GazetteerEntry> => {
  const records: GazetteerEntry[] = [];
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

    records.push({
      city: values.city,
      stateAbbr: values.state_id,
      stateName: values.state_name,
      countyFips: normalizeFips(values.county_fips),
      countyName: values.county_name,
    });
  }

  return { records, issues };
};

export const makeGazetteerRepo = (options: GazetteerRepoOptions): GazetteerRepository => ({
  async load(): Promise<Result<SourceLoad<GazetteerEntry>, SourceError>> {
    const table = await readCsvFile(options.filePath, GAZETTEER_COLUMNS);
    if (table.isErr()) {
      return err(table.error);
    }

    const load = toGazetteerEntries(table.value.rows);
    return ok({ records: load.records, issues: mergeRowIssues(table.value, load.issues) });
  },
});
