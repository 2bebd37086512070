/**
 * CSV source reader shared by the time-series and gazetteer repositories.
 * Reads the whole file, parses it with csv-parse and checks the header.
 * Rows are numbered by source line so that issues point into the file.
 */

import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createMissingColumnError,
  createSourceNotFoundError,
  createSourceParseError,
  createSourceReadError,
  type SourceError,
} from '../../common/types/errors.js';

import type { RowIssue } from '../../common/types/source.js';

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const ParsedRecordsValidator = TypeCompiler.Compile(
  Type.Array(
    Type.Object({
      record: Type.Array(Type.String()),
      info: Type.Object({ lines: Type.Integer({ minimum: 1 }) }),
    })
  )
);

export interface CsvRow {
  /** 1-based source line the record ends on; the header is line 1 */
  line: number;
  values: Record<string, string>;
}

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
  /** Records whose field count differs from the header's */
  issues: RowIssue[];
}

/**
 * Parses CSV text with a header line into string records.
 * Every column in `requiredColumns` must be present in the header. A record
 * with too few or too many fields is reported and skipped.
 */
export const parseCsv = (
  contents: string,
  requiredColumns: readonly string[],
  sourcePath: string
): Result<CsvTable, SourceError> => {
  let parsed: unknown;

  try {
    parsed = parse(contents, {
      bom: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return err(createSourceParseError(sourcePath, messageOf(error)));
  }

  if (!ParsedRecordsValidator.Check(parsed)) {
    return err(createSourceParseError(sourcePath, 'records are not string-valued rows'));
  }

  const [header, ...records] = parsed;
  const columns = header?.record ?? [];

  const missing = requiredColumns.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    return err(createMissingColumnError(sourcePath, missing));
  }

  const rows: CsvRow[] = [];
  const issues: RowIssue[] = [];

  for (const { record, info } of records) {
    if (record.length !== columns.length) {
      issues.push({
        line: info.lines,
        message: `expected ${String(columns.length)} fields, got ${String(record.length)}`,
      });
      continue;
    }

    const values: Record<string, string> = {};
    columns.forEach((column, index) => {
      values[column] = record[index] ?? '';
    });
    rows.push({ line: info.lines, values });
  }

  return ok({ columns, rows, issues });
};

/**
 * Combines field-count issues with a repository's own row issues, in line order.
 */
export const mergeRowIssues = (table: CsvTable, issues: readonly RowIssue[]): RowIssue[] =>
  [...table.issues, ...issues].sort((a, b) => a.line - b.line);

/**
 * Reads and parses a CSV file from disk.
 */
export const readCsvFile = async (
  filePath: string,
  requiredColumns: readonly string[]
): Promise<Result<CsvTable, SourceError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return err(createSourceNotFoundError(filePath));
    }

    return err(createSourceReadError(filePath, messageOf(error)));
  }

  return parseCsv(contents, requiredColumns, filePath);
};
