/**
 * Observations Module - Data integrity warnings
 *
 * Warnings never stop a load: the offending row is dropped and reported.
 */

export interface UnresolvedSpecialCaseWarning {
  readonly type: 'UNRESOLVED_SPECIAL_CASE';
  readonly city: string;
  readonly state: string;
  readonly date: string;
  readonly message: string;
}

export interface MalformedRowWarning {
  readonly type: 'MALFORMED_ROW';
  readonly source: 'time-series' | 'gazetteer';
  /** 1-based source line; the header is line 1 */
  readonly line: number;
  readonly message: string;
}

export type DataIntegrityWarning = UnresolvedSpecialCaseWarning | MalformedRowWarning;

export const createUnresolvedSpecialCaseWarning = (
  city: string,
  state: string,
  date: string
): UnresolvedSpecialCaseWarning => ({
  type: 'UNRESOLVED_SPECIAL_CASE',
  city,
  state,
  date,
  message: `Could not resolve a FIPS code for '${city}' (${state}) on ${date}; row dropped`,
});

export const createMalformedRowWarning = (
  source: MalformedRowWarning['source'],
  line: number,
  detail: string
): MalformedRowWarning => ({
  type: 'MALFORMED_ROW',
  source,
  line,
  message: `Skipped ${source} line ${String(line)}: ${detail}`,
});
