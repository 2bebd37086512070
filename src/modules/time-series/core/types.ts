/**
 * One date of one county's series after same-date rows are collapsed.
 */
export interface SeriesPoint {
  /** YYYY-MM-DD */
  date: string;
  periodKey: string;
  /** Cumulative cases as of `date` */
  cases: number;
  /** Cumulative deaths as of `date` */
  deaths: number;
}
