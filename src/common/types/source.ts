/**
 * Shape shared by the tabular source repositories.
 */

/**
 * A source row that failed validation and was skipped.
 */
export interface RowIssue {
  /** 1-based source line; the header is line 1 */
  line: number;
  message: string;
}

export interface SourceLoad<T> {
  records: T[];
  issues: RowIssue[];
}
