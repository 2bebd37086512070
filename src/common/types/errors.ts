/**
 * Error types shared across modules.
 * Module-specific errors live in each module's core/errors.ts.
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
}

/**
 * Failure to load one of the tabular source files.
 * Fatal at startup: the dataset cannot be built without both sources.
 */
export type SourceError =
  | { readonly type: 'SOURCE_NOT_FOUND'; readonly message: string; readonly path: string }
  | { readonly type: 'SOURCE_READ_ERROR'; readonly message: string; readonly path: string }
  | { readonly type: 'SOURCE_PARSE_ERROR'; readonly message: string; readonly path: string }
  | {
      readonly type: 'MISSING_COLUMN';
      readonly message: string;
      readonly path: string;
      readonly columns: string[];
    };

export const createSourceNotFoundError = (path: string): SourceError => ({
  type: 'SOURCE_NOT_FOUND',
  message: `Source file not found at ${path}`,
  path,
});

export const createSourceReadError = (path: string, cause: string): SourceError => ({
  type: 'SOURCE_READ_ERROR',
  message: `Failed to read source file at ${path}: ${cause}`,
  path,
});

export const createSourceParseError = (path: string, cause: string): SourceError => ({
  type: 'SOURCE_PARSE_ERROR',
  message: `Failed to parse CSV at ${path}: ${cause}`,
  path,
});

export const createMissingColumnError = (path: string, columns: string[]): SourceError => ({
  type: 'MISSING_COLUMN',
  message: `Source file at ${path} is missing column(s): ${columns.join(', ')}`,
  path,
  columns,
});
