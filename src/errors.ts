export type InputErrorCode =
  | 'EMPTY_QUERY'
  | 'INVALID_TOP_K'
  | 'DATA_NOT_FOUND'
  | 'MISSING_COLUMNS'
  | 'INVALID_RECORD'
  | 'INVALID_CONFIG'
  | 'STOPWORDS_NOT_FOUND';

/**
 * Bad input from the caller: a query, an option or the catalog file.
 * Raised before any result is produced.
 */
export class InputError extends Error {
  readonly code: InputErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: InputErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InputError';
    this.code = code;
    this.details = details;
  }
}

export function isInputError(err: unknown): err is InputError {
  return err instanceof InputError;
}
