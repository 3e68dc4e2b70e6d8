/**
 * Errors raised while loading the appointment dataset at startup.
 * Both kinds are fatal: the server does not start without a dataset.
 */

export type DatasetErrorCode = 'DATA_UNAVAILABLE' | 'MALFORMED_SCHEMA';

export class DatasetError extends Error {
  readonly code: DatasetErrorCode;

  constructor(code: DatasetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetError';
    this.code = code;
  }
}

export class DataUnavailableError extends DatasetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DATA_UNAVAILABLE', message, options);
    this.name = 'DataUnavailableError';
  }
}

export class MalformedSchemaError extends DatasetError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super('MALFORMED_SCHEMA', `Dataset is missing required columns: ${missingColumns.join(', ')}`);
    this.name = 'MalformedSchemaError';
    this.missingColumns = missingColumns;
  }
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError;
}
