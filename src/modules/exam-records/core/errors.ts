/**
 * Exam Records Module - Domain Errors
 *
 * Row-level validation errors are recoverable (the row is dropped and
 * counted). Every other error fails the load of the whole source.
 */

import type { AppError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

export type RowField = 'physician' | 'modality' | 'timestamp' | 'rvu' | 'points';

export type RowValidationReason = 'Missing' | 'InvalidNumber' | 'Negative' | 'InvalidTimestamp';

/**
 * A single row was rejected.
 */
export interface RowValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly source: string;
  readonly rowNumber: number;
  readonly field: RowField;
  readonly reason: RowValidationReason;
  readonly value: string | undefined;
}

/**
 * Required columns are absent from the header.
 */
export interface SchemaError extends AppError {
  readonly type: 'SchemaError';
  readonly message: string;
  readonly source: string;
  readonly missingColumns: readonly string[];
}

/**
 * The source has no rows, or no row survived validation.
 */
export interface EmptyDatasetError extends AppError {
  readonly type: 'EmptyDatasetError';
  readonly message: string;
  readonly source: string;
  readonly totalRows: number;
}

/**
 * Too large a share of rows was rejected.
 */
export interface ExclusionRateError extends AppError {
  readonly type: 'ExclusionRateError';
  readonly message: string;
  readonly source: string;
  readonly excludedRows: number;
  readonly totalRows: number;
  readonly maxExclusionRate: number;
}

/**
 * The source could not be read or decoded.
 */
export interface SourceReadError extends AppError {
  readonly type: 'SourceReadError';
  readonly message: string;
  readonly source: string;
  readonly cause?: unknown;
}

/**
 * The practice time zone is not a known IANA zone.
 */
export interface InvalidTimeZoneError extends AppError {
  readonly type: 'InvalidTimeZoneError';
  readonly message: string;
  readonly source: string;
  readonly timeZone: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors that abort loading a source.
 */
export type LoaderError =
  | SchemaError
  | EmptyDatasetError
  | ExclusionRateError
  | InvalidTimeZoneError;

export type ExamSourceError = LoaderError | SourceReadError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createRowValidationError = (
  source: string,
  rowNumber: number,
  field: RowField,
  reason: RowValidationReason,
  value: string | undefined
): RowValidationError => {
  const shown = value === undefined ? '' : ` '${value}'`;
  const detail: Record<RowValidationReason, string> = {
    Missing: `${field} is missing`,
    InvalidNumber: `${field}${shown} is not a number`,
    Negative: `${field}${shown} is negative`,
    InvalidTimestamp: `${field}${shown} is not a recognized date/time`,
  };

  return {
    type: 'ValidationError',
    message: `Row ${String(rowNumber)} of ${source}: ${detail[reason]}`,
    source,
    rowNumber,
    field,
    reason,
    value,
  };
};

export const createSchemaError = (source: string, missingColumns: string[]): SchemaError => ({
  type: 'SchemaError',
  message: `${source} is missing required column(s): ${missingColumns.join(', ')}`,
  source,
  missingColumns,
});

export const createEmptyDatasetError = (source: string, totalRows: number): EmptyDatasetError => ({
  type: 'EmptyDatasetError',
  message:
    totalRows === 0
      ? `${source} contains no exam rows`
      : `All ${String(totalRows)} rows of ${source} were excluded by validation`,
  source,
  totalRows,
});

export const createExclusionRateError = (
  source: string,
  excludedRows: number,
  totalRows: number,
  maxExclusionRate: number
): ExclusionRateError => ({
  type: 'ExclusionRateError',
  message: `${String(excludedRows)} of ${String(totalRows)} rows of ${source} were excluded, above the allowed rate of ${String(maxExclusionRate)}`,
  source,
  excludedRows,
  totalRows,
  maxExclusionRate,
});

export const createSourceReadError = (
  source: string,
  message: string,
  cause?: unknown
): SourceReadError => ({
  type: 'SourceReadError',
  message: `Failed to read ${source}: ${message}`,
  source,
  cause,
});

export const createInvalidTimeZoneError = (
  source: string,
  timeZone: string
): InvalidTimeZoneError => ({
  type: 'InvalidTimeZoneError',
  message: `Cannot load ${source}: unknown time zone '${timeZone}'`,
  source,
  timeZone,
});
