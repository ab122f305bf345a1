/**
 * Load Dataset Use Case
 *
 * Turns one raw table into a validated, normalized dataset. Bad rows are
 * dropped and reported; structural problems fail the whole source.
 */

import { err, ok, type Result } from 'neverthrow';

import { isValidTimeZone } from '../../../../common/temporal/zoned-time.js';

import {
  normalizeModality,
  normalizePhysicianName,
  parseDecimalCell,
  parseTimestampCell,
} from '../cells.js';
import { resolveColumns } from '../columns.js';
import {
  createEmptyDatasetError,
  createExclusionRateError,
  createInvalidTimeZoneError,
  createRowValidationError,
  type LoaderError,
  type RowValidationError,
} from '../errors.js';
import {
  DEFAULT_LOAD_OPTIONS,
  type ColumnMap,
  type ExamRecord,
  type LoadOptions,
  type LoadedDataset,
  type RawTable,
} from '../types.js';

const isBlank = (value: string | undefined): boolean => value === undefined || value.trim() === '';

/**
 * Validates one row. Checks run in column order and stop at the first
 * failure, so each rejected row is counted once.
 */
export const parseExamRow = (
  source: string,
  rowNumber: number,
  row: Readonly<Record<string, string | undefined>>,
  columns: ColumnMap,
  timeZone: string
): Result<ExamRecord, RowValidationError> => {
  const rawPhysician = row[columns.physician];
  const rawModality = row[columns.modality];
  const rawTimestamp = row[columns.timestamp];
  const rawRvu = row[columns.rvu];
  const rawPoints = row[columns.points];
  const rawExamType = row[columns.examType];

  if (rawPhysician === undefined || isBlank(rawPhysician)) {
    return err(createRowValidationError(source, rowNumber, 'physician', 'Missing', rawPhysician));
  }
  if (rawModality === undefined || isBlank(rawModality)) {
    return err(createRowValidationError(source, rowNumber, 'modality', 'Missing', rawModality));
  }
  if (rawTimestamp === undefined || isBlank(rawTimestamp)) {
    return err(createRowValidationError(source, rowNumber, 'timestamp', 'Missing', rawTimestamp));
  }

  const examTimestamp = parseTimestampCell(rawTimestamp, timeZone);
  if (examTimestamp === null) {
    return err(
      createRowValidationError(source, rowNumber, 'timestamp', 'InvalidTimestamp', rawTimestamp)
    );
  }

  const rvu = parseDecimalCell(rawRvu);
  if (rvu.kind === 'invalid') {
    return err(createRowValidationError(source, rowNumber, 'rvu', 'InvalidNumber', rawRvu));
  }
  if (rvu.kind === 'negative') {
    return err(createRowValidationError(source, rowNumber, 'rvu', 'Negative', rawRvu));
  }

  const points = parseDecimalCell(rawPoints);
  if (points.kind === 'invalid') {
    return err(createRowValidationError(source, rowNumber, 'points', 'InvalidNumber', rawPoints));
  }
  if (points.kind === 'negative') {
    return err(createRowValidationError(source, rowNumber, 'points', 'Negative', rawPoints));
  }

  const examType = rawExamType?.trim() ?? '';

  return ok(
    Object.freeze({
      physicianId: normalizePhysicianName(rawPhysician),
      modality: normalizeModality(rawModality),
      rvu: rvu.value,
      points: points.value,
      examTimestamp,
      examType: examType === '' ? null : examType,
      source,
      rowNumber,
    })
  );
};

/**
 * Loads a raw table into a normalized dataset.
 *
 * Fails with:
 * - SchemaError when required columns are absent (no partial load)
 * - EmptyDatasetError when the table has no rows or every row is rejected
 * - ExclusionRateError when the rejected share exceeds `maxExclusionRate`
 * - InvalidTimeZoneError when `timeZone` is not a known zone
 */
export const loadDataset = (
  table: RawTable,
  options: Partial<LoadOptions> = {}
): Result<LoadedDataset, LoaderError> => {
  const { timeZone, maxExclusionRate } = { ...DEFAULT_LOAD_OPTIONS, ...options };

  if (!isValidTimeZone(timeZone)) {
    return err(createInvalidTimeZoneError(table.source, timeZone));
  }

  const columnsResult = resolveColumns(table.source, table.columns);
  if (columnsResult.isErr()) {
    return err(columnsResult.error);
  }
  const columns = columnsResult.value;

  const totalRows = table.rows.length;
  if (totalRows === 0) {
    return err(createEmptyDatasetError(table.source, 0));
  }

  const records: ExamRecord[] = [];
  const rejections: RowValidationError[] = [];

  table.rows.forEach((row, index) => {
    const parsed = parseExamRow(table.source, index + 1, row, columns, timeZone);
    if (parsed.isOk()) {
      records.push(parsed.value);
    } else {
      rejections.push(parsed.error);
    }
  });

  if (records.length === 0) {
    return err(createEmptyDatasetError(table.source, totalRows));
  }

  if (rejections.length / totalRows > maxExclusionRate) {
    return err(
      createExclusionRateError(table.source, rejections.length, totalRows, maxExclusionRate)
    );
  }

  return ok({
    source: table.source,
    dataset: Object.freeze(records),
    totalRows,
    rejections,
  });
};
