import { err, ok, type Result } from 'neverthrow';

import { createSchemaError, type SchemaError } from './errors.js';
import { EXAM_COLUMN_ALIASES, REQUIRED_EXAM_COLUMNS, type ColumnMap, type ExamColumn } from './types.js';

const normalizeHeader = (header: string): string =>
  header.replace(/^\uFEFF/, '').trim().toLowerCase().replace(/\s+/g, ' ');

/**
 * Resolves the logical exam columns against a header row.
 *
 * Matching ignores case and surrounding whitespace. When several aliases of a
 * column are present, the earliest alias in {@link EXAM_COLUMN_ALIASES} wins.
 * All missing columns are reported together.
 */
export const resolveColumns = (
  source: string,
  headers: readonly string[]
): Result<ColumnMap, SchemaError> => {
  const byNormalized = new Map<string, string>();
  for (const header of headers) {
    const key = normalizeHeader(header);
    if (!byNormalized.has(key)) {
      byNormalized.set(key, header);
    }
  }

  const resolved: Partial<Record<ExamColumn, string>> = {};
  const missing: string[] = [];

  for (const column of REQUIRED_EXAM_COLUMNS) {
    const aliases = EXAM_COLUMN_ALIASES[column];
    const match = aliases.map((alias) => byNormalized.get(alias)).find((h) => h !== undefined);

    if (match === undefined) {
      missing.push(aliases[0] ?? column);
    } else {
      resolved[column] = match;
    }
  }

  const { physician, modality, rvu, points, timestamp, examType } = resolved;
  if (
    missing.length > 0 ||
    physician === undefined ||
    modality === undefined ||
    rvu === undefined ||
    points === undefined ||
    timestamp === undefined ||
    examType === undefined
  ) {
    return err(createSchemaError(source, missing));
  }

  return ok({ physician, modality, rvu, points, timestamp, examType });
};
