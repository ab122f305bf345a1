import fs from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { describeCause } from '../../../../common/types/errors.js';
import { createSourceReadError, type SourceReadError } from '../../core/errors.js';

import type { ExamSource } from '../../core/ports.js';
import type { RawTable } from '../../core/types.js';

export interface CsvSourceOptions {
  filePath: string;
  /** Single-character field delimiter (default ',') */
  delimiter?: string;
  /** Name reported in errors and summaries (default: the file path) */
  name?: string;
}

const isFileNotFound = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

const isStringRow = (row: unknown): row is string[] =>
  Array.isArray(row) && row.every((cell) => typeof cell === 'string');

/**
 * Parses CSV text into a raw table. The first record is the header row;
 * blank lines are skipped and short rows leave trailing cells undefined.
 */
export const parseCsvTable = (
  name: string,
  contents: string,
  delimiter = ','
): Result<RawTable, SourceReadError> => {
  let parsed: unknown;
  try {
    parsed = parseCsv(contents, {
      bom: true,
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    return err(createSourceReadError(name, `invalid CSV: ${describeCause(error)}`, error));
  }

  if (!Array.isArray(parsed) || !parsed.every(isStringRow)) {
    return err(createSourceReadError(name, 'CSV parser returned unexpected rows'));
  }

  const [header, ...body] = parsed;
  if (header === undefined) {
    return ok({ source: name, columns: [], rows: [] });
  }

  const rows = body.map((cells) => {
    const seen = new Set<string>();
    const entries: [string, string | undefined][] = [];
    header.forEach((column, index) => {
      // First occurrence of a duplicated header wins
      if (!seen.has(column)) {
        seen.add(column);
        entries.push([column, cells[index]]);
      }
    });
    return Object.fromEntries(entries);
  });

  return ok({ source: name, columns: header, rows });
};

/**
 * Creates a source that re-reads a CSV file on every `read`.
 */
export const createCsvFileSource = (options: CsvSourceOptions): ExamSource => {
  const name = options.name ?? options.filePath;

  return {
    name,
    async read(): Promise<Result<RawTable, SourceReadError>> {
      let contents: string;

      try {
        contents = await fs.readFile(options.filePath, 'utf8');
      } catch (error) {
        if (isFileNotFound(error)) {
          return err(createSourceReadError(name, `file not found at ${options.filePath}`, error));
        }

        return err(createSourceReadError(name, describeCause(error), error));
      }

      return parseCsvTable(name, contents, options.delimiter);
    },
  };
};
