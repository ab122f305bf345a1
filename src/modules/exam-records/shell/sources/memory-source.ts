import { ok, type Result } from 'neverthrow';

import type { SourceReadError } from '../../core/errors.js';
import type { ExamSource } from '../../core/ports.js';
import type { RawTable } from '../../core/types.js';

/**
 * Wraps an in-memory table as a source, for embedding callers that already
 * hold parsed rows.
 */
export const createInMemorySource = (table: RawTable): ExamSource => ({
  name: table.source,
  read: async (): Promise<Result<RawTable, SourceReadError>> =>
    ok({
      source: table.source,
      columns: [...table.columns],
      rows: table.rows.map((row) => ({ ...row })),
    }),
});
