/**
 * Load Sources Use Case
 *
 * Reads and validates every source in order. The first fatal error stops the
 * load; nothing is merged from a failed run.
 */

import { err, ok, type Result } from 'neverthrow';

import { describeCause } from '../../../../common/types/errors.js';
import {
  createSourceReadError,
  loadDataset,
  mergeDatasets,
  type ExamSource,
  type ExamSourceError,
  type LoadedDataset,
  type LoadOptions,
  type MergedDataset,
  type RawTable,
  type SourceReadError,
} from '../../../exam-records/index.js';

export async function loadSources(
  sources: readonly ExamSource[],
  options: LoadOptions
): Promise<Result<MergedDataset, ExamSourceError>> {
  const loaded: LoadedDataset[] = [];

  for (const source of sources) {
    let table: Result<RawTable, SourceReadError>;
    try {
      table = await source.read();
    } catch (error) {
      return err(createSourceReadError(source.name, describeCause(error), error));
    }

    if (table.isErr()) {
      return err(table.error);
    }

    const result = loadDataset(table.value, options);
    if (result.isErr()) {
      return err(result.error);
    }

    loaded.push(result.value);
  }

  return ok(mergeDatasets(loaded));
}
