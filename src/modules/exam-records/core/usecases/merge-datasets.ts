import type { RowValidationError } from '../errors.js';
import type { LoadedDataset, NormalizedDataset, SourceLoadSummary } from '../types.js';

export interface MergedDataset {
  dataset: NormalizedDataset;
  rejections: readonly RowValidationError[];
  sources: readonly SourceLoadSummary[];
}

/**
 * Concatenates loaded sources in the order given.
 */
export const mergeDatasets = (loaded: readonly LoadedDataset[]): MergedDataset => {
  const records = loaded.flatMap((entry) => entry.dataset);
  const rejections = loaded.flatMap((entry) => entry.rejections);

  return {
    dataset: Object.freeze(records),
    rejections,
    sources: loaded.map((entry) => ({
      source: entry.source,
      totalRows: entry.totalRows,
      loadedRows: entry.dataset.length,
      excludedRows: entry.rejections.length,
    })),
  };
};
