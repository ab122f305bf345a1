// Use cases
export { loadDataset, parseExamRow } from './core/usecases/load-dataset.js';
export { mergeDatasets, type MergedDataset } from './core/usecases/merge-datasets.js';
export { resolveColumns } from './core/columns.js';
export {
  parseDecimalCell,
  parseTimestampCell,
  normalizePhysicianName,
  normalizeModality,
} from './core/cells.js';

// Sources
export {
  createCsvFileSource,
  parseCsvTable,
  type CsvSourceOptions,
} from './shell/sources/csv-source.js';
export { createInMemorySource } from './shell/sources/memory-source.js';
export type { ExamSource } from './core/ports.js';

// Types
export {
  EXAM_COLUMN_ALIASES,
  REQUIRED_EXAM_COLUMNS,
  DEFAULT_LOAD_OPTIONS,
  type RawTable,
  type ExamColumn,
  type ColumnMap,
  type ExamRecord,
  type NormalizedDataset,
  type LoadedDataset,
  type LoadOptions,
  type SourceLoadSummary,
} from './core/types.js';

// Errors
export { createSourceReadError, createInvalidTimeZoneError } from './core/errors.js';
export type {
  RowValidationError,
  RowField,
  RowValidationReason,
  SchemaError,
  EmptyDatasetError,
  ExclusionRateError,
  SourceReadError,
  InvalidTimeZoneError,
  LoaderError,
  ExamSourceError,
} from './core/errors.js';
