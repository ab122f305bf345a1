import type { RowValidationError } from './errors.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Raw input
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A tabular source as read from disk (or built in memory), before any
 * validation. Cells are kept as text; missing cells are undefined.
 */
export interface RawTable {
  /** Human-readable source name (file path or label) */
  source: string;
  /** Header row, in file order */
  columns: readonly string[];
  /** Data rows keyed by the header text */
  rows: readonly Readonly<Record<string, string | undefined>>[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Column schema
// ─────────────────────────────────────────────────────────────────────────────

export type ExamColumn = 'physician' | 'modality' | 'rvu' | 'points' | 'timestamp' | 'examType';

/**
 * Accepted header spellings per column, compared after trimming and
 * lower-casing. The first entry is the canonical name.
 */
export const EXAM_COLUMN_ALIASES: Record<ExamColumn, readonly string[]> = {
  physician: ['physician', 'finalizing provider', 'provider', 'author', 'physician_id'],
  modality: ['modality', 'modality code', 'modality_code'],
  rvu: ['rvu', 'work rvu', 'wrvu'],
  points: ['points', 'point value', 'point_value'],
  timestamp: ['timestamp', 'exam timestamp', 'exam_timestamp', 'finalized date', 'date'],
  examType: ['exam_type', 'exam type', 'procedure', 'exam category', 'category'],
};

export const REQUIRED_EXAM_COLUMNS: readonly ExamColumn[] = [
  'physician',
  'modality',
  'rvu',
  'points',
  'timestamp',
  'examType',
];

/**
 * Resolved mapping from logical column to the header text present in a table.
 */
export type ColumnMap = Readonly<Record<ExamColumn, string>>;

// ─────────────────────────────────────────────────────────────────────────────
// Normalized records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One imaging exam event. Immutable once loaded.
 */
export interface ExamRecord {
  readonly physicianId: string;
  readonly modality: string;
  readonly rvu: Decimal;
  readonly points: Decimal;
  readonly examTimestamp: Date;
  readonly examType: string | null;
  /** Source name the record was read from */
  readonly source: string;
  /** 1-based data row number within the source (header excluded) */
  readonly rowNumber: number;
}

/**
 * Ordered, validated exam records in load order.
 */
export type NormalizedDataset = readonly ExamRecord[];

/**
 * Outcome of loading one source.
 */
export interface LoadedDataset {
  source: string;
  dataset: NormalizedDataset;
  /** Rows read from the source */
  totalRows: number;
  /** Rows dropped by row validation */
  rejections: readonly RowValidationError[];
}

/**
 * Per-source counts kept on the dashboard snapshot.
 */
export interface SourceLoadSummary {
  source: string;
  totalRows: number;
  loadedRows: number;
  excludedRows: number;
}

export interface LoadOptions {
  /** IANA zone used for timestamps that carry no offset */
  timeZone: string;
  /**
   * Highest tolerated share of excluded rows, 0..1.
   * At 1 the load only fails when no row survives.
   */
  maxExclusionRate: number;
}

export const DEFAULT_LOAD_OPTIONS: LoadOptions = {
  timeZone: 'UTC',
  maxExclusionRate: 1,
};
