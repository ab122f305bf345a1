/**
 * Workload Analytics Module - Domain Errors
 */

import type { AppError } from '../../../common/types/errors.js';

export type Aggregator =
  | 'kpi'
  | 'overview'
  | 'modality'
  | 'physician-modality'
  | 'day-of-week'
  | 'hourly'
  | 'physician-time-series'
  | 'latest-day'
  | 'daily-averages';

/**
 * A derived computation could not complete.
 */
export interface AggregationFailure extends AppError {
  readonly type: 'AggregationFailure';
  readonly aggregator: Aggregator;
  readonly message: string;
  /** Source and row of the offending record, when one is to blame */
  readonly record?: { readonly source: string; readonly rowNumber: number } | undefined;
}

export const createAggregationFailure = (
  aggregator: Aggregator,
  message: string,
  record?: { source: string; rowNumber: number }
): AggregationFailure => ({
  type: 'AggregationFailure',
  aggregator,
  message,
  ...(record !== undefined && { record: { source: record.source, rowNumber: record.rowNumber } }),
});
