/**
 * Dashboard Module - Domain Errors
 */

import { describeCause, type AppError } from '../../../common/types/errors.js';
import type { ExamSourceError } from '../../exam-records/index.js';
import type { AggregationFailure } from '../../workload-analytics/index.js';

/**
 * One or more aggregators failed during the same refresh.
 */
export interface AggregationError extends AppError {
  readonly type: 'AggregationError';
  readonly message: string;
  readonly failures: readonly AggregationFailure[];
}

/**
 * A refresh threw instead of returning an error result.
 */
export interface UnexpectedRefreshError extends AppError {
  readonly type: 'UnexpectedRefreshError';
  readonly message: string;
  readonly cause: unknown;
}

/**
 * Anything that can fail a refresh.
 */
export type DashboardError = ExamSourceError | AggregationError | UnexpectedRefreshError;

export const createAggregationError = (
  failures: readonly AggregationFailure[]
): AggregationError => ({
  type: 'AggregationError',
  message: `Aggregation failed in ${failures.map((f) => f.aggregator).join(', ')}: ${failures
    .map((f) => f.message)
    .join('; ')}`,
  failures,
});

export const createUnexpectedRefreshError = (cause: unknown): UnexpectedRefreshError => ({
  type: 'UnexpectedRefreshError',
  message: `Refresh failed unexpectedly: ${describeCause(cause)}`,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const DASHBOARD_ERROR_HTTP_STATUS: Record<DashboardError['type'], 422 | 500> = {
  SchemaError: 422,
  EmptyDatasetError: 422,
  ExclusionRateError: 422,
  AggregationError: 422,
  SourceReadError: 500,
  InvalidTimeZoneError: 500,
  UnexpectedRefreshError: 500,
};

export const getHttpStatusForError = (error: DashboardError): 422 | 500 =>
  DASHBOARD_ERROR_HTTP_STATUS[error.type];
