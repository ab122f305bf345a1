import type { DashboardError } from './errors.js';
import type { RowValidationError, SourceLoadSummary } from '../../exam-records/index.js';
import type {
  DayOfWeekBucket,
  LatestDayProductivity,
  ModalityDistributionTable,
  OverviewTotals,
  PhysicianKPI,
  PhysicianDailyAverages,
  PhysicianKPITable,
  PhysicianModalityTable,
  PhysicianTimeSeriesPoint,
  TemporalBucket,
} from '../../workload-analytics/index.js';

/**
 * Every derived table of one refresh, computed from one dataset.
 */
export interface DashboardSnapshot {
  /** ISO instant the snapshot was built */
  generatedAt: string;
  /** Zone used for weekday, hour and month buckets */
  timeZone: string;
  recordCount: number;
  excludedCount: number;
  sources: SourceLoadSummary[];
  /** First rejected rows, capped for display */
  exclusions: RowValidationError[];
  overview: OverviewTotals;
  physicianKpis: PhysicianKPITable;
  topPhysicians: PhysicianKPI[];
  modalityDistribution: ModalityDistributionTable;
  physicianModality: PhysicianModalityTable;
  dayOfWeekWorkload: DayOfWeekBucket[];
  hourlyWorkload: TemporalBucket[];
  physicianTimeSeries: PhysicianTimeSeriesPoint[];
  /** Per-physician totals on the most recent date in the data */
  latestDay: LatestDayProductivity;
  /** Per-day averages over the trailing trend window */
  dailyAverages: PhysicianDailyAverages;
}

export type FacadeState =
  | { status: 'empty' }
  | { status: 'ready'; snapshot: DashboardSnapshot };

/**
 * The most recent failed refresh, kept beside the last good snapshot.
 */
export interface RefreshFailure {
  error: DashboardError;
  failedAt: string;
}

export interface SnapshotSettings {
  timeZone: string;
  /** Cap on row rejections copied onto the snapshot */
  maxReportedExclusions: number;
  /** Length of the top-physicians ranking */
  topPhysicianLimit: number;
  /** Days before the latest date included in the daily averages */
  trendWindowDays: number;
}

export const DEFAULT_TOP_PHYSICIAN_LIMIT = 10;

export const DEFAULT_TREND_WINDOW_DAYS = 7;
