// Aggregators
export { computeKPIs, computeOverviewTotals, rankPhysiciansByRvu } from './core/kpi.js';
export {
  computeModalityDistribution,
  computePhysicianModalityBreakdown,
} from './core/modality.js';
export {
  computeDayOfWeekWorkload,
  computeHourlyWorkload,
  computePhysicianTimeSeries,
  HOUR_LABELS,
} from './core/temporal.js';
export { computeLatestDayProductivity, computePhysicianDailyAverages } from './core/daily.js';

// Types
export {
  GLOBAL_SCOPE,
  type PhysicianKPI,
  type PhysicianKPITable,
  type OverviewTotals,
  type ModalityScope,
  type ModalityDistribution,
  type ModalityDistributionTable,
  type PhysicianModalityTable,
  type TemporalBucket,
  type DayOfWeekBucket,
  type PhysicianTimeSeriesPoint,
  type CalendarDateRange,
  type PhysicianDayProductivity,
  type LatestDayProductivity,
  type PhysicianDailyAverage,
  type PhysicianDailyAverages,
} from './core/types.js';

// Errors
export {
  createAggregationFailure,
  type AggregationFailure,
  type Aggregator,
} from './core/errors.js';
