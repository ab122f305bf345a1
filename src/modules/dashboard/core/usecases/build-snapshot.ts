/**
 * Build Snapshot Use Case
 *
 * Runs every aggregator over the same merged dataset and bundles the results.
 * Failures are collected across all aggregators and reported together; a
 * snapshot is only produced when every aggregator succeeds.
 */

import { err, ok, type Result } from 'neverthrow';

import { shiftCalendarDate } from '../../../../common/temporal/zoned-time.js';
import { describeCause } from '../../../../common/types/errors.js';
import {
  computeDayOfWeekWorkload,
  computeHourlyWorkload,
  computeKPIs,
  computeLatestDayProductivity,
  computeModalityDistribution,
  computeOverviewTotals,
  computePhysicianDailyAverages,
  computePhysicianModalityBreakdown,
  computePhysicianTimeSeries,
  createAggregationFailure,
  GLOBAL_SCOPE,
  rankPhysiciansByRvu,
  type AggregationFailure,
  type Aggregator,
} from '../../../workload-analytics/index.js';
import { createAggregationError, type AggregationError } from '../errors.js';

import type { DashboardSnapshot, SnapshotSettings } from '../types.js';
import type { MergedDataset } from '../../../exam-records/index.js';

export interface BuildSnapshotInput {
  merged: MergedDataset;
  settings: SnapshotSettings;
  /** ISO instant stamped on the snapshot */
  generatedAt: string;
}

/**
 * Runs one aggregator, turning an unexpected throw into a failure.
 */
const run = <T>(
  aggregator: Aggregator,
  failures: AggregationFailure[],
  compute: () => Result<T, AggregationFailure>
): T | undefined => {
  let result: Result<T, AggregationFailure>;
  try {
    result = compute();
  } catch (error) {
    failures.push(createAggregationFailure(aggregator, describeCause(error)));
    return undefined;
  }

  if (result.isErr()) {
    failures.push(result.error);
    return undefined;
  }
  return result.value;
};

export const buildSnapshot = (
  input: BuildSnapshotInput
): Result<DashboardSnapshot, AggregationError> => {
  const { merged, settings, generatedAt } = input;
  const { dataset } = merged;
  const failures: AggregationFailure[] = [];

  const physicianKpis = run('kpi', failures, () => computeKPIs(dataset));
  const overview = run('overview', failures, () => computeOverviewTotals(dataset));
  const modalityDistribution = run('modality', failures, () =>
    computeModalityDistribution(dataset, GLOBAL_SCOPE)
  );
  const physicianModality = run('physician-modality', failures, () =>
    computePhysicianModalityBreakdown(dataset)
  );
  const dayOfWeekWorkload = run('day-of-week', failures, () =>
    computeDayOfWeekWorkload(dataset, settings.timeZone)
  );
  const hourlyWorkload = run('hourly', failures, () =>
    computeHourlyWorkload(dataset, settings.timeZone)
  );
  const physicianTimeSeries = run('physician-time-series', failures, () =>
    computePhysicianTimeSeries(dataset, settings.timeZone)
  );
  const latestDay = run('latest-day', failures, () =>
    computeLatestDayProductivity(dataset, settings.timeZone)
  );
  const dailyAverages = run('daily-averages', failures, () => {
    const end = latestDay?.date ?? null;
    const range =
      end === null ? undefined : { start: shiftCalendarDate(end, -settings.trendWindowDays), end };
    return computePhysicianDailyAverages(dataset, settings.timeZone, range);
  });

  if (
    failures.length > 0 ||
    physicianKpis === undefined ||
    overview === undefined ||
    modalityDistribution === undefined ||
    physicianModality === undefined ||
    dayOfWeekWorkload === undefined ||
    hourlyWorkload === undefined ||
    physicianTimeSeries === undefined ||
    latestDay === undefined ||
    dailyAverages === undefined
  ) {
    return err(createAggregationError(failures));
  }

  return ok({
    generatedAt,
    timeZone: settings.timeZone,
    recordCount: dataset.length,
    excludedCount: merged.rejections.length,
    sources: [...merged.sources],
    exclusions: merged.rejections.slice(0, settings.maxReportedExclusions),
    overview,
    physicianKpis,
    topPhysicians: rankPhysiciansByRvu(physicianKpis, settings.topPhysicianLimit),
    modalityDistribution,
    physicianModality,
    dayOfWeekWorkload,
    hourlyWorkload,
    physicianTimeSeries,
    latestDay,
    dailyAverages,
  });
};
