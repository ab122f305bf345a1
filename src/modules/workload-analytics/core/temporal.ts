/**
 * Temporal aggregation
 *
 * Buckets exams by weekday, hour and calendar month. Every calendar field is
 * read in the single practice time zone passed by the caller.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { WEEKDAY_LABELS, type ZonedParts } from '../../../common/temporal/zoned-time.js';
import { createAggregationFailure, type AggregationFailure, type Aggregator } from './errors.js';
import { checkTimeZone, zonedPartsOf } from './guards.js';

import type { DayOfWeekBucket, PhysicianTimeSeriesPoint, TemporalBucket } from './types.js';
import type { NormalizedDataset } from '../../exam-records/index.js';

export const HOUR_LABELS: readonly string[] = Array.from(
  { length: 24 },
  (_, hour) => `${String(hour).padStart(2, '0')}:00`
);

interface BucketAccumulator {
  examCount: number;
  rvu: Decimal;
}

/**
 * Fills a fixed number of buckets. Every bucket is present in the output,
 * zero-valued when no exam falls into it.
 */
const fillBuckets = (
  aggregator: Aggregator,
  dataset: NormalizedDataset,
  timeZone: string,
  labels: readonly string[],
  pick: (parts: ZonedParts) => number
): Result<TemporalBucket[], AggregationFailure> => {
  const zone = checkTimeZone(aggregator, timeZone);
  if (zone.isErr()) {
    return err(zone.error);
  }

  const buckets: BucketAccumulator[] = labels.map(() => ({ examCount: 0, rvu: new Decimal(0) }));

  for (const record of dataset) {
    const parts = zonedPartsOf(aggregator, record, timeZone);
    if (parts.isErr()) {
      return err(parts.error);
    }

    const bucket = buckets[pick(parts.value)];
    if (bucket === undefined) {
      return err(
        createAggregationFailure(aggregator, 'Calendar field outside the bucket range', {
          source: record.source,
          rowNumber: record.rowNumber,
        })
      );
    }
    bucket.examCount += 1;
    bucket.rvu = bucket.rvu.plus(record.rvu);
  }

  return ok(
    buckets.map((bucket, index) => ({
      index,
      label: labels[index] ?? String(index),
      examCount: bucket.examCount,
      totalRvu: bucket.rvu.toNumber(),
    }))
  );
};

const isWeekdayBucket = (bucket: TemporalBucket): bucket is DayOfWeekBucket =>
  Number.isInteger(bucket.index) && bucket.index >= 0 && bucket.index <= 6;

/**
 * Exams and RVU per weekday: seven buckets, 0 = Monday ... 6 = Sunday.
 */
export const computeDayOfWeekWorkload = (
  dataset: NormalizedDataset,
  timeZone: string
): Result<DayOfWeekBucket[], AggregationFailure> =>
  fillBuckets('day-of-week', dataset, timeZone, WEEKDAY_LABELS, (p) => p.weekday).map(
    (buckets) => buckets.filter(isWeekdayBucket)
  );

/**
 * Exams and RVU per hour of day: 24 buckets, 0 ... 23.
 */
export const computeHourlyWorkload = (
  dataset: NormalizedDataset,
  timeZone: string
): Result<TemporalBucket[], AggregationFailure> =>
  fillBuckets('hourly', dataset, timeZone, HOUR_LABELS, (p) => p.hour);

interface SeriesAccumulator {
  physicianId: string;
  month: string;
  rvu: Decimal;
  points: Decimal;
  examCount: number;
}

/**
 * Monthly totals per physician, ordered by physician id then month.
 * Months without exams are not emitted.
 */
export const computePhysicianTimeSeries = (
  dataset: NormalizedDataset,
  timeZone: string
): Result<PhysicianTimeSeriesPoint[], AggregationFailure> => {
  const zone = checkTimeZone('physician-time-series', timeZone);
  if (zone.isErr()) {
    return err(zone.error);
  }

  const series = new Map<string, SeriesAccumulator>();

  for (const record of dataset) {
    const parts = zonedPartsOf('physician-time-series', record, timeZone);
    if (parts.isErr()) {
      return err(parts.error);
    }

    const month = `${String(parts.value.year)}-${String(parts.value.month).padStart(2, '0')}`;
    const key = `${record.physicianId}\u0000${month}`;
    const acc = series.get(key);

    if (acc === undefined) {
      series.set(key, {
        physicianId: record.physicianId,
        month,
        rvu: record.rvu,
        points: record.points,
        examCount: 1,
      });
    } else {
      acc.rvu = acc.rvu.plus(record.rvu);
      acc.points = acc.points.plus(record.points);
      acc.examCount += 1;
    }
  }

  return ok(
    [...series.values()]
      .sort((a, b) => {
        if (a.physicianId !== b.physicianId) return a.physicianId < b.physicianId ? -1 : 1;
        if (a.month === b.month) return 0;
        return a.month < b.month ? -1 : 1;
      })
      .map((acc) => ({
        physicianId: acc.physicianId,
        month: acc.month,
        totalRvu: acc.rvu.toNumber(),
        totalPoints: acc.points.toNumber(),
        examCount: acc.examCount,
      }))
  );
};
