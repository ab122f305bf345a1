/**
 * Daily productivity
 *
 * Per-physician figures keyed by calendar date in the practice time zone:
 * the most recent day in the data, and per-day averages over a date range.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isCalendarDate, toCalendarDate } from '../../../common/temporal/zoned-time.js';
import { createAggregationFailure, type AggregationFailure, type Aggregator } from './errors.js';
import { checkTimeZone, zonedPartsOf } from './guards.js';

import type {
  CalendarDateRange,
  LatestDayProductivity,
  PhysicianDailyAverage,
  PhysicianDailyAverages,
  PhysicianDayProductivity,
} from './types.js';
import type { ExamRecord, NormalizedDataset } from '../../exam-records/index.js';

interface DatedRecord {
  date: string;
  record: ExamRecord;
}

interface DayTotals {
  examCount: number;
  rvu: Decimal;
  points: Decimal;
}

const emptyTotals = (): DayTotals => ({
  examCount: 0,
  rvu: new Decimal(0),
  points: new Decimal(0),
});

const addRecord = (totals: DayTotals, record: ExamRecord): void => {
  totals.examCount += 1;
  totals.rvu = totals.rvu.plus(record.rvu);
  totals.points = totals.points.plus(record.points);
};

const byPhysicianId = (a: { physicianId: string }, b: { physicianId: string }): number => {
  if (a.physicianId === b.physicianId) return 0;
  return a.physicianId < b.physicianId ? -1 : 1;
};

/**
 * Tags every record with its calendar date in `timeZone`.
 */
const dateRecords = (
  aggregator: Aggregator,
  dataset: NormalizedDataset,
  timeZone: string
): Result<DatedRecord[], AggregationFailure> => {
  const zone = checkTimeZone(aggregator, timeZone);
  if (zone.isErr()) {
    return err(zone.error);
  }

  const dated: DatedRecord[] = [];
  for (const record of dataset) {
    const parts = zonedPartsOf(aggregator, record, timeZone);
    if (parts.isErr()) {
      return err(parts.error);
    }
    dated.push({ date: toCalendarDate(parts.value), record });
  }
  return ok(dated);
};

/**
 * Per-physician totals on the latest calendar date present in the dataset.
 * Physicians without an exam that day are not listed.
 */
export const computeLatestDayProductivity = (
  dataset: NormalizedDataset,
  timeZone: string
): Result<LatestDayProductivity, AggregationFailure> =>
  dateRecords('latest-day', dataset, timeZone).map((dated) => {
    let latest: string | null = null;
    for (const { date } of dated) {
      if (latest === null || date > latest) {
        latest = date;
      }
    }

    const groups = new Map<string, DayTotals>();
    for (const { date, record } of dated) {
      if (date !== latest) continue;

      let totals = groups.get(record.physicianId);
      if (totals === undefined) {
        totals = emptyTotals();
        groups.set(record.physicianId, totals);
      }
      addRecord(totals, record);
    }

    const physicians = [...groups]
      .map(
        ([physicianId, totals]): PhysicianDayProductivity => ({
          physicianId,
          examCount: totals.examCount,
          totalRvu: totals.rvu.toNumber(),
          totalPoints: totals.points.toNumber(),
        })
      )
      .sort((a, b) => b.totalPoints - a.totalPoints || byPhysicianId(a, b));

    return { date: latest, physicians };
  });

const checkRange = (range: CalendarDateRange): Result<CalendarDateRange, AggregationFailure> =>
  isCalendarDate(range.start) && isCalendarDate(range.end) && range.start <= range.end
    ? ok(range)
    : err(
        createAggregationFailure(
          'daily-averages',
          `Invalid date range '${range.start}' to '${range.end}'`
        )
      );

/**
 * Averages each physician's daily totals over the days they worked.
 *
 * A day counts for a physician when they have at least one exam on it, so
 * days off do not pull the average down. When `range` is given (inclusive),
 * only exams dated inside it are considered.
 */
export const computePhysicianDailyAverages = (
  dataset: NormalizedDataset,
  timeZone: string,
  range?: CalendarDateRange
): Result<PhysicianDailyAverages, AggregationFailure> => {
  if (range !== undefined) {
    const checked = checkRange(range);
    if (checked.isErr()) {
      return err(checked.error);
    }
  }

  return dateRecords('daily-averages', dataset, timeZone).map((dated) => {
    const days = new Map<string, Map<string, DayTotals>>();
    let first: string | null = null;
    let last: string | null = null;

    for (const { date, record } of dated) {
      if (range !== undefined && (date < range.start || date > range.end)) continue;

      if (first === null || date < first) first = date;
      if (last === null || date > last) last = date;

      let byDate = days.get(record.physicianId);
      if (byDate === undefined) {
        byDate = new Map<string, DayTotals>();
        days.set(record.physicianId, byDate);
      }
      let totals = byDate.get(date);
      if (totals === undefined) {
        totals = emptyTotals();
        byDate.set(date, totals);
      }
      addRecord(totals, record);
    }

    const physicians = [...days]
      .map(([physicianId, byDate]): PhysicianDailyAverage => {
        const sum = emptyTotals();
        for (const totals of byDate.values()) {
          sum.examCount += totals.examCount;
          sum.rvu = sum.rvu.plus(totals.rvu);
          sum.points = sum.points.plus(totals.points);
        }
        const activeDays = byDate.size;

        return {
          physicianId,
          activeDays,
          examCount: sum.examCount,
          totalRvu: sum.rvu.toNumber(),
          totalPoints: sum.points.toNumber(),
          avgExamsPerDay: new Decimal(sum.examCount).div(activeDays).toNumber(),
          avgRvuPerDay: sum.rvu.div(activeDays).toNumber(),
          avgPointsPerDay: sum.points.div(activeDays).toNumber(),
        };
      })
      .sort((a, b) => b.avgPointsPerDay - a.avgPointsPerDay || byPhysicianId(a, b));

    const span = first !== null && last !== null ? { start: first, end: last } : null;
    return { range: range ?? span, physicians };
  });
};
