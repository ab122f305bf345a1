/**
 * KPI aggregation
 *
 * Per-physician productivity totals and practice-wide headline figures.
 * Sums are accumulated as decimals and converted to numbers once per total.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { checkRecord } from './guards.js';

import type { AggregationFailure } from './errors.js';
import type { OverviewTotals, PhysicianKPI, PhysicianKPITable } from './types.js';
import type { NormalizedDataset } from '../../exam-records/index.js';

interface KpiAccumulator {
  rvu: Decimal;
  points: Decimal;
  examCount: number;
}

/**
 * Groups the dataset by physician in a single pass.
 *
 * Only physicians with at least one record appear, so the average never
 * divides by zero. The mapping carries no order; use
 * {@link rankPhysiciansByRvu} for display order.
 */
export const computeKPIs = (
  dataset: NormalizedDataset
): Result<PhysicianKPITable, AggregationFailure> => {
  const groups = new Map<string, KpiAccumulator>();

  for (const record of dataset) {
    const checked = checkRecord('kpi', record);
    if (checked.isErr()) {
      return err(checked.error);
    }

    const acc = groups.get(record.physicianId);
    if (acc === undefined) {
      groups.set(record.physicianId, {
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

  const entries = [...groups].map(([physicianId, acc]): [string, PhysicianKPI] => [
    physicianId,
    {
      physicianId,
      totalRvu: acc.rvu.toNumber(),
      totalPoints: acc.points.toNumber(),
      examCount: acc.examCount,
      avgRvuPerExam: acc.rvu.div(acc.examCount).toNumber(),
    },
  ]);

  return ok(Object.fromEntries(entries));
};

/**
 * Headline totals for the overview page.
 */
export const computeOverviewTotals = (
  dataset: NormalizedDataset
): Result<OverviewTotals, AggregationFailure> => {
  let rvu = new Decimal(0);
  let points = new Decimal(0);
  let first: number | null = null;
  let last: number | null = null;
  const physicians = new Set<string>();

  for (const record of dataset) {
    const checked = checkRecord('overview', record);
    if (checked.isErr()) {
      return err(checked.error);
    }

    rvu = rvu.plus(record.rvu);
    points = points.plus(record.points);
    physicians.add(record.physicianId);

    const at = record.examTimestamp.getTime();
    if (!Number.isNaN(at)) {
      first = first === null ? at : Math.min(first, at);
      last = last === null ? at : Math.max(last, at);
    }
  }

  return ok({
    totalExams: dataset.length,
    totalRvu: rvu.toNumber(),
    totalPoints: points.toNumber(),
    physicianCount: physicians.size,
    firstExamAt: first === null ? null : new Date(first).toISOString(),
    lastExamAt: last === null ? null : new Date(last).toISOString(),
  });
};

/**
 * Orders KPIs by total RVU, highest first; ties by physician id.
 * Returns at most `limit` entries when a limit is given.
 */
export const rankPhysiciansByRvu = (
  kpis: PhysicianKPITable,
  limit?: number
): PhysicianKPI[] => {
  const ranked = Object.values(kpis).sort((a, b) => {
    if (b.totalRvu !== a.totalRvu) {
      return b.totalRvu - a.totalRvu;
    }
    if (a.physicianId === b.physicianId) return 0;
    return a.physicianId < b.physicianId ? -1 : 1;
  });

  return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
};
