/**
 * Modality aggregation
 */

import { err, ok, type Result } from 'neverthrow';

import { checkRecord } from './guards.js';

import type { AggregationFailure, Aggregator } from './errors.js';
import type {
  ModalityDistribution,
  ModalityDistributionTable,
  ModalityScope,
  PhysicianModalityTable,
} from './types.js';
import type { NormalizedDataset } from '../../exam-records/index.js';

const toDistribution = (counts: Map<string, number>): ModalityDistributionTable => {
  let total = 0;
  for (const count of counts.values()) {
    total += count;
  }

  return Object.fromEntries(
    [...counts].map(([modality, examCount]): [string, ModalityDistribution] => [
      modality,
      { modality, examCount, share: examCount / total },
    ])
  );
};

const countModalities = (
  aggregator: Aggregator,
  dataset: NormalizedDataset,
  scope: ModalityScope
): Result<Map<string, number>, AggregationFailure> => {
  const counts = new Map<string, number>();

  for (const record of dataset) {
    if (scope.kind === 'physician' && record.physicianId !== scope.physicianId) {
      continue;
    }

    const checked = checkRecord(aggregator, record);
    if (checked.isErr()) {
      return err(checked.error);
    }

    counts.set(record.modality, (counts.get(record.modality) ?? 0) + 1);
  }

  return ok(counts);
};

/**
 * Exam counts and shares per modality, across the whole practice or for one
 * physician. A scope with no records yields an empty mapping.
 */
export const computeModalityDistribution = (
  dataset: NormalizedDataset,
  scope: ModalityScope
): Result<ModalityDistributionTable, AggregationFailure> =>
  countModalities('modality', dataset, scope).map(toDistribution);

/**
 * The physician × modality cross table: one distribution per physician
 * present in the dataset.
 */
export const computePhysicianModalityBreakdown = (
  dataset: NormalizedDataset
): Result<PhysicianModalityTable, AggregationFailure> => {
  const byPhysician = new Map<string, Map<string, number>>();

  for (const record of dataset) {
    const checked = checkRecord('physician-modality', record);
    if (checked.isErr()) {
      return err(checked.error);
    }

    let counts = byPhysician.get(record.physicianId);
    if (counts === undefined) {
      counts = new Map();
      byPhysician.set(record.physicianId, counts);
    }
    counts.set(record.modality, (counts.get(record.modality) ?? 0) + 1);
  }

  return ok(
    Object.fromEntries(
      [...byPhysician].map(([physicianId, counts]): [string, ModalityDistributionTable] => [
        physicianId,
        toDistribution(counts),
      ])
    )
  );
};
