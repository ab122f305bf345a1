import { err, ok, type Result } from 'neverthrow';

import {
  getZonedParts,
  isValidTimeZone,
  type ZonedParts,
} from '../../../common/temporal/zoned-time.js';
import { createAggregationFailure, type AggregationFailure, type Aggregator } from './errors.js';

import type { ExamRecord } from '../../exam-records/index.js';

/**
 * Re-checks the dataset invariants an aggregator relies on. The loader
 * guarantees them; datasets assembled elsewhere may not.
 */
export const checkRecord = (
  aggregator: Aggregator,
  record: ExamRecord
): Result<ExamRecord, AggregationFailure> => {
  const where = { source: record.source, rowNumber: record.rowNumber };

  if (record.physicianId.trim() === '') {
    return err(createAggregationFailure(aggregator, 'Record has no physician identifier', where));
  }
  if (record.modality.trim() === '') {
    return err(createAggregationFailure(aggregator, 'Record has no modality code', where));
  }
  if (!record.rvu.isFinite() || record.rvu.lt(0)) {
    return err(
      createAggregationFailure(aggregator, `Record has invalid RVU ${record.rvu.toString()}`, where)
    );
  }
  if (!record.points.isFinite() || record.points.lt(0)) {
    return err(
      createAggregationFailure(
        aggregator,
        `Record has invalid points ${record.points.toString()}`,
        where
      )
    );
  }

  return ok(record);
};

export const checkTimeZone = (
  aggregator: Aggregator,
  timeZone: string
): Result<string, AggregationFailure> =>
  isValidTimeZone(timeZone)
    ? ok(timeZone)
    : err(createAggregationFailure(aggregator, `Unknown time zone '${timeZone}'`));

/**
 * Calendar fields of a checked record in the practice zone.
 */
export const zonedPartsOf = (
  aggregator: Aggregator,
  record: ExamRecord,
  timeZone: string
): Result<ZonedParts, AggregationFailure> => {
  const checked = checkRecord(aggregator, record);
  if (checked.isErr()) {
    return err(checked.error);
  }

  if (Number.isNaN(record.examTimestamp.getTime())) {
    return err(
      createAggregationFailure(aggregator, 'Record timestamp is not a valid date/time', {
        source: record.source,
        rowNumber: record.rowNumber,
      })
    );
  }

  return ok(getZonedParts(record.examTimestamp, timeZone));
};
