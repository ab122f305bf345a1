import { describe, expect, it } from 'vitest';

import { loadDataset, mergeDatasets } from '@/modules/exam-records/index.js';
import {
  computeDayOfWeekWorkload,
  computeHourlyWorkload,
  computeKPIs,
} from '@/modules/workload-analytics/index.js';

import { makeRawTable } from '../../fixtures/builders.js';

describe('loadDataset', () => {
  const validRow = {
    physician: 'A',
    modality: 'CT',
    rvu: '2.0',
    points: '1.0',
    timestamp: '2024-01-01 09:00',
    examType: 'CT Head',
  };

  describe('valid rows', () => {
    it('normalizes every row into a record', () => {
      const result = loadDataset(
        makeRawTable([
          validRow,
          { ...validRow, physician: ' dr. avery  chen ', modality: ' mr ', rvu: '3', points: '1.5' },
        ])
      );

      const loaded = result._unsafeUnwrap();
      expect(loaded.totalRows).toBe(2);
      expect(loaded.rejections).toEqual([]);
      expect(loaded.dataset).toHaveLength(2);

      const [first, second] = loaded.dataset;
      expect(first?.physicianId).toBe('A');
      expect(first?.modality).toBe('CT');
      expect(first?.rvu.toString()).toBe('2');
      expect(first?.points.toString()).toBe('1');
      expect(first?.examTimestamp.toISOString()).toBe('2024-01-01T09:00:00.000Z');
      expect(first?.examType).toBe('CT Head');
      expect(first?.source).toBe('test.csv');
      expect(first?.rowNumber).toBe(1);

      expect(second?.physicianId).toBe('Dr. Avery Chen');
      expect(second?.modality).toBe('MR');
      expect(second?.rowNumber).toBe(2);
    });

    it('stores a blank exam type as null', () => {
      const loaded = loadDataset(makeRawTable([{ ...validRow, examType: '  ' }]))._unsafeUnwrap();

      expect(loaded.dataset[0]?.examType).toBeNull();
    });

    it('counts blank RVU and points as zero', () => {
      const loaded = loadDataset(
        makeRawTable([{ ...validRow, rvu: '', points: '' }])
      )._unsafeUnwrap();

      expect(loaded.dataset[0]?.rvu.toNumber()).toBe(0);
      expect(loaded.dataset[0]?.points.toNumber()).toBe(0);
    });

    it('keeps rows with zero RVU and points and counts them everywhere', () => {
      const loaded = loadDataset(
        makeRawTable([
          validRow,
          { ...validRow, physician: 'B', rvu: '0', points: '0.00', timestamp: '2024-01-01 10:00' },
        ])
      )._unsafeUnwrap();

      expect(loaded.rejections).toEqual([]);
      expect(loaded.dataset).toHaveLength(2);

      const kpis = computeKPIs(loaded.dataset)._unsafeUnwrap();
      expect(kpis['B']).toEqual({
        physicianId: 'B',
        totalRvu: 0,
        totalPoints: 0,
        examCount: 1,
        avgRvuPerExam: 0,
      });

      const weekdays = computeDayOfWeekWorkload(loaded.dataset, 'UTC')._unsafeUnwrap();
      expect(weekdays[0]).toEqual({ index: 0, label: 'Monday', examCount: 2, totalRvu: 2 });

      const hours = computeHourlyWorkload(loaded.dataset, 'UTC')._unsafeUnwrap();
      expect(hours[10]).toEqual({ index: 10, label: '10:00', examCount: 1, totalRvu: 0 });
    });

    it('reads naive timestamps in the configured zone', () => {
      const loaded = loadDataset(makeRawTable([validRow]), {
        timeZone: 'America/New_York',
      })._unsafeUnwrap();

      expect(loaded.dataset[0]?.examTimestamp.toISOString()).toBe('2024-01-01T14:00:00.000Z');
    });

    it('freezes the dataset and its records', () => {
      const loaded = loadDataset(makeRawTable([validRow]))._unsafeUnwrap();

      expect(Object.isFrozen(loaded.dataset)).toBe(true);
      expect(Object.isFrozen(loaded.dataset[0])).toBe(true);
    });
  });

  describe('row validation', () => {
    it('drops a row without a physician and reports it', () => {
      const loaded = loadDataset(
        makeRawTable([validRow, { ...validRow, physician: '   ' }])
      )._unsafeUnwrap();

      expect(loaded.dataset).toHaveLength(1);
      expect(loaded.rejections).toHaveLength(1);
      expect(loaded.rejections[0]).toMatchObject({
        type: 'ValidationError',
        source: 'test.csv',
        rowNumber: 2,
        field: 'physician',
        reason: 'Missing',
      });
      expect(loaded.rejections[0]?.message).toBe('Row 2 of test.csv: physician is missing');
    });

    it('rejects a non-numeric RVU', () => {
      const loaded = loadDataset(
        makeRawTable([{ ...validRow, rvu: 'abc' }, validRow])
      )._unsafeUnwrap();

      expect(loaded.rejections[0]).toMatchObject({
        rowNumber: 1,
        field: 'rvu',
        reason: 'InvalidNumber',
        value: 'abc',
      });
      expect(loaded.rejections[0]?.message).toBe("Row 1 of test.csv: rvu 'abc' is not a number");
    });

    it('rejects negative points', () => {
      const loaded = loadDataset(
        makeRawTable([validRow, { ...validRow, points: '-1' }])
      )._unsafeUnwrap();

      expect(loaded.rejections[0]).toMatchObject({ field: 'points', reason: 'Negative' });
      expect(loaded.rejections[0]?.message).toBe("Row 2 of test.csv: points '-1' is negative");
    });

    it('rejects an unparseable timestamp', () => {
      const loaded = loadDataset(
        makeRawTable([validRow, { ...validRow, timestamp: 'soon' }])
      )._unsafeUnwrap();

      expect(loaded.rejections[0]).toMatchObject({
        field: 'timestamp',
        reason: 'InvalidTimestamp',
      });
      expect(loaded.rejections[0]?.message).toBe(
        "Row 2 of test.csv: timestamp 'soon' is not a recognized date/time"
      );
    });

    it('rejects an RVU too large to total', () => {
      const loaded = loadDataset(
        makeRawTable([validRow, { ...validRow, rvu: '1e400' }])
      )._unsafeUnwrap();

      expect(loaded.dataset).toHaveLength(1);
      expect(loaded.rejections[0]).toMatchObject({
        rowNumber: 2,
        field: 'rvu',
        reason: 'InvalidNumber',
        value: '1e400',
      });
    });

    it('rejects a timestamp with a year before 1000', () => {
      const loaded = loadDataset(
        makeRawTable([validRow, { ...validRow, timestamp: '0050-03-01 10:00' }])
      )._unsafeUnwrap();

      expect(loaded.dataset).toHaveLength(1);
      expect(loaded.rejections[0]).toMatchObject({
        rowNumber: 2,
        field: 'timestamp',
        reason: 'InvalidTimestamp',
      });
    });

    it('reports only the first failing check of a row', () => {
      const loaded = loadDataset(
        makeRawTable([validRow, { ...validRow, modality: '', rvu: 'abc', timestamp: 'soon' }])
      )._unsafeUnwrap();

      expect(loaded.rejections).toHaveLength(1);
      expect(loaded.rejections[0]).toMatchObject({ field: 'modality', reason: 'Missing' });
    });

    it('keeps the invariant that loaded plus rejected equals total rows', () => {
      const loaded = loadDataset(
        makeRawTable([
          validRow,
          { ...validRow, rvu: 'x' },
          { ...validRow, modality: '' },
          validRow,
          { ...validRow, points: '-2' },
        ])
      )._unsafeUnwrap();

      expect(loaded.dataset.length + loaded.rejections.length).toBe(loaded.totalRows);
      expect(loaded.rejections.map((r) => r.rowNumber)).toEqual([2, 3, 5]);
    });
  });

  describe('fatal errors', () => {
    it('fails with SchemaError before looking at rows', () => {
      const result = loadDataset({
        source: 'partial.csv',
        columns: ['Physician', 'RVU', 'Points', 'Timestamp', 'Exam Type'],
        rows: [],
      });

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe('SchemaError');
      expect(error.message).toBe('partial.csv is missing required column(s): modality');
    });

    it('fails with EmptyDatasetError when there are no rows', () => {
      const error = loadDataset(makeRawTable([]))._unsafeUnwrapErr();

      expect(error).toMatchObject({ type: 'EmptyDatasetError', totalRows: 0 });
      expect(error.message).toBe('test.csv contains no exam rows');
    });

    it('fails with EmptyDatasetError when every row is rejected', () => {
      const error = loadDataset(
        makeRawTable([
          { ...validRow, physician: '' },
          { ...validRow, rvu: '-3' },
        ])
      )._unsafeUnwrapErr();

      expect(error).toMatchObject({ type: 'EmptyDatasetError', totalRows: 2 });
      expect(error.message).toBe('All 2 rows of test.csv were excluded by validation');
    });

    it('fails when the rejected share exceeds the threshold', () => {
      const table = makeRawTable([validRow, validRow, validRow, { ...validRow, rvu: 'bad' }]);

      const error = loadDataset(table, { maxExclusionRate: 0.2 })._unsafeUnwrapErr();

      expect(error).toMatchObject({
        type: 'ExclusionRateError',
        excludedRows: 1,
        totalRows: 4,
        maxExclusionRate: 0.2,
      });
      expect(error.message).toBe(
        '1 of 4 rows of test.csv were excluded, above the allowed rate of 0.2'
      );
    });

    it('fails with InvalidTimeZoneError for an unknown zone', () => {
      const error = loadDataset(makeRawTable([validRow]), {
        timeZone: 'Mars/Olympus',
      })._unsafeUnwrapErr();

      expect(error).toEqual({
        type: 'InvalidTimeZoneError',
        message: "Cannot load test.csv: unknown time zone 'Mars/Olympus'",
        source: 'test.csv',
        timeZone: 'Mars/Olympus',
      });
    });

    it('accepts a rejected share equal to the threshold', () => {
      const table = makeRawTable([validRow, validRow, validRow, { ...validRow, rvu: 'bad' }]);

      const result = loadDataset(table, { maxExclusionRate: 0.25 });

      expect(result.isOk()).toBe(true);
    });
  });
});

describe('mergeDatasets', () => {
  it('concatenates sources in order and summarizes each', () => {
    const first = loadDataset(
      makeRawTable(
        [
          { physician: 'A', modality: 'CT', rvu: '1', points: '1', timestamp: '2024-01-01' },
          { physician: '', modality: 'CT', rvu: '1', points: '1', timestamp: '2024-01-01' },
        ],
        'first.csv'
      )
    )._unsafeUnwrap();
    const second = loadDataset(
      makeRawTable(
        [{ physician: 'B', modality: 'MR', rvu: '2', points: '1', timestamp: '2024-01-02' }],
        'second.csv'
      )
    )._unsafeUnwrap();

    const merged = mergeDatasets([first, second]);

    expect(merged.dataset.map((r) => [r.source, r.physicianId])).toEqual([
      ['first.csv', 'A'],
      ['second.csv', 'B'],
    ]);
    expect(merged.rejections).toHaveLength(1);
    expect(merged.sources).toEqual([
      { source: 'first.csv', totalRows: 2, loadedRows: 1, excludedRows: 1 },
      { source: 'second.csv', totalRows: 1, loadedRows: 1, excludedRows: 0 },
    ]);
  });
});
