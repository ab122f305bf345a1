/**
 * Test fakes
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInMemorySource,
  createSourceReadError,
  type ExamSource,
  type RawTable,
  type SourceReadError,
} from '@/modules/exam-records/index.js';

import { makeRawTable, type ExamRowInput } from './builders.js';

/**
 * In-memory source whose table can be swapped between refreshes.
 * Counts how many times it was read.
 */
export interface MutableSource extends ExamSource {
  setTable(table: RawTable): void;
  failWith(message: string): void;
  readonly reads: number;
}

export const makeMutableSource = (initial: RawTable): MutableSource => {
  let current: Result<RawTable, SourceReadError> = ok(initial);
  let reads = 0;

  return {
    name: initial.source,
    async read() {
      reads += 1;
      return current;
    },
    setTable(table) {
      current = ok(table);
    },
    failWith(message) {
      current = err(createSourceReadError(initial.source, message));
    },
    get reads() {
      return reads;
    },
  };
};

/**
 * Source built from row inputs with the standard header.
 */
export const makeRowsSource = (rows: ExamRowInput[], name = 'test.csv'): ExamSource =>
  createInMemorySource(makeRawTable(rows, name));

/**
 * Source whose read() throws instead of returning a result.
 */
export const makeThrowingSource = (name: string, message: string): ExamSource => ({
  name,
  read: async () => {
    throw new Error(message);
  },
});

/**
 * Source that resolves only when `release` is called.
 */
export const makeGatedSource = (
  table: RawTable
): { source: ExamSource; release: () => void; started: Promise<void> } => {
  let release: () => void = () => undefined;
  let markStarted: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });

  return {
    source: {
      name: table.source,
      read: async () => {
        markStarted();
        await gate;
        return ok(table);
      },
    },
    release: () => {
      release();
    },
    started,
  };
};
