import type { Result } from 'neverthrow';

import type { SourceReadError } from './errors.js';
import type { RawTable } from './types.js';

/**
 * A tabular source of raw exam rows.
 * `read` is called once per refresh and must not mutate the underlying data.
 */
export interface ExamSource {
  readonly name: string;
  read(): Promise<Result<RawTable, SourceReadError>>;
}
