import { err, ok, type Result } from 'neverthrow';

import { createChildLogger } from '../../../../infra/logger/index.js';
import { buildSnapshot } from '../../core/usecases/build-snapshot.js';
import { loadSources } from '../../core/usecases/load-sources.js';
import {
  DEFAULT_TOP_PHYSICIAN_LIMIT,
  DEFAULT_TREND_WINDOW_DAYS,
  type DashboardSnapshot,
  type FacadeState,
  type RefreshFailure,
} from '../../core/types.js';

import { createUnexpectedRefreshError, type DashboardError } from '../../core/errors.js';
import type { ExamSource } from '../../../exam-records/index.js';
import type { Logger } from 'pino';

export interface DashboardFacadeOptions {
  logger: Logger;
  /** IANA zone for every calendar bucket */
  timeZone: string;
  maxExclusionRate: number;
  maxReportedExclusions: number;
  topPhysicianLimit?: number;
  /** Days before the latest date covered by the daily averages */
  trendWindowDays?: number;
  /** Clock used to stamp snapshots and failures */
  now?: () => Date;
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
};

/**
 * Owns the current dashboard snapshot.
 *
 * State is either `empty` (no successful refresh yet) or `ready` (holding the
 * last good snapshot). A failed refresh leaves the state as it was and is
 * reported through {@link getLastError}; a successful one replaces the
 * snapshot in a single assignment and clears the error.
 *
 * Refreshes are queued: each one starts after the previous has settled, so
 * the snapshot reference only ever moves from one complete snapshot to the
 * next. Readers never block.
 */
export class DashboardFacade {
  private state: FacadeState = { status: 'empty' };
  private lastError: RefreshFailure | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: DashboardFacadeOptions) {
    this.logger = createChildLogger(options.logger, { component: 'DashboardFacade' });
    this.now = options.now ?? (() => new Date());
  }

  getState(): FacadeState {
    return this.state;
  }

  getSnapshot(): DashboardSnapshot | null {
    return this.state.status === 'ready' ? this.state.snapshot : null;
  }

  getLastError(): RefreshFailure | null {
    return this.lastError;
  }

  /**
   * Rebuilds the snapshot from the given sources.
   * Never rejects; failures come back as an error result.
   */
  refresh(sources: readonly ExamSource[]): Promise<Result<DashboardSnapshot, DashboardError>> {
    const run = () => this.runRefresh(sources);
    const next = this.queue.then(run, run);
    this.queue = next;
    return next;
  }

  private async runRefresh(
    sources: readonly ExamSource[]
  ): Promise<Result<DashboardSnapshot, DashboardError>> {
    try {
      return await this.rebuild(sources);
    } catch (error) {
      return this.fail(createUnexpectedRefreshError(error));
    }
  }

  private async rebuild(
    sources: readonly ExamSource[]
  ): Promise<Result<DashboardSnapshot, DashboardError>> {
    const startedAt = Date.now();

    const merged = await loadSources(sources, {
      timeZone: this.options.timeZone,
      maxExclusionRate: this.options.maxExclusionRate,
    });
    if (merged.isErr()) {
      return this.fail(merged.error);
    }

    const snapshot = buildSnapshot({
      merged: merged.value,
      settings: {
        timeZone: this.options.timeZone,
        maxReportedExclusions: this.options.maxReportedExclusions,
        topPhysicianLimit: this.options.topPhysicianLimit ?? DEFAULT_TOP_PHYSICIAN_LIMIT,
        trendWindowDays: this.options.trendWindowDays ?? DEFAULT_TREND_WINDOW_DAYS,
      },
      generatedAt: this.now().toISOString(),
    });
    if (snapshot.isErr()) {
      return this.fail(snapshot.error);
    }

    const published = deepFreeze(snapshot.value);
    this.state = { status: 'ready', snapshot: published };
    this.lastError = null;

    this.logger.info(
      {
        recordCount: published.recordCount,
        excludedCount: published.excludedCount,
        sources: published.sources.length,
        durationMs: Date.now() - startedAt,
      },
      'Dashboard snapshot refreshed'
    );

    return ok(published);
  }

  private fail(error: DashboardError): Result<DashboardSnapshot, DashboardError> {
    this.lastError = { error, failedAt: this.failureStamp() };

    this.logger.warn(
      { errorType: error.type, message: error.message, state: this.state.status },
      'Dashboard refresh failed; keeping previous state'
    );

    return err(error);
  }

  private failureStamp(): string {
    try {
      return this.now().toISOString();
    } catch {
      // the injected clock itself may be what failed
      return new Date().toISOString();
    }
  }
}
