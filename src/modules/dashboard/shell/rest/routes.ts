/**
 * Dashboard REST Routes
 *
 * Read-only access to the current snapshot, plus a trigger that re-reads the
 * configured sources. A failed refresh never removes the snapshot being
 * served; it is reported next to it.
 */

import {
  DashboardStatusResponseSchema,
  ErrorResponseSchema,
  GetDashboardResponseSchema,
  RefreshResponseSchema,
  SnapshotUnavailableResponseSchema,
  type RefreshFailureBody,
} from './schemas.js';
import { getHttpStatusForError } from '../../core/errors.js';

import type { RefreshFailure } from '../../core/types.js';
import type { DashboardFacade } from '../service/dashboard-facade.js';
import type { ExamSource } from '../../../exam-records/index.js';
import type { FastifyPluginAsync } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeDashboardRoutesDeps {
  facade: DashboardFacade;
  /** Sources read by POST /refresh, resolved per request */
  getSources: () => readonly ExamSource[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toFailureBody = (failure: RefreshFailure | null): RefreshFailureBody | null =>
  failure === null
    ? null
    : {
        type: failure.error.type,
        message: failure.error.message,
        failedAt: failure.failedAt,
      };

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeDashboardRoutes = (deps: MakeDashboardRoutesDeps): FastifyPluginAsync => {
  const { facade, getSources } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/dashboard - Current snapshot
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/dashboard',
      {
        schema: {
          response: {
            200: GetDashboardResponseSchema,
            503: SnapshotUnavailableResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const snapshot = facade.getSnapshot();
        const lastError = toFailureBody(facade.getLastError());

        if (snapshot === null) {
          return reply.status(503).send({
            ok: false,
            error: 'SnapshotUnavailable',
            message: 'No dashboard data has been loaded yet',
            lastError,
          });
        }

        return reply.status(200).send({ ok: true, data: snapshot, lastError });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/dashboard/status - State machine view
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/dashboard/status',
      {
        schema: {
          response: {
            200: DashboardStatusResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const state = facade.getState();
        const snapshot = state.status === 'ready' ? state.snapshot : null;

        return reply.status(200).send({
          ok: true,
          data: {
            status: state.status,
            generatedAt: snapshot?.generatedAt ?? null,
            recordCount: snapshot?.recordCount ?? null,
            lastError: toFailureBody(facade.getLastError()),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/dashboard/refresh - Re-read sources
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/api/v1/dashboard/refresh',
      {
        schema: {
          response: {
            200: RefreshResponseSchema,
            422: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await facade.refresh(getSources());

        if (result.isErr()) {
          request.log.warn({ errorType: result.error.type }, 'Dashboard refresh rejected');
          return reply.status(getHttpStatusForError(result.error)).send({
            ok: false,
            error: result.error.type,
            message: result.error.message,
          });
        }

        const snapshot = result.value;
        return reply.status(200).send({
          ok: true,
          data: {
            generatedAt: snapshot.generatedAt,
            recordCount: snapshot.recordCount,
            excludedCount: snapshot.excludedCount,
          },
        });
      }
    );
  };
};
