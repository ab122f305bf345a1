/**
 * Health REST Routes
 *
 * - GET /health/live  - the process answers requests
 * - GET /health/ready - a dashboard snapshot can be served
 *
 * Both probes answer with `cache-control: no-store`.
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeHealthRoutesDeps extends Partial<GetReadinessDeps> {
  /** Clock for the readiness timestamp and uptime */
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Degraded still serves traffic; only unhealthy takes the instance out.
 */
export const readinessHttpStatus = (status: ReadinessResponse['status']): 200 | 503 =>
  status === 'unhealthy' ? 503 : 200;

const noStore = (reply: FastifyReply): FastifyReply => reply.header('cache-control', 'no-store');

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const { version, checkers = [] } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = now().getTime();

  return async (fastify) => {
    fastify.get(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => noStore(reply).status(200).send({ status: 'ok' })
    );

    fastify.get(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const checkedAt = now();

        const readiness = await getReadiness(
          { version, checkers },
          {
            uptime: Math.max(0, Math.floor((checkedAt.getTime() - startedAt) / 1000)),
            timestamp: checkedAt.toISOString(),
          }
        );

        return noStore(reply).status(readinessHttpStatus(readiness.status)).send(readiness);
      }
    );
  };
};
