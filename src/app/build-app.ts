/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import {
  makeDashboardRoutes,
  makeSnapshotHealthChecker,
  type DashboardFacade,
} from '../modules/dashboard/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ExamSource } from '../modules/exam-records/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  facade: DashboardFacade;
  /** Sources re-read by POST /api/v1/dashboard/refresh */
  sources: readonly ExamSource[];
  /** Extra readiness checks, run next to the snapshot check */
  healthCheckers?: HealthChecker[];
  /** Clock for health probe timestamps */
  now?: () => Date;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined || deps.facade === undefined || deps.sources === undefined) {
    throw new Error('Missing required dependencies: config, facade, sources');
  }

  const { config, facade, sources } = deps;

  // Create Fastify instance
  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Register CORS plugin
  await registerCors(app, config);

  // Register health routes
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [makeSnapshotHealthChecker(facade), ...(deps.healthCheckers ?? [])],
      ...(deps.now !== undefined && { now: deps.now }),
    })
  );

  // Register dashboard routes
  await app.register(
    makeDashboardRoutes({
      facade,
      getSources: () => sources,
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    // Handle unexpected errors
    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
