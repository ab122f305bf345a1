/**
 * API server entry point
 * Loads the configured exam sources and starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger, prettyTransport } from './infra/logger/index.js';
import { DashboardFacade } from './modules/dashboard/index.js';
import { createCsvFileSource } from './modules/exam-records/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'];

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    name: 'rad-dashboard-server',
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, sources: config.sources, aggregation: config.aggregation } },
    'Starting dashboard server'
  );

  const sources = config.sources.csvPaths.map((filePath) =>
    createCsvFileSource({ filePath, delimiter: config.sources.delimiter })
  );

  const facade = new DashboardFacade({
    logger,
    timeZone: config.aggregation.timeZone,
    maxExclusionRate: config.aggregation.maxExclusionRate,
    maxReportedExclusions: config.aggregation.maxReportedExclusions,
  });

  // Initial load. A failure leaves the facade empty; readiness reports it
  // until a later refresh succeeds.
  const initial = await facade.refresh(sources);
  if (initial.isErr()) {
    logger.error(
      { errorType: initial.error.type, message: initial.error.message },
      'Initial dashboard load failed'
    );
  }

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      facade,
      sources,
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
