/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { isValidTimeZone } from '../../common/temporal/zoned-time.js';

export { isValidTimeZone };

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),

  // Exam sources
  DASHBOARD_SOURCES: Type.String({ minLength: 1 }),
  CSV_DELIMITER: Type.String({ minLength: 1, maxLength: 1, default: ',' }),

  // Aggregation
  PRACTICE_TIME_ZONE: Type.String({ minLength: 1, default: 'UTC' }),
  MAX_EXCLUSION_RATE: Type.Number({ minimum: 0, maximum: 1, default: 1 }),
  MAX_REPORTED_EXCLUSIONS: Type.Integer({ minimum: 0, default: 50 }),
});

export type Env = Static<typeof EnvSchema>;

const parseNumber = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
    DASHBOARD_SOURCES: env['DASHBOARD_SOURCES'] ?? './data/exams.csv',
    CSV_DELIMITER: env['CSV_DELIMITER'] ?? ',',
    PRACTICE_TIME_ZONE: env['PRACTICE_TIME_ZONE'] ?? 'UTC',
    MAX_EXCLUSION_RATE: parseNumber(env['MAX_EXCLUSION_RATE'], 1),
    MAX_REPORTED_EXCLUSIONS: parseNumber(env['MAX_REPORTED_EXCLUSIONS'], 50),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (!isValidTimeZone(rawEnv.PRACTICE_TIME_ZONE)) {
    throw new Error(
      `Invalid environment configuration: /PRACTICE_TIME_ZONE: unknown time zone '${rawEnv.PRACTICE_TIME_ZONE}'`
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
  sources: {
    /** CSV files read on every refresh, in this order */
    csvPaths: env.DASHBOARD_SOURCES.split(',')
      .map((p) => p.trim())
      .filter(Boolean),
    delimiter: env.CSV_DELIMITER,
  },
  aggregation: {
    /** IANA zone used for every day-of-week, hour and month bucket */
    timeZone: env.PRACTICE_TIME_ZONE,
    maxExclusionRate: env.MAX_EXCLUSION_RATE,
    maxReportedExclusions: env.MAX_REPORTED_EXCLUSIONS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
