/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig, isValidTimeZone } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env).toEqual({
        NODE_ENV: 'development',
        PORT: 3000,
        HOST: '0.0.0.0',
        LOG_LEVEL: 'info',
        ALLOWED_ORIGINS: undefined,
        DASHBOARD_SOURCES: './data/exams.csv',
        CSV_DELIMITER: ',',
        PRACTICE_TIME_ZONE: 'UTC',
        MAX_EXCLUSION_RATE: 1,
        MAX_REPORTED_EXCLUSIONS: 50,
      });
    });

    it('parses numeric settings', () => {
      const env = parseEnv({
        PORT: '8080',
        MAX_EXCLUSION_RATE: '0.05',
        MAX_REPORTED_EXCLUSIONS: '10',
      });

      expect(env.PORT).toBe(8080);
      expect(env.MAX_EXCLUSION_RATE).toBe(0.05);
      expect(env.MAX_REPORTED_EXCLUSIONS).toBe(10);
    });

    it('accepts a known IANA time zone', () => {
      expect(parseEnv({ PRACTICE_TIME_ZONE: 'America/Chicago' }).PRACTICE_TIME_ZONE).toBe(
        'America/Chicago'
      );
    });

    it('throws on an unknown time zone', () => {
      expect(() => parseEnv({ PRACTICE_TIME_ZONE: 'Mars/Olympus' })).toThrow(
        "Invalid environment configuration: /PRACTICE_TIME_ZONE: unknown time zone 'Mars/Olympus'"
      );
    });

    it('throws on an exclusion rate outside 0..1', () => {
      expect(() => parseEnv({ MAX_EXCLUSION_RATE: '1.5' })).toThrow(
        /Invalid environment configuration: .*MAX_EXCLUSION_RATE/
      );
    });

    it('throws on invalid NODE_ENV', () => {
      expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow(
        /Invalid environment configuration/
      );
    });

    it('throws on a multi-character delimiter', () => {
      expect(() => parseEnv({ CSV_DELIMITER: ';;' })).toThrow(/CSV_DELIMITER/);
    });
  });

  describe('isValidTimeZone', () => {
    it('recognizes zones known to the runtime', () => {
      expect(isValidTimeZone('UTC')).toBe(true);
      expect(isValidTimeZone('Europe/Berlin')).toBe(true);
      expect(isValidTimeZone('Not/AZone')).toBe(false);
    });
  });

  describe('createConfig', () => {
    it('splits and trims the source list', () => {
      const config = createConfig(
        parseEnv({ DASHBOARD_SOURCES: ' ./a.csv , ./b.csv ,, ' })
      );

      expect(config.sources.csvPaths).toEqual(['./a.csv', './b.csv']);
    });

    it('derives environment flags and logger settings', () => {
      const dev = createConfig(parseEnv({ NODE_ENV: 'development' }));
      const prod = createConfig(parseEnv({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }));

      expect(dev.server.isDevelopment).toBe(true);
      expect(dev.logger.pretty).toBe(true);
      expect(prod.server.isProduction).toBe(true);
      expect(prod.logger).toEqual({ level: 'warn', pretty: false });
    });

    it('carries aggregation settings', () => {
      const config = createConfig(
        parseEnv({ PRACTICE_TIME_ZONE: 'America/Denver', MAX_EXCLUSION_RATE: '0.2' })
      );

      expect(config.aggregation).toEqual({
        timeZone: 'America/Denver',
        maxExclusionRate: 0.2,
        maxReportedExclusions: 50,
      });
    });
  });
});
