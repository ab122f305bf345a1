/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { createLogger } from '@/infra/logger/index.js';
import { DashboardFacade } from '@/modules/dashboard/index.js';

import { makeHealthChecker, makeRawTable, makeTestConfig } from '../fixtures/builders.js';
import { makeMutableSource, type MutableSource } from '../fixtures/fakes.js';

import type { HealthChecker } from '@/modules/health/index.js';
import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance;
  let facade: DashboardFacade;
  let source: MutableSource;

  let clock: Date;

  const start = async (healthCheckers: HealthChecker[] = []): Promise<void> => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        facade,
        sources: [source],
        healthCheckers,
        now: () => clock,
      },
      version: '1.2.3',
    });
  };

  beforeEach(() => {
    clock = new Date('2024-03-01T12:00:00.000Z');
    facade = new DashboardFacade({
      logger: createLogger({ level: 'silent' }),
      timeZone: 'UTC',
      maxExclusionRate: 1,
      maxReportedExclusions: 50,
      now: () => new Date('2024-03-01T12:00:00.000Z'),
    });
    source = makeMutableSource(
      makeRawTable([
        { physician: 'A', modality: 'CT', rvu: '1', points: '1', timestamp: '2024-01-01 09:00' },
      ])
    );
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /health/live', () => {
    it('returns 200 even without data', async () => {
      await start();

      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
      expect(response.headers['cache-control']).toBe('no-store');
    });
  });

  describe('GET /health/ready', () => {
    it('returns 503 until a snapshot is loaded', async () => {
      await start();

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.version).toBe('1.2.3');
      expect(body.checks[0]).toMatchObject({
        name: 'dashboard-snapshot',
        status: 'unhealthy',
        message: 'No snapshot loaded yet',
      });
    });

    it('mentions the failure that left the dashboard empty', async () => {
      source.failWith('permission denied');
      await facade.refresh([source]);
      await start();

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
      expect(response.json().checks[0].message).toBe(
        'No snapshot loaded: Failed to read test.csv: permission denied'
      );
    });

    it('returns 200 once a snapshot is loaded', async () => {
      await facade.refresh([source]);
      await start();

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(body.checks[0]).toMatchObject({
        name: 'dashboard-snapshot',
        status: 'healthy',
        message: 'Snapshot from 2024-03-01T12:00:00.000Z',
      });
    });

    it('stamps the response with the probe clock and uptime', async () => {
      await facade.refresh([source]);
      await start();
      clock = new Date('2024-03-01T12:01:30.000Z');

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      const body = response.json();
      expect(body.timestamp).toBe('2024-03-01T12:01:30.000Z');
      expect(body.uptime).toBe(90);
      expect(response.headers['cache-control']).toBe('no-store');
    });

    it('stays ready when a refresh fails over a good snapshot', async () => {
      await facade.refresh([source]);
      source.failWith('permission denied');
      await facade.refresh([source]);
      await start();

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json().checks[0].message).toBe(
        'Serving snapshot from 2024-03-01T12:00:00.000Z; last refresh failed: SourceReadError'
      );
    });

    it('runs extra checkers next to the snapshot check', async () => {
      await facade.refresh([source]);
      await start([makeHealthChecker({ name: 'archive', status: 'unhealthy', critical: false })]);

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('degraded');
      expect(body.checks).toHaveLength(2);
      expect(body.checks[1].name).toBe('archive');
    });
  });
});
