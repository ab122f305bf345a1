/**
 * Integration tests for CORS plugin
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { createLogger } from '@/infra/logger/index.js';
import { DashboardFacade } from '@/modules/dashboard/index.js';

import { makeTestConfig } from '../fixtures/builders.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { FastifyInstance } from 'fastify';

const makeApp = (config: AppConfig): Promise<FastifyInstance> =>
  createApp({
    fastifyOptions: { logger: false },
    deps: {
      config,
      facade: new DashboardFacade({
        logger: createLogger({ level: 'silent' }),
        timeZone: 'UTC',
        maxExclusionRate: 1,
        maxReportedExclusions: 50,
      }),
      sources: [],
    },
  });

const developmentServer = {
  port: 3000,
  host: '0.0.0.0',
  isDevelopment: true,
  isProduction: false,
  isTest: false,
};

const productionServer = {
  port: 3000,
  host: '0.0.0.0',
  isDevelopment: false,
  isProduction: true,
  isTest: false,
};

describe('CORS Plugin', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('allows requests without origin header', async () => {
    app = await makeApp(makeTestConfig({ server: productionServer }));

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
  });

  it('allows origins from ALLOWED_ORIGINS', async () => {
    app = await makeApp(
      makeTestConfig({
        server: productionServer,
        cors: { allowedOrigins: 'https://dash.example.org, https://ops.example.org' },
      })
    );

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'https://ops.example.org' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('https://ops.example.org');
  });

  it('blocks origins not in ALLOWED_ORIGINS', async () => {
    app = await makeApp(
      makeTestConfig({
        server: productionServer,
        cors: { allowedOrigins: 'https://dash.example.org' },
      })
    );

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'https://evil.example.com' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('allows localhost in development only', async () => {
    app = await makeApp(makeTestConfig({ server: developmentServer }));

    const allowed = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'http://localhost:5173' },
    });
    expect(allowed.statusCode).toBe(200);
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5173');

    await app.close();
    app = await makeApp(makeTestConfig({ server: productionServer }));

    const blocked = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'http://localhost:5173' },
    });
    expect(blocked.statusCode).toBe(500);
  });

  it('answers preflight requests for the refresh endpoint', async () => {
    app = await makeApp(
      makeTestConfig({
        server: productionServer,
        cors: { allowedOrigins: 'https://dash.example.org' },
      })
    );

    const response = await app.inject({
      method: 'OPTIONS',
      url: '/api/v1/dashboard/refresh',
      headers: {
        origin: 'https://dash.example.org',
        'access-control-request-method': 'POST',
      },
    });

    expect(response.statusCode).toBe(204);
    expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
  });
});
