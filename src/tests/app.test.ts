import { describe, it, expect, afterEach, vi } from 'vitest';
import { buildApp } from '../app.js';
import { logger } from '../lib/logger.js';

describe('buildApp', () => {
  it('serves the health check and the simulation routes', async () => {
    const app = await buildApp({
      port: 0,
      host: '127.0.0.1',
      logLevel: 'silent',
      frontendUrl: 'http://localhost:5173',
      defaultHorizonDays: 30,
      maxHorizonDays: 60,
      calendarScanLimitDays: 400,
    });

    try {
      const health = await app.inject({ method: 'GET', url: '/health' });
      expect(health.statusCode).toBe(200);
      expect(health.json()).toEqual({ status: 'ok' });

      const defaults = await app.inject({
        method: 'GET',
        url: '/api/simulations/defaults',
        headers: { origin: 'http://localhost:5173' },
      });
      expect(defaults.statusCode).toBe(200);
      expect(defaults.headers['access-control-allow-origin']).toBe('http://localhost:5173');
      expect(logger.level).toBe('silent');
    } finally {
      await app.close();
    }
  });

  it('answers unknown routes with a 404 error body', async () => {
    const app = await buildApp({
      port: 0,
      host: '127.0.0.1',
      logLevel: 'silent',
      frontendUrl: 'http://localhost:5173',
      defaultHorizonDays: 30,
      maxHorizonDays: 60,
      calendarScanLimitDays: 400,
    });

    try {
      const response = await app.inject({ method: 'GET', url: '/api/unknown' });
      expect(response.statusCode).toBe(404);
    } finally {
      await app.close();
    }
  });
});

describe('module logger', () => {
  afterEach(() => {
    delete process.env.LOG_LEVEL;
    vi.resetModules();
  });

  it('loads at info whatever LOG_LEVEL holds', async () => {
    process.env.LOG_LEVEL = 'loud';
    vi.resetModules();

    const fresh = await import('../lib/logger.js');
    expect(fresh.logger.level).toBe('info');
  });
});
