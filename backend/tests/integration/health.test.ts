import { jest, describe, it, expect, afterEach } from '@jest/globals';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';

jest.unstable_mockModule('../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const { healthRoutes } = await import('../../src/routes/health.js');
const { logger } = await import('../../src/utils/logger.js');

function createMockDb(connected: boolean) {
  return {
    raw: connected
      ? jest.fn<() => Promise<unknown>>().mockResolvedValue({ rows: [{ '?column?': 1 }] })
      : jest.fn<() => Promise<unknown>>().mockRejectedValue(new Error('Connection refused')),
  } as unknown as Knex;
}

describe('GET /health', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    if (app) await app.close();
  });

  it('returns 200 when the database is connected', async () => {
    app = Fastify();
    await app.register(async (instance) =>
      healthRoutes(instance, {
        db: createMockDb(true),
        startTime: Date.now() - 5000,
      }),
    );
    await app.ready();

    const response = await app.inject({ method: 'GET', url: '/health' });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe('ok');
    expect(body.version).toBe('1.0.0');
    expect(body.db).toBe('connected');
    expect(body.uptime).toBeGreaterThanOrEqual(5);
  });

  it('returns 503 when the database is unreachable', async () => {
    app = Fastify();
    await app.register(async (instance) =>
      healthRoutes(instance, {
        db: createMockDb(false),
        startTime: Date.now(),
      }),
    );
    await app.ready();

    const response = await app.inject({ method: 'GET', url: '/health' });
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(503);
    expect(body.status).toBe('degraded');
    expect(body.db).toBe('disconnected');
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Health check: database unreachable',
    );
  });
});
