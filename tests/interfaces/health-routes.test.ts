import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { healthRoutes } from '../../src/interfaces/http/index.js';
import type { ListenerStatus } from '../../src/application/supervisor.js';

describe('GET /health', () => {
  let app: FastifyInstance | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it('reports listener states', async () => {
    const listeners: ListenerStatus[] = [
      { ruleId: 'rule-a', state: 'streaming', startedAt: '2026-02-18T12:00:00.000Z', topic: 'alerts' },
      { ruleId: 'rule-b', state: 'backing_off', startedAt: '2026-02-18T12:00:01.000Z', topic: 'deploys' },
    ];
    app = Fastify();
    await app.register(healthRoutes, { listeners: () => listeners });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: 'ok',
      uptime_seconds: expect.any(Number),
      listeners: { total: 2, streaming: 1, items: listeners },
    });
  });
});
