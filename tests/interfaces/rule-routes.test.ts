import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * The CRUD functions are replaced; toPublicRule stays real.
 */
vi.mock('../../src/application/rule-crud.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/application/rule-crud.js')>();
  return {
    ...actual,
    createRule: vi.fn(),
    listRules: vi.fn(),
    getRule: vi.fn(),
    removeRule: vi.fn(),
  };
});

import { createRule, listRules, getRule, removeRule } from '../../src/application/rule-crud.js';
import { ruleRoutes } from '../../src/interfaces/http/index.js';
import type { Database } from '../../src/infrastructure/db/index.js';
import { fakeRule } from '../helpers.js';

const mockCreateRule = vi.mocked(createRule);
const mockListRules = vi.mocked(listRules);
const mockGetRule = vi.mocked(getRule);
const mockRemoveRule = vi.mocked(removeRule);

const RULE_ID = '11111111-2222-3333-4444-555555555555';
const RULE = fakeRule({ id: RULE_ID, authHeader: 'Bearer test-token', createdAt: new Date('2026-02-18T12:00:00Z') });
const PUBLIC_RULE = {
  rule_id: RULE_ID,
  server: 'https://ntfy.example.com',
  topic: 'alerts',
  webhook: 'https://discord.example.com/api/webhooks/1/test',
  auth: 'Bearer Token',
  created_at: '2026-02-18T12:00:00.000Z',
};

const fakeDb = {} as Database;

/** Stands in for the real db plugin so rule-routes' dependency is met. */
const fakeDbPlugin = fp(async (fastify: FastifyInstance) => {
  fastify.decorate('db', fakeDb);
}, { name: 'db' });

describe('rule routes', () => {
  let app: FastifyInstance;
  let onRulesChanged: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    vi.clearAllMocks();
    onRulesChanged = vi.fn().mockResolvedValue(undefined);
    app = Fastify();
    await app.register(fakeDbPlugin);
    await app.register(ruleRoutes, { onRulesChanged });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  // ─── POST /api/v1/rules ──────────────────────────────────

  it('creates a rule and announces it', async () => {
    mockCreateRule.mockResolvedValue({ status: 'created', rule: RULE });
    const payload = {
      server: 'https://ntfy.example.com',
      topic: 'alerts',
      webhook: 'https://discord.example.com/api/webhooks/1/test',
      token: 'test-token',
    };

    const res = await app.inject({ method: 'POST', url: '/api/v1/rules', payload });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual(PUBLIC_RULE);
    expect(mockCreateRule).toHaveBeenCalledWith(fakeDb, payload);
    expect(onRulesChanged).toHaveBeenCalledWith('create', RULE_ID);
  });

  it('rejects an invalid body with field errors', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/rules',
      payload: { server: 'https://ntfy.example.com', topic: 'bad topic', webhook: 'https://discord.example.com/x' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.fieldErrors.topic).toEqual([
      'Topic must be 1-64 characters of letters, digits, "-" or "_"',
    ]);
    expect(mockCreateRule).not.toHaveBeenCalled();
  });

  it('returns 409 for a duplicate triple', async () => {
    mockCreateRule.mockResolvedValue({ status: 'duplicate' });

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/rules',
      payload: { server: 'https://ntfy.example.com', topic: 'alerts', webhook: 'https://discord.example.com/x' },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: 'Rule for this server, topic and webhook already exists' });
    expect(onRulesChanged).not.toHaveBeenCalled();
  });

  // ─── GET /api/v1/rules ───────────────────────────────────

  it('lists rules without exposing credentials', async () => {
    mockListRules.mockResolvedValue([RULE]);

    const res = await app.inject({ method: 'GET', url: '/api/v1/rules' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([PUBLIC_RULE]);
    expect(res.body).not.toContain('test-token');
  });

  // ─── GET /api/v1/rules/:rule_id ──────────────────────────

  it('returns a single rule', async () => {
    mockGetRule.mockResolvedValue(RULE);

    const res = await app.inject({ method: 'GET', url: `/api/v1/rules/${RULE_ID}` });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(PUBLIC_RULE);
  });

  it('returns 404 for an unknown rule', async () => {
    mockGetRule.mockResolvedValue(null);

    const res = await app.inject({ method: 'GET', url: `/api/v1/rules/${RULE_ID}` });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Rule not found' });
  });

  it('returns 400 for a malformed id', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/rules/not-a-uuid' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'rule_id must be a valid UUID' });
    expect(mockGetRule).not.toHaveBeenCalled();
  });

  // ─── DELETE /api/v1/rules/:rule_id ───────────────────────

  it('deletes a rule and announces it', async () => {
    mockRemoveRule.mockResolvedValue(true);

    const res = await app.inject({ method: 'DELETE', url: `/api/v1/rules/${RULE_ID}` });

    expect(res.statusCode).toBe(204);
    expect(res.body).toBe('');
    expect(mockRemoveRule).toHaveBeenCalledWith(fakeDb, RULE_ID);
    expect(onRulesChanged).toHaveBeenCalledWith('delete', RULE_ID);
  });

  it('returns 404 when deleting an unknown rule', async () => {
    mockRemoveRule.mockResolvedValue(false);

    const res = await app.inject({ method: 'DELETE', url: `/api/v1/rules/${RULE_ID}` });

    expect(res.statusCode).toBe(404);
    expect(onRulesChanged).not.toHaveBeenCalled();
  });
});
