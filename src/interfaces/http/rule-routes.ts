import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { createRuleSchema, ruleIdSchema } from '../../application/rule-schema.js';
import {
  createRule,
  listRules,
  getRule,
  removeRule,
  toPublicRule,
} from '../../application/rule-crud.js';
import type { RuleChangeReason } from '../../infrastructure/redis/index.js';

export interface RuleRoutesOptions {
  /** Called after a successful create or delete. Must not throw. */
  onRulesChanged: (reason: RuleChangeReason, ruleId: string) => Promise<void>;
}

/**
 * Rule management routes.
 *
 * POST   /api/v1/rules           create rule
 * GET    /api/v1/rules           list all rules
 * GET    /api/v1/rules/:rule_id  get single rule
 * DELETE /api/v1/rules/:rule_id  delete rule
 *
 * Responses carry the credential kind ("Bearer Token"), never its value.
 */
async function ruleRoutes(fastify: FastifyInstance, opts: RuleRoutesOptions): Promise<void> {

  // ── POST /api/v1/rules ───────────────────────────────────
  fastify.post(
    '/api/v1/rules',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = createRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await createRule(fastify.db, parsed.data);
      if (result.status === 'duplicate') {
        return reply.status(409).send({ error: 'Rule for this server, topic and webhook already exists' });
      }

      await opts.onRulesChanged('create', result.rule.id);
      return reply.status(201).send(toPublicRule(result.rule));
    },
  );

  // ── GET /api/v1/rules ────────────────────────────────────
  fastify.get(
    '/api/v1/rules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rules = await listRules(fastify.db);
      return reply.status(200).send(rules.map(toPublicRule));
    },
  );

  // ── GET /api/v1/rules/:rule_id ───────────────────────────
  fastify.get(
    '/api/v1/rules/:rule_id',
    async (
      request: FastifyRequest<{ Params: { rule_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { rule_id } = request.params;
      if (!ruleIdSchema.safeParse(rule_id).success) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const rule = await getRule(fastify.db, rule_id);
      if (rule === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      return reply.status(200).send(toPublicRule(rule));
    },
  );

  // ── DELETE /api/v1/rules/:rule_id ────────────────────────
  fastify.delete(
    '/api/v1/rules/:rule_id',
    async (
      request: FastifyRequest<{ Params: { rule_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { rule_id } = request.params;
      if (!ruleIdSchema.safeParse(rule_id).success) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const deleted = await removeRule(fastify.db, rule_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      await opts.onRulesChanged('delete', rule_id);
      return reply.status(204).send();
    },
  );
}

export default fp(ruleRoutes, {
  name: 'rule-routes',
  dependencies: ['db'],
  fastify: '5.x',
});
