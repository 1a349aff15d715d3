import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createRuleSchema,
  updateRuleSchema,
  patchRuleSchema,
} from '../../application/rule-schema.js';
import {
  createRule,
  listRules,
  getRule,
  updateRuleFull,
  patchRulePartial,
  removeRule,
} from '../../application/rule-crud.js';
import type { RuleRow } from '../../application/rule-crud.js';
import { ConfigError, ParseError } from '../../domain/errors.js';
import { publishRuleChange } from '../../infrastructure/redis/index.js';
import type { RuleChangeReason } from '../../infrastructure/redis/index.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Outcome of a write that the engine may reject. */
type WriteResult<T> = { ok: true; value: T } | { ok: false; error: ParseError | ConfigError };

/** Runs a rule write, turning engine rejections into a value instead of a 500. */
async function attempt<T>(write: () => Promise<T>): Promise<WriteResult<T>> {
  try {
    return { ok: true, value: await write() };
  } catch (err: unknown) {
    if (err instanceof ParseError || err instanceof ConfigError) return { ok: false, error: err };
    throw err;
  }
}

function rejection(reply: FastifyReply, error: ParseError | ConfigError): FastifyReply {
  return reply.status(400).send({ error: error.message, code: error.code });
}

/**
 * Rule CRUD routes.
 *
 * POST   /api/v1/rules           — create rule
 * GET    /api/v1/rules           — list all rules
 * GET    /api/v1/rules/:rule_id  — get single rule
 * PUT    /api/v1/rules/:rule_id  — full replace
 * PATCH  /api/v1/rules/:rule_id  — partial update
 * DELETE /api/v1/rules/:rule_id  — delete rule
 *
 * Writes are validated by the rule engine before they reach Postgres and
 * take effect in this process immediately; other instances are told via
 * the "rules_changed" channel.
 */
async function ruleRoutes(fastify: FastifyInstance): Promise<void> {

  const announce = (request: FastifyRequest, reason: RuleChangeReason, ruleId: string): Promise<void> =>
    publishRuleChange(fastify.redis, request.log, fastify.instanceId, reason, ruleId);

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

      const result = await attempt(() => createRule(fastify.db, fastify.core.engine, parsed.data));
      if (!result.ok) return rejection(reply, result.error);

      await announce(request, 'create', result.value.rule_id);
      return reply.status(201).send(result.value);
    },
  );

  // ── GET /api/v1/rules ────────────────────────────────────
  fastify.get(
    '/api/v1/rules',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const rows = await listRules(fastify.db);
      return reply.status(200).send(rows);
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
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const row = await getRule(fastify.db, rule_id);
      if (row === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      return reply.status(200).send(row);
    },
  );

  // ── PUT /api/v1/rules/:rule_id ───────────────────────────
  fastify.put(
    '/api/v1/rules/:rule_id',
    async (
      request: FastifyRequest<{ Params: { rule_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const { rule_id } = request.params;
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const parsed = updateRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await attempt<RuleRow | null>(
        () => updateRuleFull(fastify.db, fastify.core.engine, rule_id, parsed.data),
      );
      if (!result.ok) return rejection(reply, result.error);
      if (result.value === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      await announce(request, 'update', rule_id);
      return reply.status(200).send(result.value);
    },
  );

  // ── PATCH /api/v1/rules/:rule_id ─────────────────────────
  fastify.patch(
    '/api/v1/rules/:rule_id',
    async (
      request: FastifyRequest<{ Params: { rule_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const { rule_id } = request.params;
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const parsed = patchRuleSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const result = await attempt<RuleRow | null>(
        () => patchRulePartial(fastify.db, fastify.core.engine, rule_id, parsed.data),
      );
      if (!result.ok) return rejection(reply, result.error);
      if (result.value === null) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      await announce(request, 'patch', rule_id);
      return reply.status(200).send(result.value);
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
      if (!UUID_RE.test(rule_id)) {
        return reply.status(400).send({ error: 'rule_id must be a valid UUID' });
      }

      const deleted = await removeRule(fastify.db, fastify.core.engine, rule_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Rule not found' });
      }

      await announce(request, 'delete', rule_id);
      return reply.status(204).send();
    },
  );
}

export default fp(ruleRoutes, {
  name: 'rule-routes',
  dependencies: ['db', 'redis', 'core'],
  fastify: '5.x',
});
