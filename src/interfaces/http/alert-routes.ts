import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { alertActionSchema, listAlertsQuerySchema } from '../../application/alert-schema.js';
import { findAlertHistory } from '../../infrastructure/db/index.js';

/**
 * Alert routes.
 *
 * GET  /api/v1/alerts                          — open alerts and recent history
 * GET  /api/v1/alerts/stats                    — counts by status and severity
 * GET  /api/v1/alerts/:alert_id                — single alert
 * GET  /api/v1/alerts/:alert_id/history        — stored lifecycle actions
 * POST /api/v1/alerts/:alert_id/acknowledge    — stop escalation
 * POST /api/v1/alerts/:alert_id/resolve        — close the alert
 *
 * Alert state lives in the alert manager; Postgres only holds the audit
 * trail written by the lifecycle listener.
 */
async function alertRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/alerts ───────────────────────────────────
  fastify.get(
    '/api/v1/alerts',
    async (
      request: FastifyRequest<{ Querystring: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = listAlertsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const alerts = fastify.core.alerts.list(parsed.data);
      return reply.status(200).send({ alerts, count: alerts.length });
    },
  );

  // ── GET /api/v1/alerts/stats ─────────────────────────────
  fastify.get(
    '/api/v1/alerts/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.core.alerts.stats());
    },
  );

  // ── GET /api/v1/alerts/:alert_id ─────────────────────────
  fastify.get(
    '/api/v1/alerts/:alert_id',
    async (
      request: FastifyRequest<{ Params: { alert_id: string } }>,
      reply: FastifyReply,
    ) => {
      const alert = fastify.core.alerts.get(request.params.alert_id);
      if (alert === null) {
        return reply.status(404).send({ error: 'Alert not found' });
      }
      return reply.status(200).send(alert);
    },
  );

  // ── GET /api/v1/alerts/:alert_id/history ─────────────────
  fastify.get(
    '/api/v1/alerts/:alert_id/history',
    async (
      request: FastifyRequest<{ Params: { alert_id: string } }>,
      reply: FastifyReply,
    ) => {
      const rows = await findAlertHistory(fastify.db, request.params.alert_id);
      return reply.status(200).send(rows);
    },
  );

  // ── POST /api/v1/alerts/:alert_id/acknowledge ────────────
  fastify.post(
    '/api/v1/alerts/:alert_id/acknowledge',
    async (
      request: FastifyRequest<{ Params: { alert_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = alertActionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const alert = fastify.core.alerts.acknowledge(request.params.alert_id, parsed.data.actor);
      if (alert === null) {
        return reply.status(404).send({ error: 'Open alert not found' });
      }
      return reply.status(200).send(alert);
    },
  );

  // ── POST /api/v1/alerts/:alert_id/resolve ────────────────
  fastify.post(
    '/api/v1/alerts/:alert_id/resolve',
    async (
      request: FastifyRequest<{ Params: { alert_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = alertActionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const alert = fastify.core.alerts.resolve(request.params.alert_id, parsed.data.actor);
      if (alert === null) {
        return reply.status(404).send({ error: 'Open alert not found' });
      }
      return reply.status(200).send(alert);
    },
  );
}

export default fp(alertRoutes, {
  name: 'alert-routes',
  dependencies: ['db', 'core'],
  fastify: '5.x',
});
