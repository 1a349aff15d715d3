import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Observability routes.
 *
 * GET /api/v1/metrics — core counters and gauges
 * GET /api/v1/windows — windows that are open or in their grace period
 * GET /api/v1/health  — liveness of the coordinator
 */
async function metricsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/metrics',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { metrics, alerts } = fastify.core;
      return reply.status(200).send({
        started_at: metrics.started_at,
        open_alerts: alerts.openCount,
        counters: metrics.snapshot(),
      });
    },
  );

  fastify.get(
    '/api/v1/windows',
    async (
      request: FastifyRequest<{ Querystring: { rule_id?: string } }>,
      reply: FastifyReply,
    ) => {
      const ruleId = request.query.rule_id;
      const windows = fastify.core.windows.openWindows()
        .filter((s) => ruleId === undefined || s.window.rule_id === ruleId)
        .map(({ window, aggregation }) => ({
          window_id: window.id,
          rule_id: window.rule_id,
          partition: window.partition,
          kind: window.kind,
          state: window.state,
          start: new Date(window.start).toISOString(),
          end: window.end === null ? null : new Date(window.end).toISOString(),
          count: aggregation.count,
          sum: aggregation.sum,
          min: aggregation.min,
          max: aggregation.max,
          avg: aggregation.avg,
          percentiles: aggregation.percentiles,
          approximate: aggregation.approximate,
        }));

      fastify.log.debug({ rule_id: ruleId, count: windows.length }, 'Windows endpoint hit');
      return reply.status(200).send({ windows, count: windows.length });
    },
  );

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { coordinator, windows, alerts } = fastify.core;
      const running = coordinator.running;
      return reply.status(running ? 200 : 503).send({
        status: running ? 'ok' : 'stopped',
        worker_id: fastify.instanceId,
        shedding: coordinator.isShedding,
        windows: windows.size,
        open_alerts: alerts.openCount,
      });
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  dependencies: ['core'],
  fastify: '5.x',
});
