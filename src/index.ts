import Fastify from 'fastify';
import { pino } from 'pino';
import { ZodError } from 'zod';

import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createStreamCore } from './application/stream-core.js';
import { CoreMetrics } from './application/metrics.js';
import {
  redisPlugin,
  createRedisClient,
  dbPlugin,
  createAlertRecorder,
  publishAlertChange,
  RedisBackpressureSignal,
  startHeartbeat,
  RedisStreamQueue,
  loadNotificationConfig,
  createNotificationTransport,
  startRuleSubscriber,
  syncRules,
} from './infrastructure/index.js';
import {
  corePlugin,
  ruleRoutes,
  alertRoutes,
  metricsRoutes,
} from './interfaces/http/index.js';

/** Forced exit if graceful shutdown hangs. */
const SHUTDOWN_TIMEOUT_MS = 10_000;

/**
 * Single-process entry point: HTTP API and stream workers share the
 * rule engine, so rule changes made through the API apply immediately.
 *
 * Order:
 * 1) Infrastructure plugins (Redis, Postgres + schema)
 * 2) Core wiring: queue, notifications, windows, rules, alerts
 * 3) Load rules, start rule subscriber, heartbeat and workers
 * 4) HTTP routes, listen()
 * 5) SIGINT / SIGTERM → graceful shutdown
 */
async function main(config: AppConfig): Promise<void> {
  const log = pino({ level: config.LOG_LEVEL });

  const fastify = Fastify({ loggerInstance: log });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.REDIS_URL });
  await fastify.register(dbPlugin, { url: config.DATABASE_URL });

  // Blocking XREADGROUP holds its connection, so reads get their own.
  const reader = createRedisClient(config.REDIS_URL);
  await reader.connect();

  const metrics = new CoreMetrics();
  const queue = new RedisStreamQueue({
    redis: fastify.redis,
    reader,
    log: log.child({ component: 'queue' }),
    consumer: config.WORKER_ID,
    metrics,
  });
  await queue.init();

  const notifConfig = loadNotificationConfig(config.NOTIFICATIONS_CONFIG);
  log.info(
    {
      slack: notifConfig.slack.enabled,
      email: notifConfig.email.enabled,
      webhook: notifConfig.webhook.enabled,
      escalation: notifConfig.escalation.channels,
    },
    'Notification config loaded',
  );

  // --------------------------------------------------
  // Alerting core
  // --------------------------------------------------

  const core = createStreamCore({
    log,
    queue,
    metrics,
    transport: createNotificationTransport(notifConfig, log.child({ component: 'notifications' })),
    backpressure: new RedisBackpressureSignal(fastify.redis, log, config.WORKER_ID),
    aggregation: {
      maxSamples: config.MAX_SAMPLES,
      maxSeenIds: config.MAX_SEEN_IDS,
    },
    windows: {
      graceMs: config.WINDOW_GRACE_SECONDS * 1000,
      retentionMs: config.WINDOW_RETENTION_SECONDS * 1000,
      activityRetentionMs: config.ACTIVITY_RETENTION_SECONDS * 1000,
    },
    delivery: {
      maxAttempts: config.DELIVERY_MAX_ATTEMPTS,
      baseDelayMs: config.DELIVERY_BASE_DELAY_MS,
      historyLimit: config.ALERT_HISTORY_LIMIT,
      defaultEscalationChannels: notifConfig.escalation.channels,
    },
    tuning: {
      workers: config.WORKER_CONCURRENCY,
      batchSize: config.QUEUE_BATCH_SIZE,
      receiveTimeoutMs: config.QUEUE_BLOCK_MS,
      highWaterMark: config.QUEUE_HIGH_WATER,
      lowWaterMark: config.QUEUE_LOW_WATER,
      sweepIntervalMs: config.SWEEP_INTERVAL_MS,
      evaluationTickMs: config.EVALUATION_TICK_MS,
      alertSweepMs: config.ALERT_SWEEP_MS,
    },
  });

  const recorder = createAlertRecorder(fastify.db, log.child({ component: 'alert-store' }));
  core.alerts.onChange((change) => {
    recorder.record(change);
    void publishAlertChange(fastify.redis, log, change);
  });

  // Rules live in Postgres; nothing is evaluated until they are created via the API.
  await syncRules(fastify.db, log, core.engine);

  const stopSubscriber = await startRuleSubscriber(
    config.REDIS_URL,
    fastify.db,
    log.child({ component: 'rule-subscriber' }),
    core.engine,
    config.WORKER_ID,
  );

  const stopHeartbeat = startHeartbeat(
    fastify.redis,
    log,
    config.WORKER_ID,
    config.HEARTBEAT_MS,
    async () => ({
      queue_depth: await queue.depth(),
      windows_open: core.metrics.get('windows_open'),
      open_alerts: core.alerts.openCount,
    }),
  );

  core.coordinator.start();

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(corePlugin, { core, instanceId: config.WORKER_ID });
  await fastify.register(ruleRoutes);
  await fastify.register(alertRoutes);
  await fastify.register(metricsRoutes);

  await fastify.listen({
    host: config.HOST,
    port: config.PORT,
  });

  // --------------------------------------------------
  // Graceful shutdown
  // --------------------------------------------------

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down...');

    setTimeout(() => {
      log.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    stopHeartbeat();
    await stopSubscriber();
    await core.coordinator.stop();
    await recorder.drain();
    await reader.quit();
    await fastify.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      void shutdown(signal).catch((err: unknown) => {
        log.fatal({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

let config: AppConfig;
try {
  config = loadConfig();
} catch (err: unknown) {
  const detail = err instanceof ZodError ? err.flatten().fieldErrors : err;
  console.error('Fatal: invalid configuration', detail);
  process.exit(1);
}

main(config).catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
