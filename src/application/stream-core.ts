import type { Logger } from 'pino';
import type { NotificationChannel } from '../domain/rule.js';
import { Aggregator } from './aggregator.js';
import type { AggregatorOptions } from './aggregator.js';
import { AlertManager } from './alert-manager.js';
import type { NotificationTransport } from './alert-manager.js';
import { CoreMetrics } from './metrics.js';
import { RuleEngine } from './rule-engine.js';
import { StreamCoordinator } from './stream-coordinator.js';
import type { BackpressureSignal, CoordinatorTuning, EventQueue } from './stream-coordinator.js';
import { WindowManager } from './window-manager.js';

export interface StreamCoreOptions {
  log: Logger;
  queue: EventQueue;
  transport: NotificationTransport;
  backpressure?: BackpressureSignal | undefined;
  /** Shared with components built outside the core, such as the queue. */
  metrics?: CoreMetrics | undefined;
  nowFn?: (() => number) | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  aggregation?: AggregatorOptions;
  windows?: {
    graceMs?: number;
    retentionMs?: number;
    activityRetentionMs?: number;
  };
  delivery?: {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    historyLimit?: number;
    defaultEscalationChannels?: readonly NotificationChannel[];
  };
  tuning?: Partial<CoordinatorTuning>;
}

/** Every core component, wired together and sharing one metrics registry. */
export interface StreamCore {
  readonly metrics: CoreMetrics;
  readonly windows: WindowManager;
  readonly engine: RuleEngine;
  readonly alerts: AlertManager;
  readonly coordinator: StreamCoordinator;
}

export function createStreamCore(options: StreamCoreOptions): StreamCore {
  const { log } = options;
  const nowFn = options.nowFn ?? Date.now;
  const metrics = options.metrics ?? new CoreMetrics(nowFn);

  const windows = new WindowManager({
    log: log.child({ component: 'windows' }),
    aggregator: new Aggregator(options.aggregation),
    nowFn,
    metrics,
    ...options.windows,
  });

  const engine = new RuleEngine(windows, {
    log: log.child({ component: 'rules' }),
    nowFn,
    metrics,
  });

  const alerts = new AlertManager({
    transport: options.transport,
    log: log.child({ component: 'alerts' }),
    nowFn,
    metrics,
    ...(options.sleep !== undefined ? { sleep: options.sleep } : {}),
    ...options.delivery,
  });

  const coordinator = new StreamCoordinator(
    {
      queue: options.queue,
      windows,
      engine,
      alerts,
      log: log.child({ component: 'coordinator' }),
      metrics,
      backpressure: options.backpressure,
      sleep: options.sleep,
    },
    options.tuning,
  );

  return { metrics, windows, engine, alerts, coordinator };
}
