import type { Logger } from 'pino';
import type { Event } from '../domain/event.js';
import type { RuleMatch } from '../domain/rule.js';
import type { AlertManager } from './alert-manager.js';
import type { CoreMetrics } from './metrics.js';
import type { RuleEngine } from './rule-engine.js';
import type { WindowManager } from './window-manager.js';

/** An event read off the inbound queue, with the handle used to ack it. */
export interface QueuedEvent {
  readonly receipt: string;
  readonly event: Event;
}

/**
 * Inbound event queue. At-least-once: anything not acked is delivered
 * again, so consumers must tolerate repeated event ids.
 */
export interface EventQueue {
  /** Waits at most `timeoutMs` and returns up to `max` events (possibly none). */
  receive(max: number, timeoutMs: number): Promise<QueuedEvent[]>;
  ack(receipt: string): Promise<void>;
  /** Events waiting to be received or acked. */
  depth(): Promise<number>;
}

export type BackpressureState = 'shed' | 'resume';

/** Tells the intake layer to shed load, or that it may resume. */
export interface BackpressureSignal {
  signal(state: BackpressureState, depth: number): Promise<void>;
}

export interface CoordinatorTuning {
  workers: number;
  batchSize: number;
  receiveTimeoutMs: number;
  sweepIntervalMs: number;
  evaluationTickMs: number;
  alertSweepMs: number;
  backpressureCheckMs: number;
  highWaterMark: number;
  lowWaterMark: number;
  /** Pause after a failed queue read. */
  errorBackoffMs: number;
}

export const DEFAULT_TUNING: CoordinatorTuning = {
  workers: 4,
  batchSize: 100,
  receiveTimeoutMs: 1_000,
  sweepIntervalMs: 1_000,
  evaluationTickMs: 5_000,
  alertSweepMs: 5_000,
  backpressureCheckMs: 1_000,
  highWaterMark: 10_000,
  lowWaterMark: 1_000,
  errorBackoffMs: 1_000,
};

export interface StreamCoordinatorDeps {
  queue: EventQueue;
  windows: WindowManager;
  engine: RuleEngine;
  alerts: AlertManager;
  log: Logger;
  metrics?: CoreMetrics | undefined;
  backpressure?: BackpressureSignal | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Drives the pipeline: queue → windows → rules → alerts.
 *
 * A bounded pool of worker loops reads from the queue. Window sweeps,
 * tick evaluation, alert sweeps and backpressure checks each run on their
 * own interval so a quiet queue never starves them.
 *
 * Processing failures are isolated per event: the event is left
 * unacknowledged for redelivery and the worker moves on.
 */
export class StreamCoordinator {
  private readonly queue: EventQueue;
  private readonly windows: WindowManager;
  private readonly engine: RuleEngine;
  private readonly alerts: AlertManager;
  private readonly log: Logger;
  private readonly metrics: CoreMetrics | undefined;
  private readonly backpressure: BackpressureSignal | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly tuning: CoordinatorTuning;

  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];
  private timers: NodeJS.Timeout[] = [];
  private shedding = false;
  private checkingBackpressure = false;

  constructor(deps: StreamCoordinatorDeps, tuning: Partial<CoordinatorTuning> = {}) {
    this.queue = deps.queue;
    this.windows = deps.windows;
    this.engine = deps.engine;
    this.alerts = deps.alerts;
    this.log = deps.log;
    this.metrics = deps.metrics;
    this.backpressure = deps.backpressure;
    this.sleep = deps.sleep ?? defaultSleep;
    this.tuning = { ...DEFAULT_TUNING, ...tuning };

    if (this.tuning.lowWaterMark > this.tuning.highWaterMark) {
      throw new Error('lowWaterMark must not exceed highWaterMark');
    }
  }

  get running(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  /** True while the intake layer has been told to shed load. */
  get isShedding(): boolean {
    return this.shedding;
  }

  // ─── Lifecycle ────────────────────────────────────────────────

  /** Starts workers and timers. `signal` aborting has the same effect as `stop()`. */
  start(signal?: AbortSignal): void {
    if (this.running) return;

    const controller = new AbortController();
    this.controller = controller;
    signal?.addEventListener('abort', () => controller.abort(), { once: true });
    controller.signal.addEventListener('abort', () => this.clearTimers(), { once: true });

    for (let i = 0; i < this.tuning.workers; i++) {
      this.loops.push(this.runWorker(i, controller.signal));
    }

    this.timers.push(
      setInterval(() => this.sweepWindows(), this.tuning.sweepIntervalMs),
      setInterval(() => this.tick(), this.tuning.evaluationTickMs),
      setInterval(() => this.sweepAlerts(), this.tuning.alertSweepMs),
      setInterval(() => {
        void this.checkBackpressure().catch((err: unknown) => {
          this.log.warn({ err }, 'Backpressure check failed');
        });
      }, this.tuning.backpressureCheckMs),
    );

    this.log.info({ workers: this.tuning.workers, batch_size: this.tuning.batchSize }, 'Stream coordinator started');
  }

  /** Stops workers and timers, waits for loops to exit and flushes deliveries. */
  async stop(): Promise<void> {
    this.controller?.abort();
    this.clearTimers();

    await Promise.allSettled(this.loops);
    this.loops = [];
    await this.alerts.flush();
    this.log.info('Stream coordinator stopped');
  }

  private clearTimers(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
  }

  private async runWorker(workerId: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let batch: QueuedEvent[];
      try {
        batch = await this.queue.receive(this.tuning.batchSize, this.tuning.receiveTimeoutMs);
      } catch (err: unknown) {
        if (signal.aborted) break;
        this.log.error({ err, worker: workerId }, 'Queue read failed, retrying');
        await this.sleep(this.tuning.errorBackoffMs);
        continue;
      }

      for (const item of batch) {
        try {
          this.processEvent(item.event);
        } catch (err: unknown) {
          // Not acked: the queue redelivers it.
          this.log.error({ err, worker: workerId, event_id: item.event.event_id }, 'Event processing failed');
          continue;
        }

        try {
          await this.queue.ack(item.receipt);
        } catch (err: unknown) {
          this.log.error({ err, worker: workerId, receipt: item.receipt }, 'Failed to ack event');
        }
      }
    }
  }

  // ─── Pipeline steps ───────────────────────────────────────────

  /** Folds one event and hands any resulting matches to the alert manager. */
  processEvent(event: Event): RuleMatch[] {
    const outcome = this.windows.fold(event);
    if (outcome.folded.length === 0) {
      this.log.debug({ event_id: event.event_id, duplicates: outcome.duplicates, late: outcome.late }, 'Event not folded');
      return [];
    }
    const matches = this.engine.evaluateDueWindows();
    this.dispatch(matches);
    return matches;
  }

  /** Advances window lifecycles and evaluates windows that started closing. */
  sweepWindows(): RuleMatch[] {
    try {
      const result = this.windows.sweep();
      this.engine.forgetWindows(result.evicted);
      const matches = this.engine.evaluateDueWindows();
      this.dispatch(matches);
      return matches;
    } catch (err: unknown) {
      this.log.error({ err }, 'Window sweep failed');
      return [];
    }
  }

  tick(): RuleMatch[] {
    try {
      const matches = this.engine.evaluateTick();
      this.dispatch(matches);
      return matches;
    } catch (err: unknown) {
      this.log.error({ err }, 'Tick evaluation failed');
      return [];
    }
  }

  sweepAlerts(): void {
    try {
      this.alerts.sweep();
    } catch (err: unknown) {
      this.log.error({ err }, 'Alert sweep failed');
    }
  }

  /** Signals `shed` once at the high-water mark and `resume` once at the low-water mark. */
  async checkBackpressure(): Promise<void> {
    if (this.checkingBackpressure) return;
    this.checkingBackpressure = true;
    try {
      const depth = await this.queue.depth();
      let next: 'shed' | 'resume' | null = null;
      if (!this.shedding && depth >= this.tuning.highWaterMark) next = 'shed';
      else if (this.shedding && depth <= this.tuning.lowWaterMark) next = 'resume';
      if (next === null) return;

      this.shedding = next === 'shed';
      this.metrics?.increment('backpressure_signals');
      this.log.warn({ depth, state: next }, 'Backpressure state changed');
      await this.backpressure?.signal(next, depth);
    } finally {
      this.checkingBackpressure = false;
    }
  }

  private dispatch(matches: readonly RuleMatch[]): void {
    for (const match of matches) {
      const rule = this.engine.get(match.rule_id);
      if (rule === null) continue;
      try {
        this.alerts.handleMatch(match, rule);
      } catch (err: unknown) {
        this.log.error({ err, rule_id: match.rule_id, window_id: match.window_id }, 'Alert handling failed');
      }
    }
  }
}
