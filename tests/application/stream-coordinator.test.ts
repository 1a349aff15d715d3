import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { createStreamCore } from '../../src/application/stream-core.js';
import type { StreamCore } from '../../src/application/stream-core.js';
import { StreamCoordinator } from '../../src/application/stream-coordinator.js';
import type { BackpressureSignal, EventQueue } from '../../src/application/stream-coordinator.js';
import type { RuleMatch } from '../../src/domain/rule.js';
import type { NotificationTransport } from '../../src/application/alert-manager.js';
import { InMemoryEventQueue } from '../../src/infrastructure/queue/in-memory-queue.js';
import { FIXED_NOW, fakeClock, fakeLogger, makeEvent, makeRule } from '../helpers.js';

/** Pipeline tuning that keeps the periodic timers out of the way. */
const QUIET_TUNING = {
  workers: 1,
  receiveTimeoutMs: 10,
  sweepIntervalMs: 60_000,
  evaluationTickMs: 60_000,
  alertSweepMs: 60_000,
  backpressureCheckMs: 60_000,
};

describe('StreamCoordinator', () => {
  let clock: ReturnType<typeof fakeClock>;
  let queue: InMemoryEventQueue;
  let send: Mock<NotificationTransport['send']>;
  let core: StreamCore;

  beforeEach(() => {
    clock = fakeClock();
    queue = new InMemoryEventQueue();
    send = vi.fn<NotificationTransport['send']>().mockResolvedValue(undefined);
    core = createStreamCore({
      log: fakeLogger(),
      queue,
      transport: { send },
      nowFn: clock.now,
      sleep: vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined),
      tuning: QUIET_TUNING,
    });
  });

  afterEach(async () => {
    await core.coordinator.stop();
    queue.close();
  });

  // ── Event path ──────────────────────────────────────────

  it('fires one alert for a burst of 100 events in one window', async () => {
    core.engine.register(makeRule({ condition: 'count >= 50' }));

    const matches: RuleMatch[] = [];
    for (let i = 0; i < 100; i++) {
      matches.push(...core.coordinator.processEvent(makeEvent({
        timestamp: new Date(FIXED_NOW + i * 100).toISOString(),
      })));
    }
    await core.alerts.flush();

    expect(matches).toHaveLength(1);
    expect(matches[0]?.snapshot.count).toBe(50);
    expect(core.alerts.list()).toHaveLength(1);
    expect(core.alerts.list()[0]?.fire_count).toBe(1);
    expect(send).toHaveBeenCalledTimes(1);
    expect(core.metrics.get('events_folded')).toBe(100);
    expect(core.metrics.get('rule_matches')).toBe(1);
  });

  it('returns no matches for an event no rule wants', () => {
    core.engine.register(makeRule({
      window_spec: { kind: 'tumbling', size_seconds: 60, filters: { event_type: 'auth.failure' } },
    }));

    expect(core.coordinator.processEvent(makeEvent())).toEqual([]);
    expect(core.metrics.get('events_folded')).toBe(0);
  });

  it('evaluates on_close rules when the sweep closes their window', () => {
    core.engine.register(makeRule({ trigger: 'on_close', condition: 'count >= 3' }));
    for (let i = 0; i < 3; i++) core.coordinator.processEvent(makeEvent());

    expect(core.coordinator.sweepWindows()).toEqual([]);

    clock.set(FIXED_NOW + 60_000);
    const matches = core.coordinator.sweepWindows();

    expect(matches).toHaveLength(1);
    expect(matches[0]?.window_id).toBe(`rule-1:api.request:${FIXED_NOW}`);
    expect(core.alerts.openCount).toBe(1);
  });

  // ── Workers ─────────────────────────────────────────────

  it('drains the queue through its workers and acks every event', async () => {
    core.engine.register(makeRule({ condition: 'count >= 50' }));
    for (let i = 0; i < 100; i++) queue.push(makeEvent());

    core.coordinator.start();
    expect(core.coordinator.running).toBe(true);

    await vi.waitFor(async () => {
      expect(await queue.depth()).toBe(0);
    });
    await core.coordinator.stop();

    expect(core.coordinator.running).toBe(false);
    expect(core.alerts.list()).toHaveLength(1);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('leaves an event unacked when processing it throws', async () => {
    vi.spyOn(core.coordinator, 'processEvent').mockImplementation(() => {
      throw new Error('boom');
    });
    queue.push(makeEvent());

    core.coordinator.start();
    await vi.waitFor(() => {
      expect(queue.unackedCount).toBe(1);
    });
    await core.coordinator.stop();

    expect(await queue.depth()).toBe(1);
    expect(queue.requeueUnacked()).toBe(1);
  });

  it('stops when the external signal aborts', async () => {
    const controller = new AbortController();
    core.coordinator.start(controller.signal);
    controller.abort();

    expect(core.coordinator.running).toBe(false);
  });

  it('clears its timers when the external signal aborts', async () => {
    vi.useFakeTimers();
    try {
      const sweep = vi.spyOn(core.coordinator, 'sweepWindows');
      const controller = new AbortController();
      core.coordinator.start(controller.signal);
      await vi.advanceTimersByTimeAsync(60_000);
      expect(sweep).toHaveBeenCalledTimes(1);

      controller.abort();
      queue.close();
      await vi.advanceTimersByTimeAsync(180_000);

      expect(sweep).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('StreamCoordinator backpressure', () => {
  function coordinatorWithDepths(depths: number[]) {
    const depth = vi.fn<EventQueue['depth']>();
    for (const value of depths) depth.mockResolvedValueOnce(value);
    const queue: EventQueue = {
      receive: vi.fn<EventQueue['receive']>().mockResolvedValue([]),
      ack: vi.fn<EventQueue['ack']>().mockResolvedValue(undefined),
      depth,
    };
    const signal = vi.fn<BackpressureSignal['signal']>().mockResolvedValue(undefined);
    const core = createStreamCore({ log: fakeLogger(), queue, transport: { send: vi.fn() } });
    const coordinator = new StreamCoordinator(
      {
        queue,
        windows: core.windows,
        engine: core.engine,
        alerts: core.alerts,
        log: fakeLogger(),
        metrics: core.metrics,
        backpressure: { signal },
      },
      { highWaterMark: 10_000, lowWaterMark: 1_000 },
    );
    return { coordinator, signal, metrics: core.metrics };
  }

  it('signals shed once at the high-water mark and resume once at the low-water mark', async () => {
    const { coordinator, signal, metrics } = coordinatorWithDepths([10_000, 12_000, 5_000, 1_000, 500]);

    for (let i = 0; i < 5; i++) await coordinator.checkBackpressure();

    expect(signal.mock.calls).toEqual([['shed', 10_000], ['resume', 1_000]]);
    expect(coordinator.isShedding).toBe(false);
    expect(metrics.get('backpressure_signals')).toBe(2);
  });

  it('does not signal while the depth stays below the high-water mark', async () => {
    const { coordinator, signal } = coordinatorWithDepths([9_999, 500]);

    await coordinator.checkBackpressure();
    await coordinator.checkBackpressure();

    expect(signal).not.toHaveBeenCalled();
  });

  it('rejects a low-water mark above the high-water mark', () => {
    const core = createStreamCore({ log: fakeLogger(), queue: new InMemoryEventQueue(), transport: { send: vi.fn() } });
    expect(() => new StreamCoordinator(
      { queue: new InMemoryEventQueue(), windows: core.windows, engine: core.engine, alerts: core.alerts, log: fakeLogger() },
      { highWaterMark: 10, lowWaterMark: 20 },
    )).toThrow('lowWaterMark must not exceed highWaterMark');
  });
});
