import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Redis } from 'ioredis';
import {
  RedisBackpressureSignal,
  startHeartbeat,
  BACKPRESSURE_CHANNEL,
  BACKPRESSURE_KEY,
} from '../../src/infrastructure/redis/backpressure.js';
import { publishAlertChange, ALERT_CHANNEL } from '../../src/infrastructure/redis/alert-notifier.js';
import { publishRuleChange, RULES_CHANGED_CHANNEL } from '../../src/infrastructure/redis/rule-notifier.js';
import type { AlertChange } from '../../src/domain/alert.js';
import { FIXED_NOW, fakeLogger, makeAlert } from '../helpers.js';

function fakeRedis() {
  const redis = {
    set: vi.fn().mockResolvedValue('OK'),
    del: vi.fn().mockResolvedValue(1),
    publish: vi.fn().mockResolvedValue(1),
  };
  return { redis, client: redis as unknown as Redis };
}

const ISO_NOW = new Date(FIXED_NOW).toISOString();

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(FIXED_NOW);
});

afterEach(() => {
  vi.useRealTimers();
});

// ── Backpressure ───────────────────────────────────────────

describe('RedisBackpressureSignal', () => {
  it('stores and publishes the shed state', async () => {
    const { redis, client } = fakeRedis();
    const payload = JSON.stringify({ state: 'shed', depth: 12000, worker_id: 'worker-1', ts: ISO_NOW });

    await new RedisBackpressureSignal(client, fakeLogger(), 'worker-1').signal('shed', 12000);

    expect(redis.set).toHaveBeenCalledWith(BACKPRESSURE_KEY, payload);
    expect(redis.publish).toHaveBeenCalledWith(BACKPRESSURE_CHANNEL, payload);
  });

  it('clears the stored state on resume', async () => {
    const { redis, client } = fakeRedis();

    await new RedisBackpressureSignal(client, fakeLogger(), 'worker-1').signal('resume', 800);

    expect(redis.del).toHaveBeenCalledWith(BACKPRESSURE_KEY);
    expect(redis.set).not.toHaveBeenCalled();
    expect(redis.publish).toHaveBeenCalledTimes(1);
  });

  it('logs instead of throwing when Redis fails', async () => {
    const { redis, client } = fakeRedis();
    const log = fakeLogger();
    const err = new Error('READONLY');
    redis.set.mockRejectedValue(err);

    await new RedisBackpressureSignal(client, log, 'worker-1').signal('shed', 12000);

    expect(log.error).toHaveBeenCalledWith(
      { err, state: 'shed', depth: 12000 },
      'Failed to publish backpressure signal',
    );
  });
});

// ── Heartbeat ──────────────────────────────────────────────

describe('startHeartbeat', () => {
  const status = async () => ({ queue_depth: 4, windows_open: 2, open_alerts: 1 });

  it('writes the worker status with a TTL of three intervals', async () => {
    const { redis, client } = fakeRedis();

    const stop = startHeartbeat(client, fakeLogger(), 'worker-1', 10_000, status);
    await vi.advanceTimersByTimeAsync(0);
    stop();

    expect(redis.set).toHaveBeenCalledTimes(1);
    const [key, body, mode, ttl] = redis.set.mock.calls[0] ?? [];
    expect(key).toBe('worker:health:worker-1');
    expect(JSON.parse(String(body))).toEqual({
      worker_id: 'worker-1',
      ts: ISO_NOW,
      queue_depth: 4,
      windows_open: 2,
      open_alerts: 1,
    });
    expect([mode, ttl]).toEqual(['EX', 30]);
  });

  it('beats on every interval until stopped', async () => {
    const { redis, client } = fakeRedis();

    const stop = startHeartbeat(client, fakeLogger(), 'worker-1', 1_000, status);
    await vi.advanceTimersByTimeAsync(2_500);
    stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(redis.set).toHaveBeenCalledTimes(3);
  });

  it('logs a failed beat and keeps going', async () => {
    const { redis, client } = fakeRedis();
    const log = fakeLogger();
    const err = new Error('connection lost');
    redis.set.mockRejectedValueOnce(err);

    const stop = startHeartbeat(client, log, 'worker-1', 1_000, status);
    await vi.advanceTimersByTimeAsync(1_000);
    stop();

    expect(log.warn).toHaveBeenCalledWith({ err, key: 'worker:health:worker-1' }, 'Heartbeat update failed');
    expect(redis.set).toHaveBeenCalledTimes(2);
  });
});

// ── Pub/Sub notifications ──────────────────────────────────

describe('publishAlertChange', () => {
  const change: AlertChange = {
    action: 'acknowledged',
    alert: makeAlert({ status: 'acknowledged', acknowledged: true, acknowledged_by: 'alice' }),
    actor: 'alice',
    at: ISO_NOW,
    details: {},
  };

  it('publishes a compact payload', async () => {
    const { redis, client } = fakeRedis();

    await publishAlertChange(client, fakeLogger(), change);

    expect(redis.publish).toHaveBeenCalledWith(ALERT_CHANNEL, JSON.stringify({
      action: 'acknowledged',
      alert_id: 'alert-1',
      rule_id: 'rule-1',
      rule_name: 'Request burst',
      severity: 'high',
      status: 'acknowledged',
      fire_count: 1,
      actor: 'alice',
      at: ISO_NOW,
    }));
  });

  it('swallows publish failures with a warning', async () => {
    const { redis, client } = fakeRedis();
    const log = fakeLogger();
    redis.publish.mockRejectedValue(new Error('down'));

    await expect(publishAlertChange(client, log, change)).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledTimes(1);
  });
});

describe('publishRuleChange', () => {
  it('publishes the change with its origin', async () => {
    const { redis, client } = fakeRedis();

    await publishRuleChange(client, fakeLogger(), 'worker-1', 'create', 'rule-1');

    expect(redis.publish).toHaveBeenCalledWith(RULES_CHANGED_CHANNEL, JSON.stringify({
      ts: ISO_NOW,
      reason: 'create',
      rule_id: 'rule-1',
      origin: 'worker-1',
    }));
  });

  it('logs publish failures without throwing', async () => {
    const { redis, client } = fakeRedis();
    const log = fakeLogger();
    const err = new Error('down');
    redis.publish.mockRejectedValue(err);

    await publishRuleChange(client, log, 'worker-1', 'delete', 'rule-1');

    expect(log.error).toHaveBeenCalledWith(
      { err, reason: 'delete', rule_id: 'rule-1' },
      'Failed to publish rule change notification',
    );
  });
});
