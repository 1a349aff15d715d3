import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { AlertManager } from '../../src/application/alert-manager.js';
import type { NotificationTransport } from '../../src/application/alert-manager.js';
import { CoreMetrics } from '../../src/application/metrics.js';
import { DeliveryError } from '../../src/domain/errors.js';
import { emptyAggregation } from '../../src/domain/window.js';
import type { RuleMatch } from '../../src/domain/rule.js';
import type { AlertChange } from '../../src/domain/alert.js';
import { FIXED_NOW, fakeClock, fakeLogger, makeRule } from '../helpers.js';

function makeMatch(overrides: Partial<RuleMatch> = {}): RuleMatch {
  return {
    rule_id: 'rule-1',
    window_id: `rule-1:api.request:${FIXED_NOW}`,
    partition: 'api.request',
    snapshot: emptyAggregation(`rule-1:api.request:${FIXED_NOW}`),
    context: { count: 11 },
    matched_at: FIXED_NOW,
    ...overrides,
  };
}

describe('AlertManager', () => {
  let clock: ReturnType<typeof fakeClock>;
  let metrics: CoreMetrics;
  let send: Mock<NotificationTransport['send']>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let changes: AlertChange[];
  let alerts: AlertManager;

  beforeEach(() => {
    clock = fakeClock();
    metrics = new CoreMetrics(clock.now);
    send = vi.fn<NotificationTransport['send']>().mockResolvedValue(undefined);
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    changes = [];
    alerts = new AlertManager({
      transport: { send },
      log: fakeLogger(),
      nowFn: clock.now,
      sleep,
      metrics,
    });
    alerts.onChange((change) => changes.push(change));
  });

  // ── Firing and suppression ──────────────────────────────

  it('fires a new alert and notifies every channel', async () => {
    const rule = makeRule({ channels: ['slack', 'webhook'] });
    const result = alerts.handleMatch(makeMatch(), rule);
    await alerts.flush();

    expect(result.action).toBe('fired');
    expect(result.alert).toMatchObject({
      rule_id: 'rule-1',
      rule_name: 'Request burst',
      severity: 'high',
      status: 'active',
      fire_count: 1,
      notified_count: 2,
      context: { count: 11, window_id: `rule-1:api.request:${FIXED_NOW}`, partition: 'api.request' },
    });
    expect(send).toHaveBeenCalledTimes(2);
    expect(send).toHaveBeenCalledWith(expect.objectContaining({ rule_id: 'rule-1' }), 'slack', 'fire');
    expect(changes.map((c) => c.action)).toEqual(['fired']);
    expect(metrics.get('alerts_fired')).toBe(1);
  });

  it('suppresses repeat notifications inside the suppression window', async () => {
    const rule = makeRule({ suppression_seconds: 300 });
    alerts.handleMatch(makeMatch(), rule);
    clock.advance(60_000);
    const second = alerts.handleMatch(makeMatch(), rule);
    await alerts.flush();

    expect(second.action).toBe('suppressed');
    expect(second.alert?.fire_count).toBe(2);
    expect(send).toHaveBeenCalledTimes(1);
    expect(metrics.get('alerts_suppressed')).toBe(1);
    expect(alerts.openCount).toBe(1);
  });

  it('re-fires the same alert once the suppression window has passed', async () => {
    const rule = makeRule({ suppression_seconds: 300 });
    const first = alerts.handleMatch(makeMatch(), rule);
    clock.advance(300_000);
    const second = alerts.handleMatch(makeMatch(), rule);
    await alerts.flush();

    expect(second.action).toBe('refired');
    expect(second.alert?.id).toBe(first.alert?.id);
    expect(second.alert?.last_fired_at).toBe(new Date(FIXED_NOW + 300_000).toISOString());
    expect(send).toHaveBeenCalledTimes(2);
  });

  it('keeps suppressing after a resolve and creates nothing', () => {
    const rule = makeRule({ suppression_seconds: 300 });
    const first = alerts.handleMatch(makeMatch(), rule);
    alerts.resolve(first.alert?.id ?? '', 'oncall');

    clock.advance(10_000);
    const result = alerts.handleMatch(makeMatch(), rule);

    expect(result).toEqual({ action: 'suppressed', alert: null });
    expect(alerts.openCount).toBe(0);
  });

  it('opens a new alert after a resolve once suppression has passed', () => {
    const rule = makeRule({ suppression_seconds: 300 });
    const first = alerts.handleMatch(makeMatch(), rule);
    alerts.resolve(first.alert?.id ?? '', 'oncall');

    clock.advance(300_000);
    const result = alerts.handleMatch(makeMatch(), rule);

    expect(result.action).toBe('fired');
    expect(result.alert?.id).not.toBe(first.alert?.id);
  });

  // ── Operator actions ────────────────────────────────────

  it('acknowledges and resolves with an actor', () => {
    const { alert } = alerts.handleMatch(makeMatch(), makeRule());
    const id = alert?.id ?? '';

    expect(alerts.acknowledge(id, 'alice')).toMatchObject({
      status: 'acknowledged',
      acknowledged: true,
      acknowledged_by: 'alice',
    });
    expect(alerts.resolve(id, 'bob')).toMatchObject({ status: 'resolved', resolved_by: 'bob' });
    expect(alerts.get(id)?.status).toBe('resolved');
    expect(alerts.acknowledge(id, 'alice')).toBeNull();
    expect(changes.map((c) => [c.action, c.actor])).toEqual([
      ['fired', null],
      ['acknowledged', 'alice'],
      ['resolved', 'bob'],
    ]);
  });

  it('returns null for unknown alerts', () => {
    expect(alerts.acknowledge('missing', 'alice')).toBeNull();
    expect(alerts.resolve('missing', 'alice')).toBeNull();
    expect(alerts.get('missing')).toBeNull();
  });

  it('lists open and resolved alerts, newest first, with filters', () => {
    const a = alerts.handleMatch(makeMatch(), makeRule({ id: 'a' }));
    clock.advance(1_000);
    alerts.handleMatch(makeMatch({ rule_id: 'b' }), makeRule({ id: 'b' }));
    alerts.resolve(a.alert?.id ?? '', 'oncall');

    expect(alerts.list().map((x) => x.rule_id)).toEqual(['b', 'a']);
    expect(alerts.list({ status: 'resolved' }).map((x) => x.rule_id)).toEqual(['a']);
    expect(alerts.list({ rule_id: 'b' })).toHaveLength(1);
  });

  it('counts alerts by status and severity, and those created in the last day', () => {
    const a = alerts.handleMatch(makeMatch(), makeRule({ id: 'a' }));
    clock.advance(25 * 3_600_000);
    alerts.handleMatch(makeMatch({ rule_id: 'b' }), makeRule({ id: 'b', severity: 'critical' }));
    alerts.resolve(a.alert?.id ?? '', 'oncall');

    expect(alerts.stats()).toEqual({
      total: 2,
      by_status: { active: 1, acknowledged: 0, resolved: 1 },
      by_severity: { low: 0, medium: 0, high: 1, critical: 1 },
      recent_24h: 1,
    });
  });

  // ── Sweep ───────────────────────────────────────────────

  it('escalates an unacknowledged alert exactly once', async () => {
    const rule = makeRule({ escalation_seconds: 600, escalation_channels: ['webhook'] });
    const { alert } = alerts.handleMatch(makeMatch(), rule);

    clock.advance(599_000);
    expect(alerts.sweep().escalated).toEqual([]);

    clock.advance(1_000);
    expect(alerts.sweep().escalated).toEqual([alert?.id]);
    clock.advance(600_000);
    expect(alerts.sweep().escalated).toEqual([]);
    await alerts.flush();

    expect(send).toHaveBeenCalledWith(expect.objectContaining({ escalated: true }), 'webhook', 'escalation');
    expect(send).toHaveBeenCalledTimes(2);
    expect(metrics.get('alerts_escalated')).toBe(1);
  });

  it('does not escalate an acknowledged alert', () => {
    const rule = makeRule({ escalation_seconds: 60, escalation_channels: ['webhook'] });
    const { alert } = alerts.handleMatch(makeMatch(), rule);
    alerts.acknowledge(alert?.id ?? '', 'alice');

    clock.advance(120_000);
    expect(alerts.sweep().escalated).toEqual([]);
  });

  it('falls back to the default escalation channels', async () => {
    const withDefaults = new AlertManager({
      transport: { send },
      log: fakeLogger(),
      nowFn: clock.now,
      sleep,
      defaultEscalationChannels: ['email'],
    });
    withDefaults.handleMatch(makeMatch(), makeRule({ escalation_seconds: 60 }));
    clock.advance(60_000);
    withDefaults.sweep();
    await withDefaults.flush();

    expect(send).toHaveBeenLastCalledWith(expect.anything(), 'email', 'escalation');
  });

  it('leaves the alert channels out of the default escalation channels', async () => {
    const withDefaults = new AlertManager({
      transport: { send },
      log: fakeLogger(),
      nowFn: clock.now,
      sleep,
      defaultEscalationChannels: ['slack', 'webhook'],
    });
    withDefaults.handleMatch(makeMatch(), makeRule({ channels: ['slack'], escalation_seconds: 60 }));
    clock.advance(60_000);
    withDefaults.sweep();
    await withDefaults.flush();

    expect(send.mock.calls.map(([, channel, kind]) => [channel, kind])).toEqual([
      ['slack', 'fire'],
      ['webhook', 'escalation'],
    ]);
  });

  it('warns instead of re-sending when no escalation channel is left', async () => {
    const log = fakeLogger();
    const withDefaults = new AlertManager({
      transport: { send },
      log,
      nowFn: clock.now,
      sleep,
      defaultEscalationChannels: ['slack'],
    });
    const { alert } = withDefaults.handleMatch(makeMatch(), makeRule({ channels: ['slack'], escalation_seconds: 60 }));
    clock.advance(60_000);
    expect(withDefaults.sweep().escalated).toEqual([alert?.id]);
    await withDefaults.flush();

    expect(send.mock.calls.map(([, channel, kind]) => [channel, kind])).toEqual([['slack', 'fire']]);
    expect(log.warn).toHaveBeenCalledWith(
      { alert_id: alert?.id, rule_id: 'rule-1', channels: ['slack'] },
      'Alert escalated but no escalation channel differs from the alert channels',
    );
  });

  it('auto-resolves an alert that stopped matching', () => {
    const rule = makeRule({ auto_resolve_seconds: 120 });
    const { alert } = alerts.handleMatch(makeMatch(), rule);

    clock.advance(60_000);
    alerts.handleMatch(makeMatch(), rule);
    clock.advance(119_000);
    expect(alerts.sweep().resolved).toEqual([]);

    clock.advance(1_000);
    expect(alerts.sweep().resolved).toEqual([alert?.id]);
    expect(alerts.get(alert?.id ?? '')).toMatchObject({ status: 'resolved', resolved_by: 'auto' });
    expect(metrics.get('alerts_resolved')).toBe(1);
  });

  // ── Delivery ────────────────────────────────────────────

  it('retries with exponential backoff, then marks delivery_failed', async () => {
    send.mockRejectedValue(new DeliveryError('Slack webhook returned 500', 'slack', 500));
    const { alert } = alerts.handleMatch(makeMatch(), makeRule());
    await alerts.flush();

    expect(send).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1_000], [2_000]]);
    expect(alert).toMatchObject({ delivery_failed: true, notified_count: 0, status: 'active' });
    expect(metrics.get('delivery_failures')).toBe(1);

    const failure = changes.find((c) => c.action === 'delivery_failed');
    expect(failure?.details).toEqual({
      channel: 'slack',
      kind: 'fire',
      attempts: 3,
      error: 'Slack webhook returned 500',
    });
  });

  it('stops retrying once a send succeeds', async () => {
    send.mockRejectedValueOnce(new Error('connection reset')).mockResolvedValue(undefined);
    const { alert } = alerts.handleMatch(makeMatch(), makeRule());
    await alerts.flush();

    expect(send).toHaveBeenCalledTimes(2);
    expect(alert).toMatchObject({ delivery_failed: false, notified_count: 1 });
  });

  it('caps the backoff delay', async () => {
    const capped = new AlertManager({
      transport: { send },
      log: fakeLogger(),
      sleep,
      maxAttempts: 4,
      baseDelayMs: 1_000,
      maxDelayMs: 3_000,
    });
    send.mockRejectedValue(new Error('down'));
    capped.handleMatch(makeMatch(), makeRule());
    await capped.flush();

    expect(sleep.mock.calls).toEqual([[1_000], [2_000], [3_000]]);
  });

  it('keeps going when a listener throws', () => {
    alerts.onChange(() => {
      throw new Error('listener broke');
    });
    const result = alerts.handleMatch(makeMatch(), makeRule());
    expect(result.action).toBe('fired');
  });

  it('hands listeners a copy of the alert', () => {
    const { alert } = alerts.handleMatch(makeMatch(), makeRule());
    const fired = changes[0];
    expect(fired?.alert).not.toBe(alert);
    expect(fired?.alert.id).toBe(alert?.id);
  });
});
