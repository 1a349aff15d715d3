import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { Alert, AlertAction, AlertChange, AlertStatus } from '../domain/alert.js';
import type { AlertRule, NotificationChannel, RuleMatch } from '../domain/rule.js';
import type { Severity } from '../domain/event.js';
import type { CoreMetrics } from './metrics.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_HISTORY_LIMIT = 1_000;

const DAY_MS = 86_400_000;

/** Why a notification is being sent. */
export type NotificationKind = 'fire' | 'escalation';

/**
 * Delivers one alert on one channel.
 *
 * Implementations throw (normally DeliveryError) when the remote end
 * rejects the notification; the alert manager retries.
 */
export interface NotificationTransport {
  send(alert: Readonly<Alert>, channel: NotificationChannel, kind: NotificationKind): Promise<void>;
}

export type AlertListener = (change: AlertChange) => void;

export interface AlertManagerOptions {
  transport: NotificationTransport;
  log: Logger;
  nowFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
  metrics?: CoreMetrics;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  historyLimit?: number;
  /** Used when a rule names no escalation channels. */
  defaultEscalationChannels?: readonly NotificationChannel[];
}

export interface AlertFilter {
  status?: AlertStatus | undefined;
  rule_id?: string | undefined;
}

export interface MatchResult {
  readonly action: Extract<AlertAction, 'fired' | 'refired' | 'suppressed'>;
  /** Null when the match was suppressed after the rule's alert was resolved. */
  readonly alert: Readonly<Alert> | null;
}

export interface AlertSweepResult {
  readonly escalated: string[];
  readonly resolved: string[];
}

export interface AlertStats {
  readonly total: number;
  readonly by_status: Record<AlertStatus, number>;
  readonly by_severity: Record<Severity, number>;
  /** Alerts created in the last 24 hours. */
  readonly recent_24h: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Owns every alert and its lifecycle.
 *
 *   (no alert) ──match──▶ active ──ack──▶ acknowledged
 *        ▲                  │                 │
 *        └──────resolve / auto-resolve────────┘
 *
 * Suppression is keyed by rule, not by alert: a match inside
 * `suppression_seconds` of the rule's last notification never notifies,
 * even when the previous alert has already been resolved.
 */
export class AlertManager {
  private readonly transport: NotificationTransport;
  private readonly log: Logger;
  private readonly nowFn: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly metrics: CoreMetrics | undefined;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly historyLimit: number;
  private readonly defaultEscalationChannels: readonly NotificationChannel[];

  /** rule id → open (active or acknowledged) alert */
  private readonly openByRule: Map<string, Alert> = new Map();
  /** alert id → rule as of the latest match */
  private readonly rulesByAlert: Map<string, AlertRule> = new Map();
  /** rule id → epoch ms of the last notification */
  private readonly lastFiredAt: Map<string, number> = new Map();
  private readonly history: Alert[] = [];
  private readonly inFlight: Set<Promise<void>> = new Set();
  private readonly listeners: AlertListener[] = [];

  constructor(options: AlertManagerOptions) {
    this.transport = options.transport;
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.metrics = options.metrics;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.defaultEscalationChannels = options.defaultEscalationChannels ?? [];
  }

  /** Registers a lifecycle listener. Returns an unsubscribe function. */
  onChange(listener: AlertListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  // ─── Matches ──────────────────────────────────────────────────

  handleMatch(match: RuleMatch, rule: AlertRule): MatchResult {
    const now = this.nowFn();
    const at = new Date(now).toISOString();
    const lastFired = this.lastFiredAt.get(rule.id);
    const suppressed =
      lastFired !== undefined && rule.suppression_seconds > 0 && now - lastFired < rule.suppression_seconds * 1000;

    const context = { ...match.context, window_id: match.window_id, partition: match.partition };
    const existing = this.openByRule.get(rule.id);

    if (existing === undefined) {
      if (suppressed) {
        this.metrics?.increment('alerts_suppressed');
        this.log.debug({ rule_id: rule.id, window_id: match.window_id }, 'Match suppressed after resolve');
        return { action: 'suppressed', alert: null };
      }

      const alert: Alert = {
        id: randomUUID(),
        rule_id: rule.id,
        rule_name: rule.name,
        severity: rule.severity,
        status: 'active',
        acknowledged: false,
        acknowledged_by: null,
        created_at: at,
        updated_at: at,
        last_fired_at: at,
        last_matched_at: at,
        fire_count: 1,
        notified_count: 0,
        escalated: false,
        escalated_at: null,
        delivery_failed: false,
        resolved_at: null,
        resolved_by: null,
        context,
      };
      this.openByRule.set(rule.id, alert);
      this.rulesByAlert.set(alert.id, rule);
      this.lastFiredAt.set(rule.id, now);
      this.metrics?.increment('alerts_fired');
      this.log.info({ alert_id: alert.id, rule_id: rule.id, severity: rule.severity }, 'Alert fired');
      this.emit('fired', alert, null, { window_id: match.window_id });
      this.deliver(alert, rule.channels, 'fire');
      return { action: 'fired', alert };
    }

    existing.fire_count++;
    existing.last_matched_at = at;
    existing.updated_at = at;
    existing.context = context;
    this.rulesByAlert.set(existing.id, rule);

    if (suppressed) {
      this.metrics?.increment('alerts_suppressed');
      this.log.debug({ alert_id: existing.id, fire_count: existing.fire_count }, 'Alert suppressed');
      this.emit('suppressed', existing, null, { window_id: match.window_id });
      return { action: 'suppressed', alert: existing };
    }

    existing.last_fired_at = at;
    this.lastFiredAt.set(rule.id, now);
    this.metrics?.increment('alerts_fired');
    this.log.info({ alert_id: existing.id, fire_count: existing.fire_count }, 'Alert re-fired');
    this.emit('refired', existing, null, { window_id: match.window_id });
    this.deliver(existing, rule.channels, 'fire');
    return { action: 'refired', alert: existing };
  }

  // ─── Operator actions ─────────────────────────────────────────

  /** Returns null when no open alert has this id. */
  acknowledge(alertId: string, actor: string): Readonly<Alert> | null {
    const alert = this.findOpen(alertId);
    if (alert === undefined) return null;
    if (alert.acknowledged) return alert;

    alert.acknowledged = true;
    alert.acknowledged_by = actor;
    alert.status = 'acknowledged';
    alert.updated_at = new Date(this.nowFn()).toISOString();
    this.log.info({ alert_id: alertId, actor }, 'Alert acknowledged');
    this.emit('acknowledged', alert, actor, {});
    return alert;
  }

  /** Returns null when no open alert has this id. */
  resolve(alertId: string, actor: string, details: Record<string, unknown> = {}): Readonly<Alert> | null {
    const alert = this.findOpen(alertId);
    if (alert === undefined) return null;

    const at = new Date(this.nowFn()).toISOString();
    alert.status = 'resolved';
    alert.resolved_at = at;
    alert.resolved_by = actor;
    alert.updated_at = at;

    this.openByRule.delete(alert.rule_id);
    this.rulesByAlert.delete(alert.id);
    this.history.push(alert);
    if (this.history.length > this.historyLimit) this.history.splice(0, this.history.length - this.historyLimit);

    this.metrics?.increment('alerts_resolved');
    this.log.info({ alert_id: alertId, actor }, 'Alert resolved');
    this.emit('resolved', alert, actor, details);
    return alert;
  }

  // ─── Sweep ────────────────────────────────────────────────────

  /**
   * Auto-resolves quiet alerts and escalates unacknowledged ones.
   * Each alert escalates at most once.
   */
  sweep(): AlertSweepResult {
    const now = this.nowFn();
    const escalated: string[] = [];
    const resolved: string[] = [];

    for (const alert of [...this.openByRule.values()]) {
      const rule = this.rulesByAlert.get(alert.id);
      if (rule === undefined) continue;

      const quietMs = now - Date.parse(alert.last_matched_at);
      if (rule.auto_resolve_seconds > 0 && quietMs >= rule.auto_resolve_seconds * 1000) {
        this.resolve(alert.id, 'auto', { quiet_seconds: quietMs / 1000 });
        resolved.push(alert.id);
        continue;
      }

      const ageMs = now - Date.parse(alert.created_at);
      if (
        alert.acknowledged
        || alert.escalated
        || rule.escalation_seconds <= 0
        || ageMs < rule.escalation_seconds * 1000
      ) {
        continue;
      }

      const channels = this.escalationChannels(rule);
      const at = new Date(now).toISOString();
      alert.escalated = true;
      alert.escalated_at = at;
      alert.updated_at = at;
      escalated.push(alert.id);

      this.metrics?.increment('alerts_escalated');
      if (channels.length === 0) {
        this.log.warn(
          { alert_id: alert.id, rule_id: rule.id, channels: rule.channels },
          'Alert escalated but no escalation channel differs from the alert channels',
        );
      } else {
        this.log.warn({ alert_id: alert.id, rule_id: rule.id, channels }, 'Alert escalated');
      }
      this.emit('escalated', alert, null, { channels: [...channels] });
      this.deliver(alert, channels, 'escalation');
    }

    return { escalated, resolved };
  }

  /** The rule's escalation channels, else the defaults, minus the channels the alert already went to. */
  private escalationChannels(rule: AlertRule): NotificationChannel[] {
    const candidates = rule.escalation_channels.length > 0 ? rule.escalation_channels : this.defaultEscalationChannels;
    return candidates.filter((channel) => !rule.channels.includes(channel));
  }

  // ─── Reads ────────────────────────────────────────────────────

  get(alertId: string): Readonly<Alert> | null {
    return this.findOpen(alertId) ?? this.history.find((a) => a.id === alertId) ?? null;
  }

  /** Open alerts and resolved history, newest first. */
  list(filter: AlertFilter = {}): Readonly<Alert>[] {
    return [...this.openByRule.values(), ...this.history]
      .filter((a) => filter.status === undefined || a.status === filter.status)
      .filter((a) => filter.rule_id === undefined || a.rule_id === filter.rule_id)
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  /** Counts over open alerts and retained history. */
  stats(): AlertStats {
    const now = this.nowFn();
    const alerts = this.list();
    const by_status: Record<AlertStatus, number> = { active: 0, acknowledged: 0, resolved: 0 };
    const by_severity: Record<Severity, number> = { low: 0, medium: 0, high: 0, critical: 0 };
    let recent = 0;

    for (const alert of alerts) {
      by_status[alert.status]++;
      by_severity[alert.severity]++;
      if (now - Date.parse(alert.created_at) < DAY_MS) recent++;
    }

    return { total: alerts.length, by_status, by_severity, recent_24h: recent };
  }

  get openCount(): number {
    return this.openByRule.size;
  }

  /** Waits for every in-flight delivery, including retries. */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ─── Delivery ─────────────────────────────────────────────────

  private findOpen(alertId: string): Alert | undefined {
    for (const alert of this.openByRule.values()) {
      if (alert.id === alertId) return alert;
    }
    return undefined;
  }

  private deliver(alert: Alert, channels: readonly NotificationChannel[], kind: NotificationKind): void {
    for (const channel of channels) {
      const task: Promise<void> = this.deliverTo(alert, channel, kind).finally(() => {
        this.inFlight.delete(task);
      });
      this.inFlight.add(task);
    }
  }

  /** Retries with exponential backoff. Never rejects. */
  private async deliverTo(alert: Alert, channel: NotificationChannel, kind: NotificationKind): Promise<void> {
    let lastError = '';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.transport.send(alert, channel, kind);
        alert.notified_count++;
        this.log.debug({ alert_id: alert.id, channel, kind, attempt }, 'Notification delivered');
        return;
      } catch (err: unknown) {
        lastError = err instanceof Error ? err.message : String(err);
        this.log.warn({ err, alert_id: alert.id, channel, attempt }, 'Notification delivery failed');
      }

      if (attempt < this.maxAttempts) {
        await this.sleep(Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs));
      }
    }

    alert.delivery_failed = true;
    this.metrics?.increment('delivery_failures');
    this.log.error(
      { alert_id: alert.id, channel, kind, attempts: this.maxAttempts, error: lastError },
      'Notification delivery gave up',
    );
    this.emit('delivery_failed', alert, null, { channel, kind, attempts: this.maxAttempts, error: lastError });
  }

  private emit(action: AlertAction, alert: Alert, actor: string | null, details: Record<string, unknown>): void {
    const change: AlertChange = {
      action,
      alert: { ...alert, context: { ...alert.context } },
      actor,
      at: new Date(this.nowFn()).toISOString(),
      details,
    };
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (err: unknown) {
        this.log.warn({ err, action, alert_id: alert.id }, 'Alert listener failed');
      }
    }
  }
}
