/**
 * Counter and gauge names exposed on the observability surface.
 *
 * - `events_folded`      events folded into at least one window
 * - `events_duplicate`   redeliveries absorbed by the seen-id set
 * - `events_rejected`    queue entries that failed validation
 * - `late_dropped`       windows an event missed because they had already closed
 * - `windows_open`       gauge: windows not yet closed
 * - `rule_evaluations`   condition evaluations performed
 * - `evaluation_errors`  evaluations that raised an EvaluationError
 * - `rule_matches`       RuleMatch values emitted
 * - `alerts_fired`       notifications triggered by first fire or re-fire
 * - `alerts_suppressed`  matches absorbed by the suppression window
 * - `alerts_escalated`   escalation notifications triggered
 * - `alerts_resolved`    alerts resolved manually or automatically
 * - `delivery_failures`  channel deliveries that exhausted their retries
 * - `backpressure_signals` shed/resume signals sent upstream
 */
export const METRIC_NAMES = [
  'events_folded',
  'events_duplicate',
  'events_rejected',
  'late_dropped',
  'windows_open',
  'rule_evaluations',
  'evaluation_errors',
  'rule_matches',
  'alerts_fired',
  'alerts_suppressed',
  'alerts_escalated',
  'alerts_resolved',
  'delivery_failures',
  'backpressure_signals',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export type MetricsSnapshot = Readonly<Record<MetricName, number>>;

/**
 * In-process counters shared by every core component.
 *
 * Single-threaded increments, read through `snapshot()` by the HTTP
 * metrics route.
 */
export class CoreMetrics {
  private readonly values: Record<MetricName, number> = {
    events_folded: 0,
    events_duplicate: 0,
    events_rejected: 0,
    late_dropped: 0,
    windows_open: 0,
    rule_evaluations: 0,
    evaluation_errors: 0,
    rule_matches: 0,
    alerts_fired: 0,
    alerts_suppressed: 0,
    alerts_escalated: 0,
    alerts_resolved: 0,
    delivery_failures: 0,
    backpressure_signals: 0,
  };
  private readonly startedAt: number;

  constructor(nowFn: () => number = Date.now) {
    this.startedAt = nowFn();
  }

  increment(name: MetricName, by: number = 1): void {
    this.values[name] += by;
  }

  /** Sets a gauge value. */
  set(name: MetricName, value: number): void {
    this.values[name] = value;
  }

  get(name: MetricName): number {
    return this.values[name];
  }

  snapshot(): MetricsSnapshot {
    return { ...this.values };
  }

  get started_at(): string {
    return new Date(this.startedAt).toISOString();
  }
}
