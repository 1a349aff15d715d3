import type { Severity } from './event.js';
import type { AggregationResult, WindowSpec } from './window.js';

/** Closed set of notification channel kinds. */
export type NotificationChannel = 'email' | 'slack' | 'webhook';

export const NOTIFICATION_CHANNELS: readonly NotificationChannel[] = ['email', 'slack', 'webhook'];

/**
 * When a rule's condition is evaluated.
 *
 * - `on_event`: after every fold into one of its windows; at most one match per window.
 * - `on_close`: once, when a window transitions to `closing`.
 * - `tick`: on the evaluation tick, per partition, edge-triggered (absence checks).
 */
export type RuleTrigger = 'on_event' | 'on_close' | 'tick';

export const RULE_TRIGGERS: readonly RuleTrigger[] = ['on_event', 'on_close', 'tick'];

/**
 * Alert rule contract consumed by the rule engine.
 *
 * Durations are in seconds; a value of 0 disables suppression,
 * escalation or auto-resolve respectively.
 */
export interface AlertRule {
  readonly id: string;
  readonly name: string;
  readonly description?: string | null | undefined;
  readonly condition: string;
  readonly window_spec: WindowSpec;
  readonly trigger: RuleTrigger;
  readonly threshold: number | null;
  readonly severity: Severity;
  readonly channels: readonly NotificationChannel[];
  readonly escalation_channels: readonly NotificationChannel[];
  readonly suppression_seconds: number;
  readonly escalation_seconds: number;
  readonly auto_resolve_seconds: number;
  readonly enabled: boolean;
}

/** Emitted by the rule engine whenever a rule's condition holds. */
export interface RuleMatch {
  readonly rule_id: string;
  readonly window_id: string;
  readonly partition: string;
  readonly snapshot: AggregationResult;
  readonly context: Readonly<Record<string, unknown>>;
  readonly matched_at: number;
}
