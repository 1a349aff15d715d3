import type { Severity } from './event.js';

export type AlertStatus = 'active' | 'acknowledged' | 'resolved';

/**
 * Alert entity owned by the alert manager.
 *
 * Timestamps are ISO-8601. `acknowledged` is orthogonal to suppression:
 * it only stops escalation. `delivery_failed` is set once any channel
 * exhausted its retries; the alert stays open.
 */
export interface Alert {
  readonly id: string;
  readonly rule_id: string;
  readonly rule_name: string;
  readonly severity: Severity;
  status: AlertStatus;
  acknowledged: boolean;
  acknowledged_by: string | null;
  readonly created_at: string;
  updated_at: string;
  last_fired_at: string;
  last_matched_at: string;
  fire_count: number;
  notified_count: number;
  escalated: boolean;
  escalated_at: string | null;
  delivery_failed: boolean;
  resolved_at: string | null;
  resolved_by: string | null;
  context: Record<string, unknown>;
}

/** Lifecycle actions reported to alert listeners and stored as history. */
export type AlertAction =
  | 'fired'
  | 'refired'
  | 'suppressed'
  | 'acknowledged'
  | 'resolved'
  | 'escalated'
  | 'delivery_failed';

export interface AlertChange {
  readonly action: AlertAction;
  readonly alert: Readonly<Alert>;
  readonly actor: string | null;
  readonly at: string;
  readonly details: Readonly<Record<string, unknown>>;
}
