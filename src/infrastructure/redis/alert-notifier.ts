import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { AlertChange } from '../../domain/alert.js';

export const ALERT_CHANNEL = 'alert_notifications';

/** Message published for every alert lifecycle change. */
export interface AlertNotificationPayload {
  action: AlertChange['action'];
  alert_id: string;
  rule_id: string;
  rule_name: string;
  severity: string;
  status: string;
  fire_count: number;
  actor: string | null;
  at: string;
}

export function toAlertNotification(change: AlertChange): AlertNotificationPayload {
  return {
    action: change.action,
    alert_id: change.alert.id,
    rule_id: change.alert.rule_id,
    rule_name: change.alert.rule_name,
    severity: change.alert.severity,
    status: change.alert.status,
    fire_count: change.alert.fire_count,
    actor: change.actor,
    at: change.at,
  };
}

/**
 * Publishes an alert lifecycle change to the "alert_notifications" channel
 * for the dashboard.
 *
 * Best-effort: publish failures are logged but never block alert handling.
 */
export async function publishAlertChange(
  redis: Redis,
  log: Logger,
  change: AlertChange,
): Promise<void> {
  const payload = toAlertNotification(change);
  try {
    await redis.publish(ALERT_CHANNEL, JSON.stringify(payload));
    log.debug(
      { channel: ALERT_CHANNEL, alert_id: payload.alert_id, action: payload.action },
      'Published alert notification',
    );
  } catch (err: unknown) {
    log.warn({ err, alert_id: payload.alert_id }, 'Failed to publish alert notification');
  }
}
