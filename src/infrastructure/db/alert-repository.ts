import { randomUUID } from 'node:crypto';
import { desc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { alerts, alertHistory } from './schema.js';
import type { Alert, AlertChange } from '../../domain/alert.js';

export type AlertRow = typeof alerts.$inferSelect;
export type AlertHistoryRow = typeof alertHistory.$inferSelect;

function toDate(iso: string | null): Date | null {
  return iso === null ? null : new Date(iso);
}

/**
 * Inserts or refreshes the row for an alert.
 *
 * `alert_id` is the conflict target, so replaying the same change is
 * harmless.
 */
export async function upsertAlert(db: Database, alert: Readonly<Alert>): Promise<void> {
  const values = {
    rule_id: alert.rule_id,
    rule_name: alert.rule_name,
    severity: alert.severity,
    status: alert.status,
    acknowledged: alert.acknowledged,
    acknowledged_by: alert.acknowledged_by,
    fire_count: alert.fire_count,
    notified_count: alert.notified_count,
    escalated: alert.escalated,
    delivery_failed: alert.delivery_failed,
    context: alert.context,
    updated_at: new Date(alert.updated_at),
    last_fired_at: new Date(alert.last_fired_at),
    escalated_at: toDate(alert.escalated_at),
    resolved_at: toDate(alert.resolved_at),
    resolved_by: alert.resolved_by,
  };

  await db.insert(alerts)
    .values({ alert_id: alert.id, created_at: new Date(alert.created_at), ...values })
    .onConflictDoUpdate({ target: alerts.alert_id, set: values });
}

/** Appends one lifecycle action to the audit trail. */
export async function insertAlertHistory(db: Database, change: AlertChange): Promise<void> {
  await db.insert(alertHistory).values({
    history_id: randomUUID(),
    alert_id: change.alert.id,
    action: change.action,
    actor: change.actor,
    details: { ...change.details },
    created_at: new Date(change.at),
  });
}

export async function findAlertHistory(db: Database, alertId: string): Promise<AlertHistoryRow[]> {
  return db.select().from(alertHistory)
    .where(eq(alertHistory.alert_id, alertId))
    .orderBy(desc(alertHistory.created_at));
}
