import type { Alert } from '../../domain/alert.js';
import type { NotificationKind } from '../../application/alert-manager.js';

/** One-line human summary shared by every channel. */
export function alertHeadline(alert: Readonly<Alert>, kind: NotificationKind): string {
  const prefix = kind === 'escalation' ? 'ESCALATED ' : '';
  return `${prefix}[${alert.severity.toUpperCase()}] ${alert.rule_name}`;
}

export function alertSummary(alert: Readonly<Alert>): string {
  const partition = alert.context['partition'];
  const where = typeof partition === 'string' ? ` | Partition: \`${partition}\`` : '';
  return `Rule: \`${alert.rule_id}\` | Fired: ${alert.fire_count}x | Since: ${alert.created_at}${where}`;
}
