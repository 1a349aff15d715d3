import type { Logger } from 'pino';
import type { NotificationConfig } from './config.js';
import type { Alert } from '../../domain/alert.js';
import type { NotificationKind } from '../../application/alert-manager.js';
import { DeliveryError } from '../../domain/errors.js';
import { alertHeadline, alertSummary } from './message.js';

/**
 * Stub email notification handler.
 *
 * No actual SMTP integration: logs a structured message when enabled.
 * When disabled, logs a skip message at debug level.
 */
export async function sendEmailNotification(
  config: NotificationConfig['email'],
  log: Logger,
  alert: Readonly<Alert>,
  kind: NotificationKind,
): Promise<void> {
  if (!config.enabled) {
    log.debug(
      { rule_id: alert.rule_id, severity: alert.severity },
      'Email notification skipped (disabled)',
    );
    return;
  }

  if (config.recipients.length === 0) {
    throw new DeliveryError('Email enabled but no recipients are configured', 'email');
  }

  log.info(
    {
      recipients: config.recipients,
      smtp_host: config.smtp_host,
      alert_id: alert.id,
      rule_id: alert.rule_id,
      severity: alert.severity,
      subject: alertHeadline(alert, kind),
      body: alertSummary(alert),
    },
    'Email notification (stub): SMTP not implemented',
  );
}
