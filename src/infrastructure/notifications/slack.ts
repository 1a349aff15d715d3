import type { Logger } from 'pino';
import type { NotificationConfig } from './config.js';
import type { Alert } from '../../domain/alert.js';
import type { NotificationKind } from '../../application/alert-manager.js';
import { DeliveryError } from '../../domain/errors.js';
import { alertHeadline, alertSummary } from './message.js';

/**
 * Sends (or skips) a Slack notification for an alert.
 *
 * If Slack is disabled in config, logs a skip message.
 * If enabled, POSTs a formatted JSON payload to the configured webhook URL.
 * Network failures and non-OK responses throw DeliveryError so the caller
 * can retry.
 */
export async function sendSlackNotification(
  config: NotificationConfig['slack'],
  log: Logger,
  alert: Readonly<Alert>,
  kind: NotificationKind,
  fetchFn: typeof fetch = fetch,
): Promise<void> {
  if (!config.enabled) {
    log.debug(
      { rule_id: alert.rule_id, severity: alert.severity },
      'Slack notification skipped (disabled)',
    );
    return;
  }

  if (!config.webhook_url) {
    throw new DeliveryError('Slack enabled but webhook_url is empty', 'slack');
  }

  const body = JSON.stringify({
    text: `*${alertHeadline(alert, kind)}*\n>${alertSummary(alert)}`,
  });

  let response: Response;
  try {
    response = await fetchFn(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DeliveryError(`Slack request failed: ${reason}`, 'slack');
  }

  if (!response.ok) {
    throw new DeliveryError(`Slack webhook returned ${response.status}`, 'slack', response.status);
  }

  log.info(
    { alert_id: alert.id, rule_id: alert.rule_id, severity: alert.severity, kind },
    'Slack notification sent',
  );
}
