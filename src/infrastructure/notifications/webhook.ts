import type { Logger } from 'pino';
import type { NotificationConfig } from './config.js';
import type { Alert } from '../../domain/alert.js';
import type { NotificationKind } from '../../application/alert-manager.js';
import { DeliveryError } from '../../domain/errors.js';

/** JSON body POSTed to generic webhooks. */
export interface WebhookPayload {
  kind: NotificationKind;
  alert: Readonly<Alert>;
  sent_at: string;
}

/**
 * POSTs the alert as JSON to a generic webhook.
 *
 * Configured headers are sent with every request (e.g. an auth token).
 * Requests are aborted after `timeout_ms`. Anything but a 2xx response
 * throws DeliveryError.
 */
export async function sendWebhookNotification(
  config: NotificationConfig['webhook'],
  log: Logger,
  alert: Readonly<Alert>,
  kind: NotificationKind,
  fetchFn: typeof fetch = fetch,
): Promise<void> {
  if (!config.enabled) {
    log.debug(
      { rule_id: alert.rule_id, severity: alert.severity },
      'Webhook notification skipped (disabled)',
    );
    return;
  }

  if (!config.url) {
    throw new DeliveryError('Webhook enabled but url is empty', 'webhook');
  }

  const payload: WebhookPayload = { kind, alert, sent_at: new Date().toISOString() };

  let response: Response;
  try {
    response = await fetchFn(config.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...config.headers },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(config.timeout_ms),
    });
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DeliveryError(`Webhook request failed: ${reason}`, 'webhook');
  }

  if (!response.ok) {
    throw new DeliveryError(`Webhook returned ${response.status}`, 'webhook', response.status);
  }

  log.info({ alert_id: alert.id, rule_id: alert.rule_id, kind, status: response.status }, 'Webhook notification sent');
}
