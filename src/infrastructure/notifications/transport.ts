import type { Logger } from 'pino';
import type { NotificationConfig } from './config.js';
import type { Alert } from '../../domain/alert.js';
import type { NotificationChannel } from '../../domain/rule.js';
import type { NotificationKind, NotificationTransport } from '../../application/alert-manager.js';
import { sendSlackNotification } from './slack.js';
import { sendEmailNotification } from './email.js';
import { sendWebhookNotification } from './webhook.js';

/**
 * Routes each delivery to the handler for its channel.
 *
 * Handlers throw DeliveryError on failure; retries and the
 * `delivery_failed` state belong to the alert manager.
 */
export function createNotificationTransport(
  config: NotificationConfig,
  log: Logger,
  fetchFn: typeof fetch = fetch,
): NotificationTransport {
  return {
    async send(alert: Readonly<Alert>, channel: NotificationChannel, kind: NotificationKind): Promise<void> {
      switch (channel) {
        case 'slack':
          return sendSlackNotification(config.slack, log, alert, kind, fetchFn);
        case 'email':
          return sendEmailNotification(config.email, log, alert, kind);
        case 'webhook':
          return sendWebhookNotification(config.webhook, log, alert, kind, fetchFn);
        default: {
          const unreachable: never = channel;
          throw new Error(`Unhandled notification channel: ${String(unreachable)}`);
        }
      }
    },
  };
}
