export { loadNotificationConfig, parseSimpleYaml, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { sendSlackNotification } from './slack.js';
export { sendEmailNotification } from './email.js';
export { sendWebhookNotification } from './webhook.js';
export type { WebhookPayload } from './webhook.js';
export { createNotificationTransport } from './transport.js';
