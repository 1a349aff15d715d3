export { default as redisPlugin, createRedisClient } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { publishRuleChange, RULES_CHANGED_CHANNEL } from './rule-notifier.js';
export type { RuleChangeReason, RuleChangePayload } from './rule-notifier.js';
export { publishAlertChange, toAlertNotification, ALERT_CHANNEL } from './alert-notifier.js';
export type { AlertNotificationPayload } from './alert-notifier.js';
export { RedisBackpressureSignal, startHeartbeat, BACKPRESSURE_CHANNEL, BACKPRESSURE_KEY } from './backpressure.js';
export type { HeartbeatStatus } from './backpressure.js';
