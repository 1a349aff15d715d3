export type { Event, EventData, Severity } from './event.js';
export { SEVERITIES } from './event.js';
export type {
  WindowKind,
  WindowState,
  WindowSpec,
  WindowFilters,
  Window,
  AggregationResult,
  WindowSnapshot,
} from './window.js';
export { WINDOW_KINDS, emptyAggregation } from './window.js';
export type { AlertRule, RuleMatch, RuleTrigger, NotificationChannel } from './rule.js';
export { NOTIFICATION_CHANNELS, RULE_TRIGGERS } from './rule.js';
export type { Alert, AlertStatus, AlertAction, AlertChange } from './alert.js';
export {
  CoreError,
  ParseError,
  EvaluationError,
  ConfigError,
  DeliveryError,
  isCoreError,
} from './errors.js';
export type { CoreErrorCode } from './errors.js';
