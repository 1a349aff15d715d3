export { startRuleSubscriber, reloadRules, syncRules } from './rule-subscriber.js';
export type { ReloadGuard, RuleReloader } from './rule-subscriber.js';
