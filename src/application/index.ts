export { eventSchema } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export { createRuleSchema, updateRuleSchema, patchRuleSchema, windowSpecSchema } from './rule-schema.js';
export type { CreateRuleBody, UpdateRuleBody, PatchRuleBody, WindowSpecInput } from './rule-schema.js';
export { listAlertsQuerySchema, alertActionSchema } from './alert-schema.js';
export type { ListAlertsQuery, AlertActionBody } from './alert-schema.js';
export { createRule, listRules, getRule, updateRuleFull, patchRulePartial, removeRule } from './rule-crud.js';
export type { RuleRegistry } from './rule-crud.js';
export { parseCondition, evaluate, evaluateCondition, referencedPaths } from './expression/index.js';
export type { Expression, EvaluationContext, EvaluationOutcome } from './expression/index.js';
export { Aggregator, percentile } from './aggregator.js';
export type { AggregatorOptions } from './aggregator.js';
export { WindowManager, validateWindowSpec, matchesFilters, partitionOf, valueOf } from './window-manager.js';
export type { WindowManagerOptions, FoldOutcome, SweepResult, DueWindow } from './window-manager.js';
export { RuleEngine, compileRule, buildContext } from './rule-engine.js';
export type { RuleEngineOptions, ReplaceResult, RejectedRule } from './rule-engine.js';
export { AlertManager } from './alert-manager.js';
export type { AlertManagerOptions, NotificationTransport, NotificationKind, AlertListener, AlertFilter } from './alert-manager.js';
export { StreamCoordinator, DEFAULT_TUNING } from './stream-coordinator.js';
export type { EventQueue, QueuedEvent, BackpressureSignal, BackpressureState, CoordinatorTuning } from './stream-coordinator.js';
export { createStreamCore } from './stream-core.js';
export type { StreamCore, StreamCoreOptions } from './stream-core.js';
export { CoreMetrics, METRIC_NAMES } from './metrics.js';
export type { MetricName, MetricsSnapshot } from './metrics.js';
