import type { Logger } from 'pino';
import type { AlertRule, RuleMatch } from '../domain/rule.js';
import { NOTIFICATION_CHANNELS, RULE_TRIGGERS } from '../domain/rule.js';
import { SEVERITIES } from '../domain/event.js';
import type { Event } from '../domain/event.js';
import type { AggregationResult, Window, WindowSnapshot } from '../domain/window.js';
import { emptyAggregation } from '../domain/window.js';
import { ConfigError, isCoreError } from '../domain/errors.js';
import { evaluateCondition, parseCondition, referencedPaths } from './expression/index.js';
import type { EvaluationContext, Expression } from './expression/index.js';
import { validateWindowSpec } from './window-manager.js';
import type { WindowManager } from './window-manager.js';
import type { CoreMetrics } from './metrics.js';

/** Roots a condition may reference. `p<N>` is matched separately. */
export const CONTEXT_ROOTS: ReadonlySet<string> = new Set([
  'count',
  'value_count',
  'sum',
  'min',
  'max',
  'avg',
  'percentiles',
  'approximate',
  'threshold',
  'idle_seconds',
  'window',
  'event',
  'type',
  'source',
  'severity',
  'data',
  'tags',
]);

const PERCENTILE_ROOT = /^p\d+$/;

export interface RuleEngineOptions {
  log: Logger;
  nowFn?: () => number;
  metrics?: CoreMetrics;
}

export interface RejectedRule {
  readonly rule_id: string;
  readonly error: string;
}

export interface ReplaceResult {
  readonly accepted: string[];
  readonly rejected: RejectedRule[];
}

interface CompiledRule {
  readonly rule: AlertRule;
  readonly expr: Expression;
}

// ─── Validation ─────────────────────────────────────────────────

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Validates a rule and parses its condition.
 *
 * Throws ParseError for a malformed condition and ConfigError for
 * everything else. Never touches engine state.
 */
export function compileRule(rule: AlertRule): CompiledRule {
  if (rule.id.trim() === '') throw new ConfigError('Rule id must not be empty');
  if (rule.name.trim() === '') throw new ConfigError('Rule name must not be empty');

  const expr = parseCondition(rule.condition);
  for (const path of referencedPaths(expr)) {
    const root = path.split('.')[0] ?? path;
    if (!CONTEXT_ROOTS.has(root) && !PERCENTILE_ROOT.test(root)) {
      throw new ConfigError(`Condition references unknown field "${path}"`);
    }
  }

  validateWindowSpec(rule.window_spec);

  if (!RULE_TRIGGERS.includes(rule.trigger)) {
    throw new ConfigError(`Unsupported trigger "${String(rule.trigger)}"`);
  }
  if (!SEVERITIES.includes(rule.severity)) {
    throw new ConfigError(`Unsupported severity "${String(rule.severity)}"`);
  }
  if (rule.channels.length === 0) {
    throw new ConfigError('Rule needs at least one notification channel');
  }
  for (const channel of [...rule.channels, ...rule.escalation_channels]) {
    if (!NOTIFICATION_CHANNELS.includes(channel)) {
      throw new ConfigError(`Unsupported notification channel "${String(channel)}"`);
    }
  }
  const repeated = rule.escalation_channels.filter((channel) => rule.channels.includes(channel));
  if (repeated.length > 0) {
    throw new ConfigError(`escalation_channels must differ from channels, both name ${repeated.join(', ')}`);
  }
  if (rule.threshold !== null && !Number.isFinite(rule.threshold)) {
    throw new ConfigError('threshold must be a finite number');
  }
  if (!isNonNegative(rule.suppression_seconds)
    || !isNonNegative(rule.escalation_seconds)
    || !isNonNegative(rule.auto_resolve_seconds)) {
    throw new ConfigError('suppression, escalation and auto-resolve durations must be >= 0');
  }

  return { rule, expr };
}

function sameRule(a: AlertRule, b: AlertRule): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

// ─── Context ────────────────────────────────────────────────────

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

/**
 * Builds the values a condition is evaluated against.
 *
 * Fields of the last folded event are exposed both under `event` and at
 * the root (`type`, `source`, `severity`, `data`, `tags`). They are absent
 * when the window has no event, so conditions on them evaluate to false.
 */
export function buildContext(
  rule: AlertRule,
  window: Readonly<Window> | null,
  aggregation: AggregationResult,
  lastEvent: Event | null,
  idleSeconds: number,
  now: number,
): Record<string, unknown> {
  const percentiles: Record<string, number> = {};
  const context: Record<string, unknown> = {
    count: aggregation.count,
    value_count: aggregation.value_count,
    sum: aggregation.sum,
    min: aggregation.min,
    max: aggregation.max,
    avg: aggregation.avg,
    percentiles,
    approximate: aggregation.approximate,
    threshold: rule.threshold,
    idle_seconds: idleSeconds,
  };

  for (const [p, value] of Object.entries(aggregation.percentiles)) {
    percentiles[p] = value;
    context[`p${p}`] = value;
  }

  if (window !== null) {
    const end = window.end ?? now;
    context['window'] = {
      id: window.id,
      kind: window.kind,
      state: window.state,
      partition: window.partition,
      start: iso(window.start),
      end: window.end === null ? null : iso(window.end),
      duration_seconds: Math.max(0, end - window.start) / 1000,
    };
  }

  if (lastEvent !== null) {
    const tags: Record<string, boolean> = {};
    for (const tag of lastEvent.tags) tags[tag] = true;
    context['event'] = {
      event_id: lastEvent.event_id,
      event_type: lastEvent.event_type,
      source: lastEvent.source,
      severity: lastEvent.severity,
      timestamp: lastEvent.timestamp,
      data: lastEvent.data,
      tags,
    };
    context['type'] = lastEvent.event_type;
    context['source'] = lastEvent.source;
    context['severity'] = lastEvent.severity;
    context['data'] = lastEvent.data;
    context['tags'] = tags;
  }

  return context;
}

// ─── Engine ─────────────────────────────────────────────────────

/**
 * Rule registry and evaluator.
 *
 * Registration is synchronous and fails fast with ParseError/ConfigError.
 * Evaluation reads window snapshots only; evaluation errors are logged,
 * counted and treated as no match so one bad rule cannot stall the rest.
 */
export class RuleEngine {
  private readonly log: Logger;
  private readonly nowFn: () => number;
  private readonly metrics: CoreMetrics | undefined;

  private readonly rules: Map<string, CompiledRule> = new Map();
  /** Windows whose `on_event` rule already matched. */
  private readonly matchedWindows: Set<string> = new Set();
  /** `rule:partition` keys whose `tick` condition currently holds. */
  private readonly tickActive: Set<string> = new Set();

  constructor(private readonly windows: WindowManager, options: RuleEngineOptions) {
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
    this.metrics = options.metrics;
  }

  // ─── Registry ─────────────────────────────────────────────────

  register(rule: AlertRule): void {
    if (this.rules.has(rule.id)) {
      throw new ConfigError(`Rule "${rule.id}" is already registered`);
    }
    const compiled = compileRule(rule);
    this.rules.set(rule.id, compiled);
    if (rule.enabled) this.activate(rule);
    this.log.info({ rule_id: rule.id, trigger: rule.trigger, enabled: rule.enabled }, 'Rule registered');
  }

  /** Replaces an existing rule. Windows are kept unless the window spec changed. */
  update(rule: AlertRule): void {
    const previous = this.rules.get(rule.id);
    if (previous === undefined) throw new ConfigError(`Rule "${rule.id}" is not registered`);

    const compiled = compileRule(rule);
    const respec = JSON.stringify(previous.rule.window_spec) !== JSON.stringify(rule.window_spec);
    this.rules.set(rule.id, compiled);

    if (!rule.enabled) {
      this.deactivate(rule.id);
    } else {
      if (respec) this.forgetRuleState(rule.id);
      if (previous.rule.trigger !== rule.trigger || previous.rule.condition !== rule.condition) {
        this.clearTickState(rule.id);
      }
      this.activate(rule);
    }
    this.log.info({ rule_id: rule.id, enabled: rule.enabled }, 'Rule updated');
  }

  /** Returns false when the rule is unknown. */
  disable(ruleId: string): boolean {
    const current = this.rules.get(ruleId);
    if (current === undefined) return false;
    this.rules.set(ruleId, { ...current, rule: { ...current.rule, enabled: false } });
    this.deactivate(ruleId);
    this.log.info({ rule_id: ruleId }, 'Rule disabled');
    return true;
  }

  /** Returns false when the rule is unknown. */
  enable(ruleId: string): boolean {
    const current = this.rules.get(ruleId);
    if (current === undefined) return false;
    const rule = { ...current.rule, enabled: true };
    this.rules.set(ruleId, { ...current, rule });
    this.activate(rule);
    this.log.info({ rule_id: ruleId }, 'Rule enabled');
    return true;
  }

  /** Returns false when the rule is unknown. */
  remove(ruleId: string): boolean {
    if (!this.rules.delete(ruleId)) return false;
    this.deactivate(ruleId);
    this.log.info({ rule_id: ruleId }, 'Rule removed');
    return true;
  }

  /**
   * Swaps the registry for `rules` (hot reload).
   *
   * Invalid rules are rejected individually; unchanged rules keep their
   * windows; rules no longer listed are removed.
   */
  replaceAll(rules: readonly AlertRule[]): ReplaceResult {
    const accepted: string[] = [];
    const rejected: RejectedRule[] = [];
    const valid = new Map<string, AlertRule>();

    for (const rule of rules) {
      if (valid.has(rule.id)) {
        rejected.push({ rule_id: rule.id, error: `Duplicate rule id "${rule.id}"` });
        continue;
      }
      try {
        compileRule(rule);
        valid.set(rule.id, rule);
      } catch (err: unknown) {
        if (!isCoreError(err)) throw err;
        rejected.push({ rule_id: rule.id, error: err.message });
      }
    }

    for (const id of [...this.rules.keys()]) {
      if (!valid.has(id)) this.remove(id);
    }

    for (const [id, rule] of valid) {
      const current = this.rules.get(id);
      if (current === undefined) this.register(rule);
      else if (!sameRule(current.rule, rule)) this.update(rule);
      accepted.push(id);
    }

    if (rejected.length > 0) {
      this.log.warn({ rejected }, 'Some rules were rejected during reload');
    }
    this.log.info({ accepted: accepted.length, rejected: rejected.length }, 'Rules reloaded');
    return { accepted, rejected };
  }

  get(ruleId: string): AlertRule | null {
    return this.rules.get(ruleId)?.rule ?? null;
  }

  list(): AlertRule[] {
    return [...this.rules.values()].map((c) => c.rule);
  }

  private activate(rule: AlertRule): void {
    this.windows.track(rule.id, rule.window_spec);

    const spec = rule.window_spec;
    const partitionBy = spec.partition_by ?? 'type';
    if (rule.trigger === 'tick' && partitionBy === 'type' && spec.filters?.event_type !== undefined) {
      this.windows.seedPartition(rule.id, spec.filters.event_type);
    }
  }

  private deactivate(ruleId: string): void {
    this.windows.untrack(ruleId);
    this.forgetRuleState(ruleId);
  }

  private forgetRuleState(ruleId: string): void {
    const prefix = `${ruleId}:`;
    for (const id of [...this.matchedWindows]) {
      if (id.startsWith(prefix)) this.matchedWindows.delete(id);
    }
    this.clearTickState(ruleId);
  }

  private clearTickState(ruleId: string): void {
    const prefix = `${ruleId}:`;
    for (const key of [...this.tickActive]) {
      if (key.startsWith(prefix)) this.tickActive.delete(key);
    }
  }

  /** Drops per-window match state for windows the window manager evicted. */
  forgetWindows(windowIds: readonly string[]): void {
    for (const id of windowIds) this.matchedWindows.delete(id);
  }

  // ─── Evaluation ───────────────────────────────────────────────

  /**
   * Evaluates `on_event` rules for windows folded into since the last
   * call and `on_close` rules for windows that just entered `closing`.
   */
  evaluateDueWindows(): RuleMatch[] {
    const matches: RuleMatch[] = [];
    const now = this.nowFn();

    for (const due of this.windows.takeDue()) {
      const { window } = due.snapshot;
      const compiled = this.rules.get(window.rule_id);
      if (compiled === undefined || !compiled.rule.enabled) continue;
      const { rule } = compiled;

      const shouldEvaluate =
        (rule.trigger === 'on_event' && due.folded && !this.matchedWindows.has(window.id))
        || (rule.trigger === 'on_close' && due.closing);
      if (!shouldEvaluate) continue;

      const match = this.evaluateSnapshot(compiled, due.snapshot, now);
      if (match === null) continue;
      if (rule.trigger === 'on_event') this.matchedWindows.add(window.id);
      matches.push(match);
    }

    return matches;
  }

  /**
   * Evaluates `tick` rules once per known partition.
   *
   * Edge-triggered: a partition matches once, then not again until its
   * condition has been false on a later tick.
   */
  evaluateTick(): RuleMatch[] {
    const matches: RuleMatch[] = [];
    const now = this.nowFn();

    for (const compiled of this.rules.values()) {
      const { rule } = compiled;
      if (!rule.enabled || rule.trigger !== 'tick') continue;

      for (const [partition, lastAt] of this.windows.activity(rule.id)) {
        const key = `${rule.id}:${partition}`;
        const idleSeconds = Math.max(0, now - lastAt) / 1000;
        const current = this.windows.currentWindow(rule.id, partition);

        const windowId = current?.window.id ?? `${key}:idle`;
        const aggregation = current?.aggregation ?? emptyAggregation(windowId);
        const context = buildContext(
          rule,
          current?.window ?? null,
          aggregation,
          current?.last_event ?? null,
          idleSeconds,
          now,
        );

        const holds = this.check(rule, compiled.expr, context, windowId);
        if (!holds) {
          this.tickActive.delete(key);
          continue;
        }
        if (this.tickActive.has(key)) continue;

        this.tickActive.add(key);
        this.metrics?.increment('rule_matches');
        matches.push({
          rule_id: rule.id,
          window_id: windowId,
          partition,
          snapshot: aggregation,
          context,
          matched_at: now,
        });
      }
    }

    return matches;
  }

  private evaluateSnapshot(compiled: CompiledRule, snapshot: WindowSnapshot, now: number): RuleMatch | null {
    const { rule, expr } = compiled;
    const { window, aggregation, last_event } = snapshot;
    const idleSeconds = Math.max(0, now - window.last_event_at) / 1000;
    const context = buildContext(rule, window, aggregation, last_event, idleSeconds, now);

    if (!this.check(rule, expr, context, window.id)) return null;

    this.metrics?.increment('rule_matches');
    this.log.debug({ rule_id: rule.id, window_id: window.id, count: aggregation.count }, 'Rule matched');
    return {
      rule_id: rule.id,
      window_id: window.id,
      partition: window.partition,
      snapshot: aggregation,
      context,
      matched_at: now,
    };
  }

  private check(rule: AlertRule, expr: Expression, context: EvaluationContext, windowId: string): boolean {
    this.metrics?.increment('rule_evaluations');
    const outcome = evaluateCondition(expr, context);
    if (!outcome.ok) {
      this.metrics?.increment('evaluation_errors');
      this.log.warn(
        { rule_id: rule.id, window_id: windowId, err: outcome.error.message },
        'Rule evaluation failed; treated as no match',
      );
      return false;
    }
    if (outcome.missing !== null) {
      this.log.debug({ rule_id: rule.id, window_id: windowId, path: outcome.missing }, 'Field missing; condition is false');
    }
    return outcome.value;
  }
}
