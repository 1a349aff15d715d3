import { randomUUID } from 'node:crypto';
import { eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { rules } from './schema.js';
import type { AlertRule, NotificationChannel, RuleTrigger } from '../../domain/rule.js';
import { RULE_TRIGGERS } from '../../domain/rule.js';
import type { Severity } from '../../domain/event.js';
import { SEVERITIES } from '../../domain/event.js';
import type { WindowSpec } from '../../domain/window.js';
import { ConfigError } from '../../domain/errors.js';

/** Row shape returned by rule queries. */
export type RuleRow = typeof rules.$inferSelect;

/** Fields accepted when creating or fully replacing a rule. */
export interface RuleInput {
  name: string;
  description: string | null;
  enabled: boolean;
  severity: Severity;
  condition: string;
  window_spec: WindowSpec;
  trigger: RuleTrigger;
  threshold: number | null;
  channels: NotificationChannel[];
  escalation_channels: NotificationChannel[];
  suppression_seconds: number;
  escalation_seconds: number;
  auto_resolve_seconds: number;
}

/** Fields accepted for a partial PATCH update (all optional). */
export type PatchRuleInput = Partial<RuleInput>;

function toSeverity(value: string): Severity {
  const severity = SEVERITIES.find((s) => s === value);
  if (severity === undefined) throw new ConfigError(`Stored rule has unknown severity "${value}"`);
  return severity;
}

function toTrigger(value: string): RuleTrigger {
  const trigger = RULE_TRIGGERS.find((t) => t === value);
  if (trigger === undefined) throw new ConfigError(`Stored rule has unknown trigger "${value}"`);
  return trigger;
}

/** Maps a stored row to the engine's rule contract. Throws ConfigError on unknown enum values. */
export function rowToRule(row: RuleRow): AlertRule {
  return {
    id: row.rule_id,
    name: row.name,
    description: row.description,
    condition: row.condition,
    window_spec: row.window_spec,
    trigger: toTrigger(row.trigger),
    threshold: row.threshold,
    severity: toSeverity(row.severity),
    channels: row.channels,
    escalation_channels: row.escalation_channels,
    suppression_seconds: row.suppression_seconds,
    escalation_seconds: row.escalation_seconds,
    auto_resolve_seconds: row.auto_resolve_seconds,
    enabled: row.enabled,
  };
}

export async function insertRule(db: Database, input: RuleInput): Promise<RuleRow> {
  const now = new Date();
  const [row] = await db.insert(rules).values({
    rule_id: randomUUID(),
    ...input,
    created_at: now,
    updated_at: now,
  }).returning();

  if (row === undefined) throw new Error('Insert returned no row');
  return row;
}

export async function findAllRules(db: Database): Promise<RuleRow[]> {
  return db.select().from(rules);
}

export async function findRuleById(db: Database, ruleId: string): Promise<RuleRow | undefined> {
  const rows = await db.select().from(rules).where(eq(rules.rule_id, ruleId)).limit(1);
  return rows[0];
}

export async function updateRule(
  db: Database,
  ruleId: string,
  input: RuleInput,
): Promise<RuleRow | undefined> {
  const rows = await db.update(rules).set({
    ...input,
    updated_at: new Date(),
  }).where(eq(rules.rule_id, ruleId)).returning();

  return rows[0];
}

export async function patchRule(
  db: Database,
  ruleId: string,
  input: PatchRuleInput,
): Promise<RuleRow | undefined> {
  const setFields: Partial<typeof rules.$inferInsert> = { updated_at: new Date() };
  if (input.name !== undefined) setFields.name = input.name;
  if (input.description !== undefined) setFields.description = input.description;
  if (input.enabled !== undefined) setFields.enabled = input.enabled;
  if (input.severity !== undefined) setFields.severity = input.severity;
  if (input.condition !== undefined) setFields.condition = input.condition;
  if (input.window_spec !== undefined) setFields.window_spec = input.window_spec;
  if (input.trigger !== undefined) setFields.trigger = input.trigger;
  if (input.threshold !== undefined) setFields.threshold = input.threshold;
  if (input.channels !== undefined) setFields.channels = input.channels;
  if (input.escalation_channels !== undefined) setFields.escalation_channels = input.escalation_channels;
  if (input.suppression_seconds !== undefined) setFields.suppression_seconds = input.suppression_seconds;
  if (input.escalation_seconds !== undefined) setFields.escalation_seconds = input.escalation_seconds;
  if (input.auto_resolve_seconds !== undefined) setFields.auto_resolve_seconds = input.auto_resolve_seconds;

  const rows = await db.update(rules).set(setFields).where(eq(rules.rule_id, ruleId)).returning();
  return rows[0];
}

export async function deleteRule(db: Database, ruleId: string): Promise<boolean> {
  const rows = await db.delete(rules).where(eq(rules.rule_id, ruleId)).returning({ rule_id: rules.rule_id });
  return rows.length > 0;
}
