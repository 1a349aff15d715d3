import { pgTable, uuid, varchar, text, boolean, integer, doublePrecision, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { WindowSpec } from '../../domain/window.js';
import type { NotificationChannel } from '../../domain/rule.js';

/**
 * Drizzle schema for the `rules` table.
 *
 * `rule_id` is a server-generated UUID. `window_spec` and the channel
 * lists are stored as JSONB and validated again by the rule engine when
 * the row is loaded.
 */
export const rules = pgTable('rules', {
  rule_id: uuid('rule_id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  description: text('description'),
  enabled: boolean('enabled').notNull().default(true),
  severity: varchar('severity', { length: 20 }).notNull(),
  condition: text('condition').notNull(),
  window_spec: jsonb('window_spec').$type<WindowSpec>().notNull(),
  trigger: varchar('trigger', { length: 20 }).notNull().default('on_event'),
  threshold: doublePrecision('threshold'),
  channels: jsonb('channels').$type<NotificationChannel[]>().notNull(),
  escalation_channels: jsonb('escalation_channels').$type<NotificationChannel[]>().notNull().default([]),
  suppression_seconds: integer('suppression_seconds').notNull().default(300),
  escalation_seconds: integer('escalation_seconds').notNull().default(0),
  auto_resolve_seconds: integer('auto_resolve_seconds').notNull().default(0),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_rules_enabled').on(table.enabled),
  index('idx_rules_severity').on(table.severity),
]);

/**
 * Drizzle schema for the `alerts` table.
 *
 * One row per alert, upserted on every lifecycle change.
 */
export const alerts = pgTable('alerts', {
  alert_id: uuid('alert_id').primaryKey(),
  rule_id: varchar('rule_id', { length: 255 }).notNull(),
  rule_name: varchar('rule_name', { length: 255 }).notNull(),
  severity: varchar('severity', { length: 20 }).notNull(),
  status: varchar('status', { length: 20 }).notNull(),
  acknowledged: boolean('acknowledged').notNull().default(false),
  acknowledged_by: varchar('acknowledged_by', { length: 255 }),
  fire_count: integer('fire_count').notNull().default(1),
  notified_count: integer('notified_count').notNull().default(0),
  escalated: boolean('escalated').notNull().default(false),
  delivery_failed: boolean('delivery_failed').notNull().default(false),
  context: jsonb('context').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull(),
  last_fired_at: timestamp('last_fired_at', { withTimezone: true }).notNull(),
  escalated_at: timestamp('escalated_at', { withTimezone: true }),
  resolved_at: timestamp('resolved_at', { withTimezone: true }),
  resolved_by: varchar('resolved_by', { length: 255 }),
}, (table) => [
  index('idx_alerts_rule_id').on(table.rule_id),
  index('idx_alerts_status').on(table.status),
  index('idx_alerts_created_at').on(table.created_at),
]);

/**
 * Drizzle schema for the `alert_history` table.
 *
 * Append-only audit trail: one row per lifecycle action.
 */
export const alertHistory = pgTable('alert_history', {
  history_id: uuid('history_id').primaryKey(),
  alert_id: uuid('alert_id').notNull(),
  action: varchar('action', { length: 32 }).notNull(),
  actor: varchar('actor', { length: 255 }),
  details: jsonb('details').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_alert_history_alert_id').on(table.alert_id),
  index('idx_alert_history_created_at').on(table.created_at),
]);
