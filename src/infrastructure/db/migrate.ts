import type { SqlClient } from './client.js';

/**
 * Lightweight boot-time migration via raw SQL.
 *
 * drizzle-kit owns real migrations (see drizzle.config.ts); this only
 * guarantees the tables exist on a fresh database.
 */
const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS rules (
    rule_id              UUID PRIMARY KEY,
    name                 VARCHAR(255) NOT NULL,
    description          TEXT,
    enabled              BOOLEAN      NOT NULL DEFAULT true,
    severity             VARCHAR(20)  NOT NULL,
    condition            TEXT         NOT NULL,
    window_spec          JSONB        NOT NULL,
    trigger              VARCHAR(20)  NOT NULL DEFAULT 'on_event',
    threshold            DOUBLE PRECISION,
    channels             JSONB        NOT NULL,
    escalation_channels  JSONB        NOT NULL DEFAULT '[]',
    suppression_seconds  INTEGER      NOT NULL DEFAULT 300,
    escalation_seconds   INTEGER      NOT NULL DEFAULT 0,
    auto_resolve_seconds INTEGER      NOT NULL DEFAULT 0,
    created_at           TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    updated_at           TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS alerts (
    alert_id        UUID PRIMARY KEY,
    rule_id         VARCHAR(255) NOT NULL,
    rule_name       VARCHAR(255) NOT NULL,
    severity        VARCHAR(20)  NOT NULL,
    status          VARCHAR(20)  NOT NULL,
    acknowledged    BOOLEAN      NOT NULL DEFAULT false,
    acknowledged_by VARCHAR(255),
    fire_count      INTEGER      NOT NULL DEFAULT 1,
    notified_count  INTEGER      NOT NULL DEFAULT 0,
    escalated       BOOLEAN      NOT NULL DEFAULT false,
    delivery_failed BOOLEAN      NOT NULL DEFAULT false,
    context         JSONB        NOT NULL DEFAULT '{}',
    created_at      TIMESTAMPTZ  NOT NULL,
    updated_at      TIMESTAMPTZ  NOT NULL,
    last_fired_at   TIMESTAMPTZ  NOT NULL,
    escalated_at    TIMESTAMPTZ,
    resolved_at     TIMESTAMPTZ,
    resolved_by     VARCHAR(255)
  )`,
  `CREATE TABLE IF NOT EXISTS alert_history (
    history_id UUID PRIMARY KEY,
    alert_id   UUID         NOT NULL,
    action     VARCHAR(32)  NOT NULL,
    actor      VARCHAR(255),
    details    JSONB        NOT NULL DEFAULT '{}',
    created_at TIMESTAMPTZ  NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_rules_enabled ON rules (enabled)`,
  `CREATE INDEX IF NOT EXISTS idx_rules_severity ON rules (severity)`,
  `CREATE INDEX IF NOT EXISTS idx_alerts_rule_id ON alerts (rule_id)`,
  `CREATE INDEX IF NOT EXISTS idx_alerts_status ON alerts (status)`,
  `CREATE INDEX IF NOT EXISTS idx_alerts_created_at ON alerts (created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_alert_history_alert_id ON alert_history (alert_id)`,
  `CREATE INDEX IF NOT EXISTS idx_alert_history_created_at ON alert_history (created_at)`,
];

export async function ensureSchema(sql: SqlClient): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
}
