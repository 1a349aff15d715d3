import type { Logger } from 'pino';
import type { Database } from '../db/index.js';
import { findAllRules, rowToRule } from '../db/index.js';
import { createRedisClient, RULES_CHANGED_CHANNEL } from '../redis/index.js';
import type { AlertRule } from '../../domain/rule.js';
import type { RuleEngine, ReplaceResult } from '../../application/rule-engine.js';

export type RuleReloader = Pick<RuleEngine, 'replaceAll'>;

/** Shared between overlapping notifications so only one reload runs at a time. */
export interface ReloadGuard {
  reloading: boolean;
}

/**
 * Loads every stored rule into the engine, replacing what it holds.
 *
 * Rows with unknown enum values are rejected the same way the engine
 * rejects invalid conditions.
 */
export async function syncRules(db: Database, log: Logger, engine: RuleReloader): Promise<ReplaceResult> {
  const rows = await findAllRules(db);
  const valid: AlertRule[] = [];
  const rejected: ReplaceResult['rejected'] = [];

  for (const row of rows) {
    try {
      valid.push(rowToRule(row));
    } catch (err: unknown) {
      rejected.push({ rule_id: row.rule_id, error: err instanceof Error ? err.message : String(err) });
    }
  }

  const result = engine.replaceAll(valid);
  const merged: ReplaceResult = { accepted: result.accepted, rejected: [...rejected, ...result.rejected] };
  log.info(
    { ruleCount: merged.accepted.length, ruleIds: merged.accepted, rejected: merged.rejected.length },
    'Rules loaded from database',
  );
  return merged;
}

/**
 * Handles one "rules_changed" message: reloads all rules from Postgres
 * into the engine.
 *
 * Messages published by this instance are skipped (it applied the change
 * synchronously). Exported for unit testing; callers outside this module
 * should use `startRuleSubscriber()`.
 */
export async function reloadRules(
  db: Database,
  log: Logger,
  engine: RuleReloader,
  rawMessage: string,
  guard: ReloadGuard,
  selfOrigin: string | null = null,
): Promise<void> {
  let parsed: { reason?: unknown; rule_id?: unknown; origin?: unknown } = {};
  try {
    const value: unknown = JSON.parse(rawMessage);
    if (typeof value === 'object' && value !== null) parsed = value;
  } catch {
    // Non-JSON message: still reload, just log without context
  }

  if (selfOrigin !== null && parsed.origin === selfOrigin) {
    log.debug({ rule_id: parsed.rule_id }, 'Own rule change, skipping reload');
    return;
  }

  if (guard.reloading) {
    log.debug('Reload already in progress, skipping');
    return;
  }

  guard.reloading = true;
  try {
    log.info(
      { reason: parsed.reason, rule_id: parsed.rule_id },
      'Rule change detected, reloading rules from database',
    );
    await syncRules(db, log, engine);
  } catch (err: unknown) {
    log.error({ err }, 'Failed to reload rules from database');
  } finally {
    guard.reloading = false;
  }
}

/**
 * Subscribes to the "rules_changed" Pub/Sub channel and reloads rules
 * from Postgres whenever another instance changes them.
 *
 * ioredis requires a dedicated connection for subscriptions: once a client
 * enters subscriber mode it cannot issue regular commands.
 *
 * Returns a cleanup function that unsubscribes and disconnects.
 */
export async function startRuleSubscriber(
  redisUrl: string,
  db: Database,
  log: Logger,
  engine: RuleReloader,
  selfOrigin: string,
): Promise<() => Promise<void>> {
  const sub = createRedisClient(redisUrl);

  await sub.connect();
  log.info('Rule subscriber Redis connection established');

  const guard: ReloadGuard = { reloading: false };

  sub.on('message', (channel: string, message: string) => {
    if (channel !== RULES_CHANGED_CHANNEL) return;
    // Errors are caught inside reloadRules
    void reloadRules(db, log, engine, message, guard, selfOrigin);
  });

  await sub.subscribe(RULES_CHANGED_CHANNEL);
  log.info({ channel: RULES_CHANGED_CHANNEL }, 'Subscribed to rule change notifications');

  return async () => {
    try {
      await sub.unsubscribe(RULES_CHANGED_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Rule subscriber did not close cleanly');
    }
    log.info('Rule subscriber disconnected');
  };
}
