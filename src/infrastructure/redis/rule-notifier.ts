import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';

export const RULES_CHANGED_CHANNEL = 'rules_changed';

export type RuleChangeReason = 'create' | 'update' | 'patch' | 'delete';

export interface RuleChangePayload {
  ts: string;
  reason: RuleChangeReason;
  rule_id: string;
  /** Instance that made the change; it has already applied it locally. */
  origin: string;
}

/**
 * Publishes a lightweight notification to the "rules_changed" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated to the caller,
 * so rule CRUD HTTP responses are never affected by Pub/Sub issues.
 * Takes a request logger as well as a pino instance.
 */
export async function publishRuleChange(
  redis: Redis,
  log: BaseLogger,
  origin: string,
  reason: RuleChangeReason,
  ruleId: string,
): Promise<void> {
  try {
    const payload: RuleChangePayload = {
      ts: new Date().toISOString(),
      reason,
      rule_id: ruleId,
      origin,
    };
    await redis.publish(RULES_CHANGED_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: RULES_CHANGED_CHANNEL, reason, rule_id: ruleId }, 'Published rule change notification');
  } catch (err: unknown) {
    log.error({ err, reason, rule_id: ruleId }, 'Failed to publish rule change notification');
  }
}
