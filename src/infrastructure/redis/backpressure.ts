import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { BackpressureSignal, BackpressureState } from '../../application/stream-coordinator.js';

export const BACKPRESSURE_CHANNEL = 'intake_backpressure';
export const BACKPRESSURE_KEY = 'intake:backpressure';
export const HEALTH_KEY_PREFIX = 'worker:health';

/**
 * Tells the intake layer to shed or resume.
 *
 * The state is both published (for listeners) and stored under a key (for
 * intake instances that start while shedding is in effect).
 */
export class RedisBackpressureSignal implements BackpressureSignal {
  constructor(
    private readonly redis: Redis,
    private readonly log: Logger,
    private readonly workerId: string,
  ) {}

  async signal(state: BackpressureState, depth: number): Promise<void> {
    const payload = JSON.stringify({ state, depth, worker_id: this.workerId, ts: new Date().toISOString() });
    try {
      if (state === 'shed') {
        await this.redis.set(BACKPRESSURE_KEY, payload);
      } else {
        await this.redis.del(BACKPRESSURE_KEY);
      }
      await this.redis.publish(BACKPRESSURE_CHANNEL, payload);
      this.log.info({ state, depth }, 'Backpressure signal published');
    } catch (err: unknown) {
      this.log.error({ err, state, depth }, 'Failed to publish backpressure signal');
    }
  }
}

export interface HeartbeatStatus {
  queue_depth: number;
  windows_open: number;
  open_alerts: number;
}

/**
 * Refreshes `worker:health:<id>` with a TTL of three intervals so a dead
 * worker's key disappears on its own.
 *
 * Returns a stop function.
 */
export function startHeartbeat(
  redis: Redis,
  log: Logger,
  workerId: string,
  intervalMs: number,
  status: () => Promise<HeartbeatStatus>,
): () => void {
  const key = `${HEALTH_KEY_PREFIX}:${workerId}`;
  const ttlSeconds = Math.max(1, Math.ceil((intervalMs * 3) / 1000));

  const beat = async (): Promise<void> => {
    const body = JSON.stringify({ worker_id: workerId, ts: new Date().toISOString(), ...(await status()) });
    await redis.set(key, body, 'EX', ttlSeconds);
  };

  const run = (): void => {
    void beat().catch((err: unknown) => {
      log.warn({ err, key }, 'Heartbeat update failed');
    });
  };

  run();
  const timer = setInterval(run, intervalMs);
  return () => clearInterval(timer);
}
