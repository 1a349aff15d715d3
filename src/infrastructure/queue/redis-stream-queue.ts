import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Event } from '../../domain/event.js';
import { eventSchema } from '../../application/event-schema.js';
import type { CoreMetrics } from '../../application/metrics.js';
import type { EventQueue, QueuedEvent } from '../../application/stream-coordinator.js';

export const DEFAULT_STREAM_KEY = 'events_stream';
export const DEFAULT_GROUP_NAME = 'stream_warden';

export interface RedisStreamQueueOptions {
  /** Connection used for acks, group setup and depth queries. */
  redis: Redis;
  /** Dedicated connection for blocking XREADGROUP calls. */
  reader: Redis;
  log: Logger;
  consumer: string;
  streamKey?: string;
  group?: string;
  metrics?: CoreMetrics | undefined;
}

interface StreamEntry {
  readonly id: string;
  readonly fields: readonly string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Flattens an XREADGROUP reply (`[[stream, [[id, fields], ...]], ...]`
 * or null) into entries. Shapes that do not match are skipped.
 */
export function streamEntries(reply: unknown): StreamEntry[] {
  const out: StreamEntry[] = [];
  if (!Array.isArray(reply)) return out;

  for (const stream of reply) {
    if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
    for (const entry of stream[1]) {
      if (!Array.isArray(entry) || typeof entry[0] !== 'string') continue;
      // Already-acked entries come back from the PEL with null fields.
      out.push({ id: entry[0], fields: isStringArray(entry[1]) ? entry[1] : [] });
    }
  }
  return out;
}

export interface GroupBacklog {
  /** Entries delivered to the group but not yet acked. */
  readonly pending: number;
  /** Entries not yet delivered to the group; null when Redis cannot tell. */
  readonly lag: number | null;
}

/**
 * Picks one group out of an XINFO GROUPS reply
 * (`[[name, <name>, pending, <n>, ..., lag, <n|null>], ...]`).
 */
export function groupBacklog(reply: unknown, group: string): GroupBacklog | null {
  if (!Array.isArray(reply)) return null;

  for (const info of reply) {
    if (!Array.isArray(info)) continue;
    const fields = new Map<string, unknown>();
    for (let i = 0; i + 1 < info.length; i += 2) {
      const key: unknown = info[i];
      if (typeof key === 'string') fields.set(key, info[i + 1]);
    }
    if (fields.get('name') !== group) continue;

    const pending = fields.get('pending');
    const lag = fields.get('lag');
    return {
      pending: typeof pending === 'number' ? pending : 0,
      lag: typeof lag === 'number' ? lag : null,
    };
  }
  return null;
}

/**
 * Turns a flat [field, value, field, value, ...] stream entry into an Event.
 * `data` and `tags` travel JSON-encoded. Returns null when the entry fails
 * validation.
 */
export function parseStreamEntry(fields: readonly string[]): Event | null {
  const map = new Map<string, string>();
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) map.set(key, value);
  }

  let data: unknown = {};
  let tags: unknown = [];
  try {
    data = JSON.parse(map.get('data') ?? '{}');
    tags = JSON.parse(map.get('tags') ?? '[]');
  } catch {
    return null;
  }

  const parsed = eventSchema.safeParse({
    event_id: map.get('event_id'),
    event_type: map.get('event_type'),
    source: map.get('source'),
    timestamp: map.get('timestamp'),
    severity: map.get('severity'),
    data,
    tags,
  });
  return parsed.success ? parsed.data : null;
}

/**
 * EventQueue over a Redis Stream and consumer group.
 *
 * - The first reads drain this consumer's pending entries list (cursor
 *   "0"), recovering entries delivered before a crash but never acked.
 * - Afterwards XREADGROUP with BLOCK waits for new entries (cursor ">").
 * - `ack` is XACK only; entries stay in the stream for other groups.
 * - `depth` is the group's pending count plus its lag, or XLEN when the
 *   server does not report lag.
 * - Entries that fail validation are acked and dropped immediately;
 *   redelivering them could never succeed.
 *
 * Concurrent `receive` calls are serialized on the reader connection,
 * since a blocking read holds the connection until it returns.
 */
export class RedisStreamQueue implements EventQueue {
  private readonly redis: Redis;
  private readonly reader: Redis;
  private readonly log: Logger;
  private readonly consumer: string;
  private readonly streamKey: string;
  private readonly group: string;
  private readonly metrics: CoreMetrics | undefined;

  private pendingDrained = false;
  private readChain: Promise<unknown> = Promise.resolve();

  constructor(options: RedisStreamQueueOptions) {
    this.redis = options.redis;
    this.reader = options.reader;
    this.log = options.log;
    this.consumer = options.consumer;
    this.streamKey = options.streamKey ?? DEFAULT_STREAM_KEY;
    this.group = options.group ?? DEFAULT_GROUP_NAME;
    this.metrics = options.metrics;
  }

  /**
   * Ensures the consumer group exists on the stream.
   *
   * Start ID "$" = only deliver entries arriving after group creation;
   * historical replay is skipped. MKSTREAM creates the stream if needed.
   * BUSYGROUP (group already exists) is ignored.
   */
  async init(): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', this.streamKey, this.group, '$', 'MKSTREAM');
      this.log.info({ group: this.group, stream: this.streamKey }, 'Consumer group created (from $)');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        this.log.debug({ group: this.group }, 'Consumer group already exists');
        return;
      }
      throw err;
    }
  }

  receive(max: number, timeoutMs: number): Promise<QueuedEvent[]> {
    const next = this.readChain.then(() => this.read(max, timeoutMs));
    this.readChain = next.catch(() => undefined);
    return next;
  }

  async ack(receipt: string): Promise<void> {
    await this.redis.xack(this.streamKey, this.group, receipt);
  }

  async depth(): Promise<number> {
    const reply: unknown = await this.redis.xinfo('GROUPS', this.streamKey);
    const backlog = groupBacklog(reply, this.group);
    if (backlog !== null && backlog.lag !== null) return backlog.pending + backlog.lag;
    return this.redis.xlen(this.streamKey);
  }

  private async read(max: number, timeoutMs: number): Promise<QueuedEvent[]> {
    if (!this.pendingDrained) {
      const pending = await this.reader.xreadgroup(
        'GROUP', this.group, this.consumer,
        'COUNT', max,
        'STREAMS', this.streamKey,
        '0',
      );

      const recovered = this.collect(pending);
      if (recovered.entries > 0) {
        this.log.info({ count: recovered.entries }, 'Recovered pending entries');
        return recovered.events;
      }
      this.pendingDrained = true;
    }

    const fresh = await this.reader.xreadgroup(
      'GROUP', this.group, this.consumer,
      'COUNT', max,
      'BLOCK', timeoutMs,
      'STREAMS', this.streamKey,
      '>',
    );

    return this.collect(fresh).events;
  }

  private collect(reply: unknown): { events: QueuedEvent[]; entries: number } {
    const events: QueuedEvent[] = [];
    let entries = 0;

    for (const { id: streamId, fields } of streamEntries(reply)) {
      if (fields.length === 0) continue;
      entries++;

      const event = parseStreamEntry(fields);
      if (event === null) {
        this.metrics?.increment('events_rejected');
        this.log.warn({ streamId }, 'Malformed stream entry dropped');
        void this.ack(streamId).catch((err: unknown) => {
          this.log.error({ err, streamId }, 'Failed to ack malformed entry');
        });
        continue;
      }
      events.push({ receipt: streamId, event });
    }
    return { events, entries };
  }
}
