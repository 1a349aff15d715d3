export { RedisStreamQueue, parseStreamEntry, streamEntries, DEFAULT_STREAM_KEY, DEFAULT_GROUP_NAME } from './redis-stream-queue.js';
export type { RedisStreamQueueOptions } from './redis-stream-queue.js';
export { InMemoryEventQueue } from './in-memory-queue.js';
