import { z } from 'zod';

/**
 * Zod schema for an event read off the inbound queue.
 *
 * - `event_id` is assigned by the intake layer and must be a UUID.
 * - `timestamp` must be a valid ISO-8601 string (offsets allowed).
 * - `data` is open-ended to support heterogeneous event types.
 */
export const eventSchema = z.object({
  event_id: z.string().uuid(),
  event_type: z.string().min(1).max(255),
  source: z.string().min(1).max(255),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
  severity: z.enum(['low', 'medium', 'high', 'critical']).default('low'),
  data: z.record(z.string(), z.unknown()).default({}),
  tags: z.array(z.string().min(1)).default([]),
});

export type EventInput = z.input<typeof eventSchema>;
