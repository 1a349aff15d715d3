import { z } from 'zod';

/** Query string for GET /api/v1/alerts. */
export const listAlertsQuerySchema = z.object({
  status: z.enum(['active', 'acknowledged', 'resolved']).optional(),
  rule_id: z.string().min(1).optional(),
});

/** Body for the acknowledge and resolve actions. */
export const alertActionSchema = z.object({
  actor: z.string().min(1).max(255),
});

export type ListAlertsQuery = z.infer<typeof listAlertsQuerySchema>;
export type AlertActionBody = z.infer<typeof alertActionSchema>;
