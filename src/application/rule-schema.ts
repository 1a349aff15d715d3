import { z } from 'zod';

const channelEnum = z.enum(['email', 'slack', 'webhook']);

const severityEnum = z.enum(['low', 'medium', 'high', 'critical']);

const dataPath = z.string().regex(/^data(\.[A-Za-z0-9_]+)+$/, 'Must be a data.<field> path');

export const windowFiltersSchema = z.object({
  event_type: z.string().min(1).optional(),
  source: z.string().min(1).optional(),
  tags: z.array(z.string().min(1)).optional(),
}).strict();

/**
 * Shape of `window_spec`. Cross-field rules (sliding needs a slide no
 * larger than the size, session needs a gap) are enforced by the engine
 * at registration so API and reload paths report the same error.
 */
export const windowSpecSchema = z.object({
  kind: z.enum(['tumbling', 'sliding', 'session']),
  size_seconds: z.number().positive(),
  slide_seconds: z.number().positive().optional(),
  gap_seconds: z.number().positive().optional(),
  partition_by: z.union([z.enum(['type', 'source', 'severity']), dataPath]).optional(),
  value_field: dataPath.optional(),
  filters: windowFiltersSchema.optional(),
}).strict();

export type WindowSpecInput = z.infer<typeof windowSpecSchema>;

const ruleFields = {
  name: z.string().min(1).max(255),
  description: z.string().max(2048).nullable(),
  enabled: z.boolean(),
  severity: severityEnum,
  condition: z.string().min(1).max(2048),
  window_spec: windowSpecSchema,
  trigger: z.enum(['on_event', 'on_close', 'tick']),
  threshold: z.number().finite().nullable(),
  channels: z.array(channelEnum).min(1),
  escalation_channels: z.array(channelEnum),
  suppression_seconds: z.number().int().min(0),
  escalation_seconds: z.number().int().min(0),
  auto_resolve_seconds: z.number().int().min(0),
};

/**
 * Schema for POST /api/v1/rules (create).
 * `name`, `severity`, `condition`, `window_spec` and `channels` are required.
 */
export const createRuleSchema = z.object({
  ...ruleFields,
  description: ruleFields.description.optional().default(null),
  enabled: ruleFields.enabled.optional().default(true),
  trigger: ruleFields.trigger.optional().default('on_event'),
  threshold: ruleFields.threshold.optional().default(null),
  escalation_channels: ruleFields.escalation_channels.optional().default([]),
  suppression_seconds: ruleFields.suppression_seconds.optional().default(300),
  escalation_seconds: ruleFields.escalation_seconds.optional().default(0),
  auto_resolve_seconds: ruleFields.auto_resolve_seconds.optional().default(0),
});

export type CreateRuleBody = z.infer<typeof createRuleSchema>;

/**
 * Schema for PUT /api/v1/rules/:rule_id (full replace).
 * All fields required.
 */
export const updateRuleSchema = z.object(ruleFields);

export type UpdateRuleBody = z.infer<typeof updateRuleSchema>;

/**
 * Schema for PATCH /api/v1/rules/:rule_id (partial update).
 * All fields optional, at least one required.
 */
export const patchRuleSchema = z.object(ruleFields).partial().refine(
  (data) => Object.keys(data).length > 0,
  { message: 'At least one field must be provided' },
);

export type PatchRuleBody = z.infer<typeof patchRuleSchema>;
