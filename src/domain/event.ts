/**
 * Core domain types for the event model consumed by the alerting core.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

/** Severity levels shared by events, rules and alerts. */
export type Severity = 'low' | 'medium' | 'high' | 'critical';

export const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high', 'critical'];

/** Free-form key/value payload attached to every event. */
export type EventData = Record<string, unknown>;

/**
 * Canonical Event entity.
 *
 * `event_id` is assigned by the intake layer; redelivery of the same
 * id must be tolerated by every consumer.
 */
export interface Event {
  readonly event_id: string;
  readonly event_type: string;
  readonly source: string;
  readonly timestamp: string; // ISO-8601
  readonly severity: Severity;
  readonly data: EventData;
  readonly tags: readonly string[];
}
