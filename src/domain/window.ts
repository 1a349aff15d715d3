import type { Event } from './event.js';

/** Supported window kinds. */
export type WindowKind = 'tumbling' | 'sliding' | 'session';

export const WINDOW_KINDS: readonly WindowKind[] = ['tumbling', 'sliding', 'session'];

/** Lifecycle states of a live window. Evicted windows no longer exist. */
export type WindowState = 'open' | 'closing' | 'closed';

/**
 * How a rule slices the stream into windows.
 *
 * `partition_by` is `type` (default), `source`, `severity` or a `data.` path,
 * giving each entity its own window (e.g. per-user error rate).
 * `value_field` names the numeric `data.` path folded into sum/min/max/avg
 * and percentiles; without it only counts are tracked.
 */
export interface WindowSpec {
  readonly kind: WindowKind;
  readonly size_seconds: number;
  readonly slide_seconds?: number | undefined;
  readonly gap_seconds?: number | undefined;
  readonly partition_by?: string | undefined;
  readonly value_field?: string | undefined;
  readonly filters?: WindowFilters | undefined;
}

export interface WindowFilters {
  readonly event_type?: string | undefined;
  readonly source?: string | undefined;
  readonly tags?: readonly string[] | undefined;
}

/**
 * A time-bounded aggregation window.
 *
 * Times are epoch milliseconds. `end` is null while a session window is
 * still open; it is fixed when the session starts closing.
 */
export interface Window {
  readonly id: string;
  readonly kind: WindowKind;
  readonly key: string;
  readonly rule_id: string;
  readonly partition: string;
  readonly start: number;
  end: number | null;
  state: WindowState;
  last_event_at: number;
  closing_at?: number;
  closed_at?: number;
}

/** Immutable aggregate snapshot for one window. */
export interface AggregationResult {
  readonly window_id: string;
  readonly count: number;
  readonly value_count: number;
  readonly sum: number;
  readonly min: number | null;
  readonly max: number | null;
  readonly avg: number | null;
  readonly percentiles: Readonly<Record<number, number>>;
  /** True once the percentile reservoir has been downsampled. */
  readonly approximate: boolean;
}

/** What the rule engine reads: a frozen copy of the window plus its aggregate. */
export interface WindowSnapshot {
  readonly window: Readonly<Window>;
  readonly aggregation: AggregationResult;
  readonly last_event: Event | null;
}

export function emptyAggregation(windowId: string): AggregationResult {
  return {
    window_id: windowId,
    count: 0,
    value_count: 0,
    sum: 0,
    min: null,
    max: null,
    avg: null,
    percentiles: {},
    approximate: false,
  };
}
