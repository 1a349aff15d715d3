import type { Event } from '../domain/event.js';
import type { AggregationResult, Window } from '../domain/window.js';

export const DEFAULT_MAX_SAMPLES = 10_000;
export const DEFAULT_MAX_SEEN_IDS = 50_000;
export const DEFAULT_PERCENTILES: readonly number[] = [50, 90, 95, 99];

export interface AggregatorOptions {
  /** Reservoir cap per window; percentiles are approximate beyond it. */
  maxSamples?: number;
  /** Cap on remembered event ids per window, oldest dropped first. */
  maxSeenIds?: number;
  percentiles?: readonly number[];
}

/** Mutable running totals for one window. */
interface AggregationState {
  count: number;
  value_count: number;
  sum: number;
  min: number | null;
  max: number | null;
  samples: number[];
  /** Only every `stride`-th offered value enters the reservoir. */
  stride: number;
  offered: number;
  approximate: boolean;
  seen: Set<string>;
}

function newState(): AggregationState {
  return {
    count: 0,
    value_count: 0,
    sum: 0,
    min: null,
    max: null,
    samples: [],
    stride: 1,
    offered: 0,
    approximate: false,
    seen: new Set<string>(),
  };
}

/** Linear interpolation between the two closest ranks of a sorted array. */
export function percentile(sorted: readonly number[], p: number): number | null {
  if (sorted.length === 0) return null;
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return low + (high - low) * (rank - lo);
}

/**
 * Incremental per-window statistics.
 *
 * count/sum/min/max/avg are O(1) per event. Percentiles come from a
 * reservoir that is decimated deterministically once it exceeds
 * `maxSamples`: every other sample is dropped and the sampling stride
 * doubles, so the same input always yields the same snapshot.
 *
 * `fold` is idempotent per `(window.id, event.event_id)` while the id is
 * still remembered; the window manager calls `evict` when it frees a window.
 */
export class Aggregator {
  private readonly states: Map<string, AggregationState> = new Map();
  private readonly maxSamples: number;
  private readonly maxSeenIds: number;
  private readonly percentiles: readonly number[];

  constructor(options: AggregatorOptions = {}) {
    this.maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
    this.maxSeenIds = options.maxSeenIds ?? DEFAULT_MAX_SEEN_IDS;
    this.percentiles = options.percentiles ?? DEFAULT_PERCENTILES;

    if (!Number.isInteger(this.maxSamples) || this.maxSamples < 2) {
      throw new Error('maxSamples must be an integer >= 2');
    }
    if (!Number.isInteger(this.maxSeenIds) || this.maxSeenIds < 1) {
      throw new Error('maxSeenIds must be a positive integer');
    }
  }

  /**
   * Folds an event into a window.
   *
   * `value` is the numeric field selected by the window spec, or null when
   * the window spec tracks counts only or the event does not carry the field.
   * Returns false when the event was already folded into this window.
   */
  fold(window: Window, event: Event, value: number | null): boolean {
    let state = this.states.get(window.id);
    if (state === undefined) {
      state = newState();
      this.states.set(window.id, state);
    }

    if (state.seen.has(event.event_id)) return false;
    state.seen.add(event.event_id);
    if (state.seen.size > this.maxSeenIds) {
      const oldest = state.seen.values().next();
      if (oldest.done !== true) state.seen.delete(oldest.value);
    }

    state.count++;
    if (value !== null && Number.isFinite(value)) {
      state.value_count++;
      state.sum += value;
      state.min = state.min === null ? value : Math.min(state.min, value);
      state.max = state.max === null ? value : Math.max(state.max, value);
      this.sample(state, value);
    }
    return true;
  }

  /** Immutable snapshot of the window's current aggregate. */
  snapshot(window: Pick<Window, 'id'>): AggregationResult {
    const state = this.states.get(window.id) ?? newState();
    const sorted = [...state.samples].sort((a, b) => a - b);

    const percentiles: Record<number, number> = {};
    for (const p of this.percentiles) {
      const v = percentile(sorted, p);
      if (v !== null) percentiles[p] = v;
    }

    return Object.freeze({
      window_id: window.id,
      count: state.count,
      value_count: state.value_count,
      sum: state.sum,
      min: state.min,
      max: state.max,
      avg: state.value_count > 0 ? state.sum / state.value_count : null,
      percentiles: Object.freeze(percentiles),
      approximate: state.approximate,
    });
  }

  /** True when the event id is still remembered for the window. */
  hasSeen(windowId: string, eventId: string): boolean {
    return this.states.get(windowId)?.seen.has(eventId) ?? false;
  }

  /** Frees all state held for a window, including its seen-id set. */
  evict(windowId: string): void {
    this.states.delete(windowId);
  }

  /** Number of windows with live aggregation state. */
  get size(): number {
    return this.states.size;
  }

  /** Reservoir size for a window (for tests and diagnostics). */
  sampleCount(windowId: string): number {
    return this.states.get(windowId)?.samples.length ?? 0;
  }

  private sample(state: AggregationState, value: number): void {
    state.offered++;
    if (state.offered % state.stride !== 0) return;

    state.samples.push(value);
    if (state.samples.length > this.maxSamples) {
      state.samples = state.samples.filter((_, i) => i % 2 === 0);
      state.stride *= 2;
      state.approximate = true;
    }
  }
}
