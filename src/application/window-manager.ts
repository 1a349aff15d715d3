import type { Logger } from 'pino';
import type { Event } from '../domain/event.js';
import type { Window, WindowSnapshot, WindowSpec } from '../domain/window.js';
import { WINDOW_KINDS } from '../domain/window.js';
import { ConfigError } from '../domain/errors.js';
import { Aggregator } from './aggregator.js';
import { dataPathSegments, readPath } from './field-path.js';
import type { CoreMetrics } from './metrics.js';

export const DEFAULT_GRACE_MS = 5_000;
export const DEFAULT_RETENTION_MS = 60_000;
export const DEFAULT_ACTIVITY_RETENTION_MS = 3_600_000;

/** Partition assigned when a `data.` partition path is absent on the event. */
export const MISSING_PARTITION = '(none)';

const BUILTIN_PARTITIONS = new Set(['type', 'source', 'severity']);

export interface WindowManagerOptions {
  log: Logger;
  aggregator?: Aggregator;
  nowFn?: () => number;
  /** Time a closing window keeps accepting late events. */
  graceMs?: number;
  /** Time a closed window is kept before eviction. */
  retentionMs?: number;
  /** Idle partitions with no live window are forgotten after this long. */
  activityRetentionMs?: number;
  metrics?: CoreMetrics;
}

export interface FoldOutcome {
  /** Ids of the windows the event was folded into. */
  readonly folded: string[];
  /** Windows that had already seen this event id. */
  readonly duplicates: number;
  /** Windows that had already closed when the event arrived. */
  readonly late: number;
}

export interface SweepResult {
  readonly closing: string[];
  readonly closed: string[];
  readonly evicted: string[];
}

/** A window that needs evaluation, with why. */
export interface DueWindow {
  readonly snapshot: WindowSnapshot;
  /** New events were folded since the previous `takeDue()`. */
  readonly folded: boolean;
  /** The window entered `closing` since the previous `takeDue()`. */
  readonly closing: boolean;
}

// ─── Spec helpers ───────────────────────────────────────────────

function isPositive(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Throws ConfigError when the window spec cannot drive a window.
 */
export function validateWindowSpec(spec: WindowSpec): void {
  if (!WINDOW_KINDS.includes(spec.kind)) {
    throw new ConfigError(`Unsupported window kind "${String(spec.kind)}"`);
  }
  if (!isPositive(spec.size_seconds)) {
    throw new ConfigError('window_spec.size_seconds must be a positive number');
  }

  if (spec.kind === 'sliding') {
    if (!isPositive(spec.slide_seconds)) {
      throw new ConfigError('Sliding windows need a positive slide_seconds');
    }
    if (spec.slide_seconds > spec.size_seconds) {
      throw new ConfigError('slide_seconds must not exceed size_seconds');
    }
  }

  if (spec.kind === 'session' && !isPositive(spec.gap_seconds)) {
    throw new ConfigError('Session windows need a positive gap_seconds');
  }

  const partitionBy = spec.partition_by;
  if (partitionBy !== undefined && !BUILTIN_PARTITIONS.has(partitionBy) && dataPathSegments(partitionBy) === null) {
    throw new ConfigError(`partition_by must be type, source, severity or a data.<field> path, got "${partitionBy}"`);
  }
  if (spec.value_field !== undefined && dataPathSegments(spec.value_field) === null) {
    throw new ConfigError(`value_field must be a data.<field> path, got "${spec.value_field}"`);
  }
}

export function matchesFilters(spec: WindowSpec, event: Event): boolean {
  const filters = spec.filters;
  if (filters === undefined) return true;
  if (filters.event_type !== undefined && filters.event_type !== event.event_type) return false;
  if (filters.source !== undefined && filters.source !== event.source) return false;
  if (filters.tags !== undefined && !filters.tags.every((tag) => event.tags.includes(tag))) return false;
  return true;
}

export function partitionOf(spec: WindowSpec, event: Event): string {
  switch (spec.partition_by ?? 'type') {
    case 'type':
      return event.event_type;
    case 'source':
      return event.source;
    case 'severity':
      return event.severity;
  }

  const segments = dataPathSegments(spec.partition_by ?? '');
  if (segments === null) return MISSING_PARTITION;
  const lookup = readPath(event.data, segments);
  if (!lookup.found) return MISSING_PARTITION;
  const value = lookup.value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return MISSING_PARTITION;
}

export function valueOf(spec: WindowSpec, event: Event): number | null {
  if (spec.value_field === undefined) return null;
  const segments = dataPathSegments(spec.value_field);
  if (segments === null) return null;
  const lookup = readPath(event.data, segments);
  if (!lookup.found) return null;
  return typeof lookup.value === 'number' && Number.isFinite(lookup.value) ? lookup.value : null;
}

function partitionKey(ruleId: string, partition: string): string {
  return `${ruleId}:${partition}`;
}

// ─── Window manager ─────────────────────────────────────────────

/**
 * Owns every live window and its aggregation state.
 *
 * Windows are created lazily per `(rule, partition)` from the event
 * timestamp. Lifecycle transitions happen only in `sweep()`, one step per
 * window per sweep:
 *
 *   open → closing   wall clock reaches `end`, or the session gap elapses
 *   closing → closed grace period elapsed since the closing transition
 *   closed → evicted retention elapsed; aggregate freed
 *
 * Each call runs to completion on the event loop, so a fold and a
 * transition on the same window never interleave.
 */
export class WindowManager {
  private readonly log: Logger;
  private readonly aggregator: Aggregator;
  private readonly nowFn: () => number;
  private readonly graceMs: number;
  private readonly retentionMs: number;
  private readonly activityRetentionMs: number;
  private readonly metrics: CoreMetrics | undefined;

  private readonly specs: Map<string, WindowSpec> = new Map();
  private readonly windows: Map<string, Window> = new Map();
  private readonly lastEvents: Map<string, Event> = new Map();
  /** partition key → id of its latest session, kept until that session is evicted */
  private readonly sessions: Map<string, string> = new Map();
  /** rule id → partition → arrival time of the latest matching event */
  private readonly activityByRule: Map<string, Map<string, number>> = new Map();
  /** Partition keys seeded at registration; never expired. */
  private readonly pinned: Set<string> = new Set();
  private readonly dirty: Set<string> = new Set();
  private readonly newlyClosing: Set<string> = new Set();

  constructor(options: WindowManagerOptions) {
    this.log = options.log;
    this.aggregator = options.aggregator ?? new Aggregator();
    this.nowFn = options.nowFn ?? Date.now;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.activityRetentionMs = options.activityRetentionMs ?? DEFAULT_ACTIVITY_RETENTION_MS;
    this.metrics = options.metrics;
  }

  // ─── Rule ownership ───────────────────────────────────────────

  /** Starts windowing events for a rule. Replaces any previous spec. */
  track(ruleId: string, spec: WindowSpec): void {
    validateWindowSpec(spec);
    const previous = this.specs.get(ruleId);
    if (previous !== undefined && JSON.stringify(previous) !== JSON.stringify(spec)) {
      this.dropRuleWindows(ruleId);
    }
    this.specs.set(ruleId, spec);
  }

  /** Stops windowing for a rule and frees all of its windows. */
  untrack(ruleId: string): string[] {
    this.specs.delete(ruleId);
    return this.dropRuleWindows(ruleId);
  }

  isTracked(ruleId: string): boolean {
    return this.specs.has(ruleId);
  }

  /**
   * Registers a partition as active at the current time so that a rule
   * watching for absence notices one that never receives any event.
   */
  seedPartition(ruleId: string, partition: string): void {
    let activity = this.activityByRule.get(ruleId);
    if (activity === undefined) {
      activity = new Map();
      this.activityByRule.set(ruleId, activity);
    }
    if (!activity.has(partition)) activity.set(partition, this.nowFn());
    this.pinned.add(partitionKey(ruleId, partition));
  }

  // ─── Event path ───────────────────────────────────────────────

  fold(event: Event): FoldOutcome {
    const now = this.nowFn();
    const parsed = Date.parse(event.timestamp);
    const ts = Number.isFinite(parsed) ? parsed : now;

    const folded: string[] = [];
    let duplicates = 0;
    let late = 0;

    for (const [ruleId, spec] of this.specs) {
      if (!matchesFilters(spec, event)) continue;

      const partition = partitionOf(spec, event);
      this.touchActivity(ruleId, partition, now);

      const { targets, lateWindows } = this.assign(ruleId, spec, partition, ts, now);
      if (lateWindows > 0) {
        late += lateWindows;
        this.log.debug(
          { event_id: event.event_id, rule_id: ruleId, partition, timestamp: event.timestamp, windows: lateWindows },
          'Late event dropped',
        );
      }

      const value = valueOf(spec, event);
      for (const window of targets) {
        if (this.aggregator.fold(window, event, value)) {
          window.last_event_at = now;
          this.lastEvents.set(window.id, event);
          this.dirty.add(window.id);
          folded.push(window.id);
        } else {
          duplicates++;
        }
      }
    }

    if (folded.length > 0) this.metrics?.increment('events_folded');
    else if (duplicates > 0) this.metrics?.increment('events_duplicate');
    if (late > 0) this.metrics?.increment('late_dropped', late);
    this.updateGauge();

    return { folded, duplicates, late };
  }

  /** The windows the event belongs to, and how many of its windows had already closed. */
  private assign(
    ruleId: string,
    spec: WindowSpec,
    partition: string,
    ts: number,
    now: number,
  ): { targets: Window[]; lateWindows: number } {
    if (spec.kind === 'session') {
      const session = this.assignSession(ruleId, spec, partition, ts, now);
      return session === null ? { targets: [], lateWindows: 1 } : { targets: [session], lateWindows: 0 };
    }

    const sizeMs = spec.size_seconds * 1000;
    const slideMs = spec.kind === 'sliding' ? (spec.slide_seconds ?? spec.size_seconds) * 1000 : sizeMs;

    const targets: Window[] = [];
    let lateWindows = 0;
    for (let start = Math.floor(ts / slideMs) * slideMs; start > ts - sizeMs; start -= slideMs) {
      const window = this.windowFor(ruleId, spec, partition, start, start + sizeMs, now);
      if (window === null) lateWindows++;
      else targets.push(window);
    }
    return { targets, lateWindows };
  }

  private windowFor(
    ruleId: string,
    spec: WindowSpec,
    partition: string,
    start: number,
    end: number,
    now: number,
  ): Window | null {
    const id = `${partitionKey(ruleId, partition)}:${start}`;
    const existing = this.windows.get(id);
    if (existing !== undefined) return existing.state === 'closed' ? null : existing;
    if (end + this.graceMs <= now) return null;

    const window: Window = {
      id,
      kind: spec.kind,
      key: partitionKey(ruleId, partition),
      rule_id: ruleId,
      partition,
      start,
      end,
      state: 'open',
      last_event_at: now,
    };
    this.windows.set(id, window);
    return window;
  }

  private assignSession(ruleId: string, spec: WindowSpec, partition: string, ts: number, now: number): Window | null {
    const key = partitionKey(ruleId, partition);
    const currentId = this.sessions.get(key);
    const current = currentId === undefined ? undefined : this.windows.get(currentId);

    if (current !== undefined) {
      if (current.state === 'open') return current;
      // A closing session still takes stragglers; a closed one drops them.
      if (current.end !== null && ts <= current.end) return current.state === 'closing' ? current : null;
    }

    const id = `${key}:session:${ts}`;
    const existing = this.windows.get(id);
    if (existing !== undefined) return existing.state === 'closed' ? null : existing;

    const window: Window = {
      id,
      kind: spec.kind,
      key,
      rule_id: ruleId,
      partition,
      start: ts,
      end: null,
      state: 'open',
      last_event_at: now,
    };
    this.windows.set(id, window);
    this.sessions.set(key, id);
    return window;
  }

  private touchActivity(ruleId: string, partition: string, now: number): void {
    let activity = this.activityByRule.get(ruleId);
    if (activity === undefined) {
      activity = new Map();
      this.activityByRule.set(ruleId, activity);
    }
    activity.set(partition, now);
  }

  // ─── Sweeper ──────────────────────────────────────────────────

  /** Advances every window by at most one lifecycle step. */
  sweep(): SweepResult {
    const now = this.nowFn();
    const closing: string[] = [];
    const closed: string[] = [];
    const evicted: string[] = [];

    for (const window of [...this.windows.values()]) {
      switch (window.state) {
        case 'open': {
          const closeAt = this.closeAt(window);
          if (closeAt !== null && now >= closeAt) {
            window.state = 'closing';
            window.closing_at = now;
            if (window.kind === 'session') window.end = closeAt;
            this.newlyClosing.add(window.id);
            closing.push(window.id);
          }
          break;
        }
        case 'closing':
          if (now >= (window.closing_at ?? now) + this.graceMs) {
            window.state = 'closed';
            window.closed_at = now;
            closed.push(window.id);
          }
          break;
        case 'closed':
          if (now >= (window.closed_at ?? now) + this.retentionMs) {
            this.evict(window.id);
            evicted.push(window.id);
          }
          break;
      }
    }

    this.expireActivity(now);
    this.updateGauge();

    if (closing.length + closed.length + evicted.length > 0) {
      this.log.debug(
        { closing: closing.length, closed: closed.length, evicted: evicted.length },
        'Window sweep',
      );
    }
    return { closing, closed, evicted };
  }

  /** Wall-clock time at which an open window starts closing, or null when unknown. */
  private closeAt(window: Window): number | null {
    if (window.kind !== 'session') return window.end;
    const spec = this.specs.get(window.rule_id);
    if (spec === undefined) return null;
    const gapMs = (spec.gap_seconds ?? 0) * 1000;
    return Math.min(window.last_event_at + gapMs, window.start + spec.size_seconds * 1000);
  }

  private evict(windowId: string): void {
    const window = this.windows.get(windowId);
    if (window !== undefined && this.sessions.get(window.key) === windowId) this.sessions.delete(window.key);
    this.windows.delete(windowId);
    this.lastEvents.delete(windowId);
    this.dirty.delete(windowId);
    this.newlyClosing.delete(windowId);
    this.aggregator.evict(windowId);
  }

  private expireActivity(now: number): void {
    const live = new Set<string>();
    for (const window of this.windows.values()) live.add(window.key);

    for (const [ruleId, activity] of this.activityByRule) {
      for (const [partition, lastAt] of activity) {
        const key = partitionKey(ruleId, partition);
        if (this.pinned.has(key) || live.has(key)) continue;
        if (now - lastAt >= this.activityRetentionMs) activity.delete(partition);
      }
      if (activity.size === 0) this.activityByRule.delete(ruleId);
    }
  }

  private dropRuleWindows(ruleId: string): string[] {
    const dropped: string[] = [];
    for (const window of [...this.windows.values()]) {
      if (window.rule_id !== ruleId) continue;
      this.evict(window.id);
      dropped.push(window.id);
    }
    for (const [key, id] of [...this.sessions]) {
      if (!this.windows.has(id)) this.sessions.delete(key);
    }
    for (const key of [...this.pinned]) {
      if (key.startsWith(`${ruleId}:`)) this.pinned.delete(key);
    }
    this.activityByRule.delete(ruleId);
    this.updateGauge();
    return dropped;
  }

  private updateGauge(): void {
    if (this.metrics === undefined) return;
    let open = 0;
    for (const window of this.windows.values()) {
      if (window.state !== 'closed') open++;
    }
    this.metrics.set('windows_open', open);
  }

  // ─── Reads ────────────────────────────────────────────────────

  /**
   * Windows folded into or newly closing since the previous call.
   * Clears both sets.
   */
  takeDue(): DueWindow[] {
    const ids = new Set<string>([...this.dirty, ...this.newlyClosing]);
    const due: DueWindow[] = [];
    for (const id of ids) {
      const snapshot = this.snapshot(id);
      if (snapshot === null) continue;
      due.push({ snapshot, folded: this.dirty.has(id), closing: this.newlyClosing.has(id) });
    }
    this.dirty.clear();
    this.newlyClosing.clear();
    return due;
  }

  snapshot(windowId: string): WindowSnapshot | null {
    const window = this.windows.get(windowId);
    if (window === undefined) return null;
    return Object.freeze({
      window: Object.freeze({ ...window }),
      aggregation: this.aggregator.snapshot(window),
      last_event: this.lastEvents.get(windowId) ?? null,
    });
  }

  /** Partition → arrival time of the latest matching event. */
  activity(ruleId: string): ReadonlyMap<string, number> {
    return new Map(this.activityByRule.get(ruleId) ?? []);
  }

  /** The latest window of a partition that is not yet closed. */
  currentWindow(ruleId: string, partition: string): WindowSnapshot | null {
    const key = partitionKey(ruleId, partition);
    let latest: Window | undefined;
    for (const window of this.windows.values()) {
      if (window.key !== key || window.state === 'closed') continue;
      if (latest === undefined || window.start > latest.start) latest = window;
    }
    return latest === undefined ? null : this.snapshot(latest.id);
  }

  /** Snapshots of every window that is not yet closed, oldest first. */
  openWindows(): WindowSnapshot[] {
    const out: WindowSnapshot[] = [];
    for (const window of this.windows.values()) {
      if (window.state === 'closed') continue;
      const snapshot = this.snapshot(window.id);
      if (snapshot !== null) out.push(snapshot);
    }
    return out.sort((a, b) => a.window.start - b.window.start);
  }

  get size(): number {
    return this.windows.size;
  }
}
