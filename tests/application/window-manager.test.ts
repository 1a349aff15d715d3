import { describe, it, expect, beforeEach } from 'vitest';
import {
  WindowManager,
  validateWindowSpec,
  partitionOf,
  valueOf,
  matchesFilters,
  MISSING_PARTITION,
  DEFAULT_GRACE_MS,
  DEFAULT_RETENTION_MS,
} from '../../src/application/window-manager.js';
import { CoreMetrics } from '../../src/application/metrics.js';
import { ConfigError } from '../../src/domain/errors.js';
import type { WindowSpec } from '../../src/domain/window.js';
import { FIXED_NOW, fakeClock, fakeLogger, makeEvent } from '../helpers.js';

const TUMBLING: WindowSpec = { kind: 'tumbling', size_seconds: 60, value_field: 'data.latency_ms' };

function at(ms: number): string {
  return new Date(ms).toISOString();
}

describe('validateWindowSpec', () => {
  it.each<[string, WindowSpec]>([
    ['non-positive size', { kind: 'tumbling', size_seconds: 0 }],
    ['sliding without slide', { kind: 'sliding', size_seconds: 60 }],
    ['slide larger than size', { kind: 'sliding', size_seconds: 60, slide_seconds: 90 }],
    ['session without gap', { kind: 'session', size_seconds: 60 }],
    ['unknown partition', { kind: 'tumbling', size_seconds: 60, partition_by: 'user' }],
    ['value field outside data', { kind: 'tumbling', size_seconds: 60, value_field: 'latency' }],
  ])('rejects %s', (_label, spec) => {
    expect(() => validateWindowSpec(spec)).toThrow(ConfigError);
  });

  it('accepts a sliding window partitioned by a data path', () => {
    expect(() => validateWindowSpec({
      kind: 'sliding',
      size_seconds: 60,
      slide_seconds: 10,
      partition_by: 'data.user_id',
    })).not.toThrow();
  });
});

describe('spec helpers', () => {
  it('partitions by type by default', () => {
    expect(partitionOf(TUMBLING, makeEvent({ event_type: 'login' }))).toBe('login');
  });

  it('partitions by a data path, falling back when absent', () => {
    const spec: WindowSpec = { kind: 'tumbling', size_seconds: 60, partition_by: 'data.user.id' };
    expect(partitionOf(spec, makeEvent({ data: { user: { id: 42 } } }))).toBe('42');
    expect(partitionOf(spec, makeEvent({ data: {} }))).toBe(MISSING_PARTITION);
  });

  it('reads only finite numeric values', () => {
    expect(valueOf(TUMBLING, makeEvent({ data: { latency_ms: 120 } }))).toBe(120);
    expect(valueOf(TUMBLING, makeEvent({ data: { latency_ms: '120' } }))).toBeNull();
    expect(valueOf({ kind: 'tumbling', size_seconds: 60 }, makeEvent({ data: { latency_ms: 1 } }))).toBeNull();
  });

  it('requires every listed tag', () => {
    const spec: WindowSpec = { kind: 'tumbling', size_seconds: 60, filters: { tags: ['prod', 'eu'] } };
    expect(matchesFilters(spec, makeEvent({ tags: ['prod', 'eu', 'canary'] }))).toBe(true);
    expect(matchesFilters(spec, makeEvent({ tags: ['prod'] }))).toBe(false);
  });
});

describe('WindowManager', () => {
  let clock: ReturnType<typeof fakeClock>;
  let metrics: CoreMetrics;
  let windows: WindowManager;

  beforeEach(() => {
    clock = fakeClock();
    metrics = new CoreMetrics(clock.now);
    windows = new WindowManager({ log: fakeLogger(), nowFn: clock.now, metrics });
  });

  // ── Tumbling ────────────────────────────────────────────

  it('aggregates events into one tumbling window per partition', () => {
    windows.track('rule-1', TUMBLING);
    for (const latency of [100, 200, 300]) {
      windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000), data: { latency_ms: latency } }));
    }
    windows.fold(makeEvent({ event_type: 'login', timestamp: at(FIXED_NOW + 2_000) }));

    const snap = windows.snapshot(`rule-1:api.request:${FIXED_NOW}`);
    expect(snap?.aggregation).toMatchObject({ count: 3, sum: 600, min: 100, max: 300, avg: 200 });
    expect(snap?.window.end).toBe(FIXED_NOW + 60_000);
    expect(windows.size).toBe(2);
    expect(metrics.get('windows_open')).toBe(2);
    expect(metrics.get('events_folded')).toBe(4);
  });

  it('walks open → closing → closed → evicted, one step per sweep', () => {
    windows.track('rule-1', TUMBLING);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));
    const id = `rule-1:api.request:${FIXED_NOW}`;

    clock.set(FIXED_NOW + 59_999);
    expect(windows.sweep().closing).toEqual([]);

    clock.set(FIXED_NOW + 60_000);
    expect(windows.sweep()).toEqual({ closing: [id], closed: [], evicted: [] });
    expect(windows.sweep().closed).toEqual([]);

    clock.advance(DEFAULT_GRACE_MS);
    expect(windows.sweep().closed).toEqual([id]);
    expect(windows.snapshot(id)?.window.state).toBe('closed');
    expect(metrics.get('windows_open')).toBe(0);

    clock.advance(DEFAULT_RETENTION_MS);
    expect(windows.sweep().evicted).toEqual([id]);
    expect(windows.snapshot(id)).toBeNull();
    expect(windows.size).toBe(0);
  });

  it('accepts stragglers during the grace period', () => {
    windows.track('rule-1', TUMBLING);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));
    clock.set(FIXED_NOW + 60_000);
    windows.sweep();

    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 30_000) }));
    expect(outcome.folded).toEqual([`rule-1:api.request:${FIXED_NOW}`]);
    expect(outcome.late).toBe(0);
  });

  it('drops events for a closed window and counts them as late', () => {
    windows.track('rule-1', TUMBLING);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));
    clock.set(FIXED_NOW + 60_000);
    windows.sweep();
    clock.advance(DEFAULT_GRACE_MS);
    windows.sweep();

    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 30_000) }));
    expect(outcome).toEqual({ folded: [], duplicates: 0, late: 1 });
    expect(metrics.get('late_dropped')).toBe(1);
    expect(windows.snapshot(`rule-1:api.request:${FIXED_NOW}`)?.aggregation.count).toBe(1);
  });

  it('never opens a window that would already be past its grace period', () => {
    windows.track('rule-1', TUMBLING);
    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW - 10 * 60_000) }));

    expect(outcome.late).toBe(1);
    expect(windows.size).toBe(0);
  });

  it('absorbs redelivered events', () => {
    windows.track('rule-1', TUMBLING);
    const event = makeEvent({ timestamp: at(FIXED_NOW + 1_000) });
    windows.fold(event);
    const outcome = windows.fold(event);

    expect(outcome).toEqual({ folded: [], duplicates: 1, late: 0 });
    expect(metrics.get('events_duplicate')).toBe(1);
    expect(metrics.get('events_folded')).toBe(1);
  });

  it('ignores events that do not pass the filters', () => {
    windows.track('rule-1', { ...TUMBLING, filters: { source: 'billing' } });
    const outcome = windows.fold(makeEvent({ source: 'gateway' }));

    expect(outcome).toEqual({ folded: [], duplicates: 0, late: 0 });
    expect(windows.activity('rule-1').size).toBe(0);
  });

  it('keeps per-window counts equal to the events folded across contiguous windows', () => {
    const retained = new WindowManager({ log: fakeLogger(), nowFn: clock.now, metrics, retentionMs: 600_000 });
    retained.track('rule-1', { kind: 'tumbling', size_seconds: 60 });

    for (let k = 0; k < 3; k++) {
      for (let j = 0; j < 10; j++) {
        const ts = FIXED_NOW + k * 60_000 + j * 6_000;
        clock.set(ts);
        retained.sweep();
        retained.fold(makeEvent({ timestamp: at(ts) }));
        // straggler for the first window while it is closing
        if (k === 1 && j === 0) retained.fold(makeEvent({ timestamp: at(FIXED_NOW + 59_000) }));
      }
    }
    // past the first window's grace period
    const late = retained.fold(makeEvent({ timestamp: at(FIXED_NOW + 30_000) }));

    const counts = [0, 1, 2].map(
      (k) => retained.snapshot(`rule-1:api.request:${FIXED_NOW + k * 60_000}`)?.aggregation.count,
    );
    expect(counts).toEqual([11, 10, 10]);
    expect(metrics.get('events_folded')).toBe(31);
    expect(late.late).toBe(1);
    expect(metrics.get('late_dropped')).toBe(1);
  });

  // ── Sliding ─────────────────────────────────────────────

  it('folds an event into every overlapping sliding window', () => {
    windows.track('rule-1', { kind: 'sliding', size_seconds: 60, slide_seconds: 30 });
    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 10_000) }));

    expect(outcome.folded).toEqual([
      `rule-1:api.request:${FIXED_NOW}`,
      `rule-1:api.request:${FIXED_NOW - 30_000}`,
    ]);
  });

  it('counts the closed overlapping window when a sliding event is partly late', () => {
    windows.track('rule-1', { kind: 'sliding', size_seconds: 60, slide_seconds: 30 });
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));
    clock.set(FIXED_NOW + 60_000);
    windows.sweep();
    clock.advance(DEFAULT_GRACE_MS);
    windows.sweep();
    expect(windows.snapshot(`rule-1:api.request:${FIXED_NOW}`)?.window.state).toBe('closed');

    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 45_000) }));
    expect(outcome).toEqual({
      folded: [`rule-1:api.request:${FIXED_NOW + 30_000}`],
      duplicates: 0,
      late: 1,
    });
    expect(metrics.get('late_dropped')).toBe(1);
    expect(windows.snapshot(`rule-1:api.request:${FIXED_NOW}`)?.aggregation.count).toBe(1);
  });

  // ── Session ─────────────────────────────────────────────

  it('extends a session until the gap elapses, then starts a new one', () => {
    windows.track('rule-1', { kind: 'session', size_seconds: 300, gap_seconds: 30 });
    const firstId = `rule-1:api.request:session:${FIXED_NOW}`;

    windows.fold(makeEvent({ timestamp: at(FIXED_NOW) }));
    clock.advance(10_000);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 10_000) }));
    expect(windows.snapshot(firstId)?.aggregation.count).toBe(2);

    clock.set(FIXED_NOW + 40_000);
    expect(windows.sweep().closing).toEqual([firstId]);
    expect(windows.snapshot(firstId)?.window.end).toBe(FIXED_NOW + 40_000);

    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 45_000) }));
    expect(outcome.folded).toEqual([`rule-1:api.request:session:${FIXED_NOW + 45_000}`]);
  });

  it('takes stragglers while a session is closing and drops them once it is closed', () => {
    windows.track('rule-1', { kind: 'session', size_seconds: 300, gap_seconds: 30 });
    const firstId = `rule-1:api.request:session:${FIXED_NOW}`;
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW) }));

    clock.set(FIXED_NOW + 30_000);
    expect(windows.sweep().closing).toEqual([firstId]);
    expect(windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 20_000) })).folded).toEqual([firstId]);

    clock.advance(DEFAULT_GRACE_MS);
    expect(windows.sweep().closed).toEqual([firstId]);

    const outcome = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 10_000) }));
    expect(outcome).toEqual({ folded: [], duplicates: 0, late: 1 });
    expect(metrics.get('late_dropped')).toBe(1);
    expect(windows.size).toBe(1);
    expect(windows.snapshot(firstId)?.aggregation.count).toBe(2);

    const next = windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 40_000) }));
    expect(next.folded).toEqual([`rule-1:api.request:session:${FIXED_NOW + 40_000}`]);
  });

  it('caps a session at size_seconds', () => {
    windows.track('rule-1', { kind: 'session', size_seconds: 20, gap_seconds: 30 });
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW) }));

    clock.set(FIXED_NOW + 20_000);
    expect(windows.sweep().closing).toEqual([`rule-1:api.request:session:${FIXED_NOW}`]);
  });

  // ── Ownership ───────────────────────────────────────────

  it('drops a rule\'s windows when its spec changes', () => {
    windows.track('rule-1', TUMBLING);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));

    windows.track('rule-1', TUMBLING);
    expect(windows.size).toBe(1);

    windows.track('rule-1', { ...TUMBLING, size_seconds: 120 });
    expect(windows.size).toBe(0);
  });

  it('frees everything on untrack', () => {
    windows.track('rule-1', TUMBLING);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));

    expect(windows.untrack('rule-1')).toEqual([`rule-1:api.request:${FIXED_NOW}`]);
    expect(windows.isTracked('rule-1')).toBe(false);
    expect(windows.size).toBe(0);
  });

  it('reports folded and newly closing windows once via takeDue', () => {
    windows.track('rule-1', TUMBLING);
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));

    const due = windows.takeDue();
    expect(due).toHaveLength(1);
    expect(due[0]).toMatchObject({ folded: true, closing: false });
    expect(windows.takeDue()).toEqual([]);

    clock.set(FIXED_NOW + 60_000);
    windows.sweep();
    expect(windows.takeDue()[0]).toMatchObject({ folded: false, closing: true });
  });

  it('expires idle activity but keeps seeded partitions', () => {
    const short = new WindowManager({ log: fakeLogger(), nowFn: clock.now, activityRetentionMs: 1_000, retentionMs: 0, graceMs: 0 });
    short.track('rule-1', TUMBLING);
    short.seedPartition('rule-1', 'heartbeat');
    short.fold(makeEvent({ timestamp: at(FIXED_NOW + 1_000) }));

    // close, then evict the only window
    clock.set(FIXED_NOW + 60_000);
    short.sweep();
    short.sweep();
    short.sweep();
    expect(short.size).toBe(0);

    clock.advance(1_000);
    short.sweep();
    expect([...short.activity('rule-1').keys()]).toEqual(['heartbeat']);
  });

  it('returns the latest unclosed window of a partition', () => {
    windows.track('rule-1', { kind: 'sliding', size_seconds: 60, slide_seconds: 30 });
    windows.fold(makeEvent({ timestamp: at(FIXED_NOW + 10_000) }));

    expect(windows.currentWindow('rule-1', 'api.request')?.window.start).toBe(FIXED_NOW);
    expect(windows.openWindows().map((s) => s.window.start)).toEqual([FIXED_NOW - 30_000, FIXED_NOW]);
  });
});
