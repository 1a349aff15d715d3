import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Event } from '../src/domain/event.js';
import type { AlertRule } from '../src/domain/rule.js';
import type { Alert } from '../src/domain/alert.js';

let counter = 0;

/** Fixed "now" shared by clock-driven tests. */
export const FIXED_NOW = Date.parse('2026-02-18T12:00:00.000Z');

/** Logger whose methods are spies; `child` returns the same logger. */
export function fakeLogger(): Logger {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Manually advanced clock for `nowFn` options. */
export function fakeClock(start: number = FIXED_NOW) {
  let now = start;
  return {
    now: () => now,
    set: (ms: number) => { now = ms; },
    advance: (ms: number) => { now += ms; },
  };
}

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<Event> = {}): Event {
  counter++;
  return {
    event_id: overrides.event_id ?? `00000000-0000-4000-8000-${String(counter).padStart(12, '0')}`,
    event_type: overrides.event_type ?? 'api.request',
    source: overrides.source ?? 'gateway',
    timestamp: overrides.timestamp ?? new Date(FIXED_NOW).toISOString(),
    severity: overrides.severity ?? 'low',
    data: overrides.data ?? {},
    tags: overrides.tags ?? [],
  };
}

/** A valid tumbling-window rule; override any field. */
export function makeRule(overrides: Partial<AlertRule> = {}): AlertRule {
  return {
    id: 'rule-1',
    name: 'Request burst',
    description: null,
    condition: 'count > 10',
    window_spec: { kind: 'tumbling', size_seconds: 60 },
    trigger: 'on_event',
    threshold: null,
    severity: 'high',
    channels: ['slack'],
    escalation_channels: [],
    suppression_seconds: 0,
    escalation_seconds: 0,
    auto_resolve_seconds: 0,
    enabled: true,
    ...overrides,
  };
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  const at = new Date(FIXED_NOW).toISOString();
  return {
    id: 'alert-1',
    rule_id: 'rule-1',
    rule_name: 'Request burst',
    severity: 'high',
    status: 'active',
    acknowledged: false,
    acknowledged_by: null,
    created_at: at,
    updated_at: at,
    last_fired_at: at,
    last_matched_at: at,
    fire_count: 1,
    notified_count: 0,
    escalated: false,
    escalated_at: null,
    delivery_failed: false,
    resolved_at: null,
    resolved_by: null,
    context: {},
    ...overrides,
  };
}
