// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS — Event Fixtures and a Manual Clock
// ═══════════════════════════════════════════════════════════════════════════════

import type { EventPayload, MemoryEvent, ScoredEvent } from '../types.js';

/** 2026-01-15 10:00 local time, in epoch seconds */
export const T0 = new Date(2026, 0, 15, 10, 0, 0).getTime() / 1000;

export const HOUR = 3600;
export const DAY = 24 * HOUR;

export function makeEvent(
  seq: number,
  payload: EventPayload,
  timestamp: number = T0,
  kind: string = payload.type
): MemoryEvent {
  return { seq, kind, payload, timestamp };
}

export function chatEvent(seq: number, text: string, timestamp: number = T0, who = 'user'): MemoryEvent {
  return makeEvent(seq, { type: 'chat', who, text }, timestamp);
}

export function scored(event: MemoryEvent, importance: number): ScoredEvent {
  return { event, importance };
}

export interface ManualClock {
  now: number;
  read: () => number;
}

export function manualClock(start: number = T0): ManualClock {
  const clock: ManualClock = {
    now: start,
    read: () => clock.now,
  };
  return clock;
}
