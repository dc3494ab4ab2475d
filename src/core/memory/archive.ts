// ═══════════════════════════════════════════════════════════════════════════════
// ARCHIVE — Day Buckets for Events That Aged Out of the Important Layer
// ═══════════════════════════════════════════════════════════════════════════════

import { ARCHIVE_FRAGMENT_LENGTH, type DayBucket, type MemoryEvent } from './types.js';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Local calendar date (YYYY-MM-DD) of a timestamp in epoch seconds.
 */
export function toDateKey(timestampSeconds: number): string {
  const date = new Date(timestampSeconds * 1000);
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

export function isDateKey(value: string): boolean {
  return DATE_KEY_PATTERN.test(value);
}

/**
 * The rolling-summary fragment for an archived event, or null for kinds that
 * do not contribute to the summary.
 */
export function summaryFragment(event: MemoryEvent): string | null {
  if (event.payload.type !== 'chat') return null;
  return `${event.payload.who}: ${event.payload.text.slice(0, ARCHIVE_FRAGMENT_LENGTH)}`;
}

interface BucketState {
  bucket: DayBucket;
  fragments: Set<string>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ARCHIVE LAYER
// ─────────────────────────────────────────────────────────────────────────────────

export class ArchiveLayer {
  private buckets: Map<string, BucketState> = new Map();
  private archivedCount = 0;

  get dayCount(): number {
    return this.buckets.size;
  }

  get eventCount(): number {
    return this.archivedCount;
  }

  /**
   * File an event under its local date. Returns the bucket's date key.
   */
  archive(event: MemoryEvent): string {
    const date = toDateKey(event.timestamp);

    let state = this.buckets.get(date);
    if (!state) {
      state = {
        bucket: {
          date,
          eventCount: 0,
          firstTimestamp: event.timestamp,
          rawEvents: [],
          rollingSummary: '',
        },
        fragments: new Set(),
      };
      this.buckets.set(date, state);
    }

    const { bucket, fragments } = state;
    bucket.rawEvents.push(event);
    bucket.eventCount++;
    this.archivedCount++;

    // Exact fragments only, so "me: hi" never hides behind "me: hi there"
    const fragment = summaryFragment(event);
    if (fragment !== null && !fragments.has(fragment)) {
      fragments.add(fragment);
      bucket.rollingSummary += `${fragment}; `;
    }

    return date;
  }

  /**
   * Copy of the bucket for a YYYY-MM-DD date, or null.
   */
  get(date: string): DayBucket | null {
    if (!isDateKey(date)) return null;
    const state = this.buckets.get(date);
    if (!state) return null;
    return { ...state.bucket, rawEvents: [...state.bucket.rawEvents] };
  }

  /**
   * Archived dates, newest first.
   */
  dates(limit?: number): string[] {
    const sorted = [...this.buckets.keys()].sort().reverse();
    return limit === undefined ? sorted : sorted.slice(0, Math.max(0, limit));
  }

  /**
   * Event counts per date, newest first.
   */
  dayCounts(limit?: number): Pick<DayBucket, 'date' | 'eventCount'>[] {
    return this.dates(limit).flatMap(date => {
      const state = this.buckets.get(date);
      return state ? [{ date, eventCount: state.bucket.eventCount }] : [];
    });
  }

  clear(): void {
    this.buckets.clear();
    this.archivedCount = 0;
  }
}
