// ═══════════════════════════════════════════════════════════════════════════════
// TIERED MEMORY — Recent, Important and Archive Layers for One Session
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every method is synchronous. On the event loop each call runs to completion,
// so a sweep always sees a fully applied `add` and the layers, archive and
// counter never need a separate lock.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { validateMemoryConfig, type MemoryConfigInput } from '../../config/schema.js';
import { getLogger, type Logger } from '../../logging/index.js';
import { ArchiveLayer } from './archive.js';
import { normalizeKind, parsePayload } from './payloads.js';
import { RecentBuffer } from './recent-buffer.js';
import { scoreImportance } from './scorer.js';
import { buildContextSummary, byImportanceDescending } from './summarizer.js';
import { sweepImportant, trimToCapacity } from './sweeper.js';
import {
  DEFAULT_SUMMARY_MAX_LINES,
  type DayBucket,
  type EventKind,
  type MemoryConfig,
  type MemoryEvent,
  type MemoryStats,
  type RawPayload,
  type ScoredEvent,
  type SweepReport,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

/** Current time in epoch seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export interface TieredMemoryOptions {
  config?: MemoryConfigInput;
  clock?: Clock;
  logger?: Logger;
}

export interface AppActivityFlags {
  surprised?: boolean;
  curious?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TIERED MEMORY CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class TieredMemory {
  readonly config: Readonly<MemoryConfig>;

  private readonly clock: Clock;
  private readonly logger: Logger;

  private recent: RecentBuffer<MemoryEvent>;
  private important: ScoredEvent[] = [];
  private archive = new ArchiveLayer();
  private eventCounter = 0;

  /**
   * @throws MemoryConfigError when the configuration is unusable
   */
  constructor(options: TieredMemoryOptions = {}) {
    this.config = Object.freeze(validateMemoryConfig(options.config ?? {}));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getLogger({ component: 'tiered-memory' });
    this.recent = new RecentBuffer(this.config.recentCapacity);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INGESTION
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Record an event. Always lands in Recent; promoted to Important when it
   * scores above the threshold. Every `sweepInterval`-th call also sweeps.
   */
  add(kind: EventKind, payload: RawPayload = {}): MemoryEvent {
    const normalizedKind = normalizeKind(kind);
    const eventPayload = parsePayload(normalizedKind, payload);

    this.eventCounter++;
    const event: MemoryEvent = Object.freeze({
      seq: this.eventCounter,
      kind: normalizedKind,
      payload: eventPayload,
      timestamp: this.clock(),
    });

    this.recent.push(event);

    const importance = scoreImportance(normalizedKind, eventPayload);
    if (importance > this.config.promotionThreshold) {
      this.important.push({ event, importance });
      this.trimImportant();
    }

    if (this.eventCounter % this.config.sweepInterval === 0) {
      this.sweep();
    }

    return event;
  }

  addChat(text: string, who: string = 'user'): MemoryEvent {
    return this.add('chat', { who, text });
  }

  addVision(summary: string, path: string | null = null): MemoryEvent {
    return this.add('vision', { summary, path });
  }

  addAppActivity(app: string, category: string, flags: AppActivityFlags = {}): MemoryEvent {
    return this.add('app_activity', {
      app,
      category,
      surprised: flags.surprised ?? false,
      curious: flags.curious ?? false,
    });
  }

  addLocation(x: number, y: number, z: number): MemoryEvent {
    return this.add('location', { x, y, z });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // MAINTENANCE
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Decay the Important layer and move aged-out entries to the archive.
   */
  sweep(): SweepReport {
    const { kept, report } = sweepImportant(
      this.important,
      this.clock(),
      this.config,
      this.archive,
      this.logger
    );
    this.important = kept;

    this.logger.debug('Swept important layer', {
      ...report,
      totalEvents: this.eventCounter,
    });

    return report;
  }

  /**
   * Enforce the Important capacity. Overflow is discarded, not archived.
   */
  trimImportant(): void {
    const before = this.important.length;
    this.important = trimToCapacity(this.important, this.config.importantCapacity);

    const discarded = before - this.important.length;
    if (discarded > 0) {
      this.logger.debug('Trimmed important layer', { discarded });
    }
  }

  clear(): void {
    this.recent.clear();
    this.important = [];
    this.archive.clear();
    this.eventCounter = 0;
    this.logger.debug('Memory cleared');
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════════

  getContextSummary(maxLines: number = DEFAULT_SUMMARY_MAX_LINES): string {
    return buildContextSummary(
      {
        recent: this.recent.toArray(),
        important: this.important,
        archive: this.archive.dayCounts(),
      },
      maxLines
    );
  }

  /**
   * Last `count` events, oldest first.
   */
  getRecent(count: number = 10): MemoryEvent[] {
    return this.recent.tail(count);
  }

  /**
   * Recent events newer than `seconds` ago.
   */
  getRecentWithin(seconds: number): MemoryEvent[] {
    const cutoff = this.clock() - seconds;
    return this.recent.toArray().filter(event => event.timestamp > cutoff);
  }

  /**
   * Top `count` Important entries by current importance. Entries are copies.
   */
  getImportant(count: number = 10): ScoredEvent[] {
    return byImportanceDescending(this.important)
      .slice(0, Math.max(0, Math.floor(count)))
      .map(entry => ({ event: entry.event, importance: entry.importance }));
  }

  getArchiveForDate(date: string): DayBucket | null {
    return this.archive.get(date);
  }

  /**
   * Archived dates, newest first.
   */
  getArchiveDates(): string[] {
    return this.archive.dates();
  }

  getMemoryStats(): MemoryStats {
    const recentItems = this.recent.length;
    const importantItems = this.important.length;

    return {
      recentItems,
      importantItems,
      archiveDays: this.archive.dayCount,
      archivedEvents: this.archive.eventCount,
      totalEvents: this.eventCounter,
      memoryRatio: importantItems / (recentItems + 1),
    };
  }
}

/**
 * One store per companion session; the caller owns and passes it around.
 */
export function createTieredMemory(options?: TieredMemoryOptions): TieredMemory {
  return new TieredMemory(options);
}
