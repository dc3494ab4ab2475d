// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY TYPES — Events, Layers, Archive Buckets, Configuration
// ═══════════════════════════════════════════════════════════════════════════════
//
// The companion remembers what it sees and hears in three layers:
// - Recent: the last N events, full fidelity, no scoring
// - Important: events scored above the promotion threshold, decayed over time
// - Archive: day buckets for events that decayed and aged out of Important
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// EVENT KINDS
// ─────────────────────────────────────────────────────────────────────────────────

export type KnownEventKind =
  | 'chat'            // A line said by the user or the companion
  | 'vision'          // Summary of a screen snapshot
  | 'app_activity'    // Foreground application switch
  | 'location'        // Position in a world the user is playing in
  | 'inventory'       // Inventory change
  | 'skill'           // Something the user learned or demonstrated
  | 'preference';     // Something the user likes or dislikes

/**
 * Open enumeration: known kinds get dedicated scoring and formatting,
 * anything else is stored with defaults.
 */
export type EventKind = KnownEventKind | (string & {});

// ─────────────────────────────────────────────────────────────────────────────────
// PAYLOADS
// ─────────────────────────────────────────────────────────────────────────────────

export interface ChatPayload {
  type: 'chat';
  who: string;
  text: string;
}

export interface VisionPayload {
  type: 'vision';
  summary: string;
  path: string | null;
}

export interface AppActivityPayload {
  type: 'app_activity';
  app: string;
  category: string;
  surprised: boolean;
  curious: boolean;
}

export interface LocationPayload {
  type: 'location';
  x: number;
  y: number;
  z: number;
}

/** Kinds without a dedicated shape keep their raw key/value data. */
export interface GenericPayload {
  type: 'generic';
  data: Readonly<Record<string, unknown>>;
}

export type EventPayload =
  | ChatPayload
  | VisionPayload
  | AppActivityPayload
  | LocationPayload
  | GenericPayload;

/** What producers hand to `add()` before it is shaped into an EventPayload. */
export type RawPayload = Readonly<Record<string, unknown>>;

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface MemoryEvent {
  /** Ingestion sequence number, 1-based */
  readonly seq: number;
  readonly kind: EventKind;
  readonly payload: Readonly<EventPayload>;
  /** Seconds since the epoch */
  readonly timestamp: number;
}

/**
 * An event promoted into the Important layer. The event is shared with the
 * Recent layer; only `importance` changes, and only during a sweep.
 */
export interface ScoredEvent {
  readonly event: MemoryEvent;
  importance: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ARCHIVE
// ─────────────────────────────────────────────────────────────────────────────────

export interface DayBucket {
  /** Local calendar date, YYYY-MM-DD */
  date: string;
  eventCount: number;
  firstTimestamp: number;
  rawEvents: MemoryEvent[];
  /** `"{who}: {text}; "` fragments of archived chat lines, each at most once */
  rollingSummary: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SWEEP & STATS
// ─────────────────────────────────────────────────────────────────────────────────

export interface SweepReport {
  kept: number;
  archived: number;
  dropped: number;
}

export interface MemoryStats {
  recentItems: number;
  importantItems: number;
  archiveDays: number;
  archivedEvents: number;
  totalEvents: number;
  /** importantItems / (recentItems + 1) */
  memoryRatio: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface MemoryConfig {
  recentCapacity: number;
  importantCapacity: number;
  /** Events must score strictly above this to be promoted */
  promotionThreshold: number;
  /** A sweep runs after every `sweepInterval`-th ingested event */
  sweepInterval: number;
  decayHalfLifeSeconds: number;
  /** Decayed scores at or below this leave the Important layer */
  residualFloor: number;
  /** Entries older than this are archived instead of dropped */
  archiveAfterSeconds: number;
}

export const DEFAULT_MEMORY_CONFIG: Readonly<MemoryConfig> = {
  recentCapacity: 20,
  importantCapacity: 100,
  promotionThreshold: 0.4,
  sweepInterval: 100,
  decayHalfLifeSeconds: 60 * 60,
  residualFloor: 0.1,
  archiveAfterSeconds: 24 * 60 * 60,
};

// ─────────────────────────────────────────────────────────────────────────────────
// SCORING TABLES
// ─────────────────────────────────────────────────────────────────────────────────

export const BASE_IMPORTANCE: Readonly<Record<KnownEventKind, number>> = {
  chat: 0.9,          // Conversation is what the companion is for
  preference: 0.9,    // Stated likes and dislikes
  skill: 0.8,
  vision: 0.6,
  location: 0.5,
  inventory: 0.4,
  app_activity: 0.3,  // Frequent and mostly routine
};

export const DEFAULT_BASE_IMPORTANCE = 0.4;

export const CHAT_BOOSTS = {
  emphatic: 0.2,
  capitalizedWord: 0.15,
  digit: 0.1,
  question: 0.15,
} as const;

export const EMPHATIC_KEYWORDS: readonly string[] = [
  'remember',
  'important',
  'forever',
  'always',
  'never',
  'hate',
  'love',
  'favorite',
  'rule',
  'must',
];

export const VISION_BOOST = 0.2;

export const VISION_KEYWORDS: readonly string[] = ['item', 'change', 'new', 'danger', 'threat'];

// ─────────────────────────────────────────────────────────────────────────────────
// SUMMARY LIMITS
// ─────────────────────────────────────────────────────────────────────────────────

export interface SummaryLimits {
  recentEntries: number;
  importantEntries: number;
  archiveDays: number;
}

export const DEFAULT_SUMMARY_LIMITS: Readonly<SummaryLimits> = {
  recentEntries: 5,
  importantEntries: 5,
  archiveDays: 3,
};

export const DEFAULT_SUMMARY_MAX_LINES = 15;

/** Characters of chat text kept in an archive bucket's rolling summary */
export const ARCHIVE_FRAGMENT_LENGTH = 50;
