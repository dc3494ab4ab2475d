// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY MODULE — Tiered Event Memory for the Companion
// ═══════════════════════════════════════════════════════════════════════════════
//
// Components:
// - Scorer: importance of an event from its kind and content
// - Store: recent/important/archive layers, ingestion and queries
// - Sweeper: decay, archival and capacity trimming
// - Summarizer: bounded text digest for prompt context
//
// ═══════════════════════════════════════════════════════════════════════════════

// Types
export type {
  KnownEventKind,
  EventKind,
  ChatPayload,
  VisionPayload,
  AppActivityPayload,
  LocationPayload,
  GenericPayload,
  EventPayload,
  RawPayload,
  MemoryEvent,
  ScoredEvent,
  DayBucket,
  SweepReport,
  MemoryStats,
  MemoryConfig,
  SummaryLimits,
} from './types.js';

export {
  DEFAULT_MEMORY_CONFIG,
  DEFAULT_SUMMARY_LIMITS,
  DEFAULT_SUMMARY_MAX_LINES,
  BASE_IMPORTANCE,
  DEFAULT_BASE_IMPORTANCE,
  EMPHATIC_KEYWORDS,
  VISION_KEYWORDS,
} from './types.js';

// Payloads
export { parsePayload, normalizeKind } from './payloads.js';

// Scorer
export { scoreImportance, baseImportance } from './scorer.js';

// Layers
export { RecentBuffer } from './recent-buffer.js';
export { ArchiveLayer, toDateKey, isDateKey } from './archive.js';

// Sweeper
export { sweepImportant, trimToCapacity, decayFactor, type DecayPolicy } from './sweeper.js';

// Summarizer
export { formatEvent } from './formatter.js';
export { buildContextSummary, SECTION_HEADERS, type SummarySource } from './summarizer.js';

// Store
export {
  TieredMemory,
  createTieredMemory,
  systemClock,
  type Clock,
  type TieredMemoryOptions,
  type AppActivityFlags,
} from './store.js';
