// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT SUMMARIZER — Bounded Digest of All Three Layers
// ═══════════════════════════════════════════════════════════════════════════════
//
// The digest is spliced straight into a language-model prompt:
//
//   === RECENT (last events) ===
//   user: are you there?
//
//   === IMPORTANT (remembered facts) ===
//   user: remember my cat is called Miso
//
//   === ARCHIVE (past sessions) ===
//   [2026-01-14] 12 events
//
// Empty sections are left out. The whole digest is cut to a line budget.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { formatEvent } from './formatter.js';
import {
  DEFAULT_SUMMARY_LIMITS,
  type DayBucket,
  type MemoryEvent,
  type ScoredEvent,
  type SummaryLimits,
} from './types.js';

export const SECTION_HEADERS = {
  recent: '=== RECENT (last events) ===',
  important: '=== IMPORTANT (remembered facts) ===',
  archive: '=== ARCHIVE (past sessions) ===',
} as const;

export interface SummarySource {
  /** Chronological, oldest first */
  recent: readonly MemoryEvent[];
  important: readonly ScoredEvent[];
  archive: readonly Pick<DayBucket, 'date' | 'eventCount'>[];
}

export function byImportanceDescending(entries: readonly ScoredEvent[]): ScoredEvent[] {
  return [...entries].sort((a, b) => b.importance - a.importance);
}

function renderSections(source: SummarySource, limits: SummaryLimits): string[][] {
  const sections: string[][] = [];

  const recent = limits.recentEntries > 0 ? source.recent.slice(-limits.recentEntries) : [];
  if (recent.length > 0) {
    sections.push([SECTION_HEADERS.recent, ...recent.map(formatEvent)]);
  }

  const important = byImportanceDescending(source.important).slice(0, Math.max(0, limits.importantEntries));
  if (important.length > 0) {
    sections.push([SECTION_HEADERS.important, ...important.map(entry => formatEvent(entry.event))]);
  }

  const days = [...source.archive]
    .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
    .slice(0, Math.max(0, limits.archiveDays));
  if (days.length > 0) {
    sections.push([
      SECTION_HEADERS.archive,
      ...days.map(day => `[${day.date}] ${day.eventCount} events`),
    ]);
  }

  return sections;
}

/**
 * Render the digest, at most `maxLines` lines. Sections are separated by one
 * blank line, which counts toward the budget.
 */
export function buildContextSummary(
  source: SummarySource,
  maxLines: number,
  limits: SummaryLimits = DEFAULT_SUMMARY_LIMITS
): string {
  const budget = Number.isFinite(maxLines) ? Math.floor(maxLines) : 0;
  if (budget <= 0) return '';

  const lines: string[] = [];
  for (const section of renderSections(source, limits)) {
    if (lines.length > 0) lines.push('');
    lines.push(...section);
  }

  return lines.slice(0, budget).join('\n');
}
