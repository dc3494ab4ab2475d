// ═══════════════════════════════════════════════════════════════════════════════
// DECAY & ARCHIVAL SWEEPER — Aging the Important Layer
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each sweep halves an entry's importance per half-life of age. Entries that
// fall to the residual floor leave the layer: archived when older than the
// archive age, dropped otherwise.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Logger } from '../../logging/index.js';
import type { ArchiveLayer } from './archive.js';
import type { MemoryConfig, ScoredEvent, SweepReport } from './types.js';

export type DecayPolicy = Pick<
  MemoryConfig,
  'decayHalfLifeSeconds' | 'residualFloor' | 'archiveAfterSeconds'
>;

export interface SweepResult {
  kept: ScoredEvent[];
  report: SweepReport;
}

export function decayFactor(ageSeconds: number, halfLifeSeconds: number): number {
  return Math.pow(0.5, Math.max(0, ageSeconds) / halfLifeSeconds);
}

/**
 * Decay every entry in place and split the layer into what stays, what is
 * archived and what is forgotten. `now` is in epoch seconds.
 */
export function sweepImportant(
  entries: readonly ScoredEvent[],
  now: number,
  policy: DecayPolicy,
  archive: ArchiveLayer,
  logger?: Logger
): SweepResult {
  const kept: ScoredEvent[] = [];
  const report: SweepReport = { kept: 0, archived: 0, dropped: 0 };

  for (const entry of entries) {
    const rawAge = now - entry.event.timestamp;
    if (rawAge < 0) {
      logger?.warn('Event timestamp is ahead of the clock; treating age as zero', {
        seq: entry.event.seq,
        aheadBySeconds: -rawAge,
      });
    }
    const age = Math.max(0, rawAge);
    const decayed = entry.importance * decayFactor(age, policy.decayHalfLifeSeconds);

    if (decayed > policy.residualFloor) {
      entry.importance = decayed;
      kept.push(entry);
      report.kept++;
    } else if (age > policy.archiveAfterSeconds) {
      const date = archive.archive(entry.event);
      report.archived++;
      logger?.debug('Archived event', { seq: entry.event.seq, kind: entry.event.kind, date });
    } else {
      report.dropped++;
    }
  }

  return { kept, report };
}

/**
 * Keep the `capacity` highest-importance entries. The sort is stable, so
 * equal scores keep insertion order; trimming an already-trimmed layer is a
 * no-op.
 */
export function trimToCapacity(entries: ScoredEvent[], capacity: number): ScoredEvent[] {
  if (entries.length <= capacity) return entries;
  return [...entries]
    .sort((a, b) => b.importance - a.importance)
    .slice(0, capacity);
}
