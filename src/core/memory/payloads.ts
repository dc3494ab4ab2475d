// ═══════════════════════════════════════════════════════════════════════════════
// EVENT PAYLOADS — Shaping Raw Producer Data into Tagged Variants
// ═══════════════════════════════════════════════════════════════════════════════
//
// Producers (window polling, speech-to-text, vision) hand over loose maps.
// Known kinds are parsed into a fixed shape; every missing or mistyped field
// falls back to a default instead of failing.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { EventKind, EventPayload, RawPayload } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

const ChatSchema = z.object({
  who: z.string().catch('user'),
  text: z.string().catch(''),
});

const VisionSchema = z.object({
  summary: z.string().catch(''),
  path: z.string().nullable().catch(null),
});

const AppActivitySchema = z.object({
  app: z.string().catch('Unknown'),
  category: z.string().catch('unknown'),
  surprised: z.boolean().catch(false),
  curious: z.boolean().catch(false),
});

const CoordinateSchema = z.number().finite().catch(0);

const LocationSchema = z.object({
  x: CoordinateSchema,
  y: CoordinateSchema,
  z: CoordinateSchema,
});

// Some producers send a position triple instead of separate coordinates
const PositionTripleSchema = z.tuple([CoordinateSchema, CoordinateSchema, CoordinateSchema]);

// ─────────────────────────────────────────────────────────────────────────────────
// COPYING
// ─────────────────────────────────────────────────────────────────────────────────

function describeUncloneable(value: unknown): string {
  return `[${typeof value}]`;
}

/**
 * Deep copy of producer data. Values that cannot be cloned (functions,
 * symbols) are replaced by a short description of their type.
 */
function cloneData(raw: RawPayload): Record<string, unknown> {
  try {
    return structuredClone({ ...raw });
  } catch {
    const copy: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      try {
        copy[key] = structuredClone(value);
      } catch {
        copy[key] = describeUncloneable(value);
      }
    }
    return copy;
  }
}

function deepFreeze(value: unknown, seen: WeakSet<object> = new WeakSet()): void {
  if (typeof value !== 'object' || value === null || seen.has(value)) return;
  seen.add(value);
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child, seen);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Shape a raw payload for `kind`, deep-frozen and detached from `raw`.
 * Never throws.
 */
export function parsePayload(kind: EventKind, raw: RawPayload): EventPayload {
  const payload = shapePayload(kind, raw);
  deepFreeze(payload);
  return payload;
}

function shapePayload(kind: EventKind, raw: RawPayload): EventPayload {
  switch (kind) {
    case 'chat':
      return { type: 'chat', ...ChatSchema.parse(raw) };

    case 'vision':
      return { type: 'vision', ...VisionSchema.parse(raw) };

    case 'app_activity':
      return { type: 'app_activity', ...AppActivitySchema.parse(raw) };

    case 'location': {
      const triple = PositionTripleSchema.safeParse(raw.pos);
      if (triple.success) {
        const [x, y, depth] = triple.data;
        return { type: 'location', x, y, z: depth };
      }
      return { type: 'location', ...LocationSchema.parse(raw) };
    }

    default:
      return { type: 'generic', data: cloneData(raw) };
  }
}

/**
 * Empty or whitespace-only kinds are stored as `unknown`.
 */
export function normalizeKind(kind: string): EventKind {
  const trimmed = kind.trim();
  return trimmed.length > 0 ? trimmed : 'unknown';
}
