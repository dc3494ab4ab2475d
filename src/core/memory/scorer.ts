// ═══════════════════════════════════════════════════════════════════════════════
// IMPORTANCE SCORER — How Much an Event Matters for Later Context
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure function of (kind, payload). No clock, no randomness, no I/O.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  BASE_IMPORTANCE,
  CHAT_BOOSTS,
  DEFAULT_BASE_IMPORTANCE,
  EMPHATIC_KEYWORDS,
  VISION_BOOST,
  VISION_KEYWORDS,
  type EventKind,
  type EventPayload,
  type KnownEventKind,
} from './types.js';

function isKnownKind(kind: EventKind): kind is KnownEventKind {
  return Object.prototype.hasOwnProperty.call(BASE_IMPORTANCE, kind);
}

export function baseImportance(kind: EventKind): number {
  return isKnownKind(kind) ? BASE_IMPORTANCE[kind] : DEFAULT_BASE_IMPORTANCE;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONTENT HEURISTICS
// ─────────────────────────────────────────────────────────────────────────────────

function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
}

function startsWithUppercase(word: string): boolean {
  const first = word.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

// Proper nouns are a cheap stand-in for names worth remembering
function hasCapitalizedWord(text: string): boolean {
  return text
    .split(/\s+/)
    .some(word => word.length > 2 && startsWithUppercase(word));
}

export function chatBoost(text: string): number {
  let boost = 0;

  if (containsAny(text, EMPHATIC_KEYWORDS)) boost += CHAT_BOOSTS.emphatic;
  if (hasCapitalizedWord(text)) boost += CHAT_BOOSTS.capitalizedWord;
  if (/\d/.test(text)) boost += CHAT_BOOSTS.digit;
  if (text.includes('?')) boost += CHAT_BOOSTS.question;

  return boost;
}

export function visionBoost(summary: string): number {
  return containsAny(summary, VISION_KEYWORDS) ? VISION_BOOST : 0;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCORING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Score an event between 0 and 1: a base by kind plus content boosts, capped
 * at 1. Boosts apply by payload shape, so a `chat` kind always carries a chat
 * payload here.
 */
export function scoreImportance(kind: EventKind, payload: EventPayload): number {
  let score = baseImportance(kind);

  switch (payload.type) {
    case 'chat':
      score += chatBoost(payload.text);
      break;
    case 'vision':
      score += visionBoost(payload.summary);
      break;
    default:
      break;
  }

  return Math.min(score, 1);
}
