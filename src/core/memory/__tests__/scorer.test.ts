// ═══════════════════════════════════════════════════════════════════════════════
// IMPORTANCE SCORER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { baseImportance, chatBoost, scoreImportance, visionBoost } from '../scorer.js';
import type { EventPayload } from '../types.js';

const chat = (text: string): EventPayload => ({ type: 'chat', who: 'user', text });
const vision = (summary: string): EventPayload => ({ type: 'vision', summary, path: null });
const generic: EventPayload = { type: 'generic', data: {} };

describe('baseImportance', () => {
  it('should use the table for known kinds', () => {
    expect(baseImportance('chat')).toBe(0.9);
    expect(baseImportance('preference')).toBe(0.9);
    expect(baseImportance('skill')).toBe(0.8);
    expect(baseImportance('vision')).toBe(0.6);
    expect(baseImportance('location')).toBe(0.5);
    expect(baseImportance('inventory')).toBe(0.4);
    expect(baseImportance('app_activity')).toBe(0.3);
  });

  it('should fall back to 0.4 for unknown kinds', () => {
    expect(baseImportance('weather')).toBe(0.4);
    expect(baseImportance('toString')).toBe(0.4);
  });
});

describe('chatBoost', () => {
  it('should add nothing for plain lowercase text', () => {
    expect(chatBoost('ok')).toBe(0);
    expect(chatBoost('hello there')).toBe(0);
  });

  it('should boost emphatic keywords case-insensitively', () => {
    expect(chatBoost('please remember this')).toBeCloseTo(0.2);
    expect(chatBoost('i really hate mondays')).toBeCloseTo(0.2);
  });

  it('should boost a capitalized word longer than two characters', () => {
    expect(chatBoost('we met in paris')).toBe(0);
    expect(chatBoost('we met in Paris')).toBeCloseTo(0.15);
    // Two letters is too short
    expect(chatBoost('my OK')).toBe(0);
  });

  it('should boost digits and question marks', () => {
    expect(chatBoost('i have 3 cats')).toBeCloseTo(0.1);
    expect(chatBoost('are you there?')).toBeCloseTo(0.15);
  });

  it('should add boosts together', () => {
    // emphatic + capitalized + digit + question
    expect(chatBoost('Remember 42?')).toBeCloseTo(0.6);
    // capitalized + question
    expect(chatBoost('Where is it?')).toBeCloseTo(0.3);
  });
});

describe('visionBoost', () => {
  it('should boost screens mentioning a keyword', () => {
    expect(visionBoost('A new item on the table')).toBeCloseTo(0.2);
    expect(visionBoost('DANGER ahead')).toBeCloseTo(0.2);
  });

  it('should add nothing otherwise', () => {
    expect(visionBoost('an empty desk')).toBe(0);
  });
});

describe('scoreImportance', () => {
  it('should score a bare chat line at the chat base', () => {
    expect(scoreImportance('chat', chat('ok'))).toBe(0.9);
  });

  it('should cap scores at 1', () => {
    expect(scoreImportance('chat', chat('remember this'))).toBe(1);
    expect(scoreImportance('chat', chat('Remember 42?'))).toBe(1);
  });

  it('should rank a first message above a bare acknowledgement', () => {
    const first = scoreImportance('chat', chat('My name is Sam, remember it?'));
    const ack = scoreImportance('chat', chat('ok'));
    expect(first).toBeGreaterThan(ack);
  });

  it('should rank a remembered preference above a bare ok', () => {
    const preference = scoreImportance('chat', chat('remember my favorite color is blue?'));
    const ack = scoreImportance('chat', chat('ok'));

    expect(preference).toBe(1);
    expect(ack).toBe(0.9);
    expect(preference).toBeGreaterThan(ack);
  });

  it('should apply vision boosts', () => {
    expect(scoreImportance('vision', vision('a new threat'))).toBeCloseTo(0.8);
    expect(scoreImportance('vision', vision('a quiet room'))).toBe(0.6);
  });

  it('should not boost other payloads', () => {
    expect(scoreImportance('app_activity', {
      type: 'app_activity',
      app: 'Remember 42?',
      category: 'notes',
      surprised: true,
      curious: true,
    })).toBe(0.3);
    expect(scoreImportance('location', { type: 'location', x: 1, y: 2, z: 3 })).toBe(0.5);
    expect(scoreImportance('inventory', generic)).toBe(0.4);
  });

  it('should be deterministic', () => {
    const payload = chat('Do you love Tokyo in 2026?');
    const scores = Array.from({ length: 5 }, () => scoreImportance('chat', payload));
    expect(new Set(scores).size).toBe(1);
  });
});
