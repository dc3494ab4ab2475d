// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT BUILDER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { TieredMemory } from '../../memory/index.js';
import { ContextBuilder } from '../builder.js';
import { manualClock } from '../../memory/__tests__/helpers.js';

describe('ContextBuilder', () => {
  let memory: TieredMemory;

  beforeEach(() => {
    memory = new TieredMemory({ clock: manualClock().read });
  });

  it('should leave the system prompt alone when memory is empty', () => {
    const builder = new ContextBuilder(memory);
    expect(builder.injectIntoSystemPrompt('You are a helpful companion.')).toBe(
      'You are a helpful companion.'
    );
  });

  it('should append a tagged memory block', () => {
    memory.addChat('hello');
    const builder = new ContextBuilder(memory);

    expect(builder.injectIntoSystemPrompt('You are a helpful companion.')).toBe([
      'You are a helpful companion.',
      '',
      '<memory_context>',
      '=== RECENT (last events) ===',
      'user: hello',
      '',
      '=== IMPORTANT (remembered facts) ===',
      'user: hello',
      '</memory_context>',
    ].join('\n'));
  });

  it('should use its configured line budget', () => {
    memory.addChat('hello');
    const builder = new ContextBuilder(memory, { maxLines: 2 });

    const context = builder.build();
    expect(context.summary).toBe('=== RECENT (last events) ===\nuser: hello');
    expect(context.stats.totalEvents).toBe(1);
  });

  it('should let a call override the budget', () => {
    memory.addChat('hello');
    const builder = new ContextBuilder(memory, { maxLines: 2 });

    expect(builder.injectIntoSystemPrompt('base', 1)).toBe(
      'base\n\n<memory_context>\n=== RECENT (last events) ===\n</memory_context>'
    );
    expect(builder.injectIntoSystemPrompt('base', 0)).toBe('base');
  });

  it('should format nothing for a blank summary', () => {
    const builder = new ContextBuilder(memory);
    expect(builder.formatForLLM({ summary: '  ', stats: memory.getMemoryStats() })).toBe('');
  });
});
