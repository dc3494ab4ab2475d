// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT BUILDER — Memory Context for Dialogue Generation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Turns the tiered memory's digest into a block the dialogue model reads as
// part of its system prompt. The model client itself lives elsewhere.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { MemoryStats, TieredMemory } from '../memory/index.js';
import { DEFAULT_SUMMARY_MAX_LINES } from '../memory/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface PromptContext {
  summary: string;
  stats: MemoryStats;
}

export interface ContextBuildOptions {
  /** Line budget for the memory digest */
  maxLines?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT BUILDER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class ContextBuilder {
  private maxLines: number;

  constructor(
    private memory: TieredMemory,
    options: ContextBuildOptions = {}
  ) {
    this.maxLines = options.maxLines ?? DEFAULT_SUMMARY_MAX_LINES;
  }

  build(maxLines: number = this.maxLines): PromptContext {
    return {
      summary: this.memory.getContextSummary(maxLines),
      stats: this.memory.getMemoryStats(),
    };
  }

  /**
   * Wrap the digest in a tagged block. Empty memory yields an empty string.
   */
  formatForLLM(context: PromptContext): string {
    if (!context.summary.trim()) return '';
    return `<memory_context>\n${context.summary}\n</memory_context>`;
  }

  /**
   * Append the memory block to a system prompt, or return the prompt as is
   * when there is nothing to add.
   */
  injectIntoSystemPrompt(baseSystemPrompt: string, maxLines?: number): string {
    const block = this.formatForLLM(this.build(maxLines));
    if (!block) return baseSystemPrompt;
    return `${baseSystemPrompt}\n\n${block}`;
  }
}
