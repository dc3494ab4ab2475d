// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT MODULE — Prompt Context from Memory
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ContextBuilder,
  type PromptContext,
  type ContextBuildOptions,
} from './builder.js';
