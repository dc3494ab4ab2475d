// ═══════════════════════════════════════════════════════════════════════════════
// EVENT SCHEMAS — Validation for Memory Ingestion and Query Routes
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// INGESTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Generic event. The payload is kept loose; the store shapes it per kind.
 *
 * @example
 * POST /events
 * { "kind": "inventory", "payload": { "item": "torch", "count": 3 } }
 */
export const AddEventSchema = z.object({
  kind: z.string().trim().min(1, 'Kind is required').max(64),
  payload: z.record(z.unknown()).optional().default({}),
});

export const AddChatSchema = z.object({
  text: z.string().max(10000),
  who: z.string().min(1).max(100).optional().default('user'),
});

export const AddVisionSchema = z.object({
  summary: z.string().max(10000),
  path: z.string().max(1000).nullable().optional().default(null),
});

export const AddAppActivitySchema = z.object({
  app: z.string().min(1).max(500),
  category: z.string().min(1).max(100),
  surprised: z.boolean().optional().default(false),
  curious: z.boolean().optional().default(false),
});

// ─────────────────────────────────────────────────────────────────────────────────
// QUERIES
// ─────────────────────────────────────────────────────────────────────────────────

export const ContextQuerySchema = z.object({
  maxLines: z.coerce.number().int().min(0).max(200).optional(),
});

export const CountQuerySchema = z.object({
  count: z.coerce.number().int().min(0).max(1000).optional(),
});

export const ArchiveDateParamSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD'),
});

export type AddEventInput = z.infer<typeof AddEventSchema>;
export type AddChatInput = z.infer<typeof AddChatSchema>;
export type AddVisionInput = z.infer<typeof AddVisionSchema>;
export type AddAppActivityInput = z.infer<typeof AddAppActivitySchema>;
