// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Validation for Tiered Memory Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z, type ZodError } from 'zod';
import { ok, err, type Result } from '../types/result.js';
import { DEFAULT_MEMORY_CONFIG, type MemoryConfig } from '../core/memory/types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const CapacitySchema = z.number().int('must be an integer').positive('must be positive');

const UnitIntervalSchema = z
  .number()
  .min(0, 'must be between 0 and 1')
  .max(1, 'must be between 0 and 1');

/**
 * Memory configuration schema. Every field is optional on input and falls
 * back to DEFAULT_MEMORY_CONFIG.
 */
export const MemoryConfigSchema = z
  .object({
    recentCapacity: CapacitySchema.default(DEFAULT_MEMORY_CONFIG.recentCapacity),
    importantCapacity: CapacitySchema.default(DEFAULT_MEMORY_CONFIG.importantCapacity),
    promotionThreshold: UnitIntervalSchema.default(DEFAULT_MEMORY_CONFIG.promotionThreshold),
    sweepInterval: CapacitySchema.default(DEFAULT_MEMORY_CONFIG.sweepInterval),
    decayHalfLifeSeconds: z
      .number()
      .positive('must be positive')
      .finite()
      .default(DEFAULT_MEMORY_CONFIG.decayHalfLifeSeconds),
    residualFloor: UnitIntervalSchema.default(DEFAULT_MEMORY_CONFIG.residualFloor),
    archiveAfterSeconds: z
      .number()
      .min(0, 'must not be negative')
      .finite()
      .default(DEFAULT_MEMORY_CONFIG.archiveAfterSeconds),
  })
  .strict()
  .refine((config) => config.promotionThreshold >= config.residualFloor, {
    message: 'promotionThreshold must not be below residualFloor',
    path: ['promotionThreshold'],
  });

export type MemoryConfigInput = z.input<typeof MemoryConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when a memory store is constructed with unusable settings.
 */
export class MemoryConfigError extends Error {
  readonly name = 'MemoryConfigError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid memory configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatConfigErrors(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export function safeValidateMemoryConfig(
  input: unknown = {}
): Result<MemoryConfig, MemoryConfigError> {
  const parsed = MemoryConfigSchema.safeParse(input);
  if (!parsed.success) {
    return err(new MemoryConfigError(formatConfigErrors(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * Validate and fill in defaults, throwing MemoryConfigError on bad input.
 */
export function validateMemoryConfig(input: unknown = {}): MemoryConfig {
  const result = safeValidateMemoryConfig(input);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
