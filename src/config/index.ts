// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for the Application Shell
// ═══════════════════════════════════════════════════════════════════════════════
//
// The memory core never reads the environment itself. Whatever hosts it calls
// loadMemoryConfig() (or builds a MemoryConfig by hand) and injects the result.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { validateMemoryConfig } from './schema.js';
import type { MemoryConfig } from '../core/memory/types.js';

export {
  MemoryConfigSchema,
  MemoryConfigError,
  formatConfigErrors,
  safeValidateMemoryConfig,
  validateMemoryConfig,
  type MemoryConfigInput,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'test' | 'production';

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isDevelopment: boolean;
}

function parseEnvironment(value: string): Environment {
  switch (value) {
    case 'production':
    case 'test':
      return value;
    default:
      return 'development';
  }
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const environment = parseEnvironment(envString('NODE_ENV', 'development'));

  return {
    environment,
    isProduction: environment === 'production',
    isDevelopment: environment === 'development',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggingConfig {
  level: LogLevel;
  redactPII: boolean;
  jsonFormat: boolean;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    case 'fatal':
      return 'fatal';
    default:
      return undefined;
  }
}

export function loadLoggingConfig(): LoggingConfig {
  const env = loadEnvironmentConfig();
  const debugMode = envBool('DEBUG', false);

  return {
    // LOG_LEVEL wins over DEBUG; chat text is user content, so redact by default
    level: parseLogLevel(process.env.LOG_LEVEL) ?? (debugMode ? 'debug' : 'info'),
    redactPII: envBool('REDACT_PII', true),
    jsonFormat: env.isProduction,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Build a MemoryConfig from MEMORY_* variables. Unparsable numbers fall back
 * to their defaults; parsable but invalid ones throw MemoryConfigError.
 */
export function loadMemoryConfig(overrides: Partial<MemoryConfig> = {}): MemoryConfig {
  const defaults = validateMemoryConfig({});

  return validateMemoryConfig({
    recentCapacity: envNumber('MEMORY_RECENT_CAPACITY', defaults.recentCapacity),
    importantCapacity: envNumber('MEMORY_IMPORTANT_CAPACITY', defaults.importantCapacity),
    promotionThreshold: envNumber('MEMORY_PROMOTION_THRESHOLD', defaults.promotionThreshold),
    sweepInterval: envNumber('MEMORY_SWEEP_INTERVAL', defaults.sweepInterval),
    decayHalfLifeSeconds: envNumber('MEMORY_DECAY_HALF_LIFE_SECONDS', defaults.decayHalfLifeSeconds),
    residualFloor: envNumber('MEMORY_RESIDUAL_FLOOR', defaults.residualFloor),
    archiveAfterSeconds: envNumber('MEMORY_ARCHIVE_AFTER_SECONDS', defaults.archiveAfterSeconds),
    ...overrides,
  });
}
