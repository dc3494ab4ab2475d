// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Memory Schema, Environment Loading
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  MemoryConfigSchema,
  MemoryConfigError,
  formatConfigErrors,
  safeValidateMemoryConfig,
  validateMemoryConfig,
} from '../schema.js';
import { loadEnvironmentConfig, loadLoggingConfig, loadMemoryConfig } from '../index.js';

function issuesFor(input: unknown): string[] {
  const result = safeValidateMemoryConfig(input);
  return result.ok ? [] : result.error.issues;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Memory Configuration Schema', () => {
  describe('MemoryConfigSchema', () => {
    it('should accept empty object with all defaults', () => {
      const result = MemoryConfigSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.recentCapacity).toBe(20);
        expect(result.data.importantCapacity).toBe(100);
        expect(result.data.promotionThreshold).toBe(0.4);
        expect(result.data.sweepInterval).toBe(100);
      }
    });

    it('should accept a complete config', () => {
      const result = MemoryConfigSchema.safeParse({
        recentCapacity: 10,
        importantCapacity: 50,
        promotionThreshold: 0.5,
        sweepInterval: 20,
        decayHalfLifeSeconds: 600,
        residualFloor: 0.05,
        archiveAfterSeconds: 0,
      });
      expect(result.success).toBe(true);
    });

    it('should reject unknown keys', () => {
      expect(MemoryConfigSchema.safeParse({ recentSize: 10 }).success).toBe(false);
    });
  });

  describe('safeValidateMemoryConfig', () => {
    it('should return the filled-in config', () => {
      const result = safeValidateMemoryConfig({ recentCapacity: 5 });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.recentCapacity).toBe(5);
        expect(result.value.archiveAfterSeconds).toBe(86400);
      }
    });

    it('should describe each problem by path', () => {
      expect(issuesFor({ recentCapacity: 1.5 })).toEqual(['recentCapacity: must be an integer']);
      expect(issuesFor({ importantCapacity: -3 })).toEqual(['importantCapacity: must be positive']);
      expect(issuesFor({ promotionThreshold: 1.5 })).toEqual([
        'promotionThreshold: must be between 0 and 1',
      ]);
      expect(issuesFor({ residualFloor: -0.1 })).toEqual(['residualFloor: must be between 0 and 1']);
      expect(issuesFor({ archiveAfterSeconds: -1 })).toEqual([
        'archiveAfterSeconds: must not be negative',
      ]);
      expect(issuesFor({ decayHalfLifeSeconds: 0 })).toEqual([
        'decayHalfLifeSeconds: must be positive',
      ]);
    });

    it('should require the threshold to sit at or above the floor', () => {
      expect(issuesFor({ promotionThreshold: 0.2, residualFloor: 0.3 })).toEqual([
        'promotionThreshold: promotionThreshold must not be below residualFloor',
      ]);
      expect(issuesFor({ promotionThreshold: 0.3, residualFloor: 0.3 })).toEqual([]);
    });
  });

  describe('validateMemoryConfig', () => {
    it('should throw MemoryConfigError with the issue list', () => {
      expect(() => validateMemoryConfig({ sweepInterval: 0 })).toThrow(MemoryConfigError);
      expect(() => validateMemoryConfig({ sweepInterval: 0 })).toThrow(
        'Invalid memory configuration: sweepInterval: must be positive'
      );
    });
  });

  describe('formatConfigErrors', () => {
    it('should format Zod errors into readable strings', () => {
      const parsed = MemoryConfigSchema.safeParse({ recentCapacity: 'many' });
      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        expect(formatConfigErrors(parsed.error)).toEqual([
          'recentCapacity: Expected number, received string',
        ]);
      }
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT LOADING TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Environment Loading', () => {
  let savedEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    savedEnv = { ...process.env };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('MEMORY_')) delete process.env[key];
    }
    delete process.env.LOG_LEVEL;
    delete process.env.DEBUG;
    delete process.env.REDACT_PII;
  });

  afterEach(() => {
    process.env = savedEnv;
  });

  describe('loadEnvironmentConfig', () => {
    it('should recognise production', () => {
      process.env.NODE_ENV = 'production';
      expect(loadEnvironmentConfig()).toEqual({
        environment: 'production',
        isProduction: true,
        isDevelopment: false,
      });
    });

    it('should treat unknown environments as development', () => {
      process.env.NODE_ENV = 'staging';
      expect(loadEnvironmentConfig().environment).toBe('development');
    });
  });

  describe('loadLoggingConfig', () => {
    it('should default to info with redaction on', () => {
      process.env.NODE_ENV = 'test';
      expect(loadLoggingConfig()).toEqual({ level: 'info', redactPII: true, jsonFormat: false });
    });

    it('should switch to debug when DEBUG is set', () => {
      process.env.DEBUG = 'true';
      expect(loadLoggingConfig().level).toBe('debug');
    });

    it('should let LOG_LEVEL win over DEBUG', () => {
      process.env.DEBUG = 'true';
      process.env.LOG_LEVEL = 'WARN';
      expect(loadLoggingConfig().level).toBe('warn');
    });

    it('should allow turning redaction off', () => {
      process.env.REDACT_PII = 'false';
      expect(loadLoggingConfig().redactPII).toBe(false);
    });

    it('should log JSON in production', () => {
      process.env.NODE_ENV = 'production';
      expect(loadLoggingConfig().jsonFormat).toBe(true);
    });
  });

  describe('loadMemoryConfig', () => {
    it('should use defaults without variables', () => {
      expect(loadMemoryConfig()).toEqual(validateMemoryConfig({}));
    });

    it('should read MEMORY_* variables', () => {
      process.env.MEMORY_RECENT_CAPACITY = '5';
      process.env.MEMORY_DECAY_HALF_LIFE_SECONDS = '90.5';

      const config = loadMemoryConfig();
      expect(config.recentCapacity).toBe(5);
      expect(config.decayHalfLifeSeconds).toBe(90.5);
    });

    it('should fall back on unparsable numbers', () => {
      process.env.MEMORY_IMPORTANT_CAPACITY = 'plenty';
      expect(loadMemoryConfig().importantCapacity).toBe(100);
    });

    it('should let overrides win over variables', () => {
      process.env.MEMORY_RECENT_CAPACITY = '5';
      expect(loadMemoryConfig({ recentCapacity: 8 }).recentCapacity).toBe(8);
    });

    it('should throw on parsable but invalid values', () => {
      process.env.MEMORY_SWEEP_INTERVAL = '0';
      expect(() => loadMemoryConfig()).toThrow(MemoryConfigError);
    });
  });
});
