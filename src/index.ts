// ═══════════════════════════════════════════════════════════════════════════════
// COMPANION MEMORY — Package Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

export * from './core/memory/index.js';
export * from './core/context/index.js';
export * from './api/index.js';

export {
  loadMemoryConfig,
  loadLoggingConfig,
  loadEnvironmentConfig,
  MemoryConfigSchema,
  MemoryConfigError,
  safeValidateMemoryConfig,
  validateMemoryConfig,
  type MemoryConfigInput,
  type LoggingConfig,
  type EnvironmentConfig,
  type Environment,
} from './config/index.js';

export { Logger, getLogger, type LogContext, type LogLevel } from './logging/index.js';
export { ok, err, isOk, isErr, type Result, type Ok, type Err } from './types/result.js';
