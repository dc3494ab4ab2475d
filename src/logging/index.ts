// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Component Context
// ═══════════════════════════════════════════════════════════════════════════════

import { loadLoggingConfig, type LoggingConfig, type LogLevel } from '../config/index.js';

export type { LogLevel } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  sessionId?: string;
  component?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LogContext {
  sessionId?: string;
  component?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PII REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

// Chat lines and window titles end up in debug logs
const PII_PATTERNS = [
  // Email
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Phone (various formats)
  { pattern: /(\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g, replacement: '[PHONE]' },
  // Credit card (basic)
  { pattern: /\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}/g, replacement: '[CARD]' },
];

export function redactPII(text: string): string {
  let result = text;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function redactObject(obj: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (typeof obj === 'string') {
    return redactPII(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(item => redactObject(item, depth + 1));
  }

  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (lowerKey.includes('password') || lowerKey.includes('secret') ||
          lowerKey.includes('token') || lowerKey.includes('authorization')) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = redactObject(value, depth + 1);
      }
    }
    return result;
  }

  return obj;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOG LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER CLASS
// ─────────────────────────────────────────────────────────────────────────────────

export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;
  private redactPII: boolean;
  private jsonFormat: boolean;

  constructor(context: LogContext = {}, config: LoggingConfig = loadLoggingConfig()) {
    this.context = context;
    this.minLevel = config.level;
    this.redactPII = config.redactPII;
    this.jsonFormat = config.jsonFormat;
  }

  private formatEntry(level: LogLevel, message: string, extra?: Partial<LogEntry>): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactPII ? redactPII(message) : message,
      ...this.context,
      ...extra,
    };

    if (this.redactPII && entry.metadata) {
      const redacted = redactObject(entry.metadata);
      entry.metadata = isRecord(redacted) ? redacted : undefined;
    }

    if (this.redactPII && entry.error?.stack) {
      entry.error.stack = undefined;
    }

    return entry;
  }

  private output(entry: LogEntry): void {
    if (this.jsonFormat) {
      console.log(JSON.stringify(entry));
      return;
    }

    const session = entry.sessionId ? `[${entry.sessionId.slice(0, 8)}]` : '';
    const component = entry.component ? `[${entry.component}]` : '';

    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // cyan
      info: '\x1b[32m',  // green
      warn: '\x1b[33m',  // yellow
      error: '\x1b[31m', // red
      fatal: '\x1b[35m', // magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];

    console.log(
      `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} ${session}${component} ${entry.message}`
    );

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      console.log('  ', JSON.stringify(entry.metadata));
    }

    if (entry.error) {
      console.log(`  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        console.log('  ', entry.error.stack.split('\n').slice(1, 4).join('\n  '));
      }
    }
  }

  private log(level: LogLevel, message: string, extra?: Partial<LogEntry>): void {
    if (!shouldLog(level, this.minLevel)) return;
    const entry = this.formatEntry(level, message, extra);
    this.output(entry);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // PUBLIC API
  // ─────────────────────────────────────────────────────────────────────────────

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.minLevel);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log('debug', message, { metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log('info', message, { metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log('warn', message, { metadata });
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('error', message, {
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : undefined,
    });
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log('fatal', message, {
      metadata,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : undefined,
    });
  }

  // Child loggers share the parent's level and output settings
  child(context: Partial<LogContext>): Logger {
    return new Logger(
      { ...this.context, ...context },
      { level: this.minLevel, redactPII: this.redactPII, jsonFormat: this.jsonFormat }
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON ROOT LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: Logger | null = null;

export function getLogger(context?: LogContext): Logger {
  if (!rootLogger) {
    rootLogger = new Logger();
  }
  if (context) {
    return rootLogger.child(context);
  }
  return rootLogger;
}
