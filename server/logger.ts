/**
 * Structured Logger
 *
 * Structured logging with run correlation and sensitive data redaction.
 *
 * Key behaviors:
 * - All logs include: level, msg, timestamp, plus runId / stage when attached via withContext
 * - Automatic redaction of credentials, tokens, secrets, passwords
 * - JSON output for production log aggregation
 * - Human-readable output for development
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info('Pricing run finished', { runId, applied: 12 });
 *   const runLog = logger.withContext({ runId });
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  runId?: string;
  stage?: string;
  [key: string]: unknown;
}

export interface ContextLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function configuredLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  if (raw && isLogLevel(raw)) return raw;
  return isProduction() ? 'info' : 'debug';
}

/**
 * Sensitive field patterns that should be redacted from logs
 */
const SENSITIVE_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /bearer/i,
  /api[_-]?key/i,
  /private[_-]?key/i,
  /credential/i,
];

/**
 * Redact sensitive fields from objects before logging
 */
function redactSensitiveData(value: unknown, depth: number = 0): unknown {
  if (depth > 5) return '[max depth]';

  if (value === null || value === undefined || typeof value !== 'object') return value;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: isProduction() ? undefined : value.stack,
    };
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveData(item, depth + 1));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
      redacted[key] = '[REDACTED]';
    } else {
      redacted[key] = redactSensitiveData(entry, depth + 1);
    }
  }
  return redacted;
}

function redactContext(context: LogContext): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(context)) {
    redacted[key] = SENSITIVE_PATTERNS.some((pattern) => pattern.test(key)) ? '[REDACTED]' : redactSensitiveData(entry, 1);
  }
  return redacted;
}

/**
 * Format log entry for output
 */
export function formatLog(level: LogLevel, message: string, context: LogContext, timestamp: string = new Date().toISOString()): string {
  const safeContext = redactContext(context);

  if (isProduction()) {
    return JSON.stringify({ level, msg: message, timestamp, ...safeContext });
  }

  const contextStr = Object.keys(safeContext).length > 0 ? ' ' + JSON.stringify(safeContext) : '';
  return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
}

/**
 * Check if log level should be emitted
 */
export function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[configuredLevel()];
}

/**
 * Core logging function
 */
function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (!shouldLog(level)) return;

  const output = formatLog(level, message, context);

  if (level === 'error') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

function bind(baseContext: LogContext): ContextLogger {
  return {
    debug: (message, context = {}) => log('debug', message, { ...baseContext, ...context }),
    info: (message, context = {}) => log('info', message, { ...baseContext, ...context }),
    warn: (message, context = {}) => log('warn', message, { ...baseContext, ...context }),
    error: (message, context = {}) => log('error', message, { ...baseContext, ...context }),
  };
}

/**
 * Structured logger instance
 */
export const logger = {
  ...bind({}),

  /**
   * Create a child logger with run context pre-attached
   */
  withContext(baseContext: LogContext): ContextLogger {
    return bind(baseContext);
  },
};

/**
 * Helper to log errors with full context
 */
export function logError(error: unknown, context: LogContext = {}, target: ContextLogger = logger): void {
  if (error instanceof Error) {
    target.error(error.message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: isProduction() ? undefined : error.stack,
      },
    });
  } else {
    target.error('Unknown error', {
      ...context,
      error: String(error),
    });
  }
}
