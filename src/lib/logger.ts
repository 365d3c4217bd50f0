/**
 * Structured logging utility for production observability
 * Outputs JSON logs compatible with log aggregation services
 *
 * SECURITY: Implements automatic redaction of sensitive fields
 */

import { getRequestContext } from './request-context';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  userId?: string;
  service: string;
  environment: string;
  route?: string;
  method?: string;
  durationMs?: number;
  [key: string]: unknown;
}

type LogMeta = Record<string, unknown>;

const SERVICE_NAME = 'trial-catalog';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// LOG_LEVEL wins; otherwise info in production and debug elsewhere.
// Read on every call so tests and scripts can change it at runtime.
function minLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// Fields to redact from logs (case-insensitive matching)
const REDACTED_FIELDS = new Set([
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'cookie',
  'sessiontoken',
  'accesstoken',
  'refreshtoken',
  'bearer',
  'credential',
  'private_key',
  'privatekey',
  'database_url',
  'databaseurl',
  'connectionstring',
]);

// Patterns to redact from string values
const REDACT_PATTERNS = [
  /Bearer\s+[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_]+/gi, // JWT tokens
  /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g, // Email addresses
  /postgres(?:ql)?:\/\/[^\s]+/gi, // Connection strings with credentials
];

/**
 * Redact sensitive information from log metadata
 */
function redactSensitive(obj: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    let result = obj;
    for (const pattern of REDACT_PATTERNS) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redactSensitive(item, depth + 1));
  }

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (REDACTED_FIELDS.has(key.toLowerCase())) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSensitive(value, depth + 1);
      }
    }
    return redacted;
  }

  return obj;
}

function redactMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) return undefined;
  const redacted = redactSensitive(meta);
  return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
    ? { ...redacted }
    : undefined;
}

/**
 * Reduce an unknown thrown value to a log-safe message.
 */
export function sanitizeErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const redacted = redactSensitive(message);
  return typeof redacted === 'string' ? redacted : 'Unknown error';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLogLevel()];
}

function buildEntry(level: LogLevel, message: string, meta?: LogMeta): LogEntry {
  const context = getRequestContext();

  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    requestId: context?.requestId,
    userId: context?.userId,
    service: SERVICE_NAME,
    environment: process.env.NODE_ENV || 'development',
    route: context?.path,
    method: context?.method,
    ...redactMeta(meta),
  };
}

function write(level: LogLevel, entry: LogEntry, meta?: LogMeta): void {
  // In production, output JSON for log aggregation
  if (process.env.NODE_ENV === 'production') {
    const output = JSON.stringify(entry);
    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
    return;
  }

  const prefix = `[${entry.timestamp}] [${level.toUpperCase()}]`;
  const contextInfo = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
  const userInfo = entry.userId ? ` [user:${entry.userId.slice(0, 8)}]` : '';
  const safeMeta = redactMeta(meta);

  switch (level) {
    case 'error':
      console.error(`${prefix}${contextInfo}${userInfo}`, entry.message, safeMeta || '');
      break;
    case 'warn':
      console.warn(`${prefix}${contextInfo}${userInfo}`, entry.message, safeMeta || '');
      break;
    case 'debug':
      console.debug(`${prefix}${contextInfo}${userInfo}`, entry.message, safeMeta || '');
      break;
    default:
      console.log(`${prefix}${contextInfo}${userInfo}`, entry.message, safeMeta || '');
  }
}

async function log(level: LogLevel, message: string, meta?: LogMeta): Promise<void> {
  logSync(level, message, meta);
}

/**
 * Synchronous log function for use in catch blocks where async is awkward
 */
function logSync(level: LogLevel, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return;
  write(level, buildEntry(level, message, meta), meta);
}

/**
 * Structured logger with request context correlation
 *
 * Provides both async (default) and sync methods:
 * - Async methods (`logger.info`, etc.) for awaited call sites in handlers
 * - Sync methods (`logger.sync.info`, etc.) for catch blocks and callbacks
 *
 * @example
 * ```ts
 * await logger.info('Trial saved', { trialId });
 * logger.sync.error('Search failed', { error: sanitizeErrorMessage(err) });
 *
 * const dbLogger = logger.child({ component: 'pg' });
 * dbLogger.sync.error('Transaction rollback failed', { error });
 * ```
 */
export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),

  sync: {
    debug: (message: string, meta?: LogMeta) => logSync('debug', message, meta),
    info: (message: string, meta?: LogMeta) => logSync('info', message, meta),
    warn: (message: string, meta?: LogMeta) => logSync('warn', message, meta),
    error: (message: string, meta?: LogMeta) => logSync('error', message, meta),
  },

  /**
   * Create a child logger with preset metadata
   */
  child: (defaultMeta: LogMeta) => ({
    debug: (message: string, meta?: LogMeta) => log('debug', message, { ...defaultMeta, ...meta }),
    info: (message: string, meta?: LogMeta) => log('info', message, { ...defaultMeta, ...meta }),
    warn: (message: string, meta?: LogMeta) => log('warn', message, { ...defaultMeta, ...meta }),
    error: (message: string, meta?: LogMeta) => log('error', message, { ...defaultMeta, ...meta }),
    sync: {
      debug: (message: string, meta?: LogMeta) =>
        logSync('debug', message, { ...defaultMeta, ...meta }),
      info: (message: string, meta?: LogMeta) =>
        logSync('info', message, { ...defaultMeta, ...meta }),
      warn: (message: string, meta?: LogMeta) =>
        logSync('warn', message, { ...defaultMeta, ...meta }),
      error: (message: string, meta?: LogMeta) =>
        logSync('error', message, { ...defaultMeta, ...meta }),
    },
  }),
};

export type Logger = typeof logger;

export { redactSensitive };
