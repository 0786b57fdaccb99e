/**
 * Pino Logger Implementation
 *
 * - One cached logger per name
 * - BigInt values formatted as strings (wei amounts, nonces)
 * - JSON output by default, pino-pretty in development
 * - Key material and endpoints redacted
 */

import pino, { type Logger as PinoLoggerType, type LoggerOptions } from 'pino';
import { isLogLevel, type ILogger, type LoggerConfig, type LogLevel, type LogMeta } from './types';

// =============================================================================
// Singleton Cache
// =============================================================================

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers. Used by tests.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

// =============================================================================
// Formatting
// =============================================================================

const MAX_FORMAT_DEPTH = 10;

/**
 * Paths censored in every entry.
 */
export const REDACTED_PATHS: readonly string[] = [
  'privateKey', '*.privateKey',
  'apiKey', '*.apiKey',
  'secret', '*.secret',
  'password', '*.password',
  'authorization', '*.authorization',
  'token', '*.token',
  'rpcUrl', '*.rpcUrl',
];

function containsBigInt(value: unknown, seen: WeakSet<object>, depth: number): boolean {
  if (typeof value === 'bigint') return true;
  if (value === null || typeof value !== 'object') return false;
  // Too deep to scan; format to be safe
  if (depth >= MAX_FORMAT_DEPTH) return true;
  if (seen.has(value)) return false;
  seen.add(value);

  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  return children.some((child) => containsBigInt(child, seen, depth + 1));
}

function formatValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  if (depth >= MAX_FORMAT_DEPTH) {
    return '[Max Depth]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => formatValue(item, seen, depth + 1));
  }
  if (value instanceof Date || value instanceof Error) {
    return value;
  }

  const formatted: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    formatted[key] = formatValue(child, seen, depth + 1);
  }
  return formatted;
}

/**
 * Convert BigInt values in a log object to strings.
 * Returns the same object when there is nothing to convert.
 */
export function formatLogObject(obj: Record<string, unknown>): Record<string, unknown> {
  if (!containsBigInt(obj, new WeakSet<object>(), 0)) {
    return obj;
  }

  const seen = new WeakSet<object>();
  seen.add(obj);
  const formatted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    formatted[key] = formatValue(value, seen, 1);
  }
  return formatted;
}

// =============================================================================
// Pino Logger Wrapper
// =============================================================================

class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.fatal(meta, msg);
    } else {
      this.pino.fatal(msg);
    }
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.error(meta, msg);
    } else {
      this.pino.error(msg);
    }
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.warn(meta, msg);
    } else {
      this.pino.warn(msg);
    }
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.info(meta, msg);
    } else {
      this.pino.info(msg);
    }
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.debug(meta, msg);
    } else {
      this.pino.debug(msg);
    }
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) {
      this.pino.trace(meta, msg);
    } else {
      this.pino.trace(msg);
    }
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Build the pino options for a logger. Exposed for tests.
 */
export function buildPinoOptions(config: LoggerConfig, env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const level: LogLevel = config.level ?? (isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info');
  const usePretty = config.pretty ?? (env.LOG_FORMAT !== 'json' && env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name: config.name,
    level,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      log: formatLogObject,
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: config.name,
      pid: process.pid,
    },
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  return options;
}

/**
 * Create a pino-backed logger. The same name returns the same instance.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('execution-engine');
 * const sagaLogger = createPinoLogger({ name: 'execution-engine', bindings: { component: 'saga' } });
 * ```
 */
export function createPinoLogger(config: string | LoggerConfig): ILogger {
  const normalized: LoggerConfig = typeof config === 'string' ? { name: config } : config;

  let logger = loggerCache.get(normalized.name);
  if (!logger) {
    logger = new PinoLoggerWrapper(pino(buildPinoOptions(normalized)));
    loggerCache.set(normalized.name, logger);
  }

  // Children are never cached
  return normalized.bindings ? logger.child(normalized.bindings) : logger;
}

/**
 * Alias of createPinoLogger for DI call sites.
 */
export function getLogger(name: string): ILogger {
  return createPinoLogger(name);
}
