/**
 * Logger Type Definitions
 *
 * ILogger decouples the execution core from pino so that services take a
 * logger by injection and tests pass a RecordingLogger or NullLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

/**
 * Metadata attached to a log entry. BigInt values are serialized as strings.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class BridgeSelector {
 *   constructor(private readonly logger: ILogger) {}
 * }
 *
 * new BridgeSelector(createPinoLogger('bridge-selector'));
 * new BridgeSelector(new RecordingLogger());
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose entries all carry `bindings`.
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Service or module name, also the cache key */
  name: string;
  /** Defaults to LOG_LEVEL, then 'info' */
  level?: LogLevel;
  /** Defaults to true when NODE_ENV=development and LOG_FORMAT is not json */
  pretty?: boolean;
  bindings?: LogMeta;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}
