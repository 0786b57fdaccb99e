/**
 * Logging Module
 *
 * Production code takes an ILogger from createPinoLogger(); tests inject
 * RecordingLogger or NullLogger.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';
export { LOG_LEVELS, isLogLevel } from './types';

export {
  createPinoLogger,
  buildPinoOptions,
  formatLogObject,
  getLogger,
  resetLoggerCache,
  REDACTED_PATHS,
} from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
