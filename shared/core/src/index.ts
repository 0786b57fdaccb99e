/**
 * @xarb/core - Core Library
 *
 * Infrastructure shared by the execution services:
 *
 * - Logging (pino behind ILogger, plus test loggers)
 * - Resilience (coded errors, retry policy)
 * - Async helpers (timeouts, abort handling)
 * - NonceManager
 * - IntervalManager
 * - CircularBuffer
 *
 * @module @xarb/core
 */

// =============================================================================
// Logging
// =============================================================================

export {
  createPinoLogger,
  buildPinoOptions,
  formatLogObject,
  getLogger,
  resetLoggerCache,
  REDACTED_PATHS,
  LOG_LEVELS,
  isLogLevel,
  RecordingLogger,
  NullLogger,
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// Resilience
// =============================================================================

export {
  ArbitrageError,
  ValidationError,
  ExecutionError,
  TransactionRevertedError,
  TransactionPendingError,
  ErrorCode,
  ErrorSeverity,
  getErrorMessage,
  isCriticalError,
  formatErrorForLog,
  // Retry policy for collaborator adapters; unused by the engine
  RetryMechanism,
  withRetry,
  ErrorCategory,
  classifyError,
  isRetryableError,
} from './resilience';
export type { ArbitrageErrorOptions, RetryConfig, RetryResult } from './resilience';

// =============================================================================
// Async
// =============================================================================

export {
  withTimeout,
  withTimeoutDefault,
  sleep,
  AbortedError,
  abortReason,
  throwIfAborted,
  raceAbort,
  TimeoutError,
} from './async';

// =============================================================================
// Execution Plumbing
// =============================================================================

export { NonceManager } from './nonce-manager';
export type { NonceManagerConfig, NonceSource, NonceState } from './nonce-manager';

export { IntervalManager } from './interval-manager';
export type { IntervalInfo, IntervalManagerStats } from './interval-manager';

export { CircularBuffer } from './data-structures';
