/**
 * Resilience Module
 *
 * - Error handling: coded error classes and message helpers
 * - Retry mechanism: exponential backoff for collaborator adapters
 *
 * The retry exports are for adapters implementing ChainClient, DexRouter,
 * BridgeProvider or PriceFeed over a network client. The engine itself never
 * retries: a failed saga step ends the saga, and a resubmitted transaction
 * could double-spend.
 */

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
} from './error-handling';
export type { ArbitrageErrorOptions } from './error-handling';

export {
  RetryMechanism,
  withRetry,
  ErrorCategory,
  classifyError,
  isRetryableError,
} from './retry-mechanism';
export type { RetryConfig, RetryResult } from './retry-mechanism';
