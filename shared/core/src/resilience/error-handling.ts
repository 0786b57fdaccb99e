/**
 * Shared Error Handling Utilities
 *
 * Coded error classes shared by the execution core, plus helpers to read a
 * message out of any thrown value.
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  INVALID_STATE = 1005,
  OPERATION_CANCELLED = 1006,

  // Blockchain errors (4000-4999)
  RPC_ERROR = 4000,
  RPC_TIMEOUT = 4001,
  RPC_RATE_LIMITED = 4002,
  INVALID_TRANSACTION = 4004,
  TRANSACTION_REVERTED = 4007,
  NONCE_ERROR = 4008,

  // Arbitrage errors (5000-5999)
  INSUFFICIENT_LIQUIDITY = 5001,
  PRICE_SLIPPAGE = 5002,
  GAS_TOO_HIGH = 5003,
  EXECUTION_FAILED = 5004,
  OPPORTUNITY_EXPIRED = 5005,
  UNPROFITABLE = 5006,
  BRIDGE_FAILED = 5007,

  // Validation errors (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,

  // Service lifecycle errors (7000-7999)
  SERVICE_NOT_STARTED = 7000,
  SERVICE_STOPPING = 7002,
  SHUTDOWN_TIMEOUT = 7003,
}

export enum ErrorSeverity {
  /** Expected, no action needed */
  INFO = 'info',
  /** Unexpected but recoverable */
  WARNING = 'warning',
  ERROR = 'error',
  /** Needs an operator */
  CRITICAL = 'critical',
}

// =============================================================================
// Error Classes
// =============================================================================

export interface ArbitrageErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class for the execution core.
 */
export class ArbitrageError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, options: ArbitrageErrorOptions = {}) {
    super(message);
    this.name = 'ArbitrageError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
    };
  }
}

/**
 * Invalid input, message or configuration.
 */
export class ValidationError extends ArbitrageError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; context?: Record<string, unknown> } = {}) {
    super(message, ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      context: { ...options.context, field: options.field },
    });
    this.name = 'ValidationError';
    this.field = options.field;
  }
}

/**
 * Failure while executing a trade step.
 */
export class ExecutionError extends ArbitrageError {
  readonly opportunityId?: string;
  readonly chain?: string;
  readonly transactionHash?: string;

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      opportunityId?: string;
      chain?: string;
      transactionHash?: string;
      cause?: unknown;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, options.code ?? ErrorCode.EXECUTION_FAILED, {
      severity: ErrorSeverity.ERROR,
      cause: options.cause,
      context: {
        ...options.context,
        opportunityId: options.opportunityId,
        chain: options.chain,
        transactionHash: options.transactionHash,
      },
    });
    this.name = 'ExecutionError';
    this.opportunityId = options.opportunityId;
    this.chain = options.chain;
    this.transactionHash = options.transactionHash;
  }
}

/**
 * A mined transaction whose receipt reports a revert.
 */
export class TransactionRevertedError extends ExecutionError {
  readonly gasUsed: bigint;

  constructor(chain: string, transactionHash: string, gasUsed: bigint, label?: string) {
    super(`Transaction reverted${label ? ` (${label})` : ''}: ${transactionHash}`, {
      code: ErrorCode.TRANSACTION_REVERTED,
      chain,
      transactionHash,
    });
    this.name = 'TransactionRevertedError';
    this.gasUsed = gasUsed;
  }
}

/**
 * A broadcast transaction with no receipt in time. It may still be mined, so
 * its effects are unknown rather than absent.
 */
export class TransactionPendingError extends ExecutionError {
  override readonly transactionHash: string;

  constructor(message: string, chain: string, transactionHash: string, code = ErrorCode.RPC_TIMEOUT, cause?: unknown) {
    super(message, { code, chain, transactionHash, cause });
    this.name = 'TransactionPendingError';
    this.transactionHash = transactionHash;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract a message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Unknown error';
  }
}

export function isCriticalError(error: unknown): boolean {
  if (error instanceof ArbitrageError) {
    return error.severity === ErrorSeverity.CRITICAL;
  }
  const message = getErrorMessage(error).toLowerCase();
  return message.includes('out of memory') || message.includes('fatal');
}

/**
 * Structured fields for logging an error.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof ArbitrageError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: getErrorMessage(error) };
}
