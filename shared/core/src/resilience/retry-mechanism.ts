// Exponential Backoff and Retry Mechanism
// One retry policy for collaborator adapters (RPC reads, quotes, bridge status polls).

import { NullLogger } from '../logging/testing-logger';
import type { ILogger } from '../logging/types';
import { getErrorMessage } from './error-handling';

// =============================================================================
// Error Classification
// =============================================================================

export enum ErrorCategory {
  /** Temporary: retry */
  TRANSIENT = 'transient',
  /** Never retry */
  PERMANENT = 'permanent',
  /** Retry with caution */
  UNKNOWN = 'unknown',
}

const PERMANENT_ERROR_NAMES = [
  'ValidationError', 'AuthenticationError', 'AuthorizationError',
  'NotFoundError', 'InvalidInputError', 'InsufficientFundsError',
  'TransactionRevertedError',
];

const TRANSIENT_CODES = [
  'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED',
  'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH', 'ENETUNREACH',
];

const TRANSIENT_STATUSES = [429, 500, 502, 503, 504];

const TRANSIENT_MESSAGES = [
  'timeout', 'connection', 'network', 'temporary',
  'rate limit', 'too many requests', 'service unavailable',
];

// JSON-RPC 2.0 codes that usually clear on their own
const RPC_TRANSIENT_CODES = [-32700, -32600, -32000, -32005, -32603];

function readProperty(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/**
 * Classify an error to decide whether it is worth retrying.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error === null || error === undefined) return ErrorCategory.PERMANENT;
  if (typeof error !== 'object') {
    const message = String(error).toLowerCase();
    return TRANSIENT_MESSAGES.some(m => message.includes(m)) ? ErrorCategory.TRANSIENT : ErrorCategory.UNKNOWN;
  }

  const name = error instanceof Error ? error.name : '';
  const code = readProperty(error, 'code');
  const rawStatus = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  const status = typeof rawStatus === 'number' ? rawStatus : undefined;
  const message = getErrorMessage(error).toLowerCase();

  if (PERMANENT_ERROR_NAMES.includes(name)) {
    return ErrorCategory.PERMANENT;
  }
  if (status !== undefined && status >= 400 && status < 500 && status !== 429) {
    return ErrorCategory.PERMANENT;
  }
  if (typeof code === 'string' && TRANSIENT_CODES.includes(code)) {
    return ErrorCategory.TRANSIENT;
  }
  if (typeof code === 'number' && RPC_TRANSIENT_CODES.includes(code)) {
    return ErrorCategory.TRANSIENT;
  }
  if (status !== undefined && TRANSIENT_STATUSES.includes(status)) {
    return ErrorCategory.TRANSIENT;
  }
  if (TRANSIENT_MESSAGES.some(m => message.includes(m))) {
    return ErrorCategory.TRANSIENT;
  }
  return ErrorCategory.UNKNOWN;
}

export function isRetryableError(error: unknown): boolean {
  return classifyError(error) !== ErrorCategory.PERMANENT;
}

// =============================================================================
// RetryMechanism
// =============================================================================

export interface RetryConfig {
  maxAttempts: number;
  /** Base delay in milliseconds */
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  /** Add up to 25% random jitter */
  jitter: boolean;
  retryCondition?: (error: unknown) => boolean;
  /** Called before each retry */
  onRetry?: (attempt: number, error: unknown, delay: number) => void;
}

export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalDelay: number }
  | { success: false; error: unknown; attempts: number; totalDelay: number };

export class RetryMechanism {
  private readonly config: Required<RetryConfig>;
  private readonly logger: ILogger;

  constructor(config: Partial<RetryConfig> = {}, logger: ILogger = new NullLogger()) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      initialDelay: config.initialDelay ?? 1000,
      maxDelay: config.maxDelay ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitter: config.jitter !== false,
      retryCondition: config.retryCondition ?? isRetryableError,
      onRetry: config.onRetry ?? (() => undefined),
    };
    this.logger = logger;
  }

  async execute<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    let lastError: unknown;
    let totalDelay = 0;
    let attempt = 1;

    for (attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        const result = await fn();
        return { success: true, result, attempts: attempt, totalDelay };
      } catch (error) {
        lastError = error;

        if (!this.config.retryCondition(error)) {
          this.logger.debug('Error not retryable, giving up', { error: getErrorMessage(error), attempt });
          break;
        }
        if (attempt === this.config.maxAttempts) {
          break;
        }

        const delay = this.calculateDelay(attempt);
        this.logger.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, {
          error: getErrorMessage(error),
          attempt,
          maxAttempts: this.config.maxAttempts,
        });
        this.config.onRetry(attempt, error, delay);

        await new Promise<void>(resolve => setTimeout(resolve, delay));
        totalDelay += delay;
      }
    }

    return {
      success: false,
      error: lastError,
      attempts: Math.min(this.config.maxAttempts, attempt),
      totalDelay,
    };
  }

  /**
   * Delay before retry number `attempt` (1-based).
   */
  calculateDelay(attempt: number): number {
    let delay = this.config.initialDelay * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelay);

    if (this.config.jitter) {
      delay += delay * 0.25 * Math.random();
    }
    return Math.floor(delay);
  }
}

/**
 * Run `fn` under the retry policy, rethrowing the last error on exhaustion.
 *
 * @example
 * ```typescript
 * const gasPrice = await withRetry(() => client.getGasPrice(), { maxAttempts: 3, initialDelay: 200 });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config?: Partial<RetryConfig>,
  logger?: ILogger
): Promise<T> {
  const result = await new RetryMechanism(config, logger).execute(fn);
  if (result.success) {
    return result.result;
  }
  throw result.error;
}
