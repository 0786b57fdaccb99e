/**
 * Common types used across all services
 *
 * Consolidated from scattered definitions to ensure consistency.
 */

/**
 * Minimal logger interface for dependency injection.
 * Compatible with Pino and test mocks.
 */
export interface ILogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Error thrown when an awaited operation exceeds its deadline.
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional service name for context */
    public readonly service?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${service ? ` in ${service}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Milliseconds since epoch.
 */
export type Timestamp = number;
