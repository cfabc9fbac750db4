/**
 * Base error class for all HTTP client errors.
 *
 * Errors raised by the underlying pooled transport are never wrapped in these
 * classes; they reach the caller unchanged.
 */

/**
 * Error category for classifying client errors
 */
export type ErrorCategory =
  | 'configuration'
  | 'request'
  | 'secret'
  | 'lifecycle';

/**
 * Base error class for all HTTP client errors.
 * Carries a category, retry hint, structured details and an optional cause.
 */
export abstract class HttpClientError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * Indicates whether repeating the failed operation may succeed
   */
  public readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  /**
   * The original error that caused this error, if any
   */
  declare public readonly cause?: Error;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'HttpClientError';
    this.category = options.category;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      isRetryable: this.isRetryable,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is an HttpClientError
 */
export function isHttpClientError(error: unknown): error is HttpClientError {
  return error instanceof HttpClientError;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(
  error: unknown,
  category: ErrorCategory
): boolean {
  return isHttpClientError(error) && error.category === category;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
