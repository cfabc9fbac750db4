import { HttpClientError } from './base.js';

/**
 * Raised when client options fail validation.
 */
export class ConfigurationError extends HttpClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ category: 'configuration', message, details });
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a request cannot be built, e.g. from an unparsable URL.
 */
export class RequestError extends HttpClientError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: Error } = {}) {
    super({ category: 'request', message, ...options });
    this.name = 'RequestError';
  }
}

/**
 * Raised when a secret file cannot be read.
 */
export class SecretError extends HttpClientError {
  constructor(path: string, cause?: Error) {
    super({
      category: 'secret',
      message: `Failed to read secret from ${path}`,
      isRetryable: true,
      details: { path },
      cause,
    });
    this.name = 'SecretError';
  }
}

/**
 * Raised when a one-shot lifecycle operation is repeated, such as closing an
 * already closed background task.
 */
export class LifecycleError extends HttpClientError {
  constructor(message: string) {
    super({ category: 'lifecycle', message });
    this.name = 'LifecycleError';
  }
}
