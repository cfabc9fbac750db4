/**
 * Configuration validation for the HTTP client
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { MAX_TIMER_DELAY } from './defaults.js';
import type { ClientOptions } from './options.js';

const duration = z.number().int().nonnegative().max(MAX_TIMER_DELAY).optional();
const size = z.number().int().nonnegative().optional();

/**
 * Schema for the scalar options. Collaborators (tracer, logger, secrets
 * reader, lookup, pool) are checked by the type system only.
 */
const optionsSchema = z.object({
  disableKeepAlives: z.boolean().optional(),
  disableCompression: z.boolean().optional(),
  forceAttemptHTTP2: z.boolean().optional(),
  maxConnsPerHost: size,
  maxResponseHeaderBytes: size,
  timeout: duration,
  tlsHandshakeTimeout: duration,
  idleConnTimeout: duration,
  responseHeaderTimeout: duration,
  expectContinueTimeout: duration,
  bearerTokenFile: z.string().optional(),
  bearerTokenRefreshInterval: duration,
  tracingComponentTag: z.string().optional(),
  tracingSpanName: z.string().optional(),
});

/**
 * Validates client options.
 *
 * @throws ConfigurationError listing every offending field
 */
export function validateOptions(options: ClientOptions): void {
  const result = optionsSchema.safeParse({
    disableKeepAlives: options.disableKeepAlives,
    disableCompression: options.disableCompression,
    forceAttemptHTTP2: options.forceAttemptHTTP2,
    maxConnsPerHost: options.maxConnsPerHost,
    maxResponseHeaderBytes: options.maxResponseHeaderBytes,
    timeout: options.timeout,
    tlsHandshakeTimeout: options.tlsHandshakeTimeout,
    idleConnTimeout: options.idleConnTimeout,
    responseHeaderTimeout: options.responseHeaderTimeout,
    expectContinueTimeout: options.expectContinueTimeout,
    bearerTokenFile: options.bearerTokenFile,
    bearerTokenRefreshInterval: options.bearerTokenRefreshInterval,
    tracingComponentTag: options.tracingComponentTag,
    tracingSpanName: options.tracingSpanName,
  });

  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, {
      issues: result.error.issues,
    });
  }
}
