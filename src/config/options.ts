/**
 * Client options and their resolution into an immutable configuration.
 *
 * @module config/options
 */

import { ProxyTracerProvider, propagation } from '@opentelemetry/api';
import type { TextMapPropagator, Tracer } from '@opentelemetry/api';
import type { SecretLookup } from '../auth/lookup.js';
import type { SecretsReader } from '../auth/secrets.js';
import type { PooledTransport } from '../http/pool.js';
import { ConsoleLogger } from '../observability/index.js';
import type { Logger } from '../observability/index.js';
import { DEFAULT_IDLE_CONN_TIMEOUT, durationOr } from './defaults.js';
import { validateOptions } from './validation.js';

/**
 * Serializes a span context into outgoing headers.
 */
export type HeaderPropagator = Pick<TextMapPropagator, 'inject'>;

/**
 * Construction-time options for the transport and client.
 *
 * `timeout` is the default for every phase timeout left unset or set to 0.
 * All durations are in milliseconds.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({
 *   timeout: 2000,
 *   tracer: trace.getTracer('billing'),
 *   tracingSpanName: 'billing-api',
 *   tracingComponentTag: 'billing-client',
 *   bearerTokenFile: '/var/run/secrets/token',
 * });
 * ```
 */
export interface ClientOptions {
  /** Disables connection reuse */
  disableKeepAlives?: boolean;
  /** Disables transparent gzip negotiation and decoding */
  disableCompression?: boolean;
  /** Negotiates HTTP/2 over TLS when the server offers it */
  forceAttemptHTTP2?: boolean;
  /** Maximum connections per origin, 0 for no limit */
  maxConnsPerHost?: number;
  /** Maximum size of response headers in bytes, 0 for the pool default */
  maxResponseHeaderBytes?: number;

  /** Default for every timeout that is not set */
  timeout?: number;
  /** Connect and TLS handshake timeout, defaults to `timeout` */
  tlsHandshakeTimeout?: number;
  /** Idle keep-alive timeout and sweep interval, defaults to `timeout` or 30s */
  idleConnTimeout?: number;
  /** Time to wait for response headers, defaults to `timeout` */
  responseHeaderTimeout?: number;
  /** Time to wait for `100 Continue`, defaults to `timeout` */
  expectContinueTimeout?: number;

  /** Tracer for request spans; a no-op tracer is used when absent */
  tracer?: Tracer;
  /** Header serialization of span contexts, defaults to the global propagator */
  propagator?: HeaderPropagator;
  /** Component tag set on every request span */
  tracingComponentTag?: string;
  /** Span name for every request; tracing is off while it is empty */
  tracingSpanName?: string;

  /**
   * File holding a bearer token. Ignored when `secretsReader` is given.
   */
  bearerTokenFile?: string;
  /** Refresh interval for `bearerTokenFile`, defaults to 5 minutes */
  bearerTokenRefreshInterval?: number;
  /** Source of bearer tokens */
  secretsReader?: SecretsReader;
  /**
   * Maps a request URL to the key passed to `secretsReader.getSecret`.
   * Defaults to a static lookup of `bearerTokenFile`.
   */
  lookup?: SecretLookup;

  /** Logger for background and best-effort failures */
  logger?: Logger;

  /** Pooled connection transport, an undici pool is created when absent */
  pool?: PooledTransport;
}

/**
 * Options after validation and default filling. Never re-evaluated.
 */
export interface ResolvedOptions {
  readonly disableKeepAlives: boolean;
  readonly disableCompression: boolean;
  readonly forceAttemptHTTP2: boolean;
  readonly maxConnsPerHost: number;
  readonly maxResponseHeaderBytes: number;
  readonly timeout: number;
  readonly tlsHandshakeTimeout: number;
  readonly idleConnTimeout: number;
  readonly responseHeaderTimeout: number;
  readonly expectContinueTimeout: number;
  readonly tracer: Tracer;
  readonly propagator: HeaderPropagator;
  readonly tracingComponentTag: string;
  readonly tracingSpanName: string;
  readonly logger: Logger;
}

const TRACER_NAME = 'traced-http-client';

/**
 * Validates the options and fills in defaults.
 *
 * @throws ConfigurationError when a duration or size is negative or fractional
 *
 * @example
 * ```typescript
 * const resolved = resolveOptions({ timeout: 2000 });
 * resolved.tlsHandshakeTimeout; // 2000
 * resolved.idleConnTimeout;     // 2000
 * ```
 */
export function resolveOptions(options: ClientOptions = {}): ResolvedOptions {
  validateOptions(options);

  const timeout = options.timeout ?? 0;

  return Object.freeze({
    disableKeepAlives: options.disableKeepAlives ?? false,
    disableCompression: options.disableCompression ?? false,
    forceAttemptHTTP2: options.forceAttemptHTTP2 ?? false,
    maxConnsPerHost: options.maxConnsPerHost ?? 0,
    maxResponseHeaderBytes: options.maxResponseHeaderBytes ?? 0,
    timeout,
    tlsHandshakeTimeout: durationOr(options.tlsHandshakeTimeout, timeout),
    idleConnTimeout: durationOr(options.idleConnTimeout, durationOr(timeout, DEFAULT_IDLE_CONN_TIMEOUT)),
    responseHeaderTimeout: durationOr(options.responseHeaderTimeout, timeout),
    expectContinueTimeout: durationOr(options.expectContinueTimeout, timeout),
    // A provider without a delegate hands out tracers whose spans are inert.
    tracer: options.tracer ?? new ProxyTracerProvider().getTracer(TRACER_NAME),
    propagator: options.propagator ?? propagation,
    tracingComponentTag: options.tracingComponentTag ?? '',
    tracingSpanName: options.tracingSpanName ?? '',
    logger: options.logger ?? new ConsoleLogger(),
  });
}
