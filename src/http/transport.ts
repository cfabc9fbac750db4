/**
 * Decorating transport: bearer-token injection and request tracing around a
 * pooled connection transport.
 *
 * @module http/transport
 */

import type { Tracer } from '@opentelemetry/api';
import { resolveOptions } from '../config/index.js';
import type { ClientOptions, HeaderPropagator, ResolvedOptions } from '../config/index.js';
import type { Logger } from '../observability/index.js';
import { PhaseEvent, logKV, setStatusCode, spanClientTrace, startRequestSpan } from '../tracing/index.js';
import { AUTHORIZATION_HEADER, bearer, hasHeader, setHeader } from './headers.js';
import { UndiciConnectionPool } from './pool.js';
import type { PooledTransport } from './pool.js';
import { IdleConnectionSweeper } from './sweeper.js';
import type { HttpRequest, HttpResponse } from './types.js';

/**
 * Resources shared by a transport and every view derived from it. Read-only
 * after construction.
 */
export interface TransportResources {
  readonly pool: PooledTransport;
  readonly tracer: Tracer;
  readonly propagator: HeaderPropagator;
  readonly logger: Logger;
  readonly sweeper: IdleConnectionSweeper;
  readonly config: ResolvedOptions;
}

/**
 * Per-view settings. Never mutated; views differ only here.
 */
export interface TransportSettings {
  readonly spanName: string;
  readonly componentTag: string;
  readonly bearerToken: string;
}

/**
 * Transport that decorates each round trip on a shared pooled connection
 * transport.
 *
 * Views are immutable: `withSpanName`, `withComponentTag` and
 * `withBearerToken` return a new transport sharing the pool, tracer and
 * background sweep task, so a request in flight on one view never sees a
 * change made through another. To rotate a token, keep the returned view.
 *
 * @example
 * ```typescript
 * let transport = createTransport({ timeout: 5000 });
 * transport = transport.withBearerToken(await fetchToken());
 *
 * const response = await transport.roundTrip({
 *   method: 'GET',
 *   url: 'https://api.example.com/v1/items',
 *   headers: {},
 * });
 *
 * transport.close();
 * ```
 */
export class Transport {
  /**
   * Use `createTransport` to build a transport.
   *
   * @internal
   */
  constructor(
    private readonly resources: TransportResources,
    private readonly settings: TransportSettings
  ) {}

  /**
   * The configuration the transport was built from.
   */
  get config(): ResolvedOptions {
    return this.resources.config;
  }

  get spanName(): string {
    return this.settings.spanName;
  }

  get componentTag(): string {
    return this.settings.componentTag;
  }

  get bearerToken(): string {
    return this.settings.bearerToken;
  }

  /**
   * Whether the shared sweep task has been stopped.
   */
  get closed(): boolean {
    return this.resources.sweeper.closed;
  }

  /**
   * Sends a request through the pool.
   *
   * Sets `Authorization: Bearer <token>` when this view carries a token and
   * the request has no Authorization header. When a span name is set, the
   * round trip runs inside a client span that records connection phases.
   * Errors from the pool propagate unchanged. The caller's request object is
   * not modified.
   */
  async roundTrip(request: HttpRequest): Promise<HttpResponse> {
    const outgoing: HttpRequest = { ...request, headers: { ...request.headers } };

    if (this.settings.bearerToken !== '' && !hasHeader(outgoing.headers, AUTHORIZATION_HEADER)) {
      setHeader(outgoing.headers, AUTHORIZATION_HEADER, bearer(this.settings.bearerToken));
    }

    if (this.settings.spanName === '') {
      return this.resources.pool.roundTrip(outgoing);
    }

    const span = startRequestSpan(outgoing, {
      tracer: this.resources.tracer,
      propagator: this.resources.propagator,
      logger: this.resources.logger,
      spanName: this.settings.spanName,
      componentTag: this.settings.componentTag,
    });

    let response: HttpResponse | undefined;
    try {
      logKV(span, PhaseEvent.HTTP_DO, 'start');
      response = await this.resources.pool.roundTrip(outgoing, spanClientTrace(span));
      return response;
    } finally {
      logKV(span, PhaseEvent.HTTP_DO, 'stop');
      if (response) {
        setStatusCode(span, response.status);
      }
      span.end();
    }
  }

  /**
   * Returns a view that names request spans `spanName`. An empty name turns
   * tracing off for the view.
   */
  withSpanName(spanName: string): Transport {
    return this.derive({ spanName });
  }

  /**
   * Returns a view that tags request spans with `componentTag`.
   */
  withComponentTag(componentTag: string): Transport {
    return this.derive({ componentTag });
  }

  /**
   * Returns a view that sends `bearerToken` on requests lacking an
   * Authorization header.
   */
  withBearerToken(bearerToken: string): Transport {
    return this.derive({ bearerToken });
  }

  /**
   * Stops the background sweep task shared by all views of this transport.
   * Call it once, from the owner of the transport family.
   *
   * @throws LifecycleError when the task was already stopped
   */
  close(): void {
    this.resources.sweeper.close();
  }

  /**
   * Stops the sweep task and closes the pool once in-flight requests finish.
   */
  async shutdown(): Promise<void> {
    this.close();
    await this.resources.pool.close();
  }

  /**
   * Reclaims idle pooled connections now, independent of the sweep schedule.
   */
  closeIdleConnections(): void {
    this.resources.pool.closeIdleConnections();
  }

  private derive(overrides: Partial<TransportSettings>): Transport {
    const settings: TransportSettings = { ...this.settings, ...overrides };
    return new Transport(this.resources, settings);
  }
}

/**
 * Builds a transport family: resolves the options, creates the pool (unless
 * one is supplied) and starts the single background sweep task.
 */
export function createTransport(options: ClientOptions = {}): Transport {
  const config = resolveOptions(options);
  const pool = options.pool ?? new UndiciConnectionPool(config);

  const resources: TransportResources = {
    pool,
    tracer: config.tracer,
    propagator: config.propagator,
    logger: config.logger,
    sweeper: new IdleConnectionSweeper(pool, config.idleConnTimeout, config.logger),
    config,
  };

  return new Transport(resources, {
    spanName: config.tracingSpanName,
    componentTag: config.tracingComponentTag,
    bearerToken: '',
  });
}
