/**
 * Connection pooling for the HTTP transport.
 *
 * The default pool wraps undici's Agent. Connection phases are reported per
 * request through `ClientTrace` hooks: the connector reports DNS, TCP and TLS
 * phases of every connection it dials to the request that triggered the dial,
 * and undici's `undici:client:sendHeaders` diagnostics channel marks the
 * moment the request obtained a connection.
 *
 * @module http/pool
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { subscribe } from 'node:diagnostics_channel';
import { Socket, isIP } from 'node:net';
import { gunzipSync } from 'node:zlib';
import { Agent, buildConnector } from 'undici';
import type { ResolvedOptions } from '../config/index.js';
import { LifecycleError } from '../errors/index.js';
import { errorContext } from '../observability/index.js';
import type { Logger } from '../observability/index.js';
import type { ClientTrace } from '../tracing/index.js';
import { deleteHeader, hasHeader, setHeader } from './headers.js';
import type { HttpRequest, HttpResponse } from './types.js';

/**
 * The pooled-connection primitive the transport delegates to. It must be safe
 * for concurrent use.
 */
export interface PooledTransport {
  /**
   * Sends the request over a pooled connection, reporting connection phases
   * to `trace` when given.
   */
  roundTrip(request: HttpRequest, trace?: ClientTrace): Promise<HttpResponse>;

  /**
   * Reclaims idle connections. Connections serving a request are left alone.
   */
  closeIdleConnections(): void;

  /**
   * Closes every connection once in-flight requests complete.
   */
  close(): Promise<void>;
}

/**
 * Pool settings taken from the resolved options.
 */
export type PoolConfig = Pick<
  ResolvedOptions,
  | 'disableKeepAlives'
  | 'disableCompression'
  | 'forceAttemptHTTP2'
  | 'maxConnsPerHost'
  | 'maxResponseHeaderBytes'
  | 'tlsHandshakeTimeout'
  | 'idleConnTimeout'
  | 'responseHeaderTimeout'
  | 'logger'
>;

/**
 * Per-request trace state carried through undici's call chain.
 */
interface TraceState {
  readonly trace: ClientTrace;
  dialed: boolean;
  acquired: boolean;
}

const traceStorage = new AsyncLocalStorage<TraceState>();

let sendHeadersSubscribed = false;

function subscribeSendHeaders(): void {
  if (sendHeadersSubscribed) {
    return;
  }
  subscribe('undici:client:sendHeaders', () => {
    const state = traceStorage.getStore();
    if (state) {
      markAcquired(state);
    }
  });
  sendHeadersSubscribed = true;
}

function markAcquired(state: TraceState): void {
  if (state.acquired) {
    return;
  }
  state.acquired = true;
  state.trace.gotConn?.({ reused: !state.dialed });
}

/**
 * Connection pool backed by an undici Agent.
 *
 * Idle connections are reclaimed by retiring the current agent: the retired
 * agent closes its idle sockets at once and the busy ones after their
 * requests complete, while new requests dial fresh connections (and resolve
 * DNS again) through a new agent.
 *
 * @example
 * ```typescript
 * const pool = new UndiciConnectionPool(resolveOptions({ timeout: 5000 }));
 *
 * try {
 *   const response = await pool.roundTrip({
 *     method: 'GET',
 *     url: 'https://api.example.com/v1/items',
 *     headers: { Accept: 'application/json' },
 *   });
 *   console.log('Status:', response.status);
 * } finally {
 *   await pool.close();
 * }
 * ```
 */
export class UndiciConnectionPool implements PooledTransport {
  private readonly config: PoolConfig;
  private readonly logger: Logger;
  private readonly connector: buildConnector.connector;
  private agent: Agent;
  private closed = false;

  constructor(config: PoolConfig) {
    this.config = config;
    this.logger = config.logger;
    this.connector = tracingConnector(
      buildConnector({
        timeout: config.tlsHandshakeTimeout,
        allowH2: config.forceAttemptHTTP2,
      })
    );
    this.agent = this.createAgent();
    subscribeSendHeaders();
  }

  async roundTrip(request: HttpRequest, trace?: ClientTrace): Promise<HttpResponse> {
    if (this.closed) {
      throw new LifecycleError('Connection pool is closed');
    }

    if (!trace) {
      return this.dispatch(request);
    }

    const state: TraceState = { trace, dialed: false, acquired: false };
    return traceStorage.run(state, async () => {
      const response = await this.dispatch(request, trace);
      // A request queued behind another one obtains its connection outside
      // its own async context; close the bracket on the response instead.
      markAcquired(state);
      return response;
    });
  }

  closeIdleConnections(): void {
    if (this.closed) {
      return;
    }

    const retired = this.agent;
    this.agent = this.createAgent();
    void retired.close().catch((error: unknown) => {
      this.logger.warn('Failed to close retired connections', errorContext(error));
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.agent.close();
  }

  private async dispatch(request: HttpRequest, trace?: ClientTrace): Promise<HttpResponse> {
    const url = new URL(request.url);
    const headers = { ...request.headers };

    const decompress =
      !this.config.disableCompression &&
      request.method !== 'HEAD' &&
      !hasHeader(headers, 'accept-encoding') &&
      !hasHeader(headers, 'range');
    if (decompress) {
      setHeader(headers, 'accept-encoding', 'gzip');
    }

    trace?.getConn?.(url.host);

    const response = await this.agent.request({
      origin: url.origin,
      path: `${url.pathname}${url.search}`,
      method: request.method,
      headers,
      body: request.body,
      signal: request.signal,
    });

    let body = Buffer.from(await response.body.arrayBuffer());
    const responseHeaders = flattenHeaders(response.headers);

    if (decompress && responseHeaders['content-encoding'] === 'gzip') {
      body = gunzipSync(body);
      deleteHeader(responseHeaders, 'content-encoding');
      deleteHeader(responseHeaders, 'content-length');
    }

    return {
      status: response.statusCode,
      headers: responseHeaders,
      body,
    };
  }

  private createAgent(): Agent {
    const config = this.config;
    return new Agent({
      connections: config.maxConnsPerHost > 0 ? config.maxConnsPerHost : null,
      pipelining: config.disableKeepAlives ? 0 : 1,
      keepAliveTimeout: config.idleConnTimeout,
      headersTimeout: config.responseHeaderTimeout,
      maxHeaderSize: config.maxResponseHeaderBytes > 0 ? config.maxResponseHeaderBytes : undefined,
      allowH2: config.forceAttemptHTTP2,
      connect: this.connector,
    });
  }
}

/**
 * Wraps an undici connector so each dial reports its phases to the trace of
 * the request running in the current async context.
 */
function tracingConnector(connect: buildConnector.connector): buildConnector.connector {
  return (options, callback) => {
    const state = traceStorage.getStore();
    if (!state) {
      connect(options, callback);
      return;
    }

    state.dialed = true;
    const trace = state.trace;
    const host = options.hostname.replace(/^\[|\]$/g, '');
    const secure = options.protocol === 'https:';
    const phases = { connectStarted: false, connected: false, tlsStarted: false, tlsDone: false };

    if (isIP(host) === 0) {
      trace.dnsStart?.(host);
    } else {
      phases.connectStarted = true;
      trace.connectStart?.(host);
    }

    // The connector hands back the socket it created; listen on it for the
    // finer-grained phases.
    const socket: unknown = connect(options, (...args: Parameters<buildConnector.Callback>) => {
      const [error] = args;
      if (error) {
        if (phases.connectStarted && !phases.connected) {
          trace.connectDone?.(host, error);
        } else if (phases.tlsStarted && !phases.tlsDone) {
          trace.tlsHandshakeDone?.(error);
        }
      }
      callback(...args);
    });

    if (!(socket instanceof Socket)) {
      return;
    }

    socket.once('lookup', (error: Error | null, address: string) => {
      trace.dnsDone?.(error ?? undefined);
      if (!error) {
        phases.connectStarted = true;
        trace.connectStart?.(address);
      }
    });
    socket.once('connect', () => {
      phases.connected = true;
      trace.connectDone?.(socket.remoteAddress ?? host);
      if (secure) {
        phases.tlsStarted = true;
        trace.tlsHandshakeStart?.();
      }
    });
    socket.once('secureConnect', () => {
      phases.tlsDone = true;
      trace.tlsHandshakeDone?.();
    });
  };
}

/**
 * Converts undici's header object into a flat record with lower-cased names.
 */
function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      result[key.toLowerCase()] = value.join(', ');
    }
  }
  return result;
}
