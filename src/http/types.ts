/**
 * Request and response shapes shared by the client, the transport and the
 * pooled connection layer.
 *
 * @module http/types
 */

import type { Context } from '@opentelemetry/api';

/**
 * HTTP methods supported by the client.
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'OPTIONS';

/**
 * Outgoing HTTP request.
 */
export interface HttpRequest {
  /**
   * HTTP method.
   */
  method: HttpMethod;

  /**
   * Absolute request URL.
   */
  url: string;

  /**
   * Request headers. Names are matched case-insensitively.
   */
  headers: Record<string, string>;

  /**
   * Request body.
   */
  body?: string | Uint8Array;

  /**
   * Trace context the request runs in. A span found here becomes the parent
   * of the request span; otherwise the active context is consulted.
   */
  context?: Context;

  /**
   * Cancels the request when aborted.
   */
  signal?: AbortSignal;
}

/**
 * HTTP response as returned by the pooled transport.
 */
export interface HttpResponse {
  /**
   * HTTP status code.
   */
  status: number;

  /**
   * Response headers with lower-cased names.
   */
  headers: Record<string, string>;

  /**
   * Response body bytes as received. A gzip body the pool negotiated itself
   * arrives decoded; any other encoding is left untouched.
   */
  body: Buffer;
}
