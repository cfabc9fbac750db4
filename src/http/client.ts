/**
 * HTTP client with bearer-token lookup, request builders and teardown.
 *
 * @module http/client
 */

import { StaticSecretLookup } from '../auth/lookup.js';
import type { SecretLookup } from '../auth/lookup.js';
import { SecretPaths } from '../auth/secrets.js';
import type { SecretsReader } from '../auth/secrets.js';
import { DEFAULT_REFRESH_INTERVAL, durationOr } from '../config/index.js';
import type { ClientOptions } from '../config/index.js';
import { RequestError, toError } from '../errors/index.js';
import { errorContext } from '../observability/index.js';
import type { Logger } from '../observability/index.js';
import { AUTHORIZATION_HEADER, bearer, hasHeader, setHeader } from './headers.js';
import { createTransport } from './transport.js';
import type { Transport } from './transport.js';
import type { HttpMethod, HttpRequest, HttpResponse } from './types.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * HTTP client that injects bearer tokens from a secrets reader and sends
 * requests through a tracing, idle-sweeping transport.
 *
 * Call `close()` on teardown to stop the background sweep task and the
 * token refresh.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({
 *   bearerTokenFile: '/var/run/secrets/token',
 *   tracer: trace.getTracer('inventory'),
 *   tracingSpanName: 'inventory-api',
 * });
 *
 * try {
 *   const response = await client.get('https://inventory.internal/v1/items');
 *   console.log(response.status, response.body.toString('utf8'));
 * } finally {
 *   client.close();
 * }
 * ```
 */
export class HttpClient {
  private readonly tr: Transport;
  private readonly secrets?: SecretsReader;
  private readonly secretLookup?: SecretLookup;
  private readonly logger: Logger;

  constructor(options: ClientOptions = {}) {
    this.tr = createTransport(options);
    this.logger = this.tr.config.logger;

    let secrets = options.secretsReader;
    if (!secrets && options.bearerTokenFile) {
      secrets = this.openTokenFile(options.bearerTokenFile, options.bearerTokenRefreshInterval);
    }

    let lookup = options.lookup;
    if (!lookup && options.bearerTokenFile) {
      lookup = new StaticSecretLookup(options.bearerTokenFile);
    }

    this.secrets = secrets;
    this.secretLookup = lookup;
  }

  /**
   * The transport requests are sent through.
   */
  get transport(): Transport {
    return this.tr;
  }

  async get(url: string): Promise<HttpResponse> {
    return this.do(newRequest('GET', url));
  }

  async head(url: string): Promise<HttpResponse> {
    return this.do(newRequest('HEAD', url));
  }

  async post(url: string, contentType: string, body?: string | Uint8Array): Promise<HttpResponse> {
    const request = newRequest('POST', url, body);
    setHeader(request.headers, 'Content-Type', contentType);
    return this.do(request);
  }

  /**
   * Posts `data` URL-encoded as a form.
   */
  async postForm(url: string, data: URLSearchParams | Record<string, string>): Promise<HttpResponse> {
    const params = data instanceof URLSearchParams ? data : new URLSearchParams(data);
    return this.post(url, FORM_CONTENT_TYPE, params.toString());
  }

  /**
   * Sends a request.
   *
   * When a secrets reader is configured and the request carries no
   * Authorization header, the secret for the request URL is looked up and,
   * if found, sent as `Authorization: Bearer <secret>`. A caller-supplied
   * Authorization header always wins.
   */
  async do(request: HttpRequest): Promise<HttpResponse> {
    if (this.secrets && this.secretLookup && !hasHeader(request.headers, AUTHORIZATION_HEADER)) {
      const secret = this.secrets.getSecret(this.secretLookup.lookup(parseUrl(request.url)));
      if (secret !== undefined) {
        const headers = { ...request.headers };
        setHeader(headers, AUTHORIZATION_HEADER, bearer(secret.toString('utf8')));
        request = { ...request, headers };
      }
    }

    return this.tr.roundTrip(request);
  }

  /**
   * Stops the transport's background task and the secrets reader. Call once.
   */
  close(): void {
    this.tr.close();
    this.secrets?.close();
  }

  closeIdleConnections(): void {
    this.tr.closeIdleConnections();
  }

  /**
   * Opens the file-backed token source. A failed first read is logged and
   * the client continues; later refreshes may still pick the token up.
   */
  private openTokenFile(path: string, refreshInterval?: number): SecretPaths {
    const secrets = new SecretPaths(durationOr(refreshInterval, DEFAULT_REFRESH_INTERVAL), this.logger);
    try {
      secrets.add(path);
    } catch (error) {
      this.logger.error('Failed to read secret', errorContext(error, { path }));
    }
    return secrets;
  }
}

/**
 * Builds a request with empty headers.
 *
 * @throws RequestError when `url` is not an absolute URL
 */
export function newRequest(method: HttpMethod, url: string, body?: string | Uint8Array): HttpRequest {
  parseUrl(url);
  return { method, url, headers: {}, body };
}

function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (error) {
    throw new RequestError(`Invalid request URL: ${url}`, { details: { url }, cause: toError(error) });
  }
}
