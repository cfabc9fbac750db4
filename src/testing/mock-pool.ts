/**
 * Pooled transport test double.
 *
 * Records every request, replays queued responses or errors, and drives the
 * full set of connection-phase hooks as a freshly dialed TLS connection would.
 */

import type { PooledTransport } from '../http/pool.js';
import type { HttpRequest, HttpResponse } from '../http/types.js';
import type { ClientTrace } from '../tracing/index.js';

export interface RecordedRequest {
  request: HttpRequest;
  traced: boolean;
}

type Outcome = { response: HttpResponse } | { error: Error };

/**
 * @example
 * ```typescript
 * // Arrange
 * const pool = new MockConnectionPool();
 * pool.enqueueResponse({ status: 204, headers: {}, body: Buffer.alloc(0) });
 *
 * // Act
 * const transport = createTransport({ pool, logger: new NoopLogger() });
 * await transport.roundTrip({ method: 'GET', url: 'https://svc.test/', headers: {} });
 *
 * // Assert
 * expect(pool.requests).toHaveLength(1);
 * ```
 */
export class MockConnectionPool implements PooledTransport {
  readonly requests: RecordedRequest[] = [];
  idleClosures = 0;
  closed = false;
  private readonly outcomes: Outcome[] = [];

  enqueueResponse(response: HttpResponse): void {
    this.outcomes.push({ response });
  }

  enqueueError(error: Error): void {
    this.outcomes.push({ error });
  }

  /**
   * Headers of the nth recorded request.
   */
  headersAt(index: number): Record<string, string> {
    const recorded = this.requests[index];
    if (!recorded) {
      throw new Error(`No request recorded at index ${index}`);
    }
    return recorded.request.headers;
  }

  async roundTrip(request: HttpRequest, trace?: ClientTrace): Promise<HttpResponse> {
    this.requests.push({ request, traced: trace !== undefined });

    if (trace) {
      const host = new URL(request.url).host;
      trace.getConn?.(host);
      trace.dnsStart?.(host);
      trace.dnsDone?.();
      trace.connectStart?.('192.0.2.10');
      trace.connectDone?.('192.0.2.10');
      trace.tlsHandshakeStart?.();
      trace.tlsHandshakeDone?.();
      trace.gotConn?.({ reused: false });
    }

    const outcome = this.outcomes.shift() ?? { response: { status: 200, headers: {}, body: Buffer.alloc(0) } };
    if ('error' in outcome) {
      throw outcome.error;
    }
    return outcome.response;
  }

  closeIdleConnections(): void {
    this.idleClosures++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
