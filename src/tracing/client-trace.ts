/**
 * Connection-phase hooks fired by a pooled transport while it serves one
 * request.
 *
 * @module tracing/client-trace
 */

import type { Span } from '@opentelemetry/api';

/**
 * Details of an acquired connection.
 */
export interface GotConnInfo {
  /** Whether the connection was taken from the idle pool */
  reused: boolean;
}

/**
 * Hooks a pooled transport calls for each connection phase of a request.
 * Every hook is optional; a transport calls only those phases it goes
 * through, so a reused connection reports no DNS, connect or TLS phase.
 */
export interface ClientTrace {
  /** Hostname resolution begins */
  dnsStart?(host: string): void;
  /** Hostname resolution finished */
  dnsDone?(error?: Error): void;
  /** TCP connection attempt begins */
  connectStart?(address: string): void;
  /** TCP connection established or failed */
  connectDone?(address: string, error?: Error): void;
  /** TLS handshake begins */
  tlsHandshakeStart?(): void;
  /** TLS handshake finished */
  tlsHandshakeDone?(error?: Error): void;
  /** The request starts waiting for a pooled connection */
  getConn?(hostPort: string): void;
  /** The request obtained a connection */
  gotConn?(info: GotConnInfo): void;
}

/**
 * Event keys logged on the request span for each connection phase.
 */
export const PhaseEvent = {
  DNS: 'DNS',
  CONNECT: 'connect',
  TLS: 'TLS',
  GET_CONN: 'get_conn',
  HTTP_DO: 'http_do',
} as const;

export type PhaseEvent = (typeof PhaseEvent)[keyof typeof PhaseEvent];

/**
 * Logs a key/value pair on the span as an event named after the key.
 */
export function logKV(span: Span, key: PhaseEvent, value: 'start' | 'end' | 'stop'): void {
  span.addEvent(key, { [key]: value });
}

/**
 * Builds hooks that log every connection phase onto the span.
 */
export function spanClientTrace(span: Span): ClientTrace {
  return {
    dnsStart: () => logKV(span, PhaseEvent.DNS, 'start'),
    dnsDone: () => logKV(span, PhaseEvent.DNS, 'end'),
    connectStart: () => logKV(span, PhaseEvent.CONNECT, 'start'),
    connectDone: () => logKV(span, PhaseEvent.CONNECT, 'end'),
    tlsHandshakeStart: () => logKV(span, PhaseEvent.TLS, 'start'),
    tlsHandshakeDone: () => logKV(span, PhaseEvent.TLS, 'end'),
    getConn: () => logKV(span, PhaseEvent.GET_CONN, 'start'),
    gotConn: () => logKV(span, PhaseEvent.GET_CONN, 'end'),
  };
}
