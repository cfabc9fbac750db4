/**
 * HTTP client with bearer-token injection from a rotating secret store,
 * connection-phase tracing and periodic idle-connection reclamation.
 *
 * @module traced-http-client
 */

export * from './http/index.js';
export * from './auth/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './observability/index.js';
export * from './tracing/index.js';
