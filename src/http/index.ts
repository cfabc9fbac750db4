export { HttpClient, newRequest } from './client.js';
export { Transport, createTransport } from './transport.js';
export type { TransportResources, TransportSettings } from './transport.js';
export { UndiciConnectionPool } from './pool.js';
export type { PooledTransport, PoolConfig } from './pool.js';
export { IdleConnectionSweeper } from './sweeper.js';
export { getHeader, hasHeader, setHeader, deleteHeader } from './headers.js';
export type { HttpMethod, HttpRequest, HttpResponse } from './types.js';
