/**
 * Tests for the undici-backed connection pool, run against an HTTP server
 * listening on the loopback interface inside the test process.
 */

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { gunzipSync, gzipSync } from 'node:zlib';
import { afterAll, afterEach, beforeAll, describe, it, expect } from 'vitest';
import { resolveOptions } from '../../config/index.js';
import { LifecycleError } from '../../errors/index.js';
import { NoopLogger } from '../../observability/index.js';
import type { ClientTrace } from '../../tracing/index.js';
import { UndiciConnectionPool } from '../pool.js';

const BINARY = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]);
const GZIPPED = gzipSync('hello gzip');

function startServer(): Server {
  return createServer((req, res) => {
    switch (req.url) {
      case '/bin':
        res.writeHead(200, { 'content-type': 'application/octet-stream' });
        res.end(BINARY);
        return;
      case '/gzip':
        if ((req.headers['accept-encoding'] ?? '').includes('gzip')) {
          res.writeHead(200, {
            'content-type': 'text/plain',
            'content-encoding': 'gzip',
            'content-length': String(GZIPPED.length),
          });
          res.end(GZIPPED);
        } else {
          res.writeHead(200, { 'content-type': 'text/plain' });
          res.end('hello gzip');
        }
        return;
      case '/echo':
        res.writeHead(200, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ acceptEncoding: req.headers['accept-encoding'] ?? null }));
        return;
      default:
        res.writeHead(404);
        res.end();
    }
  });
}

function recordingTrace(events: string[]): ClientTrace {
  return {
    dnsStart: (host) => events.push(`dnsStart:${host}`),
    dnsDone: () => events.push('dnsDone'),
    connectStart: (address) => events.push(`connectStart:${address}`),
    connectDone: (address) => events.push(`connectDone:${address}`),
    tlsHandshakeStart: () => events.push('tlsHandshakeStart'),
    tlsHandshakeDone: () => events.push('tlsHandshakeDone'),
    getConn: (hostPort) => events.push(`getConn:${hostPort}`),
    gotConn: (info) => events.push(`gotConn:${String(info.reused)}`),
  };
}

describe('UndiciConnectionPool', () => {
  const config = resolveOptions({ timeout: 5000, logger: new NoopLogger() });
  let server: Server;
  let host: string;
  let pool: UndiciConnectionPool;

  beforeAll(async () => {
    server = startServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    host = `127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  afterEach(async () => {
    await pool.close();
  });

  const get = (path: string, headers: Record<string, string> = {}, trace?: ClientTrace) =>
    pool.roundTrip({ method: 'GET', url: `http://${host}${path}`, headers }, trace);

  describe('response bodies', () => {
    it('should return binary bodies byte for byte', async () => {
      pool = new UndiciConnectionPool(config);

      const response = await get('/bin');

      expect(response.status).toBe(200);
      expect([...response.body]).toEqual([0x89, 0x50, 0x4e, 0x47, 0xff, 0xfe, 0x00, 0x80]);
      expect(response.headers['content-type']).toBe('application/octet-stream');
    });

    it('should decode a gzip body it negotiated and drop the encoding headers', async () => {
      pool = new UndiciConnectionPool(config);

      const response = await get('/gzip');

      expect(response.body.toString('utf8')).toBe('hello gzip');
      expect(response.headers['content-encoding']).toBeUndefined();
      expect(response.headers['content-length']).toBeUndefined();
      expect(response.headers['content-type']).toBe('text/plain');
    });

    it('should pass an encoded body through when the caller set Accept-Encoding', async () => {
      pool = new UndiciConnectionPool(config);

      const response = await get('/gzip', { 'Accept-Encoding': 'gzip' });

      expect(response.headers['content-encoding']).toBe('gzip');
      expect(response.headers['content-length']).toBe(String(GZIPPED.length));
      expect(gunzipSync(response.body).toString('utf8')).toBe('hello gzip');
    });

    it('should not ask for gzip when compression is disabled', async () => {
      pool = new UndiciConnectionPool(resolveOptions({ timeout: 5000, disableCompression: true, logger: new NoopLogger() }));

      const response = await get('/echo');

      expect(JSON.parse(response.body.toString('utf8'))).toEqual({ acceptEncoding: null });
    });

    it('should ask for gzip by default', async () => {
      pool = new UndiciConnectionPool(config);

      const response = await get('/echo');

      expect(JSON.parse(response.body.toString('utf8'))).toEqual({ acceptEncoding: 'gzip' });
    });
  });

  describe('connection phases', () => {
    it('should report dialing on a new connection and reuse on the next request', async () => {
      pool = new UndiciConnectionPool(config);
      const first: string[] = [];
      const second: string[] = [];

      await get('/bin', {}, recordingTrace(first));
      await get('/bin', {}, recordingTrace(second));

      expect(first).toEqual([
        `getConn:${host}`,
        'connectStart:127.0.0.1',
        'connectDone:127.0.0.1',
        'gotConn:false',
      ]);
      expect(second).toEqual([`getConn:${host}`, 'gotConn:true']);
    });

    it('should dial again after idle connections are reclaimed', async () => {
      pool = new UndiciConnectionPool(config);
      await get('/bin');

      pool.closeIdleConnections();
      const events: string[] = [];
      const response = await get('/bin', {}, recordingTrace(events));

      expect(response.status).toBe(200);
      expect(events).toEqual([
        `getConn:${host}`,
        'connectStart:127.0.0.1',
        'connectDone:127.0.0.1',
        'gotConn:false',
      ]);
    });
  });

  describe('close', () => {
    it('should reject requests once closed', async () => {
      pool = new UndiciConnectionPool(config);
      await pool.close();

      await expect(get('/bin')).rejects.toThrow(LifecycleError);
      await expect(get('/bin')).rejects.toThrow('Connection pool is closed');
    });

    it('should ignore closeIdleConnections and close after close', async () => {
      pool = new UndiciConnectionPool(config);
      await pool.close();

      expect(() => pool.closeIdleConnections()).not.toThrow();
      await expect(pool.close()).resolves.toBeUndefined();
    });
  });
});
