/**
 * Tests for option resolution and validation
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors/index.js';
import { ConsoleLogger, NoopLogger } from '../../observability/index.js';
import {
  DEFAULT_IDLE_CONN_TIMEOUT,
  DEFAULT_REFRESH_INTERVAL,
  MAX_TIMER_DELAY,
  durationOr,
} from '../defaults.js';
import { resolveOptions } from '../options.js';

describe('resolveOptions', () => {
  describe('timeout defaults', () => {
    it('should fill every phase timeout from the default timeout', () => {
      const resolved = resolveOptions({ timeout: 2000 });

      expect(resolved.tlsHandshakeTimeout).toBe(2000);
      expect(resolved.responseHeaderTimeout).toBe(2000);
      expect(resolved.expectContinueTimeout).toBe(2000);
      expect(resolved.idleConnTimeout).toBe(2000);
    });

    it('should fall back to the hardcoded idle interval without a default timeout', () => {
      const resolved = resolveOptions();

      expect(resolved.idleConnTimeout).toBe(DEFAULT_IDLE_CONN_TIMEOUT);
      expect(resolved.idleConnTimeout).toBe(30_000);
      expect(resolved.tlsHandshakeTimeout).toBe(0);
      expect(resolved.responseHeaderTimeout).toBe(0);
      expect(resolved.expectContinueTimeout).toBe(0);
    });

    it('should keep explicit phase timeouts', () => {
      const resolved = resolveOptions({
        timeout: 2000,
        tlsHandshakeTimeout: 100,
        idleConnTimeout: 500,
      });

      expect(resolved.tlsHandshakeTimeout).toBe(100);
      expect(resolved.idleConnTimeout).toBe(500);
      expect(resolved.responseHeaderTimeout).toBe(2000);
    });

    it('should treat zero as unset', () => {
      const resolved = resolveOptions({ timeout: 2000, responseHeaderTimeout: 0, idleConnTimeout: 0 });

      expect(resolved.responseHeaderTimeout).toBe(2000);
      expect(resolved.idleConnTimeout).toBe(2000);
    });
  });

  describe('collaborators', () => {
    it('should substitute a no-op tracer', () => {
      const span = resolveOptions().tracer.startSpan('probe');

      expect(span.isRecording()).toBe(false);
      span.end();
    });

    it('should default to a console logger', () => {
      expect(resolveOptions().logger).toBeInstanceOf(ConsoleLogger);
    });

    it('should keep a supplied logger', () => {
      const logger = new NoopLogger();
      expect(resolveOptions({ logger }).logger).toBe(logger);
    });

    it('should default tracing names to empty', () => {
      const resolved = resolveOptions();

      expect(resolved.tracingSpanName).toBe('');
      expect(resolved.tracingComponentTag).toBe('');
    });
  });

  it('should return a frozen configuration', () => {
    expect(Object.isFrozen(resolveOptions({ timeout: 10 }))).toBe(true);
  });

  describe('validation', () => {
    it('should reject a negative timeout', () => {
      expect(() => resolveOptions({ timeout: -1 })).toThrow(ConfigurationError);
    });

    it('should reject a fractional duration', () => {
      expect(() => resolveOptions({ idleConnTimeout: 1.5 })).toThrow(/idleConnTimeout/);
    });

    it('should reject durations a timer cannot wait for', () => {
      expect(() => resolveOptions({ idleConnTimeout: 3_000_000_000 })).toThrow(ConfigurationError);
      expect(() => resolveOptions({ timeout: 2_147_483_648 })).toThrow(/timeout/);
      expect(() => resolveOptions({ bearerTokenRefreshInterval: 2_147_483_648 })).toThrow(
        /bearerTokenRefreshInterval/
      );
      expect(resolveOptions({ timeout: MAX_TIMER_DELAY }).idleConnTimeout).toBe(MAX_TIMER_DELAY);
    });

    it('should list the offending fields in the error', () => {
      const resolve = () => resolveOptions({ timeout: -1, maxConnsPerHost: -2 });

      expect(resolve).toThrow(ConfigurationError);
      expect(resolve).toThrow(/^Invalid configuration: maxConnsPerHost: .*, timeout: /);
    });
  });
});

describe('durationOr', () => {
  it('should prefer a positive value', () => {
    expect(durationOr(5, 10)).toBe(5);
  });

  it('should fall back on zero and undefined', () => {
    expect(durationOr(0, 10)).toBe(10);
    expect(durationOr(undefined, 10)).toBe(10);
  });
});

describe('defaults', () => {
  it('should refresh bearer tokens every five minutes', () => {
    expect(DEFAULT_REFRESH_INTERVAL).toBe(300_000);
  });
});
