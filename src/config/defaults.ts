/**
 * Default configuration values for the HTTP client
 */

import { ConfigurationError } from '../errors/index.js';

/**
 * Idle-connection sweep interval used when neither `idleConnTimeout` nor
 * `timeout` is set (30 seconds).
 */
export const DEFAULT_IDLE_CONN_TIMEOUT = 30_000;

/**
 * Refresh interval of the file-backed bearer token source (5 minutes).
 */
export const DEFAULT_REFRESH_INTERVAL = 5 * 60_000;

/**
 * Largest delay Node timers accept (2^31 - 1 ms, about 24.8 days). Longer
 * delays are clamped to 1 ms by the runtime.
 */
export const MAX_TIMER_DELAY = 2_147_483_647;

/**
 * Throws `ConfigurationError` unless `ms` is a whole number of milliseconds
 * a timer can wait for.
 */
export function assertTimerDelay(name: string, ms: number): void {
  if (!Number.isInteger(ms) || ms < 1 || ms > MAX_TIMER_DELAY) {
    throw new ConfigurationError(`${name} must be an integer between 1 and ${MAX_TIMER_DELAY} ms, got ${ms}`, {
      [name]: ms,
    });
  }
}

/**
 * Returns `value` when it is a positive duration, otherwise `fallback`.
 * Zero and undefined both mean "not set".
 */
export function durationOr(value: number | undefined, fallback: number): number {
  return value !== undefined && value > 0 ? value : fallback;
}
