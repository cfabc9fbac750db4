/**
 * Background reclamation of idle pooled connections.
 *
 * @module http/sweeper
 */

import { assertTimerDelay } from '../config/defaults.js';
import { LifecycleError } from '../errors/index.js';
import { errorContext } from '../observability/index.js';
import type { Logger } from '../observability/index.js';
import type { PooledTransport } from './pool.js';

/**
 * Periodically forces a pool to drop its idle connections, so sockets are
 * recycled (and hostnames re-resolved) even when the pool's own idle timeout
 * does not fire, e.g. under DNS rotation.
 *
 * The task starts on construction and runs until `close()`. The shutdown
 * signal is one-shot: the owner calls `close()` exactly once, and a second
 * call throws `LifecycleError`.
 *
 * @throws ConfigurationError when the interval is not a valid timer delay
 */
export class IdleConnectionSweeper {
  private readonly shutdown = new AbortController();
  private readonly task: Promise<void>;

  constructor(
    private readonly pool: PooledTransport,
    private readonly intervalMs: number,
    private readonly logger: Logger
  ) {
    assertTimerDelay('idleConnTimeout', intervalMs);
    this.task = this.run();
  }

  /**
   * Signals the task to stop. No reclamation runs after this returns.
   *
   * @throws LifecycleError when the task was already closed
   */
  close(): void {
    if (this.shutdown.signal.aborted) {
      throw new LifecycleError('Idle connection sweeper is already closed');
    }
    this.shutdown.abort();
  }

  get closed(): boolean {
    return this.shutdown.signal.aborted;
  }

  /**
   * Resolves once the task has exited.
   */
  get done(): Promise<void> {
    return this.task;
  }

  private async run(): Promise<void> {
    const signal = this.shutdown.signal;

    while (await sleep(this.intervalMs, signal)) {
      try {
        this.pool.closeIdleConnections();
      } catch (error) {
        this.logger.error('Failed to close idle connections', errorContext(error));
      }
    }
  }
}

/**
 * Waits for the timer or the signal, whichever comes first. Resolves true
 * when the timer fired and false when the signal aborted the wait. The timer
 * never keeps the process alive.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(!signal.aborted);
    }, ms);
    timer.unref();

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
