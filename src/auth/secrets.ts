/**
 * Bearer token sources.
 *
 * @module auth/secrets
 */

import { readFileSync, readdirSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { assertTimerDelay } from '../config/defaults.js';
import { SecretError, toError } from '../errors/index.js';
import { NoopLogger, errorContext } from '../observability/index.js';
import type { Logger } from '../observability/index.js';

/**
 * Source of secrets by key. `undefined` means the key has no secret.
 */
export interface SecretsReader {
  getSecret(key: string): Buffer | undefined;
  close(): void;
}

/**
 * File-backed secrets reader. Every registered file is re-read on a fixed
 * interval so rotated tokens are picked up without a restart; the file path
 * is the lookup key.
 *
 * @example
 * ```typescript
 * const secrets = new SecretPaths(60_000);
 * secrets.add('/var/run/secrets/token');
 * secrets.getSecret('/var/run/secrets/token')?.toString();
 * secrets.close();
 * ```
 */
export class SecretPaths implements SecretsReader {
  private readonly secrets = new Map<string, Buffer>();
  private readonly paths = new Set<string>();
  private readonly timer: NodeJS.Timeout;
  private refreshing = false;

  constructor(
    refreshInterval: number,
    private readonly logger: Logger = new NoopLogger()
  ) {
    assertTimerDelay('refreshInterval', refreshInterval);
    this.timer = setInterval(() => {
      void this.refresh();
    }, refreshInterval);
    this.timer.unref();
  }

  /**
   * Registers a file, or every regular file directly inside a directory, and
   * reads it immediately.
   *
   * Every path stays registered when a read fails, so a file that appears
   * or becomes readable later is picked up by the next refresh. Files of a
   * directory that read fine are available at once.
   *
   * @throws SecretError for the first path that cannot be read
   */
  add(path: string): void {
    let files: string[];
    try {
      files = statSync(path).isDirectory() ? listFiles(path) : [path];
    } catch (error) {
      this.paths.add(path);
      throw new SecretError(path, toError(error));
    }

    for (const file of files) {
      this.paths.add(file);
    }

    let failure: SecretError | undefined;
    for (const file of files) {
      try {
        this.secrets.set(file, normalize(readFileSync(file)));
      } catch (error) {
        failure ??= new SecretError(file, toError(error));
      }
    }

    if (failure) {
      throw failure;
    }
  }

  getSecret(key: string): Buffer | undefined {
    return this.secrets.get(key);
  }

  /**
   * Stops the refresh timer. Safe to call more than once.
   */
  close(): void {
    clearInterval(this.timer);
  }

  /**
   * Re-reads every registered path. A failed read keeps the last good value.
   */
  async refresh(): Promise<void> {
    if (this.refreshing) {
      return;
    }
    this.refreshing = true;

    try {
      await Promise.all(
        [...this.paths].map(async (path) => {
          try {
            this.secrets.set(path, normalize(await readFile(path)));
          } catch (error) {
            this.logger.warn('Failed to refresh secret', errorContext(error, { path }));
          }
        })
      );
    } finally {
      this.refreshing = false;
    }
  }
}

function listFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => join(dir, entry.name))
    .sort();
}

/**
 * Strips trailing whitespace so a token file ending in a newline still forms
 * a valid header value.
 */
function normalize(data: Buffer): Buffer {
  let end = data.length;
  while (end > 0 && isWhitespace(data[end - 1])) {
    end--;
  }
  return data.subarray(0, end);
}

function isWhitespace(byte: number | undefined): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}
