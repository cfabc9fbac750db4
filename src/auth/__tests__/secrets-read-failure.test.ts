/**
 * Tests for SecretPaths when a file exists but cannot be read
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SecretError } from '../../errors/index.js';
import { NoopLogger } from '../../observability/index.js';
import { SecretPaths } from '../secrets.js';

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return { ...actual, readFileSync: vi.fn(actual.readFileSync) };
});

describe('SecretPaths with an unreadable file', () => {
  let dir: string;
  let secrets: SecretPaths;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'secret-paths-'));
    secrets = new SecretPaths(60_000, new NoopLogger());
  });

  afterEach(() => {
    secrets.close();
    rmSync(dir, { recursive: true, force: true });
    vi.mocked(readFileSync).mockClear();
  });

  it('should read the rest of a directory and refresh the failed file later', async () => {
    const tokens = join(dir, 'tokens');
    mkdirSync(tokens);
    writeFileSync(join(tokens, 'alpha'), 'a-secret');
    writeFileSync(join(tokens, 'beta'), 'b-secret');
    vi.mocked(readFileSync).mockImplementationOnce(() => {
      throw new Error('EIO: i/o error');
    });

    expect(() => secrets.add(tokens)).toThrow(
      new SecretError(join(tokens, 'alpha'))
    );
    expect(secrets.getSecret(join(tokens, 'alpha'))).toBeUndefined();
    expect(secrets.getSecret(join(tokens, 'beta'))?.toString()).toBe('b-secret');

    await secrets.refresh();

    expect(secrets.getSecret(join(tokens, 'alpha'))?.toString()).toBe('a-secret');
  });
});
