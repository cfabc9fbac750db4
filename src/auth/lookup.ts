/**
 * Strategies mapping a request URL to the key handed to
 * `SecretsReader.getSecret`.
 *
 * @module auth/lookup
 */

/**
 * Maps a target URL to a secret lookup key. An empty key means "no secret".
 */
export interface SecretLookup {
  lookup(url: URL): string;
}

/**
 * Lookup that always answers with one fixed key.
 */
export class StaticSecretLookup implements SecretLookup {
  constructor(private readonly key: string) {}

  lookup(_url: URL): string {
    return this.key;
  }
}

/**
 * Lookup keyed by the exact hostname of the request URL. Scheme and port play
 * no part, IPv6 literals are keyed without brackets, and unknown hosts yield
 * the empty key.
 *
 * @example
 * ```typescript
 * const lookup = new HostSecretLookup({
 *   'billing.internal': '/secrets/billing-token',
 *   'ledger.internal': '/secrets/ledger-token',
 * });
 * lookup.lookup(new URL('https://billing.internal:8443/v1')); // '/secrets/billing-token'
 * ```
 */
export class HostSecretLookup implements SecretLookup {
  private readonly keys: ReadonlyMap<string, string>;

  constructor(keys?: Record<string, string> | ReadonlyMap<string, string>) {
    if (keys instanceof Map) {
      this.keys = new Map(keys);
    } else {
      this.keys = new Map(Object.entries(keys ?? {}));
    }
  }

  lookup(url: URL): string {
    return this.keys.get(hostname(url)) ?? '';
  }
}

/**
 * Hostname without the brackets of an IPv6 literal.
 */
function hostname(url: URL): string {
  return url.hostname.replace(/^\[|\]$/g, '');
}
