export { StaticSecretLookup, HostSecretLookup } from './lookup.js';
export type { SecretLookup } from './lookup.js';
export { SecretPaths } from './secrets.js';
export type { SecretsReader } from './secrets.js';
