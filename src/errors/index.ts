export {
  HttpClientError,
  isHttpClientError,
  isErrorCategory,
  toError,
} from './base.js';
export type { ErrorCategory } from './base.js';
export {
  ConfigurationError,
  RequestError,
  SecretError,
  LifecycleError,
} from './errors.js';
