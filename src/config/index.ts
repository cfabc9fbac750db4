export {
  DEFAULT_IDLE_CONN_TIMEOUT,
  DEFAULT_REFRESH_INTERVAL,
  MAX_TIMER_DELAY,
  assertTimerDelay,
  durationOr,
} from './defaults.js';
export { resolveOptions } from './options.js';
export type { ClientOptions, ResolvedOptions, HeaderPropagator } from './options.js';
export { validateOptions } from './validation.js';
