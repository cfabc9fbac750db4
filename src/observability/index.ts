export { ConsoleLogger, NoopLogger, errorContext } from './logging.js';
export type { ConsoleLoggerOptions, Logger, LogLevel, LogContext } from './logging.js';
