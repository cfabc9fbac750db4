/**
 * Structured logging for the HTTP client.
 *
 * The client only logs what it cannot report to a caller: failures of the
 * background sweep and token refresh (`error`, `warn`) and best-effort steps
 * such as trace header injection (`debug`).
 */

export type LogLevel = 'error' | 'warn' | 'debug';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
};

export interface ConsoleLoggerOptions {
  /** Lowest level written, defaults to `warn` */
  level?: LogLevel;
  /** Tag printed on every line, defaults to `traced-http-client` */
  name?: string;
}

/**
 * Console-based logger writing one line per entry:
 * `[<ISO time>] [<LEVEL>] [<name>] <message> <context as JSON>`.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly name: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.level ?? 'warn';
    this.name = options.name ?? 'traced-http-client';
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    const line = `[${timestamp}] [${level.toUpperCase()}] [${this.name}] ${message}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.debug(line);
    }
  }
}

/**
 * Logger that drops every entry.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}
}

/**
 * Flattens an error into log context fields.
 */
export function errorContext(error: unknown, extra: LogContext = {}): LogContext {
  if (error instanceof Error) {
    return { ...extra, errorName: error.name, errorMessage: error.message };
  }
  return { ...extra, errorMessage: String(error) };
}
