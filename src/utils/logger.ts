/**
 * Console Logger
 *
 * Level-filtered, prefix-tagged console output shared by every service.
 * Services accept an optional Logger and fall back to createLogger(<name>).
 *
 * @packageDocumentation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal logging contract accepted by services.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/** Numeric log level for comparison */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

/**
 * Console-based logger with level filtering.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info'
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.debug) {
      this.write(console.debug, message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.info) {
      this.write(console.log, message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.warn) {
      this.write(console.warn, message, context);
    }
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (this.minLevel <= LOG_LEVEL_ORDER.error) {
      if (error && context) {
        console.error(`[${this.prefix}] ${message}`, error, context);
      } else if (error) {
        console.error(`[${this.prefix}] ${message}`, error);
      } else {
        console.error(`[${this.prefix}] ${message}`);
      }
    }
  }

  private write(
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (context) {
      sink(`[${this.prefix}] ${message}`, context);
    } else {
      sink(`[${this.prefix}] ${message}`);
    }
  }
}

/**
 * Create a logger whose level comes from COURSE_SYNC_LOG_LEVEL (default info).
 */
export function createLogger(prefix: string, env: NodeJS.ProcessEnv = process.env): ConsoleLogger {
  const level = env.COURSE_SYNC_LOG_LEVEL;
  return new ConsoleLogger(prefix, isLogLevel(level) ? level : 'info');
}
