/**
 * Structured logging for the analysis pipeline.
 *
 * Components take a {@link Logger} through their options instead of reaching
 * for a global. The pino-backed implementation writes JSON lines to stderr so
 * that command output on stdout stays machine readable.
 */

import { pino, destination, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Structured fields attached to a log line.
 */
export type LogFields = Record<string, unknown>;

/**
 * Logging capability injected into every component.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Write to this pino instance instead of creating one (tests, embedding) */
  instance?: PinoLogger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve the log level: explicit option, then LOG_LEVEL, then info.
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

class PinoAdapter implements Logger {
  constructor(private readonly pinoLogger: PinoLogger) {}

  debug(message: string, fields: LogFields = {}): void {
    this.pinoLogger.debug(fields, message);
  }

  info(message: string, fields: LogFields = {}): void {
    this.pinoLogger.info(fields, message);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.pinoLogger.warn(fields, message);
  }

  error(message: string, fields: LogFields = {}): void {
    this.pinoLogger.error(fields, message);
  }
}

/**
 * Create a logger for a component (e.g. "parser", "aggregator", "indexer").
 *
 * @example
 * ```typescript
 * const logger = createLogger('aggregator');
 * logger.warn('Duplicate definition', { name: 'helper', files: ['a.py', 'b.py'] });
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const base =
    options.instance ??
    pino({ name: 'codelore', level: resolveLogLevel(options.level) }, destination(2));
  return new PinoAdapter(base.child({ component }));
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger that keeps every entry in memory, for assertions in tests.
 */
export class MemoryLogger implements Logger {
  readonly entries: Array<{ level: 'debug' | 'info' | 'warn' | 'error'; message: string; fields: LogFields }> = [];

  debug(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: 'debug', message, fields });
  }

  info(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: 'info', message, fields });
  }

  warn(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: 'warn', message, fields });
  }

  error(message: string, fields: LogFields = {}): void {
    this.entries.push({ level: 'error', message, fields });
  }

  messages(level: 'debug' | 'info' | 'warn' | 'error'): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}
