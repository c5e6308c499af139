/**
 * Logger - Level-gated console logging
 *
 * Usage:
 *   const logger = createLogger('debug');
 *   logger.debug('pop scope', { kind: 'loop', merged: 2 });
 */

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

const METHOD_LEVELS = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * JSON.stringify that tolerates cycles and bigint values
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'bigint') {
      return `${value}n`;
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${safeStringify(context)}`;
}

export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly priority: number;

  constructor(logLevel: LogLevel = 'warnings') {
    this.level = logLevel;
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  private shouldLog(methodLevel: number): boolean {
    return this.priority >= methodLevel;
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.error)) return;
    console.error(formatMessage(`[ERROR] ${message}`, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.warn)) return;
    console.warn(formatMessage(`[WARN] ${message}`, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.info)) return;
    console.info(formatMessage(`[INFO] ${message}`, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.debug)) return;
    console.debug(formatMessage(`[DEBUG] ${message}`, context));
  }

  trace(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.trace)) return;
    console.debug(formatMessage(`[TRACE] ${message}`, context));
  }
}

export function createLogger(level: LogLevel = 'warnings'): Logger {
  return new ConsoleLogger(level);
}
