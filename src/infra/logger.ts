/**
 * Structured Logger
 * =================
 * One line per record: ISO timestamp, level tag, message, JSON context.
 * Never pass passwords or password hashes in a context object.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = 'info') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled('debug')) {
      console.debug(this.format('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled('info')) {
      console.log(this.format('info', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled('warn')) {
      console.warn(this.format('warn', message, context));
    }
  }

  error(message: string, error?: Error | LogContext): void {
    if (!this.enabled('error')) {
      return;
    }
    const context =
      error instanceof Error ? { error: error.message, stack: error.stack } : error;
    console.error(this.format('error', message, context));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }
}

export function createLogger(level: LogLevel = 'info'): ConsoleLogger {
  return new ConsoleLogger(level);
}

export const logger = createLogger();
