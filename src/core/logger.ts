// src/core/logger.ts

/**
 * @file Structured logging collaborator injected into the kernel, providers and agents.
 * The default is a no-op; `ConsoleLogger` writes `[component] message` lines.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface ILogger {
  log(level: LogLevel, component: string, message: string, meta?: Record<string, unknown>): void;
}

export class NoopLogger implements ILogger {
  log(): void {
    // intentionally empty
  }
}

export interface ConsoleLoggerOptions {
  /** Minimum level to output. @default 'info' */
  level?: LogLevel;
}

export class ConsoleLogger implements ILogger {
  private readonly minLevel: number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.minLevel = LOG_LEVELS.indexOf(options.level ?? 'info');
  }

  log(level: LogLevel, component: string, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < this.minLevel) {
      return;
    }
    const line = `[${component}] ${message}`;
    const args: unknown[] = meta !== undefined && Object.keys(meta).length > 0 ? [line, meta] : [line];

    /* eslint-disable no-console */
    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
    /* eslint-enable no-console */
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Builds the logger described by the logging settings.
 */
export function createLogger(options: { enabled: boolean; level?: LogLevel }): ILogger {
  return options.enabled ? new ConsoleLogger({ level: options.level }) : new NoopLogger();
}
