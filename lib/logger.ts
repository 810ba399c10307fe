/**
 * Server-side logger
 * Console output with a [Scope] prefix; debug lines only in development or when LOG_LEVEL=debug
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogOptions {
  level?: LogLevel;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveMinLevel(): LogLevel | 'silent' {
  const configured = process.env.LOG_LEVEL;
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return configured;
  }
  if (configured === 'silent') return 'silent';
  // Tests stay quiet unless LOG_LEVEL asks otherwise
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export class Logger {
  private readonly scope: string;

  constructor(scope: string) {
    this.scope = scope;
  }

  private enabled(level: LogLevel): boolean {
    const min = resolveMinLevel();
    if (min === 'silent') return false;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[min];
  }

  log(message: string, options?: LogOptions): void {
    const { level = 'info', data } = options || {};
    if (!this.enabled(level)) return;

    const line = `[${this.scope}] ${message}`;
    if (data !== undefined) {
      console[level](line, data);
    } else {
      console[level](line);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log(message, { level: 'debug', data });
  }

  info(message: string, data?: unknown): void {
    this.log(message, { level: 'info', data });
  }

  warn(message: string, data?: unknown): void {
    this.log(message, { level: 'warn', data });
  }

  error(message: string, data?: unknown): void {
    this.log(message, { level: 'error', data });
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
