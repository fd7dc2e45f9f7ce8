/**
 * Shared logger
 *
 * Prefixes every line with a timestamp and a component tag so that the
 * webhook, dispatcher and IRC lifecycle logs can be read as one timeline.
 *
 * - Timestamp format: [YYYY-MM-DD HH:mm:ss] in the `TZ` timezone (UTC by default)
 * - Minimum level from `LOG_LEVEL` (debug | info | warn | error), `DEBUG` forces debug
 * - raw() prints user-facing output without a timestamp
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveLevel(): LogLevel {
  if (process.env.DEBUG) return 'debug';
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function formatTimestamp(): string {
  const now = new Date();
  return now.toLocaleString('sv-SE', {
    timeZone: process.env.TZ || 'UTC',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
}

export class Logger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  private format(level: LogLevel, message: string): string {
    const tag = level === 'info' ? '' : ` [${level.toUpperCase()}]`;
    return `[${formatTimestamp()}] [${this.prefix}]${tag} ${message}`;
  }

  // Resolved per call so LOG_LEVEL changes after module load still apply.
  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLevel()];
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled('info')) return;
    console.log(this.format('info', message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled('warn')) return;
    console.warn(this.format('warn', message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled('error')) return;
    console.error(this.format('error', message), ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled('debug')) return;
    console.log(this.format('debug', message), ...args);
  }

  raw(message: string): void {
    console.log(message);
  }
}

export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}
