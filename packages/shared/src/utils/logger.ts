/**
 * Minimal logger facade for the SerpPro packages.
 * Falls back to the console until a structured transport is installed.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

// Receives shared package logs when installed, e.g. a pino logger
export interface LoggerTransport {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

let _transport: LoggerTransport | null = null;

/**
 * Route every logger call through an external transport (e.g. pino).
 * Pass null to fall back to the console again.
 */
export function setLoggerTransport(transport: LoggerTransport | null): void {
  _transport = transport;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Unknown or missing levels fall back to 'info' */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && isLogLevel(normalized) ? normalized : 'info';
}

const CONSOLE_SINKS: Record<LogLevel, (line: string, context: LogContext) => void> = {
  debug: (line, context) => console.debug(line, context),
  info: (line, context) => console.info(line, context),
  warn: (line, context) => console.warn(line, context),
  error: (line, context) => console.error(line, context),
};

class Logger {
  private minLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL);

  /** Applies to console output only; an installed transport filters by its own level */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private log(level: LogLevel, context: LogContext | string, message?: string) {
    const ctx = typeof context === 'string' ? {} : context;
    const msg = typeof context === 'string' ? context : message ?? '';

    if (_transport) {
      _transport[level](ctx, msg);
      return;
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    CONSOLE_SINKS[level](`[${new Date().toISOString()}] ${level.toUpperCase()}: ${msg}`, ctx);
  }

  debug(context: LogContext | string, message?: string) {
    this.log('debug', context, message);
  }

  info(context: LogContext | string, message?: string) {
    this.log('info', context, message);
  }

  warn(context: LogContext | string, message?: string) {
    this.log('warn', context, message);
  }

  error(context: LogContext | string, message?: string) {
    this.log('error', context, message);
  }
}

export const logger = new Logger();
