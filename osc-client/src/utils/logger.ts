/**
 * Logging utility
 *
 * Centralized console logging with a process-wide level threshold.
 * The level comes from LIVE_OSC_LOG_LEVEL (debug, info, warn, error, silent)
 * and defaults to warn; setLogLevel() overrides it at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Resolve a level name from the environment, falling back to the default
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized !== undefined && isLogLevel(normalized)) {
    return normalized;
  }
  return DEFAULT_LOG_LEVEL;
}

let currentLevel: LogLevel = resolveLogLevel(process.env['LIVE_OSC_LOG_LEVEL']);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Render a log line: "[level] [scope] message key=value ..."
 */
export function formatLogLine(level: string, scope: string, message: string, context?: LogContext): string {
  let line = `[${level}] [${scope}] ${message}`;
  if (context !== undefined) {
    for (const [key, value] of Object.entries(context)) {
      line += ` ${key}=${formatValue(value)}`;
    }
  }
  return line;
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Create a logger for a component
 */
export function createLogger(scope: string): Logger {
  return {
    debug(message, context) {
      if (enabled('debug')) {
        console.debug(formatLogLine('DEBUG', scope, message, context));
      }
    },
    info(message, context) {
      if (enabled('info')) {
        console.info(formatLogLine('INFO', scope, message, context));
      }
    },
    warn(message, context) {
      if (enabled('warn')) {
        console.warn(formatLogLine('WARN', scope, message, context));
      }
    },
    error(message, context) {
      if (enabled('error')) {
        console.error(formatLogLine('ERROR', scope, message, context));
      }
    },
  };
}
