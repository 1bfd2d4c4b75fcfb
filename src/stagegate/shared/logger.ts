import { getConfig, LOG_LEVELS, type LogLevel } from '../config';
import { errorMessage } from '../errors';

const FALLBACK_LEVEL: LogLevel = 'warn';

/**
 * Console-backed structured logger. One JSON line per event.
 */

export interface Logger {
  readonly context: string;
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

type EventLevel = Exclude<LogLevel, 'silent'>;

let globalLevel: LogLevel | undefined;

export function setLogLevel(level: LogLevel | undefined): void {
  globalLevel = level;
}

let configProblem: string | undefined;

/**
 * Explicit level, else the configured one. A bad configuration falls back
 * to `warn` and is reported once on stderr.
 */
export function getLogLevel(): LogLevel {
  if (globalLevel !== undefined) return globalLevel;
  try {
    return getConfig().logLevel;
  } catch (err) {
    const message = errorMessage(err);
    if (configProblem !== message) {
      configProblem = message;
      console.warn(JSON.stringify({ level: 'warn', context: 'logger', message: 'Falling back to warn', error: message }));
    }
    return FALLBACK_LEVEL;
  }
}

function enabled(event: EventLevel, threshold: LogLevel): boolean {
  if (threshold === 'silent') return false;
  return LOG_LEVELS.indexOf(event) <= LOG_LEVELS.indexOf(threshold);
}

function serialise(event: EventLevel, context: string, message: string, data?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  try {
    return JSON.stringify({ level: event, context, message, ...data, timestamp });
  } catch (err) {
    // Cycles and bigints in data
    return JSON.stringify({ level: event, context, message, dataError: errorMessage(err), timestamp });
  }
}

export function createLogger(context: string, level?: LogLevel): Logger {
  const emit = (event: EventLevel, message: string, data?: Record<string, unknown>) => {
    if (!enabled(event, level ?? getLogLevel())) return;

    const line = serialise(event, context, message, data);

    if (event === 'error') console.error(line);
    else if (event === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    context,
    error: (message, data) => emit('error', message, data),
    warn: (message, data) => emit('warn', message, data),
    info: (message, data) => emit('info', message, data),
    debug: (message, data) => emit('debug', message, data),
  };
}
