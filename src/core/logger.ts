/**
 * Structured logger for company-roster.
 *
 * Provides a centralised logging interface that can be overridden to
 * integrate with other logging infrastructure.
 *
 * @example
 * ```ts
 * import { setLogger } from 'company-roster';
 *
 * // Replace the default console logger with pino
 * setLogger({
 *   debug(msg, ctx) { pino.debug(ctx, msg); },
 *   info(msg, ctx) { pino.info(ctx, msg); },
 *   warn(msg, ctx) { pino.warn(ctx, msg); },
 *   error(msg, ctx) { pino.error(ctx, msg); },
 * });
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const PREFIX = '[company-roster]';

/**
 * Creates a console-backed logger that drops entries below `minLevel`.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);

  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (context && Object.keys(context).length > 0) {
      sink(`${PREFIX} ${message}`, context);
    } else {
      sink(`${PREFIX} ${message}`);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

let currentLogger: Logger = createConsoleLogger();

/** Replace the default logger with a custom implementation. */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/** Get the current logger instance. */
export function getLogger(): Logger {
  return currentLogger;
}
