import type { Context, Env } from 'hono';
import type { LogLevel } from '../core/logger.js';

export type { LogLevel };

/**
 * Path pattern: exact path, glob (`*` one segment, `**` any depth) or RegExp.
 */
export type PathPattern = string | RegExp;

/**
 * One finished request as seen by the logging middleware.
 */
export interface LogEntry {
  /** Request id, also sent as `X-Request-ID` */
  id: string;
  /** When the request was received (ISO timestamp) */
  timestamp: string;
  level: LogLevel;
  request: {
    method: string;
    /** Request path (without query string) */
    path: string;
    query?: Record<string, string>;
  };
  response: {
    statusCode: number;
    responseTimeMs: number;
  };
  /** Set when the handler chain threw */
  error?: {
    message: string;
    name?: string;
  };
}

/**
 * Receives every log entry. May be async; failures go to `onError`.
 */
export type LogHandler = (entry: LogEntry) => void | Promise<void>;

/**
 * Picks the level of an entry from the outcome of the request.
 */
export type LevelResolver<E extends Env = Env> = (
  ctx: Context<E>,
  responseTimeMs: number,
  statusCode: number,
  error?: Error
) => LogLevel;

export interface LoggingConfig<E extends Env = Env> {
  /** Default: true */
  enabled?: boolean;
  /** Only log these paths (default: all) */
  includePaths?: PathPattern[];
  /** Never log these paths; wins over `includePaths` (default: `['/health']`) */
  excludePaths?: PathPattern[];
  /** Include query parameters in entries (default: true) */
  includeQuery?: boolean;
  /** Default: `crypto.randomUUID()` */
  generateRequestId?: () => string;
  /** Default: error for 5xx or thrown errors, warn for 4xx, info otherwise */
  levelResolver?: LevelResolver<E>;
  /** Default: one handler writing to the application logger */
  handlers?: LogHandler[];
  /** Called when a handler fails */
  onError?: (error: Error, entry: LogEntry) => void;
}
