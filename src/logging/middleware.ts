import type { Env, MiddlewareHandler } from 'hono';
import { getLogger } from '../core/logger.js';
import { setContextVar } from '../core/context-helpers.js';
import { toError } from '../utils/errors.js';
import type { LogEntry, LogLevel, LoggingConfig, PathPattern } from './types.js';
import {
  extractQuery,
  generateRequestId as defaultGenerateRequestId,
  loggerHandler,
  shouldExcludePath,
} from './utils.js';

/** Default paths to exclude from logging */
const DEFAULT_EXCLUDE_PATHS: PathPattern[] = ['/health'];

/**
 * Creates logging middleware for request/response tracking.
 *
 * Every logged request gets an id, stored in the context as `requestId` and
 * returned in the `X-Request-ID` header. Entries are handed to the handlers
 * after the response is ready, without awaiting them.
 *
 * @example
 * ```ts
 * app.use('*', createLoggingMiddleware({
 *   excludePaths: ['/health', '/reference'],
 *   handlers: [(entry) => metrics.observe(entry.response.responseTimeMs)],
 * }));
 * ```
 */
export function createLoggingMiddleware<E extends Env = Env>(
  config: LoggingConfig<E> = {}
): MiddlewareHandler<E> {
  const enabled = config.enabled ?? true;
  const includePaths = config.includePaths ?? [];
  const excludePaths = config.excludePaths ?? DEFAULT_EXCLUDE_PATHS;
  const includeQuery = config.includeQuery ?? true;
  const generateRequestId = config.generateRequestId ?? defaultGenerateRequestId;
  const handlers = config.handlers ?? [loggerHandler];

  const reportError = (error: Error, entry: LogEntry): void => {
    if (config.onError) {
      config.onError(error, entry);
    } else {
      getLogger().error('Log handler failed', { requestId: entry.id, error: error.message });
    }
  };

  return async (ctx, next) => {
    if (!enabled) {
      return next();
    }

    const path = ctx.req.path;
    if (shouldExcludePath(path, includePaths, excludePaths)) {
      return next();
    }

    const requestId = generateRequestId();
    const startTime = Date.now();

    setContextVar(ctx, 'requestId', requestId);
    ctx.header('X-Request-ID', requestId);

    const method = ctx.req.method;
    const query = includeQuery ? extractQuery(ctx) : undefined;

    let error: Error | undefined;

    try {
      await next();
    } catch (e) {
      error = toError(e);
      throw e;
    } finally {
      const responseTimeMs = Date.now() - startTime;
      const statusCode = ctx.res.status;

      let level: LogLevel = 'info';
      if (config.levelResolver) {
        level = config.levelResolver(ctx, responseTimeMs, statusCode, error);
      } else if (error || statusCode >= 500) {
        level = 'error';
      } else if (statusCode >= 400) {
        level = 'warn';
      }

      const entry: LogEntry = {
        id: requestId,
        timestamp: new Date(startTime).toISOString(),
        level,
        request: { method, path, query },
        response: { statusCode, responseTimeMs },
      };

      if (error) {
        entry.error = { message: error.message, name: error.name };
      }

      const handleEntry = async (): Promise<void> => {
        for (const handler of handlers) {
          try {
            await handler(entry);
          } catch (handlerError) {
            reportError(toError(handlerError), entry);
          }
        }
      };

      // Not awaited: logging never delays the response
      handleEntry().catch((err) => reportError(toError(err), entry));
    }
  };
}
