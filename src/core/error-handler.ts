import type { Context, Env, ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ApiException, InputValidationException, NotFoundException } from './exceptions.js';
import { getRequestId } from './context-helpers.js';
import { getLogger } from './logger.js';
import { toError } from '../utils/errors.js';

/**
 * Error mapper: transforms unknown errors to ApiException.
 * Return undefined to skip this mapper and try the next one.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Hook: called after mapping, before response (for logging/alerting).
 * Hooks are fire-and-forget - their errors go to `onHookError`.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

/**
 * Configuration options for the error handler factory.
 */
export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Custom error mappers - tried in order, first non-undefined wins */
  mappers?: ErrorMapper<E>[];
  /** Error reporting hooks */
  hooks?: ErrorHook<E>[];
  /** Include requestId in error response if available (default: true) */
  includeRequestId?: boolean;
  /** Include stack trace in error response (default: false, never enable in production!) */
  includeStackTrace?: boolean;
  /** Default error code for unmapped errors (default: 'INTERNAL_ERROR') */
  defaultErrorCode?: string;
  /** Default error message for unmapped errors (default: 'An internal error occurred') */
  defaultErrorMessage?: string;
  /** Log unmapped errors (default: true) */
  logUnmappedErrors?: boolean;
  /** Called when a hook throws an error */
  onHookError?: (hookError: Error, originalError: Error, ctx: Context<E>) => void;
}

/**
 * Built-in mapper for ZodError to InputValidationException.
 */
export function zodErrorMapper(error: Error): ApiException | undefined {
  if (error instanceof ZodError) {
    return InputValidationException.fromZodError(error);
  }
  return undefined;
}

/**
 * Creates the global error handler of the app.
 *
 * Every error (including non-ApiException errors) is converted to the
 * standard JSON error envelope.
 *
 * @example
 * ```typescript
 * app.onError(createErrorHandler({
 *   mappers: [
 *     (error) => {
 *       if (error.message.includes('FOREIGN KEY constraint failed')) {
 *         return new NotFoundException('Company');
 *       }
 *       return undefined;
 *     },
 *   ],
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) {
 *         alerting.capture(error);
 *       }
 *     },
 *   ],
 * }));
 * ```
 */
export function createErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig<E> = {}
): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeRequestId = true,
    includeStackTrace = false,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = 'An internal error occurred',
    logUnmappedErrors = true,
    onHookError,
  } = config;

  const allMappers: ErrorMapper<E>[] = [...mappers, zodErrorMapper];

  const mapError = async (err: Error, ctx: Context<E>): Promise<ApiException | undefined> => {
    if (err instanceof ApiException) {
      return err;
    }
    // Plain HTTPException (from Hono's built-in handlers)
    if (err instanceof HTTPException) {
      // Hono's validators reject unparseable bodies with a bare 400
      if (err.status === 400) {
        return new InputValidationException(err.message);
      }
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }
    for (const mapper of allMappers) {
      try {
        const mapped = await mapper(err, ctx);
        if (mapped) {
          return mapped;
        }
      } catch (mapperError) {
        getLogger().warn('Error mapper failed', { error: toError(mapperError).message });
      }
    }
    return undefined;
  };

  return async (err: Error, ctx: Context<E>): Promise<Response> => {
    let apiException = await mapError(err, ctx);

    if (!apiException) {
      if (logUnmappedErrors) {
        getLogger().error('Unmapped error', {
          name: err.name,
          message: err.message,
          stack: err.stack,
        });
      }
      apiException = new ApiException(defaultErrorMessage, 500, defaultErrorCode);
    }

    for (const hook of hooks) {
      const report = (hookErr: unknown) => {
        if (onHookError) {
          onHookError(toError(hookErr), err, ctx);
        }
      };
      try {
        const result = hook(err, ctx, apiException);
        if (result instanceof Promise) {
          result.catch(report);
        }
      } catch (hookErr) {
        report(hookErr);
      }
    }

    const responseBody = apiException.toJSON();

    if (includeRequestId) {
      const requestId = getRequestId(ctx);
      if (requestId) {
        responseBody.error.requestId = requestId;
      }
    }

    if (includeStackTrace && err.stack) {
      responseBody.error.stack = err.stack;
    }

    return ctx.json(responseBody, apiException.status);
  };
}

/**
 * Not-found handler answering unknown routes with the error envelope.
 */
export function createNotFoundHandler<E extends Env = Env>(): NotFoundHandler<E> {
  return (ctx) => {
    const exception = new NotFoundException(`Route ${ctx.req.method} ${ctx.req.path}`);
    return ctx.json(exception.toJSON(), 404);
  };
}
