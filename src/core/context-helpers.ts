import type { Context, Env } from 'hono';
import { ConfigurationException } from './exceptions.js';
import type { Services } from '../services/index.js';

/**
 * Type-safe context variable accessors for code that only knows the
 * generic `Env` (middleware, error handler).
 */

/**
 * Safely retrieves a variable from the Hono context.
 * Returns undefined if the variable doesn't exist.
 *
 * @example
 * ```ts
 * const requestId = getContextVar<string>(ctx, 'requestId');
 * ```
 */
export function getContextVar<T>(ctx: unknown, key: string): T | undefined {
  const ctxObj = ctx as { var?: Record<string, unknown> } | undefined;
  return ctxObj?.var?.[key] as T | undefined;
}

/**
 * Sets a context variable when the generic Env type may not declare the key.
 *
 * @example
 * ```ts
 * setContextVar(ctx, 'requestId', generateRequestId());
 * ```
 */
export function setContextVar<E extends Env>(ctx: Context<E>, key: string, value: unknown): void {
  (ctx as unknown as { set: (key: string, value: unknown) => void }).set(key, value);
}

/**
 * Retrieves the request ID set by the logging middleware.
 */
export function getRequestId<E extends Env>(ctx: Context<E>): string | undefined {
  return getContextVar<string>(ctx, 'requestId');
}

/**
 * Retrieves the services injected by the app factory.
 * Throws when the services middleware has not run.
 */
export function getServices<E extends Env>(ctx: Context<E>): Services {
  const services = getContextVar<Services>(ctx, 'services');
  if (!services) {
    throw new ConfigurationException(
      'Services not configured. Create the app with createApp() or set them with c.set("services", services)'
    );
  }
  return services;
}
