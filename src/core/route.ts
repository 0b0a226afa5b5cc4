import type { Context, Env } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { getLogger } from './logger.js';
import { toError } from '../utils/errors.js';
import type { OpenAPIRouteSchema, ValidatedData } from './types.js';

/**
 * Base class for OpenAPI routes.
 * Provides access to validated request data, response helpers and
 * the OpenAPI schema of the route.
 */
export abstract class OpenAPIRoute<E extends Env = Env> {
  static isRoute = true;

  schema: OpenAPIRouteSchema = {};

  protected context: Context<E> | null = null;

  /**
   * Main handler method - must be implemented by subclasses.
   */
  abstract handle(): Response | Promise<Response>;

  /**
   * Returns the OpenAPI schema for this route.
   * Override in subclasses to customize.
   */
  getSchema(): OpenAPIRouteSchema {
    return this.schema;
  }

  /**
   * Gets request data validated by zod-openapi against `getSchema()`.
   */
  async getValidatedData<T = unknown>(): Promise<ValidatedData<T>> {
    const ctx = this.getContext();
    const schema = this.getSchema();
    const data: ValidatedData<T> = {};

    if (schema.request?.body) {
      data.body = ctx.req.valid('json' as never) as T;
    }

    if (schema.request?.query) {
      data.query = ctx.req.valid('query' as never) as Record<string, unknown>;
    }

    if (schema.request?.params) {
      data.params = ctx.req.valid('param' as never) as Record<string, string>;
    }

    return data;
  }

  /**
   * Sets the Hono context for this route instance.
   */
  setContext(ctx: Context<E>): void {
    this.context = ctx;
  }

  /**
   * Gets the current Hono context.
   */
  getContext(): Context<E> {
    if (!this.context) {
      throw new Error('Context not set. Call setContext() first.');
    }
    return this.context;
  }

  /**
   * Creates a success response.
   */
  protected success<T>(result: T, status: ContentfulStatusCode = 200): Response {
    return this.getContext().json({ success: true, result }, status) as unknown as Response;
  }

  /**
   * Creates a JSON response with an arbitrary body.
   */
  protected json<T>(data: T, status: ContentfulStatusCode = 200): Response {
    return this.getContext().json(data, status) as unknown as Response;
  }

  /**
   * Runs a promise after the response is sent.
   * Failures are reported to the logger instead of the client.
   */
  protected runAfterResponse(promise: Promise<unknown>): void {
    promise.catch((err) => {
      getLogger().error('Background task failed', { error: toError(err).message });
    });
  }
}

/**
 * Type guard to check if a value is an OpenAPIRoute class.
 */
export function isRouteClass(
  cls: unknown
): cls is (new () => OpenAPIRoute) & { isRoute: true } {
  return (
    typeof cls === 'function' &&
    'isRoute' in cls &&
    cls.isRoute === true
  );
}
