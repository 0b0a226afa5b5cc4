import type { Hono, Env, Context, MiddlewareHandler } from 'hono';
import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import { isRouteClass } from './route.js';
import type { OpenAPIRoute } from './route.js';
import { ApiException } from './exceptions.js';
import { getRequestId } from './context-helpers.js';
import type { OpenAPIRouteSchema } from './types.js';
import { validationHook } from '../openapi/utils.js';

export interface OpenAPIConfig {
  openapi?: string;
  info: {
    title: string;
    version: string;
    description?: string;
  };
  servers?: Array<{ url: string; description?: string }>;
}

type RouteMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

const ROUTE_METHODS: readonly RouteMethod[] = ['get', 'post', 'put', 'patch', 'delete'];

function isRouteMethod(prop: string | symbol): prop is RouteMethod {
  return ROUTE_METHODS.some((method) => method === prop);
}

/**
 * Constructor of a class-based route.
 */
export type EndpointClass<E extends Env = Env> = new () => OpenAPIRoute<E>;

/**
 * Proxied OpenAPIHono app that accepts route classes next to regular handlers.
 */
export type HonoOpenAPIApp<E extends Env = Env> = OpenAPIHono<E> & {
  get(path: string, RouteClass: EndpointClass<E>): HonoOpenAPIApp<E>;
  get(path: string, ...handlers: [...MiddlewareHandler<E>[], EndpointClass<E>]): HonoOpenAPIApp<E>;
  post(path: string, RouteClass: EndpointClass<E>): HonoOpenAPIApp<E>;
  post(path: string, ...handlers: [...MiddlewareHandler<E>[], EndpointClass<E>]): HonoOpenAPIApp<E>;
  put(path: string, RouteClass: EndpointClass<E>): HonoOpenAPIApp<E>;
  put(path: string, ...handlers: [...MiddlewareHandler<E>[], EndpointClass<E>]): HonoOpenAPIApp<E>;
  patch(path: string, RouteClass: EndpointClass<E>): HonoOpenAPIApp<E>;
  patch(path: string, ...handlers: [...MiddlewareHandler<E>[], EndpointClass<E>]): HonoOpenAPIApp<E>;
  delete(path: string, RouteClass: EndpointClass<E>): HonoOpenAPIApp<E>;
  delete(path: string, ...handlers: [...MiddlewareHandler<E>[], EndpointClass<E>]): HonoOpenAPIApp<E>;
  /**
   * Serve the OpenAPI document generated from the registered route classes.
   */
  doc(path: string, config: OpenAPIConfig): void;
};

/**
 * Registers route classes on an OpenAPIHono app.
 */
export class HonoOpenAPIHandler<E extends Env = Env> {
  private app: OpenAPIHono<E>;

  constructor(app: OpenAPIHono<E>) {
    this.app = app;
  }

  /**
   * Registers an OpenAPIRoute class as a route.
   */
  registerRoute(
    method: RouteMethod,
    path: string,
    RouteClass: EndpointClass<E>,
    middlewares: MiddlewareHandler<E>[] = []
  ): void {
    // Instance used only to read the schema
    const schema: OpenAPIRouteSchema = new RouteClass().getSchema();

    const openapiPath = this.convertPath(path);
    const routeConfig = createRoute({
      method,
      path: openapiPath,
      ...schema,
      responses: schema.responses ?? {
        200: { description: 'Success' },
      },
    });

    // Apply middleware for this specific path+method before the route handler
    for (const mw of middlewares) {
      this.app.use(openapiPath.replace(/\{([^}]+)\}/g, ':$1'), async (c, next) => {
        if (c.req.method.toLowerCase() === method) {
          return mw(c as Context<E>, next);
        }
        await next();
      });
    }

    this.app.openapi(routeConfig, async (c) => {
      // Cast through unknown required: the handler context carries the
      // route's input types, the route instance only needs the Env
      const ctx = c as unknown as Context<E>;
      const route = new RouteClass();
      route.setContext(ctx);

      try {
        return await route.handle();
      } catch (error) {
        if (error instanceof ApiException) {
          const body = error.toJSON();
          const requestId = getRequestId(ctx);
          if (requestId) {
            body.error.requestId = requestId;
          }
          return c.json(body, error.status as 200);
        }
        throw error;
      }
    });
  }

  /**
   * Converts Express-style paths (:id) to OpenAPI-style paths ({id}).
   */
  private convertPath(path: string): string {
    return path.replace(/:([a-zA-Z_][a-zA-Z0-9_]*)/g, '{$1}');
  }

  /**
   * Serves the OpenAPI JSON document at `path`.
   */
  setupDocs(path: string, config: OpenAPIConfig): void {
    this.app.doc31(path, {
      openapi: config.openapi ?? '3.1.0',
      info: config.info,
      servers: config.servers,
    });
  }
}

/**
 * Creates a proxied Hono app that auto-registers OpenAPIRoute classes.
 *
 * Validation failures of route classes are answered with the
 * `VALIDATION_ERROR` envelope.
 *
 * @example
 * ```ts
 * const app = fromHono<AppEnv>();
 *
 * app.post('/companies', CompanyCreate);
 * app.get('/companies/:id', CompanyRead);
 * ```
 */
export function fromHono<E extends Env = Env>(
  router: Hono<E> | OpenAPIHono<E> = new OpenAPIHono<E>({ defaultHook: validationHook })
): HonoOpenAPIApp<E> {
  const app = router instanceof OpenAPIHono
    ? router
    : new OpenAPIHono<E>({ defaultHook: validationHook });

  const handler = new HonoOpenAPIHandler<E>(app);

  const proxy: HonoOpenAPIApp<E> = new Proxy(app, {
    get(target, prop) {
      if (isRouteMethod(prop)) {
        const method = prop;
        return (path: string, ...handlers: unknown[]) => {
          const last = handlers[handlers.length - 1];

          if (isRouteClass(last)) {
            // All arguments before the route class are middleware
            const middlewares = handlers.slice(0, -1) as MiddlewareHandler<E>[];
            handler.registerRoute(method, path, last as unknown as EndpointClass<E>, middlewares);
            return proxy;
          }

          // Otherwise, use normal Hono routing
          const register = Reflect.get(target, method, target) as (...args: unknown[]) => unknown;
          register.call(target, path, ...handlers);
          return proxy;
        };
      }

      if (prop === 'doc') {
        return (path: string, config: OpenAPIConfig) => {
          handler.setupDocs(path, config);
        };
      }

      // For 'use', apply to the app and return the proxy for chaining
      if (prop === 'use') {
        return (...args: unknown[]) => {
          const use = Reflect.get(target, 'use', target) as (...a: unknown[]) => unknown;
          use.apply(target, args);
          return proxy;
        };
      }

      const value: unknown = Reflect.get(target, prop, target);
      if (typeof value === 'function') {
        return value.bind(target);
      }
      return value;
    },
  }) as HonoOpenAPIApp<E>;

  return proxy;
}
