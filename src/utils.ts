import type { Env, MiddlewareHandler } from 'hono';
import type { EndpointClass, HonoOpenAPIApp } from './core/openapi.js';

/**
 * All CRUD endpoint names supported by registerCrud.
 */
export type CrudEndpointName = 'create' | 'list' | 'read' | 'update' | 'delete';

/**
 * CRUD endpoint configuration for registerCrud helper.
 */
export interface CrudEndpoints<E extends Env = Env> {
  create?: EndpointClass<E>;
  list?: EndpointClass<E>;
  read?: EndpointClass<E>;
  update?: EndpointClass<E>;
  delete?: EndpointClass<E>;
}

/**
 * Options for registerCrud function.
 */
export interface RegisterCrudOptions<E extends Env = Env> {
  /** Middleware applied to every endpoint of the resource */
  middlewares?: MiddlewareHandler<E>[];
  /** Middleware applied to a single endpoint, after the shared ones */
  endpointMiddlewares?: Partial<Record<CrudEndpointName, MiddlewareHandler<E>[]>>;
}

/**
 * Registers CRUD endpoints for a resource.
 *
 * Routes: `POST base`, `GET base`, `GET base/:id`, `PUT base/:id`,
 * `DELETE base/:id`.
 *
 * @example
 * ```ts
 * registerCrud(app, '/companies', {
 *   create: CompanyCreate,
 *   list: CompanyList,
 *   read: CompanyRead,
 *   update: CompanyUpdate,
 *   delete: CompanyDelete,
 * }, {
 *   endpointMiddlewares: { delete: [requireAdmin] },
 * });
 * ```
 */
export function registerCrud<E extends Env = Env>(
  app: HonoOpenAPIApp<E>,
  basePath: string,
  endpoints: CrudEndpoints<E>,
  options: RegisterCrudOptions<E> = {}
): void {
  const normalizedPath = basePath.endsWith('/') ? basePath.slice(0, -1) : basePath;
  const itemPath = `${normalizedPath}/:id`;
  const { middlewares = [], endpointMiddlewares = {} } = options;

  const handlersFor = (
    name: CrudEndpointName,
    endpoint: EndpointClass<E>
  ): [...MiddlewareHandler<E>[], EndpointClass<E>] => [
    ...middlewares,
    ...(endpointMiddlewares[name] ?? []),
    endpoint,
  ];

  // Collection-level routes (no :id parameter)
  if (endpoints.create) {
    app.post(normalizedPath, ...handlersFor('create', endpoints.create));
  }
  if (endpoints.list) {
    app.get(normalizedPath, ...handlersFor('list', endpoints.list));
  }
  if (endpoints.read) {
    app.get(itemPath, ...handlersFor('read', endpoints.read));
  }
  if (endpoints.update) {
    app.put(itemPath, ...handlersFor('update', endpoints.update));
  }
  if (endpoints.delete) {
    app.delete(itemPath, ...handlersFor('delete', endpoints.delete));
  }
}
