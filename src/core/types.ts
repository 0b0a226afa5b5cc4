import type { z, ZodObject, ZodRawShape } from 'zod';
import type { RouteConfig } from '@hono/zod-openapi';
import type { Services } from '../services/index.js';

// ============================================================================
// Application Env
// ============================================================================

/**
 * Hono Env shared by every route of the application.
 * `services` is injected per request by the app factory; the request id is
 * set by the logging middleware when it runs.
 */
export type AppEnv = {
  Variables: {
    services: Services;
    requestId?: string;
  };
};

// ============================================================================
// Model & Meta Types
// ============================================================================

/**
 * Resource definition used by the generic endpoints.
 * @template T - Zod schema of the top-level (Full) response shape
 */
export interface Model<T extends ZodObject<ZodRawShape> = ZodObject<ZodRawShape>> {
  /** Human-readable resource name used in error messages and docs */
  resourceName: string;
  /** Zod schema of the response shape returned by every endpoint */
  schema: T;
}

/**
 * Meta input configuration for endpoints.
 * @template T - Response shape schema
 * @template F - Request shape schema (body of create and update)
 */
export interface MetaInput<
  T extends ZodObject<ZodRawShape> = ZodObject<ZodRawShape>,
  F extends ZodObject<ZodRawShape> = ZodObject<ZodRawShape>,
> {
  model: Model<T>;
  fields: F;
}

/**
 * Object type produced by a model (its response shape).
 */
export type ModelObject<M extends Model> = z.infer<M['schema']>;

/**
 * Validated request body type of a meta.
 */
export type RequestObject<M extends MetaInput> = z.infer<M['fields']>;

/**
 * Helper to create a typed Model configuration.
 *
 * @example
 * ```ts
 * const CompanyModel = defineModel({
 *   resourceName: 'Company',
 *   schema: CompanyFullSchema,
 * });
 * ```
 */
export function defineModel<T extends ZodObject<ZodRawShape>>(config: Model<T>): Model<T> {
  return config;
}

/**
 * Helper to create a typed MetaInput configuration.
 *
 * @example
 * ```ts
 * const companyMeta = defineMeta({
 *   model: CompanyModel,
 *   fields: CompanyRequestSchema,
 * });
 * ```
 */
export function defineMeta<
  T extends ZodObject<ZodRawShape>,
  F extends ZodObject<ZodRawShape>,
>(config: MetaInput<T, F>): MetaInput<T, F> {
  return config;
}

// ============================================================================
// Pagination Types
// ============================================================================

export interface PageOptions {
  page: number;
  perPage: number;
}

export interface Page<T> {
  items: T[];
  totalCount: number;
}

export interface PaginatedResult<T> {
  result: T[];
  result_info: {
    page: number;
    per_page: number;
    total_count: number;
    total_pages: number;
    has_next_page: boolean;
    has_prev_page: boolean;
  };
}

// ============================================================================
// Route Types
// ============================================================================

// Hook execution mode
export type HookMode = 'sequential' | 'fire-and-forget';

// OpenAPI route schema
export interface OpenAPIRouteSchema {
  request?: RouteConfig['request'];
  responses?: RouteConfig['responses'];
  tags?: string[];
  summary?: string;
  description?: string;
  operationId?: string;
}

// Validated data from request
export interface ValidatedData<T = unknown> {
  body?: T;
  query?: Record<string, unknown>;
  params?: Record<string, string>;
}
