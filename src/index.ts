// Application
export { createApp } from './app.js';
export type { CreateAppOptions, DocsOptions } from './app.js';
export { loadConfig, ConfigSchema } from './config/index.js';
export type { AppConfig, StorageDriver } from './config/index.js';

// Core exports
export { OpenAPIRoute, isRouteClass } from './core/route.js';
export { fromHono, HonoOpenAPIHandler } from './core/openapi.js';
export type { OpenAPIConfig, EndpointClass, HonoOpenAPIApp } from './core/openapi.js';
export {
  ApiException,
  InputValidationException,
  NotFoundException,
  ConfigurationException,
} from './core/exceptions.js';
export type { ErrorBody, ValidationIssue } from './core/exceptions.js';
export {
  createErrorHandler,
  createNotFoundHandler,
  zodErrorMapper,
} from './core/error-handler.js';
export type {
  ErrorMapper,
  ErrorHook,
  ErrorHandlerConfig,
} from './core/error-handler.js';
export { createConsoleLogger, getLogger, setLogger, LOG_LEVELS } from './core/logger.js';
export type { Logger, LogContext, LogLevel } from './core/logger.js';
export { getContextVar, setContextVar, getRequestId, getServices } from './core/context-helpers.js';
export { defineModel, defineMeta } from './core/types.js';
export type {
  AppEnv,
  Model,
  MetaInput,
  ModelObject,
  RequestObject,
  Page,
  PageOptions,
  PaginatedResult,
  HookMode,
  OpenAPIRouteSchema,
} from './core/types.js';

// Endpoints
export * from './endpoints/index.js';
export { registerCrud } from './utils.js';
export type { CrudEndpoints, CrudEndpointName, RegisterCrudOptions } from './utils.js';

// OpenAPI helpers
export {
  jsonContent,
  jsonContentRequired,
  successSchema,
  ErrorResponseSchema,
  validationHook,
} from './openapi/utils.js';

// Domain
export * from './models/index.js';
export * from './serialization/index.js';
export * from './repositories/index.js';
export * from './services/index.js';
export * from './routes/index.js';

// Logging
export * from './logging/index.js';

// UI
export { scalarUI, setupScalar } from './ui/scalar.js';
export type { ScalarConfig } from './ui/scalar.js';
