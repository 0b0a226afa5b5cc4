import { fromHono, type HonoOpenAPIApp } from './core/openapi.js';
import type { AppEnv } from './core/types.js';
import {
  createErrorHandler,
  createNotFoundHandler,
  type ErrorHandlerConfig,
} from './core/error-handler.js';
import { createLoggingMiddleware } from './logging/middleware.js';
import type { LoggingConfig } from './logging/types.js';
import type { Repositories } from './repositories/types.js';
import { createServices } from './services/index.js';
import { registerCompanyRoutes } from './routes/companies.js';
import { registerEmployeeRoutes } from './routes/employees.js';
import { setupScalar, type ScalarConfig } from './ui/scalar.js';

export interface DocsOptions {
  /** @default '/openapi.json' */
  specPath?: string;
  /** @default '/reference' */
  referencePath?: string;
  title?: string;
  version?: string;
  scalar?: Omit<ScalarConfig, 'specUrl'>;
}

export interface CreateAppOptions {
  repositories: Repositories;
  /** Storage name reported by `/health` (default: 'memory') */
  storageName?: string;
  /** OpenAPI document and Scalar reference; `false` disables both (default: true) */
  docs?: boolean | DocsOptions;
  /** Request logging; `false` disables it (default: true) */
  logging?: boolean | LoggingConfig<AppEnv>;
  errorHandler?: ErrorHandlerConfig<AppEnv>;
}

/**
 * Builds the HTTP application over the given repositories.
 *
 * @example
 * ```ts
 * const app = createApp({ repositories: createMemoryRepositories() });
 * const res = await app.request('/companies');
 * ```
 */
export function createApp(options: CreateAppOptions): HonoOpenAPIApp<AppEnv> {
  const { repositories, storageName = 'memory', docs = true, logging = true } = options;
  const services = createServices(repositories);
  const app = fromHono<AppEnv>();

  if (logging !== false) {
    app.use('*', createLoggingMiddleware<AppEnv>(logging === true ? {} : logging));
  }

  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });

  app.onError(createErrorHandler<AppEnv>(options.errorHandler));
  app.notFound(createNotFoundHandler<AppEnv>());

  app.get('/health', (c) => c.json({ status: 'ok', storage: storageName }));

  registerCompanyRoutes(app);
  registerEmployeeRoutes(app);

  if (docs !== false) {
    const docsOptions: DocsOptions = docs === true ? {} : docs;
    const specPath = docsOptions.specPath ?? '/openapi.json';

    app.doc(specPath, {
      info: {
        title: docsOptions.title ?? 'Company Roster API',
        version: docsOptions.version ?? '0.1.0',
        description: 'Companies and their employees.',
      },
    });
    setupScalar(app, docsOptions.referencePath ?? '/reference', {
      ...docsOptions.scalar,
      specUrl: specPath,
    });
  }

  return app;
}
