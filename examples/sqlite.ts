/**
 * Example: Company roster over SQLite with a read-only delete guard
 *
 * Builds the app by hand instead of createApp to show route
 * registration with per-endpoint middleware.
 *
 * Run with: npx tsx examples/sqlite.ts
 */

import { serve } from '@hono/node-server';
import type { MiddlewareHandler } from 'hono';
import {
  createErrorHandler,
  createLoggingMiddleware,
  createNotFoundHandler,
  createServices,
  fromHono,
  getLogger,
  openRepositories,
  registerCompanyRoutes,
  registerEmployeeRoutes,
  setupScalar,
  type AppEnv,
} from '../src/index.js';

const storage = await openRepositories({
  storageDriver: 'sqlite',
  databaseUrl: 'file:example-roster.db',
});
const services = createServices(storage.repositories);

const requireAdminHeader: MiddlewareHandler<AppEnv> = async (c, next) => {
  if (c.req.header('X-Admin') !== 'yes') {
    return c.json(
      { success: false, error: { code: 'FORBIDDEN', message: 'Deletes need X-Admin: yes' } },
      403
    );
  }
  await next();
};

const app = fromHono<AppEnv>();
app.use('*', createLoggingMiddleware<AppEnv>());
app.use('*', async (c, next) => {
  c.set('services', services);
  await next();
});
app.onError(createErrorHandler<AppEnv>());
app.notFound(createNotFoundHandler<AppEnv>());

registerCompanyRoutes(app, '/companies', { endpointMiddlewares: { delete: [requireAdminHeader] } });
registerEmployeeRoutes(app, '/employees', { endpointMiddlewares: { delete: [requireAdminHeader] } });

app.doc('/openapi.json', {
  info: { title: 'Company Roster (SQLite)', version: '0.1.0' },
});
setupScalar(app, '/reference', { specUrl: '/openapi.json' });

serve({ fetch: app.fetch, port: 3001 }, () => {
  getLogger().info('Server running on http://localhost:3001');
});

process.on('SIGINT', () => {
  storage.close();
  process.exit(0);
});
