import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { MiddlewareHandler } from 'hono';
import {
  createErrorHandler,
  createMemoryRepositories,
  createServices,
  fromHono,
  jsonContent,
  OpenAPIRoute,
  registerCompanyRoutes,
  successSchema,
  type AppEnv,
  type OpenAPIRouteSchema,
} from '../src/index.js';
import { createTestApp, jsonRequest } from './helpers.js';

describe('createApp', () => {
  it('should report health with the storage name', async () => {
    const { app } = createTestApp({ storageName: 'sqlite' });

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', storage: 'sqlite' });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const { app } = createTestApp();

    const res = await app.request('/departments');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /departments not found' },
    });
  });

  it('should serve the OpenAPI document for every resource route', async () => {
    const { app } = createTestApp({ docs: true });

    const res = await app.request('/openapi.json');
    const doc = await res.json();

    expect(res.status).toBe(200);
    expect(doc.openapi).toBe('3.1.0');
    expect(doc.info.title).toBe('Company Roster API');
    expect(Object.keys(doc.paths).sort()).toEqual([
      '/companies',
      '/companies/{id}',
      '/employees',
      '/employees/{id}',
    ]);
    expect(Object.keys(doc.paths['/companies/{id}']).sort()).toEqual(['delete', 'get', 'put']);
    expect(doc.paths['/companies'].post.tags).toEqual(['Companies']);
  });

  it('should serve the Scalar reference page', async () => {
    const { app } = createTestApp({ docs: { referencePath: '/docs' } });

    const res = await app.request('/docs');

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('text/html');
  });

  it('should not serve documentation when disabled', async () => {
    const { app } = createTestApp({ docs: false });

    expect((await app.request('/openapi.json')).status).toBe(404);
    expect((await app.request('/reference')).status).toBe(404);
  });
});

describe('registerCrud middleware', () => {
  it('should apply endpoint middleware to its method only', async () => {
    const services = createServices(createMemoryRepositories());
    const readOnly: MiddlewareHandler<AppEnv> = async (c) =>
      c.json({ success: false, error: { code: 'FORBIDDEN', message: 'Read-only' } }, 403);

    const app = fromHono<AppEnv>();
    app.use('*', async (c, next) => {
      c.set('services', services);
      await next();
    });
    app.onError(createErrorHandler<AppEnv>());
    registerCompanyRoutes(app, '/companies', { endpointMiddlewares: { delete: [readOnly] } });

    const created = await app.request('/companies', jsonRequest('POST', { name: 'Tech', address: 'Seoul' }));
    const blocked = await app.request('/companies/1', { method: 'DELETE' });
    const read = await app.request('/companies/1');

    expect(created.status).toBe(201);
    expect(blocked.status).toBe(403);
    expect(read.status).toBe(200);
  });
});

describe('fromHono', () => {
  class Echo extends OpenAPIRoute<AppEnv> {
    schema: OpenAPIRouteSchema = {
      request: {
        query: z.object({ word: z.string().min(2) }),
      },
      responses: {
        200: jsonContent(successSchema(z.object({ word: z.string() })), 'Echoed word'),
      },
    };

    async handle(): Promise<Response> {
      const { query } = await this.getValidatedData();
      return this.success({ word: query?.word });
    }
  }

  it('should register route classes and validate their input', async () => {
    const app = fromHono<AppEnv>();
    app.get('/echo', Echo);

    const ok = await app.request('/echo?word=hello');
    const bad = await app.request('/echo?word=x');
    const badBody = await bad.json();

    expect(await ok.json()).toEqual({ success: true, result: { word: 'hello' } });
    expect(bad.status).toBe(400);
    expect(badBody.error.code).toBe('VALIDATION_ERROR');
    expect(badBody.error.details[0].path).toBe('word');
  });

  it('should still accept plain handlers', async () => {
    const app = fromHono<AppEnv>();
    app.get('/plain', (c) => c.text('plain'));

    const res = await app.request('/plain');

    expect(await res.text()).toBe('plain');
  });
});
