/**
 * Example: Company roster over in-memory storage
 *
 * Seeds two companies and a few employees, then serves:
 * - POST/GET /companies, GET/PUT/DELETE /companies/:id
 * - POST/GET /employees, GET/PUT/DELETE /employees/:id
 * - GET /openapi.json and GET /reference
 *
 * Run with: npx tsx examples/memory.ts
 */

import { serve } from '@hono/node-server';
import {
  createApp,
  createMemoryRepositories,
  createServices,
  getLogger,
} from '../src/index.js';

const repositories = createMemoryRepositories();
const services = createServices(repositories);

const acme = await services.companies.create({ name: 'Acme', address: '1 Main St' });
const globex = await services.companies.create({ name: 'Globex', address: '9 Elm Rd' });

await services.employees.create({
  name: 'Ann Lee',
  email: 'ann@example.com',
  position: 'Engineer',
  companyId: acme.id,
});
await services.employees.create({
  name: 'Bo Kim',
  email: 'bo@example.com',
  position: 'Designer',
  companyId: acme.id,
});
await services.employees.create({
  name: 'Cy Park',
  email: 'cy@example.com',
  position: 'Manager',
  companyId: globex.id,
});

const app = createApp({ repositories });
const port = 3000;

serve({ fetch: app.fetch, port }, () => {
  getLogger().info(`Server running on http://localhost:${port}`);
  getLogger().info(`API reference on http://localhost:${port}/reference`);
});
