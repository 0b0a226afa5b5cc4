import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  CompanyCreate,
  CompanyDelete,
  CompanyRead,
  createConsoleLogger,
  createErrorHandler,
  createMemoryRepositories,
  createServices,
  fromHono,
  registerCrud,
  setLogger,
  type AppEnv,
  type CascadeResult,
  type CompanyFull,
  type CompanyRequest,
  type HookMode,
} from '../src/index.js';
import { createRecordingLogger, createTestClock, jsonRequest, type RecordedLog } from './helpers.js';

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

let logs: RecordedLog[];
let deletions: Array<{ id: number; cascade?: CascadeResult }>;

beforeEach(() => {
  const recording = createRecordingLogger();
  logs = recording.entries;
  setLogger(recording.logger);
  deletions = [];
});

afterEach(() => {
  setLogger(createConsoleLogger());
});

class TrimmedCompanyCreate extends CompanyCreate {
  async before(data: CompanyRequest): Promise<CompanyRequest> {
    return { ...data, name: data.name.toUpperCase() };
  }

  async after(item: CompanyFull): Promise<CompanyFull> {
    return { ...item, address: `${item.address} (verified)` };
  }

  protected transform(item: CompanyFull): unknown {
    return { id: item.id, name: item.name, address: item.address, headcount: item.employees.length };
  }
}

class AuditedCompanyRead extends CompanyRead {
  protected afterHookMode: HookMode = 'fire-and-forget';

  async after(item: CompanyFull): Promise<CompanyFull> {
    throw new Error(`audit sink down for ${item.id}`);
  }
}

class RecordedCompanyDelete extends CompanyDelete {
  async after(id: number, cascade?: CascadeResult): Promise<void> {
    deletions.push({ id, cascade });
  }
}

function createHookedApp() {
  const repositories = createMemoryRepositories({ now: createTestClock() });
  const services = createServices(repositories);
  const app = fromHono<AppEnv>();
  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });
  app.onError(createErrorHandler<AppEnv>());
  registerCrud(app, '/companies', {
    create: TrimmedCompanyCreate,
    read: AuditedCompanyRead,
    delete: RecordedCompanyDelete,
  });
  return { app, services };
}

describe('endpoint hooks', () => {
  it('should run before, after and transform around create', async () => {
    const { app, services } = createHookedApp();

    const res = await app.request('/companies', jsonRequest('POST', { name: 'Tech', address: 'Seoul' }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      success: true,
      result: { id: 1, name: 'TECH', address: 'Seoul (verified)', headcount: 0 },
    });
    // after() only changes the response, not the stored row
    expect((await services.companies.get(1)).address).toBe('Seoul');
  });

  it('should log fire-and-forget after hook failures without failing the request', async () => {
    const { app, services } = createHookedApp();
    await services.companies.create({ name: 'Tech', address: 'Seoul' });

    const res = await app.request('/companies/1');
    await flush();

    expect(res.status).toBe(200);
    expect((await res.json()).result.name).toBe('Tech');
    const failures = logs.filter((l) => l.message === 'Background task failed');
    expect(failures).toHaveLength(1);
    expect(failures[0].level).toBe('error');
    expect(failures[0].context).toEqual({ error: 'audit sink down for 1' });
  });

  it('should pass the cascade counts to the delete after hook', async () => {
    const { app, services } = createHookedApp();
    const company = await services.companies.create({ name: 'Tech', address: 'Seoul' });
    await services.employees.create({
      name: 'Ann',
      email: 'ann@example.com',
      position: 'Engineer',
      companyId: company.id,
    });

    const res = await app.request('/companies/1', { method: 'DELETE' });

    expect(await res.json()).toEqual({
      success: true,
      result: { deleted: true, id: 1, cascade: { deleted: { employees: 1 } } },
    });
    expect(deletions).toEqual([{ id: 1, cascade: { deleted: { employees: 1 } } }]);
  });

  it('should not register endpoints left out of registerCrud', async () => {
    const { app } = createHookedApp();

    const res = await app.request('/companies');

    expect(res.status).toBe(404);
  });
});
