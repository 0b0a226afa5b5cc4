/**
 * Tests for the Drizzle repositories.
 * Uses SQLite via an in-memory libsql client.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { drizzle } from 'drizzle-orm/libsql';
import { createClient, type Client } from '@libsql/client';
import { sql } from 'drizzle-orm';
import {
  createApp,
  createDrizzleRepositories,
  ensureSchema,
  openRepositories,
  type DrizzleDatabase,
  type Repositories,
} from '../src/index.js';
import { createTestClock, jsonRequest } from './helpers.js';

describe('Drizzle repositories', () => {
  let client: Client;
  let db: DrizzleDatabase;
  let repos: Repositories;

  beforeEach(async () => {
    client = createClient({ url: ':memory:' });
    db = drizzle(client);
    await ensureSchema(db);
    repos = createDrizzleRepositories(db, { now: createTestClock() });
  });

  afterEach(() => {
    client.close();
  });

  it('should create tables idempotently', async () => {
    await ensureSchema(db);
    const tables = await db.all<{ name: string }>(
      sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('company', 'employee') ORDER BY name`
    );
    expect(tables.map((t) => t.name)).toEqual(['company', 'employee']);
  });

  it('should insert and read back a company with Date timestamps', async () => {
    const company = await repos.companies.insert({ name: 'Tech', address: 'Seoul' });

    expect(company.id).toBe(1);
    expect(company.createdAt).toBeInstanceOf(Date);
    expect(company.createdAt.toISOString()).toBe('2026-03-01T00:00:00.000Z');

    const found = await repos.companies.findById(1);
    expect(found).toEqual(company);
  });

  it('should return null for missing rows', async () => {
    expect(await repos.companies.findById(5)).toBeNull();
    expect(await repos.employees.findById(5)).toBeNull();
    expect(await repos.companies.update(5, { name: 'X' })).toBeNull();
    expect(await repos.companies.delete(5)).toBe(false);
  });

  it('should update fields and refresh updatedAt', async () => {
    await repos.companies.insert({ name: 'Tech', address: 'Seoul' });
    const updated = await repos.companies.update(1, { address: 'Busan' });

    expect(updated?.name).toBe('Tech');
    expect(updated?.address).toBe('Busan');
    expect(updated?.updatedAt.toISOString()).toBe('2026-03-01T00:00:01.000Z');
    expect(updated?.createdAt.toISOString()).toBe('2026-03-01T00:00:00.000Z');
  });

  it('should page companies in id order with a total count', async () => {
    for (const name of ['A', 'B', 'C']) {
      await repos.companies.insert({ name, address: 'Seoul' });
    }

    const page = await repos.companies.findPage({ page: 2, perPage: 2 });

    expect(page.items.map((c) => c.name)).toEqual(['C']);
    expect(page.totalCount).toBe(3);
    expect(await repos.companies.count()).toBe(3);
  });

  it('should find rows by id lists, ignoring empty lists', async () => {
    await repos.companies.insert({ name: 'Tech', address: 'Seoul' });
    await repos.companies.insert({ name: 'Labs', address: 'Busan' });
    await repos.employees.insert({ name: 'Kim', email: 'kim@x.com', position: 'Dev', companyId: 2 });
    await repos.employees.insert({ name: 'Lee', email: 'lee@x.com', position: 'PM', companyId: 1 });

    expect((await repos.companies.findByIds([2, 9])).map((c) => c.name)).toEqual(['Labs']);
    expect(await repos.companies.findByIds([])).toEqual([]);
    expect((await repos.employees.findByCompanyIds([1, 2])).map((e) => e.name)).toEqual(['Kim', 'Lee']);
    expect(await repos.employees.findByCompanyIds([])).toEqual([]);
  });

  it('should delete employees of a company and report the count', async () => {
    await repos.companies.insert({ name: 'Tech', address: 'Seoul' });
    await repos.employees.insert({ name: 'Kim', email: 'kim@x.com', position: 'Dev', companyId: 1 });
    await repos.employees.insert({ name: 'Lee', email: 'lee@x.com', position: 'PM', companyId: 1 });

    expect(await repos.employees.deleteByCompanyId(1)).toBe(2);
    expect(await repos.employees.count()).toBe(0);
  });

  describe('through the HTTP API', () => {
    const createSqliteApp = () =>
      createApp({ repositories: repos, storageName: 'sqlite', logging: false, docs: false });

    it('should run the company and employee scenario', async () => {
      const app = createSqliteApp();

      const company = await app.request('/companies', jsonRequest('POST', { name: 'Tech', address: 'Seoul' }));
      expect(company.status).toBe(201);

      const employee = await app.request(
        '/employees',
        jsonRequest('POST', { name: 'Kim', email: 'kim@x.com', position: 'Dev', companyId: 1 })
      );
      const employeeData = await employee.json();
      expect(employee.status).toBe(201);
      expect(employeeData.result.company).toEqual({
        id: 1,
        name: 'Tech',
        address: 'Seoul',
        createdAt: '2026-03-01T00:00:00.000Z',
        updatedAt: '2026-03-01T00:00:00.000Z',
      });

      const missing = await app.request(
        '/employees',
        jsonRequest('POST', { name: 'Lee', email: 'lee@x.com', position: 'PM', companyId: 999 })
      );
      expect(missing.status).toBe(404);
      expect(await repos.employees.count()).toBe(1);

      const deleted = await app.request('/companies/1', { method: 'DELETE' });
      const deletedData = await deleted.json();
      expect(deletedData.result).toEqual({
        deleted: true,
        id: 1,
        cascade: { deleted: { employees: 1 } },
      });

      const health = await app.request('/health');
      expect(await health.json()).toEqual({ status: 'ok', storage: 'sqlite' });
    });

    it('should reject a page whose offset is not a safe integer', async () => {
      const app = createSqliteApp();

      const res = await app.request('/companies?page=100000000000000000000');
      const data = await res.json();

      expect(res.status).toBe(400);
      expect(data.error.code).toBe('VALIDATION_ERROR');
      expect(data.error.details[0].path).toBe('page');
    });

    it('should serve the largest accepted page as empty', async () => {
      const app = createSqliteApp();
      await repos.companies.insert({ name: 'Tech', address: 'Seoul' });

      const res = await app.request('/companies?page=90071992547409');
      const data = await res.json();

      expect(res.status).toBe(200);
      expect(data.result).toEqual([]);
      expect(data.result_info.page).toBe(90071992547409);
      expect(data.result_info.total_count).toBe(1);
    });

    it('should answer 404 when the company is removed between lookup and insert', async () => {
      const app = createSqliteApp();
      await repos.companies.insert({ name: 'Tech', address: 'Seoul' });
      const stale = await repos.companies.findById(1);
      await repos.companies.delete(1);
      vi.spyOn(repos.companies, 'findById').mockResolvedValueOnce(stale);

      const res = await app.request(
        '/employees',
        jsonRequest('POST', { name: 'Kim', email: 'kim@x.com', position: 'Dev', companyId: 1 })
      );

      expect(res.status).toBe(404);
      expect((await res.json()).error).toEqual({
        code: 'NOT_FOUND',
        message: "Company with id '1' not found",
      });
      expect(await repos.employees.count()).toBe(0);
    });
  });
});

describe('openRepositories', () => {
  it('should open memory storage', async () => {
    const storage = await openRepositories({ storageDriver: 'memory', databaseUrl: 'unused' });
    const company = await storage.repositories.companies.insert({ name: 'Tech', address: 'Seoul' });

    expect(company.id).toBe(1);
    storage.close();
  });

  it('should open sqlite storage with its schema', async () => {
    const storage = await openRepositories({ storageDriver: 'sqlite', databaseUrl: ':memory:' });

    expect(await storage.repositories.companies.count()).toBe(0);
    storage.close();
  });
});
