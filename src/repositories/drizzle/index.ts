import { asc, count, eq, inArray, sql } from 'drizzle-orm';
import type { LibSQLDatabase } from 'drizzle-orm/libsql';
import type { CompanyRecord } from '../../models/company.js';
import type { EmployeeRecord } from '../../models/employee.js';
import type { Page, PageOptions } from '../../core/types.js';
import {
  systemClock,
  type Clock,
  type CompanyChanges,
  type CompanyRepository,
  type EmployeeChanges,
  type EmployeeRepository,
  type NewCompany,
  type NewEmployee,
  type Repositories,
  type RepositoryOptions,
} from '../types.js';
import { companies, employees } from './schema.js';

export { companies, employees } from './schema.js';

/**
 * Drizzle database over a libsql client (file or `:memory:`).
 */
export type DrizzleDatabase = LibSQLDatabase;

/**
 * Creates the tables when they do not exist yet.
 *
 * @example
 * ```ts
 * const db = drizzle(createClient({ url: 'file:company-roster.db' }));
 * await ensureSchema(db);
 * ```
 */
export async function ensureSchema(db: DrizzleDatabase): Promise<void> {
  await db.run(sql`PRAGMA foreign_keys = ON`);
  await db.run(sql`
    CREATE TABLE IF NOT EXISTS company (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      address TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
  await db.run(sql`
    CREATE TABLE IF NOT EXISTS employee (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      email TEXT NOT NULL,
      position TEXT NOT NULL,
      company_id INTEGER REFERENCES company(id) ON DELETE CASCADE,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);
  await db.run(sql`CREATE INDEX IF NOT EXISTS employee_company_id_idx ON employee (company_id)`);
}

const pageOffset = (options: PageOptions): number => (options.page - 1) * options.perPage;

export class DrizzleCompanyRepository implements CompanyRepository {
  constructor(
    private db: DrizzleDatabase,
    private now: Clock = systemClock
  ) {}

  async insert(data: NewCompany): Promise<CompanyRecord> {
    const timestamp = this.now();
    const [row] = await this.db
      .insert(companies)
      .values({ ...data, createdAt: timestamp, updatedAt: timestamp })
      .returning();
    if (!row) {
      throw new Error('Insert into company returned no row');
    }
    return row;
  }

  async findById(id: number): Promise<CompanyRecord | null> {
    const [row] = await this.db.select().from(companies).where(eq(companies.id, id)).limit(1);
    return row ?? null;
  }

  async findByIds(ids: readonly number[]): Promise<CompanyRecord[]> {
    // inArray with an empty list is not valid SQL
    if (ids.length === 0) {
      return [];
    }
    return this.db
      .select()
      .from(companies)
      .where(inArray(companies.id, [...ids]))
      .orderBy(asc(companies.id));
  }

  async findPage(options: PageOptions): Promise<Page<CompanyRecord>> {
    const items = await this.db
      .select()
      .from(companies)
      .orderBy(asc(companies.id))
      .limit(options.perPage)
      .offset(pageOffset(options));
    return { items, totalCount: await this.count() };
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(companies);
    return row?.value ?? 0;
  }

  async update(id: number, changes: CompanyChanges): Promise<CompanyRecord | null> {
    const [row] = await this.db
      .update(companies)
      .set({ ...changes, updatedAt: this.now() })
      .where(eq(companies.id, id))
      .returning();
    return row ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const removed = await this.db
      .delete(companies)
      .where(eq(companies.id, id))
      .returning({ id: companies.id });
    return removed.length > 0;
  }
}

export class DrizzleEmployeeRepository implements EmployeeRepository {
  constructor(
    private db: DrizzleDatabase,
    private now: Clock = systemClock
  ) {}

  async insert(data: NewEmployee): Promise<EmployeeRecord> {
    const timestamp = this.now();
    const [row] = await this.db
      .insert(employees)
      .values({ ...data, createdAt: timestamp, updatedAt: timestamp })
      .returning();
    if (!row) {
      throw new Error('Insert into employee returned no row');
    }
    return row;
  }

  async findById(id: number): Promise<EmployeeRecord | null> {
    const [row] = await this.db.select().from(employees).where(eq(employees.id, id)).limit(1);
    return row ?? null;
  }

  async findByCompanyIds(companyIds: readonly number[]): Promise<EmployeeRecord[]> {
    if (companyIds.length === 0) {
      return [];
    }
    return this.db
      .select()
      .from(employees)
      .where(inArray(employees.companyId, [...companyIds]))
      .orderBy(asc(employees.id));
  }

  async findPage(options: PageOptions): Promise<Page<EmployeeRecord>> {
    const items = await this.db
      .select()
      .from(employees)
      .orderBy(asc(employees.id))
      .limit(options.perPage)
      .offset(pageOffset(options));
    return { items, totalCount: await this.count() };
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(employees);
    return row?.value ?? 0;
  }

  async update(id: number, changes: EmployeeChanges): Promise<EmployeeRecord | null> {
    const [row] = await this.db
      .update(employees)
      .set({ ...changes, updatedAt: this.now() })
      .where(eq(employees.id, id))
      .returning();
    return row ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const removed = await this.db
      .delete(employees)
      .where(eq(employees.id, id))
      .returning({ id: employees.id });
    return removed.length > 0;
  }

  async deleteByCompanyId(companyId: number): Promise<number> {
    const removed = await this.db
      .delete(employees)
      .where(eq(employees.companyId, companyId))
      .returning({ id: employees.id });
    return removed.length;
  }
}

/**
 * Creates repositories backed by a Drizzle libsql database.
 * Call `ensureSchema(db)` once before serving requests.
 */
export function createDrizzleRepositories(
  db: DrizzleDatabase,
  options: RepositoryOptions = {}
): Repositories {
  return {
    companies: new DrizzleCompanyRepository(db, options.now),
    employees: new DrizzleEmployeeRepository(db, options.now),
  };
}
