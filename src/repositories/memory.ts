import type { CompanyRecord } from '../models/company.js';
import type { EmployeeRecord } from '../models/employee.js';
import type { Page, PageOptions } from '../core/types.js';
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
} from './types.js';
import { ForeignKeyViolationError } from './errors.js';

/**
 * In-memory tables with their id sequences.
 * Ids are never reused within one store, even after deletes.
 */
export class MemoryStore {
  readonly companies = new Map<number, CompanyRecord>();
  readonly employees = new Map<number, EmployeeRecord>();
  private sequences = { companies: 0, employees: 0 };

  nextId(table: 'companies' | 'employees'): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }

  /**
   * Clears all rows and resets the id sequences (useful in tests).
   */
  clear(): void {
    this.companies.clear();
    this.employees.clear();
    this.sequences = { companies: 0, employees: 0 };
  }
}

function sortById<T extends { id: number }>(rows: Iterable<T>): T[] {
  return Array.from(rows).sort((a, b) => a.id - b.id);
}

function paginate<T extends { id: number }>(rows: Iterable<T>, options: PageOptions): Page<T> {
  const sorted = sortById(rows);
  const start = (options.page - 1) * options.perPage;
  return {
    items: sorted.slice(start, start + options.perPage),
    totalCount: sorted.length,
  };
}

// Rows are copied on the way in and out so callers never alias stored state
const copyCompany = (row: CompanyRecord): CompanyRecord => ({ ...row });
const copyEmployee = (row: EmployeeRecord): EmployeeRecord => ({ ...row });

export class MemoryCompanyRepository implements CompanyRepository {
  constructor(
    private store: MemoryStore,
    private now: Clock = systemClock
  ) {}

  async insert(data: NewCompany): Promise<CompanyRecord> {
    const timestamp = this.now();
    const row: CompanyRecord = {
      id: this.store.nextId('companies'),
      name: data.name,
      address: data.address,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.store.companies.set(row.id, row);
    return copyCompany(row);
  }

  async findById(id: number): Promise<CompanyRecord | null> {
    const row = this.store.companies.get(id);
    return row ? copyCompany(row) : null;
  }

  async findByIds(ids: readonly number[]): Promise<CompanyRecord[]> {
    const wanted = new Set(ids);
    const rows = Array.from(this.store.companies.values()).filter((row) => wanted.has(row.id));
    return sortById(rows).map(copyCompany);
  }

  async findPage(options: PageOptions): Promise<Page<CompanyRecord>> {
    const page = paginate(this.store.companies.values(), options);
    return { items: page.items.map(copyCompany), totalCount: page.totalCount };
  }

  async count(): Promise<number> {
    return this.store.companies.size;
  }

  async update(id: number, changes: CompanyChanges): Promise<CompanyRecord | null> {
    const existing = this.store.companies.get(id);
    if (!existing) {
      return null;
    }
    const row: CompanyRecord = {
      ...existing,
      name: changes.name ?? existing.name,
      address: changes.address ?? existing.address,
      updatedAt: this.now(),
    };
    this.store.companies.set(id, row);
    return copyCompany(row);
  }

  /**
   * Removes the company together with its employees in one synchronous step.
   */
  async delete(id: number): Promise<boolean> {
    if (!this.store.companies.delete(id)) {
      return false;
    }
    for (const [employeeId, row] of this.store.employees) {
      if (row.companyId === id) {
        this.store.employees.delete(employeeId);
      }
    }
    return true;
  }
}

export class MemoryEmployeeRepository implements EmployeeRepository {
  constructor(
    private store: MemoryStore,
    private now: Clock = systemClock
  ) {}

  async insert(data: NewEmployee): Promise<EmployeeRecord> {
    this.assertCompany(data.companyId);
    const timestamp = this.now();
    const row: EmployeeRecord = {
      id: this.store.nextId('employees'),
      name: data.name,
      email: data.email,
      position: data.position,
      companyId: data.companyId,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.store.employees.set(row.id, row);
    return copyEmployee(row);
  }

  async findById(id: number): Promise<EmployeeRecord | null> {
    const row = this.store.employees.get(id);
    return row ? copyEmployee(row) : null;
  }

  async findByCompanyIds(companyIds: readonly number[]): Promise<EmployeeRecord[]> {
    const wanted = new Set(companyIds);
    const rows = Array.from(this.store.employees.values()).filter(
      (row) => row.companyId !== null && wanted.has(row.companyId)
    );
    return sortById(rows).map(copyEmployee);
  }

  async findPage(options: PageOptions): Promise<Page<EmployeeRecord>> {
    const page = paginate(this.store.employees.values(), options);
    return { items: page.items.map(copyEmployee), totalCount: page.totalCount };
  }

  async count(): Promise<number> {
    return this.store.employees.size;
  }

  async update(id: number, changes: EmployeeChanges): Promise<EmployeeRecord | null> {
    const existing = this.store.employees.get(id);
    if (!existing) {
      return null;
    }
    if (changes.companyId !== undefined) {
      this.assertCompany(changes.companyId);
    }
    const row: EmployeeRecord = {
      ...existing,
      name: changes.name ?? existing.name,
      email: changes.email ?? existing.email,
      position: changes.position ?? existing.position,
      companyId: changes.companyId !== undefined ? changes.companyId : existing.companyId,
      updatedAt: this.now(),
    };
    this.store.employees.set(id, row);
    return copyEmployee(row);
  }

  async delete(id: number): Promise<boolean> {
    return this.store.employees.delete(id);
  }

  async deleteByCompanyId(companyId: number): Promise<number> {
    let removed = 0;
    for (const [id, row] of this.store.employees) {
      if (row.companyId === companyId) {
        this.store.employees.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  // Checked in the same tick as the write, like SQLite's foreign key
  private assertCompany(companyId: number | null): void {
    if (companyId !== null && !this.store.companies.has(companyId)) {
      throw new ForeignKeyViolationError('employee', 'company_id', companyId);
    }
  }
}

export interface MemoryRepositoryOptions extends RepositoryOptions {
  /** Store to use (default: a fresh store) */
  store?: MemoryStore;
}

/**
 * Creates repositories backed by process memory.
 *
 * @example
 * ```ts
 * const store = new MemoryStore();
 * const app = createApp({ repositories: createMemoryRepositories({ store }) });
 *
 * beforeEach(() => store.clear());
 * ```
 */
export function createMemoryRepositories(options: MemoryRepositoryOptions = {}): Repositories {
  const store = options.store ?? new MemoryStore();
  return {
    companies: new MemoryCompanyRepository(store, options.now),
    employees: new MemoryEmployeeRepository(store, options.now),
  };
}
