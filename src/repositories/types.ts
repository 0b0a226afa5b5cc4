import type { CompanyRecord } from '../models/company.js';
import type { EmployeeRecord } from '../models/employee.js';
import type { Page, PageOptions } from '../core/types.js';

/**
 * Source of timestamps for created and updated records.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface RepositoryOptions {
  /** Clock used for `createdAt` / `updatedAt` (default: system clock) */
  now?: Clock;
}

// ============================================================================
// Write inputs
// ============================================================================

export interface NewCompany {
  name: string;
  address: string;
}

export type CompanyChanges = Partial<NewCompany>;

export interface NewEmployee {
  name: string;
  email: string;
  position: string;
  companyId: number | null;
}

export type EmployeeChanges = Partial<NewEmployee>;

// ============================================================================
// Repository contracts
// ============================================================================

/**
 * Storage contract of the company table.
 * Lookups return `null` when the row is absent instead of throwing.
 */
export interface CompanyRepository {
  insert(data: NewCompany): Promise<CompanyRecord>;
  findById(id: number): Promise<CompanyRecord | null>;
  /** Rows of the given ids that exist, in ascending id order */
  findByIds(ids: readonly number[]): Promise<CompanyRecord[]>;
  /** One page in ascending id order, together with the total row count */
  findPage(options: PageOptions): Promise<Page<CompanyRecord>>;
  count(): Promise<number>;
  /** Applies the changes and refreshes `updatedAt`; `null` when absent */
  update(id: number, changes: CompanyChanges): Promise<CompanyRecord | null>;
  /** Returns whether a row was removed */
  delete(id: number): Promise<boolean>;
}

/**
 * Storage contract of the employee table.
 */
export interface EmployeeRepository {
  insert(data: NewEmployee): Promise<EmployeeRecord>;
  findById(id: number): Promise<EmployeeRecord | null>;
  /** Employees of any of the given companies, in ascending id order */
  findByCompanyIds(companyIds: readonly number[]): Promise<EmployeeRecord[]>;
  findPage(options: PageOptions): Promise<Page<EmployeeRecord>>;
  count(): Promise<number>;
  update(id: number, changes: EmployeeChanges): Promise<EmployeeRecord | null>;
  delete(id: number): Promise<boolean>;
  /** Removes every employee of the company; returns how many were removed */
  deleteByCompanyId(companyId: number): Promise<number>;
}

export interface Repositories {
  companies: CompanyRepository;
  employees: EmployeeRepository;
}
