import { NotFoundException } from '../core/exceptions.js';
import type { Page, PageOptions } from '../core/types.js';
import type { CompanyRecord } from '../models/company.js';
import type { EmployeeRecord, EmployeeRequest } from '../models/employee.js';
import type { EmployeeFull } from '../models/shapes.js';
import { isForeignKeyViolation } from '../repositories/errors.js';
import type { Repositories } from '../repositories/types.js';
import { toEmployeeFull } from '../serialization/shapes.js';

export interface EmployeeDeletion {
  id: number;
}

/**
 * Employee use cases. The company of an employee is resolved before any
 * write, so an unknown `companyId` leaves storage untouched. A company
 * removed between that lookup and the write is caught by the storage
 * foreign key and reported the same way.
 */
export class EmployeeService {
  constructor(private repositories: Repositories) {}

  async create(request: EmployeeRequest): Promise<EmployeeFull> {
    const company = await this.requireCompany(request.companyId);
    const employee = await this.referencing(company.id, () =>
      this.repositories.employees.insert({
        name: request.name,
        email: request.email,
        position: request.position,
        companyId: company.id,
      })
    );
    return toEmployeeFull({ ...employee, company });
  }

  async get(id: number): Promise<EmployeeFull> {
    const employee = await this.repositories.employees.findById(id);
    if (!employee) {
      throw new NotFoundException('Employee', id);
    }
    return this.withCompany(employee);
  }

  async update(id: number, request: EmployeeRequest): Promise<EmployeeFull> {
    const existing = await this.repositories.employees.findById(id);
    if (!existing) {
      throw new NotFoundException('Employee', id);
    }
    const company = await this.requireCompany(request.companyId);
    const employee = await this.referencing(company.id, () =>
      this.repositories.employees.update(id, {
        name: request.name,
        email: request.email,
        position: request.position,
        companyId: company.id,
      })
    );
    // Removed between the lookup and the write
    if (!employee) {
      throw new NotFoundException('Employee', id);
    }
    return toEmployeeFull({ ...employee, company });
  }

  async delete(id: number): Promise<EmployeeDeletion> {
    const removed = await this.repositories.employees.delete(id);
    if (!removed) {
      throw new NotFoundException('Employee', id);
    }
    return { id };
  }

  async list(options: PageOptions): Promise<Page<EmployeeFull>> {
    const page = await this.repositories.employees.findPage(options);
    const companyIds = new Set<number>();
    for (const employee of page.items) {
      if (employee.companyId !== null) {
        companyIds.add(employee.companyId);
      }
    }
    const companies = await this.repositories.companies.findByIds([...companyIds]);
    const byId = new Map(companies.map((company) => [company.id, company]));

    return {
      items: page.items.map((employee) =>
        toEmployeeFull({
          ...employee,
          company: employee.companyId !== null ? byId.get(employee.companyId) ?? null : null,
        })
      ),
      totalCount: page.totalCount,
    };
  }

  private async requireCompany(companyId: number): Promise<CompanyRecord> {
    const company = await this.repositories.companies.findById(companyId);
    if (!company) {
      throw new NotFoundException('Company', companyId);
    }
    return company;
  }

  private async referencing<T>(companyId: number, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new NotFoundException('Company', companyId);
      }
      throw error;
    }
  }

  private async withCompany(employee: EmployeeRecord): Promise<EmployeeFull> {
    const company =
      employee.companyId !== null
        ? await this.repositories.companies.findById(employee.companyId)
        : null;
    return toEmployeeFull({ ...employee, company });
  }
}
