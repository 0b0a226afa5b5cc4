import { NotFoundException } from '../core/exceptions.js';
import type { Page, PageOptions } from '../core/types.js';
import type { CompanyRecord, CompanyRequest } from '../models/company.js';
import type { CompanyFull } from '../models/shapes.js';
import type { Repositories } from '../repositories/types.js';
import { toCompanyFull } from '../serialization/shapes.js';
import { getLogger } from '../core/logger.js';

export interface CompanyDeletion {
  id: number;
  deletedEmployees: number;
}

/**
 * Company use cases. Every result is a `CompanyFull` built from the company
 * and its employees loaded beforehand.
 */
export class CompanyService {
  constructor(private repositories: Repositories) {}

  async create(request: CompanyRequest): Promise<CompanyFull> {
    const company = await this.repositories.companies.insert({
      name: request.name,
      address: request.address,
    });
    getLogger().debug('Company created', { id: company.id });
    return toCompanyFull({ ...company, employees: [] });
  }

  async get(id: number): Promise<CompanyFull> {
    const company = await this.repositories.companies.findById(id);
    if (!company) {
      throw new NotFoundException('Company', id);
    }
    return this.withEmployees(company);
  }

  async update(id: number, request: CompanyRequest): Promise<CompanyFull> {
    const company = await this.repositories.companies.update(id, {
      name: request.name,
      address: request.address,
    });
    if (!company) {
      throw new NotFoundException('Company', id);
    }
    return this.withEmployees(company);
  }

  /**
   * Deletes the company after its employees.
   */
  async delete(id: number): Promise<CompanyDeletion> {
    const company = await this.repositories.companies.findById(id);
    if (!company) {
      throw new NotFoundException('Company', id);
    }
    const deletedEmployees = await this.repositories.employees.deleteByCompanyId(id);
    await this.repositories.companies.delete(id);
    getLogger().debug('Company deleted', { id, deletedEmployees });
    return { id, deletedEmployees };
  }

  async list(options: PageOptions): Promise<Page<CompanyFull>> {
    const page = await this.repositories.companies.findPage(options);
    const employees = await this.repositories.employees.findByCompanyIds(
      page.items.map((company) => company.id)
    );
    return {
      items: page.items.map((company) =>
        toCompanyFull({
          ...company,
          employees: employees.filter((employee) => employee.companyId === company.id),
        })
      ),
      totalCount: page.totalCount,
    };
  }

  private async withEmployees(company: CompanyRecord): Promise<CompanyFull> {
    const employees = await this.repositories.employees.findByCompanyIds([company.id]);
    return toCompanyFull({ ...company, employees });
  }
}
