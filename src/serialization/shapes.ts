import type { CompanyRecord, CompanyWithEmployees } from '../models/company.js';
import type { EmployeeRecord, EmployeeWithCompany } from '../models/employee.js';
import type {
  CompanyFull,
  CompanySimple,
  EmployeeFull,
  EmployeeSimple,
} from '../models/shapes.js';

/**
 * Conversions from loaded records to response shapes.
 *
 * These functions only read what the caller already loaded. They never
 * look anything up, and Simple conversions never touch the related entity.
 */

export function toCompanySimple(company: CompanyRecord): CompanySimple {
  return {
    id: company.id,
    name: company.name,
    address: company.address,
    createdAt: company.createdAt.toISOString(),
    updatedAt: company.updatedAt.toISOString(),
  };
}

export function toEmployeeSimple(employee: EmployeeRecord): EmployeeSimple {
  return {
    id: employee.id,
    name: employee.name,
    email: employee.email,
    position: employee.position,
  };
}

/**
 * Company with its employees, each employee in Simple form.
 */
export function toCompanyFull(company: CompanyWithEmployees): CompanyFull {
  return {
    ...toCompanySimple(company),
    employees: company.employees.map(toEmployeeSimple),
  };
}

/**
 * Employee with its company in Simple form, or `null` when unassigned.
 */
export function toEmployeeFull(employee: EmployeeWithCompany): EmployeeFull {
  return {
    ...toEmployeeSimple(employee),
    createdAt: employee.createdAt.toISOString(),
    updatedAt: employee.updatedAt.toISOString(),
    company: employee.company ? toCompanySimple(employee.company) : null,
  };
}
