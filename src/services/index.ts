import type { Repositories } from '../repositories/types.js';
import { CompanyService } from './company-service.js';
import { EmployeeService } from './employee-service.js';

export { CompanyService, type CompanyDeletion } from './company-service.js';
export { EmployeeService, type EmployeeDeletion } from './employee-service.js';

/**
 * Services available to every endpoint through the `services` context variable.
 */
export interface Services {
  companies: CompanyService;
  employees: EmployeeService;
}

export function createServices(repositories: Repositories): Services {
  return {
    companies: new CompanyService(repositories),
    employees: new EmployeeService(repositories),
  };
}
