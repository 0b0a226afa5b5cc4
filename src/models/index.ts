export { CompanyRequestSchema } from './company.js';
export type { CompanyRecord, CompanyWithEmployees, CompanyRequest } from './company.js';
export { EmployeeRequestSchema } from './employee.js';
export type { EmployeeRecord, EmployeeWithCompany, EmployeeRequest } from './employee.js';
export {
  CompanySimpleSchema,
  CompanyFullSchema,
  EmployeeSimpleSchema,
  EmployeeFullSchema,
} from './shapes.js';
export type { CompanySimple, CompanyFull, EmployeeSimple, EmployeeFull } from './shapes.js';
