export {
  CompanyModel,
  companyMeta,
  CompanyCreate,
  CompanyList,
  CompanyRead,
  CompanyUpdate,
  CompanyDelete,
  registerCompanyRoutes,
} from './companies.js';
export {
  EmployeeModel,
  employeeMeta,
  EmployeeCreate,
  EmployeeList,
  EmployeeRead,
  EmployeeUpdate,
  EmployeeDelete,
  registerEmployeeRoutes,
} from './employees.js';
