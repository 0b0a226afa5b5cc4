export {
  systemClock,
  type Clock,
  type RepositoryOptions,
  type NewCompany,
  type CompanyChanges,
  type NewEmployee,
  type EmployeeChanges,
  type CompanyRepository,
  type EmployeeRepository,
  type Repositories,
} from './types.js';

export {
  MemoryStore,
  MemoryCompanyRepository,
  MemoryEmployeeRepository,
  createMemoryRepositories,
  type MemoryRepositoryOptions,
} from './memory.js';

export {
  DrizzleCompanyRepository,
  DrizzleEmployeeRepository,
  createDrizzleRepositories,
  ensureSchema,
  companies,
  employees,
  type DrizzleDatabase,
} from './drizzle/index.js';

export { ForeignKeyViolationError, isForeignKeyViolation } from './errors.js';

export { openRepositories, type OpenedStorage } from './open.js';
