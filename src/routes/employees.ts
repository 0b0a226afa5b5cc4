import { getServices } from '../core/context-helpers.js';
import type { HonoOpenAPIApp } from '../core/openapi.js';
import { defineMeta, defineModel, type AppEnv, type Page, type PageOptions } from '../core/types.js';
import { CreateEndpoint } from '../endpoints/create.js';
import { DeleteEndpoint, type DeleteOutcome } from '../endpoints/delete.js';
import { ListEndpoint } from '../endpoints/list.js';
import { ReadEndpoint } from '../endpoints/read.js';
import { UpdateEndpoint } from '../endpoints/update.js';
import { EmployeeRequestSchema, type EmployeeRequest } from '../models/employee.js';
import { EmployeeFullSchema, type EmployeeFull } from '../models/shapes.js';
import { registerCrud, type RegisterCrudOptions } from '../utils.js';

export const EmployeeModel = defineModel({
  resourceName: 'Employee',
  schema: EmployeeFullSchema,
});

export const employeeMeta = defineMeta({
  model: EmployeeModel,
  fields: EmployeeRequestSchema,
});

type EmployeeMeta = typeof employeeMeta;

const tags = ['Employees'];

export class EmployeeCreate extends CreateEndpoint<AppEnv, EmployeeMeta> {
  _meta = employeeMeta;
  schema = { tags, summary: 'Create an employee in an existing company' };

  async create(data: EmployeeRequest): Promise<EmployeeFull> {
    return getServices(this.getContext()).employees.create(data);
  }
}

export class EmployeeList extends ListEndpoint<AppEnv, EmployeeMeta> {
  _meta = employeeMeta;
  schema = { tags, summary: 'List employees with their company' };

  async list(options: PageOptions): Promise<Page<EmployeeFull>> {
    return getServices(this.getContext()).employees.list(options);
  }
}

export class EmployeeRead extends ReadEndpoint<AppEnv, EmployeeMeta> {
  _meta = employeeMeta;
  schema = { tags, summary: 'Get an employee with its company' };

  async read(id: number): Promise<EmployeeFull> {
    return getServices(this.getContext()).employees.get(id);
  }
}

export class EmployeeUpdate extends UpdateEndpoint<AppEnv, EmployeeMeta> {
  _meta = employeeMeta;
  schema = { tags, summary: 'Replace an employee, possibly moving it to another company' };

  async update(id: number, data: EmployeeRequest): Promise<EmployeeFull> {
    return getServices(this.getContext()).employees.update(id, data);
  }
}

export class EmployeeDelete extends DeleteEndpoint<AppEnv, EmployeeMeta> {
  _meta = employeeMeta;
  schema = { tags, summary: 'Delete an employee' };

  async delete(id: number): Promise<DeleteOutcome> {
    await getServices(this.getContext()).employees.delete(id);
    return {};
  }
}

/**
 * Mounts the employee endpoints under `basePath` (default `/employees`).
 */
export function registerEmployeeRoutes(
  app: HonoOpenAPIApp<AppEnv>,
  basePath = '/employees',
  options: RegisterCrudOptions<AppEnv> = {}
): void {
  registerCrud(
    app,
    basePath,
    {
      create: EmployeeCreate,
      list: EmployeeList,
      read: EmployeeRead,
      update: EmployeeUpdate,
      delete: EmployeeDelete,
    },
    options
  );
}
