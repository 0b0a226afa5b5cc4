import { getServices } from '../core/context-helpers.js';
import type { HonoOpenAPIApp } from '../core/openapi.js';
import { defineMeta, defineModel, type AppEnv, type Page, type PageOptions } from '../core/types.js';
import { CreateEndpoint } from '../endpoints/create.js';
import { DeleteEndpoint, type DeleteOutcome } from '../endpoints/delete.js';
import { ListEndpoint } from '../endpoints/list.js';
import { ReadEndpoint } from '../endpoints/read.js';
import { UpdateEndpoint } from '../endpoints/update.js';
import { CompanyRequestSchema, type CompanyRequest } from '../models/company.js';
import { CompanyFullSchema, type CompanyFull } from '../models/shapes.js';
import { registerCrud, type RegisterCrudOptions } from '../utils.js';

export const CompanyModel = defineModel({
  resourceName: 'Company',
  schema: CompanyFullSchema,
});

export const companyMeta = defineMeta({
  model: CompanyModel,
  fields: CompanyRequestSchema,
});

type CompanyMeta = typeof companyMeta;

const tags = ['Companies'];

export class CompanyCreate extends CreateEndpoint<AppEnv, CompanyMeta> {
  _meta = companyMeta;
  schema = { tags, summary: 'Create a company' };

  async create(data: CompanyRequest): Promise<CompanyFull> {
    return getServices(this.getContext()).companies.create(data);
  }
}

export class CompanyList extends ListEndpoint<AppEnv, CompanyMeta> {
  _meta = companyMeta;
  schema = { tags, summary: 'List companies with their employees' };

  async list(options: PageOptions): Promise<Page<CompanyFull>> {
    return getServices(this.getContext()).companies.list(options);
  }
}

export class CompanyRead extends ReadEndpoint<AppEnv, CompanyMeta> {
  _meta = companyMeta;
  schema = { tags, summary: 'Get a company with its employees' };

  async read(id: number): Promise<CompanyFull> {
    return getServices(this.getContext()).companies.get(id);
  }
}

export class CompanyUpdate extends UpdateEndpoint<AppEnv, CompanyMeta> {
  _meta = companyMeta;
  schema = { tags, summary: 'Replace the name and address of a company' };

  async update(id: number, data: CompanyRequest): Promise<CompanyFull> {
    return getServices(this.getContext()).companies.update(id, data);
  }
}

export class CompanyDelete extends DeleteEndpoint<AppEnv, CompanyMeta> {
  _meta = companyMeta;
  schema = { tags, summary: 'Delete a company and its employees' };
  protected includeCascadeResults = true;

  async delete(id: number): Promise<DeleteOutcome> {
    const { deletedEmployees } = await getServices(this.getContext()).companies.delete(id);
    return { cascade: { deleted: { employees: deletedEmployees } } };
  }
}

/**
 * Mounts the company endpoints under `basePath` (default `/companies`).
 */
export function registerCompanyRoutes(
  app: HonoOpenAPIApp<AppEnv>,
  basePath = '/companies',
  options: RegisterCrudOptions<AppEnv> = {}
): void {
  registerCrud(
    app,
    basePath,
    {
      create: CompanyCreate,
      list: CompanyList,
      read: CompanyRead,
      update: CompanyUpdate,
      delete: CompanyDelete,
    },
    options
  );
}
